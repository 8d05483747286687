/**
 * @file src/utils/queryIntent.ts
 * @description Детерминистическая классификация намерения запроса (informational vs action)
 * @context Используется Diagnosis (shortcut для одного специалиста).
 *          Action-маркеры проверяются первыми: «what is the best way to fix X» — action.
 * @affects pipeline/diagnosis.ts
 */

import { containsPhrase } from './helpers';

export const ACTION_MARKERS = [
  'optimize', 'optimise', 'fix', 'improve', 'why is', 'why are', 'why did',
  "what's wrong", 'what is wrong', 'what went wrong', 'issue', 'issues',
  'problem', 'problems', 'recommend', 'recommendation', 'recommendations',
  'suggest', 'should', 'need to',
];

export const INFORMATIONAL_MARKERS = [
  'what is', 'what are', 'what was', 'what will', "what's",
  'how is', 'how are', 'how was', 'how will',
  'show me', 'tell me', 'explain', 'describe',
  'list', 'give me', 'provide',
];

export interface QueryIntent {
  informational: boolean;
  actionMarkers: string[];
  informationalMarkers: string[];
}

/**
 * Классифицирует запрос по спискам маркеров
 * @param query - Запрос пользователя
 * @returns Флаг informational и найденные маркеры
 */
export function classifyQueryIntent(query: string): QueryIntent {
  const actionMarkers = ACTION_MARKERS.filter(marker => containsPhrase(query, marker));
  const informationalMarkers = INFORMATIONAL_MARKERS.filter(marker => containsPhrase(query, marker));

  return {
    informational: actionMarkers.length === 0 && informationalMarkers.length > 0,
    actionMarkers,
    informationalMarkers,
  };
}

export function isInformationalQuery(query: string): boolean {
  return classifyQueryIntent(query).informational;
}
