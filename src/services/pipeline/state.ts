/**
 * @file src/services/pipeline/state.ts
 * @description RunState: создание seed-состояния и field-level merge
 * @context Единственное место, где описаны правила слияния полей:
 *          write-once (результаты стадий), append-only (bookkeeping),
 *          key-wise map merge (outcomes / errors), replace (таймеры, failure).
 * @affects pipeline/executor.ts
 */

import { v4 as uuidv4 } from 'uuid';
import { StateInvariantError } from '../../types/errors';
import {
  ConversationMessage,
  RunState,
  RunStateUpdate,
} from '../../types/pipeline';

const WRITE_ONCE_FIELDS = [
  'routing',
  'gate',
  'diagnosis',
  'earlyExit',
  'recommendation',
  'validation',
  'output',
] as const;

const APPEND_FIELDS = ['toolsUsed', 'reasoningSteps', 'stageTimings'] as const;

const MAP_FIELDS = ['outcomes', 'specialistErrors'] as const;

const REPLACE_FIELDS = ['totalElapsedMs', 'failure'] as const;

type KnownField =
  | (typeof WRITE_ONCE_FIELDS)[number]
  | (typeof APPEND_FIELDS)[number]
  | (typeof MAP_FIELDS)[number]
  | (typeof REPLACE_FIELDS)[number];

const KNOWN_FIELDS: ReadonlySet<string> = new Set<KnownField>([
  ...WRITE_ONCE_FIELDS,
  ...APPEND_FIELDS,
  ...MAP_FIELDS,
  ...REPLACE_FIELDS,
]);

/**
 * Создаёт пустой RunState на входе запроса
 */
export function createRunState(params: {
  query: string;
  userId: string;
  sessionId?: string;
  requestId?: string;
  runId?: string;
  conversationHistory?: ConversationMessage[];
}): RunState {
  return {
    runId: params.runId ?? uuidv4(),
    requestId: params.requestId ?? uuidv4(),
    query: params.query,
    sessionId: params.sessionId,
    userId: params.userId,
    conversationHistory: params.conversationHistory ? [...params.conversationHistory] : [],
    outcomes: {},
    specialistErrors: {},
    toolsUsed: [],
    reasoningSteps: [],
    stageTimings: [],
    totalElapsedMs: 0,
  };
}

/**
 * Применяет частичное обновление стадии к RunState
 * @returns Новый RunState (исходный не мутируется)
 * @throws StateInvariantError — перезапись write-once поля или неизвестное поле
 */
export function mergeRunState(state: RunState, update: RunStateUpdate): RunState {
  for (const key of Object.keys(update)) {
    if (!KNOWN_FIELDS.has(key)) {
      throw new StateInvariantError(key, `Stage update contains unknown field "${key}"`);
    }
  }

  const next: RunState = {
    ...state,
    outcomes: { ...state.outcomes },
    specialistErrors: { ...state.specialistErrors },
    toolsUsed: [...state.toolsUsed],
    reasoningSteps: [...state.reasoningSteps],
    stageTimings: [...state.stageTimings],
  };

  // Write-once: результат стадии задаётся ровно один раз
  for (const field of WRITE_ONCE_FIELDS) {
    if (update[field] === undefined) continue;
    if (state[field] !== undefined) {
      throw new StateInvariantError(field, `Field "${field}" is write-once and already set`);
    }
  }
  if (update.routing) next.routing = update.routing;
  if (update.gate) next.gate = update.gate;
  if (update.diagnosis) next.diagnosis = update.diagnosis;
  if (update.earlyExit) next.earlyExit = update.earlyExit;
  if (update.recommendation) next.recommendation = update.recommendation;
  if (update.validation) next.validation = update.validation;
  if (update.output) next.output = update.output;

  // Append-only
  if (update.toolsUsed) next.toolsUsed.push(...update.toolsUsed);
  if (update.reasoningSteps) next.reasoningSteps.push(...update.reasoningSteps);
  if (update.stageTimings) next.stageTimings.push(...update.stageTimings);

  // Key-wise merge, поздняя стадия побеждает по ключу
  if (update.outcomes) Object.assign(next.outcomes, update.outcomes);
  if (update.specialistErrors) Object.assign(next.specialistErrors, update.specialistErrors);

  // Replace
  if (update.totalElapsedMs !== undefined) next.totalElapsedMs = update.totalElapsedMs;
  if (update.failure !== undefined) next.failure = update.failure;

  return next;
}
