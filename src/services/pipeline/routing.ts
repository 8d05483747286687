/**
 * @file src/services/pipeline/routing.ts
 * @description Stage 1: Routing — выбор специалистов через reasoning capability
 * @context Ответ модели разбирается построчно (AGENTS:/REASONING:/CONFIDENCE:/CLARIFICATION:).
 *          При ошибке, пустом или нераспознаваемом ответе — keyword fallback.
 *          Стадия никогда не роняет run.
 * @dependencies services/openai.ts, config/prompts.ts, config/specialists.ts
 * @affects Gate (кандидаты), Response (clarification)
 */

import { ReasoningCapability } from '../openai';
import { getSpecialistDefinition, SPECIALIST_DEFINITIONS } from '../../config/specialists';
import { buildRoutingPrompt, ROUTING_INSTRUCTIONS } from '../../config/prompts';
import { ConversationMessage, RoutingResult } from '../../types/pipeline';
import { clamp, containsPhrase, errorMessage } from '../../utils/helpers';
import { logger } from '../../utils/logger';
import { Stage } from './stage';

export const DEFAULT_CLARIFICATION_MESSAGE = [
  "I'm not sure what you're asking about. Could you please clarify?",
  '',
  'I can help with:',
  '- **Campaign performance**: CTR, ROAS, conversions',
  '- **Budget pacing**: spend status and risk',
  '- **Delivery**: impressions, reach, frequency',
  '- **Audience targeting**: line items and segments',
  '- **Creative performance**: which ads and sizes work best',
  '',
  'What would you like to know?',
].join('\n');

const NO_CLARIFICATION_VALUES = ['none', 'n/a', 'na', 'null', ''];
const NO_CLARIFICATION_PREFIXES = ['none ', 'none-', 'none,', 'none.', 'n/a ', 'not needed', 'no clarification'];

/** Специалист, доступный для routing: описание для промпта и ключевые слова для fallback */
export interface RoutableSpecialist {
  id: string;
  description: string;
  keywords: readonly string[];
}

export interface ParsedRoutingResponse {
  selectedSpecialists: string[];
  rationale: string;
  confidence: number | null;
  clarification: string;
}

export interface RoutingOptions {
  requestId?: string;
  signal?: AbortSignal;
  history?: ConversationMessage[];
  specialists?: RoutableSpecialist[];
  clarificationThreshold: number;
  fallbackConfidence: number;
}

/**
 * Нормализует имя специалиста из ответа модели
 */
export function normalizeSpecialistId(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_').replace(/[^a-z0-9_]/g, '');
}

/**
 * Разбирает ответ модели. Возвращает null, если строки AGENTS: нет —
 * такой ответ считается нераспознаваемым.
 */
export function parseRoutingResponse(text: string): ParsedRoutingResponse | null {
  let agentsLine: string | null = null;
  let rationale = '';
  let confidence: number | null = null;
  let clarification = '';

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim().replace(/^\*\*|\*\*$/g, '');
    const upper = line.toUpperCase();

    if (upper.startsWith('AGENTS:')) {
      agentsLine = line.slice('AGENTS:'.length).trim();
    } else if (upper.startsWith('REASONING:')) {
      rationale = line.slice('REASONING:'.length).trim();
    } else if (upper.startsWith('CONFIDENCE:')) {
      const value = parseFloat(line.slice('CONFIDENCE:'.length).trim());
      if (!Number.isNaN(value)) {
        confidence = clamp(value);
      }
    } else if (upper.startsWith('CLARIFICATION:')) {
      const value = line.slice('CLARIFICATION:'.length).trim();
      const lower = value.toLowerCase();
      const isEmpty = NO_CLARIFICATION_VALUES.includes(lower) ||
        NO_CLARIFICATION_PREFIXES.some(prefix => lower.startsWith(prefix));
      if (!isEmpty) {
        clarification = value;
      }
    }
  }

  if (agentsLine === null) {
    return null;
  }

  const selectedSpecialists: string[] = [];
  if (agentsLine.toUpperCase() !== 'NONE') {
    for (const part of agentsLine.split(',')) {
      const id = normalizeSpecialistId(part);
      if (id && id !== 'none' && !selectedSpecialists.includes(id)) {
        selectedSpecialists.push(id);
      }
    }
  }

  return { selectedSpecialists, rationale, confidence, clarification };
}

/**
 * Детерминистический routing по ключевым словам (целые слова/фразы)
 */
export function keywordRouting(
  query: string,
  specialists: RoutableSpecialist[],
  fallbackConfidence: number
): RoutingResult {
  const selected = specialists
    .filter(def => def.keywords.some(keyword => containsPhrase(query, keyword)))
    .map(def => def.id);

  if (selected.length === 0) {
    return {
      selectedSpecialists: [],
      confidence: 0,
      rationale: 'Query is unclear: no matching keywords found',
      clarificationNeeded: true,
      clarificationMessage: DEFAULT_CLARIFICATION_MESSAGE,
      source: 'keyword_fallback',
    };
  }

  return {
    selectedSpecialists: selected,
    confidence: fallbackConfidence,
    rationale: 'Fallback keyword-based routing',
    clarificationNeeded: false,
    source: 'keyword_fallback',
  };
}

/**
 * Выполняет routing запроса
 * @param query - Запрос пользователя
 * @param reasoning - Reasoning capability
 * @returns RoutingResult: кандидаты либо запрос на уточнение
 */
export async function routeQuery(
  query: string,
  reasoning: ReasoningCapability,
  options: RoutingOptions
): Promise<RoutingResult> {
  const specialists = options.specialists ?? SPECIALIST_DEFINITIONS;
  const history = options.history ?? [];

  let text: string;
  try {
    text = await reasoning.complete(buildRoutingPrompt(query, specialists, history), {
      instructions: ROUTING_INSTRUCTIONS,
      temperature: 0,
      maxTokens: 300,
      requestId: options.requestId,
      signal: options.signal,
    });
  } catch (error) {
    logger.warn('Reasoning routing failed, falling back to keyword matching', {
      request_id: options.requestId,
      error: errorMessage(error),
    });
    return keywordRouting(query, specialists, options.fallbackConfidence);
  }

  const parsed = text.trim() ? parseRoutingResponse(text) : null;
  if (!parsed) {
    logger.warn('Routing response unparsable, falling back to keyword matching', {
      request_id: options.requestId,
      response_preview: text.slice(0, 200),
    });
    return keywordRouting(query, specialists, options.fallbackConfidence);
  }

  const confidence = parsed.confidence ?? (parsed.selectedSpecialists.length > 0 ? 0.8 : 0);
  // Неизвестные имена остаются в кандидатах (их отсеет Gate), но routable должен быть хотя бы один
  const routable = parsed.selectedSpecialists.filter(id => specialists.some(s => s.id === id));

  if (
    routable.length === 0 ||
    confidence < options.clarificationThreshold ||
    parsed.clarification
  ) {
    logger.info('Routing unclear, requesting clarification', {
      request_id: options.requestId,
      selected: parsed.selectedSpecialists,
      confidence,
    });

    return {
      selectedSpecialists: [],
      confidence,
      rationale: parsed.rationale || 'Query is unclear or ambiguous',
      clarificationNeeded: true,
      clarificationMessage: parsed.clarification || DEFAULT_CLARIFICATION_MESSAGE,
      source: 'reasoning',
    };
  }

  logger.info('Routing decision made', {
    request_id: options.requestId,
    selected: parsed.selectedSpecialists,
    confidence,
  });

  return {
    selectedSpecialists: parsed.selectedSpecialists,
    confidence,
    rationale: parsed.rationale,
    clarificationNeeded: false,
    source: 'reasoning',
  };
}

export const routingStage: Stage = {
  name: 'routing',
  async run(state, ctx) {
    const history = state.conversationHistory.slice(-ctx.settings.routingHistoryMessages);

    // Routing предлагает только зарегистрированных специалистов
    const specialists: RoutableSpecialist[] = ctx.registry.ids().map(id => {
      const definition = getSpecialistDefinition(id);
      return {
        id,
        description: ctx.registry.get(id)?.description ?? definition?.description ?? id,
        keywords: definition?.keywords ?? [],
      };
    });

    const routing = await routeQuery(state.query, ctx.reasoning, {
      requestId: ctx.requestId,
      signal: ctx.signal,
      history,
      specialists,
      clarificationThreshold: ctx.settings.routingClarificationThreshold,
      fallbackConfidence: ctx.settings.routingFallbackConfidence,
    });

    const step = routing.clarificationNeeded
      ? `Routing: clarification requested (confidence ${routing.confidence.toFixed(2)}, ${routing.source})`
      : `Routing: selected ${routing.selectedSpecialists.join(', ')} with confidence ${routing.confidence.toFixed(2)} (${routing.source})`;

    return {
      routing,
      reasoningSteps: [step],
    };
  },
};
