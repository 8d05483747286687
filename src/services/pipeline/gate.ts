/**
 * @file src/services/pipeline/gate.ts
 * @description Stage 2: Gate — детерминистическая проверка routing-решения
 * @context Чистая функция без внешних вызовов. Последний предохранитель перед
 *          параллельными вызовами специалистов.
 * @affects Развилка 1 (proceed / block), Invocation (approved set)
 */

import { GateResult, PipelineFork, RoutingResult, RunState } from '../../types/pipeline';
import { countWords } from '../../utils/helpers';
import { Stage } from './stage';

export interface GateInput {
  query: string;
  routing: RoutingResult;
  isRegistered: (id: string) => boolean;
  minQueryWords: number;
  shortQueryMinConfidence: number;
  lowConfidenceWarning: number;
  maxSpecialists: number;
}

/**
 * Проверяет кандидатов routing
 * @returns approved set (подмножество routed set, ≤ maxSpecialists), warnings, block reason
 */
export function runGate(input: GateInput): GateResult {
  const { routing } = input;

  if (routing.clarificationNeeded) {
    return {
      approved: false,
      approvedSpecialists: [],
      warnings: [],
      blockReason: 'clarification required',
    };
  }

  const warnings: string[] = [];
  let blockReason: string | undefined;

  // 1. Длина запроса
  const words = countWords(input.query);
  if (words < input.minQueryWords) {
    warnings.push(`Query is very short (${words} words)`);
    if (routing.confidence < input.shortQueryMinConfidence) {
      blockReason = 'query too vague and routing confidence low';
    }
  }

  // 2. Не больше maxSpecialists — обрезаем, порядок сохраняется
  let candidates = routing.selectedSpecialists;
  if (candidates.length > input.maxSpecialists) {
    warnings.push(
      `Too many specialists selected (${candidates.length}), limiting to ${input.maxSpecialists}`
    );
    candidates = candidates.slice(0, input.maxSpecialists);
  }

  // 3. Низкая уверенность — только предупреждение
  if (routing.confidence < input.lowConfidenceWarning) {
    warnings.push(`Low routing confidence (${routing.confidence.toFixed(2)})`);
  }

  // 4. Только зарегистрированные специалисты
  const approvedSpecialists = candidates.filter(id => input.isRegistered(id));
  const unknown = candidates.filter(id => !input.isRegistered(id));
  if (unknown.length > 0) {
    warnings.push(`Unknown specialists removed: ${unknown.join(', ')}`);
  }

  // 5. Хотя бы один специалист
  if (approvedSpecialists.length === 0 && !blockReason) {
    blockReason = 'no valid specialists selected';
  }

  return {
    approved: !blockReason,
    approvedSpecialists: blockReason ? [] : approvedSpecialists,
    warnings,
    blockReason,
  };
}

/**
 * Развилка 1: после Gate
 */
export function decideAfterGate(state: Pick<RunState, 'gate'>): Extract<PipelineFork, 'proceed' | 'block'> {
  return state.gate?.approved ? 'proceed' : 'block';
}

export const gateStage: Stage = {
  name: 'gate',
  async run(state, ctx) {
    if (!state.routing) {
      throw new Error('Gate requires a routing result');
    }

    const gate = runGate({
      query: state.query,
      routing: state.routing,
      isRegistered: id => ctx.registry.has(id),
      minQueryWords: ctx.settings.gateMinQueryWords,
      shortQueryMinConfidence: ctx.settings.gateShortQueryMinConfidence,
      lowConfidenceWarning: ctx.settings.gateLowConfidenceWarning,
      maxSpecialists: ctx.settings.gateMaxSpecialists,
    });

    if (gate.approved) {
      ctx.log.info('Gate approved', { approved: gate.approvedSpecialists, warnings: gate.warnings });
    } else {
      ctx.log.warn('Gate blocked query', { reason: gate.blockReason, warnings: gate.warnings });
    }

    return {
      gate,
      reasoningSteps: [
        gate.approved
          ? `Gate: approved ${gate.approvedSpecialists.length} specialists, ${gate.warnings.length} warnings`
          : `Gate: blocked (${gate.blockReason})`,
      ],
    };
  },
};
