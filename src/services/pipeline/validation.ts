/**
 * @file src/services/pipeline/validation.ts
 * @description Stage 7: Validation — проверка рекомендаций перед ответом
 * @context Чистая функция. Ошибки (нет action/reason) отбрасывают пункт,
 *          всё остальное — предупреждения. Итог: стабильная сортировка по priority
 *          и обрезка до maxRecommendations.
 * @affects Response
 */

import {
  DiagnosisResult,
  isPriority,
  Priority,
  PRIORITY_ORDER,
  Recommendation,
  RecommendationDraft,
  Severity,
  ValidationResult,
} from '../../types/pipeline';
import { containsPhrase, truncate } from '../../utils/helpers';
import { Stage } from './stage';

// Пары противоположных действий: [усиливающие, ослабляющие]
const CONFLICT_FAMILIES: Array<[string[], string[]]> = [
  [['increase', 'scale', 'raise', 'boost'], ['decrease', 'reduce', 'lower', 'cut']],
  [['pause', 'stop'], ['resume', 'start', 'launch', 'enable']],
  [['expand', 'broaden'], ['narrow', 'focus', 'limit']],
];

const CONFLICT_VERBS = new Set(CONFLICT_FAMILIES.flatMap(([up, down]) => [...up, ...down]));

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'to', 'for', 'of', 'on', 'in', 'and', 'or', 'by', 'with', 'at',
  'from', 'into', 'all', 'any', 'its', 'their', 'this', 'that', 'up', 'down',
]);

const VAGUE_VERBS = ['improve', 'optimize', 'optimise', 'enhance', 'review', 'consider', 'monitor', 'check'];

const MIN_ACTION_WORDS = 5;
const MAX_HIGH_FOR_MODERATE_SEVERITY = 2;

export interface ValidationOptions {
  maxRecommendations: number;
}

function targetWords(action: string): Set<string> {
  const words = action.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return new Set(words.filter(word => !STOP_WORDS.has(word) && !CONFLICT_VERBS.has(word)));
}

/**
 * Противоположные действия над общей целью (общее значимое слово)
 */
export function areConflicting(action1: string, action2: string): boolean {
  const opposed = CONFLICT_FAMILIES.some(([up, down]) => {
    const up1 = up.some(word => containsPhrase(action1, word));
    const down1 = down.some(word => containsPhrase(action1, word));
    const up2 = up.some(word => containsPhrase(action2, word));
    const down2 = down.some(word => containsPhrase(action2, word));
    return (up1 && down2) || (down1 && up2);
  });

  if (!opposed) return false;

  const targets2 = targetWords(action2);
  return Array.from(targetWords(action1)).some(word => targets2.has(word));
}

/**
 * Слишком общее действие: короче 5 слов или общий глагол в начале без чисел
 */
export function isVagueAction(action: string): boolean {
  const words = action.split(/\s+/).filter(Boolean);
  if (words.length < MIN_ACTION_WORDS) return true;

  const leading = words[0].toLowerCase().replace(/[^a-z]/g, '');
  return VAGUE_VERBS.includes(leading) && !/\d/.test(action);
}

/**
 * Валидирует черновики рекомендаций
 * @param drafts - Рекомендации от Recommendation stage
 * @param severity - Severity диагноза (для проверки согласованности приоритетов)
 */
export function validateRecommendations(
  drafts: RecommendationDraft[],
  severity: Severity,
  options: ValidationOptions
): ValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];
  const accepted: Array<{ position: number; rec: Recommendation }> = [];

  // 1. Обязательные поля
  drafts.forEach((draft, index) => {
    const position = index + 1;
    const action = draft.action?.trim() ?? '';
    const reason = draft.reason?.trim() ?? '';

    if (!action) {
      errors.push(`Recommendation ${position}: missing action`);
      return;
    }
    if (!reason) {
      errors.push(`Recommendation ${position}: missing reason`);
      return;
    }

    const rawPriority = draft.priority?.trim().toLowerCase();
    let priority: Priority = 'medium';
    if (isPriority(rawPriority)) {
      priority = rawPriority;
    } else {
      warnings.push(
        rawPriority
          ? `Recommendation ${position}: invalid priority "${rawPriority}", defaulting to medium`
          : `Recommendation ${position}: missing priority, defaulting to medium`
      );
    }

    accepted.push({
      position,
      rec: { priority, action, reason, expectedImpact: draft.expectedImpact?.trim() ?? '' },
    });
  });

  // 2. Конфликты
  for (let i = 0; i < accepted.length; i++) {
    for (let j = i + 1; j < accepted.length; j++) {
      const a = accepted[i];
      const b = accepted[j];
      if (areConflicting(a.rec.action, b.rec.action)) {
        warnings.push(
          `Recommendations ${a.position} and ${b.position} may conflict: ` +
          `"${truncate(a.rec.action, 50)}" vs "${truncate(b.rec.action, 50)}"`
        );
      }
    }
  }

  // 3. Размытые формулировки
  for (const { position, rec } of accepted) {
    if (isVagueAction(rec.action)) {
      warnings.push(`Recommendation ${position}: action may be too vague`);
    }
  }

  // 4. Согласованность с severity
  const highCount = accepted.filter(({ rec }) => rec.priority === 'high').length;
  if ((severity === 'high' || severity === 'critical') && highCount === 0) {
    warnings.push(`Severity is ${severity} but no high-priority recommendations`);
  }
  if ((severity === 'low' || severity === 'medium') && highCount > MAX_HIGH_FOR_MODERATE_SEVERITY) {
    warnings.push(`Severity is ${severity} but ${highCount} recommendations are high priority`);
  }

  // 5. Сортировка (стабильная) и обрезка
  let recommendations = accepted
    .map(({ rec }) => rec)
    .sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);

  if (recommendations.length > options.maxRecommendations) {
    warnings.push(
      `Too many recommendations (${recommendations.length}), limiting to top ${options.maxRecommendations}`
    );
    recommendations = recommendations.slice(0, options.maxRecommendations);
  }

  return {
    valid: errors.length === 0 && recommendations.length > 0,
    recommendations,
    warnings,
    errors,
  };
}

export function severityOf(diagnosis: DiagnosisResult | undefined): Severity {
  return diagnosis?.severity ?? 'medium';
}

export const validationStage: Stage = {
  name: 'validation',
  async run(state, ctx) {
    const drafts = state.recommendation?.recommendations ?? [];
    const validation = validateRecommendations(drafts, severityOf(state.diagnosis), {
      maxRecommendations: ctx.settings.validationMaxRecommendations,
    });

    ctx.log.info('Validation complete', {
      valid: validation.valid,
      accepted: validation.recommendations.length,
      warnings: validation.warnings.length,
      errors: validation.errors.length,
    });

    return {
      validation,
      reasoningSteps: [
        `Validation: ${validation.recommendations.length} recommendations accepted, ${validation.warnings.length} warnings, ${validation.errors.length} errors`,
      ],
    };
  },
};
