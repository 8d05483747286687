/**
 * @file src/services/pipeline/recommendation.ts
 * @description Stage 6: Recommendation — приоритизированные действия по root causes
 * @context Reasoning-вызов с блочным форматом ответа (RECOMMENDATION n: / Priority: / Action: ...).
 *          Fallback: структурированные рекомендации из metadata специалистов,
 *          затем детерминистические пункты из root causes и issues.
 *          Черновики не валидируются здесь — это работа Validation.
 * @dependencies services/openai.ts, config/prompts.ts
 * @affects Validation, Response (confidence)
 */

import { ReasoningCapability } from '../openai';
import { buildRecommendationPrompt, RECOMMENDATION_INSTRUCTIONS } from '../../config/prompts';
import {
  DiagnosisResult,
  RecommendationDraft,
  RecommendationResult,
  SpecialistOutcome,
} from '../../types/pipeline';
import { clamp, errorMessage } from '../../utils/helpers';
import { logger } from '../../utils/logger';
import { Stage } from './stage';

const DEFAULT_REASONING_CONFIDENCE = 0.8;
const METADATA_ITEMS_PER_SPECIALIST = 2;

export interface RecommendationOptions {
  maxItems: number;
  fallbackConfidence: number;
  requestId?: string;
  signal?: AbortSignal;
}

export interface ParsedRecommendations {
  recommendations: RecommendationDraft[];
  confidence: number | null;
  actionPlan: string;
}

// ============================================
// Парсинг ответа
// ============================================

const FIELD_PREFIXES: Array<[string, keyof RecommendationDraft]> = [
  ['PRIORITY:', 'priority'],
  ['ACTION:', 'action'],
  ['REASON:', 'reason'],
  ['EXPECTED IMPACT:', 'expectedImpact'],
];

/**
 * Разбирает блочный ответ модели
 */
export function parseRecommendationResponse(text: string): ParsedRecommendations {
  const recommendations: RecommendationDraft[] = [];
  let confidence: number | null = null;
  let actionPlan = '';
  let current: RecommendationDraft | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim().replace(/^[-*]\s+/, '').replace(/\*\*/g, '');
    const upper = line.toUpperCase();

    if (/^RECOMMENDATION\s*\d*\s*:?$/.test(upper)) {
      if (current) recommendations.push(current);
      current = {};
      continue;
    }

    if (upper.startsWith('CONFIDENCE:')) {
      const value = parseFloat(line.slice('CONFIDENCE:'.length).trim());
      if (!Number.isNaN(value)) confidence = clamp(value);
      continue;
    }

    if (upper.startsWith('ACTION_PLAN:')) {
      actionPlan = line.slice('ACTION_PLAN:'.length).trim();
      continue;
    }

    if (!current) continue;

    for (const [prefix, field] of FIELD_PREFIXES) {
      if (upper.startsWith(prefix)) {
        const value = line.slice(prefix.length).trim();
        current[field] = field === 'priority' ? value.toLowerCase() : value;
        break;
      }
    }
  }

  if (current) recommendations.push(current);

  return {
    recommendations: recommendations.filter(rec => rec.action),
    confidence,
    actionPlan,
  };
}

// ============================================
// Fallback
// ============================================

function readString(data: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Структурированные рекомендации, которые специалисты положили в metadata.recommendations
 */
export function recommendationsFromMetadata(
  outcomes: Record<string, SpecialistOutcome>
): RecommendationDraft[] {
  const drafts: RecommendationDraft[] = [];

  for (const outcome of Object.values(outcomes)) {
    const items = outcome.metadata?.recommendations;
    if (!Array.isArray(items)) continue;

    const objects = items.filter(
      (item): item is object => typeof item === 'object' && item !== null && !Array.isArray(item)
    );

    for (const item of objects.slice(0, METADATA_ITEMS_PER_SPECIALIST)) {
      const data: Record<string, unknown> = Object.fromEntries(Object.entries(item));
      const action = readString(data, 'action');
      if (!action) continue;
      drafts.push({
        priority: readString(data, 'priority')?.toLowerCase(),
        action,
        reason: readString(data, 'reason'),
        expectedImpact: readString(data, 'expected_impact', 'expectedImpact'),
      });
    }
  }

  return drafts;
}

/**
 * Детерминистические пункты из диагноза: сначала root causes, затем issues
 */
export function recommendationsFromDiagnosis(diagnosis: DiagnosisResult): RecommendationDraft[] {
  const fromCauses: RecommendationDraft[] = diagnosis.rootCauses.map(cause => ({
    priority: 'medium',
    action: `Investigate and address the root cause: ${cause}`,
    reason: `Diagnosed root cause: ${cause}`,
    expectedImpact: 'Removes a diagnosed driver of underperformance',
  }));

  const fromIssues: RecommendationDraft[] = diagnosis.issues.map(issue => ({
    priority: 'medium',
    action: `Review and resolve the reported issue: ${issue}`,
    reason: `Diagnosed issue: ${issue}`,
    expectedImpact: 'Resolves a reported issue',
  }));

  return [...fromCauses, ...fromIssues];
}

/**
 * При high/critical хотя бы одна рекомендация должна быть high
 */
function promoteForSeverity(
  recommendations: RecommendationDraft[],
  diagnosis: DiagnosisResult
): RecommendationDraft[] {
  const severe = diagnosis.severity === 'high' || diagnosis.severity === 'critical';
  if (!severe || recommendations.length === 0 || recommendations.some(rec => rec.priority === 'high')) {
    return recommendations;
  }
  const [first, ...rest] = recommendations;
  return [{ ...first, priority: 'high' }, ...rest];
}

// ============================================
// Генерация
// ============================================

/**
 * Генерирует рекомендации по диагнозу
 */
export async function generateRecommendations(
  query: string,
  diagnosis: DiagnosisResult,
  outcomes: Record<string, SpecialistOutcome>,
  reasoning: ReasoningCapability,
  options: RecommendationOptions
): Promise<RecommendationResult> {
  if (diagnosis.issues.length === 0 && diagnosis.rootCauses.length === 0) {
    return { recommendations: [], confidence: 0, actionPlan: '', source: 'none' };
  }

  try {
    const text = await reasoning.complete(
      buildRecommendationPrompt(query, diagnosis, outcomes, options.maxItems),
      {
        instructions: RECOMMENDATION_INSTRUCTIONS,
        temperature: 0.3,
        maxTokens: 1500,
        requestId: options.requestId,
        signal: options.signal,
      }
    );

    const parsed = parseRecommendationResponse(text);
    if (parsed.recommendations.length > 0) {
      return {
        recommendations: promoteForSeverity(parsed.recommendations.slice(0, options.maxItems), diagnosis),
        confidence: parsed.confidence ?? DEFAULT_REASONING_CONFIDENCE,
        actionPlan: parsed.actionPlan || 'Follow the recommendations in priority order',
        source: 'reasoning',
      };
    }

    logger.warn('Recommendation response contained no items, using fallback', {
      request_id: options.requestId,
      response_preview: text.slice(0, 200),
    });
  } catch (error) {
    logger.warn('Recommendation reasoning failed, using fallback', {
      request_id: options.requestId,
      error: errorMessage(error),
    });
  }

  const fromMetadata = recommendationsFromMetadata(outcomes);
  const drafts = fromMetadata.length > 0 ? fromMetadata : recommendationsFromDiagnosis(diagnosis);

  return {
    recommendations: promoteForSeverity(drafts.slice(0, options.maxItems), diagnosis),
    confidence: options.fallbackConfidence,
    actionPlan: fromMetadata.length > 0
      ? 'Review the specialist recommendations in priority order'
      : 'Address the diagnosed root causes first, then the remaining issues',
    source: 'fallback',
  };
}

export const recommendationStage: Stage = {
  name: 'recommendation',
  async run(state, ctx) {
    if (!state.diagnosis) {
      throw new Error('Recommendation requires a diagnosis');
    }

    const recommendation = await generateRecommendations(
      state.query,
      state.diagnosis,
      state.outcomes,
      ctx.reasoning,
      {
        maxItems: ctx.settings.recommendationMaxItems,
        fallbackConfidence: ctx.settings.recommendationFallbackConfidence,
        requestId: ctx.requestId,
        signal: ctx.signal,
      }
    );

    ctx.log.info('Recommendations generated', {
      count: recommendation.recommendations.length,
      confidence: recommendation.confidence,
      source: recommendation.source,
    });

    return {
      recommendation,
      reasoningSteps: [
        `Generated ${recommendation.recommendations.length} recommendations with confidence ${recommendation.confidence.toFixed(2)} (${recommendation.source})`,
      ],
    };
  },
};
