/**
 * @file src/services/pipeline/diagnosis.ts
 * @description Stage 4: Diagnosis — корреляция результатов специалистов и поиск root causes
 * @context Reasoning-вызов с JSON-ответом. Без вызова:
 *          - нет ни одного успешного специалиста (no_data)
 *          - один успешный специалист + информационный запрос (shortcut)
 *          При ошибке/нераспознаваемом ответе — детерминистический fallback.
 *          Severity всегда задана.
 * @dependencies services/openai.ts, config/prompts.ts, utils/queryIntent.ts
 * @affects Early Exit, Recommendation, Response
 */

import { ReasoningCapability } from '../openai';
import { buildDiagnosisPrompt, DIAGNOSIS_INSTRUCTIONS } from '../../config/prompts';
import { specialistLabel } from '../../config/specialists';
import {
  DiagnosisResult,
  isSeverity,
  SpecialistFailure,
  SpecialistOutcome,
} from '../../types/pipeline';
import {
  errorMessage,
  extractJsonFromText,
  safeJsonParse,
  toStringList,
} from '../../utils/helpers';
import { isInformationalQuery } from '../../utils/queryIntent';
import { logger } from '../../utils/logger';
import { Stage } from './stage';

const MAX_LIST_ITEMS = 10;

export interface DiagnosisOptions {
  requestId?: string;
  signal?: AbortSignal;
}

/**
 * Диагноз без данных: все специалисты упали или не вызывались
 */
export function noDataDiagnosis(errors: Record<string, SpecialistFailure>): DiagnosisResult {
  const failed = Object.keys(errors);
  const summary = failed.length > 0
    ? `No data available: ${failed.map(specialistLabel).join(', ')} could not be reached. Please try again later.`
    : 'No data available for this query.';

  return {
    issues: [],
    rootCauses: [],
    correlations: [],
    severity: 'low',
    summary,
    source: 'no_data',
  };
}

/**
 * Детерминистический диагноз, когда reasoning недоступен
 */
export function fallbackDiagnosis(
  outcomes: Record<string, SpecialistOutcome>,
  errors: Record<string, SpecialistFailure>
): DiagnosisResult {
  const summary = Object.entries(outcomes)
    .map(([id, outcome]) => `**${specialistLabel(id)}**: ${outcome.response}`)
    .join('\n\n');

  const issues = Object.entries(errors)
    .map(([id, failure]) => `${specialistLabel(id)} returned no data (${failure.code})`);

  return {
    issues,
    rootCauses: [],
    correlations: [],
    severity: issues.length > 0 ? 'medium' : 'low',
    summary,
    source: 'fallback',
  };
}

/**
 * Разбирает JSON-ответ reasoning-модели
 * @returns null, если ответ не является объектом с непустым summary
 */
export function parseDiagnosisResponse(text: string): DiagnosisResult | null {
  const parsed = safeJsonParse<unknown>(extractJsonFromText(text), null);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const data: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  const summary = typeof data.summary === 'string' ? data.summary.trim() : '';
  if (!summary) {
    return null;
  }

  const severity = typeof data.severity === 'string' ? data.severity.trim().toLowerCase() : '';

  return {
    issues: toStringList(data.issues, MAX_LIST_ITEMS),
    rootCauses: toStringList(data.root_causes, MAX_LIST_ITEMS),
    correlations: toStringList(data.correlations, MAX_LIST_ITEMS),
    severity: isSeverity(severity) ? severity : 'medium',
    summary,
    source: 'reasoning',
  };
}

/**
 * Выполняет диагностику
 * @param outcomes - Успешные результаты специалистов
 * @param errors - Ошибки специалистов
 */
export async function diagnose(
  query: string,
  outcomes: Record<string, SpecialistOutcome>,
  errors: Record<string, SpecialistFailure>,
  reasoning: ReasoningCapability,
  options: DiagnosisOptions = {}
): Promise<DiagnosisResult> {
  const succeeded = Object.keys(outcomes);

  if (succeeded.length === 0) {
    return noDataDiagnosis(errors);
  }

  // Один специалист и информационный запрос: его ответ и есть итог
  if (succeeded.length === 1 && isInformationalQuery(query)) {
    return {
      issues: [],
      rootCauses: [],
      correlations: [],
      severity: 'low',
      summary: outcomes[succeeded[0]].response,
      source: 'single_specialist_shortcut',
    };
  }

  try {
    const text = await reasoning.complete(buildDiagnosisPrompt(query, outcomes, errors), {
      instructions: DIAGNOSIS_INSTRUCTIONS,
      temperature: 0.2,
      maxTokens: 1500,
      requestId: options.requestId,
      signal: options.signal,
    });

    const diagnosis = parseDiagnosisResponse(text);
    if (diagnosis) {
      return diagnosis;
    }

    logger.warn('Diagnosis response unparsable, using fallback', {
      request_id: options.requestId,
      response_preview: text.slice(0, 200),
    });
  } catch (error) {
    logger.warn('Diagnosis reasoning failed, using fallback', {
      request_id: options.requestId,
      error: errorMessage(error),
    });
  }

  return fallbackDiagnosis(outcomes, errors);
}

export const diagnosisStage: Stage = {
  name: 'diagnosis',
  async run(state, ctx) {
    const diagnosis = await diagnose(
      state.query,
      state.outcomes,
      state.specialistErrors,
      ctx.reasoning,
      { requestId: ctx.requestId, signal: ctx.signal }
    );

    ctx.log.info('Diagnosis completed', {
      severity: diagnosis.severity,
      issues: diagnosis.issues.length,
      root_causes: diagnosis.rootCauses.length,
      source: diagnosis.source,
    });

    return {
      diagnosis,
      reasoningSteps: [
        diagnosis.source === 'single_specialist_shortcut'
          ? 'Diagnosis skipped: single-specialist informational query'
          : `Diagnosis: ${diagnosis.rootCauses.length} root causes, severity=${diagnosis.severity} (${diagnosis.source})`,
      ],
    };
  },
};
