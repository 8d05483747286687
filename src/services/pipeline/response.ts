/**
 * @file src/services/pipeline/response.ts
 * @description Stage 8: Response — сборка финального ответа
 * @context Выполняется всегда (в том числе после дедлайна или ошибки стадии).
 *          Приоритет путей: clarification → gate block → early exit → degraded → full pipeline.
 *          Ответ никогда не бывает пустым.
 * @affects PublicResult, хранение сообщения ассистента
 */

import {
  DiagnosisResult,
  FinalOutput,
  Recommendation,
  ResponseMetadata,
  RunFailure,
  RunState,
  TerminationPath,
} from '../../types/pipeline';
import { specialistLabel } from '../../config/specialists';
import { truncate } from '../../utils/helpers';
import { DEFAULT_CLARIFICATION_MESSAGE } from './routing';
import { PipelineSettings, Stage } from './stage';

const MAX_NOTES = 3;
const DEGRADED_MAX_CONFIDENCE = 0.3;

export const GENERIC_FAILURE_MESSAGE =
  'Sorry, something went wrong while analysing your request. Please try again in a moment.';

type ResponseSettings = Pick<PipelineSettings, 'earlyExitConfidence' | 'defaultResponseConfidence'>;

// ============================================
// Metadata
// ============================================

function buildMetadata(state: Readonly<RunState>, terminationPath: TerminationPath): ResponseMetadata {
  // Порядок — как в approved set
  const invoked = (state.gate?.approvedSpecialists ?? [])
    .filter(id => id in state.outcomes || id in state.specialistErrors);

  return {
    terminationPath,
    severity: state.diagnosis?.severity ?? null,
    specialistsInvoked: invoked,
    failedSpecialists: Object.keys(state.specialistErrors),
    recommendationCount: state.validation?.recommendations.length ?? 0,
    warnings: [...(state.gate?.warnings ?? []), ...(state.validation?.warnings ?? [])],
  };
}

// ============================================
// Markdown
// ============================================

function diagnosisLines(diagnosis: DiagnosisResult): string[] {
  const lines = ['', '## Diagnosis', `**Severity**: ${diagnosis.severity.toUpperCase()}`];

  if (diagnosis.summary) {
    lines.push('', diagnosis.summary);
  }

  if (diagnosis.rootCauses.length > 0) {
    lines.push('', '**Root Causes**:', ...diagnosis.rootCauses.map(cause => `- ${cause}`));
  }

  return lines;
}

function recommendationLines(recommendations: Recommendation[]): string[] {
  if (recommendations.length === 0) return [];

  const lines = ['', '## Recommendations'];
  recommendations.forEach((rec, index) => {
    lines.push('', `### ${index + 1}. [${rec.priority.toUpperCase()}] ${rec.action}`);
    lines.push(`**Why**: ${rec.reason}`);
    if (rec.expectedImpact) {
      lines.push(`**Expected Impact**: ${rec.expectedImpact}`);
    }
  });
  return lines;
}

function notesLines(notes: string[]): string[] {
  if (notes.length === 0) return [];
  return ['', '## Notes', ...notes.slice(0, MAX_NOTES).map(note => `- ${note}`)];
}

/**
 * Markdown полного пути
 */
export function buildAnalysisMarkdown(state: Readonly<RunState>): string {
  const lines = ['# Analysis Results', '', `**Query**: ${state.query}`];

  if (state.diagnosis) {
    lines.push(...diagnosisLines(state.diagnosis));
  }
  lines.push(...recommendationLines(state.validation?.recommendations ?? []));
  lines.push(...notesLines(state.validation?.warnings ?? []));

  return lines.join('\n');
}

function failureNote(failure: RunFailure): string {
  switch (failure.kind) {
    case 'deadline':
      return `The analysis did not finish in time (stopped during ${failure.stage}). The results above are partial.`;
    case 'cancelled':
      return `The analysis was cancelled during ${failure.stage}. The results above are partial.`;
    default:
      return `An internal error interrupted the ${failure.stage} stage. The results above are partial.`;
  }
}

/**
 * Markdown деградированного пути: всё, что успело накопиться, плюс пояснение
 */
export function buildDegradedMarkdown(state: Readonly<RunState>, failure: RunFailure): string {
  const lines = ['# Analysis Results (partial)', '', `**Query**: ${state.query}`];

  if (state.diagnosis) {
    lines.push(...diagnosisLines(state.diagnosis));
  } else {
    const findings = Object.entries(state.outcomes);
    if (findings.length > 0) {
      lines.push('', '## Specialist Findings');
      for (const [id, outcome] of findings) {
        lines.push('', `**${specialistLabel(id)}**: ${truncate(outcome.response, 1500)}`);
      }
    }
  }

  lines.push(...recommendationLines(state.validation?.recommendations ?? []));
  lines.push('', `_${failureNote(failure)}_`);

  return lines.join('\n');
}

// ============================================
// Сборка
// ============================================

/**
 * Собирает финальный ответ (первое совпадение выигрывает)
 */
export function buildOutput(state: Readonly<RunState>, settings: ResponseSettings): FinalOutput {
  // Нарушение контракта state: накопленным данным доверять нельзя
  if (state.failure?.kind === 'invariant') {
    return genericFailureOutput(state);
  }

  // 1. Clarification
  if (state.routing?.clarificationNeeded) {
    return {
      responseText: state.routing.clarificationMessage || DEFAULT_CLARIFICATION_MESSAGE,
      confidence: 0,
      metadata: buildMetadata(state, 'clarification'),
    };
  }

  // 2. Gate block
  if (state.gate && !state.gate.approved) {
    return {
      responseText: `Unable to process query: ${state.gate.blockReason ?? 'invalid request'}`,
      confidence: 0,
      metadata: buildMetadata(state, 'gate_block'),
    };
  }

  // 3. Early exit
  if (state.earlyExit?.exit) {
    return {
      responseText: state.earlyExit.responseText || state.diagnosis?.summary || GENERIC_FAILURE_MESSAGE,
      confidence: settings.earlyExitConfidence,
      metadata: buildMetadata(state, 'early_exit'),
    };
  }

  // 4. Degraded
  if (state.failure) {
    const confidence = state.recommendation
      ? Math.min(DEGRADED_MAX_CONFIDENCE, state.recommendation.confidence)
      : DEGRADED_MAX_CONFIDENCE;
    return {
      responseText: buildDegradedMarkdown(state, state.failure),
      confidence,
      metadata: buildMetadata(state, 'degraded'),
    };
  }

  // 5. Full pipeline
  return {
    responseText: buildAnalysisMarkdown(state),
    confidence: state.recommendation?.confidence ?? settings.defaultResponseConfidence,
    metadata: buildMetadata(state, 'full_pipeline'),
  };
}

/**
 * Ответ на случай, когда упала сама Response-стадия
 */
export function genericFailureOutput(state: Readonly<RunState>): FinalOutput {
  return {
    responseText: GENERIC_FAILURE_MESSAGE,
    confidence: 0,
    metadata: buildMetadata(state, 'degraded'),
  };
}

export const responseStage: Stage = {
  name: 'response',
  async run(state, ctx) {
    const output = buildOutput(state, ctx.settings);
    return {
      output,
      reasoningSteps: [`Response: ${output.metadata.terminationPath}, confidence ${output.confidence.toFixed(2)}`],
    };
  },
};
