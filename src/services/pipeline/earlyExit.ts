/**
 * @file src/services/pipeline/earlyExit.ts
 * @description Stage 5: Early Exit — нужны ли рекомендации
 * @context Детерминистическое правило, только читает diagnosis.
 *          Текст раннего ответа — summary диагноза (для shortcut это ответ специалиста как есть).
 * @affects Развилка 2 (exit / continue)
 */

import { DiagnosisResult, PipelineFork, RunState, EarlyExitDecision } from '../../types/pipeline';
import { Stage } from './stage';

const MAX_ISSUES_FOR_EXIT = 2;

/**
 * Правило раннего выхода (первое совпадение):
 * 1. high/critical → continue
 * 2. нет issues → exit
 * 3. low/medium и ≤ 2 issues → exit
 * 4. иначе → continue
 */
export function decideEarlyExit(diagnosis: DiagnosisResult): EarlyExitDecision {
  const { severity, issues } = diagnosis;

  if (severity === 'high' || severity === 'critical') {
    return { exit: false, reason: `Severity is ${severity}, recommendations needed` };
  }

  if (issues.length === 0) {
    return { exit: true, reason: 'No actionable issues found', responseText: diagnosis.summary };
  }

  if (issues.length <= MAX_ISSUES_FOR_EXIT) {
    return {
      exit: true,
      reason: `Severity ${severity} with ${issues.length} minor issue(s)`,
      responseText: diagnosis.summary,
    };
  }

  return { exit: false, reason: `${issues.length} issues found, recommendations needed` };
}

/**
 * Развилка 2: после Early Exit
 */
export function decideAfterEarlyExit(state: Pick<RunState, 'earlyExit'>): Extract<PipelineFork, 'exit' | 'continue'> {
  return state.earlyExit?.exit ? 'exit' : 'continue';
}

export const earlyExitStage: Stage = {
  name: 'early_exit',
  async run(state, ctx) {
    if (!state.diagnosis) {
      throw new Error('Early exit requires a diagnosis');
    }

    const earlyExit = decideEarlyExit(state.diagnosis);
    ctx.log.info(earlyExit.exit ? 'Early exit triggered' : 'Continuing to recommendations', {
      reason: earlyExit.reason,
    });

    return {
      earlyExit,
      reasoningSteps: [`Early exit: ${earlyExit.exit ? 'exit' : 'continue'} (${earlyExit.reason})`],
    };
  },
};
