/**
 * @file src/services/pipeline/stage.ts
 * @description Контракт стадии pipeline и настройки, общие для всех стадий
 * @context Стадия получает текущий RunState (только чтение) и возвращает
 *          частичное обновление; слияние выполняет executor
 */

import config from '../../config';
import { ReasoningCapability } from '../openai';
import { SpecialistRegistry } from '../specialists/registry';
import { RequestLogger } from '../../utils/logger';
import { RunState, RunStateUpdate, StageName } from '../../types/pipeline';

export interface PipelineSettings {
  pipelineTimeoutMs: number;
  specialistTimeoutMs: number;
  routingClarificationThreshold: number;
  routingFallbackConfidence: number;
  routingHistoryMessages: number;
  gateMinQueryWords: number;
  gateShortQueryMinConfidence: number;
  gateLowConfidenceWarning: number;
  gateMaxSpecialists: number;
  recommendationMaxItems: number;
  recommendationFallbackConfidence: number;
  validationMaxRecommendations: number;
  earlyExitConfidence: number;
  defaultResponseConfidence: number;
}

export function defaultPipelineSettings(): PipelineSettings {
  return {
    pipelineTimeoutMs: config.pipelineTimeoutMs,
    specialistTimeoutMs: config.specialistTimeoutMs,
    routingClarificationThreshold: config.routingClarificationThreshold,
    routingFallbackConfidence: config.routingFallbackConfidence,
    routingHistoryMessages: config.routingHistoryMessages,
    gateMinQueryWords: config.gateMinQueryWords,
    gateShortQueryMinConfidence: config.gateShortQueryMinConfidence,
    gateLowConfidenceWarning: config.gateLowConfidenceWarning,
    gateMaxSpecialists: config.gateMaxSpecialists,
    recommendationMaxItems: config.recommendationMaxItems,
    recommendationFallbackConfidence: config.recommendationFallbackConfidence,
    validationMaxRecommendations: config.validationMaxRecommendations,
    earlyExitConfidence: config.earlyExitConfidence,
    defaultResponseConfidence: config.defaultResponseConfidence,
  };
}

export interface StageContext {
  requestId: string;
  /** Сигнал отмены run'а (дедлайн или abort) */
  signal: AbortSignal;
  registry: SpecialistRegistry;
  reasoning: ReasoningCapability;
  settings: PipelineSettings;
  log: RequestLogger;
}

export interface Stage {
  readonly name: StageName;
  /**
   * Стадия сама быстро завершается по ctx.signal: executor не гоняет её с сигналом,
   * а дожидается частичного обновления, сливает его и только потом фиксирует failure
   */
  readonly settlesOnAbort?: boolean;
  run(state: Readonly<RunState>, ctx: StageContext): Promise<RunStateUpdate>;
}
