/**
 * @file src/services/pipeline/index.ts
 * @description Экспорт pipeline модулей
 */

export { PipelineExecutor, DEFAULT_STAGES, nextStage, toPublicResult, default } from './executor';
export type { PipelineDependencies } from './executor';
export { createRunState, mergeRunState } from './state';
export { defaultPipelineSettings } from './stage';
export type { PipelineSettings, Stage, StageContext } from './stage';
export { routeQuery, keywordRouting, parseRoutingResponse, DEFAULT_CLARIFICATION_MESSAGE } from './routing';
export { runGate, decideAfterGate } from './gate';
export { invokeSpecialists } from './invocation';
export { diagnose } from './diagnosis';
export { decideEarlyExit, decideAfterEarlyExit } from './earlyExit';
export { generateRecommendations, parseRecommendationResponse } from './recommendation';
export { validateRecommendations } from './validation';
export { buildOutput, genericFailureOutput } from './response';
