/**
 * @file src/types/pipeline.ts
 * @description Типы pipeline: RunState, результаты стадий, публичный результат
 * @context Единый типизированный RunState протягивается через все стадии;
 *          правила слияния полей описаны в services/pipeline/state.ts
 */

// ============================================
// Базовые типы
// ============================================

export type Severity = 'low' | 'medium' | 'high' | 'critical';
export type Priority = 'high' | 'medium' | 'low';

export type StageName =
  | 'routing'
  | 'gate'
  | 'invocation'
  | 'diagnosis'
  | 'early_exit'
  | 'recommendation'
  | 'validation'
  | 'response';

/** Сигнал продолжения на двух развилках графа */
export type PipelineFork = 'proceed' | 'block' | 'exit' | 'continue';

export type TerminationPath =
  | 'clarification'
  | 'gate_block'
  | 'early_exit'
  | 'full_pipeline'
  | 'degraded';

export const SEVERITY_ORDER: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export const PRIORITY_ORDER: Record<Priority, number> = {
  high: 0,
  medium: 1,
  low: 2,
};

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && value in SEVERITY_ORDER;
}

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && value in PRIORITY_ORDER;
}

// ============================================
// Контекст разговора
// ============================================

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

// ============================================
// Routing
// ============================================

export interface RoutingResult {
  selectedSpecialists: string[];
  confidence: number;
  rationale: string;
  clarificationNeeded: boolean;
  clarificationMessage?: string;
  source: 'reasoning' | 'keyword_fallback';
}

// ============================================
// Gate
// ============================================

export interface GateResult {
  approved: boolean;
  approvedSpecialists: string[];
  warnings: string[];
  blockReason?: string;
}

// ============================================
// Invocation
// ============================================

export interface SpecialistOutcome {
  response: string;
  confidence: number;
  toolsUsed: string[];
  metadata?: Record<string, unknown>;
}

export type SpecialistFailureCode = 'timeout' | 'cancelled' | 'not_registered' | 'specialist_error';

export interface SpecialistFailure {
  code: SpecialistFailureCode;
  message: string;
  durationMs: number;
}

// ============================================
// Diagnosis
// ============================================

export interface DiagnosisResult {
  issues: string[];
  rootCauses: string[];
  correlations: string[];
  severity: Severity;
  summary: string;
  source: 'reasoning' | 'single_specialist_shortcut' | 'no_data' | 'fallback';
}

// ============================================
// Early Exit
// ============================================

export interface EarlyExitDecision {
  exit: boolean;
  reason: string;
  responseText?: string;
}

// ============================================
// Recommendation / Validation
// ============================================

export interface Recommendation {
  priority: Priority;
  action: string;
  reason: string;
  expectedImpact: string;
}

/** Рекомендация до валидации: поля могут отсутствовать */
export interface RecommendationDraft {
  priority?: string;
  action?: string;
  reason?: string;
  expectedImpact?: string;
}

export interface RecommendationResult {
  recommendations: RecommendationDraft[];
  confidence: number;
  actionPlan: string;
  source: 'reasoning' | 'fallback' | 'none';
}

export interface ValidationResult {
  valid: boolean;
  recommendations: Recommendation[];
  warnings: string[];
  errors: string[];
}

// ============================================
// Bookkeeping
// ============================================

export interface StageTiming {
  stage: StageName;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
}

export interface RunFailure {
  stage: StageName;
  kind: 'deadline' | 'cancelled' | 'stage_error' | 'invariant';
  message: string;
}

// ============================================
// Финальный результат
// ============================================

export interface ResponseMetadata {
  terminationPath: TerminationPath;
  severity: Severity | null;
  specialistsInvoked: string[];
  failedSpecialists: string[];
  recommendationCount: number;
  warnings: string[];
}

export interface FinalOutput {
  responseText: string;
  confidence: number;
  metadata: ResponseMetadata;
}

// ============================================
// RunState
// ============================================

export interface RunState {
  // Identity (задаётся при создании, не меняется)
  readonly runId: string;
  readonly requestId: string;
  readonly query: string;
  readonly sessionId?: string;
  readonly userId: string;
  readonly conversationHistory: readonly ConversationMessage[];

  // Write-once результаты стадий
  routing?: RoutingResult;
  gate?: GateResult;
  diagnosis?: DiagnosisResult;
  earlyExit?: EarlyExitDecision;
  recommendation?: RecommendationResult;
  validation?: ValidationResult;
  output?: FinalOutput;

  // Key-wise maps
  outcomes: Record<string, SpecialistOutcome>;
  specialistErrors: Record<string, SpecialistFailure>;

  // Append-only bookkeeping
  toolsUsed: string[];
  reasoningSteps: string[];
  stageTimings: StageTiming[];

  // Replace
  totalElapsedMs: number;
  failure?: RunFailure;
}

/** Частичное обновление, возвращаемое стадией */
export type RunStateUpdate = Partial<
  Pick<
    RunState,
    | 'routing'
    | 'gate'
    | 'diagnosis'
    | 'earlyExit'
    | 'recommendation'
    | 'validation'
    | 'output'
    | 'outcomes'
    | 'specialistErrors'
    | 'toolsUsed'
    | 'reasoningSteps'
    | 'stageTimings'
    | 'totalElapsedMs'
    | 'failure'
  >
>;

// ============================================
// Публичный результат (контракт для request handler)
// ============================================

export interface ExecuteRequest {
  query: string;
  userId: string;
  sessionId?: string;
  deadlineMs?: number;
  conversationHistory?: ConversationMessage[];
}

export interface PublicResult {
  runId: string;
  response: string;
  provenance: string[];
  confidence: number;
  metadata: ResponseMetadata & {
    stageTimings: Record<string, number>;
    totalElapsedMs: number;
    toolsUsed: string[];
    reasoning: string[];
  };
}

// ============================================
// События прогресса (SSE)
// ============================================

export type PipelineEvent =
  | {
      type: 'progress';
      stage: StageName;
      status: 'started' | 'completed' | 'failed';
      message: string;
      elapsedMs: number;
    }
  | { type: 'complete'; result: PublicResult }
  | { type: 'error'; error_code: string; message: string };
