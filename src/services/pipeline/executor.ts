/**
 * @file src/services/pipeline/executor.ts
 * @description Исполнитель pipeline: фиксированный граф стадий с двумя развилками
 * @context routing → gate ─(proceed)→ invocation → diagnosis → early_exit ─(continue)→ recommendation → validation → response
 *                         └(block)──────────────────────────────────────┴(exit)──────────────────────────────────────┘
 *          Каждая стадия выполняется не более одного раза и гоняется наперегонки с сигналом run'а
 *          (дедлайн или abort()); стадии с settlesOnAbort executor дожидается и сливает их
 *          частичный результат. Ошибка стадии или дедлайн фиксируются в state.failure,
 *          после чего управление переходит к Response. Response выполняется всегда.
 *          run() никогда не отклоняется.
 * @dependencies pipeline/state.ts, все стадии, utils/statsCollector.ts
 * @affects routes/chat.ts (SSE progress events, PublicResult)
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ReasoningCapability } from '../openai';
import { SpecialistRegistry } from '../specialists/registry';
import {
  PipelineCancelledError,
  PipelineTimeoutError,
  StateInvariantError,
} from '../../types/errors';
import {
  ExecuteRequest,
  PipelineEvent,
  PublicResult,
  RunFailure,
  RunState,
  RunStateUpdate,
  StageName,
} from '../../types/pipeline';
import { errorMessage, raceWithSignal } from '../../utils/helpers';
import { createRequestLogger, RequestLogger } from '../../utils/logger';
import { saveRunStats } from '../../utils/statsCollector';
import { createRunState, mergeRunState } from './state';
import { defaultPipelineSettings, PipelineSettings, Stage, StageContext } from './stage';
import { routingStage } from './routing';
import { decideAfterGate, gateStage } from './gate';
import { invocationStage } from './invocation';
import { diagnosisStage } from './diagnosis';
import { decideAfterEarlyExit, earlyExitStage } from './earlyExit';
import { recommendationStage } from './recommendation';
import { validationStage } from './validation';
import { genericFailureOutput, responseStage } from './response';

export const DEFAULT_STAGES: Record<StageName, Stage> = {
  routing: routingStage,
  gate: gateStage,
  invocation: invocationStage,
  diagnosis: diagnosisStage,
  early_exit: earlyExitStage,
  recommendation: recommendationStage,
  validation: validationStage,
  response: responseStage,
};

const STAGE_MESSAGES: Record<StageName, string> = {
  routing: 'Selecting specialists',
  gate: 'Checking the request',
  invocation: 'Querying specialists',
  diagnosis: 'Diagnosing findings',
  early_exit: 'Deciding whether recommendations are needed',
  recommendation: 'Generating recommendations',
  validation: 'Validating recommendations',
  response: 'Composing the response',
};

export interface PipelineDependencies {
  registry: SpecialistRegistry;
  reasoning: ReasoningCapability;
  settings?: Partial<PipelineSettings>;
  /** Подмена отдельных стадий (тесты) */
  stages?: Partial<Record<StageName, Stage>>;
}

/**
 * Следующая стадия графа после завершённой
 */
export function nextStage(completed: StageName, state: Readonly<RunState>): StageName | null {
  switch (completed) {
    case 'routing':
      return 'gate';
    case 'gate':
      return decideAfterGate(state) === 'proceed' ? 'invocation' : 'response';
    case 'invocation':
      return 'diagnosis';
    case 'diagnosis':
      return 'early_exit';
    case 'early_exit':
      return decideAfterEarlyExit(state) === 'exit' ? 'response' : 'recommendation';
    case 'recommendation':
      return 'validation';
    case 'validation':
      return 'response';
    case 'response':
      return null;
  }
}

/**
 * Преобразует итоговый RunState в публичный результат
 */
export function toPublicResult(state: Readonly<RunState>): PublicResult {
  const output = state.output ?? genericFailureOutput(state);

  const stageTimings: Record<string, number> = {};
  for (const timing of state.stageTimings) {
    stageTimings[timing.stage] = timing.durationMs;
  }

  return {
    runId: state.runId,
    response: output.responseText,
    provenance: output.metadata.specialistsInvoked.filter(id => id in state.outcomes),
    confidence: output.confidence,
    metadata: {
      ...output.metadata,
      stageTimings,
      totalElapsedMs: state.totalElapsedMs,
      toolsUsed: [...state.toolsUsed],
      reasoning: [...state.reasoningSteps],
    },
  };
}

export class PipelineExecutor extends EventEmitter {
  private readonly requestId: string;
  private readonly runId: string;
  private readonly log: RequestLogger;
  private readonly controller = new AbortController();
  private readonly settings: PipelineSettings;
  private readonly stages: Record<StageName, Stage>;
  private readonly registry: SpecialistRegistry;
  private readonly reasoning: ReasoningCapability;
  private startedAt = 0;

  constructor(deps: PipelineDependencies, requestId?: string) {
    super();
    this.requestId = requestId || uuidv4();
    this.runId = uuidv4();
    this.log = createRequestLogger(this.requestId, this.runId);
    this.registry = deps.registry;
    this.reasoning = deps.reasoning;
    this.settings = { ...defaultPipelineSettings(), ...deps.settings };
    this.stages = { ...DEFAULT_STAGES, ...deps.stages };
  }

  /**
   * Отменяет run: прерывает текущую стадию и вызовы специалистов, затем Response
   */
  abort(): void {
    if (this.controller.signal.aborted) return;
    this.log.warn('Pipeline run aborted');
    this.controller.abort(new PipelineCancelledError());
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  private emitEvent(event: PipelineEvent): void {
    this.emit('event', event);
  }

  private emitProgress(stage: StageName, status: 'started' | 'completed' | 'failed', message: string): void {
    this.emitEvent({
      type: 'progress',
      stage,
      status,
      message,
      elapsedMs: Date.now() - this.startedAt,
    });
  }

  private context(): StageContext {
    return {
      requestId: this.requestId,
      signal: this.controller.signal,
      registry: this.registry,
      reasoning: this.reasoning,
      settings: this.settings,
      log: this.log,
    };
  }

  private toFailure(stage: StageName, error: unknown): RunFailure {
    if (error instanceof StateInvariantError) {
      return { stage, kind: 'invariant', message: error.message };
    }
    if (this.controller.signal.aborted) {
      const reason: unknown = this.controller.signal.reason;
      return reason instanceof PipelineTimeoutError
        ? { stage, kind: 'deadline', message: reason.message }
        : { stage, kind: 'cancelled', message: errorMessage(reason) };
    }
    return { stage, kind: 'stage_error', message: errorMessage(error) };
  }

  /**
   * Выполняет одну стадию и сливает её обновление
   * @returns ok=false — зафиксирован failure, дальше только Response
   */
  private async runStage(name: StageName, state: RunState): Promise<{ state: RunState; ok: boolean }> {
    const stage = this.stages[name];
    const stageStartedAt = Date.now();
    const timing = () => {
      const finishedAt = Date.now();
      return { stage: name, startedAt: stageStartedAt, finishedAt, durationMs: finishedAt - stageStartedAt };
    };
    this.emitProgress(name, 'started', STAGE_MESSAGES[name]);

    try {
      if (this.controller.signal.aborted) {
        throw this.controller.signal.reason;
      }

      const pending = stage.run(state, this.context());
      const update: RunStateUpdate = stage.settlesOnAbort
        ? await pending
        : await raceWithSignal(pending, this.controller.signal);

      const next = mergeRunState(state, {
        ...update,
        stageTimings: [...(update.stageTimings ?? []), timing()],
      });

      // Стадия вернула частичный результат после дедлайна или abort()
      if (stage.settlesOnAbort && this.controller.signal.aborted) {
        return { state: this.failStage(name, next, this.controller.signal.reason), ok: false };
      }

      this.emitProgress(name, 'completed', `${STAGE_MESSAGES[name]}: done`);
      return { state: next, ok: true };
    } catch (error) {
      return {
        state: this.failStage(name, mergeRunState(state, { stageTimings: [timing()] }), error),
        ok: false,
      };
    }
  }

  private failStage(name: StageName, state: RunState, error: unknown): RunState {
    const failure = this.toFailure(name, error);

    this.log.error('Pipeline stage failed', {
      stage: name,
      kind: failure.kind,
      error: failure.message,
    });

    const next = mergeRunState(state, {
      failure,
      reasoningSteps: [`${name}: failed (${failure.kind}) - ${failure.message}`],
    });

    this.emitProgress(name, 'failed', failure.message);
    return next;
  }

  /**
   * Response выполняется вне гонки с сигналом: ответ нужен и после дедлайна
   */
  private async runResponse(state: RunState): Promise<RunState> {
    const stageStartedAt = Date.now();
    this.emitProgress('response', 'started', STAGE_MESSAGES.response);

    let next: RunState;
    try {
      const update = await this.stages.response.run(state, this.context());
      next = mergeRunState(state, update);
      if (!next.output?.responseText) {
        throw new Error('Response stage produced no output');
      }
    } catch (error) {
      this.log.error('Response stage failed, using generic output', { error: errorMessage(error) });
      next = mergeRunState(state, {
        output: genericFailureOutput(state),
        failure: state.failure ?? { stage: 'response', kind: 'stage_error', message: errorMessage(error) },
        reasoningSteps: ['response: failed, generic output used'],
      });
    }

    const finishedAt = Date.now();
    next = mergeRunState(next, {
      stageTimings: [{ stage: 'response', startedAt: stageStartedAt, finishedAt, durationMs: finishedAt - stageStartedAt }],
      totalElapsedMs: finishedAt - this.startedAt,
    });

    this.emitProgress('response', 'completed', `${STAGE_MESSAGES.response}: done`);
    return next;
  }

  /**
   * Прогоняет seed-состояние через граф
   * @param deadlineMs - Дедлайн run'а (по умолчанию pipelineTimeoutMs)
   * @returns Итоговый RunState, всегда с output
   */
  async run(seed: RunState, deadlineMs?: number): Promise<RunState> {
    const timeoutMs = deadlineMs ?? this.settings.pipelineTimeoutMs;
    this.startedAt = Date.now();

    const timer = setTimeout(() => {
      if (!this.controller.signal.aborted) {
        this.log.warn('Pipeline deadline exceeded', { timeout_ms: timeoutMs });
        this.controller.abort(new PipelineTimeoutError(timeoutMs));
      }
    }, timeoutMs);

    let state = seed;
    try {
      let current: StageName | null = 'routing';
      while (current && current !== 'response') {
        const outcome = await this.runStage(current, state);
        state = outcome.state;
        current = outcome.ok ? nextStage(current, state) : 'response';
      }

      return await this.runResponse(state);
    } catch (error) {
      // Сюда попадают только ошибки самого executor'а (например, из обработчика событий)
      this.log.error('Pipeline executor failed', { error: errorMessage(error) });
      return {
        ...state,
        output: state.output ?? genericFailureOutput(state),
        failure: state.failure ?? { stage: 'response', kind: 'stage_error', message: errorMessage(error) },
        totalElapsedMs: Date.now() - this.startedAt,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Полный запуск для request handler
   */
  async execute(request: ExecuteRequest): Promise<PublicResult> {
    const seed = createRunState({
      query: request.query,
      userId: request.userId,
      sessionId: request.sessionId,
      requestId: this.requestId,
      runId: this.runId,
      conversationHistory: request.conversationHistory,
    });

    this.log.info('Starting pipeline run', {
      user_id: request.userId,
      session_id: request.sessionId,
      query_length: request.query.length,
    });

    const state = await this.run(seed, request.deadlineMs);
    const result = toPublicResult(state);

    this.log.info('Pipeline run completed', {
      termination_path: result.metadata.terminationPath,
      severity: result.metadata.severity,
      confidence: result.confidence,
      specialists: result.metadata.specialistsInvoked,
      failed: result.metadata.failedSpecialists,
      duration_ms: result.metadata.totalElapsedMs,
    });

    this.emitEvent({ type: 'complete', result });

    // Fire-and-forget
    saveRunStats({
      timestamp: new Date().toISOString(),
      requestId: this.requestId,
      runId: this.runId,
      terminationPath: result.metadata.terminationPath,
      severity: result.metadata.severity,
      specialistsInvoked: result.metadata.specialistsInvoked.length,
      failedSpecialists: result.metadata.failedSpecialists.length,
      recommendationCount: result.metadata.recommendationCount,
      confidence: result.confidence,
      failureKind: state.failure?.kind ?? null,
      durationMs: result.metadata.totalElapsedMs,
      stageDurations: result.metadata.stageTimings,
    }).catch(error => this.log.warn('Failed to save run stats', { error: errorMessage(error) }));

    return result;
  }
}

export default PipelineExecutor;
