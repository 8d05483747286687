/**
 * @file src/services/pipeline/invocation.ts
 * @description Stage 3: Invocation — параллельный вызов одобренных специалистов
 * @context Каждый вызов идёт под своим таймаутом (AbortController, вложенный в сигнал run'а).
 *          Барьер Promise.allSettled: каждый id попадает ровно в одну из карт
 *          outcomes / specialistErrors. Ошибка одного специалиста не влияет на остальных.
 *          При дедлайне или abort() уже полученные ответы сохраняются, незавершённые
 *          вызовы попадают в specialistErrors с кодом cancelled.
 * @dependencies services/specialists/registry.ts
 * @affects Diagnosis, Recommendation (metadata), Response (provenance)
 */

import { SpecialistRegistry, SpecialistRequest } from '../specialists/registry';
import { SpecialistTimeoutError } from '../../types/errors';
import {
  SpecialistFailure,
  SpecialistFailureCode,
  SpecialistOutcome,
} from '../../types/pipeline';
import { errorMessage, raceWithSignal } from '../../utils/helpers';
import { RequestLogger } from '../../utils/logger';
import { Stage } from './stage';

export interface InvocationResult {
  outcomes: Record<string, SpecialistOutcome>;
  specialistErrors: Record<string, SpecialistFailure>;
  toolsUsed: string[];
}

export interface InvocationOptions {
  registry: SpecialistRegistry;
  request: SpecialistRequest;
  signal: AbortSignal;
  timeoutMs: number;
  log?: RequestLogger;
}

class InvocationFailure extends Error {
  constructor(
    public readonly code: SpecialistFailureCode,
    message: string,
    public readonly durationMs: number
  ) {
    super(message);
  }
}

/**
 * Вызывает одного специалиста с собственным таймаутом
 */
async function invokeSpecialist(
  id: string,
  options: InvocationOptions
): Promise<SpecialistOutcome> {
  const startTime = Date.now();
  const specialist = options.registry.get(id);

  if (!specialist) {
    throw new InvocationFailure('not_registered', `Specialist "${id}" is not registered`, 0);
  }

  const runSignal = options.signal;
  if (runSignal.aborted) {
    throw new InvocationFailure('cancelled', 'Run cancelled before invocation', 0);
  }

  const controller = new AbortController();
  const onRunAbort = () => controller.abort(runSignal.reason);
  runSignal.addEventListener('abort', onRunAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new SpecialistTimeoutError(id, options.timeoutMs)),
    options.timeoutMs
  );

  try {
    return await raceWithSignal(
      specialist.handle(options.request, controller.signal),
      controller.signal
    );
  } catch (error) {
    const durationMs = Date.now() - startTime;

    if (controller.signal.reason instanceof SpecialistTimeoutError) {
      throw new InvocationFailure('timeout', controller.signal.reason.message, durationMs);
    }
    if (runSignal.aborted) {
      throw new InvocationFailure('cancelled', 'Run cancelled during invocation', durationMs);
    }
    throw new InvocationFailure('specialist_error', errorMessage(error), durationMs);
  } finally {
    clearTimeout(timer);
    runSignal.removeEventListener('abort', onRunAbort);
  }
}

/**
 * Параллельно вызывает одобренных специалистов
 * @param approved - Одобренные Gate id (порядок сохраняется)
 */
export async function invokeSpecialists(
  approved: string[],
  options: InvocationOptions
): Promise<InvocationResult> {
  const settled = await Promise.allSettled(
    approved.map(id => invokeSpecialist(id, options))
  );

  const outcomes: Record<string, SpecialistOutcome> = {};
  const specialistErrors: Record<string, SpecialistFailure> = {};
  const toolsUsed: string[] = [];

  settled.forEach((result, index) => {
    const id = approved[index];

    if (result.status === 'fulfilled') {
      outcomes[id] = result.value;
      for (const tool of result.value.toolsUsed) {
        if (!toolsUsed.includes(tool)) {
          toolsUsed.push(tool);
        }
      }
      options.log?.info('Specialist completed', {
        specialist: id,
        confidence: result.value.confidence,
        tools: result.value.toolsUsed.length,
      });
      return;
    }

    const failure: SpecialistFailure = result.reason instanceof InvocationFailure
      ? { code: result.reason.code, message: result.reason.message, durationMs: result.reason.durationMs }
      : { code: 'specialist_error', message: errorMessage(result.reason), durationMs: 0 };

    specialistErrors[id] = failure;
    options.log?.warn('Specialist failed', { specialist: id, code: failure.code, error: failure.message });
  });

  return { outcomes, specialistErrors, toolsUsed };
}

export const invocationStage: Stage = {
  name: 'invocation',
  // Вызовы привязаны к сигналу run'а, барьер allSettled отпускает сразу после abort
  settlesOnAbort: true,
  async run(state, ctx) {
    if (!state.gate?.approved) {
      throw new Error('Invocation requires an approved gate result');
    }

    const approved = state.gate.approvedSpecialists;
    const result = await invokeSpecialists(approved, {
      registry: ctx.registry,
      request: {
        query: state.query,
        sessionId: state.sessionId,
        userId: state.userId,
        requestId: ctx.requestId,
      },
      signal: ctx.signal,
      timeoutMs: ctx.settings.specialistTimeoutMs,
      log: ctx.log,
    });

    const succeeded = Object.keys(result.outcomes).length;

    return {
      outcomes: result.outcomes,
      specialistErrors: result.specialistErrors,
      toolsUsed: result.toolsUsed,
      reasoningSteps: [
        `Invocation: ${succeeded}/${approved.length} specialists succeeded`,
      ],
    };
  },
};
