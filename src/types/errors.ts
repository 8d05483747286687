/**
 * @file src/types/errors.ts
 * @description Кастомные ошибки сервиса
 * @context Используется для структурированной обработки ошибок
 */

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    errorCode: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class AIProviderError extends AppError {
  public readonly provider: string;
  public readonly providerError: string;
  public readonly httpStatus?: number;

  constructor(provider: string, error: string, httpStatus?: number) {
    super(`AI Provider error (${provider}): ${error}`, 502, 'AI_PROVIDER_ERROR');
    this.provider = provider;
    this.providerError = error;
    this.httpStatus = httpStatus;
  }
}

export class SpecialistError extends AppError {
  public readonly specialistId: string;

  constructor(specialistId: string, error: string) {
    super(`Specialist ${specialistId} failed: ${error}`, 502, 'SPECIALIST_ERROR');
    this.specialistId = specialistId;
  }
}

export class SpecialistTimeoutError extends AppError {
  public readonly specialistId: string;
  public readonly timeoutMs: number;

  constructor(specialistId: string, timeoutMs: number) {
    super(`Specialist ${specialistId} timed out after ${timeoutMs}ms`, 504, 'SPECIALIST_TIMEOUT');
    this.specialistId = specialistId;
    this.timeoutMs = timeoutMs;
  }
}

export class PipelineTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super(`Pipeline deadline of ${timeoutMs}ms exceeded`, 408, 'PIPELINE_TIMEOUT');
  }
}

export class PipelineCancelledError extends AppError {
  constructor() {
    super('Pipeline run was cancelled', 400, 'PIPELINE_CANCELLED');
  }
}

/**
 * Нарушение контракта RunState (перезапись write-once поля и т.п.).
 * Единственный вид ошибки, который останавливает run целиком.
 */
export class StateInvariantError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, 500, 'STATE_INVARIANT_VIOLATION', false);
    this.field = field;
  }
}
