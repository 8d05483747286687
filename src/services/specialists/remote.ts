/**
 * @file src/services/specialists/remote.ts
 * @description HTTP-клиент специалиста: POST {baseUrl}/{id}/invoke
 * @context Каждый доменный специалист — отдельный сервис за общим шлюзом.
 *          Таймаут и отмену задаёт Invocation через AbortSignal.
 * @dependencies config/index.ts, config/specialists.ts
 */

import config from '../../config';
import { SpecialistDefinition } from '../../config/specialists';
import { SpecialistOutcome } from '../../types/pipeline';
import { SpecialistError } from '../../types/errors';
import { logger } from '../../utils/logger';
import { clamp } from '../../utils/helpers';
import { SpecialistCapability, SpecialistRequest } from './registry';

interface SpecialistInvokeRequest {
  message: string;
  session_id?: string;
  user_id: string;
}

interface SpecialistInvokeResponse {
  response?: unknown;
  confidence?: unknown;
  tools_used?: unknown;
  metadata?: unknown;
}

export class RemoteSpecialist implements SpecialistCapability {
  readonly id: string;
  readonly description: string;
  private baseUrl: string;
  private apiKey: string;

  constructor(
    definition: SpecialistDefinition,
    options: { baseUrl?: string; apiKey?: string } = {}
  ) {
    this.id = definition.id;
    this.description = definition.description;
    this.baseUrl = options.baseUrl ?? config.specialistsBaseUrl;
    this.apiKey = options.apiKey ?? config.specialistsApiKey;
  }

  async handle(request: SpecialistRequest, signal: AbortSignal): Promise<SpecialistOutcome> {
    const endpoint = `/${this.id}/invoke`;
    const startTime = Date.now();

    const body: SpecialistInvokeRequest = {
      message: request.query,
      session_id: request.sessionId,
      user_id: request.userId,
    };

    const response = await fetch(`${this.baseUrl}${endpoint}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Request-Id': request.requestId,
        ...(this.apiKey ? { 'X-Service-Api-Key': this.apiKey } : {}),
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error('Specialist API error', {
        request_id: request.requestId,
        specialist: this.id,
        status: response.status,
        error: errorText,
        duration_ms: Date.now() - startTime,
      });
      throw new SpecialistError(this.id, `HTTP ${response.status}: ${errorText}`);
    }

    const data: unknown = await response.json();
    const outcome = parseOutcome(this.id, data);

    logger.info('Specialist API call completed', {
      request_id: request.requestId,
      specialist: this.id,
      duration_ms: Date.now() - startTime,
      confidence: outcome.confidence,
    });

    return outcome;
  }
}

/**
 * Проверяет ответ специалиста: response обязателен, остальное — с дефолтами
 */
export function parseOutcome(specialistId: string, payload: unknown): SpecialistOutcome {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new SpecialistError(specialistId, 'response is not a JSON object');
  }
  const data: SpecialistInvokeResponse = Object.fromEntries(Object.entries(payload));

  if (typeof data.response !== 'string' || data.response.trim().length === 0) {
    throw new SpecialistError(specialistId, 'empty response text');
  }

  const toolsUsed = Array.isArray(data.tools_used)
    ? data.tools_used.filter((tool): tool is string => typeof tool === 'string')
    : [];

  const metadata = typeof data.metadata === 'object' && data.metadata !== null && !Array.isArray(data.metadata)
    ? Object.fromEntries(Object.entries(data.metadata))
    : undefined;

  return {
    response: data.response,
    confidence: typeof data.confidence === 'number' ? clamp(data.confidence) : 0.5,
    toolsUsed,
    metadata,
  };
}
