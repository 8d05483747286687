/**
 * @file src/services/openai.ts
 * @description Reasoning capability: клиент для OpenAI Responses API
 * @context Используется стадиями routing, diagnosis, recommendation через интерфейс
 *          ReasoningCapability. Ошибки пробрасываются: fallback — ответственность стадии.
 * @dependencies config/index.ts, utils/helpers.ts, utils/logger.ts
 * @affects pipeline/routing.ts, pipeline/diagnosis.ts, pipeline/recommendation.ts
 */

import config from '../config';
import { AIProviderError } from '../types/errors';
import { logger, logAiCall } from '../utils/logger';
import { retry } from '../utils/helpers';

// ============================================
// Контракт reasoning capability
// ============================================

export interface CompletionOptions {
  instructions?: string;
  temperature?: number;
  maxTokens?: number;
  requestId?: string;
  signal?: AbortSignal;
}

export interface ReasoningCapability {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

// ============================================
// Интерфейсы OpenAI Responses API
// ============================================

interface OpenAIResponsesRequest {
  model: string;
  instructions?: string;
  input: string;
  max_output_tokens?: number;
  temperature?: number;
}

interface OpenAIResponsesResponse {
  id: string;
  output?: Array<{
    type: string;
    role?: string;
    content?: Array<{
      type: string;
      text?: string;
    }>;
  }>;
  usage?: {
    input_tokens: number;
    output_tokens: number;
    total_tokens: number;
  };
}

// ============================================
// OpenAIReasoningService
// ============================================

export class OpenAIReasoningService implements ReasoningCapability {
  private apiKey: string;
  private baseUrl: string;
  private model: string;

  constructor(options: { apiKey?: string; baseUrl?: string; model?: string } = {}) {
    this.apiKey = options.apiKey ?? config.openaiApiKey;
    this.baseUrl = options.baseUrl ?? config.openaiBaseUrl;
    this.model = options.model ?? config.openaiModelReasoning;
  }

  /**
   * Отправляет запрос к OpenAI Responses API и получает текстовый ответ
   * @param prompt - Входной текст (input)
   * @returns Текст ответа (может быть пустым — вызывающая стадия обязана это обработать)
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const {
      instructions,
      temperature = 0.1,
      maxTokens = 1000,
      requestId,
      signal,
    } = options;

    if (!this.apiKey) {
      throw new AIProviderError('openai', 'OPENAI_API_KEY is not configured');
    }

    const requestBody: OpenAIResponsesRequest = {
      model: this.model,
      input: prompt,
      temperature,
      max_output_tokens: maxTokens,
    };

    if (instructions) {
      requestBody.instructions = instructions;
    }

    const startTime = Date.now();

    try {
      const response = await retry(
        async () => {
          const res = await fetch(`${this.baseUrl}/responses`, {
            method: 'POST',
            headers: {
              'Authorization': `Bearer ${this.apiKey}`,
              'Content-Type': 'application/json',
            },
            body: JSON.stringify(requestBody),
            signal,
          });

          if (!res.ok) {
            const errorText = await res.text();
            throw new AIProviderError('openai', `HTTP ${res.status}: ${errorText}`, res.status);
          }

          return res.json() as Promise<OpenAIResponsesResponse>;
        },
        {
          maxRetries: 2,
          baseDelay: 1000,
          signal,
          shouldRetry: (error) => {
            if (error instanceof AIProviderError && error.httpStatus !== undefined) {
              return error.httpStatus === 429 || error.httpStatus >= 500;
            }
            return !signal?.aborted;
          },
        }
      );

      const content = this.extractOutputText(response);

      logAiCall(requestId || 'unknown', 'openai', this.model, 'complete', {
        prompt_length: prompt.length,
        response_length: content.length,
        duration_ms: Date.now() - startTime,
        tokens: response.usage,
      });

      return content;
    } catch (error) {
      logger.error('OpenAI complete failed', {
        request_id: requestId,
        model: this.model,
        error: error instanceof Error ? error.message : 'Unknown error',
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }

  /**
   * Извлекает текст из Responses API response
   */
  private extractOutputText(response: OpenAIResponsesResponse): string {
    if (!response.output || response.output.length === 0) return '';

    for (const output of response.output) {
      if (output.type === 'message' && output.content) {
        for (const block of output.content) {
          if (block.type === 'output_text' && block.text) {
            return block.text;
          }
        }
      }
    }

    return '';
  }
}

// ============================================
// Синглтон
// ============================================

let reasoningServiceInstance: OpenAIReasoningService | null = null;

export function getReasoningService(): OpenAIReasoningService {
  if (!reasoningServiceInstance) {
    reasoningServiceInstance = new OpenAIReasoningService();
  }
  return reasoningServiceInstance;
}

export default OpenAIReasoningService;
