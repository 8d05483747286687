/**
 * @file src/routes/chat.ts
 * @description Chat API endpoints
 * @context POST /api/chat — синхронный ответ, POST /api/chat/stream — SSE с progress-событиями стадий.
 *          Сессия создаётся автоматически, если session_id не передан.
 *          История сессии передаётся в routing как контекст разговора.
 * @dependencies services/pipeline/executor.ts, storage/conversations.ts
 */

import { Router, Request, Response, NextFunction } from 'express';
import { PipelineExecutor, PipelineDependencies } from '../services/pipeline';
import { ConversationStore, MessageRecord, SessionRecord } from '../storage/conversations';
import { NotFoundError, ValidationError } from '../types/errors';
import {
  ChatRequest,
  ChatResponse,
  ChatStreamEvent,
  CreateSessionRequest,
  HistoryMessage,
  MessageHistoryResponse,
  SessionInfo,
} from '../types/api';
import { PipelineEvent, PublicResult } from '../types/pipeline';
import { getRequestId } from '../middleware/requestLogger';
import { errorMessage } from '../utils/helpers';
import { logger } from '../utils/logger';

export const AGENT_NAME = 'orchestrator';

const MAX_MESSAGE_LENGTH = 10000;
const MAX_USER_ID_LENGTH = 255;
const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 500;
const KEEPALIVE_INTERVAL_MS = 15000;

export interface ChatRouterDependencies extends PipelineDependencies {
  store: ConversationStore;
  /** Сколько сообщений истории передавать в routing */
  historyMessages: number;
}

// ============================================
// Валидация
// ============================================

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalRecord(value: unknown, field: string): Record<string, unknown> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isPlainObject(value)) {
    throw new ValidationError(`${field} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function requireUserId(value: unknown): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError('user_id is required');
  }
  if (value.length > MAX_USER_ID_LENGTH) {
    throw new ValidationError(`user_id must be at most ${MAX_USER_ID_LENGTH} characters`);
  }
  return value.trim();
}

/**
 * Проверяет тело запроса чата
 * @throws ValidationError
 */
export function parseChatRequest(body: unknown): ChatRequest {
  if (!isPlainObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const data: Record<string, unknown> = Object.fromEntries(Object.entries(body));

  if (typeof data.message !== 'string' || !data.message.trim()) {
    throw new ValidationError('message is required');
  }
  if (data.message.length > MAX_MESSAGE_LENGTH) {
    throw new ValidationError(`message must be at most ${MAX_MESSAGE_LENGTH} characters`);
  }

  if (data.session_id !== undefined && data.session_id !== null && typeof data.session_id !== 'string') {
    throw new ValidationError('session_id must be a string');
  }

  return {
    message: data.message.trim(),
    user_id: requireUserId(data.user_id),
    session_id: typeof data.session_id === 'string' && data.session_id ? data.session_id : undefined,
    context: optionalRecord(data.context, 'context'),
  };
}

export function parseCreateSessionRequest(body: unknown): CreateSessionRequest {
  if (!isPlainObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const data: Record<string, unknown> = Object.fromEntries(Object.entries(body));
  return {
    user_id: requireUserId(data.user_id),
    metadata: optionalRecord(data.metadata, 'metadata'),
  };
}

export function parseHistoryLimit(value: unknown): number {
  if (typeof value !== 'string' || !value) return DEFAULT_HISTORY_LIMIT;
  const limit = parseInt(value, 10);
  if (Number.isNaN(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return Math.min(limit, MAX_HISTORY_LIMIT);
}

// ============================================
// Маппинг
// ============================================

export function toChatResponse(
  result: PublicResult,
  sessionId: string,
  executionTimeMs: number
): ChatResponse {
  const { reasoning, toolsUsed, ...metadata } = result.metadata;
  return {
    response: result.response,
    session_id: sessionId,
    agent_name: AGENT_NAME,
    reasoning: reasoning.join('\n'),
    tools_used: toolsUsed,
    confidence: result.confidence,
    metadata: { ...metadata, run_id: result.runId, provenance: result.provenance },
    execution_time_ms: executionTimeMs,
  };
}

function toSessionInfo(session: SessionRecord, messageCount: number): SessionInfo {
  return {
    session_id: session.id,
    user_id: session.userId,
    metadata: session.metadata,
    created_at: session.createdAt,
    updated_at: session.updatedAt,
    message_count: messageCount,
  };
}

function toHistoryMessage(message: MessageRecord): HistoryMessage {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    agent_name: message.agentName,
    timestamp: message.createdAt,
    metadata: message.metadata,
  };
}

// ============================================
// Router
// ============================================

export function createChatRouter(deps: ChatRouterDependencies): Router {
  const router = Router();
  const { store } = deps;

  /**
   * Находит или создаёт сессию, сохраняет сообщение пользователя
   * @returns session id и история разговора до текущего сообщения
   */
  function openTurn(request: ChatRequest) {
    let sessionId: string;
    if (request.session_id) {
      const session = store.getSession(request.session_id);
      if (!session) {
        throw new NotFoundError(`Session ${request.session_id}`);
      }
      sessionId = session.id;
    } else {
      sessionId = store.createSession(request.user_id, request.context).id;
    }

    const history = store.getRecentHistory(sessionId, deps.historyMessages);
    store.addMessage({ sessionId, role: 'user', content: request.message });

    return { sessionId, history };
  }

  function closeTurn(result: PublicResult, sessionId: string, executionTimeMs: number): ChatResponse {
    store.addMessage({
      sessionId,
      role: 'assistant',
      content: result.response,
      agentName: AGENT_NAME,
      metadata: {
        confidence: result.confidence,
        execution_time_ms: executionTimeMs,
        termination_path: result.metadata.terminationPath,
      },
    });
    return toChatResponse(result, sessionId, executionTimeMs);
  }

  /**
   * POST /api/chat
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const startTime = Date.now();
      const requestId = getRequestId(req);
      const request = parseChatRequest(req.body);
      const { sessionId, history } = openTurn(request);

      const executor = new PipelineExecutor(deps, requestId);
      const result = await executor.execute({
        query: request.message,
        userId: request.user_id,
        sessionId,
        conversationHistory: history,
      });

      const response = closeTurn(result, sessionId, Date.now() - startTime);

      logger.info('Chat request processed', {
        request_id: requestId,
        session_id: sessionId,
        user_id: request.user_id,
        execution_time_ms: response.execution_time_ms,
      });

      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/chat/stream
   * SSE: progress-события стадий, затем complete или error
   */
  router.post('/stream', async (req: Request, res: Response, next: NextFunction) => {
    let request: ChatRequest;
    let turn: ReturnType<typeof openTurn>;
    const startTime = Date.now();
    const requestId = getRequestId(req);

    try {
      request = parseChatRequest(req.body);
      turn = openTurn(request);
    } catch (error) {
      next(error);
      return;
    }

    // Устанавливаем SSE headers
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    const send = (event: ChatStreamEvent) => {
      if (!res.writableEnded) {
        res.write(`data: ${JSON.stringify(event)}\n\n`);
      }
    };

    const executor = new PipelineExecutor(deps, requestId);
    executor.on('event', (event: PipelineEvent) => {
      if (event.type === 'progress') {
        send(event);
      }
    });

    // Клиент отключился — отменяем run
    res.on('close', () => {
      if (!res.writableEnded) {
        logger.info('Stream client disconnected, aborting run', { request_id: requestId });
        executor.abort();
      }
    });

    const keepalive = setInterval(() => {
      if (!res.writableEnded) res.write(': keepalive\n\n');
    }, KEEPALIVE_INTERVAL_MS);

    try {
      const result = await executor.execute({
        query: request.message,
        userId: request.user_id,
        sessionId: turn.sessionId,
        conversationHistory: turn.history,
      });

      if (executor.aborted && res.writableEnded) {
        return;
      }

      const response = closeTurn(result, turn.sessionId, Date.now() - startTime);
      send({ type: 'complete', data: response });

      logger.info('Streaming chat request completed', {
        request_id: requestId,
        session_id: turn.sessionId,
        execution_time_ms: response.execution_time_ms,
      });
    } catch (error) {
      logger.error('Streaming chat request failed', { request_id: requestId, error: errorMessage(error) });
      send({ type: 'error', error_code: 'CHAT_FAILED', message: `Failed to process message: ${errorMessage(error)}` });
    } finally {
      clearInterval(keepalive);
      if (!res.writableEnded) res.end();
    }
  });

  /**
   * POST /api/chat/sessions
   */
  router.post('/sessions', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseCreateSessionRequest(req.body);
      const session = store.createSession(body.user_id, body.metadata);
      res.status(201).json(toSessionInfo(session, 0));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/chat/sessions/:id
   */
  router.get('/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = store.getSession(req.params.id);
      if (!session) {
        throw new NotFoundError(`Session ${req.params.id}`);
      }
      res.json(toSessionInfo(session, store.countMessages(session.id)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/chat/sessions/:id/messages?limit=
   */
  router.get('/sessions/:id/messages', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = store.getSession(req.params.id);
      if (!session) {
        throw new NotFoundError(`Session ${req.params.id}`);
      }

      const limit = parseHistoryLimit(req.query.limit);
      const body: MessageHistoryResponse = {
        session_id: session.id,
        messages: store.getMessages(session.id, limit).map(toHistoryMessage),
        total_count: store.countMessages(session.id),
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export default createChatRouter;
