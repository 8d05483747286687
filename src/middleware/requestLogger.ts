/**
 * @file src/middleware/requestLogger.ts
 * @description Логирование входящих запросов с request_id
 * @context Добавляет request_id к каждому запросу (заголовок X-Request-Id в запросе и ответе)
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * request_id текущего запроса (выставляется requestLogger)
 */
export function getRequestId(req: Request): string {
  const header = req.headers[REQUEST_ID_HEADER];
  return typeof header === 'string' && header ? header : 'unknown';
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER];
  const requestId = typeof incoming === 'string' && incoming ? incoming : uuidv4();
  const startTime = Date.now();

  // Добавляем request_id к запросу и ответу
  req.headers[REQUEST_ID_HEADER] = requestId;
  res.setHeader('X-Request-Id', requestId);

  // Логируем входящий запрос
  logger.info('Incoming request', {
    request_id: requestId,
    method: req.method,
    path: req.path,
    query: req.query,
    user_agent: req.headers['user-agent'],
  });

  // Логируем ответ
  res.on('finish', () => {
    const duration = Date.now() - startTime;

    logger.info('Request completed', {
      request_id: requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: duration,
    });
  });

  next();
}

export default requestLogger;
