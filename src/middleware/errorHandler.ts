/**
 * @file src/middleware/errorHandler.ts
 * @description Централизованная обработка ошибок и 404
 * @context Используется как последний middleware в Express
 */

import { Request, Response, NextFunction } from 'express';
import { AppError } from '../types/errors';
import { ApiResponse } from '../types/api';
import { logger } from '../utils/logger';
import { getRequestId } from './requestLogger';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = getRequestId(req);

  // Определяем статус и сообщение
  let statusCode = 500;
  let errorCode = 'INTERNAL_ERROR';
  let message = 'Internal server error';

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    errorCode = err.errorCode;
    message = err.message;
  } else if (err.name === 'SyntaxError') {
    statusCode = 400;
    errorCode = 'INVALID_JSON';
    message = 'Invalid JSON in request body';
  }

  // 4xx — ожидаемые ошибки клиента, без stack
  if (statusCode >= 500) {
    logger.error('Request error', {
      request_id: requestId,
      path: req.path,
      method: req.method,
      error: err.message,
      stack: err.stack,
    });
  } else {
    logger.warn('Request rejected', {
      request_id: requestId,
      path: req.path,
      method: req.method,
      error_code: errorCode,
      error: err.message,
    });
  }

  const body: ApiResponse = {
    status: 'error',
    error_code: errorCode,
    message,
    request_id: requestId,
  };
  res.status(statusCode).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  const body: ApiResponse = {
    status: 'error',
    error_code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
    request_id: getRequestId(req),
  };
  res.status(404).json(body);
}

export default errorHandler;
