/**
 * @file src/middleware/index.ts
 * @description Экспорт middleware
 */

export { errorHandler, notFoundHandler } from './errorHandler';
export { requestLogger, getRequestId } from './requestLogger';
