/**
 * @file src/app.ts
 * @description Express приложение
 * @context Конфигурация Express, middleware, routes.
 *          Зависимости (реестр специалистов, reasoning, хранилище) передаются снаружи.
 */

import express, { Express } from 'express';
import cors from 'cors';
import { createHealthRouter, createChatRouter, ChatRouterDependencies } from './routes';
import { errorHandler, notFoundHandler, requestLogger } from './middleware';
import config from './config';

export function createApp(deps: ChatRouterDependencies): Express {
  const app = express();

  // Trust proxy для корректной работы за nginx
  app.set('trust proxy', 1);

  // CORS
  app.use(cors({
    origin: config.cors.origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    credentials: true,
  }));

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use(requestLogger);

  // API routes
  const healthRouter = createHealthRouter(deps.registry);
  app.use('/health', healthRouter);
  app.use('/api/health', healthRouter);
  app.use('/api/chat', createChatRouter(deps));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}

export default createApp;
