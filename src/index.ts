/**
 * @file src/index.ts
 * @description Точка входа приложения
 * @context Запуск сервера, инициализация БД, реестра специалистов и reasoning capability
 */

import { createApp } from './app';
import { initDatabase, closeDatabase } from './storage/database';
import { getConversationStore } from './storage/conversations';
import { createSpecialistRegistry } from './services/specialists';
import { getReasoningService } from './services/openai';
import { initStatsDir } from './utils/statsCollector';
import { errorMessage } from './utils/helpers';
import config from './config';
import { logger } from './utils/logger';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
  logger.info('Starting Campaign Analyst service', {
    service_id: config.service.id,
    version: config.service.version,
    environment: config.env,
  });

  // Инициализация базы данных
  try {
    initDatabase();
  } catch (error) {
    logger.error('Failed to initialize database', { error: errorMessage(error) });
    process.exit(1);
  }

  // Инициализация директории для статистики
  await initStatsDir();

  // Реестр специалистов замораживается до приёма запросов
  const registry = createSpecialistRegistry();
  const reasoning = getReasoningService();
  const store = getConversationStore();

  // Очистка старых разговоров (раз в час)
  const cleanupTimer = setInterval(() => {
    try {
      store.cleanup(config.retentionDays);
    } catch (error) {
      logger.warn('Failed to cleanup old data', { error: errorMessage(error) });
    }
  }, CLEANUP_INTERVAL_MS);

  // Создание и запуск приложения
  const app = createApp({
    registry,
    reasoning,
    store,
    historyMessages: config.routingHistoryMessages,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server started on port ${config.port}`, {
      port: config.port,
      specialists: registry.ids(),
      environment: config.env,
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    clearInterval(cleanupTimer);

    server.close(() => {
      closeDatabase();
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Unhandled rejections
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', {
      reason: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  // Uncaught exceptions
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', {
      error: error.message,
      stack: error.stack,
    });
    process.exit(1);
  });
}

main().catch((error) => {
  logger.error('Failed to start server', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
