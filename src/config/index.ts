/**
 * @file src/config/index.ts
 * @description Конфигурация сервиса Campaign Analyst
 * @context Используется всеми компонентами для доступа к настройкам
 */

import dotenv from 'dotenv';
import path from 'path';

// Загружаем .env файл
dotenv.config();

function parseList(value: string | undefined, fallback: string): string[] {
  return (value || fallback)
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

export const config = {
  // Service
  service: {
    id: process.env.SERVICE_ID || 'campaign-analyst',
    version: process.env.SERVICE_VERSION || '1.0.0',
    name: process.env.SERVICE_NAME || 'Campaign Analyst',
  },
  port: parseInt(process.env.PORT || '3010', 10),
  env: process.env.NODE_ENV || 'development',
  isDev: process.env.NODE_ENV !== 'production',
  isTest: process.env.NODE_ENV === 'test',

  // CORS
  cors: {
    origins: parseList(process.env.CORS_ORIGINS, '*'),
  },

  // Reasoning capability (OpenAI Responses API)
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  openaiBaseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
  openaiModelReasoning: process.env.OPENAI_MODEL_REASONING || 'gpt-4.1-mini',

  // Specialists
  specialistsBaseUrl: process.env.SPECIALISTS_BASE_URL || 'http://specialists:8000',
  specialistsApiKey: process.env.SPECIALISTS_API_KEY || '',
  specialistsEnabled: parseList(
    process.env.SPECIALISTS_ENABLED,
    'performance,budget,delivery,audience,creative'
  ),

  // Pipeline timeouts
  pipelineTimeoutMs: parseInt(process.env.PIPELINE_TIMEOUT_MS || '60000', 10),
  specialistTimeoutMs: parseInt(process.env.SPECIALIST_TIMEOUT_MS || '30000', 10),

  // Routing
  routingClarificationThreshold: parseFloat(process.env.ROUTING_CLARIFICATION_THRESHOLD || '0.3'),
  routingFallbackConfidence: parseFloat(process.env.ROUTING_FALLBACK_CONFIDENCE || '0.6'),
  routingHistoryMessages: parseInt(process.env.ROUTING_HISTORY_MESSAGES || '6', 10),

  // Gate
  gateMinQueryWords: parseInt(process.env.GATE_MIN_QUERY_WORDS || '3', 10),
  gateShortQueryMinConfidence: parseFloat(process.env.GATE_SHORT_QUERY_MIN_CONFIDENCE || '0.6'),
  gateLowConfidenceWarning: parseFloat(process.env.GATE_LOW_CONFIDENCE_WARNING || '0.4'),
  gateMaxSpecialists: parseInt(process.env.GATE_MAX_SPECIALISTS || '3', 10),

  // Recommendation / Validation
  recommendationMaxItems: parseInt(process.env.RECOMMENDATION_MAX_ITEMS || '7', 10),
  recommendationFallbackConfidence: parseFloat(process.env.RECOMMENDATION_FALLBACK_CONFIDENCE || '0.6'),
  validationMaxRecommendations: parseInt(process.env.VALIDATION_MAX_RECOMMENDATIONS || '7', 10),

  // Response
  earlyExitConfidence: parseFloat(process.env.EARLY_EXIT_CONFIDENCE || '0.8'),
  defaultResponseConfidence: parseFloat(process.env.DEFAULT_RESPONSE_CONFIDENCE || '0.8'),

  // Storage
  dataPath: process.env.DATA_PATH || path.join(process.cwd(), 'data'),
  retentionDays: parseInt(process.env.RETENTION_DAYS || '30', 10),
  statsCollectionEnabled: process.env.STATS_COLLECTION_ENABLED
    ? process.env.STATS_COLLECTION_ENABLED === 'true'
    : process.env.NODE_ENV !== 'test',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',

  // Paths
  get logsPath() {
    return this.isDev ? path.join(process.cwd(), 'logs') : '/app/logs';
  },
  get databasePath() {
    return path.join(this.dataPath, 'database.sqlite');
  },
};

export type AppConfig = typeof config;

export default config;

// Re-export specialist catalogue and prompt builders
export * from './specialists';
export * from './prompts';
