/**
 * @file src/utils/statsCollector.ts
 * @description Автосбор статистики run'ов для калибровки порогов (routing, early exit, таймауты)
 * @context Каждый завершённый run сохраняет метрики в JSONL-файл на volume (один файл в день).
 *          Fire-and-forget: ошибки сбора статистики НЕ влияют на pipeline.
 *          initStatsDir() вызывается при старте приложения для создания директории.
 * @dependencies config/index.ts, utils/logger.ts
 * @affects data/stats/ (volume)
 */

import fs from 'fs/promises';
import path from 'path';
import config from '../config';
import { logger } from './logger';
import { Severity, TerminationPath } from '../types/pipeline';

// ============================================
// Интерфейс статистики
// ============================================

export interface RunStats {
  timestamp: string;
  requestId: string;
  runId: string;
  terminationPath: TerminationPath;
  severity: Severity | null;
  specialistsInvoked: number;
  failedSpecialists: number;
  recommendationCount: number;
  confidence: number;
  failureKind: string | null;
  durationMs: number;
  stageDurations: Record<string, number>;
}

export interface StatsOptions {
  /** Директория статистики (по умолчанию <dataPath>/stats) */
  dir?: string;
  enabled?: boolean;
}

const DEFAULT_STATS_DIR = path.join(config.dataPath, 'stats');

/** Директории, созданные в этом процессе */
const readyDirs = new Set<string>();

// ============================================
// Инициализация
// ============================================

/**
 * Создаёт директорию статистики при запуске приложения
 * @sideEffects Создаёт директорию data/stats/ на volume
 */
export async function initStatsDir(options: StatsOptions = {}): Promise<void> {
  const enabled = options.enabled ?? config.statsCollectionEnabled;
  const dir = options.dir ?? DEFAULT_STATS_DIR;

  if (!enabled) {
    logger.info('Stats collection is disabled via config');
    return;
  }

  try {
    await fs.mkdir(dir, { recursive: true });
    readyDirs.add(dir);
    logger.info('Stats directory initialized', { stats_dir: dir });
  } catch (error) {
    logger.error('Failed to initialize stats directory', {
      stats_dir: dir,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Имя файла статистики за дату
 */
export function statsFileName(date: Date = new Date()): string {
  return `stats-${date.toISOString().slice(0, 10)}.jsonl`;
}

// ============================================
// Публичный API
// ============================================

/**
 * Дописывает статистику завершённого run'а в JSONL-файл
 * @sideEffects Пишет файл на диск (volume)
 */
export async function saveRunStats(stats: RunStats, options: StatsOptions = {}): Promise<void> {
  const enabled = options.enabled ?? config.statsCollectionEnabled;
  if (!enabled) return;

  const dir = options.dir ?? DEFAULT_STATS_DIR;

  try {
    // Если директория не была создана при старте — пробуем создать сейчас
    if (!readyDirs.has(dir)) {
      await fs.mkdir(dir, { recursive: true });
      readyDirs.add(dir);
    }

    const filename = statsFileName(new Date(stats.timestamp));
    await fs.appendFile(path.join(dir, filename), JSON.stringify(stats) + '\n', 'utf-8');

    logger.debug('Run stats saved', {
      request_id: stats.requestId,
      termination_path: stats.terminationPath,
      file: filename,
    });
  } catch (error) {
    // Не падаем при ошибке сбора статистики, но логируем
    logger.error('Failed to save run stats', {
      request_id: stats.requestId,
      error: error instanceof Error ? error.message : String(error),
      stats_dir: dir,
    });
    // При следующей записи пробуем создать директорию заново
    readyDirs.delete(dir);
  }
}
