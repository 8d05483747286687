/**
 * @file test/statsCollector.test.ts
 * @description Тесты сбора статистики run'ов в JSONL
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { RunStats, saveRunStats, statsFileName } from '../src/utils/statsCollector';

const STATS: RunStats = {
  timestamp: '2026-01-15T10:00:00.000Z',
  requestId: 'req-1',
  runId: 'run-1',
  terminationPath: 'full_pipeline',
  severity: 'high',
  specialistsInvoked: 3,
  failedSpecialists: 1,
  recommendationCount: 2,
  confidence: 0.7,
  failureKind: null,
  durationMs: 1234,
  stageDurations: { routing: 200, response: 3 },
};

describe('statsCollector', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'run-stats-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should name files by UTC date', () => {
    expect(statsFileName(new Date('2026-01-15T23:30:00.000Z'))).toBe('stats-2026-01-15.jsonl');
  });

  it('should append one JSON line per run', async () => {
    await saveRunStats(STATS, { dir, enabled: true });
    await saveRunStats({ ...STATS, runId: 'run-2' }, { dir, enabled: true });

    const lines = fs.readFileSync(path.join(dir, 'stats-2026-01-15.jsonl'), 'utf-8').trim().split('\n');

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(STATS);
    expect(JSON.parse(lines[1]).runId).toBe('run-2');
  });

  it('should create a missing directory', async () => {
    const nested = path.join(dir, 'nested', 'stats');

    await saveRunStats(STATS, { dir: nested, enabled: true });

    expect(fs.existsSync(path.join(nested, 'stats-2026-01-15.jsonl'))).toBe(true);
  });

  it('should write nothing when disabled', async () => {
    await saveRunStats(STATS, { dir, enabled: false });
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
