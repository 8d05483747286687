/**
 * @file test/helpers.test.ts
 * @description Unit-тесты для utils/helpers
 */

import {
  containsPhrase,
  countWords,
  extractJsonFromText,
  raceWithSignal,
  retry,
  toStringList,
  truncate,
} from '../src/utils/helpers';

describe('helpers', () => {
  it('should match phrases on word boundaries', () => {
    expect(containsPhrase('Check the win rate today', 'win rate')).toBe(true);
    expect(containsPhrase('Check the winrate today', 'win rate')).toBe(false);
    expect(containsPhrase('CTR dropped', 'ctr')).toBe(true);
  });

  it('should count words', () => {
    expect(countWords('  How is   campaign 42 ')).toBe(4);
    expect(countWords('')).toBe(0);
  });

  it('should truncate with a suffix', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('short', 8)).toBe('short');
  });

  it('should extract JSON from markdown', () => {
    expect(extractJsonFromText('Here:\n```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(extractJsonFromText('Result: {"a": 1} done')).toBe('{"a": 1}');
  });

  it('should keep only non-empty strings', () => {
    expect(toStringList(['a', ' ', 3, ' b '], 5)).toEqual(['a', 'b']);
    expect(toStringList('a')).toEqual([]);
  });

  it('should retry until success', async () => {
    let attempts = 0;
    const result = await retry(async () => {
      attempts++;
      if (attempts < 3) throw new Error('flaky');
      return 'ok';
    }, { maxRetries: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('should stop retrying when shouldRetry declines', async () => {
    let attempts = 0;
    const pending = retry(async () => {
      attempts++;
      throw new Error('fatal');
    }, { maxRetries: 3, baseDelay: 1, shouldRetry: () => false });

    await expect(pending).rejects.toThrow('fatal');
    expect(attempts).toBe(1);
  });

  it('should reject with the abort reason', async () => {
    const controller = new AbortController();
    const pending = raceWithSignal(new Promise<string>(() => undefined), controller.signal);

    controller.abort(new Error('stopped'));

    await expect(pending).rejects.toThrow('stopped');
  });

  it('should resolve with the promise value before abort', async () => {
    const controller = new AbortController();
    await expect(raceWithSignal(Promise.resolve(5), controller.signal)).resolves.toBe(5);
  });
});
