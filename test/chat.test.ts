/**
 * @file test/chat.test.ts
 * @description Тесты валидации запросов Chat API и маппинга результата pipeline в ответ
 */

import {
  AGENT_NAME,
  parseChatRequest,
  parseCreateSessionRequest,
  parseHistoryLimit,
  toChatResponse,
} from '../src/routes/chat';
import { ValidationError } from '../src/types/errors';
import { PublicResult } from '../src/types/pipeline';

describe('parseChatRequest', () => {
  it('should trim the message and keep optional fields', () => {
    expect(parseChatRequest({
      message: '  How is campaign 42 pacing?  ',
      user_id: 'user-1',
      session_id: 'session-1',
      context: { advertiser: 'acme' },
    })).toEqual({
      message: 'How is campaign 42 pacing?',
      user_id: 'user-1',
      session_id: 'session-1',
      context: { advertiser: 'acme' },
    });
  });

  it('should require a message and a user id', () => {
    expect(() => parseChatRequest({ user_id: 'user-1' })).toThrow('message is required');
    expect(() => parseChatRequest({ message: '   ', user_id: 'user-1' })).toThrow(ValidationError);
    expect(() => parseChatRequest({ message: 'hi' })).toThrow('user_id is required');
  });

  it('should reject oversized messages', () => {
    expect(() => parseChatRequest({ message: 'x'.repeat(10001), user_id: 'user-1' })).toThrow(
      'message must be at most 10000 characters'
    );
  });

  it('should reject malformed optional fields', () => {
    expect(() => parseChatRequest({ message: 'hi', user_id: 'u', session_id: 42 })).toThrow('session_id must be a string');
    expect(() => parseChatRequest({ message: 'hi', user_id: 'u', context: ['a'] })).toThrow('context must be an object');
    expect(() => parseChatRequest('hi')).toThrow('Request body must be a JSON object');
  });
});

describe('parseCreateSessionRequest', () => {
  it('should accept a user id with metadata', () => {
    expect(parseCreateSessionRequest({ user_id: 'user-1', metadata: { team: 'growth' } })).toEqual({
      user_id: 'user-1',
      metadata: { team: 'growth' },
    });
  });
});

describe('parseHistoryLimit', () => {
  it('should default, parse and cap the limit', () => {
    expect(parseHistoryLimit(undefined)).toBe(50);
    expect(parseHistoryLimit('10')).toBe(10);
    expect(parseHistoryLimit('1000')).toBe(500);
  });

  it('should reject invalid limits', () => {
    expect(() => parseHistoryLimit('abc')).toThrow('limit must be a positive integer');
    expect(() => parseHistoryLimit('0')).toThrow(ValidationError);
  });
});

describe('toChatResponse', () => {
  it('should map a pipeline result to the API response', () => {
    const result: PublicResult = {
      runId: 'run-1',
      response: 'CTR is 1.8%.',
      provenance: ['performance'],
      confidence: 0.8,
      metadata: {
        terminationPath: 'early_exit',
        severity: 'low',
        specialistsInvoked: ['performance'],
        failedSpecialists: [],
        recommendationCount: 0,
        warnings: [],
        stageTimings: { routing: 120 },
        totalElapsedMs: 400,
        toolsUsed: ['query_metrics'],
        reasoning: ['step one', 'step two'],
      },
    };

    expect(toChatResponse(result, 'session-1', 450)).toEqual({
      response: 'CTR is 1.8%.',
      session_id: 'session-1',
      agent_name: AGENT_NAME,
      reasoning: 'step one\nstep two',
      tools_used: ['query_metrics'],
      confidence: 0.8,
      metadata: {
        terminationPath: 'early_exit',
        severity: 'low',
        specialistsInvoked: ['performance'],
        failedSpecialists: [],
        recommendationCount: 0,
        warnings: [],
        stageTimings: { routing: 120 },
        totalElapsedMs: 400,
        run_id: 'run-1',
        provenance: ['performance'],
      },
      execution_time_ms: 450,
    });
  });
});
