/**
 * @file test/routing.test.ts
 * @description Unit-тесты для Routing: разбор ответа, keyword fallback, clarification
 */

import {
  DEFAULT_CLARIFICATION_MESSAGE,
  keywordRouting,
  normalizeSpecialistId,
  parseRoutingResponse,
  routeQuery,
  routingStage,
} from '../src/services/pipeline/routing';
import { createRunState } from '../src/services/pipeline/state';
import { SPECIALIST_DEFINITIONS } from '../src/config/specialists';
import { FakeSpecialist, makeContext, registryOf, ScriptedReasoning } from './helpers/fakes';

const OPTIONS = { clarificationThreshold: 0.3, fallbackConfidence: 0.6 };

describe('normalizeSpecialistId', () => {
  it('should lowercase and join words with underscores', () => {
    expect(normalizeSpecialistId(' Budget-Risk ')).toBe('budget_risk');
    expect(normalizeSpecialistId('**performance**')).toBe('performance');
  });
});

describe('parseRoutingResponse', () => {
  it('should parse all four lines', () => {
    const parsed = parseRoutingResponse(
      'AGENTS: Performance, budget-risk, performance\nREASONING: Asked about CTR\nCONFIDENCE: 0.85\nCLARIFICATION: none'
    );

    expect(parsed).toEqual({
      selectedSpecialists: ['performance', 'budget_risk'],
      rationale: 'Asked about CTR',
      confidence: 0.85,
      clarification: '',
    });
  });

  it('should return null without an AGENTS line', () => {
    expect(parseRoutingResponse('I would pick the performance agent.')).toBeNull();
  });

  it('should read NONE with a clarification question', () => {
    const parsed = parseRoutingResponse(
      'AGENTS: NONE\nCONFIDENCE: 0.0\nCLARIFICATION: Which campaign do you mean?'
    );

    expect(parsed?.selectedSpecialists).toEqual([]);
    expect(parsed?.confidence).toBe(0);
    expect(parsed?.clarification).toBe('Which campaign do you mean?');
  });

  it('should clamp confidence to [0, 1]', () => {
    expect(parseRoutingResponse('AGENTS: performance\nCONFIDENCE: 1.7')?.confidence).toBe(1);
  });
});

describe('keywordRouting', () => {
  it('should select every specialist with a matching keyword', () => {
    const result = keywordRouting('How is budget pacing for campaign 42?', SPECIALIST_DEFINITIONS, 0.6);

    expect(result.selectedSpecialists).toEqual(['performance', 'budget']);
    expect(result.confidence).toBe(0.6);
    expect(result.rationale).toBe('Fallback keyword-based routing');
    expect(result.clarificationNeeded).toBe(false);
    expect(result.source).toBe('keyword_fallback');
  });

  it('should request clarification when nothing matches', () => {
    const result = keywordRouting('hello there', SPECIALIST_DEFINITIONS, 0.6);

    expect(result.selectedSpecialists).toEqual([]);
    expect(result.confidence).toBe(0);
    expect(result.clarificationNeeded).toBe(true);
    expect(result.clarificationMessage).toBe(DEFAULT_CLARIFICATION_MESSAGE);
  });
});

describe('routeQuery', () => {
  it('should use the reasoning answer', async () => {
    const reasoning = new ScriptedReasoning({
      routing: 'AGENTS: performance\nREASONING: CTR question\nCONFIDENCE: 0.9',
    });

    const result = await routeQuery('What is the CTR of campaign 42?', reasoning, OPTIONS);

    expect(result).toEqual({
      selectedSpecialists: ['performance'],
      confidence: 0.9,
      rationale: 'CTR question',
      clarificationNeeded: false,
      source: 'reasoning',
    });
  });

  it('should request clarification below the threshold', async () => {
    const reasoning = new ScriptedReasoning({ routing: 'AGENTS: performance\nCONFIDENCE: 0.2' });

    const result = await routeQuery('campaign stuff', reasoning, OPTIONS);

    expect(result.clarificationNeeded).toBe(true);
    expect(result.selectedSpecialists).toEqual([]);
    expect(result.confidence).toBe(0.2);
    expect(result.clarificationMessage).toBe(DEFAULT_CLARIFICATION_MESSAGE);
    expect(result.rationale).toBe('Query is unclear or ambiguous');
  });

  it('should request clarification when the model asks a question', async () => {
    const reasoning = new ScriptedReasoning({
      routing: 'AGENTS: performance\nCONFIDENCE: 0.7\nCLARIFICATION: Which date range?',
    });

    const result = await routeQuery('How did we do?', reasoning, OPTIONS);

    expect(result.clarificationNeeded).toBe(true);
    expect(result.clarificationMessage).toBe('Which date range?');
  });

  it('should request clarification when only unknown specialists are named', async () => {
    const reasoning = new ScriptedReasoning({ routing: 'AGENTS: weather\nCONFIDENCE: 0.9' });

    const result = await routeQuery('Will it rain?', reasoning, OPTIONS);

    expect(result.clarificationNeeded).toBe(true);
  });

  it('should keep unknown names next to a routable one', async () => {
    const reasoning = new ScriptedReasoning({ routing: 'AGENTS: performance, weather\nCONFIDENCE: 0.9' });

    const result = await routeQuery('CTR and weather', reasoning, OPTIONS);

    expect(result.selectedSpecialists).toEqual(['performance', 'weather']);
    expect(result.clarificationNeeded).toBe(false);
  });

  it('should default confidence to 0.8 when agents are named without it', async () => {
    const reasoning = new ScriptedReasoning({ routing: 'AGENTS: budget' });

    const result = await routeQuery('Budget status', reasoning, OPTIONS);

    expect(result.confidence).toBe(0.8);
  });

  it('should fall back to keywords when reasoning fails', async () => {
    const reasoning = new ScriptedReasoning({ routing: new Error('provider down') });

    const result = await routeQuery('Show CTR trends', reasoning, OPTIONS);

    expect(result.source).toBe('keyword_fallback');
    expect(result.selectedSpecialists).toEqual(['performance']);
    expect(result.confidence).toBe(0.6);
  });

  it('should fall back to keywords on an unparsable answer', async () => {
    const reasoning = new ScriptedReasoning({ routing: 'I think performance' });

    const result = await routeQuery('Which creatives show fatigue?', reasoning, OPTIONS);

    expect(result.source).toBe('keyword_fallback');
    expect(result.selectedSpecialists).toEqual(['creative']);
  });
});

describe('routingStage', () => {
  it('should offer only registered specialists and pass history', async () => {
    const reasoning = new ScriptedReasoning({ routing: 'AGENTS: performance\nCONFIDENCE: 0.9' });
    const ctx = makeContext(registryOf(new FakeSpecialist('performance')), reasoning);
    const state = createRunState({
      query: 'And last week?',
      userId: 'user-1',
      conversationHistory: [
        { role: 'user', content: 'What is the CTR of campaign 42?' },
        { role: 'assistant', content: 'CTR is 1.8%.' },
      ],
    });

    const update = await routingStage.run(state, ctx);

    const prompt = reasoning.calls[0].prompt;
    expect(prompt).toContain('- **performance**: performance specialist');
    expect(prompt).not.toContain('- **creative**');
    expect(prompt).toContain('CONVERSATION HISTORY');
    expect(prompt).toContain('Assistant: CTR is 1.8%.');
    expect(update.reasoningSteps).toEqual(['Routing: selected performance with confidence 0.90 (reasoning)']);
  });
});
