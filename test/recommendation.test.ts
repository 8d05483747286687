/**
 * @file test/recommendation.test.ts
 * @description Unit-тесты для Recommendation: разбор блоков, лимит, fallback, повышение приоритета
 */

import {
  generateRecommendations,
  parseRecommendationResponse,
  recommendationsFromDiagnosis,
  recommendationsFromMetadata,
} from '../src/services/pipeline/recommendation';
import { DiagnosisResult, Severity, SpecialistOutcome } from '../src/types/pipeline';
import { ScriptedReasoning } from './helpers/fakes';

const OPTIONS = { maxItems: 7, fallbackConfidence: 0.6 };

const RESPONSE = [
  '**RECOMMENDATION 1:**',
  'Priority: High',
  'Action: Refresh the 300x250 creatives running longer than 30 days',
  'Reason: Creative fatigue is driving the CTR decline',
  'Expected Impact: CTR recovers by 10-15%',
  '',
  'RECOMMENDATION 2:',
  '- Priority: medium',
  '- Action: Shift 20% of budget from display to video line items',
  '- Reason: Video line items convert at twice the rate',
  '',
  'CONFIDENCE: 0.75',
  'ACTION_PLAN: Refresh creatives first, then rebalance budget.',
].join('\n');

function diagnosis(severity: Severity, issues: string[], rootCauses: string[] = []): DiagnosisResult {
  return { issues, rootCauses, correlations: [], severity, summary: 'summary', source: 'reasoning' };
}

function block(index: number, priority: string): string {
  return [
    `RECOMMENDATION ${index}:`,
    `Priority: ${priority}`,
    `Action: Shift budget to line item ${index} this week`,
    `Reason: Line item ${index} converts best`,
  ].join('\n');
}

describe('parseRecommendationResponse', () => {
  it('should parse recommendation blocks, confidence and action plan', () => {
    const parsed = parseRecommendationResponse(RESPONSE);

    expect(parsed.recommendations).toEqual([
      {
        priority: 'high',
        action: 'Refresh the 300x250 creatives running longer than 30 days',
        reason: 'Creative fatigue is driving the CTR decline',
        expectedImpact: 'CTR recovers by 10-15%',
      },
      {
        priority: 'medium',
        action: 'Shift 20% of budget from display to video line items',
        reason: 'Video line items convert at twice the rate',
      },
    ]);
    expect(parsed.confidence).toBe(0.75);
    expect(parsed.actionPlan).toBe('Refresh creatives first, then rebalance budget.');
  });

  it('should skip blocks without an action', () => {
    const parsed = parseRecommendationResponse('RECOMMENDATION 1:\nPriority: high\nReason: no action given');
    expect(parsed.recommendations).toEqual([]);
    expect(parsed.confidence).toBeNull();
  });
});

describe('recommendationsFromMetadata', () => {
  it('should take at most two structured items per specialist', () => {
    const outcome: SpecialistOutcome = {
      response: 'Budget is underspending',
      confidence: 0.8,
      toolsUsed: [],
      metadata: {
        recommendations: [
          { priority: 'High', action: 'Raise daily caps on line item 12', reason: 'Underspend', expected_impact: '+15% delivery' },
          { action: 'Extend the flight by one week', reason: 'Budget left over', expectedImpact: 'Full spend' },
          { action: 'Third item is dropped', reason: 'limit' },
        ],
      },
    };

    expect(recommendationsFromMetadata({ budget: outcome })).toEqual([
      { priority: 'high', action: 'Raise daily caps on line item 12', reason: 'Underspend', expectedImpact: '+15% delivery' },
      { priority: undefined, action: 'Extend the flight by one week', reason: 'Budget left over', expectedImpact: 'Full spend' },
    ]);
  });

  it('should ignore malformed metadata', () => {
    const outcome: SpecialistOutcome = {
      response: 'x',
      confidence: 0.5,
      toolsUsed: [],
      metadata: { recommendations: ['not an object', { reason: 'no action' }] },
    };
    expect(recommendationsFromMetadata({ budget: outcome })).toEqual([]);
  });
});

describe('recommendationsFromDiagnosis', () => {
  it('should list root causes before issues', () => {
    const drafts = recommendationsFromDiagnosis(diagnosis('medium', ['CTR dropped'], ['Creative fatigue']));

    expect(drafts.map(draft => draft.action)).toEqual([
      'Investigate and address the root cause: Creative fatigue',
      'Review and resolve the reported issue: CTR dropped',
    ]);
    expect(drafts[0].reason).toBe('Diagnosed root cause: Creative fatigue');
  });
});

describe('generateRecommendations', () => {
  it('should skip reasoning when there is nothing to act on', async () => {
    const reasoning = new ScriptedReasoning({ recommendation: RESPONSE });

    const result = await generateRecommendations('q', diagnosis('medium', []), {}, reasoning, OPTIONS);

    expect(result).toEqual({ recommendations: [], confidence: 0, actionPlan: '', source: 'none' });
    expect(reasoning.callsFor('recommendation')).toBe(0);
  });

  it('should use the reasoning answer', async () => {
    const reasoning = new ScriptedReasoning({ recommendation: RESPONSE });

    const result = await generateRecommendations('q', diagnosis('high', ['a', 'b', 'c']), {}, reasoning, OPTIONS);

    expect(result.source).toBe('reasoning');
    expect(result.recommendations).toHaveLength(2);
    expect(result.confidence).toBe(0.75);
  });

  it('should cap the number of items', async () => {
    const text = Array.from({ length: 9 }, (_, i) => block(i + 1, 'medium')).join('\n\n');
    const reasoning = new ScriptedReasoning({ recommendation: text });

    const result = await generateRecommendations('q', diagnosis('medium', ['a', 'b', 'c']), {}, reasoning, OPTIONS);

    expect(result.recommendations).toHaveLength(7);
    expect(result.confidence).toBe(0.8);
    expect(result.actionPlan).toBe('Follow the recommendations in priority order');
  });

  it('should promote the first item when severity is high and nothing is high', async () => {
    const reasoning = new ScriptedReasoning({ recommendation: [block(1, 'medium'), block(2, 'low')].join('\n') });

    const result = await generateRecommendations('q', diagnosis('critical', ['a']), {}, reasoning, OPTIONS);

    expect(result.recommendations.map(rec => rec.priority)).toEqual(['high', 'low']);
  });

  it('should fall back to specialist metadata when reasoning fails', async () => {
    const reasoning = new ScriptedReasoning({ recommendation: new Error('timeout') });
    const outcomes: Record<string, SpecialistOutcome> = {
      budget: {
        response: 'Underspending',
        confidence: 0.8,
        toolsUsed: [],
        metadata: { recommendations: [{ priority: 'low', action: 'Raise daily caps on line item 12', reason: 'Underspend' }] },
      },
    };

    const result = await generateRecommendations('q', diagnosis('medium', ['a', 'b', 'c']), outcomes, reasoning, OPTIONS);

    expect(result.source).toBe('fallback');
    expect(result.confidence).toBe(0.6);
    expect(result.actionPlan).toBe('Review the specialist recommendations in priority order');
    expect(result.recommendations).toEqual([
      { priority: 'low', action: 'Raise daily caps on line item 12', reason: 'Underspend', expectedImpact: undefined },
    ]);
  });

  it('should fall back to the diagnosis when the answer has no items', async () => {
    const reasoning = new ScriptedReasoning({ recommendation: 'No recommendations today.' });

    const result = await generateRecommendations(
      'q',
      diagnosis('high', ['CTR dropped'], ['Creative fatigue']),
      {},
      reasoning,
      OPTIONS
    );

    expect(result.source).toBe('fallback');
    expect(result.actionPlan).toBe('Address the diagnosed root causes first, then the remaining issues');
    expect(result.recommendations.map(rec => rec.priority)).toEqual(['high', 'medium']);
    expect(result.recommendations[0].action).toBe('Investigate and address the root cause: Creative fatigue');
  });
});
