/**
 * @file test/validation.test.ts
 * @description Unit-тесты для Validation: обязательные поля, конфликты, размытые действия, сортировка
 */

import {
  areConflicting,
  isVagueAction,
  validateRecommendations,
} from '../src/services/pipeline/validation';
import { RecommendationDraft } from '../src/types/pipeline';

const OPTIONS = { maxRecommendations: 7 };

function draft(action: string, priority: string = 'medium'): RecommendationDraft {
  return { priority, action, reason: 'The data points this way', expectedImpact: 'Better results' };
}

describe('areConflicting', () => {
  it('should detect opposite actions on the same target', () => {
    expect(areConflicting(
      'Increase bids on the retargeting line items by 15%',
      'Reduce bids on the retargeting line items by 10%'
    )).toBe(true);
  });

  it('should ignore opposite actions on different targets', () => {
    expect(areConflicting(
      'Increase bids on retargeting line items',
      'Reduce frequency cap on prospecting campaigns'
    )).toBe(false);
  });

  it('should ignore actions in the same direction', () => {
    expect(areConflicting('Pause the 728x90 banner', 'Stop the 728x90 banner')).toBe(false);
  });
});

describe('isVagueAction', () => {
  it('should flag short actions', () => {
    expect(isVagueAction('Optimize campaigns')).toBe(true);
  });

  it('should flag generic verbs without numbers', () => {
    expect(isVagueAction('Improve the targeting of all display line items')).toBe(true);
    expect(isVagueAction('Improve CTR on the top 3 line items')).toBe(false);
  });

  it('should accept specific actions', () => {
    expect(isVagueAction('Shift budget from display to video line items')).toBe(false);
  });
});

describe('validateRecommendations', () => {
  it('should drop items without action or reason', () => {
    const result = validateRecommendations(
      [{ priority: 'high', reason: 'r' }, { priority: 'high', action: 'Shift budget to the video line items' }],
      'medium',
      OPTIONS
    );

    expect(result.errors).toEqual([
      'Recommendation 1: missing action',
      'Recommendation 2: missing reason',
    ]);
    expect(result.recommendations).toEqual([]);
    expect(result.valid).toBe(false);
  });

  it('should default invalid and missing priorities to medium', () => {
    const result = validateRecommendations(
      [
        draft('Shift budget to the video line items', 'urgent'),
        { action: 'Extend the flight of campaign 42 by a week', reason: 'Budget remains' },
      ],
      'medium',
      OPTIONS
    );

    expect(result.recommendations.map(rec => rec.priority)).toEqual(['medium', 'medium']);
    expect(result.warnings).toEqual([
      'Recommendation 1: invalid priority "urgent", defaulting to medium',
      'Recommendation 2: missing priority, defaulting to medium',
    ]);
    expect(result.recommendations[1].expectedImpact).toBe('');
    expect(result.valid).toBe(true);
  });

  it('should warn about conflicting recommendations', () => {
    const result = validateRecommendations(
      [
        draft('Increase bids on the retargeting line items by 15%'),
        draft('Reduce bids on the retargeting line items by 10%'),
      ],
      'medium',
      OPTIONS
    );

    expect(result.warnings).toEqual([
      'Recommendations 1 and 2 may conflict: "Increase bids on the retargeting line items by 15%" vs "Reduce bids on the retargeting line items by 10%"',
    ]);
  });

  it('should warn about vague actions', () => {
    const result = validateRecommendations([draft('Optimize campaigns')], 'low', OPTIONS);
    expect(result.warnings).toEqual(['Recommendation 1: action may be too vague']);
  });

  it('should warn when severity is high and nothing is high priority', () => {
    const result = validateRecommendations([draft('Shift budget to the video line items')], 'high', OPTIONS);
    expect(result.warnings).toEqual(['Severity is high but no high-priority recommendations']);
  });

  it('should warn when a moderate severity has many high-priority items', () => {
    const result = validateRecommendations(
      [1, 2, 3].map(i => draft(`Shift budget to line item ${i} now`, 'high')),
      'low',
      OPTIONS
    );
    expect(result.warnings).toEqual(['Severity is low but 3 recommendations are high priority']);
  });

  it('should sort by priority keeping the original order within a priority', () => {
    const result = validateRecommendations(
      [
        draft('Shift budget to line item A now', 'low'),
        draft('Shift budget to line item B now', 'high'),
        draft('Shift budget to line item C now', 'medium'),
        draft('Shift budget to line item D now', 'high'),
      ],
      'high',
      OPTIONS
    );

    expect(result.recommendations.map(rec => rec.action.split(' ')[5])).toEqual(['B', 'D', 'C', 'A']);
  });

  it('should keep only the top recommendations', () => {
    const drafts = Array.from({ length: 9 }, (_, i) => draft(`Shift budget to line item ${i + 1} now`));

    const result = validateRecommendations(drafts, 'medium', OPTIONS);

    expect(result.recommendations).toHaveLength(7);
    expect(result.warnings).toEqual(['Too many recommendations (9), limiting to top 7']);
  });

  it('should be invalid for an empty list', () => {
    const result = validateRecommendations([], 'medium', OPTIONS);
    expect(result).toEqual({ valid: false, recommendations: [], warnings: [], errors: [] });
  });
});
