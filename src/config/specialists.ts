/**
 * @file src/config/specialists.ts
 * @description Каталог специалистов: описания для routing-промпта и ключевые слова для fallback
 * @context Keyword-таблица используется, когда reasoning capability недоступна
 *          или вернула нераспознаваемый ответ
 * @affects pipeline/routing.ts, services/specialists/index.ts
 */

export type SpecialistId = 'performance' | 'budget' | 'delivery' | 'audience' | 'creative';

export interface SpecialistDefinition {
  id: SpecialistId;
  label: string;
  description: string;
  keywords: string[];
}

export const SPECIALIST_DEFINITIONS: SpecialistDefinition[] = [
  {
    id: 'performance',
    label: 'Campaign performance',
    description: 'Insertion-order level performance: spend, impressions, clicks, conversions, revenue, CTR, ROAS. Use for top-line campaign performance questions.',
    keywords: [
      'performance', 'performing', 'campaign', 'campaigns', 'insertion order', 'metrics',
      'ctr', 'roas', 'cpa', 'conversions', 'kpi', 'kpis', 'clicks',
    ],
  },
  {
    id: 'budget',
    label: 'Budget pacing',
    description: 'Budget pacing and risk: remaining budget, underspend, overspend, depletion forecasts, allocation.',
    keywords: [
      'budget', 'budgets', 'pacing', 'spend', 'spending', 'allocation', 'forecast',
      'depletion', 'overspend', 'underspend',
    ],
  },
  {
    id: 'delivery',
    label: 'Delivery',
    description: 'Delivery health: impressions served, reach, frequency, win rate, inventory availability and delivery bottlenecks.',
    keywords: [
      'delivery', 'delivering', 'impressions', 'reach', 'frequency', 'win rate',
      'inventory', 'underdelivery', 'bid', 'bids',
    ],
  },
  {
    id: 'audience',
    label: 'Audience targeting',
    description: 'Line-item level analysis: audience segments, targeting tactics, remarketing versus prospecting.',
    keywords: [
      'audience', 'audiences', 'line item', 'line items', 'targeting', 'segment',
      'segments', 'tactic', 'remarketing', 'prospecting',
    ],
  },
  {
    id: 'creative',
    label: 'Creative',
    description: 'Creative performance by creative name and ad size or format, creative fatigue.',
    keywords: [
      'creative', 'creatives', 'banner', 'banners', 'ad size', 'format', 'fatigue',
      '300x250', '728x90', '160x600',
    ],
  },
];

/**
 * Возвращает определение специалиста по id
 */
export function getSpecialistDefinition(id: string): SpecialistDefinition | undefined {
  return SPECIALIST_DEFINITIONS.find(def => def.id === id);
}

/**
 * Человекочитаемое имя специалиста (для ответа пользователю)
 */
export function specialistLabel(id: string): string {
  return getSpecialistDefinition(id)?.label ?? id.replace(/_/g, ' ');
}
