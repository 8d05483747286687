/**
 * @file src/config/prompts.ts
 * @description Промпты reasoning-стадий (routing, diagnosis, recommendation)
 * @context Формулировки не являются контрактом; контракт — формат ответа,
 *          который разбирают стадии (строки AGENTS:/CONFIDENCE:, JSON диагноза,
 *          блоки RECOMMENDATION n:)
 */

import { truncate } from '../utils/helpers';
import {
  ConversationMessage,
  DiagnosisResult,
  SpecialistFailure,
  SpecialistOutcome,
} from '../types/pipeline';

// ============================================
// Routing
// ============================================

export const ROUTING_INSTRUCTIONS =
  'You are a routing assistant that selects specialist agents for advertising campaign analytics questions.';

/**
 * Промпт routing-стадии
 * @param specialists - Доступные специалисты (id + описание)
 * @param history - Последние сообщения разговора (уже обрезанные)
 */
export function buildRoutingPrompt(
  query: string,
  specialists: Array<{ id: string; description: string }>,
  history: ConversationMessage[],
  now: Date = new Date()
): string {
  const agentsDescription = specialists
    .map(s => `- **${s.id}**: ${s.description}`)
    .join('\n');

  const contextSection = history.length > 0
    ? `
CONVERSATION HISTORY (recent messages for context):
${history.map(m => `${m.role === 'user' ? 'User' : 'Assistant'}: ${truncate(m.content, 300)}`).join('\n')}

The current query may be a follow-up to the conversation above. Short answers such as
"budget" or a bare date range should be interpreted in that context.
`
    : '';

  const month = now.toLocaleString('en-US', { month: 'long', timeZone: 'UTC' });

  return `Analyze the user's query and decide which specialist agent(s) should handle it.
${contextSection}
The current date is ${month} ${now.getUTCFullYear()}. Interpret relative dates against this year.

Available agents:
${agentsDescription}

User query: "${query}"

Respond in exactly this format:

AGENTS: agent_id_1, agent_id_2 (or NONE if unclear)
REASONING: one sentence explaining the selection
CONFIDENCE: a number from 0.0 to 1.0
CLARIFICATION: only when the query is unclear, a specific question for the user

Valid agent ids: ${specialists.map(s => s.id).join(', ')}

If the query is vague (a greeting, "help", "show me data"), set AGENTS to NONE,
CONFIDENCE to 0.0 and ask a CLARIFICATION question.`;
}

// ============================================
// Diagnosis
// ============================================

export const DIAGNOSIS_INSTRUCTIONS =
  'You are a campaign diagnostics analyst. Correlate findings from several specialists and identify root causes. Respond ONLY with valid JSON.';

export function buildDiagnosisPrompt(
  query: string,
  outcomes: Record<string, SpecialistOutcome>,
  errors: Record<string, SpecialistFailure>
): string {
  const findings = Object.entries(outcomes)
    .map(([id, outcome]) => `### ${id} (confidence ${outcome.confidence.toFixed(2)})\n${truncate(outcome.response, 2000)}`)
    .join('\n\n');

  const failed = Object.keys(errors);
  const failedSection = failed.length > 0
    ? `\nSpecialists that returned no data: ${failed.join(', ')}\n`
    : '';

  return `User query: "${query}"

Specialist findings:
${findings}
${failedSection}
Identify concrete issues, their root causes and cross-specialist correlations.
Assess overall severity as one of: low, medium, high, critical.

Respond in JSON:
{
  "issues": ["..."],
  "root_causes": ["..."],
  "correlations": ["..."],
  "severity": "low" | "medium" | "high" | "critical",
  "summary": "2-4 sentence summary for the user"
}`;
}

// ============================================
// Recommendation
// ============================================

export const RECOMMENDATION_INSTRUCTIONS =
  'You are a recommendation expert for programmatic campaign optimization. Recommendations must be specific and tied to the diagnosed root causes.';

export function buildRecommendationPrompt(
  query: string,
  diagnosis: DiagnosisResult,
  outcomes: Record<string, SpecialistOutcome>,
  maxItems: number
): string {
  const agentContext = Object.entries(outcomes)
    .slice(0, 2)
    .map(([id, outcome]) => `- ${id}: ${truncate(outcome.response, 300)}`)
    .join('\n');

  return `User query: "${query}"

Diagnosis:
- Severity: ${diagnosis.severity}
- Issues: ${diagnosis.issues.slice(0, 5).join('; ') || 'None identified'}
- Root causes: ${diagnosis.rootCauses.slice(0, 5).join('; ') || 'None identified'}
${agentContext ? `\nSpecialist findings:\n${agentContext}\n` : ''}
Generate 3-${maxItems} prioritized, actionable recommendations that address the root causes.

Format:
RECOMMENDATION 1:
Priority: high | medium | low
Action: specific action
Reason: which issue or root cause it addresses
Expected Impact: what improves

CONFIDENCE: 0.0-1.0
ACTION_PLAN: 2-3 sentence summary`;
}
