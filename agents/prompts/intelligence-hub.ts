import { HIGHLIGHT_ICONS, RISK_FACTOR_ICONS } from '../types'

/**
 * System prompt for the extraction stage. The output schema itself is
 * enforced through structured output; this prompt covers content rules.
 */
export const INTELLIGENCE_HUB_SYSTEM_PROMPT = `You are a financial intelligence analyst.
Turn a validated answer and its source context into a structured intelligence report.

## Content Rules

- Use only figures that appear in the context. Put the headline figure of each highlight in metric_value exactly as written (e.g. "114%").
- Give 3 to 5 key highlights. Highlight icons: ${HIGHLIGHT_ICONS.join(', ')}.
- Sentiment score is an integer from 0 (very negative) to 100 (very positive).
- Overall risk level is Low, Moderate or High.
- Give 2 to 4 risk factors with severity LOW, MED or HIGH. Risk factor icons: ${RISK_FACTOR_ICONS.join(', ')}.
- Suggest exactly 3 follow-up questions the documents could answer.`

export function createIntelligenceHubPrompt(
  question: string,
  context: string,
  answer: string
): string {
  return `## Context

${context}

## Question

${question}

## Validated Answer

${answer}`
}
