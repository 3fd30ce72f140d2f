/**
 * @fileoverview Intelligence Hub Agent
 *
 * Extraction stage of the analysis workflow. Converts the validated answer
 * and its context into the structured intelligence report.
 *
 * The model output is re-validated against the report schema (arity
 * included) and up to two attempts are made. When both fail, for any
 * reason, the fixed degraded report is returned. This agent never throws.
 *
 * @module agents/intelligence-hub
 */

import { generateText, Output, NoObjectGeneratedError } from 'ai'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { errorMessage } from '@/lib/errors'
import { logger } from '@/lib/logger'
import {
  intelligenceHubReportSchema,
  type IntelligenceHubData,
  type IntelligenceHubReport,
} from './types'
import { composeContext } from './analyst'
import {
  INTELLIGENCE_HUB_SYSTEM_PROMPT,
  createIntelligenceHubPrompt,
} from './prompts'

export const MAX_EXTRACTION_ATTEMPTS = 2

export interface IntelligenceHubInput {
  question: string
  context: string
  answer: string
  geopoliticalContext?: string
  budgetTracker: BudgetTracker
}

export interface IntelligenceHubOutput {
  report: IntelligenceHubData
  attempts: number
  tokenUsage: { inputTokens: number; outputTokens: number }
}

/**
 * Conservative report substituted when extraction fails. Deliberately
 * outside the normal arity rules and flagged `degraded`.
 */
export function createDegradedReport(): IntelligenceHubData {
  return {
    key_highlights: [
      { icon: 'alert', text: 'Insufficient data to extract key highlights.' },
    ],
    sentiment: {
      score: 50,
      description: 'Insufficient data to assess sentiment.',
    },
    risk: {
      level: 'Moderate',
      description: 'Insufficient data to assess risk.',
    },
    risk_factors: [{ icon: 'alert', name: 'Analysis Error', severity: 'MED' }],
    suggested_questions: [
      'What were the key financial results for the period?',
      'What are the main risks disclosed in the document?',
      'How did performance compare with the prior period?',
    ],
    degraded: true,
  }
}

type AttemptResult =
  | { ok: true; report: IntelligenceHubReport }
  | { ok: false; reason: string }

export async function runIntelligenceHubAgent(
  input: IntelligenceHubInput
): Promise<IntelligenceHubOutput> {
  const { question, answer, budgetTracker } = input
  const prompt = createIntelligenceHubPrompt(
    question,
    composeContext(input.context, input.geopoliticalContext),
    answer
  )
  let inputTokens = 0
  let outputTokens = 0

  const attempt = async (): Promise<AttemptResult> => {
    try {
      const result = await generateText({
        model: getAgentModel('intelligenceHub'),
        system: INTELLIGENCE_HUB_SYSTEM_PROMPT,
        prompt,
        ...GENERATION_CONFIG,
        output: Output.object({ schema: intelligenceHubReportSchema }),
      })
      inputTokens += result.usage.inputTokens ?? 0
      outputTokens += result.usage.outputTokens ?? 0

      // Providers without strict structured output can still break arity
      const parsed = intelligenceHubReportSchema.safeParse(result.output)
      if (!parsed.success) {
        return { ok: false, reason: parsed.error.issues.map((i) => i.message).join('; ') }
      }
      return { ok: true, report: parsed.data }
    } catch (error) {
      if (NoObjectGeneratedError.isInstance(error)) {
        inputTokens += error.usage?.inputTokens ?? 0
        outputTokens += error.usage?.outputTokens ?? 0
        return { ok: false, reason: `no object generated: ${error.text?.slice(0, 200) ?? 'empty output'}` }
      }
      return { ok: false, reason: errorMessage(error) }
    }
  }

  let report: IntelligenceHubData | null = null
  let attempts = 0
  while (attempts < MAX_EXTRACTION_ATTEMPTS && !report) {
    attempts++
    const result = await attempt()
    if (result.ok) {
      report = result.report
    } else {
      logger.warn('Intelligence hub extraction attempt failed', {
        attempt: attempts,
        reason: result.reason,
      })
    }
  }

  budgetTracker.record('intelligenceHub', inputTokens, outputTokens)

  if (!report) {
    logger.error('Intelligence hub extraction failed, using degraded report', { attempts })
    report = createDegradedReport()
  }

  return { report, attempts, tokenUsage: { inputTokens, outputTokens } }
}
