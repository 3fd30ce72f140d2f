/**
 * @fileoverview Analyst Agent
 *
 * Generation stage of the analysis workflow. Produces a cited answer
 * constrained to the retrieved context, plus the per-token
 * log-probabilities the confidence aggregator turns into AI Certainty.
 *
 * With an empty context the agent refuses without calling the model.
 *
 * @module agents/analyst
 */

import { generateText } from 'ai'
import { z } from 'zod'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { logger } from '@/lib/logger'
import {
  ANALYST_SYSTEM_PROMPT,
  REFUSAL_ANSWER,
  createAnalystPrompt,
} from './prompts'

// ============================================================================
// Types
// ============================================================================

export interface AnalystInput {
  question: string
  /** Labelled primary context, `""` when retrieval found nothing */
  context: string
  /** Geopolitical appendix, `""` for none */
  geopoliticalContext?: string
  budgetTracker: BudgetTracker
}

export interface AnalystOutput {
  answer: string
  /** Per-token log-probabilities, empty when the provider exposes none */
  tokenLogprobs: number[]
  tokenUsage: { inputTokens: number; outputTokens: number }
}

// ============================================================================
// Log-probabilities
// ============================================================================

const tokenLogprobSchema = z.object({ logprob: z.number() })

/**
 * OpenAI chat models report a flat token list; the responses API nests one
 * list per output part.
 */
const logprobsSchema = z.array(
  z.union([tokenLogprobSchema, z.array(tokenLogprobSchema)])
)

/**
 * Reads per-token log-probabilities from provider metadata, whichever
 * provider key carries them. Returns `[]` when none are present.
 */
export function extractLogprobs(providerMetadata: unknown): number[] {
  if (typeof providerMetadata !== 'object' || providerMetadata === null) return []

  for (const entry of Object.values(providerMetadata)) {
    if (typeof entry !== 'object' || entry === null || !('logprobs' in entry)) continue
    const parsed = logprobsSchema.safeParse(entry.logprobs)
    if (parsed.success) {
      return parsed.data.flat().map((token) => token.logprob)
    }
  }
  return []
}

// ============================================================================
// Analyst Agent
// ============================================================================

/**
 * Joins the primary context and the geopolitical appendix the way every
 * model-facing stage sees them.
 */
export function composeContext(context: string, geopoliticalContext = ''): string {
  return geopoliticalContext ? `${context}\n\n${geopoliticalContext}` : context
}

export async function runAnalystAgent(input: AnalystInput): Promise<AnalystOutput> {
  const { question, context, budgetTracker } = input

  if (context.trim().length === 0) {
    logger.info('Empty context, analyst refusing without model call')
    budgetTracker.record('analyst', 0, 0)
    return {
      answer: REFUSAL_ANSWER,
      tokenLogprobs: [],
      tokenUsage: { inputTokens: 0, outputTokens: 0 },
    }
  }

  const result = await generateText({
    model: getAgentModel('analyst'),
    system: ANALYST_SYSTEM_PROMPT,
    prompt: createAnalystPrompt(
      question,
      composeContext(context, input.geopoliticalContext)
    ),
    ...GENERATION_CONFIG,
    providerOptions: { openai: { logprobs: true } },
  })

  const inputTokens = result.usage.inputTokens ?? 0
  const outputTokens = result.usage.outputTokens ?? 0
  budgetTracker.record('analyst', inputTokens, outputTokens)

  const tokenLogprobs = extractLogprobs(result.providerMetadata)
  if (tokenLogprobs.length === 0) {
    logger.debug('Provider returned no log-probabilities')
  }

  return {
    answer: result.text.trim(),
    tokenLogprobs,
    tokenUsage: { inputTokens, outputTokens },
  }
}
