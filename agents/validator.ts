/**
 * @fileoverview Validator Agent
 *
 * Validation stage of the analysis workflow. Two gates, cheapest first:
 *
 * 1. Figure gate: every number quoted in the answer must occur in the
 *    context. Fails without a model call.
 * 2. Model gate: a PASS/FAIL classification. Only a response whose first
 *    word is PASS passes; anything else, including an empty or garbled
 *    response, fails.
 *
 * A refusal against an empty context is faithful and passes without a call.
 *
 * @module agents/validator
 */

import { generateText } from 'ai'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { logger } from '@/lib/logger'
import { validateAnswerFigures, type ValidationResult } from './validation'
import { composeContext } from './analyst'
import {
  REFUSAL_ANSWER,
  VALIDATOR_SYSTEM_PROMPT,
  createValidatorPrompt,
} from './prompts'

export interface ValidatorInput {
  answer: string
  context: string
  geopoliticalContext?: string
  budgetTracker: BudgetTracker
}

export interface ValidatorOutput {
  isValid: boolean
  /** Which gate decided the outcome */
  gate: 'refusal' | 'figures' | 'model'
  /** Figure-gate failure details */
  error?: ValidationResult['error']
  tokenUsage: { inputTokens: number; outputTokens: number }
}

/**
 * Fail-closed verdict parsing: true only when the first word is PASS.
 */
export function parseVerdict(text: string): boolean {
  const firstWord = text.trim().split(/[^A-Za-z]+/).find((word) => word.length > 0)
  return firstWord?.toUpperCase() === 'PASS'
}

export async function runValidatorAgent(input: ValidatorInput): Promise<ValidatorOutput> {
  const { answer, context, budgetTracker } = input
  const noTokens = { inputTokens: 0, outputTokens: 0 }

  if (context.trim().length === 0 && answer.trim() === REFUSAL_ANSWER) {
    return { isValid: true, gate: 'refusal', tokenUsage: noTokens }
  }

  const fullContext = composeContext(context, input.geopoliticalContext)

  const figures = validateAnswerFigures(answer, fullContext)
  if (!figures.valid) {
    logger.info('Answer failed figure gate', {
      code: figures.error?.code,
      message: figures.error?.userMessage,
    })
    return { isValid: false, gate: 'figures', error: figures.error, tokenUsage: noTokens }
  }

  const result = await generateText({
    model: getAgentModel('validator'),
    system: VALIDATOR_SYSTEM_PROMPT,
    prompt: createValidatorPrompt(answer, fullContext),
    temperature: GENERATION_CONFIG.temperature,
    maxOutputTokens: 8,
  })

  const inputTokens = result.usage.inputTokens ?? 0
  const outputTokens = result.usage.outputTokens ?? 0
  budgetTracker.record('validator', inputTokens, outputTokens)

  const isValid = parseVerdict(result.text)
  if (!isValid) {
    logger.info('Answer failed model gate', { verdict: result.text.slice(0, 40) })
  }

  return { isValid, gate: 'model', tokenUsage: { inputTokens, outputTokens } }
}
