import { gateway } from 'ai'

/** Available models via Vercel AI Gateway */
export const MODELS = {
  fast: 'openai/gpt-4o-mini',
  balanced: 'openai/gpt-4o',
  best: 'openai/gpt-4.1',
} as const

export type ModelTier = keyof typeof MODELS

/**
 * Per-agent model configuration.
 *
 * The analyst stays on an OpenAI model because AI Certainty is computed
 * from the per-token log-probabilities only OpenAI chat models return.
 */
export const AGENT_MODELS = {
  analyst: MODELS.fast,
  validator: MODELS.fast,
  intelligenceHub: MODELS.balanced,
} as const

export type AgentType = keyof typeof AGENT_MODELS

/** Get model instance for an agent */
export function getAgentModel(agent: AgentType) {
  return gateway(AGENT_MODELS[agent])
}

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0,
  maxOutputTokens: 2048,
} as const
