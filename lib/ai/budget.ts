/** Token budget per analysis run, across every research attempt */
export const RUN_TOKEN_BUDGET = 120_000

/** Per-agent budget allocation */
export const AGENT_BUDGETS = {
  analyst: 48_000,
  validator: 24_000,
  intelligenceHub: 48_000,
} as const

export interface ModelPricing {
  input: number
  output: number
}

/** USD per 1M tokens for the model each agent runs on (see AGENT_MODELS) */
export const AGENT_PRICING = {
  analyst: { input: 0.15, output: 0.6 }, // gpt-4o-mini
  validator: { input: 0.15, output: 0.6 }, // gpt-4o-mini
  intelligenceHub: { input: 2.5, output: 10 }, // gpt-4o
} as const satisfies Record<string, ModelPricing>

function pricingFor(agent: string): ModelPricing {
  const entry = Object.entries(AGENT_PRICING).find(([name]) => name === agent)
  return entry?.[1] ?? AGENT_PRICING.analyst
}

export interface TokenUsage {
  input: number
  output: number
  total: number
  estimatedCost: number
}

export interface AggregatedUsage {
  byAgent: Record<string, TokenUsage>
  total: TokenUsage
}

/** Budget tracker for one analysis run */
export class BudgetTracker {
  private usage: Map<string, TokenUsage> = new Map()

  constructor(private maxTokens: number = RUN_TOKEN_BUDGET) {}

  /** Record usage from an agent call */
  record(agent: string, input: number, output: number): void {
    const existing = this.usage.get(agent) ?? { input: 0, output: 0, total: 0, estimatedCost: 0 }
    const cost = this.calculateCost(pricingFor(agent), input, output)

    this.usage.set(agent, {
      input: existing.input + input,
      output: existing.output + output,
      total: existing.total + input + output,
      estimatedCost: existing.estimatedCost + cost,
    })
  }

  /** Get total tokens used */
  get totalTokens(): number {
    return Array.from(this.usage.values()).reduce((sum, u) => sum + u.total, 0)
  }

  /** Get remaining budget */
  get remaining(): number {
    return Math.max(0, this.maxTokens - this.totalTokens)
  }

  /** Check if budget exceeded */
  get isExceeded(): boolean {
    return this.totalTokens >= this.maxTokens
  }

  /** Check if approaching budget (80% threshold) */
  get isWarning(): boolean {
    return this.totalTokens >= this.maxTokens * 0.8
  }

  /** Agents whose usage exceeds their share in {@link AGENT_BUDGETS} */
  agentsOverAllocation(): string[] {
    return Object.entries(AGENT_BUDGETS)
      .filter(([agent, allocation]) => (this.usage.get(agent)?.total ?? 0) > allocation)
      .map(([agent]) => agent)
  }

  /** Get aggregated usage report */
  getUsage(): AggregatedUsage {
    const byAgent = Object.fromEntries(this.usage)
    const total = {
      input: Array.from(this.usage.values()).reduce((sum, u) => sum + u.input, 0),
      output: Array.from(this.usage.values()).reduce((sum, u) => sum + u.output, 0),
      total: this.totalTokens,
      estimatedCost: Array.from(this.usage.values()).reduce((sum, u) => sum + u.estimatedCost, 0),
    }
    return { byAgent, total }
  }

  private calculateCost(pricing: ModelPricing, input: number, output: number): number {
    const inputCost = (input / 1_000_000) * pricing.input
    const outputCost = (output / 1_000_000) * pricing.output
    return Math.round((inputCost + outputCost) * 1_000_000) / 1_000_000
  }
}
