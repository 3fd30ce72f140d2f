import { z } from 'zod'
import { RISK_SEVERITIES } from '@/lib/geopolitical/types'

export { RISK_SEVERITIES, type RiskSeverity } from '@/lib/geopolitical/types'

// ============================================================================
// Scope
// ============================================================================

/**
 * Tenant scope for retrieval and storage. At least one id must be present;
 * the retrieval gateway rejects an empty scope before any I/O.
 */
export interface AnalysisScope {
  documentId?: string
  userId?: string
}

// ============================================================================
// Retrieval
// ============================================================================

/** Fixed chunk struct produced by the retrieval gateway's adapter */
export interface RetrievedChunk {
  content: string
  /** Cosine similarity, roughly [-1, 1]; normalise before display */
  score: number
  sourceMetadata: Record<string, unknown>
}

// ============================================================================
// Intelligence Hub Report
// ============================================================================

export const HIGHLIGHT_ICONS = [
  'chart',
  'growth',
  'calendar',
  'alert',
  'check',
] as const

export type HighlightIcon = (typeof HIGHLIGHT_ICONS)[number]

export const RISK_FACTOR_ICONS = [
  'globe',
  'chain',
  'alert',
  'dollar',
  'chart',
] as const

export type RiskFactorIcon = (typeof RISK_FACTOR_ICONS)[number]

export const riskSeveritySchema = z.enum(RISK_SEVERITIES)

/** Overall risk level of the filing (title case, unlike severities) */
export const RISK_LEVELS = ['Low', 'Moderate', 'High'] as const

export type RiskLevel = (typeof RISK_LEVELS)[number]

export const keyHighlightSchema = z.object({
  icon: z.enum(HIGHLIGHT_ICONS).describe('Icon type'),
  text: z.string().min(1).describe('Highlight with key metrics from the context'),
  metric_value: z
    .string()
    .optional()
    .describe('Headline figure quoted in the text, e.g. "114%"'),
})

export const sentimentSchema = z.object({
  score: z.number().int().min(0).max(100).describe('Sentiment score 0-100'),
  change: z.string().optional().describe('Change indicator such as "+12%"'),
  description: z.string().min(1),
})

export const riskSummarySchema = z.object({
  level: z.enum(RISK_LEVELS),
  description: z.string().min(1),
})

export const riskFactorSchema = z.object({
  icon: z.enum(RISK_FACTOR_ICONS),
  name: z.string().min(1),
  severity: riskSeveritySchema,
})

/**
 * Structured report produced by the extraction stage. Arity is part of
 * the contract: 3-5 highlights, 2-4 risk factors, exactly 3 questions.
 */
export const intelligenceHubReportSchema = z.object({
  key_highlights: z.array(keyHighlightSchema).min(3).max(5),
  sentiment: sentimentSchema,
  risk: riskSummarySchema,
  risk_factors: z.array(riskFactorSchema).min(2).max(4),
  suggested_questions: z.array(z.string().min(1)).length(3),
})

export type KeyHighlight = z.infer<typeof keyHighlightSchema>
export type RiskFactor = z.infer<typeof riskFactorSchema>
export type IntelligenceHubReport = z.infer<typeof intelligenceHubReportSchema>

/**
 * What extraction hands back. `degraded` marks the fixed fallback report,
 * the only report allowed to break the arity rules.
 */
export type IntelligenceHubData = IntelligenceHubReport & { degraded?: boolean }
