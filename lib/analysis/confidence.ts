/**
 * @fileoverview Confidence Aggregator
 *
 * Post-hoc synthesis of retrieval scores and token log-probabilities into
 * the client-facing confidence report. Pure; thresholds are fixed.
 *
 * @module lib/analysis/confidence
 */

/** Scores above this count toward Context Density */
export const DENSITY_THRESHOLD = 0.75

export const OVERALL_THRESHOLDS = {
  high: { sourceMatch: 0.8, aiCertainty: 0.8 },
  moderate: { sourceMatch: 0.7, aiCertainty: 0.6 },
} as const

export type ConfidenceLevel = "low" | "moderate" | "high"

export interface ConfidenceMetric {
  label: string
  /** Display string, e.g. "87%" or "2/3 chunks > 0.75" */
  value: string
  /** 0..1 */
  ratio: number
}

export interface ConfidenceReport {
  overallLevel: ConfidenceLevel
  sourceMatch: ConfidenceMetric
  aiCertainty: ConfidenceMetric
  contextDensity: ConfidenceMetric
  chunksUsed: number
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value))
}

function percent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`
}

/**
 * Overall level from Source Match and AI Certainty.
 */
export function overallLevel(sourceMatch: number, aiCertainty: number): ConfidenceLevel {
  const { high, moderate } = OVERALL_THRESHOLDS
  if (sourceMatch > high.sourceMatch && aiCertainty > high.aiCertainty) return "high"
  if (sourceMatch > moderate.sourceMatch && aiCertainty > moderate.aiCertainty) return "moderate"
  return "low"
}

/**
 * Builds the confidence report.
 *
 * - Source Match = mean(retrievalScores) clamped to [0, 1], 0 when empty
 *   (cosine scores can be negative)
 * - Context Density = share of scores above {@link DENSITY_THRESHOLD}
 * - AI Certainty = exp(mean(tokenLogprobs)), 0 when empty
 *
 * `contextsUsed` is reported as `chunksUsed` and does not affect the maths.
 */
export function aggregate(
  retrievalScores: number[],
  contextsUsed: number,
  tokenLogprobs: number[]
): ConfidenceReport {
  const sourceMatch = clampUnit(mean(retrievalScores))
  const dense = retrievalScores.filter((score) => score > DENSITY_THRESHOLD).length
  const density = retrievalScores.length === 0 ? 0 : dense / retrievalScores.length
  const aiCertainty = tokenLogprobs.length === 0 ? 0 : Math.exp(mean(tokenLogprobs))

  return {
    overallLevel: overallLevel(sourceMatch, aiCertainty),
    sourceMatch: { label: "Source Match", value: percent(sourceMatch), ratio: sourceMatch },
    aiCertainty: { label: "AI Certainty", value: percent(aiCertainty), ratio: aiCertainty },
    contextDensity: {
      label: "Context Density",
      value: `${dense}/${retrievalScores.length} chunks > ${DENSITY_THRESHOLD}`,
      ratio: density,
    },
    chunksUsed: contextsUsed,
  }
}
