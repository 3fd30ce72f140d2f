/**
 * @fileoverview Progress and Result Stores
 *
 * Persists the pollable progress snapshot and the final analysis document
 * in the object store under a stable key layout:
 *
 * - `{userId}/{documentId}/status.json`
 * - `{userId}/{documentId}/analysis.json`
 *
 * Progress writes are best-effort: a failed write is logged and never
 * fails the run.
 *
 * @module lib/analysis/progress-store
 */

import { z } from "zod"
import { errorMessage, ValidationError } from "../errors"
import { logger } from "../logger"
import type { ObjectStore } from "../storage/types"

// ============================================================================
// Keys
// ============================================================================

export function statusKey(userId: string, documentId: string): string {
  return `${userId}/${documentId}/status.json`
}

export function analysisKey(userId: string, documentId: string): string {
  return `${userId}/${documentId}/analysis.json`
}

// ============================================================================
// Progress Snapshot
// ============================================================================

export const ANALYSIS_STATUSES = ["processing", "completed", "failed"] as const

export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number]

/** Wire format of the snapshot (snake case, read by polling clients) */
export const progressSnapshotSchema = z.object({
  status: z.enum(ANALYSIS_STATUSES),
  current_stage: z.string(),
  stage_index: z.number().int().min(0),
  total_stages: z.number().int().positive(),
  status_message: z.string(),
})

export type ProgressSnapshot = z.infer<typeof progressSnapshotSchema>

export class ProgressStore {
  constructor(private readonly objects: ObjectStore) {}

  /**
   * Overwrite the snapshot. Never throws.
   *
   * @returns Whether the write succeeded
   */
  async save(userId: string, documentId: string, snapshot: ProgressSnapshot): Promise<boolean> {
    const key = statusKey(userId, documentId)
    try {
      await this.objects.saveJson(snapshot, key)
      return true
    } catch (error) {
      logger.warn("Progress write failed", { key, error: errorMessage(error) })
      return false
    }
  }

  /**
   * Latest snapshot, or null if the run never started.
   *
   * @throws ValidationError when the stored document is not a snapshot
   */
  async get(userId: string, documentId: string): Promise<ProgressSnapshot | null> {
    const raw = await this.objects.getJson(statusKey(userId, documentId))
    if (raw === null) return null

    const parsed = progressSnapshotSchema.safeParse(raw)
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error)
    }
    return parsed.data
  }

  async delete(userId: string, documentId: string): Promise<void> {
    await this.objects.deleteFile(statusKey(userId, documentId))
  }
}

// ============================================================================
// Analysis Result
// ============================================================================

const confidenceMetricSchema = z.object({
  label: z.string(),
  value: z.string(),
  ratio: z.number(),
})

/** Wire format of `analysis.json` */
export const analysisResultSchema = z.object({
  question: z.string(),
  answer: z.string(),
  is_valid: z.boolean(),
  verification_status: z.enum(["PASS", "FAIL"]),
  /** `{}` when extraction never ran */
  intelligence_hub_data: z.record(z.string(), z.unknown()),
  confidence_metrics: z.object({
    overall_level: z.enum(["low", "moderate", "high"]),
    source_match: confidenceMetricSchema,
    ai_certainty: confidenceMetricSchema,
    context_density: confidenceMetricSchema,
    chunks_used: z.number().int().min(0),
  }),
  retrieval_scores: z.array(z.number()),
  retrieved_sources: z.array(z.string()),
  generation_logprobs: z.array(z.number()),
  completed_at: z.string(),
})

export type AnalysisResult = z.infer<typeof analysisResultSchema>

export class ResultStore {
  constructor(private readonly objects: ObjectStore) {}

  /** Result writes propagate failures; a run without a stored result has failed. */
  async save(userId: string, documentId: string, result: AnalysisResult): Promise<void> {
    await this.objects.saveJson(result, analysisKey(userId, documentId))
  }

  async get(userId: string, documentId: string): Promise<AnalysisResult | null> {
    const raw = await this.objects.getJson(analysisKey(userId, documentId))
    if (raw === null) return null

    const parsed = analysisResultSchema.safeParse(raw)
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error)
    }
    return parsed.data
  }

  async delete(userId: string, documentId: string): Promise<void> {
    await this.objects.deleteFile(analysisKey(userId, documentId))
  }
}
