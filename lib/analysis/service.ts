/**
 * @fileoverview Analysis Service
 *
 * Entry points for callers outside the workflow: start a run, poll its
 * progress and read its result. Every call is scoped to a document and the
 * user who owns it.
 *
 * @module lib/analysis/service
 */

import { AnalysisWorkflow } from "@/agents/workflow/orchestrator"
import { createAnalysisState, type AnalysisState } from "@/agents/workflow/state"
import { BudgetTracker } from "../ai/budget"
import { ScopeError, ValidationError } from "../errors"
import { logger } from "../logger"
import type { AnalysisResult, ProgressSnapshot, ProgressStore, ResultStore } from "./progress-store"

export interface AnalysisServiceDeps {
  workflow: AnalysisWorkflow
  progress: ProgressStore
  results: ResultStore
}

function requireScope(documentId: string, userId: string): void {
  if (!documentId.trim() || !userId.trim()) {
    throw new ScopeError("documentId and userId are required")
  }
}

export class AnalysisService {
  constructor(private readonly deps: AnalysisServiceDeps) {}

  /**
   * Runs the full workflow for one question.
   *
   * @returns The final state; `status` is `completed` or `failed`
   * @throws ScopeError, ValidationError before any I/O
   * @throws AnalysisFailedError when a stage fails
   */
  async runAnalysis(question: string, documentId: string, userId: string): Promise<AnalysisState> {
    requireScope(documentId, userId)
    if (!question.trim()) {
      throw new ValidationError("Validation failed", [
        { field: "question", message: "Question must not be empty" },
      ])
    }

    logger.info("Analysis started", { documentId, userId })
    return this.deps.workflow.run(
      createAnalysisState(question.trim(), documentId, userId),
      new BudgetTracker()
    )
  }

  /** Latest progress snapshot, or null when no run has started. */
  async getProgress(documentId: string, userId: string): Promise<ProgressSnapshot | null> {
    requireScope(documentId, userId)
    return this.deps.progress.get(userId, documentId)
  }

  /** Persisted result of the last finished run, or null. */
  async getResult(documentId: string, userId: string): Promise<AnalysisResult | null> {
    requireScope(documentId, userId)
    return this.deps.results.get(userId, documentId)
  }
}
