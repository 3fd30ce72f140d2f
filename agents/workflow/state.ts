/**
 * @fileoverview Analysis Workflow State
 *
 * The mutable record a single run owns from creation to completion, and the
 * snapshot projection polled by clients.
 *
 * @module agents/workflow/state
 */

import { aggregate, type ConfidenceReport } from '@/lib/analysis/confidence'
import type {
  AnalysisResult,
  AnalysisStatus,
  ProgressSnapshot,
} from '@/lib/analysis/progress-store'
import type { IntelligenceHubData } from '../types'

// ============================================================================
// Stages
// ============================================================================

/** Working stages in display order */
export const STAGES = ['research', 'analysis', 'validation', 'extraction'] as const

export type ActiveStage = (typeof STAGES)[number]

/** `done` and `failed` are terminal */
export type WorkflowStage = ActiveStage | 'done' | 'failed'

export const STAGE_INDEX: Record<ActiveStage, number> = {
  research: 0,
  analysis: 1,
  validation: 2,
  extraction: 3,
}

export const TOTAL_STAGES = STAGES.length

/** `current_stage` value of a completed run */
export const COMPLETE_STAGE = 'complete'

// ============================================================================
// State
// ============================================================================

export interface AnalysisState {
  readonly question: string
  readonly documentId: string
  readonly userId: string

  context: string
  contexts: string[]
  retrievalScores: number[]
  retrievedSources: string[]
  geopoliticalContext: string

  answer: string
  generationLogprobs: number[]
  isValid: boolean

  intelligenceHubData: IntelligenceHubData | null
  confidenceMetrics: ConfidenceReport | null

  researchAttempts: number

  currentStage: string
  stageIndex: number
  totalStages: number
  status: AnalysisStatus
  statusMessage: string
}

export function createAnalysisState(
  question: string,
  documentId: string,
  userId: string
): AnalysisState {
  return {
    question,
    documentId,
    userId,
    context: '',
    contexts: [],
    retrievalScores: [],
    retrievedSources: [],
    geopoliticalContext: '',
    answer: '',
    generationLogprobs: [],
    isValid: false,
    intelligenceHubData: null,
    confidenceMetrics: null,
    researchAttempts: 0,
    currentStage: 'research',
    stageIndex: 0,
    totalStages: TOTAL_STAGES,
    status: 'processing',
    statusMessage: 'Queued',
  }
}

export function toProgressSnapshot(state: AnalysisState): ProgressSnapshot {
  return {
    status: state.status,
    current_stage: state.currentStage,
    stage_index: state.stageIndex,
    total_stages: state.totalStages,
    status_message: state.statusMessage,
  }
}

/**
 * Result document persisted as `analysis.json`. Runs that never reached
 * extraction store `{}` for the hub data.
 */
export function toAnalysisResult(state: AnalysisState, completedAt: Date = new Date()): AnalysisResult {
  const confidence =
    state.confidenceMetrics ??
    aggregate(state.retrievalScores, state.contexts.length, state.generationLogprobs)
  return {
    question: state.question,
    answer: state.answer,
    is_valid: state.isValid,
    verification_status: state.isValid ? 'PASS' : 'FAIL',
    intelligence_hub_data: state.intelligenceHubData ?? {},
    confidence_metrics: {
      overall_level: confidence.overallLevel,
      source_match: confidence.sourceMatch,
      ai_certainty: confidence.aiCertainty,
      context_density: confidence.contextDensity,
      chunks_used: confidence.chunksUsed,
    },
    retrieval_scores: state.retrievalScores,
    retrieved_sources: state.retrievedSources,
    generation_logprobs: state.generationLogprobs,
    completed_at: completedAt.toISOString(),
  }
}
