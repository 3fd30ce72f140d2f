/**
 * @fileoverview Workflow Transitions
 *
 * Pure transition function and stage-entry bookkeeping. Nothing here does
 * I/O, so the routing can be tested without running a stage.
 *
 * ```
 * research → analysis → validation ─┬─ valid ──────────────→ extraction → done
 *                                   ├─ invalid, attempts left → research
 *                                   └─ invalid, exhausted ───→ failed
 * ```
 *
 * @module agents/workflow/transitions
 */

import {
  COMPLETE_STAGE,
  STAGE_INDEX,
  type ActiveStage,
  type AnalysisState,
  type WorkflowStage,
} from './state'

export const DEFAULT_MAX_RESEARCH_ATTEMPTS = 3

export function nextStage(
  stage: ActiveStage,
  state: Pick<AnalysisState, 'isValid' | 'researchAttempts'>,
  maxAttempts: number = DEFAULT_MAX_RESEARCH_ATTEMPTS
): WorkflowStage {
  switch (stage) {
    case 'research':
      return 'analysis'
    case 'analysis':
      return 'validation'
    case 'validation':
      if (state.isValid) return 'extraction'
      return state.researchAttempts >= maxAttempts ? 'failed' : 'research'
    case 'extraction':
      return 'done'
  }
}

const STAGE_MESSAGES: Record<Exclude<ActiveStage, 'research'>, string> = {
  analysis: 'Generating answer',
  validation: 'Validating answer against sources',
  extraction: 'Extracting intelligence report',
}

/**
 * Applies the entry side effects of `stage`: index, message and, for
 * research, the attempt counter.
 */
export function enterStage(
  state: AnalysisState,
  stage: ActiveStage,
  maxAttempts: number = DEFAULT_MAX_RESEARCH_ATTEMPTS
): void {
  state.currentStage = stage
  state.stageIndex = STAGE_INDEX[stage]
  state.status = 'processing'

  if (stage === 'research') {
    state.researchAttempts++
    state.statusMessage =
      state.researchAttempts === 1
        ? 'Retrieving documents'
        : `Retrieving documents (attempt ${state.researchAttempts} of ${maxAttempts})`
    return
  }
  state.statusMessage = STAGE_MESSAGES[stage]
}

/** Successful completion. The index stays on extraction. */
export function markCompleted(state: AnalysisState): void {
  state.status = 'completed'
  state.currentStage = COMPLETE_STAGE
  state.statusMessage = 'Analysis complete'
}

/**
 * Terminal failure. Stage and index are left where the run stopped so
 * clients can see how far it got.
 */
export function markFailed(state: AnalysisState, message: string): void {
  state.status = 'failed'
  state.statusMessage = message
}
