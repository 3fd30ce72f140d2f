/**
 * @fileoverview Analysis Workflow Orchestrator
 *
 * Drives one run through research → analysis → validation → extraction,
 * looping back to research when validation fails, and publishes a progress
 * snapshot on every transition.
 *
 * - Snapshot writes are best-effort (see {@link ProgressStore.save}).
 * - A stage error fails the run: the failed snapshot keeps the stage the
 *   run stopped in and the error is rethrown as `AnalysisFailedError`.
 * - Exhausting the research attempts (or the token budget) ends the run
 *   with `status = failed` and the last answer, without extraction.
 *
 * @module agents/workflow/orchestrator
 */

import { aggregate } from '@/lib/analysis/confidence'
import type { ProgressStore, ResultStore } from '@/lib/analysis/progress-store'
import { BudgetTracker } from '@/lib/ai/budget'
import { AnalysisFailedError, ScopeError, errorMessage } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { runResearcherAgent, type ContextEnricher, type Retriever } from '../researcher'
import { runAnalystAgent } from '../analyst'
import { runValidatorAgent } from '../validator'
import { runIntelligenceHubAgent } from '../intelligence-hub'
import { DEFAULT_TOP_K } from '../tools/vector-search'
import {
  toAnalysisResult,
  toProgressSnapshot,
  type ActiveStage,
  type AnalysisState,
  type WorkflowStage,
} from './state'
import {
  DEFAULT_MAX_RESEARCH_ATTEMPTS,
  enterStage,
  markCompleted,
  markFailed,
  nextStage,
} from './transitions'

export interface AnalysisWorkflowDeps {
  retriever: Retriever
  /** Null disables enrichment */
  enricher: ContextEnricher | null
  progress: ProgressStore
  results: ResultStore
  maxResearchAttempts?: number
  topK?: number
}

export class AnalysisWorkflow {
  private readonly maxAttempts: number
  private readonly topK: number

  constructor(private readonly deps: AnalysisWorkflowDeps) {
    this.maxAttempts = deps.maxResearchAttempts ?? DEFAULT_MAX_RESEARCH_ATTEMPTS
    this.topK = deps.topK ?? DEFAULT_TOP_K
  }

  /**
   * Runs the workflow to a terminal state and persists the result.
   *
   * @returns The final state, `completed` or `failed` (validation exhausted)
   * @throws ScopeError before any I/O when the scope is incomplete
   * @throws AnalysisFailedError when a stage or the result write fails
   */
  async run(
    state: AnalysisState,
    budgetTracker: BudgetTracker = new BudgetTracker()
  ): Promise<AnalysisState> {
    if (!state.documentId || !state.userId) {
      throw new ScopeError('documentId and userId are required')
    }

    let stage: WorkflowStage = 'research'
    while (stage !== 'done' && stage !== 'failed') {
      const current: ActiveStage = stage
      enterStage(state, current, this.maxAttempts)
      await this.publish(state)

      try {
        await this.runStage(current, state, budgetTracker)
      } catch (error) {
        await this.fail(state, `Analysis failed during ${current}: ${errorMessage(error)}`)
      }

      stage = nextStage(current, state, this.maxAttempts)
      if (stage === 'research' && budgetTracker.isExceeded) {
        logger.warn('Token budget exhausted, not retrying research', {
          documentId: state.documentId,
          totalTokens: budgetTracker.totalTokens,
        })
        stage = 'failed'
        markFailed(state, `Token budget exhausted after ${state.researchAttempts} research attempts`)
      } else if (stage === 'failed') {
        markFailed(
          state,
          `Answer could not be validated after ${state.researchAttempts} research attempts`
        )
      } else if (stage === 'research') {
        logger.info('Validation failed, researching again', {
          documentId: state.documentId,
          attempt: state.researchAttempts,
        })
        if (budgetTracker.isWarning) {
          logger.warn('Token budget above 80% before retry', {
            documentId: state.documentId,
            remaining: budgetTracker.remaining,
          })
        }
      }
    }

    if (stage === 'done') {
      markCompleted(state)
    }
    state.confidenceMetrics = aggregate(
      state.retrievalScores,
      state.contexts.length,
      state.generationLogprobs
    )

    try {
      await this.deps.results.save(state.userId, state.documentId, toAnalysisResult(state))
    } catch (error) {
      await this.fail(state, `Analysis failed while saving result: ${errorMessage(error)}`)
    }
    await this.publish(state)

    const usage = budgetTracker.getUsage()
    logger.info('Analysis run finished', {
      documentId: state.documentId,
      userId: state.userId,
      status: state.status,
      researchAttempts: state.researchAttempts,
      totalTokens: usage.total.total,
      estimatedCost: usage.total.estimatedCost,
      agentsOverAllocation: budgetTracker.agentsOverAllocation(),
    })

    return state
  }

  private async runStage(
    stage: ActiveStage,
    state: AnalysisState,
    budgetTracker: BudgetTracker
  ): Promise<void> {
    switch (stage) {
      case 'research': {
        const research = await runResearcherAgent({
          question: state.question,
          scope: { documentId: state.documentId, userId: state.userId },
          attempt: state.researchAttempts,
          topK: this.topK,
          retriever: this.deps.retriever,
          enricher: this.deps.enricher,
        })
        state.context = research.context
        state.contexts = research.contexts
        state.retrievalScores = research.retrievalScores
        state.retrievedSources = research.retrievedSources
        state.geopoliticalContext = research.geopoliticalContext
        return
      }
      case 'analysis': {
        const { answer, tokenLogprobs } = await runAnalystAgent({
          question: state.question,
          context: state.context,
          geopoliticalContext: state.geopoliticalContext,
          budgetTracker,
        })
        state.answer = answer
        state.generationLogprobs = tokenLogprobs
        return
      }
      case 'validation': {
        const { isValid } = await runValidatorAgent({
          answer: state.answer,
          context: state.context,
          geopoliticalContext: state.geopoliticalContext,
          budgetTracker,
        })
        state.isValid = isValid
        return
      }
      case 'extraction': {
        const { report } = await runIntelligenceHubAgent({
          question: state.question,
          context: state.context,
          answer: state.answer,
          geopoliticalContext: state.geopoliticalContext,
          budgetTracker,
        })
        state.intelligenceHubData = report
        return
      }
    }
  }

  private async publish(state: AnalysisState): Promise<void> {
    await this.deps.progress.save(state.userId, state.documentId, toProgressSnapshot(state))
  }

  private async fail(state: AnalysisState, message: string): Promise<never> {
    logger.error('Analysis run failed', {
      documentId: state.documentId,
      userId: state.userId,
      stage: state.currentStage,
      error: message,
    })
    markFailed(state, message)
    await this.publish(state)
    throw new AnalysisFailedError(message)
  }
}
