/**
 * @fileoverview Background Analysis Function
 *
 * Runs the analysis workflow for an `analysis/requested` event. The HTTP
 * layer sends the event and returns immediately; clients poll the progress
 * snapshot the workflow writes.
 *
 * Payload and scope problems are permanent and raised as
 * `NonRetriableError`. So is a stage failure: the workflow has already
 * published the `failed` snapshot, and a retry would overwrite it with
 * `processing`. Anything thrown before that point propagates for retry.
 *
 * @module inngest/functions/analyze-document
 */

import { NonRetriableError } from "inngest"
import type { AnalysisService } from "@/lib/analysis/service"
import { AnalysisFailedError, ScopeError, ValidationError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { inngest } from "../client"
import { analysisRequestedPayload, type AnalysisRequestedPayload } from "../types"
import { CONCURRENCY, RETRY_CONFIG } from "../utils/concurrency"

/** Step return value; kept small since Inngest stores step output */
export interface AnalysisRunSummary {
  documentId: string
  userId: string
  status: "processing" | "completed" | "failed"
  isValid: boolean
  researchAttempts: number
}

function describeIssues(issues: Array<{ path: PropertyKey[]; message: string }>): string {
  return issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`).join("; ")
}

/**
 * Validates the payload and runs the analysis.
 *
 * @throws NonRetriableError for invalid payloads, scopes and failed runs
 */
export async function executeAnalysisRequest(
  service: AnalysisService,
  payload: unknown
): Promise<AnalysisRunSummary> {
  const parsed = analysisRequestedPayload.safeParse(payload)
  if (!parsed.success) {
    throw new NonRetriableError(`Invalid analysis request: ${describeIssues(parsed.error.issues)}`)
  }

  const { question, documentId, userId } = parsed.data
  try {
    const state = await service.runAnalysis(question, documentId, userId)
    return {
      documentId,
      userId,
      status: state.status,
      isValid: state.isValid,
      researchAttempts: state.researchAttempts,
    }
  } catch (error) {
    if (error instanceof AnalysisFailedError) {
      logger.error("Analysis run failed, not retrying", { documentId, userId, error: error.message })
      throw new NonRetriableError(error.message, { cause: error })
    }
    if (error instanceof ScopeError || error instanceof ValidationError) {
      throw new NonRetriableError(error.message, { cause: error })
    }
    throw error
  }
}

/**
 * Creates the durable function bound to an analysis service.
 */
export function createAnalyzeDocumentFunction(service: AnalysisService) {
  return inngest.createFunction(
    {
      id: "analyze-document",
      concurrency: CONCURRENCY.analysis,
      retries: RETRY_CONFIG.analysis.retries,
    },
    { event: "analysis/requested" },
    async ({ event, step }) => {
      return await step.run("run-analysis", () => executeAnalysisRequest(service, event.data))
    }
  )
}

/**
 * Queues an analysis run. Resolves once the event is accepted.
 *
 * @returns Inngest event ids
 * @throws ValidationError when the payload is invalid
 */
export async function requestAnalysis(payload: AnalysisRequestedPayload): Promise<string[]> {
  const parsed = analysisRequestedPayload.safeParse(payload)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }

  const requestedAt = parsed.data.requestedAt ?? Date.now()
  const { ids } = await inngest.send({
    // Deduplicates double submissions of the same request
    id: `analysis-${parsed.data.userId}-${parsed.data.documentId}-${requestedAt}`,
    name: "analysis/requested",
    data: { ...parsed.data, requestedAt },
  })
  logger.info("Analysis requested", {
    documentId: parsed.data.documentId,
    userId: parsed.data.userId,
  })
  return ids
}
