/**
 * @fileoverview Inngest Event Type Definitions
 *
 * Event schemas for the background analysis runner. Event names follow
 * `<domain>/<action>`. Payloads are validated with zod before processing.
 *
 * @module inngest/types
 */

import { z } from "zod"

/**
 * Analysis request - starts one workflow run for a question against a
 * document. Clients poll `{userId}/{documentId}/status.json` for progress.
 */
export const analysisRequestedPayload = z.object({
  question: z.string().trim().min(1),
  documentId: z.string().min(1),
  userId: z.string().min(1),
  /** Timestamp when analysis was requested (for deterministic event IDs) */
  requestedAt: z.number().int().positive().optional(),
})

export type AnalysisRequestedPayload = z.infer<typeof analysisRequestedPayload>

/**
 * Event registry for the Inngest client.
 */
export type InngestEvents = {
  "analysis/requested": { data: AnalysisRequestedPayload }
}

export type InngestEventName = keyof InngestEvents
