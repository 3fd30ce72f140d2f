/**
 * @fileoverview Inngest Client Configuration
 *
 * Singleton Inngest client for the filing analyst. All durable functions
 * are created with this client.
 *
 * @module inngest/client
 * @see {@link https://www.inngest.com/docs/reference/client/create}
 */

import { Inngest, EventSchemas } from "inngest"
import type { InngestEvents } from "./types"

/**
 * Inngest client instance.
 *
 * @example
 * ```typescript
 * import { inngest } from "@/inngest/client"
 *
 * export const analyzeDocument = inngest.createFunction(
 *   { id: "analyze-document", concurrency: CONCURRENCY.analysis },
 *   { event: "analysis/requested" },
 *   async ({ event, step }) => {
 *     const payload = analysisRequestedPayload.parse(event.data)
 *     return step.run("run-analysis", () => service.runAnalysis(...))
 *   }
 * )
 * ```
 */
export const inngest = new Inngest({
  id: "filing-analyst",
  schemas: new EventSchemas().fromRecord<InngestEvents>(),
})

export type InngestClient = typeof inngest
