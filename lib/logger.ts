import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Analysis started", { documentId: "doc-1", userId: "user-1" })
 * logger.warn("Progress write failed", { key: "user-1/doc-1/status.json" })
 * logger.error("Stage failed", { stage: "research", error: err.message })
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Research attempt ${attempt} for ${documentId}`)
 * ```
 */
export const logger = Sentry.logger

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt
