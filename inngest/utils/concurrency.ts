/**
 * @fileoverview Concurrency Configuration for Inngest Functions
 *
 * Concurrency limits and retry strategies for background analysis runs.
 * Per-user keys ensure one user's backlog doesn't block others.
 *
 * @module inngest/utils/concurrency
 */

export const CONCURRENCY = {
  /**
   * Analysis workflow runs. Each run makes several model calls, so keep
   * a user to a handful at a time.
   */
  analysis: { limit: 5, key: "event.data.userId" },
} as const

export const RETRY_CONFIG = {
  /**
   * A retry restarts the run from research. Validation failures are not
   * errors and never reach this limit.
   */
  analysis: { retries: 2 },
} as const

export type ConcurrencyConfig = (typeof CONCURRENCY)[keyof typeof CONCURRENCY]

export type RetryConfig = (typeof RETRY_CONFIG)[keyof typeof RETRY_CONFIG]
