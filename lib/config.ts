/**
 * @fileoverview Runtime Configuration
 *
 * Parses and validates environment variables once at process start.
 * Services receive the parsed config explicitly; nothing else reads
 * `process.env` for settings.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ConfigurationError } from "./errors"

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1")

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),

  /** Postgres (pgvector) connection string */
  DATABASE_URL: z.string().url(),
  /** Voyage AI key for query and chunk embeddings */
  VOYAGE_API_KEY: z.string().min(1),
  /** Vercel Blob read/write token for status and result documents */
  BLOB_READ_WRITE_TOKEN: z.string().min(1),
  /** Optional NewsAPI key; without it the risk feed returns nothing */
  NEWS_API_KEY: z.string().min(1).optional(),
  SENTRY_DSN: z.string().url().optional(),

  ENABLE_GEOPOLITICAL_ANALYSIS: booleanFlag,
  /** Research attempts before an unvalidated answer is surfaced as failed */
  MAX_RESEARCH_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRIEVAL_TOP_K: z.coerce.number().int().min(1).max(50).default(8),
})

export type Env = z.infer<typeof envSchema>

export interface AppConfig {
  nodeEnv: Env["NODE_ENV"]
  port: number
  databaseUrl: string
  voyageApiKey: string
  blobToken: string
  newsApiKey?: string
  sentryDsn?: string
  analysis: {
    enableGeopolitical: boolean
    maxResearchAttempts: number
    retrievalTopK: number
  }
}

/**
 * Parse the environment into an {@link AppConfig}.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error)
  }

  const e = parsed.data
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    voyageApiKey: e.VOYAGE_API_KEY,
    blobToken: e.BLOB_READ_WRITE_TOKEN,
    newsApiKey: e.NEWS_API_KEY,
    sentryDsn: e.SENTRY_DSN,
    analysis: {
      enableGeopolitical: e.ENABLE_GEOPOLITICAL_ANALYSIS,
      maxResearchAttempts: e.MAX_RESEARCH_ATTEMPTS,
      retrievalTopK: e.RETRIEVAL_TOP_K,
    },
  }
}
