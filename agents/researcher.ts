/**
 * @fileoverview Researcher Agent
 *
 * Research stage of the analysis workflow: retrieval through the gateway,
 * then optional geopolitical enrichment. Each chunk is labelled
 * `[Source n]` in the context so the analyst can cite it.
 *
 * A retry after a validation failure widens the search by
 * {@link RETRY_TOP_K_STEP} chunks per extra attempt.
 *
 * @module agents/researcher
 */

import { logger } from '@/lib/logger'
import type { AnalysisScope, RetrievedChunk } from './types'

/** Anything that can retrieve scoped chunks; normally the RetrievalGateway */
export interface Retriever {
  retrieve(query: string, scope: AnalysisScope, topK?: number): Promise<RetrievedChunk[]>
}

/** Optional context enricher; normally the GeopoliticalEnricher */
export interface ContextEnricher {
  enrich(rawContext: string, retrievalMetadata: Array<Record<string, unknown>>): Promise<string>
}

export const RETRY_TOP_K_STEP = 4
export const MAX_TOP_K = 50

export interface ResearcherInput {
  question: string
  scope: AnalysisScope
  /** 1-based research attempt */
  attempt: number
  topK: number
  retriever: Retriever
  /** Null when geopolitical enrichment is disabled */
  enricher: ContextEnricher | null
}

export interface ResearcherOutput {
  context: string
  contexts: string[]
  retrievalScores: number[]
  retrievedSources: string[]
  geopoliticalContext: string
}

/** Human-readable provenance label for a chunk */
export function sourceLabel(chunk: RetrievedChunk): string {
  const { source, filename, page } = chunk.sourceMetadata
  const name =
    typeof source === 'string' ? source : typeof filename === 'string' ? filename : 'Document'
  return typeof page === 'number' || typeof page === 'string' ? `${name} p.${page}` : name
}

export function formatContext(chunks: RetrievedChunk[]): string {
  return chunks.map((chunk, i) => `[Source ${i + 1}] ${chunk.content}`).join('\n\n')
}

export async function runResearcherAgent(input: ResearcherInput): Promise<ResearcherOutput> {
  const { question, scope, attempt, retriever, enricher } = input
  const topK = Math.min(MAX_TOP_K, input.topK + RETRY_TOP_K_STEP * (attempt - 1))

  const chunks = await retriever.retrieve(question, scope, topK)
  logger.info('Research retrieved chunks', { attempt, topK, chunks: chunks.length })

  const contexts = chunks.map((chunk) => chunk.content)
  const geopoliticalContext =
    enricher && chunks.length > 0
      ? await enricher.enrich(
          contexts.join('\n\n'),
          chunks.map((chunk) => chunk.sourceMetadata)
        )
      : ''

  return {
    context: formatContext(chunks),
    contexts,
    retrievalScores: chunks.map((chunk) => chunk.score),
    retrievedSources: chunks.map(sourceLabel),
    geopoliticalContext,
  }
}
