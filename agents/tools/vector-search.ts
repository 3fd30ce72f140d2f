/**
 * Retrieval Gateway
 *
 * Semantic search over indexed document chunks. Embeds the question with
 * Voyage AI (input type `query`) and queries the vector store with a filter
 * that always carries the document and/or user predicate.
 *
 * Raw vector-store matches pass through an explicit adapter into the fixed
 * {@link RetrievedChunk} struct, so nothing downstream inspects metadata.
 *
 * @module agents/tools/vector-search
 */

import { z } from 'zod'
import { createHash } from 'crypto'
import { LRUCache } from 'lru-cache'
import type { Embedder } from '@/lib/embeddings'
import type { VectorFilter, VectorMatch, VectorStore } from '@/lib/storage/types'
import { ScopeError, ValidationError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import type { AnalysisScope, RetrievedChunk } from '../types'

export const DEFAULT_TOP_K = 8

/** Input schema for retrieval */
export const retrievalInputSchema = z.object({
  query: z.string().trim().min(1),
  topK: z.number().int().min(1).max(50),
})

const chunkMetadataSchema = z.object({
  text: z.string().min(1),
})

/**
 * Maps a raw vector-store match to a {@link RetrievedChunk}.
 * Returns null when the match carries no chunk text.
 */
export function toRetrievedChunk(match: VectorMatch): RetrievedChunk | null {
  const parsed = chunkMetadataSchema.safeParse(match.metadata)
  if (!parsed.success) return null

  const sourceMetadata = Object.fromEntries(
    Object.entries(match.metadata).filter(([key]) => key !== 'text')
  )
  return { content: parsed.data.text, score: match.score, sourceMetadata }
}

/**
 * Builds the vector filter for a scope. Throws before any I/O when the
 * scope names neither a document nor a user.
 */
export function scopeFilter(scope: AnalysisScope): VectorFilter {
  const filter: VectorFilter = {}
  if (scope.documentId) filter.documentId = scope.documentId
  if (scope.userId) filter.userId = scope.userId
  if (!filter.documentId && !filter.userId) {
    throw new ScopeError()
  }
  return filter
}

export interface RetrievalGatewayOptions {
  /** Result cache TTL. Default 5 minutes */
  cacheTtlMs?: number
  /** Result cache size. Default 500 entries */
  cacheMax?: number
}

export class RetrievalGateway {
  private readonly cache: LRUCache<string, RetrievedChunk[]>

  constructor(
    private readonly embedder: Embedder,
    private readonly vectorStore: VectorStore,
    options: RetrievalGatewayOptions = {}
  ) {
    this.cache = new LRUCache<string, RetrievedChunk[]>({
      max: options.cacheMax ?? 500,
      ttl: options.cacheTtlMs ?? 1000 * 60 * 5,
    })
  }

  /**
   * Retrieve the chunks most similar to `query` within `scope`, best first.
   * No match yields an empty list; embedding and vector-store failures
   * propagate.
   *
   * @throws ScopeError when the scope has neither id
   */
  async retrieve(
    query: string,
    scope: AnalysisScope,
    topK: number = DEFAULT_TOP_K
  ): Promise<RetrievedChunk[]> {
    const filter = scopeFilter(scope)
    const input = retrievalInputSchema.safeParse({ query, topK })
    if (!input.success) {
      throw ValidationError.fromZodError(input.error)
    }

    // Hash the query so long questions don't bloat keys
    const queryHash = createHash('sha256').update(input.data.query).digest('hex').slice(0, 16)
    const cacheKey = `${queryHash}:${filter.documentId ?? '*'}:${filter.userId ?? '*'}:${input.data.topK}`
    const cached = this.cache.get(cacheKey)
    if (cached) return cached

    const { embedding } = await this.embedder.embed(input.data.query, 'query')

    const matches = await this.vectorStore.query({
      vector: embedding,
      topK: input.data.topK,
      filter,
      includeMetadata: true,
    })

    const chunks: RetrievedChunk[] = []
    for (const match of matches) {
      const chunk = toRetrievedChunk(match)
      if (chunk) {
        chunks.push(chunk)
      } else {
        logger.warn('Dropping vector match without chunk text', { matchId: match.id })
      }
    }

    this.cache.set(cacheKey, chunks)
    return chunks
  }

  /** Clear the result cache (for testing and after re-indexing) */
  clearCache(): void {
    this.cache.clear()
  }
}
