/**
 * @fileoverview Embedding Cache
 *
 * LRU cache for Voyage AI embeddings to avoid redundant API calls when the
 * same question is re-researched or a document is re-indexed.
 * Uses a content hash as cache key for deduplication.
 *
 * @module lib/cache/embedding-cache
 */

import { LRUCache } from "lru-cache"
import { createHash } from "crypto"

export type EmbeddingInputType = "document" | "query"

/**
 * Cached embedding entry.
 */
export interface CachedEmbedding {
  embedding: number[]
  tokens: number
  cachedAt: number
}

/**
 * Cache statistics.
 */
export interface EmbeddingCacheStats {
  hits: number
  misses: number
  size: number
  hitRate: number
}

export interface EmbeddingCacheOptions {
  /** Default 10,000 entries (~40MB at 1024 dimensions) */
  max?: number
  /** Default 1 hour */
  ttlMs?: number
}

/**
 * Generate cache key from text content.
 * Normalizes whitespace and case for better hit rate.
 */
export function getCacheKey(text: string, inputType: EmbeddingInputType): string {
  const normalized = text.trim().toLowerCase().replace(/\s+/g, " ")
  const hash = createHash("sha256").update(normalized).digest("hex").substring(0, 16)
  return `emb:${inputType}:${hash}`
}

/**
 * Per-client embedding cache. One instance is created with the embedding
 * client at process start.
 */
export class EmbeddingCache {
  private readonly cache: LRUCache<string, CachedEmbedding>
  private hits = 0
  private misses = 0

  constructor(options: EmbeddingCacheOptions = {}) {
    this.cache = new LRUCache<string, CachedEmbedding>({
      max: options.max ?? 10_000,
      ttl: options.ttlMs ?? 1000 * 60 * 60,
    })
  }

  get(text: string, inputType: EmbeddingInputType): CachedEmbedding | null {
    const cached = this.cache.get(getCacheKey(text, inputType))
    if (cached) {
      this.hits++
      return cached
    }
    this.misses++
    return null
  }

  set(
    text: string,
    inputType: EmbeddingInputType,
    embedding: number[],
    tokens: number
  ): void {
    this.cache.set(getCacheKey(text, inputType), {
      embedding,
      tokens,
      cachedAt: Date.now(),
    })
  }

  /**
   * Look up several texts at once.
   * Returns map of index -> cached embedding for hits.
   */
  getMany(texts: string[], inputType: EmbeddingInputType): Map<number, CachedEmbedding> {
    const results = new Map<number, CachedEmbedding>()
    texts.forEach((text, i) => {
      const cached = this.get(text, inputType)
      if (cached) results.set(i, cached)
    })
    return results
  }

  stats(): EmbeddingCacheStats {
    const total = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      hitRate: total === 0 ? 0 : this.hits / total,
    }
  }

  clear(): void {
    this.cache.clear()
    this.hits = 0
    this.misses = 0
  }
}
