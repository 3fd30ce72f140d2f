/**
 * @fileoverview Voyage AI Embeddings Client
 *
 * Client for generating finance-tuned embeddings using Voyage AI's
 * voyage-finance-2 model with built-in caching. Questions are embedded
 * with input type `query`, indexed chunks with `document`.
 *
 * @module lib/embeddings
 */

import { z } from "zod"
import { EmbeddingCache, type EmbeddingInputType } from "./cache/embedding-cache"
import { EmbeddingFailedError } from "./errors"

/**
 * Voyage AI configuration.
 */
export const VOYAGE_CONFIG = {
  model: "voyage-finance-2",
  dimensions: 1024,
  maxInputTokens: 32_000,
  batchLimit: 128,
  baseUrl: "https://api.voyageai.com/v1",
} as const

/**
 * Single embedding result.
 */
export interface SingleEmbeddingResult {
  embedding: number[]
  tokens: number
  fromCache: boolean
}

/**
 * Batch embedding result.
 */
export interface BatchEmbeddingResult {
  embeddings: number[][]
  totalTokens: number
  cacheHits: number
}

/** What the retrieval gateway and document index need from an embedder. */
export interface Embedder {
  embed(text: string, inputType?: EmbeddingInputType): Promise<SingleEmbeddingResult>
  embedBatch(texts: string[], inputType?: EmbeddingInputType): Promise<BatchEmbeddingResult>
}

/**
 * Voyage AI API response schema.
 */
const voyageResponseSchema = z.object({
  object: z.literal("list"),
  data: z.array(
    z.object({
      object: z.literal("embedding"),
      index: z.number(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string(),
  usage: z.object({
    total_tokens: z.number(),
  }),
})

export interface VoyageAIClientOptions {
  cache?: EmbeddingCache
  fetch?: typeof fetch
}

/**
 * Voyage AI client class.
 */
export class VoyageAIClient implements Embedder {
  private readonly baseUrl = VOYAGE_CONFIG.baseUrl
  private readonly cache: EmbeddingCache
  private readonly fetchImpl: typeof fetch

  constructor(
    private readonly apiKey: string,
    options: VoyageAIClientOptions = {}
  ) {
    if (!apiKey) {
      throw new EmbeddingFailedError("VOYAGE_API_KEY is required")
    }
    this.cache = options.cache ?? new EmbeddingCache()
    this.fetchImpl = options.fetch ?? fetch
  }

  /**
   * Generate embedding for a single text.
   */
  async embed(
    text: string,
    inputType: EmbeddingInputType = "document"
  ): Promise<SingleEmbeddingResult> {
    const result = await this.embedBatch([text], inputType)
    const [embedding] = result.embeddings
    if (!embedding) {
      throw new EmbeddingFailedError("Voyage AI returned no embedding")
    }
    return {
      embedding,
      tokens: result.totalTokens,
      fromCache: result.cacheHits > 0,
    }
  }

  /**
   * Generate embeddings for multiple texts with caching.
   */
  async embedBatch(
    texts: string[],
    inputType: EmbeddingInputType = "document"
  ): Promise<BatchEmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], totalTokens: 0, cacheHits: 0 }
    }

    if (texts.length > VOYAGE_CONFIG.batchLimit) {
      throw new EmbeddingFailedError(
        `Batch size ${texts.length} exceeds limit ${VOYAGE_CONFIG.batchLimit}`
      )
    }

    const cached = this.cache.getMany(texts, inputType)
    const uncachedTexts = texts.filter((_, i) => !cached.has(i))

    let fresh: number[][] = []
    let freshTokens = 0
    if (uncachedTexts.length > 0) {
      const response = await this.request(uncachedTexts, inputType)
      fresh = response.embeddings
      freshTokens = response.totalTokens

      const tokensPerText = Math.floor(freshTokens / uncachedTexts.length)
      uncachedTexts.forEach((text, i) => {
        this.cache.set(text, inputType, fresh[i], tokensPerText)
      })
    }

    // Merge cached and new embeddings in original order
    const embeddings: number[][] = []
    let cachedTokens = 0
    let freshIdx = 0
    texts.forEach((_, i) => {
      const entry = cached.get(i)
      if (entry) {
        embeddings.push(entry.embedding)
        cachedTokens += entry.tokens
      } else {
        embeddings.push(fresh[freshIdx++])
      }
    })

    return {
      embeddings,
      totalTokens: uncachedTexts.length > 0 ? freshTokens : cachedTokens,
      cacheHits: cached.size,
    }
  }

  private async request(
    input: string[],
    inputType: EmbeddingInputType
  ): Promise<{ embeddings: number[][]; totalTokens: number }> {
    const response = await this.fetchImpl(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: VOYAGE_CONFIG.model,
        input,
        input_type: inputType,
      }),
    })

    if (!response.ok) {
      const error = await response.text()
      throw new EmbeddingFailedError(
        `Voyage AI API error (${response.status}): ${error}`
      )
    }

    const parsed = voyageResponseSchema.parse(await response.json())
    if (parsed.data.length !== input.length) {
      throw new EmbeddingFailedError(
        `Voyage AI returned ${parsed.data.length} embeddings for ${input.length} inputs`
      )
    }

    // Sort by index to match input order
    const sorted = [...parsed.data].sort((a, b) => a.index - b.index)
    return {
      embeddings: sorted.map((d) => d.embedding),
      totalTokens: parsed.usage.total_tokens,
    }
  }
}
