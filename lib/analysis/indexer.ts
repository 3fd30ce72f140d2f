/**
 * @fileoverview Document Index
 *
 * Writes a document's chunks into the vector store and removes everything
 * stored for a document. Chunking itself happens upstream; this module
 * receives chunk text plus provenance metadata.
 *
 * @module lib/analysis/indexer
 */

import { validateDocumentChunks } from "@/agents/validation"
import type { AnalysisScope } from "@/agents/types"
import { VOYAGE_CONFIG, type Embedder } from "../embeddings"
import { ScopeError, ValidationError } from "../errors"
import { logger } from "../logger"
import type { VectorRecord, VectorStore } from "../storage/types"
import type { ProgressStore, ResultStore } from "./progress-store"

export interface DocumentChunkInput {
  text: string
  /** Provenance such as `source`, `page`, `country` */
  metadata?: Record<string, unknown>
}

export interface IndexResult {
  chunksIndexed: number
  chunksSkipped: number
  embeddingTokens: number
}

/** Anything holding retrieval results that go stale after re-indexing */
export interface RetrievalCache {
  clearCache(): void
}

export interface DocumentIndexDeps {
  embedder: Embedder
  vectorStore: VectorStore
  progress: ProgressStore
  results: ResultStore
  retrievalCache: RetrievalCache
}

function requireScope(scope: AnalysisScope): { documentId: string; userId: string } {
  if (!scope.documentId || !scope.userId) {
    throw new ScopeError("documentId and userId are required")
  }
  return { documentId: scope.documentId, userId: scope.userId }
}

/** Stable per-chunk id, so re-indexing overwrites instead of duplicating */
export function chunkId(documentId: string, index: number): string {
  return `${documentId}-${index}`
}

export class DocumentIndex {
  constructor(private readonly deps: DocumentIndexDeps) {}

  /**
   * Embeds and upserts the non-blank chunks of a document.
   *
   * @throws ScopeError when either id is missing
   * @throws ValidationError when there is nothing to index
   */
  async indexDocument(scope: AnalysisScope, chunks: DocumentChunkInput[]): Promise<IndexResult> {
    const { documentId, userId } = requireScope(scope)

    const { valid, error } = validateDocumentChunks(chunks)
    if (!valid) {
      const message = error?.userMessage ?? "Invalid chunks"
      throw new ValidationError(message, [{ field: "chunks", message, code: error?.code }])
    }

    const indexed = chunks
      .map((chunk, index) => ({ ...chunk, index }))
      .filter((chunk) => chunk.text.trim().length > 0)

    let embeddingTokens = 0
    for (let start = 0; start < indexed.length; start += VOYAGE_CONFIG.batchLimit) {
      const batch = indexed.slice(start, start + VOYAGE_CONFIG.batchLimit)
      const { embeddings, totalTokens } = await this.deps.embedder.embedBatch(
        batch.map((chunk) => chunk.text),
        "document"
      )
      embeddingTokens += totalTokens

      const records: VectorRecord[] = batch.map((chunk, i) => ({
        id: chunkId(documentId, chunk.index),
        vector: embeddings[i],
        documentId,
        userId,
        metadata: { ...chunk.metadata, text: chunk.text },
      }))
      await this.deps.vectorStore.upsert(records)
    }

    this.deps.retrievalCache.clearCache()

    const result = {
      chunksIndexed: indexed.length,
      chunksSkipped: chunks.length - indexed.length,
      embeddingTokens,
    }
    logger.info("Document indexed", { documentId, userId, ...result })
    return result
  }

  /**
   * Deletes the document's vectors, progress snapshot and analysis result.
   *
   * @throws ScopeError when either id is missing
   */
  async removeDocument(scope: AnalysisScope): Promise<void> {
    const { documentId, userId } = requireScope(scope)

    await this.deps.vectorStore.delete({ documentId, userId })
    await this.deps.progress.delete(userId, documentId)
    await this.deps.results.delete(userId, documentId)
    this.deps.retrievalCache.clearCache()

    logger.info("Document removed", { documentId, userId })
  }
}
