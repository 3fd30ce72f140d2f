/**
 * @fileoverview Storage Contracts
 *
 * Interfaces for the two external stores the analysis core talks to.
 * Concrete adapters live in `db/queries/vector-store.ts` (pgvector) and
 * `lib/blob.ts` (Vercel Blob); tests use the in-memory fakes from
 * `agents/testing/in-memory-stores.ts`.
 *
 * @module lib/storage/types
 */

/** Metadata filter for vector queries and deletes. */
export interface VectorFilter {
  documentId?: string
  userId?: string
}

/** A record written to the vector index. */
export interface VectorRecord {
  id: string
  vector: number[]
  documentId: string
  userId: string
  metadata: Record<string, unknown>
}

/** A raw nearest-neighbour match as returned by the index. */
export interface VectorMatch {
  id: string
  score: number
  metadata: Record<string, unknown>
}

export interface VectorQuery {
  vector: number[]
  topK: number
  filter: VectorFilter
  includeMetadata?: boolean
}

export interface VectorStore {
  upsert(records: VectorRecord[]): Promise<void>
  query(query: VectorQuery): Promise<VectorMatch[]>
  delete(filter: VectorFilter): Promise<void>
}

export interface ObjectStore {
  saveJson(data: unknown, key: string): Promise<void>
  /** Resolves to null when the key does not exist. */
  getJson(key: string): Promise<unknown>
  uploadFile(filePath: string, key: string): Promise<string>
  downloadFile(key: string, localPath: string): Promise<string>
  deleteFile(key: string): Promise<void>
}
