/**
 * @fileoverview pgvector-backed vector store.
 *
 * pgvector's `cosineDistance()` returns a distance (0 = identical,
 * 2 = opposite); matches report `similarity = 1 - distance`, so scores fall
 * in [-1, 1] with 1 meaning identical.
 *
 * The HNSW index only accelerates `ORDER BY` on the distance, so no
 * threshold is applied in SQL. Callers filter by score if they need to.
 *
 * @module db/queries/vector-store
 */

import { and, cosineDistance, desc, eq, sql, type SQL } from "drizzle-orm"
import type { Database } from "../client"
import { documentChunks } from "../schema"
import { ScopeError } from "@/lib/errors"
import type {
  VectorFilter,
  VectorMatch,
  VectorQuery,
  VectorRecord,
  VectorStore,
} from "@/lib/storage/types"

/**
 * Build the scope predicate for a filter. Refuses an empty filter so no
 * query or delete can span every tenant.
 */
function scopeConditions(filter: VectorFilter): SQL {
  const conditions: SQL[] = []
  if (filter.documentId) {
    conditions.push(eq(documentChunks.documentId, filter.documentId))
  }
  if (filter.userId) {
    conditions.push(eq(documentChunks.userId, filter.userId))
  }
  const combined = and(...conditions)
  if (!combined) {
    throw new ScopeError()
  }
  return combined
}

/**
 * Splits record metadata into the chunk text column and the remaining
 * JSON metadata. The text is returned to callers as `metadata.text`.
 */
function splitText(metadata: Record<string, unknown>): {
  content: string
  rest: Record<string, unknown>
} {
  const { text, ...rest } = metadata
  return { content: typeof text === "string" ? text : "", rest }
}

export class PgVectorStore implements VectorStore {
  constructor(private readonly db: Database) {}

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return

    const rows = records.map((record) => {
      const { content, rest } = splitText(record.metadata)
      return {
        id: record.id,
        documentId: record.documentId,
        userId: record.userId,
        content,
        metadata: rest,
        embedding: record.vector,
      }
    })

    await this.db
      .insert(documentChunks)
      .values(rows)
      .onConflictDoUpdate({
        // Scope columns are never reassigned on conflict
        target: [documentChunks.userId, documentChunks.id],
        set: {
          content: sql`excluded.content`,
          metadata: sql`excluded.metadata`,
          embedding: sql`excluded.embedding`,
        },
      })
  }

  async query({
    vector,
    topK,
    filter,
    includeMetadata = true,
  }: VectorQuery): Promise<VectorMatch[]> {
    const similarity = sql<number>`1 - (${cosineDistance(documentChunks.embedding, vector)})`

    const rows = await this.db
      .select({
        id: documentChunks.id,
        content: documentChunks.content,
        metadata: documentChunks.metadata,
        similarity,
      })
      .from(documentChunks)
      .where(scopeConditions(filter))
      .orderBy(desc(similarity))
      .limit(topK)

    return rows.map((row) => ({
      id: row.id,
      // Drivers may hand back numeric expressions as strings
      score: Number(row.similarity),
      metadata: includeMetadata ? { ...row.metadata, text: row.content } : {},
    }))
  }

  async delete(filter: VectorFilter): Promise<void> {
    await this.db.delete(documentChunks).where(scopeConditions(filter))
  }
}
