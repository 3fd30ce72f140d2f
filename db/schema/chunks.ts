/**
 * @fileoverview Document chunk embeddings.
 *
 * One row per indexed chunk. `document_id` and `user_id` are opaque scope
 * identifiers owned by the upstream document service; every read and delete
 * filters on at least one of them. Chunk ids are unique per user, so two
 * users may index the same document id without touching each other's rows.
 *
 * @module db/schema/chunks
 */

import { index, jsonb, pgTable, primaryKey, text, timestamp, vector } from "drizzle-orm/pg-core"

export const EMBEDDING_DIMENSIONS = 1024

export const documentChunks = pgTable(
  "document_chunks",
  {
    id: text("id").notNull(),
    documentId: text("document_id").notNull(),
    userId: text("user_id").notNull(),
    content: text("content").notNull(),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.id] }),
    index("idx_chunks_document").on(table.documentId),
    index("idx_chunks_user").on(table.userId),
    index("idx_chunks_embedding").using("hnsw", table.embedding.op("vector_cosine_ops")),
  ]
)

export type DocumentChunk = typeof documentChunks.$inferSelect
export type NewDocumentChunk = typeof documentChunks.$inferInsert
