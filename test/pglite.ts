// test/pglite.ts
// In-process Postgres with pgvector for vector store tests
import { PGlite } from "@electric-sql/pglite"
import { vector } from "@electric-sql/pglite/vector"
import { drizzle } from "drizzle-orm/pglite"
import * as schema from "@/db/schema"
import type { Database } from "@/db/client"

const SCHEMA_SQL = `
  CREATE EXTENSION IF NOT EXISTS vector;

  CREATE TABLE IF NOT EXISTS document_chunks (
    id TEXT NOT NULL,
    document_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    content TEXT NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}',
    embedding VECTOR(${schema.EMBEDDING_DIMENSIONS}) NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (user_id, id)
  );
`

export interface TestDatabase {
  db: Database
  close: () => Promise<void>
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite({ extensions: { vector } })
  await client.exec(SCHEMA_SQL)
  return {
    db: drizzle(client, { schema }),
    close: () => client.close(),
  }
}

/**
 * A unit vector of the embedding width with weight split across the given
 * axes, so cosine similarities are easy to work out by hand.
 */
export function axisVector(weights: Record<number, number>): number[] {
  const v = new Array<number>(schema.EMBEDDING_DIMENSIONS).fill(0)
  for (const [axis, weight] of Object.entries(weights)) {
    v[Number(axis)] = weight
  }
  return v
}
