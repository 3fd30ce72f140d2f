/**
 * Neon Serverless Database Client
 *
 * Drizzle ORM over the Neon HTTP driver. Each query is an independent HTTP
 * request, so there is no pool to manage or close.
 *
 * @see {@link https://orm.drizzle.team/docs/get-started-postgresql#neon} Drizzle + Neon Setup
 *
 * @module db/client
 */

import { neon } from "@neondatabase/serverless"
import { drizzle } from "drizzle-orm/neon-http"
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core"
import * as schema from "./schema"

/**
 * Any Drizzle Postgres database carrying the application schema. Production
 * uses Neon HTTP; tests pass an in-process PGlite database.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>

export function createDatabase(url: string): Database {
  return drizzle(neon(url), { schema })
}
