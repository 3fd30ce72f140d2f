// test/setup-unit.ts
// Setup for unit tests. Nothing here may reach the network or a real database;
// the pgvector tests build their own in-process database (test/pglite.ts).
import { vi } from "vitest"

// Guard against tests that accidentally construct the Neon client
vi.mock("@/db/client", () => ({
  createDatabase: () => {
    throw new Error(
      "Unit test attempted to open a database connection. Use createTestDatabase() instead."
    )
  },
}))

// Each test controls its own configuration explicitly
vi.stubEnv("NODE_ENV", "test")
