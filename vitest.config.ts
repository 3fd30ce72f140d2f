import { defineConfig } from "vitest/config"
import path from "path"

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./test/setup-unit.ts"],
    include: ["**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    // PGlite instances are heavy; keep files sequential
    fileParallelism: false,
    testTimeout: 20_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules",
        "test/**",
        "**/testing/**",
        "db/schema/index.ts", // Re-export barrel file
        "db/schema/chunks.ts", // Table definition (not business logic)
      ],
    },
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "."),
    },
  },
})
