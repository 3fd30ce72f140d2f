/**
 * @fileoverview Inngest Module - Main Entry Point
 *
 * Barrel export for the client, event schemas and configuration. Functions
 * are NOT exported here: they need a service container, so only the serve
 * handler builds them (`createFunctions` from "@/inngest/functions").
 *
 * Test helpers are intentionally NOT exported from this barrel. Import them
 * directly in test files:
 * ```typescript
 * import { createMockEvent, createMockStep } from "@/inngest/utils/test-helpers"
 * ```
 *
 * @module inngest
 */

// =============================================================================
// Client
// =============================================================================

export { inngest } from "./client"
export type { InngestClient } from "./client"

// =============================================================================
// Event Types & Schemas
// =============================================================================

export * from "./types"

// =============================================================================
// Concurrency & Retry Configuration
// =============================================================================

export { CONCURRENCY, RETRY_CONFIG } from "./utils/concurrency"
