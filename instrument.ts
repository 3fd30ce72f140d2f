/**
 * @fileoverview Sentry bootstrap
 *
 * Imported first by server.ts so the SDK patches `http` and the AI SDK
 * before they load. Without `SENTRY_DSN` the SDK stays disabled and
 * `Sentry.logger` calls are dropped.
 *
 * @module instrument
 */

import * as Sentry from "@sentry/node"

const isProduction = process.env.NODE_ENV === "production"

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.NODE_ENV ?? "development",
  enableLogs: true,

  integrations: [
    // Token counts only; prompts and completions are not recorded
    Sentry.vercelAIIntegration({
      recordInputs: false,
      recordOutputs: false,
    }),
  ],

  tracesSampler: ({ name, parentSampled }) => {
    // Inngest registration (PUT) and introspection (GET)
    if (name.startsWith("PUT") || name.startsWith("GET")) {
      return isProduction ? 0.05 : 1.0
    }
    if (typeof parentSampled === "boolean") {
      return parentSampled
    }
    return isProduction ? 0.2 : 1.0
  },
})
