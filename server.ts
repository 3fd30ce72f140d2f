/**
 * @fileoverview Inngest Serve Handler
 *
 * Node HTTP server exposing the webhook endpoint Inngest calls to register
 * and invoke the background analysis function.
 *
 * Environment variables required besides lib/config:
 * - INNGEST_EVENT_KEY: For sending events
 * - INNGEST_SIGNING_KEY: For webhook signature verification
 *
 * @see {@link https://www.inngest.com/docs/reference/serve}
 */

import "./instrument"
import { createServer, type ServerResponse } from "node:http"
import { serve } from "inngest/node"
import { inngest } from "@/inngest"
import { createFunctions } from "@/inngest/functions"
import { loadConfig } from "@/lib/config"
import { NotFoundError, errorMessage, toAppError } from "@/lib/errors"
import { createContainer } from "@/lib/container"
import { logger } from "@/lib/logger"

const INNGEST_PATH = "/api/inngest"

const container = createContainer(loadConfig())

const handler = serve({
  client: inngest,
  functions: createFunctions(container.analysis),
  servePath: INNGEST_PATH,
})

function sendError(res: ServerResponse, error: unknown): void {
  const appError = toAppError(error)
  if (res.headersSent) {
    res.end()
    return
  }
  res.writeHead(appError.statusCode, { "Content-Type": "application/json" })
  res.end(JSON.stringify(appError.toJSON()))
}

const server = createServer((req, res) => {
  if (req.url?.startsWith(INNGEST_PATH)) {
    Promise.resolve(handler(req, res)).catch((error: unknown) => {
      logger.error("Inngest handler failed", { error: errorMessage(error) })
      sendError(res, error)
    })
    return
  }
  sendError(res, new NotFoundError(`No route for ${req.url ?? "/"}`))
})

server.listen(container.config.port, () => {
  logger.info("Inngest endpoint listening", {
    port: container.config.port,
    path: INNGEST_PATH,
  })
})
