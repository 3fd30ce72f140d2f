/**
 * @fileoverview Test Utilities for Inngest Functions
 *
 * Mock events and steps for exercising function handlers without an
 * Inngest server.
 *
 * @module inngest/utils/test-helpers
 */

import { randomUUID } from "node:crypto"
import type { InngestEvents } from "../types"

/**
 * Result from a step.run() call, tracked for assertions.
 */
export interface StepResult<T = unknown> {
  name: string
  result: T
  /** Sequence number tracking execution order */
  sequence: number
}

export interface MockStep {
  /** Execute a named step function */
  run: <T>(name: string, fn: () => Promise<T> | T) => Promise<T>
}

export interface MockStepController {
  /** The mock step object to pass to handlers */
  step: MockStep
  /** Steps that completed, in order */
  getStepResults: () => StepResult[]
  reset: () => void
}

/**
 * Create a typed mock event.
 *
 * @example
 * const event = createMockEvent("analysis/requested", {
 *   question: "What was total revenue?",
 *   documentId: "doc-1",
 *   userId: "user-1",
 * })
 */
export function createMockEvent<K extends keyof InngestEvents>(
  name: K,
  data: InngestEvents[K]["data"]
): {
  name: K
  data: InngestEvents[K]["data"]
  ts: number
  id: string
} {
  return {
    name,
    data,
    ts: Date.now(),
    id: randomUUID(),
  }
}

/**
 * Create a mock step that runs each step body immediately and records
 * the results.
 *
 * @example
 * const { step, getStepResults } = createMockStep()
 * await handler({ event, step })
 * expectStepExecuted(getStepResults(), "run-analysis")
 */
export function createMockStep(): MockStepController {
  const stepResults: StepResult[] = []
  let sequenceCounter = 0

  const step: MockStep = {
    async run<T>(name: string, fn: () => Promise<T> | T): Promise<T> {
      const result = await fn()
      stepResults.push({ name, result, sequence: sequenceCounter++ })
      return result
    },
  }

  return {
    step,
    getStepResults: () => [...stepResults],
    reset: () => {
      stepResults.length = 0
      sequenceCounter = 0
    },
  }
}

/**
 * Assert that a step with the given name was executed.
 *
 * @throws Error listing the executed steps when it was not
 */
export function expectStepExecuted(stepResults: StepResult[], expectedName: string): void {
  const found = stepResults.find((r) => r.name === expectedName)
  if (!found) {
    const executedSteps = stepResults.map((r) => r.name).join(", ")
    throw new Error(
      `Expected step "${expectedName}" to be executed. ` +
        `Executed steps: [${executedSteps || "none"}]`
    )
  }
}
