/**
 * @fileoverview Validation Messages for the Analysis Pipeline
 *
 * Error codes and plain language messages for the deterministic gates that
 * run before (indexing) and during (answer validation) an analysis.
 *
 * @module agents/validation/messages
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Result of a validation gate check.
 */
export interface ValidationResult {
  /** Whether the validation passed */
  valid: boolean
  /** Error details if validation failed */
  error?: {
    /** Error code for logging (e.g., UNSUPPORTED_FIGURES) */
    code: string
    /** Plain language message for display */
    userMessage: string
    /** Which stage failed (e.g., indexing, validation) */
    stage: string
    suggestion?: string
  }
}

// ============================================================================
// Message Templates
// ============================================================================

export const VALIDATION_MESSAGES = {
  EMPTY_DOCUMENT: {
    userMessage: "The document has no text to index.",
    suggestion: "Check that the filing was parsed before indexing.",
  },
  NO_CHUNKS: {
    userMessage: "The document couldn't be split into searchable sections.",
    suggestion: "Try a different document or file format.",
  },
  EMPTY_ANSWER: {
    userMessage: "The analyst produced an empty answer.",
  },
  UNSUPPORTED_FIGURES: {
    userMessage: "The answer quotes figures that do not appear in the retrieved context.",
    suggestion: "The question will be researched again.",
  },
} as const

export type ValidationCode = keyof typeof VALIDATION_MESSAGES

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Formats a validation error with the appropriate message template.
 * `detail` is appended to the user message when given.
 */
export function formatValidationError(
  code: ValidationCode,
  stage: string,
  detail?: string
): NonNullable<ValidationResult["error"]> {
  const message: { userMessage: string; suggestion?: string } = VALIDATION_MESSAGES[code]
  return {
    code,
    stage,
    userMessage: detail ? `${message.userMessage} ${detail}` : message.userMessage,
    suggestion: message.suggestion,
  }
}
