/**
 * @fileoverview Validation Gates for the Analysis Pipeline
 *
 * @module agents/validation
 */

export {
  validateDocumentChunks,
  validateAnswerFigures,
  findUnsupportedFigures,
  extractFigures,
} from "./gates"
export {
  VALIDATION_MESSAGES,
  formatValidationError,
  type ValidationResult,
  type ValidationCode,
} from "./messages"
