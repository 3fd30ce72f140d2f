/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new ScopeError("documentId or userId is required")
 *   throw new ExternalServiceError("vector-store", "connection refused")
 *   throw new ConfigurationError("Invalid configuration", [{ field: "DATABASE_URL", message: "Required" }])
 *
 * At the HTTP boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     res.writeHead(appError.statusCode).end(JSON.stringify(appError))
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  | "SERVICE_UNAVAILABLE"
  | "CONFIGURATION_ERROR"
  // Domain-specific error codes for the analysis pipeline
  | "SCOPE_ERROR"
  | "ANALYSIS_FAILED"
  | "EMBEDDING_FAILED"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * 400 Validation Error - Input validation failed
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details)
  }

  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>
  }): ValidationError {
    return new ValidationError("Validation failed", issuesToDetails(error.issues))
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404)
  }
}

/**
 * 500 Internal Error - Unexpected server error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 500)
  }
}

/**
 * 400 Scope Error - Missing or invalid document/user scope.
 * Raised before any I/O so a request can never read another tenant's data.
 */
export class ScopeError extends AppError {
  constructor(message = "A document or user scope is required") {
    super("SCOPE_ERROR", message, 400)
  }
}

/**
 * 503 External Service Error - Vector store, language model or blob store unreachable
 */
export class ExternalServiceError extends AppError {
  constructor(
    public readonly service: string,
    message = "Service temporarily unavailable"
  ) {
    super("SERVICE_UNAVAILABLE", `${service}: ${message}`, 503)
  }
}

/**
 * 500 Configuration Error - Environment failed validation at startup
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIGURATION_ERROR", message, 500, details)
  }

  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>
  }): ConfigurationError {
    return new ConfigurationError("Invalid configuration", issuesToDetails(error.issues))
  }
}

/**
 * 500 Analysis Failed - Analysis pipeline error
 */
export class AnalysisFailedError extends AppError {
  constructor(message = "Analysis failed", details?: ErrorDetail[]) {
    super("ANALYSIS_FAILED", message, 500, details)
  }
}

/**
 * 500 Embedding Failed - Vector embedding generation error
 */
export class EmbeddingFailedError extends AppError {
  constructor(message = "Embedding generation failed") {
    super("EMBEDDING_FAILED", message, 500)
  }
}

function issuesToDetails(
  issues: Array<{ path: PropertyKey[]; message: string }>
): ErrorDetail[] {
  return issues.map((issue) => ({
    field: issue.path.map(String).join("."),
    message: issue.message,
  }))
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    // Don't expose internal error messages in production
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message)
  }

  return new InternalError("An unexpected error occurred")
}

/**
 * Human-readable message for logs and status snapshots.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
