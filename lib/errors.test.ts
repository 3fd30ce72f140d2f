import { describe, it, expect } from "vitest"
import {
  AppError,
  ValidationError,
  NotFoundError,
  InternalError,
  ScopeError,
  ExternalServiceError,
  ConfigurationError,
  AnalysisFailedError,
  toAppError,
  errorMessage,
} from "./errors"

describe("Error Classes", () => {
  describe("AppError", () => {
    it("creates error with all properties", () => {
      const error = new AppError("VALIDATION_ERROR", "Something went wrong", 400, [
        { field: "question", message: "Required" },
      ])

      expect(error.code).toBe("VALIDATION_ERROR")
      expect(error.message).toBe("Something went wrong")
      expect(error.statusCode).toBe(400)
      expect(error.details).toEqual([{ field: "question", message: "Required" }])
      expect(error.isOperational).toBe(true)
      expect(error.name).toBe("AppError")
    })

    it("serializes to JSON without empty details", () => {
      const error = new AppError("NOT_FOUND", "Analysis not found", 404)

      expect(error.toJSON()).toEqual({
        code: "NOT_FOUND",
        message: "Analysis not found",
      })
    })
  })

  describe("Specialized Error Classes", () => {
    it("ValidationError.fromZodError converts Zod issues", () => {
      const error = ValidationError.fromZodError({
        issues: [
          { path: ["scope", "documentId"], message: "Required" },
          { path: ["question"], message: "Too short" },
        ],
      })

      expect(error.details).toEqual([
        { field: "scope.documentId", message: "Required" },
        { field: "question", message: "Too short" },
      ])
    })

    it("ScopeError is a 400 with its own code", () => {
      const error = new ScopeError()
      expect(error.code).toBe("SCOPE_ERROR")
      expect(error.statusCode).toBe(400)
      expect(error.message).toBe("A document or user scope is required")
    })

    it("NotFoundError is a 404", () => {
      const error = new NotFoundError("No route for /health")
      expect(error.statusCode).toBe(404)
      expect(error.toJSON()).toEqual({ code: "NOT_FOUND", message: "No route for /health" })
    })

    it("ExternalServiceError prefixes the service name", () => {
      const error = new ExternalServiceError("vector-store", "connection refused")
      expect(error.code).toBe("SERVICE_UNAVAILABLE")
      expect(error.statusCode).toBe(503)
      expect(error.service).toBe("vector-store")
      expect(error.message).toBe("vector-store: connection refused")
    })

    it("ConfigurationError.fromZodError lists the invalid variables", () => {
      const error = ConfigurationError.fromZodError({
        issues: [{ path: ["DATABASE_URL"], message: "Invalid URL" }],
      })
      expect(error.code).toBe("CONFIGURATION_ERROR")
      expect(error.details).toEqual([{ field: "DATABASE_URL", message: "Invalid URL" }])
    })

    it("AnalysisFailedError carries details", () => {
      const error = new AnalysisFailedError("Run failed", [
        { field: "research", message: "timeout" },
      ])
      expect(error.toJSON()).toEqual({
        code: "ANALYSIS_FAILED",
        message: "Run failed",
        details: [{ field: "research", message: "timeout" }],
      })
    })
  })

  describe("toAppError", () => {
    it("returns AppError unchanged", () => {
      const original = new ScopeError("Test")
      expect(toAppError(original)).toBe(original)
    })

    it("wraps regular Error in InternalError", () => {
      const result = toAppError(new Error("Something broke"))
      expect(result).toBeInstanceOf(InternalError)
      expect(result.code).toBe("INTERNAL_ERROR")
    })

    it("wraps non-Error values in InternalError", () => {
      expect(toAppError("string error")).toBeInstanceOf(InternalError)
      expect(toAppError(null)).toBeInstanceOf(InternalError)
    })
  })

  describe("errorMessage", () => {
    it("reads Error messages and stringifies everything else", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom")
      expect(errorMessage("plain")).toBe("plain")
      expect(errorMessage(42)).toBe("42")
    })
  })
})
