/**
 * @fileoverview Validation Gates for the Analysis Pipeline
 *
 * Deterministic checks that run without a model call:
 * - chunk input to the document index
 * - figures quoted by the analyst against the retrieved context
 *
 * The figure gate runs before the model gate in the validator; a failure
 * here sends the run straight back to research.
 *
 * @module agents/validation/gates
 */

import { formatValidationError, type ValidationResult } from "./messages"

// ============================================================================
// Document Index Validation
// ============================================================================

/**
 * Validates chunks before they are embedded and indexed.
 *
 * Checks for:
 * - No chunks at all (NO_CHUNKS)
 * - Only empty or whitespace-only chunks (EMPTY_DOCUMENT)
 */
export function validateDocumentChunks(
  chunks: Array<{ text: string }>
): ValidationResult {
  if (chunks.length === 0) {
    return {
      valid: false,
      error: formatValidationError("NO_CHUNKS", "indexing"),
    }
  }

  if (chunks.every((chunk) => chunk.text.trim().length === 0)) {
    return {
      valid: false,
      error: formatValidationError("EMPTY_DOCUMENT", "indexing"),
    }
  }

  return { valid: true }
}

// ============================================================================
// Figure Validation
// ============================================================================

/** A single label prefix with its number: `Source 3`, `Sources 1`, `GEO-2` */
const LABEL_ITEM = String.raw`(?:(?:sources?|geo)[\s-]*)?\d+`

/**
 * Provenance labels, singly or grouped: `[Source 3]`, `[GEO-2]`,
 * `[Source 1, 2]`, `[Sources 1-3]`, `[Source 1 and Source 4]`
 */
const CITATION_LABEL = new RegExp(
  String.raw`\[(?:sources?|geo)[\s-]*\d+(?:\s*(?:,|;|-|\u2013|and|&)\s*${LABEL_ITEM})*\]`,
  "gi"
)

/** Ordered-list markers at the start of a line ("1. ", "2) ") */
const LIST_MARKER = /^\s*\d+[.)]\s+/gm

/** Integers and decimals, with optional thousands separators */
const FIGURE = /\d+(?:,\d{3})*(?:\.\d+)?/g

/**
 * Normalises a figure so "1,200", "1200" and "1200.0" compare equal.
 */
function normalizeFigure(raw: string): string {
  return String(Number(raw.replace(/,/g, "")))
}

/**
 * Extracts the set of normalised figures quoted in a text, ignoring
 * citation labels and list numbering.
 */
export function extractFigures(text: string): Set<string> {
  const stripped = text.replace(CITATION_LABEL, " ").replace(LIST_MARKER, "")
  const figures = new Set<string>()
  for (const match of stripped.matchAll(FIGURE)) {
    figures.add(normalizeFigure(match[0]))
  }
  return figures
}

/**
 * Figures quoted in the answer that the context never mentions, in order
 * of first appearance.
 */
export function findUnsupportedFigures(answer: string, context: string): string[] {
  const available = extractFigures(context)
  return [...extractFigures(answer)].filter((figure) => !available.has(figure))
}

/**
 * Validates that every figure in the answer appears in the context.
 */
export function validateAnswerFigures(
  answer: string,
  context: string
): ValidationResult {
  if (answer.trim().length === 0) {
    return {
      valid: false,
      error: formatValidationError("EMPTY_ANSWER", "validation"),
    }
  }

  const unsupported = findUnsupportedFigures(answer, context)
  if (unsupported.length > 0) {
    return {
      valid: false,
      error: formatValidationError(
        "UNSUPPORTED_FIGURES",
        "validation",
        `Unsupported: ${unsupported.join(", ")}.`
      ),
    }
  }

  return { valid: true }
}
