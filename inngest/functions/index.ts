/**
 * @fileoverview Inngest Function Registry
 *
 * The serve handler registers everything returned here.
 *
 * @module inngest/functions
 */

import type { AnalysisService } from "@/lib/analysis/service"
import { createAnalyzeDocumentFunction } from "./analyze-document"

export function createFunctions(service: AnalysisService) {
  return [createAnalyzeDocumentFunction(service)]
}
