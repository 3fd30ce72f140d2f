/**
 * @fileoverview Service Container
 *
 * Composition root. Builds every adapter and service once from the parsed
 * configuration; callers receive them explicitly instead of importing
 * module-level singletons.
 *
 * @module lib/container
 */

import { createDatabase } from "@/db/client"
import { PgVectorStore } from "@/db/queries/vector-store"
import { GeopoliticalEnricher } from "@/agents/enrichment/geopolitical"
import { RetrievalGateway } from "@/agents/tools/vector-search"
import { AnalysisWorkflow } from "@/agents/workflow/orchestrator"
import { VercelBlobObjectStore } from "./blob"
import { EmbeddingCache } from "./cache/embedding-cache"
import type { AppConfig } from "./config"
import { VoyageAIClient } from "./embeddings"
import { NewsApiRiskFeed } from "./geopolitical/news-feed"
import { DocumentIndex } from "./analysis/indexer"
import { ProgressStore, ResultStore } from "./analysis/progress-store"
import { AnalysisService } from "./analysis/service"
import { logger } from "./logger"

export interface Container {
  config: AppConfig
  analysis: AnalysisService
  documents: DocumentIndex
}

export function createContainer(config: AppConfig): Container {
  const vectorStore = new PgVectorStore(createDatabase(config.databaseUrl))
  const objects = new VercelBlobObjectStore(config.blobToken)
  const embedder = new VoyageAIClient(config.voyageApiKey, { cache: new EmbeddingCache() })

  const gateway = new RetrievalGateway(embedder, vectorStore)
  const enricher = config.analysis.enableGeopolitical
    ? new GeopoliticalEnricher(new NewsApiRiskFeed(config.newsApiKey))
    : null
  const progress = new ProgressStore(objects)
  const results = new ResultStore(objects)

  const workflow = new AnalysisWorkflow({
    retriever: gateway,
    enricher,
    progress,
    results,
    maxResearchAttempts: config.analysis.maxResearchAttempts,
    topK: config.analysis.retrievalTopK,
  })

  logger.info("Container ready", {
    geopolitical: enricher !== null,
    maxResearchAttempts: config.analysis.maxResearchAttempts,
    retrievalTopK: config.analysis.retrievalTopK,
  })

  return {
    config,
    analysis: new AnalysisService({ workflow, progress, results }),
    documents: new DocumentIndex({
      embedder,
      vectorStore,
      progress,
      results,
      retrievalCache: gateway,
    }),
  }
}
