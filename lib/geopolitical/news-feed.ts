/**
 * @fileoverview NewsAPI Risk Feed
 *
 * Maps recent news headlines about a country to risk annotations using
 * keyword heuristics. Results are cached per country; without an API key
 * the feed is a no-op.
 *
 * @module lib/geopolitical/news-feed
 */

import { z } from "zod"
import { LRUCache } from "lru-cache"
import { ExternalServiceError } from "../errors"
import { logger } from "../logger"
import type { GeopoliticalRisk, RiskFeed, RiskSeverity } from "./types"

export const NEWS_API_CONFIG = {
  baseUrl: "https://newsapi.org/v2/everything",
  lookbackDays: 30,
  pageSize: 10,
  /** Articles inspected per request */
  maxArticles: 5,
  descriptionLength: 150,
} as const

const SEVERITY_KEYWORDS: Record<RiskSeverity, readonly string[]> = {
  HIGH: ["war", "invasion", "conflict", "sanction", "embargo", "crisis", "collapse", "ban(?:s|ned)?\\b", "prohibited", "severe"],
  MED: ["restriction", "tension", "dispute", "warning", "concern", "challenge", "uncertainty", "volatility"],
  LOW: ["monitoring", "watch", "caution", "potential", "possible"],
}

const articleSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  publishedAt: z.string().nullish(),
  url: z.string().nullish(),
})

const newsResponseSchema = z.object({
  status: z.string(),
  articles: z.array(articleSchema).default([]),
})

function containsWord(text: string, stem: string): boolean {
  return new RegExp(`\\b${stem}`, "i").test(text)
}

/**
 * Severity implied by a headline, or null when no risk keyword appears.
 * Keywords are regex stems anchored at word starts, so "sanction" also
 * matches "sanctions".
 */
export function assessSeverity(text: string): RiskSeverity | null {
  for (const severity of ["HIGH", "MED", "LOW"] as const) {
    if (SEVERITY_KEYWORDS[severity].some((keyword) => containsWord(text, keyword))) {
      return severity
    }
  }
  return null
}

/** Short risk name for a headline */
export function riskName(text: string): string {
  const lower = text.toLowerCase()
  if (lower.includes("sanction")) return "Economic Sanctions"
  if (lower.includes("trade war") || lower.includes("tariff")) return "Trade Restrictions"
  if (lower.includes("embargo")) return "Trade Embargo"
  if (lower.includes("conflict") || lower.includes("tension")) return "Geopolitical Tensions"
  if (lower.includes("regulat")) return "Regulatory Changes"
  if (lower.includes("political") && (lower.includes("unstable") || lower.includes("crisis"))) {
    return "Political Instability"
  }
  return "Geopolitical Risk"
}

export interface NewsApiRiskFeedOptions {
  fetch?: typeof fetch
  /** Clock for the lookback window */
  now?: () => Date
  /** Per-country cache TTL. Default 1 hour */
  cacheTtlMs?: number
}

export class NewsApiRiskFeed implements RiskFeed {
  private readonly fetchImpl: typeof fetch
  private readonly now: () => Date
  private readonly cache: LRUCache<string, GeopoliticalRisk[]>

  constructor(
    private readonly apiKey: string | undefined,
    options: NewsApiRiskFeedOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? fetch
    this.now = options.now ?? (() => new Date())
    this.cache = new LRUCache<string, GeopoliticalRisk[]>({
      max: 100,
      ttl: options.cacheTtlMs ?? 1000 * 60 * 60,
    })
  }

  /**
   * @throws ExternalServiceError when NewsAPI is unreachable or rejects the request
   */
  async getCountryRisks(country: string): Promise<GeopoliticalRisk[]> {
    if (!this.apiKey) {
      logger.info("NewsAPI key not configured, skipping news risks", { country })
      return []
    }

    const cacheKey = country.toLowerCase()
    const cached = this.cache.get(cacheKey)
    if (cached) return cached

    const from = new Date(this.now().getTime() - NEWS_API_CONFIG.lookbackDays * 24 * 60 * 60 * 1000)
    const params = new URLSearchParams({
      q: `"${country}" AND (sanctions OR embargo OR conflict OR "trade war" OR regulatory OR restrictions)`,
      language: "en",
      sortBy: "publishedAt",
      from: from.toISOString().slice(0, 10),
      pageSize: String(NEWS_API_CONFIG.pageSize),
    })

    const response = await this.fetchImpl(`${NEWS_API_CONFIG.baseUrl}?${params}`, {
      headers: { "X-Api-Key": this.apiKey },
    })
    if (!response.ok) {
      throw new ExternalServiceError("news-api", `request failed with ${response.status}`)
    }

    const parsed = newsResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new ExternalServiceError("news-api", "unexpected response shape")
    }

    const risks: GeopoliticalRisk[] = []
    for (const article of parsed.data.articles.slice(0, NEWS_API_CONFIG.maxArticles)) {
      const title = article.title ?? ""
      const description = article.description ?? ""
      const severity = assessSeverity(`${title} ${description}`)
      if (!severity) continue

      risks.push({
        source: "NewsAPI",
        name: riskName(`${title} ${description}`),
        severity,
        description: (description || title).slice(0, NEWS_API_CONFIG.descriptionLength),
        date: (article.publishedAt ?? "").slice(0, 10),
        ...(article.url ? { url: article.url } : {}),
      })
    }

    this.cache.set(cacheKey, risks)
    return risks
  }
}
