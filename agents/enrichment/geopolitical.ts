/**
 * @fileoverview Geopolitical Context Enricher
 *
 * Optional research-stage step. Picks the single jurisdiction the
 * retrieved chunks talk about most, fetches country risks from the risk
 * feed and formats them as a labelled appendix (`[GEO-n]` entries) kept
 * apart from the primary context.
 *
 * Enrichment is best-effort: no jurisdiction, no risks or a feed failure
 * all yield `""`.
 *
 * @module agents/enrichment/geopolitical
 */

import { z } from 'zod'
import { logger } from '@/lib/logger'
import { errorMessage } from '@/lib/errors'
import type { GeopoliticalRisk, RiskFeed, RiskSeverity } from '@/lib/geopolitical/types'
import jurisdictionData from './jurisdictions.json'

/** Country name -> lowercase aliases searched in the text */
const JURISDICTIONS = z.record(z.string(), z.array(z.string())).parse(jurisdictionData)

/** Score added when chunk metadata names the country outright */
export const METADATA_WEIGHT = 5

/** Appendix holds at most this many risks */
export const MAX_RISKS = 4

const SEVERITY_RANK: Record<RiskSeverity, number> = { HIGH: 3, MED: 2, LOW: 1 }

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function countAlias(text: string, alias: string): number {
  const pattern = new RegExp(`(?<![a-z])${escapeRegExp(alias)}(?![a-z])`, 'g')
  return text.match(pattern)?.length ?? 0
}

function metadataMentions(
  metadata: Record<string, unknown>,
  country: string,
  aliases: string[]
): boolean {
  const names = new Set([country.toLowerCase(), ...aliases])
  return ['country', 'jurisdiction'].some((field) => {
    const value = metadata[field]
    return typeof value === 'string' && names.has(value.trim().toLowerCase())
  })
}

/**
 * Best-guess jurisdiction by keyword frequency, with a bonus per chunk whose
 * metadata names the country. Ties go to the earlier entry in the table.
 * Returns null when nothing scores.
 */
export function detectJurisdiction(
  text: string,
  retrievalMetadata: Array<Record<string, unknown>> = []
): string | null {
  const lower = text.toLowerCase()
  let best: string | null = null
  let bestScore = 0

  for (const [country, aliases] of Object.entries(JURISDICTIONS)) {
    let score = aliases.reduce((sum, alias) => sum + countAlias(lower, alias), 0)
    for (const metadata of retrievalMetadata) {
      if (metadataMentions(metadata, country, aliases)) score += METADATA_WEIGHT
    }
    if (score > bestScore) {
      best = country
      bestScore = score
    }
  }

  return best
}

/**
 * Deduplicates risks by name keeping the highest severity, sorts
 * HIGH -> LOW and keeps at most {@link MAX_RISKS}.
 */
export function consolidateRisks(risks: GeopoliticalRisk[]): GeopoliticalRisk[] {
  const byName = new Map<string, GeopoliticalRisk>()
  for (const risk of risks) {
    const existing = byName.get(risk.name)
    if (!existing || SEVERITY_RANK[risk.severity] > SEVERITY_RANK[existing.severity]) {
      byName.set(risk.name, risk)
    }
  }
  return [...byName.values()]
    .sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity])
    .slice(0, MAX_RISKS)
}

/** Formats the appendix block that downstream stages cite as [GEO-n] */
export function formatRiskAppendix(country: string, risks: GeopoliticalRisk[]): string {
  const lines = risks.map((risk, i) => {
    const meta = [risk.severity, risk.source, risk.date].filter(Boolean).join(', ')
    return `[GEO-${i + 1}] ${risk.name} (${meta}): ${risk.description}`
  })
  return [`GEOPOLITICAL RISK APPENDIX: ${country}`, ...lines].join('\n')
}

export class GeopoliticalEnricher {
  constructor(private readonly feed: RiskFeed) {}

  /**
   * Build the geopolitical appendix for the retrieved context.
   * Never throws; every failure path returns `""`.
   */
  async enrich(
    rawContext: string,
    retrievalMetadata: Array<Record<string, unknown>> = []
  ): Promise<string> {
    const country = detectJurisdiction(rawContext, retrievalMetadata)
    if (!country) {
      logger.debug('No jurisdiction detected in context')
      return ''
    }

    let risks: GeopoliticalRisk[]
    try {
      risks = consolidateRisks(await this.feed.getCountryRisks(country))
    } catch (error) {
      logger.warn('Risk feed failed, continuing without enrichment', {
        country,
        error: errorMessage(error),
      })
      return ''
    }

    if (risks.length === 0) {
      logger.info('No geopolitical risks found', { country })
      return ''
    }

    logger.info('Geopolitical context added', { country, risks: risks.length })
    return formatRiskAppendix(country, risks)
  }
}
