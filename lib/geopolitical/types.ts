/** Severity of a risk annotation, lowest first */
export const RISK_SEVERITIES = ["LOW", "MED", "HIGH"] as const

export type RiskSeverity = (typeof RISK_SEVERITIES)[number]

/** A single annotation from an external risk feed */
export interface GeopoliticalRisk {
  name: string
  severity: RiskSeverity
  description: string
  source: string
  /** ISO date (YYYY-MM-DD) or "" when unknown */
  date: string
  url?: string
}

/** External source of country-level risks. Best-effort: may be empty or reject. */
export interface RiskFeed {
  getCountryRisks(country: string): Promise<GeopoliticalRisk[]>
}
