import type { IntelligenceHubReport, RetrievedChunk } from '../types'

// ============================================================================
// Sample Filing Text
// ============================================================================

export const SAMPLE_REVENUE_CHUNK = 'Revenue was $130.5 billion, up 114% YoY.'

export const SAMPLE_MARGIN_CHUNK =
  'Gross margin was 75.0%, compared with 72.7% in the prior fiscal year.'

export const SAMPLE_EXPORT_CHUNK =
  'Export restrictions on shipments to China reduced data center sales in the region.'

export const SAMPLE_QUESTION = 'What was total revenue?'

export const SAMPLE_ANSWER =
  'Total revenue was $130.5 billion, up 114% year over year [Source 1].'

// ============================================================================
// Sample Retrieval
// ============================================================================

export const SAMPLE_CHUNKS: RetrievedChunk[] = [
  {
    content: SAMPLE_REVENUE_CHUNK,
    score: 0.92,
    sourceMetadata: { source: 'annual-report.pdf', page: 4 },
  },
  {
    content: SAMPLE_MARGIN_CHUNK,
    score: 0.81,
    sourceMetadata: { source: 'annual-report.pdf', page: 9 },
  },
]

// ============================================================================
// Sample Agent Outputs
// ============================================================================

export const SAMPLE_REPORT: IntelligenceHubReport = {
  key_highlights: [
    { icon: 'growth', text: 'Revenue grew 114% year over year', metric_value: '114%' },
    { icon: 'chart', text: 'Revenue reached $130.5 billion', metric_value: '$130.5B' },
    { icon: 'check', text: 'Gross margin expanded to 75.0%', metric_value: '75.0%' },
  ],
  sentiment: {
    score: 82,
    change: '+114%',
    description: 'Strong growth driven by data center demand.',
  },
  risk: {
    level: 'Moderate',
    description: 'Export restrictions weigh on regional sales.',
  },
  risk_factors: [
    { icon: 'globe', name: 'Export Restrictions', severity: 'HIGH' },
    { icon: 'chain', name: 'Supply Concentration', severity: 'MED' },
  ],
  suggested_questions: [
    'How did data center revenue change?',
    'What drove the gross margin expansion?',
    'How large is exposure to export restrictions?',
  ],
}
