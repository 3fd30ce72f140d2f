import { describe, it, expect, vi } from 'vitest'
import { mockRetrieval } from './testing/mock-ai'
import { StaticRiskFeed } from './testing/in-memory-stores'
import {
  SAMPLE_CHUNKS,
  SAMPLE_EXPORT_CHUNK,
  SAMPLE_MARGIN_CHUNK,
  SAMPLE_QUESTION,
  SAMPLE_REVENUE_CHUNK,
} from './testing/fixtures'
import { GeopoliticalEnricher } from './enrichment/geopolitical'
import {
  formatContext,
  runResearcherAgent,
  sourceLabel,
  type ContextEnricher,
  type Retriever,
} from './researcher'

const scope = { documentId: 'd1', userId: 'u1' }

function retrieverFrom(retrieve: Retriever['retrieve']): Retriever {
  return { retrieve }
}

describe('sourceLabel', () => {
  it('combines the source with the page', () => {
    expect(sourceLabel(SAMPLE_CHUNKS[0])).toBe('annual-report.pdf p.4')
  })

  it('falls back to the filename, then to "Document"', () => {
    expect(sourceLabel({ content: 'x', score: 1, sourceMetadata: { filename: 'q3.pdf' } })).toBe(
      'q3.pdf'
    )
    expect(sourceLabel({ content: 'x', score: 1, sourceMetadata: { page: 2 } })).toBe(
      'Document p.2'
    )
  })
})

describe('formatContext', () => {
  it('labels each chunk for citation', () => {
    expect(formatContext(SAMPLE_CHUNKS)).toBe(
      `[Source 1] ${SAMPLE_REVENUE_CHUNK}\n\n[Source 2] ${SAMPLE_MARGIN_CHUNK}`
    )
  })

  it('is empty for no chunks', () => {
    expect(formatContext([])).toBe('')
  })
})

describe('Researcher Agent', () => {
  it('returns aligned contexts, scores and sources', async () => {
    const retrieve = vi.fn().mockResolvedValue(SAMPLE_CHUNKS)

    const result = await runResearcherAgent({
      question: SAMPLE_QUESTION,
      scope,
      attempt: 1,
      topK: 8,
      retriever: retrieverFrom(retrieve),
      enricher: null,
    })

    expect(retrieve).toHaveBeenCalledWith(SAMPLE_QUESTION, scope, 8)
    expect(result).toEqual({
      context: formatContext(SAMPLE_CHUNKS),
      contexts: [SAMPLE_REVENUE_CHUNK, SAMPLE_MARGIN_CHUNK],
      retrievalScores: [0.92, 0.81],
      retrievedSources: ['annual-report.pdf p.4', 'annual-report.pdf p.9'],
      geopoliticalContext: '',
    })
  })

  it('widens the search on each retry up to the cap', async () => {
    const retrieve = mockRetrieval([])
    const retriever = retrieverFrom(retrieve)
    const base = { question: SAMPLE_QUESTION, scope, topK: 8, retriever, enricher: null }

    await runResearcherAgent({ ...base, attempt: 2 })
    await runResearcherAgent({ ...base, attempt: 3 })
    await runResearcherAgent({ ...base, topK: 48, attempt: 3 })

    expect(retrieve.mock.calls.map((call) => call[2])).toEqual([12, 16, 50])
  })

  it('adds the geopolitical appendix from the retrieved text', async () => {
    const retrieve = mockRetrieval([{ content: SAMPLE_EXPORT_CHUNK, score: 0.88 }])
    const feed = new StaticRiskFeed({
      China: [
        {
          name: 'Export Controls',
          severity: 'HIGH',
          description: 'New licence requirements.',
          source: 'NewsAPI',
          date: '2025-03-20',
        },
      ],
    })

    const result = await runResearcherAgent({
      question: SAMPLE_QUESTION,
      scope,
      attempt: 1,
      topK: 8,
      retriever: retrieverFrom(retrieve),
      enricher: new GeopoliticalEnricher(feed),
    })

    expect(feed.requested).toEqual(['China'])
    expect(result.geopoliticalContext).toBe(
      'GEOPOLITICAL RISK APPENDIX: China\n' +
        '[GEO-1] Export Controls (HIGH, NewsAPI, 2025-03-20): New licence requirements.'
    )
    expect(result.retrievedSources).toEqual(['Mock Filing p.1'])
  })

  it('skips enrichment when nothing was retrieved', async () => {
    const enrich = vi.fn<ContextEnricher['enrich']>().mockResolvedValue('appendix')

    const result = await runResearcherAgent({
      question: SAMPLE_QUESTION,
      scope,
      attempt: 1,
      topK: 8,
      retriever: retrieverFrom(mockRetrieval([])),
      enricher: { enrich },
    })

    expect(enrich).not.toHaveBeenCalled()
    expect(result.context).toBe('')
    expect(result.geopoliticalContext).toBe('')
  })

  it('propagates retrieval failures', async () => {
    const retrieve = vi.fn().mockRejectedValue(new Error('connection refused'))

    await expect(
      runResearcherAgent({
        question: SAMPLE_QUESTION,
        scope,
        attempt: 1,
        topK: 8,
        retriever: retrieverFrom(retrieve),
        enricher: null,
      })
    ).rejects.toThrow('connection refused')
  })
})
