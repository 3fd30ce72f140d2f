import { describe, it, expect, vi, beforeEach } from 'vitest'
import { BudgetTracker } from '@/lib/ai/budget'
import { AnalysisFailedError, ScopeError } from '@/lib/errors'
import { ProgressStore, ResultStore } from '@/lib/analysis/progress-store'
import {
  InMemoryObjectStore,
  InMemoryVectorStore,
  StaticEmbedder,
  StaticRiskFeed,
} from '../testing/in-memory-stores'
import { objectResult, textResult } from '../testing/mock-ai'
import {
  SAMPLE_ANSWER,
  SAMPLE_QUESTION,
  SAMPLE_REPORT,
  SAMPLE_REVENUE_CHUNK,
} from '../testing/fixtures'
import { RetrievalGateway } from '../tools/vector-search'
import { GeopoliticalEnricher } from '../enrichment/geopolitical'
import { createAnalysisState } from './state'
import { AnalysisWorkflow, type AnalysisWorkflowDeps } from './orchestrator'

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }))

vi.mock('ai', () => ({
  generateText,
  Output: { object: vi.fn().mockReturnValue({}) },
  NoObjectGeneratedError: { isInstance: vi.fn().mockReturnValue(false) },
}))

// The model handle is the agent name so the fake can route by it
vi.mock('@/lib/ai/config', () => ({
  getAgentModel: (agent: string) => agent,
  GENERATION_CONFIG: { temperature: 0, maxOutputTokens: 2048 },
}))

const UNSUPPORTED_ANSWER = 'Total revenue was $999B [Source 1].'

function scriptModels(script: { answers: string[]; verdict?: string; report?: unknown }) {
  let analystCalls = 0
  generateText.mockImplementation(async ({ model }: { model: string }) => {
    if (model === 'analyst') {
      const answer = script.answers[Math.min(analystCalls, script.answers.length - 1)]
      analystCalls++
      return textResult(answer, { logprobs: [-0.1, -0.3] })
    }
    if (model === 'validator') return textResult(script.verdict ?? 'PASS')
    return objectResult(script.report ?? SAMPLE_REPORT)
  })
}

function callsFor(model: string): number {
  return generateText.mock.calls.filter(([args]) => args.model === model).length
}

describe('AnalysisWorkflow', () => {
  let vectors: InMemoryVectorStore
  let objects: InMemoryObjectStore
  let deps: AnalysisWorkflowDeps

  const statusWrites = () =>
    objects.writes.filter((w) => w.key === 'u1/d1/status.json').map((w) => w.data)

  const stageIndices = () =>
    statusWrites().map((data) =>
      typeof data === 'object' && data !== null && 'stage_index' in data
        ? data.stage_index
        : null
    )

  beforeEach(async () => {
    vi.clearAllMocks()
    vectors = new InMemoryVectorStore()
    objects = new InMemoryObjectStore()
    await vectors.upsert([
      {
        id: 'd1-0',
        vector: [1, 0, 0],
        documentId: 'd1',
        userId: 'u1',
        metadata: { text: SAMPLE_REVENUE_CHUNK, source: '10-K', page: 4 },
      },
    ])
    deps = {
      retriever: new RetrievalGateway(new StaticEmbedder(), vectors),
      enricher: null,
      progress: new ProgressStore(objects),
      results: new ResultStore(objects),
    }
  })

  it('answers the revenue question end to end', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER] })

    const state = await new AnalysisWorkflow(deps).run(
      createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1')
    )

    expect(state.status).toBe('completed')
    expect(state.isValid).toBe(true)
    expect(state.answer).toBe(SAMPLE_ANSWER)
    expect(state.context).toBe(`[Source 1] ${SAMPLE_REVENUE_CHUNK}`)
    expect(state.retrievedSources).toEqual(['10-K p.4'])
    expect(state.intelligenceHubData?.key_highlights[0].metric_value).toBe('114%')
    expect(state.researchAttempts).toBe(1)
  })

  it('writes a snapshot on every transition and the result before completing', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER] })

    await new AnalysisWorkflow(deps).run(createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'))

    expect(objects.writes.map((w) => w.key)).toEqual([
      'u1/d1/status.json',
      'u1/d1/status.json',
      'u1/d1/status.json',
      'u1/d1/status.json',
      'u1/d1/analysis.json',
      'u1/d1/status.json',
    ])
    expect(stageIndices()).toEqual([0, 1, 2, 3, 3])
    expect(statusWrites().at(-1)).toEqual({
      status: 'completed',
      current_stage: 'complete',
      stage_index: 3,
      total_stages: 4,
      status_message: 'Analysis complete',
    })
  })

  it('persists the result document with confidence metrics', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER] })

    await new AnalysisWorkflow(deps).run(createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'))
    const result = await deps.results.get('u1', 'd1')

    expect(result?.is_valid).toBe(true)
    expect(result?.verification_status).toBe('PASS')
    expect(result?.retrieval_scores).toEqual([1])
    expect(result?.retrieved_sources).toEqual(['10-K p.4'])
    expect(result?.generation_logprobs).toEqual([-0.1, -0.3])
    expect(result?.confidence_metrics.overall_level).toBe('high')
    expect(result?.confidence_metrics.ai_certainty.value).toBe('82%')
    expect(result?.confidence_metrics.context_density.value).toBe('1/1 chunks > 0.75')
    expect(result?.intelligence_hub_data).toEqual(SAMPLE_REPORT)
  })

  it('routes an unsupported figure back to research', async () => {
    scriptModels({ answers: [UNSUPPORTED_ANSWER, SAMPLE_ANSWER] })

    const state = await new AnalysisWorkflow(deps).run(
      createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1')
    )

    expect(state.status).toBe('completed')
    expect(state.researchAttempts).toBe(2)
    expect(state.answer).toBe(SAMPLE_ANSWER)
    expect(stageIndices()).toEqual([0, 1, 2, 0, 1, 2, 3, 3])
    // the figure gate rejects without asking the validator model
    expect(callsFor('validator')).toBe(1)
    expect(vectors.queries.map((q) => q.topK)).toEqual([8, 12])
  })

  it('names the attempt in the retry snapshot', async () => {
    scriptModels({ answers: [UNSUPPORTED_ANSWER, SAMPLE_ANSWER] })

    await new AnalysisWorkflow(deps).run(createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'))

    expect(statusWrites()[3]).toEqual({
      status: 'processing',
      current_stage: 'research',
      stage_index: 0,
      total_stages: 4,
      status_message: 'Retrieving documents (attempt 2 of 3)',
    })
  })

  it('fails with the last answer once research attempts are exhausted', async () => {
    scriptModels({ answers: [UNSUPPORTED_ANSWER] })

    const state = await new AnalysisWorkflow(deps).run(
      createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1')
    )

    expect(state.status).toBe('failed')
    expect(state.isValid).toBe(false)
    expect(state.answer).toBe(UNSUPPORTED_ANSWER)
    expect(state.intelligenceHubData).toBeNull()
    expect(state.researchAttempts).toBe(3)
    expect(callsFor('intelligenceHub')).toBe(0)
    expect(statusWrites().at(-1)).toEqual({
      status: 'failed',
      current_stage: 'validation',
      stage_index: 2,
      total_stages: 4,
      status_message: 'Answer could not be validated after 3 research attempts',
    })

    const result = await deps.results.get('u1', 'd1')
    expect(result?.verification_status).toBe('FAIL')
    expect(result?.intelligence_hub_data).toEqual({})
  })

  it('honours a configured attempt limit', async () => {
    scriptModels({ answers: [UNSUPPORTED_ANSWER] })

    const state = await new AnalysisWorkflow({ ...deps, maxResearchAttempts: 1 }).run(
      createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1')
    )

    expect(state.status).toBe('failed')
    expect(state.researchAttempts).toBe(1)
  })

  it('stops retrying when the token budget is exhausted', async () => {
    scriptModels({ answers: [UNSUPPORTED_ANSWER] })

    const state = await new AnalysisWorkflow(deps).run(
      createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'),
      new BudgetTracker(100)
    )

    expect(state.status).toBe('failed')
    expect(state.researchAttempts).toBe(1)
    expect(state.statusMessage).toBe('Token budget exhausted after 1 research attempts')
  })

  it('refuses without calling the analyst when nothing is retrieved', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER] })

    const state = await new AnalysisWorkflow(deps).run(
      createAnalysisState(SAMPLE_QUESTION, 'd-empty', 'u1')
    )

    expect(state.contexts).toEqual([])
    expect(state.answer).toBe('I cannot answer this question from the provided documents.')
    expect(state.isValid).toBe(true)
    expect(state.status).toBe('completed')
    expect(callsFor('analyst')).toBe(0)
    expect(callsFor('validator')).toBe(0)
  })

  it('fails the run on a store error and keeps the last stage', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER] })
    vectors.failWith = new Error('connection refused')

    const run = new AnalysisWorkflow(deps).run(createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'))

    await expect(run).rejects.toBeInstanceOf(AnalysisFailedError)
    await expect(run).rejects.toThrow('Analysis failed during research: connection refused')
    expect(statusWrites().at(-1)).toEqual({
      status: 'failed',
      current_stage: 'research',
      stage_index: 0,
      total_stages: 4,
      status_message: 'Analysis failed during research: connection refused',
    })
    expect(await deps.results.get('u1', 'd1')).toBeNull()
  })

  it('fails the run when a model call errors', async () => {
    generateText.mockRejectedValue(new Error('gateway timeout'))

    await expect(
      new AnalysisWorkflow(deps).run(createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'))
    ).rejects.toThrow('Analysis failed during analysis: gateway timeout')
    expect(stageIndices().at(-1)).toBe(1)
  })

  it('keeps running when progress writes fail', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER] })
    const failing = new InMemoryObjectStore()
    failing.failWrites = new Error('blob store down')

    const state = await new AnalysisWorkflow({
      ...deps,
      progress: new ProgressStore(failing),
    }).run(createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'))

    expect(state.status).toBe('completed')
    expect(await deps.results.get('u1', 'd1')).not.toBeNull()
  })

  it('substitutes the degraded report when extraction output is malformed', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER], report: { key_highlights: 'none' } })

    const state = await new AnalysisWorkflow(deps).run(
      createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1')
    )

    expect(state.status).toBe('completed')
    expect(state.intelligenceHubData?.degraded).toBe(true)
    expect(state.intelligenceHubData?.sentiment.score).toBe(50)
    expect(callsFor('intelligenceHub')).toBe(2)
  })

  it('passes the geopolitical appendix to the analyst', async () => {
    scriptModels({ answers: [SAMPLE_ANSWER] })
    await vectors.upsert([
      {
        id: 'd1-1',
        vector: [1, 0, 0],
        documentId: 'd1',
        userId: 'u1',
        metadata: { text: 'Export licences for China were revoked.', source: '10-K', page: 7 },
      },
    ])
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

    const state = await new AnalysisWorkflow({
      ...deps,
      enricher: new GeopoliticalEnricher(feed),
    }).run(createAnalysisState(SAMPLE_QUESTION, 'd1', 'u1'))

    expect(state.geopoliticalContext).toBe(
      'GEOPOLITICAL RISK APPENDIX: China\n' +
        '[GEO-1] Export Controls (HIGH, NewsAPI, 2025-03-20): New licence requirements.'
    )
    const [analystArgs] = generateText.mock.calls[0]
    expect(analystArgs.prompt).toContain('[GEO-1] Export Controls')
  })

  it('rejects an incomplete scope before any write', async () => {
    await expect(
      new AnalysisWorkflow(deps).run(createAnalysisState(SAMPLE_QUESTION, '', 'u1'))
    ).rejects.toBeInstanceOf(ScopeError)
    expect(objects.writes).toEqual([])
    expect(vectors.queries).toEqual([])
  })
})
