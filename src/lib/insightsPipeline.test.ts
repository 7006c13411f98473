import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createInsightsPipeline } from './insightsPipeline'
import { initLocalModel, LocalModelBackend } from './localModelBackend'
import { narrativeToText } from './narrativeComposer'
import { RemoteApiBackend } from './remoteApiBackend'
import { buildReportDocument } from './reportRenderer'
import { parseBackendResult } from './sectionParser'
import { PassthroughBackend } from './summarizationBackend'
import { makeSurveyDataset } from '../test/fixtures'

const generatedAt = new Date(2026, 9, 19)

describe('insightsPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('runs the scenario dataset end to end with a failing model', async () => {
    const handle = await initLocalModel(() => ({
      summarize: async (): Promise<string> => {
        throw new Error('model crashed')
      },
    }))
    const pipeline = createInsightsPipeline({ backend: new LocalModelBackend(handle) })

    const run = await pipeline.run(makeSurveyDataset())

    expect(run.snapshot.rowCount).toBe(100)
    expect(run.snapshot.columnCount).toBe(5)
    expect(run.snapshot.missingCount).toBe(10)
    expect(run.snapshot.missingRatio).toBe(0.02)
    expect(run.snapshot.duplicateCount).toBe(2)
    expect(run.snapshot.topCorrelation?.coefficient.toFixed(2)).toBe('0.82')

    const text = narrativeToText(run.narrative)
    const markers = ['Dataset Overview:', 'Numeric Insights:', 'Categorical Insights:', 'Data Health:'].map((m) => text.indexOf(m))
    expect(markers.every((index) => index >= 0)).toBe(true)
    expect([...markers].sort((a, b) => a - b)).toEqual(markers)

    expect(run.result).toEqual({ text, source: 'fallback' })
    expect(parseBackendResult(run.result)).toHaveLength(4)
    expect(run.sections).toHaveLength(4)

    const doc = buildReportDocument(run.snapshot, run.sections, { generatedAt })
    const content = doc.blocks.map((b) => b.body).join('\n')
    expect(content).toContain('Total Records: 100')
    expect(content).toContain('r = 0.82')

    const pdf = await pipeline.exportPdf(run, { generatedAt })
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-')
  })

  it('parses API output by headings', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      new Response(
        JSON.stringify({ choices: [{ message: { content: '### Overview\n100 rows\n### Quality\n2 duplicates\n### Next steps\nDeduplicate' } }] }),
        { status: 200 }
      )
    )
    const pipeline = createInsightsPipeline({ backend: new RemoteApiBackend({ apiKey: 'test-secret', fetch: fetchMock }) })

    const run = await pipeline.run(makeSurveyDataset())

    expect(run.result.source).toBe('api')
    expect(run.sections).toEqual([
      { title: 'Overview', body: '100 rows' },
      { title: 'Quality', body: '2 duplicates' },
      { title: 'Next steps', body: 'Deduplicate' },
    ])
  })

  it('parses model output with the fixed markers', async () => {
    const handle = await initLocalModel(() => ({
      summarize: async () => 'Dataset Overview: 100 rows. Data Health: two duplicates.',
    }))
    const pipeline = createInsightsPipeline({ backend: new LocalModelBackend(handle) })

    const run = await pipeline.run(makeSurveyDataset())

    expect(run.result.source).toBe('model')
    expect(run.sections).toEqual([
      { title: 'Dataset Overview', body: '100 rows.' },
      { title: 'Data Health', body: 'two duplicates.' },
      { title: 'Numeric Insights', body: '' },
      { title: 'Categorical Insights', body: '' },
    ])
  })

  it('handles an empty dataset', async () => {
    const pipeline = createInsightsPipeline({ backend: new PassthroughBackend() })
    const run = await pipeline.run({ columns: [], rows: [] })
    expect(run.snapshot.missingRatio).toBe(0)
    expect(run.sections[0].body).toBe('- The dataset has 0 rows and 0 columns.\n- Contains 0 missing values (0% of data) and 0 duplicate rows.')
    await expect(pipeline.exportPdf(run, { generatedAt })).resolves.toBeInstanceOf(Buffer)
  })
})
