/**
 * Insights pipeline: Extractor → Composer → Backend → Parser → Renderer.
 * The backend is chosen once by the caller and injected; the pipeline never branches on it.
 */

import type { BackendResult, Dataset, Narrative, ParsedReport, StatisticsSnapshot } from '../types'
import { composeNarrative, narrativeSections } from './narrativeComposer'
import { renderReport, type ReportOptions } from './reportRenderer'
import { parseBackendResult, type ParseOptions } from './sectionParser'
import { extractStatistics } from './statisticsExtractor'
import type { SummarizationBackend } from './summarizationBackend'

export interface PipelineRun {
  snapshot: StatisticsSnapshot
  narrative: Narrative
  result: BackendResult
  sections: ParsedReport
}

export interface InsightsPipelineOptions {
  backend: SummarizationBackend
  parse?: ParseOptions
}

export interface InsightsPipeline {
  readonly backend: SummarizationBackend
  run(dataset: Dataset): Promise<PipelineRun>
  exportPdf(run: PipelineRun, options?: ReportOptions): Promise<Buffer>
}

export function createInsightsPipeline({ backend, parse }: InsightsPipelineOptions): InsightsPipeline {
  return {
    backend,

    async run(dataset) {
      const snapshot = extractStatistics(dataset)
      const narrative = composeNarrative(snapshot)
      const result = await backend.summarize(narrative)
      if (result.source === 'fallback') {
        console.info(`[Pipeline] ${backend.name}: using the standard narrative`)
      }
      // Fallback text is the narrative itself, so its sections are known without parsing
      const sections = result.source === 'fallback' ? narrativeSections(narrative) : parseBackendResult(result, parse)
      return { snapshot, narrative, result, sections }
    },

    exportPdf(run, options = {}) {
      return renderReport(run.snapshot, run.sections, options)
    },
  }
}
