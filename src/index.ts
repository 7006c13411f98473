export * from './types'
export { loadConfig, type AppConfig, type BackendConfig, type BackendKind } from './config'
export { ConfigurationError } from './lib/errors'
export { parseCSV } from './lib/csvParse'
export { extractStatistics, findTopCorrelation, CORRELATION_MIN, CORRELATION_MAX } from './lib/statisticsExtractor'
export { composeNarrative, narrativeToText, narrativeSections, NARRATIVE_SECTIONS } from './lib/narrativeComposer'
export { PassthroughBackend, type SummarizationBackend, type NarrativeInput } from './lib/summarizationBackend'
export {
  initLocalModel,
  loadModelModule,
  LocalModelBackend,
  type LocalModelHandle,
  type SummarizationModel,
  type SummarizeOptions,
} from './lib/localModelBackend'
export { RemoteApiBackend, type RemoteApiBackendOptions, type FetchLike } from './lib/remoteApiBackend'
export { createBackend, type BackendDependencies } from './lib/createBackend'
export { parseSections, parseBackendResult, GENERIC_SECTION_TITLE, type ParseStrategy } from './lib/sectionParser'
export { sanitizeForPdf } from './lib/textSanitizer'
export {
  buildReportDocument,
  correlationStrength,
  dataQualityScore,
  renderPdf,
  renderReport,
  writeReport,
  type ReportOptions,
} from './lib/reportRenderer'
export { createInsightsPipeline, type InsightsPipeline, type PipelineRun } from './lib/insightsPipeline'
