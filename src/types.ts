/** A single cell as handed over by the data loader */
export type CellValue = string | number | boolean | Date | null | undefined

/** Row of data keyed by column name */
export type DataRow = Record<string, CellValue>

/** Tabular dataset read by the pipeline. Column order is significant. */
export interface Dataset {
  columns: string[]
  rows: DataRow[]
}

export interface CorrelationPair {
  columnA: string
  columnB: string
  /** Pearson r, unrounded */
  coefficient: number
}

/** Descriptive statistics for one column, values rounded to 2 decimals */
export type ColumnSummary =
  | {
      kind: 'numeric'
      name: string
      count: number
      mean: number | null
      std: number | null
      min: number | null
      q1: number | null
      median: number | null
      q3: number | null
      max: number | null
    }
  | {
      kind: 'categorical'
      name: string
      count: number
      unique: number
      top: string | null
      freq: number
    }

/** Immutable statistics for one dataset */
export interface StatisticsSnapshot {
  rowCount: number
  columnCount: number
  missingCount: number
  /** missingCount / (rowCount × columnCount), 0 for an empty table */
  missingRatio: number
  duplicateCount: number
  numericColumns: readonly string[]
  categoricalColumns: readonly string[]
  topCorrelation?: CorrelationPair
  columnSummaries: readonly ColumnSummary[]
}

/** Four fixed sections of bullet facts, in this order */
export interface Narrative {
  overview: readonly string[]
  numeric: readonly string[]
  categorical: readonly string[]
  health: readonly string[]
}

export type BackendSource = 'model' | 'api' | 'fallback'

export interface BackendResult {
  text: string
  source: BackendSource
}

export interface ReportSection {
  title: string
  body: string
}

/** Sections in order of appearance */
export type ParsedReport = ReportSection[]

export interface ReportDocument {
  title: string
  blocks: ReportSection[]
  footer: string
}
