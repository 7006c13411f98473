/**
 * Statistics extractor: row/column counts, missingness, duplicates, column typing,
 * strongest pairwise correlation and per-column descriptive statistics.
 * Pure function of the dataset; never throws on empty or degenerate input.
 */

import { mean, min, max, quantile, sampleCorrelation, sampleStandardDeviation } from 'simple-statistics'
import type { CellValue, ColumnSummary, CorrelationPair, Dataset, DataRow, StatisticsSnapshot } from '../types'

/** Pairs at or below this |r| are not worth reporting */
export const CORRELATION_MIN = 0.4
/** Pairs at or above this |r| are the same column twice, or a near-copy */
export const CORRELATION_MAX = 0.999

const MIN_CORRELATION_PAIRS = 3

export function isMissing(value: CellValue): boolean {
  if (value === null || value === undefined || value === '') return true
  if (typeof value === 'number' && Number.isNaN(value)) return true
  if (value instanceof Date && Number.isNaN(value.getTime())) return true
  return false
}

/** Finite number for a numeric cell (number or numeric string), otherwise null */
export function toNumber(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (trimmed === '') return null
    const n = Number(trimmed)
    return Number.isFinite(n) ? n : null
  }
  return null
}

function round2(x: number): number {
  return Math.round(x * 100) / 100
}

function cellKey(value: CellValue): string | number | boolean | null {
  if (isMissing(value) || value === undefined) return null
  if (value instanceof Date) return value.toISOString()
  return value
}

function isNumericColumn(rows: DataRow[], column: string): boolean {
  let seen = 0
  for (const row of rows) {
    const v = row[column]
    if (isMissing(v)) continue
    if (toNumber(v) === null) return false
    seen++
  }
  return seen > 0
}

function countDuplicates(rows: DataRow[], columns: string[]): number {
  const seen = new Set<string>()
  let duplicates = 0
  for (const row of rows) {
    const k = JSON.stringify(columns.map((c) => cellKey(row[c])))
    if (seen.has(k)) duplicates++
    else seen.add(k)
  }
  return duplicates
}

/** Pearson r over rows where both columns are present; null when undefined (too few pairs, zero variance) */
export function pairwiseCorrelation(rows: DataRow[], a: string, b: string): number | null {
  const xs: number[] = []
  const ys: number[] = []
  for (const row of rows) {
    const x = toNumber(row[a])
    const y = toNumber(row[b])
    if (x === null || y === null) continue
    xs.push(x)
    ys.push(y)
  }
  if (xs.length < MIN_CORRELATION_PAIRS) return null
  const r = sampleCorrelation(xs, ys)
  return Number.isFinite(r) ? r : null
}

/**
 * Highest coefficient among numeric column pairs with CORRELATION_MIN < |r| < CORRELATION_MAX.
 * Ranked by signed r; ties keep the first pair in column order.
 */
export function findTopCorrelation(rows: DataRow[], numericColumns: readonly string[]): CorrelationPair | undefined {
  if (numericColumns.length < 2) return undefined
  let best: CorrelationPair | undefined
  for (let i = 0; i < numericColumns.length; i++) {
    for (let j = i + 1; j < numericColumns.length; j++) {
      const r = pairwiseCorrelation(rows, numericColumns[i], numericColumns[j])
      if (r === null) continue
      const magnitude = Math.abs(r)
      if (magnitude <= CORRELATION_MIN || magnitude >= CORRELATION_MAX) continue
      if (!best || r > best.coefficient) {
        best = { columnA: numericColumns[i], columnB: numericColumns[j], coefficient: r }
      }
    }
  }
  return best
}

function summarizeNumeric(rows: DataRow[], name: string): ColumnSummary {
  const vals: number[] = []
  for (const row of rows) {
    const n = toNumber(row[name])
    if (n !== null) vals.push(n)
  }
  if (vals.length === 0) {
    return { kind: 'numeric', name, count: 0, mean: null, std: null, min: null, q1: null, median: null, q3: null, max: null }
  }
  return {
    kind: 'numeric',
    name,
    count: vals.length,
    mean: round2(mean(vals)),
    std: vals.length < 2 ? null : round2(sampleStandardDeviation(vals)),
    min: round2(min(vals)),
    q1: round2(quantile(vals, 0.25)),
    median: round2(quantile(vals, 0.5)),
    q3: round2(quantile(vals, 0.75)),
    max: round2(max(vals)),
  }
}

function summarizeCategorical(rows: DataRow[], name: string): ColumnSummary {
  const counts = new Map<string, number>()
  let count = 0
  for (const row of rows) {
    const v = row[name]
    if (isMissing(v)) continue
    const key = v instanceof Date ? v.toISOString() : String(v)
    counts.set(key, (counts.get(key) ?? 0) + 1)
    count++
  }
  let top: string | null = null
  let freq = 0
  for (const [value, c] of counts) {
    if (c > freq) {
      top = value
      freq = c
    }
  }
  return { kind: 'categorical', name, count, unique: counts.size, top, freq }
}

export function extractStatistics(dataset: Dataset): StatisticsSnapshot {
  const { columns, rows } = dataset
  const rowCount = rows.length
  const columnCount = columns.length

  let missingCount = 0
  for (const row of rows) {
    for (const c of columns) {
      if (isMissing(row[c])) missingCount++
    }
  }
  const cells = rowCount * columnCount
  const missingRatio = cells > 0 ? missingCount / cells : 0

  const numericColumns: string[] = []
  const categoricalColumns: string[] = []
  for (const c of columns) {
    if (isNumericColumn(rows, c)) numericColumns.push(c)
    else categoricalColumns.push(c)
  }

  const columnSummaries = columns.map((c) =>
    Object.freeze(numericColumns.includes(c) ? summarizeNumeric(rows, c) : summarizeCategorical(rows, c))
  )
  const topCorrelation = findTopCorrelation(rows, numericColumns)

  return Object.freeze({
    rowCount,
    columnCount,
    missingCount,
    missingRatio,
    duplicateCount: countDuplicates(rows, columns),
    numericColumns: Object.freeze(numericColumns),
    categoricalColumns: Object.freeze(categoricalColumns),
    ...(topCorrelation ? { topCorrelation: Object.freeze(topCorrelation) } : {}),
    columnSummaries: Object.freeze(columnSummaries),
  })
}
