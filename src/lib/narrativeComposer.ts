/**
 * Narrative composer: turns a statistics snapshot into the four-section narrative
 * (overview, numeric, categorical, health). Deterministic, no clock.
 */

import type { Narrative, ParsedReport, StatisticsSnapshot } from '../types'

/** Section keys and their markers, in narrative order */
export const NARRATIVE_SECTIONS = [
  { key: 'overview', title: 'Dataset Overview' },
  { key: 'numeric', title: 'Numeric Insights' },
  { key: 'categorical', title: 'Categorical Insights' },
  { key: 'health', title: 'Data Health' },
] as const satisfies readonly { key: keyof Narrative; title: string }[]

export const MAX_LISTED_COLUMNS = 5

// A marker title followed by a colon, as the section parser matches it
const MARKER_COLON = new RegExp(`(${NARRATIVE_SECTIONS.map(({ title }) => title).join('|')})\\s*:`, 'gi')

/** Column name on one line, without anything the section parser would read as a marker */
export function columnLabel(name: string): string {
  return name.replace(/\s+/g, ' ').trim().replace(MARKER_COLON, '$1')
}

export function formatColumnList(names: readonly string[]): string {
  const listed = names.slice(0, MAX_LISTED_COLUMNS).map(columnLabel).join(', ')
  return names.length > MAX_LISTED_COLUMNS ? `${listed} and more` : listed
}

/** Ratio as a percentage with at most 2 decimals, e.g. 0.02 -> "2" */
export function formatPercent(ratio: number): string {
  return String(Math.round(ratio * 10000) / 100)
}

export function composeNarrative(snapshot: StatisticsSnapshot): Narrative {
  const { rowCount, columnCount, missingCount, duplicateCount, numericColumns, categoricalColumns, topCorrelation } = snapshot
  const pct = formatPercent(snapshot.missingRatio)

  const correlation = topCorrelation
    ? `The strongest relationship (r = ${topCorrelation.coefficient.toFixed(2)}) is between ${columnLabel(topCorrelation.columnA)} and ${columnLabel(topCorrelation.columnB)}.`
    : 'No strong correlations detected.'

  return {
    overview: [
      `The dataset has ${rowCount} rows and ${columnCount} columns.`,
      `Contains ${missingCount} missing values (${pct}% of data) and ${duplicateCount} duplicate rows.`,
    ],
    numeric: [
      numericColumns.length > 0
        ? `Numeric columns include ${formatColumnList(numericColumns)}.`
        : 'No numeric columns detected.',
      correlation,
    ],
    categorical: [
      categoricalColumns.length > 0
        ? `Key categorical columns are ${formatColumnList(categoricalColumns)}.`
        : 'No categorical columns detected.',
    ],
    health: [
      duplicateCount === 0 ? 'No duplicates detected.' : `${duplicateCount} duplicate rows found.`,
      `${missingCount} missing values need to be handled (${pct}% of total data points).`,
    ],
  }
}

function bullets(lines: readonly string[]): string {
  return lines.map((line) => `- ${line}`).join('\n')
}

/** Marker-delimited plain text, the form backends receive */
export function narrativeToText(narrative: Narrative): string {
  return NARRATIVE_SECTIONS.map(({ key, title }) => `${title}:\n${bullets(narrative[key])}`).join('\n\n')
}

/** The narrative as report sections, without a round trip through text */
export function narrativeSections(narrative: Narrative): ParsedReport {
  return NARRATIVE_SECTIONS.map(({ key, title }) => ({ title, body: bullets(narrative[key]) }))
}
