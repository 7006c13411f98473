/**
 * Report renderer: builds the report document from the snapshot and the parsed narrative,
 * then lays it out as a paginated PDF (header and dated footer on every page).
 *
 * The "Dataset Overview" block is derived from the snapshot, not from the narrative, so the
 * exported numbers are exact even when the backend paraphrased them.
 */

import { writeFile } from 'fs/promises'
import dayjs from 'dayjs'
import PDFDocument from 'pdfkit'
import type { ColumnSummary, ParsedReport, ReportDocument, ReportSection, StatisticsSnapshot } from '../types'
import { formatPercent, MAX_LISTED_COLUMNS } from './narrativeComposer'
import { sanitizeForPdf } from './textSanitizer'

export const REPORT_TITLE = 'Dataset Insight Report'
export const MAX_SUMMARIZED_COLUMNS = 5

export interface ReportOptions {
  title?: string
  /** Date printed in the footer; defaults to today */
  generatedAt?: Date
}

// ─────────────────────────────────────────────
// DOCUMENT MODEL
// ─────────────────────────────────────────────

/** Share of non-missing cells as a percentage, one decimal */
export function dataQualityScore(missingRatio: number): number {
  return Math.round((1 - missingRatio) * 1000) / 10
}

export function qualityLabel(score: number): string {
  return score > 95 ? 'Good' : 'Needs Attention'
}

/** Label by magnitude, so a strong negative pair reads as Strong */
export function correlationStrength(coefficient: number): string {
  const magnitude = Math.abs(coefficient)
  if (magnitude > 0.7) return 'Strong'
  if (magnitude > 0.4) return 'Moderate'
  return 'Weak'
}

function formatCount(n: number): string {
  return n.toLocaleString('en-US')
}

function overviewBlock(snapshot: StatisticsSnapshot): string {
  const { topCorrelation } = snapshot
  const correlation = topCorrelation
    ? `${topCorrelation.columnA} / ${topCorrelation.columnB} (r = ${topCorrelation.coefficient.toFixed(2)}, ${correlationStrength(topCorrelation.coefficient)})`
    : 'none detected'
  const score = dataQualityScore(snapshot.missingRatio)
  return [
    `- Total Records: ${formatCount(snapshot.rowCount)}`,
    `- Total Features: ${formatCount(snapshot.columnCount)}`,
    `- Missing Values: ${formatCount(snapshot.missingCount)} (${formatPercent(snapshot.missingRatio)}% of data)`,
    `- Duplicate Rows: ${formatCount(snapshot.duplicateCount)}`,
    `- Data Quality: ${score}% (${qualityLabel(score)})`,
    `- Strongest Correlation: ${correlation}`,
  ].join('\n')
}

function insightsBlock(sections: ParsedReport): string {
  if (sections.length === 0) return 'No insights were generated.'
  return sections.map(({ title, body }) => (body ? `${title}\n${body}` : title)).join('\n\n')
}

function namesPreview(names: readonly string[]): string {
  if (names.length === 0) return 'None'
  const listed = names.slice(0, MAX_LISTED_COLUMNS).join(', ')
  return names.length > MAX_LISTED_COLUMNS ? `${listed}...` : listed
}

function dataTypesBlock(snapshot: StatisticsSnapshot): string {
  return [
    `Numeric Features (${snapshot.numericColumns.length}):`,
    namesPreview(snapshot.numericColumns),
    '',
    `Categorical Features (${snapshot.categoricalColumns.length}):`,
    namesPreview(snapshot.categoricalColumns),
  ].join('\n')
}

function statLines(summary: ColumnSummary): [string, string | number | null][] {
  if (summary.kind === 'numeric') {
    return [
      ['count', summary.count],
      ['mean', summary.mean],
      ['std', summary.std],
      ['min', summary.min],
      ['25%', summary.q1],
      ['50%', summary.median],
      ['75%', summary.q3],
      ['max', summary.max],
    ]
  }
  return [
    ['count', summary.count],
    ['unique', summary.unique],
    ['top', summary.top],
    ['freq', summary.freq],
  ]
}

function statisticsBlock(summaries: readonly ColumnSummary[]): string {
  if (summaries.length === 0) return 'No columns to summarize.'
  return summaries
    .slice(0, MAX_SUMMARIZED_COLUMNS)
    .map((summary) => {
      const lines = statLines(summary).map(([stat, value]) => `- ${stat}: ${value ?? 'n/a'}`)
      return [`${summary.name}:`, ...lines].join('\n')
    })
    .join('\n\n')
}

export function formatFooter(generatedAt: Date): string {
  return `Generated on ${dayjs(generatedAt).format('MMMM D, YYYY')}`
}

/** Sanitized report content in its fixed block order */
export function buildReportDocument(
  snapshot: StatisticsSnapshot,
  sections: ParsedReport,
  options: ReportOptions = {}
): ReportDocument {
  const blocks: ReportSection[] = [
    { title: 'Dataset Overview', body: overviewBlock(snapshot) },
    { title: 'AI-Generated Insights', body: insightsBlock(sections) },
    { title: 'Data Types Analysis', body: dataTypesBlock(snapshot) },
    { title: 'Statistical Summary', body: statisticsBlock(snapshot.columnSummaries) },
  ]
  return {
    title: sanitizeForPdf(options.title ?? REPORT_TITLE),
    blocks: blocks.map(({ title, body }) => ({ title: sanitizeForPdf(title), body: sanitizeForPdf(body) })),
    footer: formatFooter(options.generatedAt ?? new Date()),
  }
}

// ─────────────────────────────────────────────
// PDF LAYOUT
// ─────────────────────────────────────────────

const MARGINS = { top: 80, bottom: 60, left: 50, right: 50 }
const HEADER_Y = 30
const FOOTER_OFFSET = 40
const HEADER_COLOR = '#1abc9c'
const SECTION_COLOR = '#00bfa6'
const BODY_COLOR = '#323232'
const FOOTER_COLOR = '#a9a9a9'

/** Lay the document out as PDF bytes */
export function renderPdf(report: ReportDocument): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({ size: 'A4', margins: MARGINS, bufferPages: true, info: { Title: report.title } })
    const chunks: Buffer[] = []
    doc.on('data', (chunk: Buffer) => chunks.push(chunk))
    doc.on('end', () => resolve(Buffer.concat(chunks)))
    doc.on('error', reject)

    const contentWidth = doc.page.width - MARGINS.left - MARGINS.right

    for (const block of report.blocks) {
      doc.font('Helvetica-Bold').fontSize(13).fillColor(SECTION_COLOR)
      doc.text(block.title, MARGINS.left, doc.y, { width: contentWidth })
      doc.moveDown(0.3)
      doc.font('Helvetica').fontSize(11).fillColor(BODY_COLOR)
      doc.text(block.body || ' ', { width: contentWidth, lineGap: 2 })
      doc.moveDown(1)
    }

    // Header and footer go on every page once the content has been paginated
    const range = doc.bufferedPageRange()
    for (let i = range.start; i < range.start + range.count; i++) {
      doc.switchToPage(i)
      // Writing inside the bottom margin would otherwise start a new page
      const bottom = doc.page.margins.bottom
      doc.page.margins.bottom = 0
      doc.font('Helvetica-Bold').fontSize(16).fillColor(HEADER_COLOR)
      doc.text(report.title, MARGINS.left, HEADER_Y, { width: contentWidth, align: 'center', lineBreak: false })
      doc.font('Helvetica').fontSize(9).fillColor(FOOTER_COLOR)
      doc.text(report.footer, MARGINS.left, doc.page.height - FOOTER_OFFSET, {
        width: contentWidth,
        align: 'center',
        lineBreak: false,
      })
      doc.page.margins.bottom = bottom
    }
    doc.end()
  })
}

/** Build and render in one step */
export function renderReport(
  snapshot: StatisticsSnapshot,
  sections: ParsedReport,
  options: ReportOptions = {}
): Promise<Buffer> {
  return renderPdf(buildReportDocument(snapshot, sections, options))
}

/** Writes the bytes once to the caller's location */
export async function writeReport(filePath: string, bytes: Buffer): Promise<void> {
  await writeFile(filePath, bytes)
}
