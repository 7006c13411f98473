/**
 * Section parser: splits backend output back into titled sections.
 *
 * Model and fallback text use the four fixed narrative markers; API text is split on
 * the heading marker the remote model is asked to emit. Never throws: text that matches
 * neither form comes back verbatim as a single "Summary" section.
 */

import type { BackendResult, ParsedReport } from '../types'
import { NARRATIVE_SECTIONS } from './narrativeComposer'

export type ParseStrategy = 'fixed-markers' | 'headings'

export const GENERIC_SECTION_TITLE = 'Summary'

export interface ParseOptions {
  /** Joins body lines of heading-delimited sections */
  lineBreak?: string
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const MARKER_PATTERNS = NARRATIVE_SECTIONS.map(({ title }) => ({
  title,
  pattern: new RegExp(`${escapeRegExp(title)}\\s*:`, 'i'),
}))

// Heading lines such as "### Key Findings" (one to six #)
const HEADING_SPLIT = /^[ \t]*#{1,6}[ \t]+/m

function genericReport(text: string): ParsedReport {
  return [{ title: GENERIC_SECTION_TITLE, body: text }]
}

/**
 * Body of each known marker runs to the next marker found after it, or end of text.
 * Sections come back in order of appearance. Returns null when no marker is present.
 */
export function parseFixedMarkers(text: string): ParsedReport | null {
  const found = MARKER_PATTERNS.map(({ title, pattern }) => {
    const match = pattern.exec(text)
    return { title, start: match ? match.index : -1, end: match ? match.index + match[0].length : -1 }
  })
  if (found.every((m) => m.start < 0)) return null

  // Sections in order of appearance; markers not found follow with empty bodies
  const ordered = [...found.filter((m) => m.start >= 0).sort((a, b) => a.start - b.start), ...found.filter((m) => m.start < 0)]
  return ordered.map(({ title, start, end }) => {
    if (start < 0) return { title, body: '' }
    const next = found
      .filter((m) => m.start > start)
      .reduce((nearest, m) => Math.min(nearest, m.start), text.length)
    return { title, body: text.slice(end, next).trim() }
  })
}

/** Strip markdown emphasis and a trailing colon from a heading line */
export function cleanHeading(line: string): string {
  return line
    .replace(/[*_`#]+/g, '')
    .trim()
    .replace(/:$/, '')
    .trim()
}

/** Returns null when the text has no heading */
export function parseHeadings(text: string, options: ParseOptions = {}): ParsedReport | null {
  const lineBreak = options.lineBreak ?? '\n'
  const chunks = text.split(HEADING_SPLIT)
  if (chunks.length < 2) return null

  const report: ParsedReport = []
  const preamble = chunks[0].trim()
  if (preamble) report.push({ title: GENERIC_SECTION_TITLE, body: preamble })

  for (const chunk of chunks.slice(1)) {
    const [first = '', ...rest] = chunk.split(/\r?\n/)
    const title = cleanHeading(first) || GENERIC_SECTION_TITLE
    const body = rest
      .map((line) => line.trim())
      .filter((line) => line !== '')
      .join(lineBreak)
    report.push({ title, body })
  }
  return report
}

export function parseSections(text: string, strategy: ParseStrategy, options: ParseOptions = {}): ParsedReport {
  if (strategy === 'headings') {
    return parseHeadings(text, options) ?? parseFixedMarkers(text) ?? genericReport(text)
  }
  return parseFixedMarkers(text) ?? genericReport(text)
}

/** Picks the strategy from the backend that produced the text */
export function parseBackendResult(result: BackendResult, options: ParseOptions = {}): ParsedReport {
  return parseSections(result.text, result.source === 'api' ? 'headings' : 'fixed-markers', options)
}
