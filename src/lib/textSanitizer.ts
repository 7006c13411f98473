/**
 * PDF-safe text: the standard PDF fonts only cover a Latin code page. Text is decomposed
 * (NFKD), typographic punctuation, math symbols and pictographs are mapped to ASCII,
 * accents are transliterated and anything left outside printable ASCII is dropped.
 */

/** Applied to NFKD text, in order: longer sequences (with variation selectors) come first */
export const PDF_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['⚠️', '[Warning]'],
  ['⚠', '[Warning]'],
  ['✔️', '[OK]'],
  ['✔', '[OK]'],
  ['✅', '[OK]'],
  ['✓', '[OK]'],
  ['❌', '[X]'],
  ['✖', '[X]'],
  ['\u{1F4CA}', '[Chart]'],
  ['\u{1F4C8}', '[Graph]'],
  ['\u{1F4C9}', '[Graph]'],
  ['⚡', '*'],
  ['✨', '*'],
  ['\u{1F525}', '*'],
  ['—', '-'],
  ['–', '-'],
  ['‘', "'"],
  ['’', "'"],
  ['“', '"'],
  ['”', '"'],
  ['•', '-'],
  ['…', '...'],
  ['\u00A0', ' '],
  // "½" decomposes to 1, U+2044, 2
  ['\u2044', '/'],
  ['≈', '~'],
  ['×', 'x'],
  ['≥', '>='],
  ['≤', '<='],
]

// Combining marks left behind by NFKD, e.g. the accent of "é"
const COMBINING_MARKS = /[\u0300-\u036f]/g
// Anything but tab, newline and printable ASCII
const NON_PRINTABLE = /[^\t\n\x20-\x7E]/g

export function sanitizeForPdf(input: unknown): string {
  let text = (typeof input === 'string' ? input : String(input ?? '')).replace(/\r\n?/g, '\n').normalize('NFKD')
  for (const [from, to] of PDF_REPLACEMENTS) {
    text = text.split(from).join(to)
  }
  return text
    .replace(COMBINING_MARKS, '')
    .replace(NON_PRINTABLE, '')
}
