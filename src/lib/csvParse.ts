import Papa from 'papaparse'
import type { CellValue, Dataset, DataRow } from '../types'

function toCell(raw: unknown): CellValue {
  const trimmed = typeof raw === 'string' ? raw.trim() : raw == null ? '' : String(raw).trim()
  if (trimmed === '') return null
  const num = Number(trimmed)
  if (!Number.isNaN(num) && String(num) === trimmed) return num
  return trimmed
}

/** Unique header names; blanks become Column_N and repeats get a numeric suffix */
function normalizeHeaders(rawHeaders: unknown[]): string[] {
  const seen = new Map<string, number>()
  return rawHeaders.map((h, j) => {
    const base = (h != null ? String(h).trim() : '') || `Column_${j + 1}`
    const count = seen.get(base) ?? 0
    seen.set(base, count + 1)
    return count === 0 ? base : `${base}.${count}`
  })
}

/** Parse CSV text into a Dataset. The first row is the header; blank cells are null. */
export function parseCSV(csvText: string): Dataset {
  if (!csvText || typeof csvText !== 'string') return { columns: [], rows: [] }
  const parsed = Papa.parse<string[]>(csvText, { skipEmptyLines: true })
  const rows = Array.isArray(parsed?.data) ? parsed.data : []
  if (rows.length === 0) return { columns: [], rows: [] }

  const columns = normalizeHeaders(rows[0])
  const dataRows: DataRow[] = []
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i]
    const obj: DataRow = {}
    columns.forEach((h, j) => {
      obj[h] = toCell(row[j])
    })
    dataRows.push(obj)
  }
  return { columns, rows: dataRows }
}
