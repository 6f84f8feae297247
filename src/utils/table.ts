import type { Cell, Column } from '@/types'

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const DECIMAL_COMMA = /^[+-]?\d*,\d+$/
// "1,000" reads as a thousands group as easily as 1.0
const GROUPED = /^[+-]?[1-9]\d{0,2},\d{3}$/

/**
 * Normalizes a raw decoded value: empty -> null, plain decimal text -> number.
 * Anything else is kept as text.
 */
export function coerceCell(raw: unknown): Cell {
  if (raw === null || raw === undefined) return null
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (typeof raw === 'boolean') return raw
  const s = String(raw).trim()
  if (!s) return null
  if (NUMERIC.test(s)) return Number(s)
  return s
}

export function toNumber(value: Cell): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string') {
    const trimmed = value.trim()
    let num = NaN
    if (NUMERIC.test(trimmed)) num = Number(trimmed)
    // allow comma as decimal separator
    else if (DECIMAL_COMMA.test(trimmed) && !GROUPED.test(trimmed)) num = Number(trimmed.replace(',', '.'))
    return Number.isFinite(num) ? num : null
  }
  return null
}

/** Header names made unique: blanks become `Unnamed: i`, repeats get `.1`, `.2`... */
export function uniqueHeaders(raw: readonly unknown[]): string[] {
  const used = new Set<string>()
  return raw.map((h, i) => {
    const text = h === null || h === undefined ? '' : String(h).trim()
    const base = text || `Unnamed: ${i}`
    let name = base
    for (let n = 1; used.has(name); n++) name = `${base}.${n}`
    used.add(name)
    return name
  })
}

export interface Table {
  columns: Column[]
  rowCount: number
  paddedRows: number
}

/**
 * Builds column-major storage from a header row and data rows. Short rows are
 * padded with nulls; callers reject rows wider than the header beforehand.
 */
export function tableFromRows(header: readonly unknown[], rows: readonly (readonly unknown[])[]): Table {
  const names = uniqueHeaders(header)
  const columns: Column[] = names.map(name => ({ name, values: [] }))
  let paddedRows = 0
  for (const row of rows) {
    if (row.length < names.length) paddedRows++
    columns.forEach((col, j) => {
      col.values.push(coerceCell(row[j]))
    })
  }
  return { columns, rowCount: rows.length, paddedRows }
}

export function findColumn(columns: readonly Column[], name: string): Column | undefined {
  return columns.find(c => c.name === name)
}
