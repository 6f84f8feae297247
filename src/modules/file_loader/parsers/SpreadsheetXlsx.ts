import * as XLSX from 'xlsx'
import { v4 as uuidv4 } from 'uuid'
import type { Parser, ParseResult } from './BaseParser'
import { tableFromRows } from '@/utils/table'

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04]

interface DateCode {
  y: number
  m: number
  d: number
  H: number
  M: number
  S: number
  u: number
}

function isBlankRow(row: readonly unknown[]): boolean {
  return row.every(v => v === null || v === undefined || v === '')
}

/**
 * Date serial as ISO text. The wall-clock value stored in the workbook is
 * written as UTC, the same reading the renderer gives offset-less CSV text.
 */
export function serialToIso(serial: number, date1904 = false): string | null {
  const code: DateCode | null = XLSX.SSF.parse_date_code(serial, { date1904 })
  if (!code) return null
  const ms = Date.UTC(code.y, code.m - 1, code.d, code.H, code.M, code.S) + Math.round(code.u * 1000)
  return Number.isFinite(ms) ? new Date(ms).toISOString() : null
}

// replaces date-formatted numeric cells with their ISO text, in place
function stampDates(ws: XLSX.WorkSheet, date1904: boolean): void {
  for (const addr of Object.keys(ws)) {
    if (addr.startsWith('!')) continue
    const cell: XLSX.CellObject = ws[addr]
    if (cell.t !== 'n' || typeof cell.v !== 'number' || typeof cell.z !== 'string') continue
    const isDate: boolean = XLSX.SSF.is_date(cell.z)
    if (!isDate) continue
    const iso = serialToIso(cell.v, date1904)
    if (iso !== null) ws[addr] = { t: 's', v: iso }
  }
}

const SpreadsheetXlsx: Parser = {
  id: 'spreadsheet-xlsx',
  label: 'Excel workbook (.xlsx)',
  fileExtensions: ['.xlsx'],
  parse: (bytes, filename): ParseResult => {
    if (!ZIP_SIGNATURE.every((b, i) => bytes[i] === b)) {
      return { ok: false, error: 'File is not a zip file' }
    }
    try {
      const wb = XLSX.read(bytes, { type: 'array', cellDates: false, cellNF: true })
      const sheetName = wb.SheetNames[0]
      const ws = sheetName === undefined ? undefined : wb.Sheets[sheetName]
      if (!ws) return { ok: false, error: 'Workbook contains no worksheets' }
      stampDates(ws, Boolean(wb.Workbook?.WBProps?.date1904))

      const matrix = XLSX.utils
        .sheet_to_json<unknown[]>(ws, { header: 1, raw: true, defval: null, blankrows: false })
        .filter(row => !isBlankRow(row))
      const [header, ...rows] = matrix
      if (!header) return { ok: false, error: 'No columns to parse from file' }

      // cells right of the header row still get a column, named like a blank header
      const width = rows.reduce((w, r) => Math.max(w, r.length), header.length)
      const paddedHeader = Array.from({ length: width }, (_, j) => header[j] ?? null)
      const table = tableFromRows(paddedHeader, rows)

      return {
        ok: true,
        dataset: {
          id: uuidv4(),
          name: filename,
          parserId: 'spreadsheet-xlsx',
          loadedAt: new Date().toISOString(),
          columns: table.columns,
          rowCount: table.rowCount,
        },
      }
    } catch (e) {
      return { ok: false, error: 'Failed to read workbook: ' + (e instanceof Error ? e.message : String(e)) }
    }
  },
}

export default SpreadsheetXlsx
