import Papa from 'papaparse'
import { v4 as uuidv4 } from 'uuid'
import type { Parser, ParseResult } from './BaseParser'
import { tableFromRows } from '@/utils/table'

function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch {
    return null
  }
}

const DelimitedCsv: Parser = {
  id: 'delimited-csv',
  label: 'Delimited text (.csv)',
  fileExtensions: ['.csv'],
  parse: (bytes, filename): ParseResult => {
    const text = decodeUtf8(bytes)
    if (text === null) return { ok: false, error: 'File is not valid UTF-8 text' }

    const res = Papa.parse<string[]>(text, { header: false, dynamicTyping: false, skipEmptyLines: 'greedy' })
    // delimiter-detection errors (single-column files) are not fatal
    const quoteError = res.errors.find(e => e.type === 'Quotes')
    if (quoteError) {
      const where = quoteError.row !== undefined ? ` (data row ${quoteError.row})` : ''
      return { ok: false, error: quoteError.message + where }
    }

    const [header, ...rows] = res.data
    if (!header || header.length === 0) return { ok: false, error: 'No columns to parse from file' }

    const wide = rows.findIndex(r => r.length > header.length)
    if (wide >= 0) {
      return { ok: false, error: `Expected ${header.length} fields in data row ${wide + 1}, saw ${rows[wide].length}` }
    }

    const table = tableFromRows(header, rows)
    const warnings: string[] = []
    if (table.paddedRows > 0) warnings.push(`Padded ${table.paddedRows} short row(s) with empty cells`)

    return {
      ok: true,
      dataset: {
        id: uuidv4(),
        name: filename,
        parserId: 'delimited-csv',
        loadedAt: new Date().toISOString(),
        columns: table.columns,
        rowCount: table.rowCount,
      },
      warnings: warnings.length ? warnings : undefined,
    }
  },
}

export default DelimitedCsv
