import type { Parser } from './parsers/BaseParser'
import DelimitedCsv from './parsers/DelimitedCsv'
import SpreadsheetXlsx from './parsers/SpreadsheetXlsx'

const registry: Parser[] = [
  DelimitedCsv,
  SpreadsheetXlsx
]

export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.')
  return dot >= 0 ? filename.slice(dot).toLowerCase() : ''
}

export function pickParserFor(filename: string): Parser | null {
  const ext = extensionOf(filename)
  if (!ext) return null
  return registry.find(p => p.fileExtensions.includes(ext)) ?? null
}

/** Value for the upload input's `accept` attribute. */
export function acceptedExtensions(): string {
  return registry.flatMap(p => p.fileExtensions).join(',')
}
