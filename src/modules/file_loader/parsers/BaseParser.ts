import type { Dataset } from '@/types'

export interface ParseResultOk {
  ok: true
  dataset: Dataset
  warnings?: string[]
}
export interface ParseResultErr {
  ok: false
  error: string
}
export type ParseResult = ParseResultOk | ParseResultErr

export interface Parser {
  id: string
  label: string
  fileExtensions: string[]
  parse: (bytes: Uint8Array, filename: string) => ParseResult
}
