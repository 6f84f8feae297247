import type { Dataset, Upload } from '@/types'
import { diagnostic, type Reporter } from '@/utils/diagnostics'
import { pickParserFor } from './registry'
import type { ParseResult } from './parsers/BaseParser'

function toBytes(bytes: ArrayBuffer | Uint8Array): Uint8Array {
  return bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes)
}

/**
 * Decodes every upload with the parser registered for its extension.
 * Failures are reported once per file and never abort the batch; the result
 * holds only the files that loaded, in upload order.
 */
export function loadFiles(uploads: readonly Upload[], report: Reporter): Map<string, Dataset> {
  const out = new Map<string, Dataset>()
  for (const file of uploads) {
    const parser = pickParserFor(file.name)
    if (!parser) {
      report(diagnostic('UnsupportedFileType', file.name, `Unsupported file type: ${file.name}`))
      continue
    }
    let res: ParseResult
    if ('readError' in file) {
      res = { ok: false, error: file.readError }
    } else {
      try {
        res = parser.parse(toBytes(file.bytes), file.name)
      } catch (e) {
        res = { ok: false, error: e instanceof Error ? e.message : String(e) }
      }
    }
    if (!res.ok) {
      report(diagnostic('DecodeFailure', file.name, `Error loading ${file.name}: ${res.error}`))
      continue
    }
    for (const w of res.warnings ?? []) {
      report(diagnostic('ParseWarning', file.name, `${file.name}: ${w}`))
    }
    if (out.has(file.name)) {
      report(diagnostic('ParseWarning', file.name, `${file.name}: uploaded twice, keeping the last copy`))
    }
    out.set(file.name, res.dataset)
  }
  return out
}
