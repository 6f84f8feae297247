import type { Diagnostic, DiagnosticKind, DiagnosticLevel } from '@/types'

export type Reporter = (d: Diagnostic) => void

const LEVEL_BY_KIND: Record<DiagnosticKind, DiagnosticLevel> = {
  UnsupportedFileType: 'error',
  DecodeFailure: 'error',
  ParseWarning: 'warn',
  EmptyCatalog: 'error',
  StaleColumnReference: 'info',
  UnsupportedRenderMode: 'error',
  InvalidPlotConfig: 'warn',
  RenderFailure: 'error',
  Info: 'info',
}

const PREFIX: Record<DiagnosticLevel, string> = {
  error: '[ERR]',
  warn: '[WARN]',
  info: '[INFO]',
}

export function diagnostic(
  kind: DiagnosticKind,
  subject: string,
  message: string,
  level: DiagnosticLevel = LEVEL_BY_KIND[kind],
): Diagnostic {
  return { level, kind, subject, message }
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${PREFIX[d.level]} ${d.message}`
}

export function logToConsole(d: Diagnostic) {
  const line = formatDiagnostic(d)
  if (d.level === 'error') console.error(line)
  else if (d.level === 'warn') console.warn(line)
  else console.info(line)
}

/** Collects diagnostics in report order. */
export function createCollector(): { report: Reporter; items: Diagnostic[] } {
  const items: Diagnostic[] = []
  return { report: (d) => { items.push(d) }, items }
}

// Newest batch first; within a batch, report order.
export function appendLog(log: readonly Diagnostic[], entries: readonly Diagnostic[], limit: number): Diagnostic[] {
  return [...entries, ...log].slice(0, limit)
}
