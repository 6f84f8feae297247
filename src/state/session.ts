import type { DatasetMap, Diagnostic, PlotSpec, PlotSpecField, RenderedFigure, Upload } from '@/types'
import { config } from '@/config'
import { loadFiles } from '@/modules/file_loader'
import { renderAll } from '@/modules/renderer'
import { buildCatalog } from '@/utils/catalog'
import { appendLog, createCollector, diagnostic, logToConsole } from '@/utils/diagnostics'
import { applyUpdate, PlotConfigError, resizeSpecs } from './plotConfig'

/**
 * Everything one upload batch owns. Handlers take a session and return the
 * next one; nothing here is shared between sessions.
 */
export interface Session {
  datasets: DatasetMap
  catalog: string[]
  /** 0 while no dataset loaded, otherwise 1-4 and equal to specs.length */
  count: number
  specs: PlotSpec[]
  figures: RenderedFigure[]
  /** figures were rendered from an older configuration */
  stale: boolean
  log: Diagnostic[]
}

const AXIS_LABEL = { xColumn: 'X-axis', yColumn: 'Y-axis' } as const

function withLog(session: Session, entries: readonly Diagnostic[]): Session {
  if (!entries.length) return session
  entries.forEach(logToConsole)
  return { ...session, log: appendLog(session.log, entries, config.logLimit) }
}

// Config mutations that the store refuses are logged, not thrown.
function guarded(session: Session, subject: string, fn: () => Session): Session {
  try {
    return fn()
  } catch (e) {
    if (e instanceof PlotConfigError) {
      return withLog(session, [diagnostic('InvalidPlotConfig', subject, `${subject}: ${e.message}`)])
    }
    throw e
  }
}

export function hasData(session: Session): boolean {
  return session.datasets.size > 0
}

export function startSession(uploads: readonly Upload[], plotCount: number = config.defaultPlotCount): Session {
  const { report, items } = createCollector()
  const datasets = loadFiles(uploads, report)
  const empty: Session = { datasets, catalog: [], count: 0, specs: [], figures: [], stale: false, log: [] }

  if (datasets.size === 0) {
    report(diagnostic('EmptyCatalog', 'upload', 'No usable data: none of the uploaded files could be loaded'))
    return withLog(empty, items)
  }

  report(diagnostic('Info', 'upload', `Loaded ${datasets.size} of ${uploads.length} file(s)`))
  const specs = resizeSpecs([], plotCount, datasets)
  return withLog({ ...empty, catalog: buildCatalog(datasets), count: plotCount, specs }, items)
}

export function setCount(session: Session, n: number): Session {
  return guarded(session, 'Number of Plots', () => {
    const specs = resizeSpecs(session.specs, n, session.datasets)
    if (n === session.count) return session
    return { ...session, count: n, specs, stale: session.figures.length > 0 }
  })
}

export function updateSpec(session: Session, slot: number, field: PlotSpecField, value: string): Session {
  const subject = `Plot ${slot + 1}`
  return guarded(session, subject, () => {
    const current = session.specs[slot]
    if (!Number.isInteger(slot) || current === undefined) {
      throw new PlotConfigError(`there is no plot slot ${slot + 1}`)
    }
    const { spec, reset } = applyUpdate(current, field, value, session.datasets)
    const specs = session.specs.map((s, i) => (i === slot ? spec : s))
    const notes = reset.map(axis =>
      diagnostic(
        'StaleColumnReference',
        subject,
        `${subject}: ${AXIS_LABEL[axis]} reset to "${spec[axis]}" (previous column not in ${spec.source})`,
      ),
    )
    return withLog({ ...session, specs, stale: session.figures.length > 0 }, notes)
  })
}

/** The only place figures are produced: renders every slot, in slot order. */
export function generate(session: Session): Session {
  const { report, items } = createCollector()
  const figures = renderAll(session.specs, session.datasets, report)
  return withLog({ ...session, figures, stale: false }, items)
}
