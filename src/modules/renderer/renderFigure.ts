import { v4 as uuidv4 } from 'uuid'
import type { Dataset, DatasetMap, FigureTrace, PlotMode, PlotSpec, RenderedFigure } from '@/types'
import { diagnostic, type Reporter } from '@/utils/diagnostics'
import { findColumn } from '@/utils/table'
import { isPlotMode } from '@/state/plotConfig'
import { resolveXAxis, numericValues } from './axes'
import { DARK_THEME, traceColor } from './theme'

/** A spec as handed to the renderer; the mode is not trusted to be known. */
export interface RenderRequest extends Omit<PlotSpec, 'mode'> {
  mode: string
}

export class RenderError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RenderError'
  }
}

export class StaleColumnReferenceError extends RenderError {
  constructor(message: string) {
    super(message)
    this.name = 'StaleColumnReferenceError'
  }
}

const TRACE_MODES: Record<PlotMode, FigureTrace['mode']> = {
  line: 'lines',
  scatter: 'markers',
}

export function emptyFigure(spec: RenderRequest, slot: number): RenderedFigure {
  return {
    id: uuidv4(),
    slot,
    title: spec.title,
    xLabel: spec.xColumn,
    yLabel: spec.yColumn,
    axisType: 'linear',
    traces: [],
    theme: DARK_THEME,
  }
}

function requireColumn(dataset: Dataset, name: string) {
  const col = findColumn(dataset.columns, name)
  if (!col) throw new StaleColumnReferenceError(`Column "${name}" does not exist in ${dataset.name}`)
  return col
}

/**
 * Builds one figure from a spec and its source dataset. Points keep row order.
 * An unknown mode yields an empty figure plus one diagnostic; missing or
 * non-numeric columns throw.
 */
export function renderFigure(spec: RenderRequest, dataset: Dataset, slot: number, report: Reporter): RenderedFigure {
  const base = emptyFigure(spec, slot)
  if (!isPlotMode(spec.mode)) {
    report(diagnostic('UnsupportedRenderMode', `Plot ${slot + 1}`, `Unsupported plot type: ${spec.mode}`))
    return base
  }

  const x = resolveXAxis(requireColumn(dataset, spec.xColumn).values)
  const y = numericValues(requireColumn(dataset, spec.yColumn).values)
  if (dataset.rowCount > 0 && y.every(v => v === null)) {
    throw new RenderError(`Column "${spec.yColumn}" in ${dataset.name} has no numeric values`)
  }

  return {
    ...base,
    axisType: x.type,
    categories: x.categories,
    traces: [{
      name: spec.yColumn,
      x: x.values,
      y,
      mode: TRACE_MODES[spec.mode],
      color: traceColor(slot),
    }],
  }
}

/**
 * Renders every slot in order. A failing slot gets a figure carrying its error
 * and the rest of the batch still renders.
 */
export function renderAll(specs: readonly RenderRequest[], datasets: DatasetMap, report: Reporter): RenderedFigure[] {
  return specs.map((spec, slot) => {
    try {
      const ds = datasets.get(spec.source)
      if (!ds) throw new StaleColumnReferenceError(`Data source ${spec.source} is not loaded`)
      return renderFigure(spec, ds, slot, report)
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e)
      const kind = e instanceof StaleColumnReferenceError ? 'StaleColumnReference' : 'RenderFailure'
      report(diagnostic(kind, `Plot ${slot + 1}`, `Plot ${slot + 1}: ${message}`, 'error'))
      return { ...emptyFigure(spec, slot), error: message }
    }
  })
}
