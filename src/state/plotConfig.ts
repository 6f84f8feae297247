import type { Dataset, DatasetMap, PlotMode, PlotSpec, PlotSpecField } from '@/types'
import { columnNames } from '@/utils/catalog'

export const MIN_PLOTS = 1
export const MAX_PLOTS = 4
export const PLOT_COUNTS = [1, 2, 3, 4] as const

export const PLOT_MODES: readonly { id: PlotMode; label: string }[] = [
  { id: 'line', label: 'Line Plot' },
  { id: 'scatter', label: 'Scatter Plot' },
]

export class PlotConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PlotConfigError'
  }
}

export function isPlotMode(value: string): value is PlotMode {
  return PLOT_MODES.some(m => m.id === value)
}

export function computeTitle(spec: Pick<PlotSpec, 'source' | 'xColumn' | 'yColumn'>): string {
  return `${spec.source} - ${spec.yColumn} vs ${spec.xColumn}`
}

function withTitle(values: Omit<PlotSpec, 'title'>): PlotSpec {
  return { ...values, title: computeTitle(values) }
}

function firstDataset(datasets: DatasetMap): Dataset | undefined {
  for (const ds of datasets.values()) return ds
  return undefined
}

/** First and second column; a single-column dataset uses its only column for both. */
export function defaultColumns(ds: Dataset): [string, string] {
  const cols = columnNames(ds)
  const x = cols[0] ?? ''
  return [x, cols[1] ?? x]
}

export function defaultSpec(datasets: DatasetMap): PlotSpec {
  const ds = firstDataset(datasets)
  if (!ds) throw new PlotConfigError('No datasets loaded')
  const [xColumn, yColumn] = defaultColumns(ds)
  return withTitle({ source: ds.name, xColumn, yColumn, mode: 'line' })
}

export function assertPlotCount(n: number) {
  if (!Number.isInteger(n) || n < MIN_PLOTS || n > MAX_PLOTS) {
    throw new PlotConfigError(`Number of plots must be between ${MIN_PLOTS} and ${MAX_PLOTS}, got ${n}`)
  }
}

/** Grows with default slots or drops the tail; kept slots are returned as-is. */
export function resizeSpecs(specs: readonly PlotSpec[], n: number, datasets: DatasetMap): PlotSpec[] {
  assertPlotCount(n)
  if (n <= specs.length) return specs.slice(0, n)
  const added = Array.from({ length: n - specs.length }, () => defaultSpec(datasets))
  return [...specs, ...added]
}

export interface SpecUpdate {
  spec: PlotSpec
  reset: ('xColumn' | 'yColumn')[]
}

/**
 * Applies one field change to a slot. Switching the source re-validates both
 * axis columns right away: each one the new source lacks falls back to its
 * first (x) or second (y) column.
 */
export function applyUpdate(spec: PlotSpec, field: PlotSpecField, value: string, datasets: DatasetMap): SpecUpdate {
  switch (field) {
    case 'source': {
      const ds = datasets.get(value)
      if (!ds) throw new PlotConfigError(`Unknown data source: ${value}`)
      const cols = columnNames(ds)
      const [x, y] = defaultColumns(ds)
      const reset: SpecUpdate['reset'] = []
      let { xColumn, yColumn } = spec
      if (!cols.includes(xColumn)) {
        xColumn = x
        reset.push('xColumn')
      }
      if (!cols.includes(yColumn)) {
        yColumn = y
        reset.push('yColumn')
      }
      return { spec: withTitle({ source: value, xColumn, yColumn, mode: spec.mode }), reset }
    }
    case 'xColumn':
    case 'yColumn': {
      const ds = datasets.get(spec.source)
      if (!ds || !columnNames(ds).includes(value)) {
        throw new PlotConfigError(`Column "${value}" does not exist in ${spec.source}`)
      }
      const next = field === 'xColumn' ? { ...spec, xColumn: value } : { ...spec, yColumn: value }
      return { spec: withTitle(next), reset: [] }
    }
    case 'mode': {
      if (!isPlotMode(value)) throw new PlotConfigError(`Unsupported plot type: ${value}`)
      return { spec: { ...spec, mode: value }, reset: [] }
    }
  }
}

/** Slots sit in a two-column grid: slot i goes to column i mod 2. */
export function gridColumn(slot: number): 0 | 1 {
  return slot % 2 === 0 ? 0 : 1
}

export function splitIntoGridColumns<T>(items: readonly T[]): [{ item: T; slot: number }[], { item: T; slot: number }[]] {
  const cols: [{ item: T; slot: number }[], { item: T; slot: number }[]] = [[], []]
  items.forEach((item, slot) => {
    cols[gridColumn(slot)].push({ item, slot })
  })
  return cols
}
