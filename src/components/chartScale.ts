import type { AxisType, FigureTrace } from '@/types'

export interface Extent {
  min: number
  max: number
}

const DAY_MS = 86_400_000

export function extentOf(values: readonly (number | null)[]): Extent | null {
  let min = Infinity
  let max = -Infinity
  for (const v of values) {
    if (v === null || !Number.isFinite(v)) continue
    if (v < min) min = v
    if (v > max) max = v
  }
  return min <= max ? { min, max } : null
}

export function padExtent(e: Extent | null, axisType: AxisType = 'linear'): Extent {
  if (!e) return { min: 0, max: 1 }
  if (axisType === 'category') return { min: e.min - 0.5, max: e.max + 0.5 }
  const span = e.max - e.min
  if (span === 0) {
    const d = Math.max(Math.abs(e.max) * 0.1, 1)
    return { min: e.min - d, max: e.max + d }
  }
  return { min: e.min - span * 0.05, max: e.max + span * 0.05 }
}

// Simple ticks: 5 intervals on a numeric axis, one per label on a short category axis
export function axisTicks(e: Extent, axisType: AxisType, categoryCount = 0): number[] {
  if (axisType === 'category' && categoryCount > 0) {
    if (categoryCount <= 12) return Array.from({ length: categoryCount }, (_, i) => i)
    const step = (categoryCount - 1) / 5
    return Array.from({ length: 6 }, (_, i) => Math.round(i * step))
  }
  const span = e.max - e.min
  return Array.from({ length: 6 }, (_, i) => e.min + (span * i) / 5)
}

export function computeTickPrecision(span: number){
  if (!Number.isFinite(span) || span <= 0) return 0
  const step = Math.max(Math.abs(span) / 5, Number.EPSILON)
  const decimals = Math.max(0, Math.ceil(-Math.log10(step)))
  return Math.min(decimals, 6)
}

export interface TickFormat {
  axisType: AxisType
  precision: number
  categories?: readonly string[]
  // date axes: span of the data, picks between clock and calendar labels
  span?: number
  clock?: boolean
}

export function formatTick(value: number, fmt: TickFormat): string {
  if (!Number.isFinite(value)) return ''
  switch (fmt.axisType) {
    case 'category':
      return Number.isInteger(value) ? fmt.categories?.[value] ?? '' : ''
    case 'date': {
      const iso = new Date(value).toISOString()
      if (fmt.clock) return iso.slice(11, 19)
      return (fmt.span ?? 0) >= 2 * DAY_MS ? iso.slice(0, 10) : iso.slice(0, 16).replace('T', ' ')
    }
    case 'linear':
      return value.toFixed(Math.min(Math.max(fmt.precision, 0), 8))
  }
}

/** Clock-of-day values (all within the first day) label as hh:mm:ss. */
export function isClockAxis(axisType: AxisType, e: Extent | null): boolean {
  return axisType === 'date' && e !== null && e.min >= 0 && e.max < DAY_MS
}

/** Consecutive points with both coordinates present; gaps split a line. */
export function segments(trace: FigureTrace): { x: number; y: number }[][] {
  const out: { x: number; y: number }[][] = []
  let current: { x: number; y: number }[] = []
  trace.x.forEach((x, i) => {
    const y = trace.y[i]
    if (x === null || y === null || y === undefined) {
      if (current.length) out.push(current)
      current = []
      return
    }
    current.push({ x, y })
  })
  if (current.length) out.push(current)
  return out
}
