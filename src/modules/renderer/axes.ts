import type { AxisType, Cell } from '@/types'
import { toNumber } from '@/utils/table'

export interface ResolvedAxis {
  type: AxisType
  values: (number | null)[]
  categories?: string[]
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/
const CLOCK = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?$/

/**
 * Milliseconds for an ISO date/time (UTC unless it carries an offset) or for a
 * clock time of day (since midnight). Null for anything else.
 */
export function parseTemporal(cell: Cell): number | null {
  if (typeof cell !== 'string') return null
  const s = cell.trim()
  const iso = ISO_DATE.exec(s)
  if (iso) {
    const normalized = s.replace(' ', 'T')
    const hasTime = normalized.includes('T')
    const ms = Date.parse(hasTime && !iso[1] ? normalized + 'Z' : normalized)
    return Number.isFinite(ms) ? ms : null
  }
  const clock = CLOCK.exec(s)
  if (clock) {
    const h = parseInt(clock[1], 10)
    const m = parseInt(clock[2], 10)
    const sec = clock[3] ? parseInt(clock[3], 10) : 0
    const frac = clock[4] ? Number('0.' + clock[4]) : 0
    if (h > 23 || m > 59 || sec > 59) return null
    return ((h * 60 + m) * 60 + sec) * 1000 + Math.round(frac * 1000)
  }
  return null
}

export function numericValues(cells: readonly Cell[]): (number | null)[] {
  return cells.map(toNumber)
}

/**
 * Picks the X axis kind from the non-empty cells: all numeric -> linear, all
 * temporal -> date, otherwise category (index of each label's first occurrence).
 */
export function resolveXAxis(cells: readonly Cell[]): ResolvedAxis {
  const present = cells.filter(c => c !== null)
  if (present.every(c => toNumber(c) !== null)) {
    return { type: 'linear', values: numericValues(cells) }
  }
  if (present.every(c => parseTemporal(c) !== null)) {
    return { type: 'date', values: cells.map(parseTemporal) }
  }
  const categories: string[] = []
  const index = new Map<string, number>()
  const values = cells.map(c => {
    if (c === null) return null
    const label = String(c)
    let i = index.get(label)
    if (i === undefined) {
      i = categories.length
      categories.push(label)
      index.set(label, i)
    }
    return i
  })
  return { type: 'category', values, categories }
}
