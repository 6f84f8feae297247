import type { FigureTheme } from '@/types'

export const DARK_THEME: FigureTheme = {
  paper: '#111111',
  plot: '#111111',
  font: '#FFFFFF',
  grid: '#4a4a4a',
  zeroline: '#4a4a4a',
}

// one colour per slot
export const TRACE_COLORS = ['#636efa', '#EF553B', '#00cc96', '#ab63fa'] as const

export function traceColor(slot: number): string {
  return TRACE_COLORS[slot % TRACE_COLORS.length]
}
