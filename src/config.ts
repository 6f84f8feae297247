function intFromEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number.parseInt(raw, 10)
  if (!Number.isFinite(n)) return fallback
  return Math.max(min, Math.min(max, n))
}

export const config = {
  appTitle: import.meta.env.VITE_APP_TITLE || 'DAQ Plotter',
  defaultPlotCount: intFromEnv(import.meta.env.VITE_DEFAULT_PLOT_COUNT, 2, 1, 4),
  // newest-first log lines kept in a session
  logLimit: intFromEnv(import.meta.env.VITE_LOG_LIMIT, 200, 1, 10000),
} as const
