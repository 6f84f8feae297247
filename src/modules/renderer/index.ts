export { renderFigure, renderAll, emptyFigure, RenderError, StaleColumnReferenceError } from './renderFigure'
export type { RenderRequest } from './renderFigure'
export { DARK_THEME, TRACE_COLORS, traceColor } from './theme'
export { resolveXAxis, parseTemporal, numericValues } from './axes'
