import type { RenderedFigure } from '@/types'
import { useMeasuredWidth } from '@/hooks/useMeasuredWidth'
import {
  axisTicks,
  computeTickPrecision,
  extentOf,
  formatTick,
  isClockAxis,
  padExtent,
  segments,
} from './chartScale'

const FALLBACK_WIDTH = 640
const MARKER_RADIUS = 3

/**
 * Draws a RenderedFigure as SVG. The figure's theme colours every surface;
 * `lines` traces become paths and `markers` traces become circles.
 */
export default function FigureChart({ figure, height = 360 }: { figure: RenderedFigure; height?: number }) {
  const { ref, width } = useMeasuredWidth<HTMLDivElement>(FALLBACK_WIDTH)
  const { theme } = figure

  const pad = { top: 44, right: 16, bottom: 48, left: 64 }
  const innerW = Math.max(10, width - pad.left - pad.right)
  const innerH = Math.max(10, height - pad.top - pad.bottom)

  const rawX = extentOf(figure.traces.flatMap(t => t.x))
  const xExtent = padExtent(rawX, figure.axisType)
  const yExtent = padExtent(extentOf(figure.traces.flatMap(t => t.y)))
  const dx = (xExtent.max - xExtent.min) || 1
  const dy = (yExtent.max - yExtent.min) || 1

  const sx = (x: number) => pad.left + ((x - xExtent.min) / dx) * innerW
  const sy = (y: number) => pad.top + innerH - ((y - yExtent.min) / dy) * innerH

  const xticks = axisTicks(xExtent, figure.axisType, figure.categories?.length ?? 0)
  const yticks = axisTicks(yExtent, 'linear')
  const xFormat = {
    axisType: figure.axisType,
    precision: computeTickPrecision(dx),
    categories: figure.categories,
    span: rawX ? rawX.max - rawX.min : 0,
    clock: isClockAxis(figure.axisType, rawX),
  }
  const yFormat = { axisType: 'linear' as const, precision: computeTickPrecision(dy) }

  function renderPath(points: { x: number; y: number }[]) {
    return points.map((p, i) => `${i ? 'L' : 'M'} ${sx(p.x).toFixed(2)} ${sy(p.y).toFixed(2)}`).join(' ')
  }

  const clipId = `plot-clip-${figure.id}`
  const showZeroX = figure.axisType === 'linear' && xExtent.min < 0 && xExtent.max > 0
  const showZeroY = yExtent.min < 0 && yExtent.max > 0

  return (
    <div ref={ref} className="figure-chart" style={{ width: '100%', background: theme.paper }}>
      <svg width={width} height={height} role="img" aria-label={figure.title}>
        <defs>
          <clipPath id={clipId}>
            <rect x={pad.left} y={pad.top} width={innerW} height={innerH} />
          </clipPath>
        </defs>
        <rect x={0} y={0} width={width} height={height} fill={theme.paper} />
        <rect x={pad.left} y={pad.top} width={innerW} height={innerH} fill={theme.plot} />

        <text x={width / 2} y={24} textAnchor="middle" fontSize={15} fontWeight={600} fill={theme.font}>
          {figure.title}
        </text>

        {/* Grid + ticks */}
        {xticks.map((t, i) => (
          <g key={`x-${i}`}>
            <line x1={sx(t)} y1={pad.top} x2={sx(t)} y2={pad.top + innerH} stroke={theme.grid} strokeDasharray="3,4" />
            <text x={sx(t)} y={pad.top + innerH + 16} textAnchor="middle" fontSize={11} fill={theme.font}>
              {formatTick(t, xFormat)}
            </text>
          </g>
        ))}
        {yticks.map((t, i) => (
          <g key={`y-${i}`}>
            <line x1={pad.left} y1={sy(t)} x2={pad.left + innerW} y2={sy(t)} stroke={theme.grid} strokeDasharray="3,4" />
            <text x={pad.left - 8} y={sy(t) + 4} textAnchor="end" fontSize={11} fill={theme.font}>
              {formatTick(t, yFormat)}
            </text>
          </g>
        ))}
        {showZeroX && <line x1={sx(0)} y1={pad.top} x2={sx(0)} y2={pad.top + innerH} stroke={theme.zeroline} />}
        {showZeroY && <line x1={pad.left} y1={sy(0)} x2={pad.left + innerW} y2={sy(0)} stroke={theme.zeroline} />}

        <g clipPath={`url(#${clipId})`}>
          {figure.traces.map((trace, ti) =>
            trace.mode === 'lines'
              ? segments(trace).map((seg, si) => (
                  <path
                    key={`${ti}-${si}`}
                    className="figure-trace"
                    d={renderPath(seg)}
                    fill="none"
                    stroke={trace.color}
                    strokeWidth={2}
                  />
                ))
              : segments(trace).flat().map((p, pi) => (
                  <circle
                    key={`${ti}-${pi}`}
                    className="figure-marker"
                    cx={sx(p.x)}
                    cy={sy(p.y)}
                    r={MARKER_RADIUS}
                    fill={trace.color}
                  />
                ))
          )}
        </g>

        {figure.error && (
          <text
            className="figure-error"
            x={pad.left + innerW / 2}
            y={pad.top + innerH / 2}
            textAnchor="middle"
            fontSize={13}
            fill={theme.font}
          >
            {figure.error}
          </text>
        )}

        <text x={pad.left + innerW / 2} y={height - 10} textAnchor="middle" fontSize={12} fill={theme.font}>
          {figure.xLabel}
        </text>
        <text
          transform={`translate(16 ${pad.top + innerH / 2}) rotate(-90)`}
          textAnchor="middle"
          fontSize={12}
          fill={theme.font}
        >
          {figure.yLabel}
        </text>
      </svg>
    </div>
  )
}
