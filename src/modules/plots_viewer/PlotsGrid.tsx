import FigureChart from '@/components/FigureChart'
import { splitIntoGridColumns } from '@/state/plotConfig'
import type { RenderedFigure } from '@/types'

export default function PlotsGrid({ figures, stale }: { figures: RenderedFigure[]; stale: boolean }) {
  if (!figures.length) return null
  const columns = splitIntoGridColumns(figures)

  return (
    <div className="panel">
      {stale && <div className="badge warn">Settings changed. Press Generate Plots to refresh.</div>}
      <div className="grid-2">
        {columns.map((col, ci) => (
          <div key={ci} className="grid-col">
            {col.map(({ item }) => (
              <div key={item.id} className="chart-card">
                <FigureChart figure={item} />
              </div>
            ))}
          </div>
        ))}
      </div>
    </div>
  )
}
