import { useApp } from '@/state/SessionContext'
import { splitIntoGridColumns } from '@/state/plotConfig'
import type { Session } from '@/state/session'
import PlotSlotEditor from './PlotSlotEditor'

export default function PlotConfigGrid({ session }: { session: Session }) {
  const updateSpec = useApp(s => s.updateSpec)
  const columns = splitIntoGridColumns(session.specs)

  return (
    <div className="grid-2">
      {columns.map((col, ci) => (
        <div key={ci} className="grid-col">
          {col.map(({ item, slot }) => (
            <PlotSlotEditor
              key={slot}
              slot={slot}
              spec={item}
              datasets={session.datasets}
              catalog={session.catalog}
              onChange={updateSpec}
            />
          ))}
        </div>
      ))}
    </div>
  )
}
