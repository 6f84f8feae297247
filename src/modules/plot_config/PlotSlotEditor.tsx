import type { DatasetMap, PlotSpec, PlotSpecField } from '@/types'
import { columnNames } from '@/utils/catalog'
import { PLOT_MODES } from '@/state/plotConfig'

type Props = {
  slot: number
  spec: PlotSpec
  datasets: DatasetMap
  catalog: string[]
  onChange: (slot: number, field: PlotSpecField, value: string) => void
}

export default function PlotSlotEditor({ slot, spec, datasets, catalog, onChange }: Props) {
  const n = slot + 1
  const source = datasets.get(spec.source)
  // before a source resolves, offer the combined catalog
  const columns = source ? columnNames(source) : catalog
  const id = (field: PlotSpecField) => `plot-${slot}-${field}`

  return (
    <div className="panel plot-slot">
      <h3>Plot {n}</h3>
      <label htmlFor={id('source')}>Select Data Source for Plot {n}</label>
      <select id={id('source')} value={spec.source} onChange={e => onChange(slot, 'source', e.target.value)}>
        {Array.from(datasets.keys()).map(name => <option key={name} value={name}>{name}</option>)}
      </select>

      <label htmlFor={id('xColumn')}>Select X-axis variable for Plot {n}</label>
      <select id={id('xColumn')} value={spec.xColumn} onChange={e => onChange(slot, 'xColumn', e.target.value)}>
        {columns.map(c => <option key={c} value={c}>{c}</option>)}
      </select>

      <label htmlFor={id('yColumn')}>Select Y-axis variable for Plot {n}</label>
      <select id={id('yColumn')} value={spec.yColumn} onChange={e => onChange(slot, 'yColumn', e.target.value)}>
        {columns.map(c => <option key={c} value={c}>{c}</option>)}
      </select>

      <label htmlFor={id('mode')}>Select Plot Type for Plot {n}</label>
      <select id={id('mode')} value={spec.mode} onChange={e => onChange(slot, 'mode', e.target.value)}>
        {PLOT_MODES.map(m => <option key={m.id} value={m.id}>{m.label}</option>)}
      </select>

      <div className="small slot-title">{spec.title}</div>
    </div>
  )
}
