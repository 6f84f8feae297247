import { useState } from 'react'
import type { Cell, Dataset, DatasetMap } from '@/types'

export const PAGE_SIZE = 100

function formatCell(v: Cell): string {
  if (v === null) return ''
  return String(v)
}

function DatasetTable({ ds }: { ds: Dataset }) {
  const [page, setPage] = useState(0)
  const pages = Math.max(1, Math.ceil(ds.rowCount / PAGE_SIZE))
  const start = page * PAGE_SIZE
  const end = Math.min(start + PAGE_SIZE, ds.rowCount)
  const rowIdx = Array.from({ length: end - start }, (_, k) => start + k)
  return (
    <div className="panel preview">
      <strong>{ds.name}</strong>
      <span className="small"> {ds.rowCount} rows × {ds.columns.length} columns</span>
      <div className="table-scroll">
        <table className="table">
          <thead>
            <tr>
              <th></th>
              {ds.columns.map(c => <th key={c.name}>{c.name}</th>)}
            </tr>
          </thead>
          <tbody>
            {rowIdx.map(i => (
              <tr key={i}>
                <td className="small">{i}</td>
                {ds.columns.map(c => <td key={c.name}>{formatCell(c.values[i])}</td>)}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      {pages > 1 && (
        <div className="row pager">
          <button className="btn" disabled={page === 0} onClick={() => setPage(p => p - 1)}>Previous</button>
          <span className="small">{`Rows ${start + 1}-${end} of ${ds.rowCount}`}</span>
          <button className="btn" disabled={page === pages - 1} onClick={() => setPage(p => p + 1)}>Next</button>
        </div>
      )}
    </div>
  )
}

export default function DataPreview({ datasets }: { datasets: DatasetMap }) {
  return (
    <div className="panel">
      <h2>Preview of the data</h2>
      {Array.from(datasets.values()).map(ds => (
        <DatasetTable key={ds.id} ds={ds} />
      ))}
    </div>
  )
}
