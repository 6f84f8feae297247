import { useRef, useState } from 'react'
import { useApp } from '@/state/SessionContext'
import { hasData } from '@/state/session'
import { PLOT_COUNTS } from '@/state/plotConfig'
import { acceptedExtensions } from '@/modules/file_loader'
import DataPreview from '@/modules/data_preview/DataPreview'
import PlotConfigGrid from '@/modules/plot_config/PlotConfigGrid'
import PlotsGrid from '@/modules/plots_viewer/PlotsGrid'
import LogPanel from '@/components/LogPanel'
import { config } from '@/config'
import type { Upload } from '@/types'
import LandingPage from './LandingPage'

// a file that cannot be read is passed on with its error; the rest still load
async function readFiles(files: FileList): Promise<Upload[]> {
  const out: Upload[] = []
  for (const file of Array.from(files)) {
    try {
      out.push({ name: file.name, bytes: await file.arrayBuffer() })
    } catch (e) {
      console.error(e)
      out.push({ name: file.name, readError: e instanceof Error ? e.message : String(e) })
    }
  }
  return out
}

export default function App(){
  const session = useApp(s=>s.session)
  const upload = useApp(s=>s.upload)
  const clear = useApp(s=>s.clear)
  const setCount = useApp(s=>s.setCount)
  const generate = useApp(s=>s.generate)

  const [busy, setBusy] = useState(false)
  // only the latest selection may replace the session
  const batch = useRef(0)

  async function handleFiles(files: FileList | null){
    const id = ++batch.current
    if (!files || !files.length) {
      clear()
      setBusy(false)
      return
    }
    setBusy(true)
    try {
      const uploads = await readFiles(files)
      if (id === batch.current) upload(uploads)
    } finally {
      if (id === batch.current) setBusy(false)
    }
  }

  // session with at least one dataset; null while idle or when nothing loaded
  const active = session && hasData(session) ? session : null

  return (
    <div className="app">
      <aside className="sidebar">
        <h2>Navigation</h2>
        <div className="small">Use the sidebar to navigate the app.</div>
        <label htmlFor="upload">Upload your data files</label>
        <input
          id="upload"
          type="file"
          multiple
          accept={acceptedExtensions()}
          onChange={e=>{ void handleFiles(e.target.files) }}
        />
        <div className="badge">{busy ? 'Processing...' : 'Ready'}</div>

        {active && (
          <>
            <label htmlFor="plot-count">Number of Plots</label>
            <select id="plot-count" value={active.count} onChange={e=>setCount(Number(e.target.value))}>
              {PLOT_COUNTS.map(n => <option key={n} value={n}>{n}</option>)}
            </select>
          </>
        )}
      </aside>

      <main className="container">
        <h1>{config.appTitle}</h1>
        <p>DAQ data analysis tool. Upload your data using the sidebar.</p>

        {!active && <LandingPage noData={session !== null} />}

        {active && (
          <>
            <div className="small">{active.datasets.size} file(s) loaded.</div>
            <DataPreview datasets={active.datasets} />
            <PlotConfigGrid session={active} />
            <div className="row">
              <button className="btn primary" onClick={generate}>Generate Plots</button>
            </div>
            <PlotsGrid figures={active.figures} stale={active.stale} />
          </>
        )}

        {session && <LogPanel log={session.log} />}
      </main>
    </div>
  )
}
