import type { Diagnostic } from '@/types'
import { formatDiagnostic } from '@/utils/diagnostics'

export default function LogPanel({ log }: { log: Diagnostic[] }) {
  if (!log.length) return null
  return (
    <div className="panel" style={{marginTop:12}}>
      <strong>Log</strong>
      <pre className="log" style={{whiteSpace:'pre-wrap'}}>{log.map(formatDiagnostic).join('\n')}</pre>
    </div>
  )
}
