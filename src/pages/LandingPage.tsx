import { config } from '@/config'

export default function LandingPage({ noData = false }: { noData?: boolean }) {
  return (
    <div className="landing">
      <div className="landing-content">
        {noData ? (
          <>
            <h2>No usable data</h2>
            <p>None of the uploaded files could be loaded. Check the log below, then upload CSV or XLSX files.</p>
          </>
        ) : (
          <>
            <h2>Welcome to {config.appTitle}</h2>
            <p>Please upload a file to get started.</p>
            <p className="small">
              Supported formats: CSV and Excel (.xlsx). Upload several runs at once, then compare
              any two columns in up to four plots side by side.
            </p>
          </>
        )}
      </div>
    </div>
  )
}
