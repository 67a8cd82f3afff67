import { useState } from 'react'
import type { ReactNode } from 'react'
import { Download, MapPin, RefreshCw, Zap } from 'lucide-react'
import FaultMap from '../components/FaultMap'
import FaultSummary from '../components/FaultSummary'
import FaultTable from '../components/FaultTable'
import StatusFilter from '../components/StatusFilter'
import { useFaultServices } from '../context/FaultServicesContext'
import { useFaultDashboard } from '../hooks/useFaultDashboard'
import { downloadCsv, toCsv } from '../lib/csv'
import type { GeocodedFault, StatusFilter as StatusFilterValue } from '../lib/faults'

const CSV_COLUMNS: { header: string; value: (f: GeocodedFault) => unknown }[] = [
  { header: 'Postcode',   value: f => f.postcode },
  { header: 'Status',     value: f => f.status },
  { header: 'Start Time', value: f => f.startTime },
  { header: 'Reason',     value: f => f.reason },
  { header: 'Latitude',   value: f => f.latitude },
  { header: 'Longitude',  value: f => f.longitude },
]

export default function LiveFaults() {
  const { config } = useFaultServices()
  const [filter, setFilter] = useState<StatusFilterValue>('All')
  const { data, loading, error, updatedAt, refresh } = useFaultDashboard(filter, config.pollMs)

  const faults = data?.kind === 'ok' ? data.faults : []

  const handleExport = () => {
    const stamp = new Date().toISOString().slice(0, 16).replace(/[:T]/g, '-')
    downloadCsv(toCsv(faults, CSV_COLUMNS), `live-faults-${filter.toLowerCase()}-${stamp}.csv`)
  }

  let body: ReactNode
  if (loading && !data) {
    body = (
      <div className="flex h-64 items-center justify-center text-gray-400 dark:text-gray-500">
        Loading live faults...
      </div>
    )
  } else if (error) {
    body = (
      <div className="flex h-64 items-center justify-center text-red-400">
        {error}
      </div>
    )
  } else if (!data || data.kind === 'no-data') {
    body = (
      <div className="flex h-64 flex-col items-center justify-center gap-1">
        <span className="text-gray-500 dark:text-gray-400">No data available.</span>
        {data && <span className="text-xs text-gray-400">{data.detail}</span>}
      </div>
    )
  } else {
    // Keep the previous rows on screen, dimmed, until the new run lands.
    const stale = loading
    body = (
      <div className={`space-y-6 transition-opacity ${stale ? 'opacity-50' : ''}`} aria-busy={stale}>
        <FaultSummary faults={data.faults} dropped={data.dropped} updatedAt={updatedAt} />

        <div className="rounded-xl border border-gray-200 bg-white p-5 dark:border-gray-700 dark:bg-gray-800">
          <div className="mb-4 flex items-center justify-between">
            <h2 className="text-base font-semibold text-gray-800 dark:text-gray-100">
              Faults — {data.faults.length} of {data.matched} located
            </h2>
            <button
              onClick={handleExport}
              disabled={data.faults.length === 0}
              className="flex items-center gap-1.5 rounded-md border border-gray-300 px-2.5 py-1 text-xs text-gray-600 transition-colors hover:bg-gray-100 disabled:opacity-40 dark:border-gray-600 dark:text-gray-300 dark:hover:bg-gray-700"
            >
              <Download size={13} />
              Export CSV
            </button>
          </div>
          <FaultTable faults={data.faults} />
        </div>

        {data.faults.length > 0 && (
          <div className="rounded-xl border border-gray-200 bg-white p-5 dark:border-gray-700 dark:bg-gray-800">
            <h2 className="mb-4 flex items-center gap-2 text-base font-semibold text-gray-800 dark:text-gray-100">
              <MapPin size={16} className="text-amber-500" />
              Fault Map
            </h2>
            <FaultMap faults={data.faults} />
          </div>
        )}
      </div>
    )
  }

  return (
    <div className="space-y-6 p-6">
      {/* Header */}
      <div className="flex flex-wrap items-center justify-between gap-4">
        <div className="flex items-center gap-3">
          <Zap size={26} className="text-amber-400" />
          <div>
            <h1 className="text-xl font-bold text-gray-800 dark:text-gray-100">Live Faults Tracker</h1>
            <p className="mt-0.5 text-sm text-gray-500 dark:text-gray-400">
              Latest {config.faultRows} faults from the {config.faultsDataset} feed, located by primary postcode
            </p>
          </div>
        </div>
        <div className="flex items-center gap-3">
          {loading && data && <span className="text-xs text-gray-400" role="status">Updating…</span>}
          <StatusFilter value={filter} onChange={setFilter} disabled={loading} />
          <button
            onClick={refresh}
            disabled={loading}
            title="Refresh now"
            className="rounded-md p-1.5 text-gray-500 transition-colors hover:bg-gray-100 disabled:opacity-50 dark:hover:bg-gray-800"
          >
            <RefreshCw size={16} className={loading ? 'animate-spin' : undefined} />
          </button>
        </div>
      </div>

      {body}
    </div>
  )
}
