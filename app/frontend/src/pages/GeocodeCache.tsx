import { useCallback, useState } from 'react'
import { Database, RefreshCw, RotateCcw, Trash2 } from 'lucide-react'
import { useFaultServices } from '../context/FaultServicesContext'
import type { GeocodeCacheEntry } from '../lib/geocoder'
import { formatCoordinate } from '../components/FaultTable'

const REASON_LABEL: Record<string, string> = {
  not_found: 'No match',
  failed:    'Lookup failed',
}

function describe(entry: GeocodeCacheEntry): string {
  const { outcome } = entry
  if (outcome.status === 'resolved') {
    return `${formatCoordinate(outcome.latitude)}, ${formatCoordinate(outcome.longitude)}`
  }
  return REASON_LABEL[outcome.reason] ?? outcome.reason
}

export default function GeocodeCache() {
  const { geocoder, config } = useFaultServices()
  const [entries, setEntries] = useState<GeocodeCacheEntry[]>(() => geocoder.entries())
  const [notice, setNotice] = useState<string | null>(null)

  const reload = useCallback(() => setEntries(geocoder.entries()), [geocoder])

  const handleForgetUnresolved = () => {
    const dropped = geocoder.forgetUnresolved()
    setNotice(`${dropped} unresolved ${dropped === 1 ? 'postcode' : 'postcodes'} will be looked up again`)
    reload()
  }

  const handleClear = () => {
    geocoder.clear()
    setNotice('Geocode cache cleared')
    reload()
  }

  const resolved = entries.filter(e => e.outcome.status === 'resolved').length
  const retryMinutes = Math.round(config.geocodeRetryAfterMs / 60_000)

  return (
    <div className="space-y-6 p-6">
      <div className="flex flex-wrap items-center justify-between gap-4">
        <div className="flex items-center gap-3">
          <Database size={26} className="text-amber-400" />
          <div>
            <h1 className="text-xl font-bold text-gray-800 dark:text-gray-100">Geocode Cache</h1>
            <p className="mt-0.5 text-sm text-gray-500 dark:text-gray-400">
              {resolved} located, {entries.length - resolved} unresolved.{' '}
              {config.geocodeRetryAfterMs > 0
                ? `Unresolved postcodes are retried after ${retryMinutes} min.`
                : 'Unresolved postcodes are kept until the page is reloaded.'}
            </p>
          </div>
        </div>
        <div className="flex items-center gap-2">
          <button
            onClick={reload}
            className="flex items-center gap-1.5 rounded-md border border-gray-300 px-2.5 py-1 text-xs text-gray-600 transition-colors hover:bg-gray-100 dark:border-gray-600 dark:text-gray-300 dark:hover:bg-gray-700"
          >
            <RefreshCw size={13} />
            Reload
          </button>
          <button
            onClick={handleForgetUnresolved}
            className="flex items-center gap-1.5 rounded-md border border-gray-300 px-2.5 py-1 text-xs text-gray-600 transition-colors hover:bg-gray-100 dark:border-gray-600 dark:text-gray-300 dark:hover:bg-gray-700"
          >
            <RotateCcw size={13} />
            Retry unresolved
          </button>
          <button
            onClick={handleClear}
            className="flex items-center gap-1.5 rounded-md border border-red-300 px-2.5 py-1 text-xs text-red-600 transition-colors hover:bg-red-50 dark:border-red-800 dark:text-red-400 dark:hover:bg-red-950/40"
          >
            <Trash2 size={13} />
            Clear cache
          </button>
        </div>
      </div>

      {notice && <div className="text-xs text-gray-500" role="status">{notice}</div>}

      <div className="rounded-xl border border-gray-200 bg-white p-5 dark:border-gray-700 dark:bg-gray-800">
        {entries.length === 0 ? (
          <div className="py-8 text-center text-sm text-gray-400">No postcodes looked up yet.</div>
        ) : (
          <table className="w-full text-sm">
            <thead>
              <tr className="border-b border-gray-200 text-left text-xs text-gray-500 dark:border-gray-700 dark:text-gray-400">
                <th className="pb-2 pr-4 font-medium">Postcode</th>
                <th className="pb-2 pr-4 font-medium">Result</th>
                <th className="pb-2 font-medium">Cached At</th>
              </tr>
            </thead>
            <tbody>
              {entries.map(e => (
                <tr key={e.postcode} className="border-b border-gray-100 dark:border-gray-800">
                  <td className="py-1.5 pr-4 font-mono font-semibold text-gray-800 dark:text-gray-100">{e.postcode}</td>
                  <td className={`py-1.5 pr-4 font-mono text-xs ${e.outcome.status === 'resolved' ? 'text-gray-600 dark:text-gray-300' : 'text-red-500'}`}>
                    {describe(e)}
                  </td>
                  <td className="py-1.5 text-xs text-gray-400">
                    {new Date(e.storedAt).toLocaleTimeString('en-GB', { timeZone: 'Europe/London' })}
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </div>
    </div>
  )
}
