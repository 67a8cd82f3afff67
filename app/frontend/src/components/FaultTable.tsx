import type { GeocodedFault } from '../lib/faults'
import { statusColor } from './statusColors'

export interface FaultTableProps {
  faults: GeocodedFault[]
}

export const FAULT_TABLE_COLUMNS = ['Postcode', 'Status', 'Start Time', 'Reason', 'Latitude', 'Longitude'] as const

export function formatCoordinate(value: number): string {
  return value.toFixed(4)
}

function StatusBadge({ status }: { status: string }) {
  const color = statusColor(status)
  return (
    <span
      className="rounded px-2 py-0.5 text-xs font-medium"
      style={{ backgroundColor: color + '22', color, border: `1px solid ${color}66` }}
    >
      {status || '—'}
    </span>
  )
}

export default function FaultTable({ faults }: FaultTableProps) {
  if (faults.length === 0) {
    return (
      <div className="py-8 text-center text-sm text-gray-400">
        No faults match the selected status.
      </div>
    )
  }

  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead>
          <tr className="border-b border-gray-200 text-left text-xs text-gray-500 dark:border-gray-700 dark:text-gray-400">
            {FAULT_TABLE_COLUMNS.map(col => (
              <th key={col} className="pb-2 pr-4 font-medium">{col}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {faults.map((f, i) => (
            <tr
              key={`${f.postcode}-${f.startTime}-${i}`}
              className="border-b border-gray-100 transition-colors hover:bg-gray-50 dark:border-gray-800 dark:hover:bg-gray-800/40"
            >
              <td className="whitespace-nowrap py-2 pr-4 font-mono font-semibold text-gray-800 dark:text-gray-100">{f.postcode}</td>
              <td className="py-2 pr-4"><StatusBadge status={f.status} /></td>
              <td className="whitespace-nowrap py-2 pr-4 font-mono text-xs text-gray-500">{f.startTime}</td>
              <td className="py-2 pr-4 text-gray-600 dark:text-gray-300">{f.reason}</td>
              <td className="py-2 pr-4 font-mono text-xs text-gray-500">{formatCoordinate(f.latitude)}</td>
              <td className="py-2 font-mono text-xs text-gray-500">{formatCoordinate(f.longitude)}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
