import { AlertTriangle, CalendarClock, MapPinOff, Zap } from 'lucide-react'
import type { LucideIcon } from 'lucide-react'
import type { GeocodedFault } from '../lib/faults'

export interface FaultSummaryProps {
  faults: GeocodedFault[]
  /** Matched faults with no coordinates */
  dropped: number
  updatedAt: Date | null
}

interface KpiCardProps {
  label: string
  value: number
  hint: string
  Icon: LucideIcon
  accent: string
}

function KpiCard({ label, value, hint, Icon, accent }: KpiCardProps) {
  return (
    <div className="rounded-lg border border-gray-200 bg-white p-4 dark:border-gray-700 dark:bg-gray-800">
      <div className="flex items-center justify-between">
        <p className="text-xs uppercase tracking-wide text-gray-500 dark:text-gray-400">{label}</p>
        <Icon size={16} className={accent} />
      </div>
      <p className={`mt-1 text-3xl font-bold tabular-nums ${accent}`}>{value}</p>
      <p className="mt-1 text-xs text-gray-400">{hint}</p>
    </div>
  )
}

export function formatUpdatedAt(updatedAt: Date | null): string {
  if (!updatedAt) return 'Awaiting data…'
  const time = updatedAt.toLocaleTimeString('en-GB', {
    hour: '2-digit',
    minute: '2-digit',
    timeZone: 'Europe/London',
  })
  return `Updated ${time} UK time`
}

export default function FaultSummary({ faults, dropped, updatedAt }: FaultSummaryProps) {
  const planned   = faults.filter(f => f.status === 'Planned').length
  const unplanned = faults.filter(f => f.status === 'Unplanned').length

  return (
    <div>
      <div className="grid grid-cols-2 gap-4 lg:grid-cols-4">
        <KpiCard label="Faults Mapped" value={faults.length} hint="With a located postcode" Icon={Zap} accent="text-gray-800 dark:text-gray-100" />
        <KpiCard label="Planned" value={planned} hint="Scheduled work" Icon={CalendarClock} accent="text-amber-500" />
        <KpiCard label="Unplanned" value={unplanned} hint="Live faults" Icon={AlertTriangle} accent="text-red-500" />
        <KpiCard label="Not Located" value={dropped} hint="Postcode missing or unresolved" Icon={MapPinOff} accent="text-gray-400" />
      </div>
      <div className="mt-2 text-right text-xs text-gray-400">{formatUpdatedAt(updatedAt)}</div>
    </div>
  )
}
