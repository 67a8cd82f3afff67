import {
  ScatterChart,
  Scatter,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from 'recharts'
import type { GeocodedFault } from '../lib/faults'
import { statusColor } from './statusColors'

export interface FaultScatterProps {
  faults: GeocodedFault[]
}

// ---------------------------------------------------------------------------
// Plain geo-scatter of faults: longitude on X, latitude on Y, one series per
// status. Used when map tiles are unwanted or unreachable.
// Axis domains hug the data with a small margin so nearby faults stay apart.
// ---------------------------------------------------------------------------

const PAD_DEGREES = 0.05

export function groupByStatus(faults: GeocodedFault[]): Map<string, GeocodedFault[]> {
  const groups = new Map<string, GeocodedFault[]>()
  for (const f of faults) {
    const key = f.status || 'Unknown'
    const list = groups.get(key)
    if (list) list.push(f)
    else groups.set(key, [f])
  }
  return groups
}

function domainOf(values: number[]): [number, number] {
  const min = Math.min(...values)
  const max = Math.max(...values)
  return [+(min - PAD_DEGREES).toFixed(3), +(max + PAD_DEGREES).toFixed(3)]
}

function isGeocodedFault(value: unknown): value is GeocodedFault {
  return (
    typeof value === 'object' && value !== null &&
    'postcode' in value && typeof value.postcode === 'string' &&
    'status' in value && typeof value.status === 'string' &&
    'startTime' in value && typeof value.startTime === 'string' &&
    'reason' in value && typeof value.reason === 'string' &&
    'latitude' in value && typeof value.latitude === 'number' &&
    'longitude' in value && typeof value.longitude === 'number'
  )
}

interface FaultTooltipProps {
  active?: boolean
  payload?: ReadonlyArray<{ payload?: unknown }>
}

function FaultTooltip({ active, payload }: FaultTooltipProps) {
  const fault: unknown = payload?.[0]?.payload
  if (!active || !isGeocodedFault(fault)) return null
  return (
    <div className="max-w-xs rounded-lg border border-gray-700 bg-gray-800 p-3 text-xs text-gray-200 shadow-lg">
      <div className="font-mono font-semibold text-gray-100">{fault.postcode}</div>
      <div className="mt-1" style={{ color: statusColor(fault.status) }}>{fault.status}</div>
      <div className="mt-1 text-gray-400">{fault.startTime}</div>
      {fault.reason && <div className="mt-1 text-gray-300">{fault.reason}</div>}
    </div>
  )
}

export default function FaultScatter({ faults }: FaultScatterProps) {
  if (faults.length === 0) return null

  const groups = groupByStatus(faults)
  const lonDomain = domainOf(faults.map(f => f.longitude))
  const latDomain = domainOf(faults.map(f => f.latitude))

  return (
    <ResponsiveContainer width="100%" height={500}>
      <ScatterChart margin={{ top: 10, right: 20, left: 0, bottom: 10 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#374151" strokeOpacity={0.3} />
        <XAxis
          type="number"
          dataKey="longitude"
          name="Longitude"
          domain={lonDomain}
          tick={{ fill: '#9ca3af', fontSize: 11 }}
          tickFormatter={(v: number) => `${v.toFixed(2)}°`}
        />
        <YAxis
          type="number"
          dataKey="latitude"
          name="Latitude"
          domain={latDomain}
          tick={{ fill: '#9ca3af', fontSize: 11 }}
          tickFormatter={(v: number) => `${v.toFixed(2)}°`}
        />
        <Tooltip content={FaultTooltip} cursor={{ strokeDasharray: '3 3' }} />
        <Legend wrapperStyle={{ color: '#9ca3af', fontSize: 12 }} />
        {[...groups.entries()].map(([status, items]) => (
          <Scatter
            key={status}
            name={status}
            data={items}
            fill={statusColor(status)}
            fillOpacity={0.85}
          />
        ))}
      </ScatterChart>
    </ResponsiveContainer>
  )
}
