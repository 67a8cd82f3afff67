import { useEffect, useState } from 'react'
import { MapContainer, Marker, TileLayer, Tooltip, useMap } from 'react-leaflet'
import L from 'leaflet'
import type { DivIcon, LatLngTuple } from 'leaflet'
import 'leaflet/dist/leaflet.css'
import type { GeocodedFault } from '../lib/faults'
import FaultScatter from './FaultScatter'
import { statusColor } from './statusColors'

export interface FaultMapProps {
  faults: GeocodedFault[]
}

export type MapMode = 'street' | 'scatter'

const MAP_MODES: { mode: MapMode; label: string }[] = [
  { mode: 'street',  label: 'Street map' },
  { mode: 'scatter', label: 'Scatter' },
]

const TILE_URL = 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png'
const TILE_ATTRIBUTION = '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'

export interface MapView {
  center: LatLngTuple
  zoom: number
}

/**
 * Centre on the mean position and pick a zoom that roughly spans the faults.
 * Independent of the rendered map size.
 */
export function viewFor(faults: GeocodedFault[]): MapView {
  const lats = faults.map(f => f.latitude)
  const lons = faults.map(f => f.longitude)
  const center: LatLngTuple = [
    lats.reduce((a, b) => a + b, 0) / lats.length,
    lons.reduce((a, b) => a + b, 0) / lons.length,
  ]
  const span = Math.max(Math.max(...lats) - Math.min(...lats), Math.max(...lons) - Math.min(...lons))
  if (span === 0) return { center, zoom: 13 }
  const zoom = Math.floor(Math.log2(360 / span)) - 1
  return { center, zoom: Math.min(13, Math.max(5, zoom)) }
}

const icons = new Map<string, DivIcon>()

function markerIcon(status: string): DivIcon {
  const cached = icons.get(status)
  if (cached) return cached
  const icon = L.divIcon({
    className: 'fault-marker',
    html: `<span style="display:block;width:14px;height:14px;border-radius:9999px;border:2px solid #fff;background:${statusColor(status)}"></span>`,
    iconSize: [14, 14],
    iconAnchor: [7, 7],
  })
  icons.set(status, icon)
  return icon
}

function FollowView({ view }: { view: MapView }) {
  const map = useMap()
  const [lat, lon] = view.center
  useEffect(() => {
    map.setView([lat, lon], view.zoom)
  }, [map, lat, lon, view.zoom])
  return null
}

function StreetMap({ faults }: FaultMapProps) {
  const view = viewFor(faults)
  return (
    <MapContainer center={view.center} zoom={view.zoom} scrollWheelZoom={false} className="h-[500px] w-full rounded-lg">
      <TileLayer url={TILE_URL} attribution={TILE_ATTRIBUTION} />
      <FollowView view={view} />
      {faults.map((f, i) => (
        <Marker key={`${f.postcode}-${f.startTime}-${i}`} position={[f.latitude, f.longitude]} icon={markerIcon(f.status)}>
          <Tooltip direction="top">
            <div className="max-w-xs text-xs">
              <div className="font-mono font-semibold">{f.postcode}</div>
              <div style={{ color: statusColor(f.status) }}>{f.status}</div>
              <div className="text-gray-500">{f.startTime}</div>
              {f.reason && <div>{f.reason}</div>}
            </div>
          </Tooltip>
        </Marker>
      ))}
    </MapContainer>
  )
}

export default function FaultMap({ faults }: FaultMapProps) {
  const [mode, setMode] = useState<MapMode>('street')
  if (faults.length === 0) return null

  return (
    <div className="space-y-3">
      <div className="inline-flex overflow-hidden rounded-md border border-gray-300 text-xs dark:border-gray-600">
        {MAP_MODES.map(m => (
          <button
            key={m.mode}
            type="button"
            aria-pressed={mode === m.mode}
            onClick={() => setMode(m.mode)}
            className={`px-2.5 py-1 transition-colors ${
              mode === m.mode
                ? 'bg-gray-700 text-white'
                : 'text-gray-600 hover:bg-gray-100 dark:text-gray-300 dark:hover:bg-gray-700'
            }`}
          >
            {m.label}
          </button>
        ))}
      </div>
      {mode === 'street' ? <StreetMap faults={faults} /> : <FaultScatter faults={faults} />}
    </div>
  )
}
