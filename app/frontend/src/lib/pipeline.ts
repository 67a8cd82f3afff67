import { filterByStatus } from './faults'
import type { GeocodedFault, StatusFilter } from './faults'
import type { FetchResult } from './fetchFaults'
import type { GeocodeResult } from './geocoder'
import { normalizeFaults } from './normalize'

export type NoDataReason = 'fetch-failed' | 'no-records' | 'schema-mismatch'

export type PipelineResult =
  | {
      kind: 'ok'
      faults: GeocodedFault[]
      /** Faults returned by the feed */
      total: number
      /** Faults left after the status filter */
      matched: number
      /** Matched faults dropped because their postcode did not resolve */
      dropped: number
    }
  | { kind: 'no-data'; reason: NoDataReason; detail: string }

export interface PipelineDeps {
  fetchFaults: () => Promise<FetchResult>
  geocoder: { resolve(postcode: string | null): Promise<GeocodeResult> }
}

/**
 * One full dashboard refresh: fetch, normalise, filter by status, geocode
 * and keep only faults with coordinates. Postcodes are geocoded one at a
 * time. Failures come back as `no-data`; nothing is thrown.
 */
export async function runFaultPipeline(filter: StatusFilter, deps: PipelineDeps): Promise<PipelineResult> {
  const fetched = await deps.fetchFaults()
  if (!fetched.ok) {
    return { kind: 'no-data', reason: 'fetch-failed', detail: fetched.failure.message }
  }
  if (fetched.records.length === 0) {
    return { kind: 'no-data', reason: 'no-records', detail: 'The feed returned no faults' }
  }

  const normalized = normalizeFaults(fetched.records)
  if (!normalized.ok) {
    return { kind: 'no-data', reason: 'schema-mismatch', detail: `Missing fields: ${normalized.missing.join(', ')}` }
  }

  const matched = filterByStatus(normalized.rows, filter)
  const faults: GeocodedFault[] = []
  for (const fault of matched) {
    const geo = await deps.geocoder.resolve(fault.postcode)
    if (geo.status !== 'resolved' || fault.postcode === null) continue
    faults.push({ ...fault, postcode: fault.postcode, latitude: geo.latitude, longitude: geo.longitude })
  }

  return {
    kind: 'ok',
    faults,
    total: normalized.rows.length,
    matched: matched.length,
    dropped: matched.length - faults.length,
  }
}
