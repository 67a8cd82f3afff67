import { vi } from 'vitest'
import type { Coordinates, GeocodeBackend } from '../lib/geocoder'
import type { RawRecord } from '../lib/fetchFaults'

/** A fault as the records API (v1) returns it: payload nested under `fields`. */
export function recordsV1Fault(fields: Record<string, unknown>, recordid = 'rec-1'): RawRecord {
  return {
    datasetid: 'ukpn-live-faults',
    recordid,
    record_timestamp: '2024-05-01T09:00:00+00:00',
    fields,
  }
}

export const PLANNED_FAULT = recordsV1Fault({
  postcodesaffected: ['SW1A 1AA', 'SW1A 2AA'],
  incidenttypename: 'Planned',
  creationdatetime: '2024-05-01T08:30:00+00:00',
  mainmessage: 'Planned maintenance on the local network',
}, 'rec-planned')

export const UNPLANNED_FAULT = recordsV1Fault({
  postcodesaffected: 'E1 6AN; E1 6AO',
  incidenttypename: 'Unplanned',
  creationdatetime: '2024-05-01T08:45:00+00:00',
  mainmessage: 'Engineers are on their way',
}, 'rec-unplanned')

/**
 * Backend that answers from a fixed table keyed by the full query
 * (postcode plus country). Unknown queries have no match.
 */
export function fakeBackend(answers: Record<string, Coordinates | Error>) {
  const lookup = vi.fn(async (query: string, _signal: AbortSignal): Promise<Coordinates | null> => {
    const answer = answers[query]
    if (answer instanceof Error) throw answer
    return answer ?? null
  })
  const backend: GeocodeBackend = { lookup }
  return { backend, lookup }
}
