import { api, ApiError, errorMessage } from '../api/client'
import type { LiveFaultsQuery } from '../api/client'

/** A raw upstream record: field name → value, possibly nested. */
export type RawRecord = Record<string, unknown>

export interface FetchFailure {
  kind: 'http' | 'network' | 'malformed'
  status: number | null
  message: string
}

export type FetchResult =
  | { ok: true; records: RawRecord[] }
  | { ok: false; failure: FetchFailure }

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Pull the record list out of a search response. The records API (v1) wraps
 * it in `records`, the explore API (v2.1) in `results`.
 */
export function extractRecordList(body: unknown): RawRecord[] | null {
  if (!isRecord(body)) return null
  const list = Array.isArray(body.records) ? body.records : Array.isArray(body.results) ? body.results : null
  if (list === null) return null
  return list.filter(isRecord)
}

/**
 * Fetch the latest faults. Always goes to the network and never throws: an
 * unreachable or broken feed comes back as `{ ok: false }` and is logged.
 */
export async function fetchLiveFaults(query: LiveFaultsQuery): Promise<FetchResult> {
  let body: unknown
  try {
    body = await api.getLiveFaults(query)
  } catch (err) {
    const failure: FetchFailure = err instanceof ApiError
      ? { kind: err.kind, status: err.status, message: err.message }
      : { kind: 'network', status: null, message: errorMessage(err) }
    console.error(`[Faults] Error fetching data (${failure.kind}${failure.status !== null ? ` ${failure.status}` : ''}):`, failure.message)
    return { ok: false, failure }
  }

  const records = extractRecordList(body)
  if (records === null) {
    const message = 'Response has no "records" or "results" array'
    console.error(`[Faults] Error fetching data (malformed): ${message}`)
    return { ok: false, failure: { kind: 'malformed', status: null, message } }
  }
  if (records.length === 0) {
    console.info('[Faults] No records found in API response.')
  }
  return { ok: true, records }
}
