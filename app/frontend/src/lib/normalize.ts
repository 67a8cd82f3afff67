import type { FaultRecord } from './faults'
import type { RawRecord } from './fetchFaults'

// ---------------------------------------------------------------------------
// Field mappings the fault feed has used over time. Tried in order; the first
// whose fields are all present wins. Nested keys are flattened with the
// mapping's separator before matching, so `{ fields: { mainmessage } }`
// becomes `fields_mainmessage` under records-v1.
// ---------------------------------------------------------------------------

export interface FieldMapping {
  id: string
  separator: string
  postcode: string
  status: string
  startTime: string
  reason: string
}

export const FIELD_MAPPINGS: readonly FieldMapping[] = [
  {
    id: 'records-v1',
    separator: '_',
    postcode:  'fields_postcodesaffected',
    status:    'fields_incidenttypename',
    startTime: 'fields_creationdatetime',
    reason:    'fields_mainmessage',
  },
  {
    id: 'records-v1-dotted',
    separator: '.',
    postcode:  'fields.postcodesaffected',
    status:    'fields.incidenttypename',
    startTime: 'fields.creationdatetime',
    reason:    'fields.mainmessage',
  },
  {
    id: 'explore-v2',
    separator: '_',
    postcode:  'postcodesaffected',
    status:    'incidenttypename',
    startTime: 'creationdatetime',
    reason:    'mainmessage',
  },
]

export type NormalizeResult =
  | { ok: true; mapping: string; rows: FaultRecord[] }
  | { ok: false; rows: FaultRecord[]; missing: string[] }

function expectedFields(m: FieldMapping): string[] {
  return [m.postcode, m.status, m.startTime, m.reason]
}

/** Flatten nested objects into one level. Arrays are kept as values. */
export function flattenRecord(record: RawRecord, separator: string, prefix = ''): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(record)) {
    const name = prefix ? `${prefix}${separator}${key}` : key
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      Object.assign(out, flattenRecord(Object.fromEntries(Object.entries(value)), separator, name))
    } else {
      out[name] = value
    }
  }
  return out
}

/**
 * Pick the primary postcode out of the feed's postcode field.
 * A list gives its first entry (numbers as text); a "A; B; C" string gives "A".
 */
export function extractPrimaryPostcode(value: unknown): string | null {
  if (Array.isArray(value)) {
    const first: unknown = value[0]
    const entry = typeof first === 'number' && Number.isFinite(first) ? String(first) : first
    if (typeof entry !== 'string') return null
    return entry.trim() === '' ? null : entry.trim()
  }
  if (typeof value === 'string') {
    const first = value.split(';')[0].trim()
    return first === '' ? null : first
  }
  return null
}

function text(value: unknown): string {
  if (value === null || value === undefined) return ''
  return String(value)
}

/**
 * Reshape raw feed records into fault rows. A feed whose fields match none
 * of the known mappings yields no rows; the missing fields of the closest
 * mapping are logged and returned.
 */
export function normalizeFaults(records: readonly RawRecord[]): NormalizeResult {
  let closest: string[] | null = null

  for (const mapping of FIELD_MAPPINGS) {
    const flat = records.map(r => flattenRecord(r, mapping.separator))
    const columns = new Set(flat.flatMap(r => Object.keys(r)))
    const missing = expectedFields(mapping).filter(f => !columns.has(f))

    if (missing.length === 0) {
      const rows = flat.map((r): FaultRecord => ({
        postcode:  extractPrimaryPostcode(r[mapping.postcode]),
        status:    text(r[mapping.status]),
        startTime: text(r[mapping.startTime]),
        reason:    text(r[mapping.reason]),
      }))
      return { ok: true, mapping: mapping.id, rows }
    }
    if (closest === null || missing.length < closest.length) closest = missing
  }

  const missing = closest ?? expectedFields(FIELD_MAPPINGS[0])
  console.warn('[Faults] Missing expected columns:', missing.join(', '))
  return { ok: false, rows: [], missing }
}
