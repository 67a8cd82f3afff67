/** One fault after normalisation. Never mutated once built. */
export interface FaultRecord {
  readonly postcode: string | null
  readonly status: string
  readonly startTime: string
  readonly reason: string
}

/** A fault whose primary postcode resolved to coordinates. Only these are rendered. */
export interface GeocodedFault extends FaultRecord {
  readonly postcode: string
  readonly latitude: number
  readonly longitude: number
}

export const STATUS_FILTERS = ['All', 'Planned', 'Unplanned'] as const

export type StatusFilter = typeof STATUS_FILTERS[number]

export function isStatusFilter(value: string): value is StatusFilter {
  return STATUS_FILTERS.some(s => s === value)
}

/**
 * Keep faults whose status equals the filter exactly. "All" keeps every
 * fault in its original order.
 */
export function filterByStatus<T extends FaultRecord>(faults: readonly T[], filter: StatusFilter): T[] {
  if (filter === 'All') return [...faults]
  return faults.filter(f => f.status === filter)
}
