import { api, errorMessage } from '../api/client'

export interface Coordinates {
  latitude: number
  longitude: number
}

export type UnresolvedReason = 'empty' | 'not_found' | 'failed'

export type GeocodeResult =
  | { status: 'resolved'; latitude: number; longitude: number; fromCache: boolean }
  | { status: 'unresolved'; reason: UnresolvedReason; fromCache: boolean }

/** What the cache remembers about a postcode. Empty input is never cached. */
export type CachedOutcome =
  | { status: 'resolved'; latitude: number; longitude: number }
  | { status: 'unresolved'; reason: 'not_found' | 'failed' }

export interface GeocodeCacheEntry {
  postcode: string
  outcome: CachedOutcome
  /** Epoch ms when the outcome was stored */
  storedAt: number
}

export interface GeocodeBackend {
  /**
   * Resolve a free-text place query. Resolves null when the service has no
   * match and rejects on transport errors. Must stop work when `signal` aborts.
   */
  lookup(query: string, signal: AbortSignal): Promise<Coordinates | null>
}

export interface GeocoderOptions {
  backend: GeocodeBackend
  /** Appended to every query as ", <country>" */
  country?: string
  timeoutMs?: number
  /** Age after which an unresolved entry is looked up again; 0 never retries */
  retryUnresolvedAfterMs?: number
  maxEntries?: number
  now?: () => number
}

// ---------------------------------------------------------------------------
// Nominatim backend
// ---------------------------------------------------------------------------

function parseCoordinate(value: unknown): number | null {
  const n = typeof value === 'string' ? Number.parseFloat(value) : typeof value === 'number' ? value : NaN
  return Number.isFinite(n) ? n : null
}

/**
 * Read the best match out of a Nominatim `/search?format=json` response: an
 * array of places with `lat`/`lon` as decimal strings.
 */
export function parseNominatimResponse(body: unknown): Coordinates | null {
  if (!Array.isArray(body)) {
    throw new Error('Unexpected geocoder response: expected an array of places')
  }
  const first: unknown = body[0]
  if (typeof first !== 'object' || first === null) return null
  const latitude = parseCoordinate('lat' in first ? first.lat : undefined)
  const longitude = parseCoordinate('lon' in first ? first.lon : undefined)
  if (latitude === null || longitude === null) return null
  return { latitude, longitude }
}

export function nominatimBackend(baseUrl: string): GeocodeBackend {
  return {
    async lookup(query, signal) {
      const body = await api.searchPlace(baseUrl, query, signal)
      return parseNominatimResponse(body)
    },
  }
}

// ---------------------------------------------------------------------------
// Geocoder
// ---------------------------------------------------------------------------

function toResult(outcome: CachedOutcome, fromCache: boolean): GeocodeResult {
  return outcome.status === 'resolved'
    ? { status: 'resolved', latitude: outcome.latitude, longitude: outcome.longitude, fromCache }
    : { status: 'unresolved', reason: outcome.reason, fromCache }
}

/**
 * Resolves postcodes to coordinates and remembers the answers, including
 * failures, for as long as the instance lives. Each dashboard owns exactly one.
 */
export class Geocoder {
  private readonly backend: GeocodeBackend
  private readonly country: string
  private readonly timeoutMs: number
  private readonly retryUnresolvedAfterMs: number
  private readonly maxEntries: number
  private readonly now: () => number

  // Map iteration order is insertion order: the first key is the oldest entry.
  private readonly cache = new Map<string, GeocodeCacheEntry>()
  private readonly inFlight = new Map<string, Promise<GeocodeResult>>()

  constructor(options: GeocoderOptions) {
    this.backend = options.backend
    this.country = options.country ?? 'UK'
    this.timeoutMs = options.timeoutMs ?? 10_000
    this.retryUnresolvedAfterMs = options.retryUnresolvedAfterMs ?? 30 * 60_000
    this.maxEntries = Math.max(1, options.maxEntries ?? 5_000)
    this.now = options.now ?? Date.now
  }

  get size(): number {
    return this.cache.size
  }

  /** Snapshot of the cache, oldest first. */
  entries(): GeocodeCacheEntry[] {
    return [...this.cache.values()]
  }

  clear(): void {
    this.cache.clear()
  }

  /** Drop every unresolved entry so the next lookup retries it. Returns how many were dropped. */
  forgetUnresolved(): number {
    let dropped = 0
    for (const [postcode, entry] of this.cache) {
      if (entry.outcome.status === 'unresolved') {
        this.cache.delete(postcode)
        dropped++
      }
    }
    return dropped
  }

  async resolve(postcode: string | null | undefined): Promise<GeocodeResult> {
    const key = postcode?.trim() ?? ''
    if (key === '') return { status: 'unresolved', reason: 'empty', fromCache: false }

    const cached = this.fresh(key)
    if (cached) return toResult(cached.outcome, true)

    const pending = this.inFlight.get(key)
    if (pending) return pending

    const request = this.query(key).finally(() => this.inFlight.delete(key))
    this.inFlight.set(key, request)
    return request
  }

  private fresh(postcode: string): GeocodeCacheEntry | undefined {
    const entry = this.cache.get(postcode)
    if (!entry) return undefined
    if (
      entry.outcome.status === 'unresolved' &&
      this.retryUnresolvedAfterMs > 0 &&
      this.now() - entry.storedAt >= this.retryUnresolvedAfterMs
    ) {
      this.cache.delete(postcode)
      return undefined
    }
    return entry
  }

  private async query(postcode: string): Promise<GeocodeResult> {
    const outcome = await this.lookup(`${postcode}, ${this.country}`)
    this.store(postcode, outcome)
    return toResult(outcome, false)
  }

  private async lookup(query: string): Promise<CachedOutcome> {
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new Error(`timed out after ${this.timeoutMs} ms`))
      }, this.timeoutMs)
    })

    try {
      const coords = await Promise.race([this.backend.lookup(query, controller.signal), timeout])
      if (coords === null) {
        console.info(`[Geocoder] No match for "${query}"`)
        return { status: 'unresolved', reason: 'not_found' }
      }
      return { status: 'resolved', latitude: coords.latitude, longitude: coords.longitude }
    } catch (err) {
      console.warn(`[Geocoder] Error geocoding "${query}":`, errorMessage(err))
      return { status: 'unresolved', reason: 'failed' }
    } finally {
      clearTimeout(timer)
    }
  }

  private store(postcode: string, outcome: CachedOutcome): void {
    this.cache.delete(postcode)
    while (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next()
      if (oldest.done) break
      this.cache.delete(oldest.value)
    }
    this.cache.set(postcode, { postcode, outcome, storedAt: this.now() })
  }
}
