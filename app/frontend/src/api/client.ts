// ---------------------------------------------------------------------------
// Typed HTTP client for the fault feed and the geocoding service.
// Both are public, unauthenticated JSON endpoints called straight from the
// browser. Response bodies are returned as `unknown`; callers validate them.
// ---------------------------------------------------------------------------

export type ApiErrorKind = 'http' | 'network' | 'malformed'

export class ApiError extends Error {
  readonly kind: ApiErrorKind
  /** HTTP status, or null when no response was received */
  readonly status: number | null

  constructor(kind: ApiErrorKind, message: string, status: number | null = null) {
    super(message)
    this.name = 'ApiError'
    this.kind = kind
    this.status = status
  }
}

export interface LiveFaultsQuery {
  url: string
  dataset: string
  rows: number
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function get(url: string, signal?: AbortSignal): Promise<unknown> {
  let res: Response
  try {
    res = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal,
    })
  } catch (err) {
    throw new ApiError('network', `Request to ${url} failed: ${errorMessage(err)}`)
  }
  if (!res.ok) {
    const text = await res.text().catch(() => '')
    throw new ApiError('http', `API error ${res.status} ${res.statusText}: ${text}`, res.status)
  }
  try {
    const body: unknown = await res.json()
    return body
  } catch (err) {
    throw new ApiError('malformed', `Response from ${url} is not valid JSON: ${errorMessage(err)}`, res.status)
  }
}

function withQuery(url: string, params: URLSearchParams): string {
  return `${url}${url.includes('?') ? '&' : '?'}${params}`
}

// ---------------------------------------------------------------------------
// API client object
// ---------------------------------------------------------------------------

export const api = {
  /**
   * Search the fault dataset. The query string is always
   * `dataset=<id>&q=&rows=<n>`; an empty `q` returns the latest faults.
   */
  getLiveFaults({ url, dataset, rows }: LiveFaultsQuery): Promise<unknown> {
    const params = new URLSearchParams({ dataset, q: '', rows: String(rows) })
    return get(withQuery(url, params))
  },

  /**
   * Free-text search against a Nominatim-compatible `/search` endpoint.
   * Only the best match is requested.
   */
  searchPlace(baseUrl: string, query: string, signal?: AbortSignal): Promise<unknown> {
    const params = new URLSearchParams({ format: 'json', limit: '1', q: query })
    return get(withQuery(`${baseUrl.replace(/\/+$/, '')}/search`, params), signal)
  },
}
