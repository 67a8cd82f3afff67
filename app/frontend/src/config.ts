// ---------------------------------------------------------------------------
// Runtime configuration, read from Vite env variables (VITE_*) at build time.
// Every value has a default so the dashboard runs with no .env file.
// ---------------------------------------------------------------------------

export interface AppConfig {
  /** Records-search endpoint of the fault feed */
  faultsApiUrl: string
  faultsDataset: string
  /** Row limit sent with every fetch; pagination is not supported */
  faultRows: number
  /** Base URL of a Nominatim-compatible geocoding service */
  geocoderUrl: string
  /** Country appended to every geocoding query, e.g. "SW1A 1AA, UK" */
  geocodeCountry: string
  geocodeTimeoutMs: number
  /** How long an unresolved postcode stays cached; 0 keeps it for the session */
  geocodeRetryAfterMs: number
  geocodeCacheMaxEntries: number
  /** Auto-refresh interval for the dashboard; 0 disables polling */
  pollMs: number
}

export const DEFAULT_CONFIG: AppConfig = {
  faultsApiUrl: 'https://ukpowernetworks.opendatasoft.com/api/records/1.0/search/',
  faultsDataset: 'ukpn-live-faults',
  faultRows: 20,
  geocoderUrl: 'https://nominatim.openstreetmap.org',
  geocodeCountry: 'UK',
  geocodeTimeoutMs: 10_000,
  geocodeRetryAfterMs: 30 * 60_000,
  geocodeCacheMaxEntries: 5_000,
  pollMs: 5 * 60_000,
}

function readString(env: Record<string, unknown>, key: string, fallback: string): string {
  const raw = env[key]
  if (typeof raw !== 'string') return fallback
  const trimmed = raw.trim()
  return trimmed === '' ? fallback : trimmed
}

function readInt(env: Record<string, unknown>, key: string, fallback: number, min = 0): number {
  const raw = env[key]
  if (typeof raw !== 'string' || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[Config] Ignoring ${key}=${raw}: expected an integer >= ${min}`)
    return fallback
  }
  return value
}

export function loadConfig(env: Record<string, unknown>): AppConfig {
  return {
    faultsApiUrl:           readString(env, 'VITE_FAULTS_API_URL', DEFAULT_CONFIG.faultsApiUrl),
    faultsDataset:          readString(env, 'VITE_FAULTS_DATASET', DEFAULT_CONFIG.faultsDataset),
    faultRows:              readInt(env, 'VITE_FAULTS_ROWS', DEFAULT_CONFIG.faultRows, 1),
    geocoderUrl:            readString(env, 'VITE_GEOCODER_URL', DEFAULT_CONFIG.geocoderUrl),
    geocodeCountry:         readString(env, 'VITE_GEOCODE_COUNTRY', DEFAULT_CONFIG.geocodeCountry),
    geocodeTimeoutMs:       readInt(env, 'VITE_GEOCODE_TIMEOUT_MS', DEFAULT_CONFIG.geocodeTimeoutMs, 1),
    geocodeRetryAfterMs:    readInt(env, 'VITE_GEOCODE_RETRY_AFTER_MS', DEFAULT_CONFIG.geocodeRetryAfterMs),
    geocodeCacheMaxEntries: readInt(env, 'VITE_GEOCODE_CACHE_MAX', DEFAULT_CONFIG.geocodeCacheMaxEntries, 1),
    pollMs:                 readInt(env, 'VITE_POLL_MS', DEFAULT_CONFIG.pollMs),
  }
}

export const config: AppConfig = loadConfig(import.meta.env)
