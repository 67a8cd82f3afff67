import { createContext, useContext } from 'react'
import type { ReactNode } from 'react'
import type { AppConfig } from '../config'
import { fetchLiveFaults } from '../lib/fetchFaults'
import type { FetchResult } from '../lib/fetchFaults'
import { Geocoder, nominatimBackend } from '../lib/geocoder'

export interface FaultServices {
  config: AppConfig
  fetchFaults: () => Promise<FetchResult>
  /** Shared by every page; its cache lives as long as the app instance */
  geocoder: Geocoder
}

export function createFaultServices(config: AppConfig): FaultServices {
  return {
    config,
    fetchFaults: () => fetchLiveFaults({
      url: config.faultsApiUrl,
      dataset: config.faultsDataset,
      rows: config.faultRows,
    }),
    geocoder: new Geocoder({
      backend: nominatimBackend(config.geocoderUrl),
      country: config.geocodeCountry,
      timeoutMs: config.geocodeTimeoutMs,
      retryUnresolvedAfterMs: config.geocodeRetryAfterMs,
      maxEntries: config.geocodeCacheMaxEntries,
    }),
  }
}

const FaultServicesContext = createContext<FaultServices | null>(null)

export function FaultServicesProvider({ services, children }: { services: FaultServices; children: ReactNode }) {
  return (
    <FaultServicesContext.Provider value={services}>
      {children}
    </FaultServicesContext.Provider>
  )
}

export function useFaultServices(): FaultServices {
  const services = useContext(FaultServicesContext)
  if (!services) {
    throw new Error('useFaultServices must be used inside <FaultServicesProvider>')
  }
  return services
}
