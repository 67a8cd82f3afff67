import { useState, useEffect, useRef, useCallback } from 'react'
import { useFaultServices } from '../context/FaultServicesContext'
import type { StatusFilter } from '../lib/faults'
import { runFaultPipeline } from '../lib/pipeline'
import type { PipelineResult } from '../lib/pipeline'

interface FaultDashboardState {
  data: PipelineResult | null
  loading: boolean
  error: string | null
  /** When the last completed run finished */
  updatedAt: Date | null
  refresh: () => void
}

// ---------------------------------------------------------------------------
// useFaultDashboard
// Runs the whole fetch → normalise → filter → geocode pipeline for the
// selected status, again on every filter change and every `pollMs`.
// A run that is overtaken by a newer one is discarded when it finishes.
// ---------------------------------------------------------------------------

/**
 * @param filter  Status to show ("All" keeps every fault)
 * @param pollMs  Auto-refresh interval in milliseconds; 0 disables polling
 */
export function useFaultDashboard(filter: StatusFilter, pollMs = 0): FaultDashboardState {
  const { fetchFaults, geocoder } = useFaultServices()

  const [data, setData]           = useState<PipelineResult | null>(null)
  const [loading, setLoading]     = useState(true)
  const [error, setError]         = useState<string | null>(null)
  const [updatedAt, setUpdatedAt] = useState<Date | null>(null)

  const mountedRef = useRef(true)
  const runIdRef   = useRef(0)
  useEffect(() => {
    mountedRef.current = true
    return () => { mountedRef.current = false }
  }, [])

  const load = useCallback(async () => {
    const runId = ++runIdRef.current
    const isCurrent = () => mountedRef.current && runId === runIdRef.current

    setLoading(true)
    try {
      const result = await runFaultPipeline(filter, { fetchFaults, geocoder })
      if (isCurrent()) {
        setData(result)
        setError(null)
        setUpdatedAt(new Date())
      }
    } catch (err) {
      console.error('[Faults] Dashboard refresh failed:', err)
      if (isCurrent()) {
        setError(err instanceof Error ? err.message : 'Unknown error')
      }
    } finally {
      if (isCurrent()) {
        setLoading(false)
      }
    }
  }, [filter, fetchFaults, geocoder])

  useEffect(() => {
    void load()
    if (pollMs <= 0) return
    const interval = setInterval(() => void load(), pollMs)
    return () => clearInterval(interval)
  }, [load, pollMs])

  const refresh = useCallback(() => { void load() }, [load])

  return { data, loading, error, updatedAt, refresh }
}
