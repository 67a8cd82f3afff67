// @vitest-environment jsdom
import { act, cleanup, renderHook, waitFor } from '@testing-library/react'
import type { ReactNode } from 'react'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { useFaultDashboard } from './useFaultDashboard'
import { FaultServicesProvider } from '../context/FaultServicesContext'
import type { FaultServices } from '../context/FaultServicesContext'
import type { StatusFilter } from '../lib/faults'
import type { FetchResult } from '../lib/fetchFaults'
import type { PipelineResult } from '../lib/pipeline'
import { PLANNED_FAULT, UNPLANNED_FAULT } from '../test/fixtures'
import { fakeServices } from '../test/services'

const FEED: FetchResult = { ok: true, records: [PLANNED_FAULT, UNPLANNED_FAULT] }
const PLACES = {
  'SW1A 1AA, UK': { latitude: 51.501, longitude: -0.1416 },
  'E1 6AN, UK':   { latitude: 51.5194, longitude: -0.0699 },
}

function wrapperFor(services: FaultServices) {
  return function Wrapper({ children }: { children: ReactNode }) {
    return <FaultServicesProvider services={services}>{children}</FaultServicesProvider>
  }
}

function statuses(data: PipelineResult | null): string[] | null {
  return data?.kind === 'ok' ? data.faults.map(f => f.status) : null
}

describe('useFaultDashboard', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  afterEach(() => {
    cleanup()
    vi.useRealTimers()
  })

  it('loads on mount', async () => {
    const { services, fetchFaults } = fakeServices(async () => FEED, PLACES)

    const { result } = renderHook(() => useFaultDashboard('All'), { wrapper: wrapperFor(services) })

    expect(result.current.loading).toBe(true)
    await waitFor(() => expect(result.current.loading).toBe(false))
    expect(statuses(result.current.data)).toEqual(['Planned', 'Unplanned'])
    expect(result.current.error).toBeNull()
    expect(result.current.updatedAt).toBeInstanceOf(Date)
    expect(fetchFaults).toHaveBeenCalledTimes(1)
  })

  it('discards a run that finishes after a newer one', async () => {
    const gate: { release?: (result: FetchResult) => void } = {}
    let calls = 0
    const { services, lookup } = fakeServices(() => {
      calls += 1
      if (calls === 1) return new Promise<FetchResult>(resolve => { gate.release = resolve })
      return Promise.resolve(FEED)
    }, PLACES)

    const { result, rerender } = renderHook(
      ({ filter }: { filter: StatusFilter }) => useFaultDashboard(filter),
      { initialProps: { filter: 'All' }, wrapper: wrapperFor(services) },
    )
    rerender({ filter: 'Unplanned' })

    await waitFor(() => expect(statuses(result.current.data)).toEqual(['Unplanned']))

    await act(async () => {
      gate.release?.(FEED)
    })
    await waitFor(() => expect(lookup).toHaveBeenCalledWith('SW1A 1AA, UK', expect.anything()))
    await act(async () => {
      await new Promise(resolve => setTimeout(resolve, 0))
    })

    expect(statuses(result.current.data)).toEqual(['Unplanned'])
    expect(result.current.loading).toBe(false)
  })

  it('polls every pollMs and stops on unmount', async () => {
    vi.useFakeTimers()
    const { services, fetchFaults } = fakeServices(async () => FEED, PLACES)

    const { unmount } = renderHook(() => useFaultDashboard('All', 1_000), { wrapper: wrapperFor(services) })
    await act(async () => {
      await vi.advanceTimersByTimeAsync(3_500)
    })

    expect(fetchFaults).toHaveBeenCalledTimes(4)

    unmount()
    await vi.advanceTimersByTimeAsync(3_000)

    expect(fetchFaults).toHaveBeenCalledTimes(4)
  })

  it('does not poll when pollMs is 0', async () => {
    vi.useFakeTimers()
    const { services, fetchFaults } = fakeServices(async () => FEED, PLACES)

    renderHook(() => useFaultDashboard('All', 0), { wrapper: wrapperFor(services) })
    await act(async () => {
      await vi.advanceTimersByTimeAsync(10_000)
    })

    expect(fetchFaults).toHaveBeenCalledTimes(1)
  })

  it('surfaces an unexpected exception as an error message', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const { services } = fakeServices(() => Promise.reject(new Error('feed exploded')), PLACES)

    const { result } = renderHook(() => useFaultDashboard('All'), { wrapper: wrapperFor(services) })

    await waitFor(() => expect(result.current.error).toBe('feed exploded'))
    expect(result.current.data).toBeNull()
    expect(error).toHaveBeenCalledWith('[Faults] Dashboard refresh failed:', expect.any(Error))
  })
})
