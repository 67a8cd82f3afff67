// @vitest-environment jsdom
import { cleanup, fireEvent, screen, within } from '@testing-library/react'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import LiveFaults from './LiveFaults'
import type { FetchResult } from '../lib/fetchFaults'
import { PLANNED_FAULT, UNPLANNED_FAULT } from '../test/fixtures'
import { fakeServices, renderWithServices } from '../test/services'

const WESTMINSTER = { latitude: 51.501, longitude: -0.1416 }

class NoopResizeObserver {
  observe() {}
  unobserve() {}
  disconnect() {}
}

describe('LiveFaults', () => {
  beforeEach(() => {
    vi.stubGlobal('ResizeObserver', NoopResizeObserver)
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    cleanup()
    vi.unstubAllGlobals()
  })

  it('shows a loading message until the first run completes', () => {
    const { services } = fakeServices(() => new Promise<FetchResult>(() => {}))

    renderWithServices(<LiveFaults />, services)

    expect(screen.getByText('Loading live faults...')).toBeTruthy()
    expect(screen.getByLabelText<HTMLSelectElement>('Status filter').disabled).toBe(true)
  })

  it('shows no data when the feed fails', async () => {
    const { services, lookup } = fakeServices(async () => ({
      ok: false,
      failure: { kind: 'http', status: 500, message: 'API error 500 Internal Server Error: boom' },
    }))

    renderWithServices(<LiveFaults />, services)

    expect(await screen.findByText('No data available.')).toBeTruthy()
    expect(screen.getByText('API error 500 Internal Server Error: boom')).toBeTruthy()
    expect(screen.queryByRole('table')).toBeNull()
    expect(lookup).not.toHaveBeenCalled()
  })

  it('lists the located faults and leaves out the rest', async () => {
    const { services } = fakeServices(
      async () => ({ ok: true, records: [PLANNED_FAULT, UNPLANNED_FAULT] }),
      { 'SW1A 1AA, UK': WESTMINSTER },
    )

    renderWithServices(<LiveFaults />, services)

    expect(await screen.findByRole('heading', { name: 'Faults — 1 of 2 located' })).toBeTruthy()
    expect(screen.getAllByRole('row')).toHaveLength(2)
    expect(within(screen.getByRole('table')).getByText('SW1A 1AA')).toBeTruthy()
    expect(screen.queryByText('E1 6AN')).toBeNull()
    expect(screen.getByRole('heading', { name: 'Fault Map' })).toBeTruthy()
  })

  it('runs again for the new status when the filter changes', async () => {
    const { services, fetchFaults } = fakeServices(
      async () => ({ ok: true, records: [PLANNED_FAULT, UNPLANNED_FAULT] }),
      { 'SW1A 1AA, UK': WESTMINSTER },
    )

    renderWithServices(<LiveFaults />, services)
    await screen.findByRole('heading', { name: 'Faults — 1 of 2 located' })

    fireEvent.change(screen.getByLabelText('Status filter'), { target: { value: 'Unplanned' } })

    expect(await screen.findByRole('heading', { name: 'Faults — 0 of 1 located' })).toBeTruthy()
    expect(screen.getByText('No faults match the selected status.')).toBeTruthy()
    expect(screen.queryByRole('heading', { name: 'Fault Map' })).toBeNull()
    expect(fetchFaults).toHaveBeenCalledTimes(2)
  })

  it('dims the previous results while a new run is in progress', async () => {
    const gate: { release?: (result: FetchResult) => void } = {}
    const feed: FetchResult = { ok: true, records: [PLANNED_FAULT, UNPLANNED_FAULT] }
    let calls = 0
    const { services } = fakeServices(() => {
      calls += 1
      if (calls === 1) return Promise.resolve(feed)
      return new Promise<FetchResult>(resolve => { gate.release = resolve })
    }, { 'SW1A 1AA, UK': WESTMINSTER })

    renderWithServices(<LiveFaults />, services)
    await screen.findByRole('heading', { name: 'Faults — 1 of 2 located' })
    expect(screen.queryByText('Updating…')).toBeNull()

    fireEvent.change(screen.getByLabelText('Status filter'), { target: { value: 'Unplanned' } })

    expect(await screen.findByText('Updating…')).toBeTruthy()
    expect(screen.getByRole('heading', { name: 'Faults — 1 of 2 located' }).closest('[aria-busy="true"]')).not.toBeNull()

    gate.release?.(feed)

    expect(await screen.findByRole('heading', { name: 'Faults — 0 of 1 located' })).toBeTruthy()
    expect(screen.queryByText('Updating…')).toBeNull()
  })

  it('switches the fault map between street tiles and a scatter plot', async () => {
    const { services } = fakeServices(async () => ({ ok: true, records: [PLANNED_FAULT] }), {
      'SW1A 1AA, UK': WESTMINSTER,
    })

    const { container } = renderWithServices(<LiveFaults />, services)
    await screen.findByRole('heading', { name: 'Fault Map' })

    expect(screen.getByRole('button', { name: 'Street map' }).getAttribute('aria-pressed')).toBe('true')
    expect(container.querySelector('.leaflet-container')).not.toBeNull()

    fireEvent.click(screen.getByRole('button', { name: 'Scatter' }))

    expect(screen.getByRole('button', { name: 'Scatter' }).getAttribute('aria-pressed')).toBe('true')
    expect(container.querySelector('.leaflet-container')).toBeNull()
  })

  it('fetches again on manual refresh', async () => {
    const { services, fetchFaults } = fakeServices(async () => ({ ok: true, records: [PLANNED_FAULT] }), {
      'SW1A 1AA, UK': WESTMINSTER,
    })

    renderWithServices(<LiveFaults />, services)
    await screen.findByRole('heading', { name: 'Faults — 1 of 1 located' })

    fireEvent.click(screen.getByTitle('Refresh now'))

    await vi.waitFor(() => expect(fetchFaults).toHaveBeenCalledTimes(2))
  })
})
