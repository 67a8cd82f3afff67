// @vitest-environment jsdom
import { cleanup, fireEvent, screen } from '@testing-library/react'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import GeocodeCache from './GeocodeCache'
import { fakeServices, renderWithServices } from '../test/services'

async function primedServices() {
  const setup = fakeServices(async () => ({ ok: true, records: [] }), {
    'SW1A 1AA, UK': { latitude: 51.501, longitude: -0.1416 },
  })
  await setup.services.geocoder.resolve('SW1A 1AA')
  await setup.services.geocoder.resolve('ZZ9 9ZZ')
  return setup
}

describe('GeocodeCache', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  afterEach(cleanup)

  it('lists cached postcodes with their outcome', async () => {
    const { services } = await primedServices()

    renderWithServices(<GeocodeCache />, services)

    expect(screen.getByText('51.5010, -0.1416')).toBeTruthy()
    expect(screen.getByText('No match')).toBeTruthy()
  })

  it('picks up lookups made after it opened on reload', async () => {
    const { services } = await primedServices()
    renderWithServices(<GeocodeCache />, services)
    await services.geocoder.resolve('E1 6AN')

    expect(screen.queryByText('E1 6AN')).toBeNull()

    fireEvent.click(screen.getByText('Reload'))

    expect(screen.getByText('E1 6AN')).toBeTruthy()
    expect(screen.getAllByText('No match')).toHaveLength(2)
  })

  it('forgets unresolved postcodes on request', async () => {
    const { services } = await primedServices()
    renderWithServices(<GeocodeCache />, services)

    fireEvent.click(screen.getByText('Retry unresolved'))

    expect(screen.getByRole('status').textContent).toBe('1 unresolved postcode will be looked up again')
    expect(screen.queryByText('ZZ9 9ZZ')).toBeNull()
    expect(screen.getByText('SW1A 1AA')).toBeTruthy()
    expect(services.geocoder.size).toBe(1)
  })

  it('empties the cache', async () => {
    const { services } = await primedServices()
    renderWithServices(<GeocodeCache />, services)

    fireEvent.click(screen.getByText('Clear cache'))

    expect(screen.getByRole('status').textContent).toBe('Geocode cache cleared')
    expect(screen.getByText('No postcodes looked up yet.')).toBeTruthy()
    expect(services.geocoder.size).toBe(0)
  })
})
