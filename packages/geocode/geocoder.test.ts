import { describe, it, expect, vi } from 'vitest'
import { RateLimiter } from '../fetch/rate-limiter.js'
import type { Coordinates } from '../core/types.js'
import { Geocoder, normalizeAddress } from './geocoder.js'
import type { GeocodingProvider } from './nominatim.js'

const NOW = Date.parse('2025-06-01T00:00:00.000Z')
const DAY = 24 * 60 * 60 * 1000

function setup(lookup: GeocodingProvider['lookup']) {
  const provider = { domain: 'geo.example', lookup: vi.fn(lookup) }
  const limiter = new RateLimiter({ baseIntervalMs: 1000, jitter: 0, sleep: async () => {} })
  const geocoder = new Geocoder({ provider, limiter, now: () => NOW })
  return { provider, geocoder }
}

const marienplatz: Coordinates = { lat: 48.137, lon: 11.575 }

describe('normalizeAddress', () => {
  it('trims, case-folds and collapses whitespace', () => {
    expect(normalizeAddress('  Marienplatz 1,\n  MÜNCHEN ')).toBe('marienplatz 1, münchen')
  })
})

describe('Geocoder', () => {
  it('shares one lookup between concurrent callers of the same address', async () => {
    let release: (value: Coordinates) => void = () => {}
    const { provider, geocoder } = setup(() => new Promise(resolve => (release = resolve)))

    const first = geocoder.resolve('Marienplatz 1, München')
    const second = geocoder.resolve('  marienplatz 1,   MÜNCHEN ')
    await vi.waitFor(() => expect(provider.lookup).toHaveBeenCalledTimes(1))
    release(marienplatz)

    expect(await first).toEqual({ ok: true, coordinates: marienplatz, cached: false })
    expect(await second).toEqual({ ok: true, coordinates: marienplatz, cached: false })
    expect(provider.lookup).toHaveBeenCalledTimes(1)
  })

  it('answers repeated addresses from the cache', async () => {
    const { provider, geocoder } = setup(async () => marienplatz)

    await geocoder.resolve('Marienplatz 1, München')
    const again = await geocoder.resolve('Marienplatz 1, München')

    expect(again).toEqual({ ok: true, coordinates: marienplatz, cached: true })
    expect(provider.lookup).toHaveBeenCalledTimes(1)
    expect(geocoder.lookups).toBe(1)
  })

  it('caches addresses the provider does not know', async () => {
    const { provider, geocoder } = setup(async () => null)

    const first = await geocoder.resolve('Nirgendwo 0')
    const second = await geocoder.resolve('Nirgendwo 0')

    expect(first.ok).toBe(false)
    expect(second.ok).toBe(false)
    expect(second.cached).toBe(true)
    if (!second.ok) expect(second.error.reason).toBe('not_found')
    expect(provider.lookup).toHaveBeenCalledTimes(1)
  })

  it('caches provider errors as unresolvable', async () => {
    const { geocoder } = setup(async () => {
      throw new Error('HTTP 500')
    })

    const result = await geocoder.resolve('Kaputtweg 5')

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.reason).toBe('error')
    expect(geocoder.snapshot()).toEqual({
      'kaputtweg 5': { status: 'unresolvable', reason: 'error', resolvedAt: '2025-06-01T00:00:00.000Z' },
    })
  })

  it('does not cache cancelled lookups', async () => {
    const { provider, geocoder } = setup(async () => marienplatz)
    const controller = new AbortController()
    controller.abort()

    const cancelled = await geocoder.resolve('Marienplatz 1', { signal: controller.signal })

    expect(cancelled.ok).toBe(false)
    if (!cancelled.ok) expect(cancelled.error.reason).toBe('cancelled')
    expect(geocoder.snapshot()).toEqual({})

    const retried = await geocoder.resolve('Marienplatz 1')
    expect(retried.ok).toBe(true)
    expect(provider.lookup).toHaveBeenCalledTimes(1)
  })

  it('never contacts the provider in cache-only mode', async () => {
    const { provider, geocoder } = setup(async () => marienplatz)

    const result = await geocoder.resolve('Marienplatz 1', { cacheOnly: true })

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.reason).toBe('cancelled')
    expect(provider.lookup).not.toHaveBeenCalled()
  })

  it('reloads a snapshot and drops stale entries', async () => {
    const { provider, geocoder } = setup(async () => marienplatz)
    const at = (daysAgo: number) => new Date(NOW - daysAgo * DAY).toISOString()

    geocoder.load({
      'frisch 1': { status: 'resolved', lat: 48.1, lon: 11.5, resolvedAt: at(10) },
      'alt 2': { status: 'resolved', lat: 48.2, lon: 11.6, resolvedAt: at(100) },
      'unbekannt 3': { status: 'unresolvable', reason: 'not_found', resolvedAt: at(3) },
      'unbekannt 4': { status: 'unresolvable', reason: 'error', resolvedAt: at(8) },
    })

    expect(Object.keys(geocoder.snapshot())).toEqual(['frisch 1', 'unbekannt 3'])
    expect(await geocoder.resolve('Frisch 1')).toEqual({ ok: true, coordinates: { lat: 48.1, lon: 11.5 }, cached: true })
    expect((await geocoder.resolve('Unbekannt 3')).cached).toBe(true)
    expect(provider.lookup).not.toHaveBeenCalled()
  })

  it('round-trips the cache through JSON', async () => {
    const { geocoder } = setup(async address => (address === 'Da 1' ? marienplatz : null))
    await geocoder.resolve('Da 1')
    await geocoder.resolve('Weg 2')

    const restored = setup(async () => marienplatz).geocoder
    restored.load(JSON.parse(JSON.stringify(geocoder.snapshot())))

    expect(restored.snapshot()).toEqual(geocoder.snapshot())
  })
})
