/**
 * Geocoder
 *
 * Address → coordinates with a persistent cache. One lookup per normalized
 * address is in flight at a time; concurrent callers share its promise.
 * Lookups go through a RateLimiter keyed by the provider's host. Failed
 * lookups are cached as unresolvable, cancelled ones are not cached.
 */

import { errorMessage, GeocodeError } from '../core/errors.js'
import { logger as rootLogger, type ILogger } from '../core/logger.js'
import type { Coordinates } from '../core/types.js'
import { RateLimiter } from '../fetch/rate-limiter.js'
import type { GeocodingProvider } from './nominatim.js'

export type GeocodeCacheEntry =
  | { status: 'resolved'; lat: number; lon: number; resolvedAt: string }
  | { status: 'unresolvable'; reason: 'not_found' | 'error'; resolvedAt: string }

export type GeocodeResult =
  | { ok: true; coordinates: Coordinates; cached: boolean }
  | { ok: false; error: GeocodeError; cached: boolean }

export interface ResolveOptions {
  signal?: AbortSignal
  /** Answer from the cache only, never contact the provider */
  cacheOnly?: boolean
}

export interface GeocoderOptions {
  provider: GeocodingProvider
  intervalMs?: number
  limiter?: RateLimiter
  staleAfterMs?: number
  negativeStaleAfterMs?: number
  now?: () => number
  logger?: ILogger
}

const DAY_MS = 24 * 60 * 60 * 1000

export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase().replace(/\s+/g, ' ')
}

function fromEntry(entry: GeocodeCacheEntry): GeocodeResult {
  if (entry.status === 'resolved') {
    return { ok: true, coordinates: { lat: entry.lat, lon: entry.lon }, cached: true }
  }
  return {
    ok: false,
    error: new GeocodeError(entry.reason, `Address marked unresolvable (${entry.reason}) at ${entry.resolvedAt}`),
    cached: true,
  }
}

export class Geocoder {
  private readonly cache = new Map<string, GeocodeCacheEntry>()
  private readonly inflight = new Map<string, Promise<GeocodeResult>>()
  private readonly provider: GeocodingProvider
  private readonly limiter: RateLimiter
  private readonly staleAfterMs: number
  private readonly negativeStaleAfterMs: number
  private readonly now: () => number
  private readonly logger: ILogger

  /** Provider calls made, for the run summary */
  lookups = 0

  constructor(options: GeocoderOptions) {
    this.provider = options.provider
    this.limiter = options.limiter ?? new RateLimiter({ baseIntervalMs: options.intervalMs ?? 1000, jitter: 0 })
    this.staleAfterMs = options.staleAfterMs ?? 90 * DAY_MS
    this.negativeStaleAfterMs = options.negativeStaleAfterMs ?? 7 * DAY_MS
    this.now = options.now ?? Date.now
    this.logger = (options.logger ?? rootLogger).child('geocoder')
  }

  get size(): number {
    return this.cache.size
  }

  async resolve(address: string, options: ResolveOptions = {}): Promise<GeocodeResult> {
    const key = normalizeAddress(address)
    if (!key) {
      return { ok: false, error: new GeocodeError('not_found', 'Empty address'), cached: false }
    }

    const entry = this.cache.get(key)
    if (entry) return fromEntry(entry)

    const pending = this.inflight.get(key)
    if (pending) return pending

    if (options.cacheOnly) {
      return { ok: false, error: new GeocodeError('cancelled', 'Lookup skipped, cache-only mode'), cached: false }
    }

    const lookup = this.lookup(key, address.trim(), options.signal).finally(() => {
      this.inflight.delete(key)
    })
    this.inflight.set(key, lookup)
    return lookup
  }

  /** Cache entries keyed by normalized address */
  snapshot(): Record<string, GeocodeCacheEntry> {
    return Object.fromEntries(this.cache)
  }

  /** Replace the cache, dropping entries older than their staleness window */
  load(entries: Record<string, GeocodeCacheEntry>): void {
    this.cache.clear()
    const now = this.now()
    let dropped = 0

    for (const [key, entry] of Object.entries(entries)) {
      const age = now - Date.parse(entry.resolvedAt)
      const limit = entry.status === 'resolved' ? this.staleAfterMs : this.negativeStaleAfterMs
      if (!Number.isFinite(age) || age > limit) {
        dropped++
        continue
      }
      this.cache.set(normalizeAddress(key), entry)
    }

    this.logger.debug('Geocode cache loaded', { entries: this.cache.size, dropped })
  }

  private async lookup(key: string, address: string, signal?: AbortSignal): Promise<GeocodeResult> {
    try {
      await this.limiter.acquire(this.provider.domain, signal)
      this.lookups++
      const coordinates = await this.provider.lookup(address, signal)
      this.limiter.reportSuccess(this.provider.domain)

      if (!coordinates) {
        this.store(key, { status: 'unresolvable', reason: 'not_found', resolvedAt: this.timestamp() })
        return { ok: false, error: new GeocodeError('not_found', `No result for "${address}"`), cached: false }
      }

      this.store(key, { status: 'resolved', lat: coordinates.lat, lon: coordinates.lon, resolvedAt: this.timestamp() })
      return { ok: true, coordinates, cached: false }
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, error: new GeocodeError('cancelled', 'Lookup cancelled', error), cached: false }
      }

      this.limiter.reportFailure(this.provider.domain)
      this.logger.warn('Geocoding failed', { address }, error)
      this.store(key, { status: 'unresolvable', reason: 'error', resolvedAt: this.timestamp() })
      return { ok: false, error: new GeocodeError('error', errorMessage(error), error), cached: false }
    }
  }

  private store(key: string, entry: GeocodeCacheEntry): void {
    this.cache.set(key, entry)
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString()
  }
}
