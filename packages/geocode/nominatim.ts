/**
 * OpenStreetMap Nominatim geocoding provider
 */

import { z } from 'zod'
import { GeocodeError } from '../core/errors.js'
import type { Coordinates } from '../core/types.js'
import { toCoordinates } from '../extractors/text.js'

export interface GeocodingProvider {
  /** Host the provider talks to, used as the rate-limit key */
  readonly domain: string
  /** Null when the provider knows no such address */
  lookup(address: string, signal?: AbortSignal): Promise<Coordinates | null>
}

export interface NominatimOptions {
  url: string
  userAgent: string
  countryCodes?: string
  /** City context such as "München, Germany", appended unless the address names the city */
  city?: string
  requestTimeoutMs?: number
}

/** Address with the city context appended when it does not mention the city yet */
export function withCity(address: string, city: string | undefined): string {
  const locality = city?.split(',')[0].trim().toLowerCase()
  if (!city || !locality || address.toLowerCase().includes(locality)) return address
  return `${address}, ${city}`
}

const NominatimResponse = z.array(
  z.object({
    lat: z.union([z.string(), z.number()]),
    lon: z.union([z.string(), z.number()]),
  })
)

export class NominatimProvider implements GeocodingProvider {
  readonly domain: string

  constructor(private readonly options: NominatimOptions) {
    this.domain = new URL(options.url).host.toLowerCase()
  }

  async lookup(address: string, signal?: AbortSignal): Promise<Coordinates | null> {
    const url = new URL(this.options.url)
    url.searchParams.set('format', 'json')
    url.searchParams.set('limit', '1')
    url.searchParams.set('q', withCity(address, this.options.city))
    if (this.options.countryCodes) url.searchParams.set('countrycodes', this.options.countryCodes)

    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs ?? 10_000)
    const response = await fetch(url, {
      headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    })

    if (!response.ok) {
      throw new GeocodeError('error', `Nominatim responded with ${response.status}`)
    }

    const payload = NominatimResponse.safeParse(await response.json())
    if (!payload.success) {
      throw new GeocodeError('error', 'Nominatim returned an unexpected payload', payload.error)
    }

    const first = payload.data[0]
    if (!first) return null
    return toCoordinates(first.lat, first.lon) ?? null
  }
}
