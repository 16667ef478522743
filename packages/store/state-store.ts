/**
 * Run-to-run state: geocode cache and source quality
 */

import path from 'path'
import { z } from 'zod'
import { ConfigError } from '../core/errors.js'
import type { GeocodeCacheEntry } from '../geocode/geocoder.js'
import type { QualitySnapshot } from '../quality/tracker.js'
import { readJson, writeJsonAtomic } from './json-file.js'

export const STATE_FILES = {
  geocodeCache: 'geocode-cache.json',
  quality: 'source-quality.json',
} as const

const GeocodeCacheSchema = z.record(
  z.discriminatedUnion('status', [
    z.object({ status: z.literal('resolved'), lat: z.number(), lon: z.number(), resolvedAt: z.string() }),
    z.object({ status: z.literal('unresolvable'), reason: z.enum(['not_found', 'error']), resolvedAt: z.string() }),
  ])
)

export interface StateStore {
  readGeocodeCache(): Promise<Record<string, GeocodeCacheEntry>>
  writeGeocodeCache(entries: Record<string, GeocodeCacheEntry>): Promise<void>
  /** Raw quality snapshot, validated by SourceQualityTracker.fromJSON */
  readQuality(): Promise<unknown>
  writeQuality(snapshot: QualitySnapshot): Promise<void>
}

export class JsonStateStore implements StateStore {
  constructor(private readonly dataDir: string) {}

  async readGeocodeCache(): Promise<Record<string, GeocodeCacheEntry>> {
    const file = this.file(STATE_FILES.geocodeCache)
    const raw = await readJson(file)
    if (raw === undefined) return {}

    const parsed = GeocodeCacheSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid geocode cache in ${file}`,
        parsed.error.issues.map(issue => ({ entry: issue.path.join('.') || file, message: issue.message }))
      )
    }
    return parsed.data
  }

  async writeGeocodeCache(entries: Record<string, GeocodeCacheEntry>): Promise<void> {
    await writeJsonAtomic(this.file(STATE_FILES.geocodeCache), entries)
  }

  async readQuality(): Promise<unknown> {
    return readJson(this.file(STATE_FILES.quality))
  }

  async writeQuality(snapshot: QualitySnapshot): Promise<void> {
    await writeJsonAtomic(this.file(STATE_FILES.quality), snapshot)
  }

  private file(name: string): string {
    return path.join(this.dataDir, name)
  }
}
