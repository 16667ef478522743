/**
 * Enricher
 *
 * Candidate record → enriched event or location. Each step is independent:
 * a failing step is logged as an EnrichmentError and leaves its field absent.
 * Only a record without title or source is rejected (null).
 */

import { EnrichmentError, errorMessage } from '../core/errors.js'
import { recordId } from '../core/fingerprint.js'
import { logger as rootLogger, type ILogger } from '../core/logger.js'
import type { CandidateRecord, Coordinates, EnrichedRecord, OpeningHours } from '../core/types.js'
import type { GeocodeResult, ResolveOptions } from '../geocode/geocoder.js'
import {
  amenities,
  classificationText,
  classifyCategory,
  energyLevel,
  highlights,
  inferAgeRange,
  kidFriendlyName,
  parentTips,
  weatherHint,
  type AgeRange,
} from './classify.js'
import { parseOpeningHours } from './opening-hours.js'

export interface AddressResolver {
  resolve(address: string, options?: ResolveOptions): Promise<GeocodeResult>
}

export interface EnricherOptions {
  /** Absent when geocoding is disabled */
  geocoder?: AddressResolver
  /** Category tags per source name */
  sourceCategories?: ReadonlyMap<string, readonly string[]>
  logger?: ILogger
}

export class Enricher {
  private readonly geocoder?: AddressResolver
  private readonly sourceCategories: ReadonlyMap<string, readonly string[]>
  private readonly logger: ILogger

  constructor(options: EnricherOptions = {}) {
    this.geocoder = options.geocoder
    this.sourceCategories = options.sourceCategories ?? new Map()
    this.logger = (options.logger ?? rootLogger).child('enricher')
  }

  async enrich(candidate: CandidateRecord, options: ResolveOptions = {}): Promise<EnrichedRecord | null> {
    const title = candidate.title.trim()
    if (!title || !candidate.source.trim()) {
      this.logger.debug('Dropping record without title or source', { source: candidate.source, itemIndex: candidate.itemIndex })
      return null
    }

    const { coordinates: sourceCoordinates, ...fields } = candidate
    const kind = candidate.kind
    const text = classificationText(title, candidate.description)
    const tags = candidate.categories ?? this.sourceCategories.get(candidate.source) ?? []

    const category = this.step(candidate, 'category', () => classifyCategory(kind, text, tags)) ?? kind
    const ages = this.step<AgeRange>(candidate, 'ageRange', () => inferAgeRange(kind, text, category)) ?? {}
    const kidName = this.step(candidate, 'kidName', () => kidFriendlyName(kind, title, text, category)) ?? title
    const weather = this.step(candidate, 'weather', () => weatherHint(text)) ?? 'any'
    const energy = this.step(candidate, 'energy', () => energyLevel(text)) ?? 'moderate'
    const tips = this.step(candidate, 'parentTips', () => parentTips(kind, text, weather)) ?? []
    const hoursText = candidate.openingHoursText
    const openingHours = hoursText
      ? this.step<OpeningHours>(candidate, 'openingHours', () => parseOpeningHours(hoursText))
      : undefined
    const coordinates = sourceCoordinates ?? (await this.geocode(candidate, options))

    const enriched = {
      ...fields,
      title,
      id: recordId(candidate),
      category,
      ...ages,
      ...(openingHours ? { openingHours } : {}),
      coordinates,
      kidName,
      weather,
      energy,
      parentTips: tips,
    }

    if (enriched.kind === 'location') {
      return {
        ...enriched,
        kind: 'location',
        amenities: this.step(candidate, 'amenities', () => amenities(text)) ?? [],
        highlights: this.step(candidate, 'highlights', () => highlights(text)) ?? [],
      }
    }
    return { ...enriched, kind: 'event' }
  }

  private step<T>(candidate: CandidateRecord, field: string, compute: () => T): T | undefined {
    try {
      return compute()
    } catch (cause) {
      const error = new EnrichmentError(field, `Could not derive ${field}: ${errorMessage(cause)}`, cause)
      this.logger.warn('Enrichment step failed', { source: candidate.source, itemIndex: candidate.itemIndex, field }, error)
      return undefined
    }
  }

  private async geocode(candidate: CandidateRecord, options: ResolveOptions): Promise<Coordinates | null> {
    const query = candidate.address ?? candidate.location
    if (!this.geocoder || !query?.trim()) return null

    try {
      const result = await this.geocoder.resolve(query, options)
      if (result.ok) return result.coordinates
      if (!result.cached && result.error.reason !== 'cancelled') {
        this.logger.debug('Address not resolved', { source: candidate.source, address: query, reason: result.error.reason })
      }
      return null
    } catch (cause) {
      const error = new EnrichmentError('coordinates', `Geocoding failed: ${errorMessage(cause)}`, cause)
      this.logger.warn('Enrichment step failed', { source: candidate.source, itemIndex: candidate.itemIndex, field: 'coordinates' }, error)
      return null
    }
  }
}
