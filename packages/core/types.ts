/**
 * Core types for the event and venue harvester
 */

// Sources

export type SourceFormat = 'html' | 'rss' | 'atom' | 'ical' | 'location-directory'

export type Transport = 'http' | 'browser'

export interface SourceSelectors {
  item?: string
  title?: string
  date?: string
  description?: string
  link?: string
  name?: string
  address?: string
  hours?: string
}

export interface SourceDescriptor {
  name: string
  url: string
  domain: string                 // Lower-cased URL host, used for rate limiting
  format: SourceFormat
  categories: string[]           // Category tags from configuration
  enabled: boolean
  selectors?: SourceSelectors    // HTML heuristic hints
  transport?: Transport          // Overrides the configured fetcher
  minIntervalMs?: number         // Overrides the limiter base interval for this domain
}

// Fetch attempts

export type OutcomeKind = 'success' | 'http_error' | 'timeout' | 'parse_error' | 'empty'

export type Outcome =
  | { kind: 'success' }
  | { kind: 'empty' }
  | { kind: 'parse_error'; message: string }
  | { kind: 'timeout'; failure: FailureClass }
  | { kind: 'http_error'; statusCode: number | null; failure: FailureClass; message: string }

export type FailureClass = 'transient' | 'permanent'

export interface FetchAttempt {
  source: string
  timestamp: Date
  outcome: Outcome
  retries: number
  bytes: number
  latencyMs: number
  itemsExtracted: number
  itemsSkipped: number
}

// Records

export type ExtractionFormat = 'jsonld' | 'rss' | 'atom' | 'ical' | 'html'

/** Extraction formats plus curated entries from the manual events file */
export type RecordFormat = ExtractionFormat | 'manual'

export type RecordKind = 'event' | 'location'

/**
 * Time value as found in the source.
 * - instant: absolute point in time (ISO 8601, UTC)
 * - floating: wall-clock time without a zone (YYYY-MM-DDTHH:mm:ss)
 * - date: all-day date (YYYY-MM-DD)
 * - expression: free text that could not be resolved to a date
 */
export type EventTime =
  | { kind: 'instant'; iso: string }
  | { kind: 'floating'; local: string }
  | { kind: 'date'; date: string }
  | { kind: 'expression'; text: string }

export interface Coordinates {
  lat: number
  lon: number
}

export interface CandidateRecord {
  kind: RecordKind
  title: string
  description?: string
  start?: EventTime
  end?: EventTime
  location?: string              // Raw location text (venue name or address)
  address?: string
  openingHoursText?: string
  coordinates?: Coordinates      // Only when the source supplies them
  url?: string
  categories?: string[]          // Category tags of the record itself, ahead of the source's
  source: string
  format: RecordFormat
  itemIndex: number
}

// Enrichment

export type Weekday =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday'

export interface TimeInterval {
  start: string                  // HH:MM, inclusive
  end: string                    // HH:MM, exclusive
}

export type DayHours =
  | { status: 'open'; intervals: TimeInterval[] }
  | { status: 'closed' }

export type OpeningHours =
  | { kind: 'schedule'; days: Record<Weekday, DayHours> }
  | { kind: 'closed'; text: string }
  | { kind: 'unparsed'; text: string }

export type WeatherHint = 'good-weather' | 'indoor' | 'any'

export type EnergyLevel = 'active' | 'moderate' | 'calm'

interface EnrichedFields {
  id: string
  category: string
  minAge?: number
  maxAge?: number
  openingHours?: OpeningHours
  coordinates: Coordinates | null
  kidName: string
  weather: WeatherHint
  energy: EnergyLevel
  parentTips: string[]
}

export type EnrichedEvent = Omit<CandidateRecord, 'coordinates'> & EnrichedFields & { kind: 'event' }

export type EnrichedLocation = Omit<CandidateRecord, 'coordinates'> & EnrichedFields & {
  kind: 'location'
  amenities: string[]
  highlights: string[]
}

export type EnrichedRecord = EnrichedEvent | EnrichedLocation

// Run results

export interface SourceRunResult {
  source: string
  attempted: boolean
  outcome?: OutcomeKind
  items: number
  skipped: number
  retries: number
  durationMs: number
  error?: string
}

export interface RunSummary {
  startedAt: string
  finishedAt: string
  durationMs: number
  cancelled: boolean
  sources: {
    configured: number
    excluded: string[]
    notAttempted: string[]
    attempted: number
    succeeded: number
    empty: number
    failed: number
    timedOut: number
  }
  items: {
    candidates: number
    manual: number
    duplicates: number
    dropped: number
    events: number
    locations: number
    geocoded: number
  }
  results: SourceRunResult[]
}

export interface Dataset {
  generatedAt: string
  events: EnrichedEvent[]
  locations: EnrichedLocation[]
  summary: RunSummary
}
