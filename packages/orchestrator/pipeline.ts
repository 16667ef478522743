/**
 * Harvest pipeline
 *
 * One run: load sources, curated events and persisted state, fetch every
 * active source through a bounded worker pool, merge and de-duplicate the
 * candidates, enrich them and persist dataset, geocode cache and quality
 * state.
 *
 *   idle → loading → dispatching → collecting → enriching → persisting → done
 *
 * Any state can end in `failed`; only ConfigError and PersistenceError (or a
 * bug) get there, and the error is rethrown. A run-level deadline stops the
 * dispatch: sources in flight are reported as timeouts, sources not yet
 * started are listed as not attempted, and the run persists what it has.
 */

import { ConfigError, errorMessage, FetchError } from '../core/errors.js'
import { dedupKey } from '../core/fingerprint.js'
import { logger as rootLogger, type ILogger } from '../core/logger.js'
import type {
  CandidateRecord,
  EnrichedEvent,
  EnrichedLocation,
  FetchAttempt,
  Outcome,
  RecordFormat,
  RunSummary,
  SourceDescriptor,
  SourceRunResult,
  Transport,
} from '../core/types.js'
import { Enricher } from '../enrich/enricher.js'
import { extractDocument, outcomeOf } from '../extractors/index.js'
import type { Fetcher } from '../fetch/fetcher.js'
import type { RateLimiter } from '../fetch/rate-limiter.js'
import type { Geocoder } from '../geocode/geocoder.js'
import { SourceQualityTracker, type QualityOptions } from '../quality/tracker.js'
import type { DatasetStore } from '../store/dataset-store.js'
import type { StateStore } from '../store/state-store.js'
import { runPool } from './pool.js'

export type PipelineState =
  | 'idle'
  | 'loading'
  | 'dispatching'
  | 'collecting'
  | 'enriching'
  | 'persisting'
  | 'done'
  | 'failed'

export interface PipelineOptions {
  loadSources: () => Promise<SourceDescriptor[]>
  /** Curated records merged ahead of the harvested ones */
  loadManualEvents?: () => Promise<CandidateRecord[]>
  fetchers: Record<Transport, Fetcher>
  /** Transport for sources without an override */
  transport: Transport
  limiter: RateLimiter
  stateStore: StateStore
  datasetStore: DatasetStore
  /** Absent when geocoding is disabled */
  geocoder?: Geocoder
  quality?: Partial<QualityOptions>
  concurrency?: number
  enrichConcurrency?: number
  runTimeoutMs?: number
  now?: () => Date
  logger?: ILogger
  onStateChange?: (state: PipelineState, previous: PipelineState) => void
}

export interface RunOptions {
  /** Cancels the run like the deadline does */
  signal?: AbortSignal
}

interface SourceHarvest {
  result: SourceRunResult
  records: CandidateRecord[]
}

/** Higher wins when two sources yield the same event */
const FORMAT_PRIORITY: Record<RecordFormat, number> = {
  manual: 5,
  jsonld: 4,
  ical: 3,
  rss: 2,
  atom: 2,
  html: 1,
}

/**
 * Merge per-source candidates in (source, item) order and drop duplicates.
 * The record from the most structured format is kept; on a tie the first one.
 */
export function mergeCandidates(perSource: readonly CandidateRecord[][]): { records: CandidateRecord[]; duplicates: number } {
  const merged = perSource.flatMap(records => [...records].sort((a, b) => a.itemIndex - b.itemIndex))
  const winners = new Map<string, CandidateRecord>()

  for (const record of merged) {
    const key = dedupKey(record)
    const current = winners.get(key)
    if (!current || FORMAT_PRIORITY[record.format] > FORMAT_PRIORITY[current.format]) {
      winners.set(key, record)
    }
  }

  const kept = new Set(winners.values())
  const records = merged.filter(record => kept.has(record))
  return { records, duplicates: merged.length - records.length }
}

function failureOutcome(error: FetchError): Outcome {
  if (error.kind === 'timeout' || error.kind === 'cancelled') {
    return { kind: 'timeout', failure: error.failure }
  }
  return { kind: 'http_error', statusCode: error.statusCode, failure: error.failure, message: error.message }
}

export class Pipeline {
  private current: PipelineState = 'idle'
  private readonly logger: ILogger
  private readonly now: () => Date

  constructor(private readonly options: PipelineOptions) {
    this.logger = (options.logger ?? rootLogger).child('pipeline')
    this.now = options.now ?? (() => new Date())
  }

  get state(): PipelineState {
    return this.current
  }

  async run(runOptions: RunOptions = {}): Promise<RunSummary> {
    const startedAt = this.now()
    const deadline = new AbortController()
    const timeoutMs = this.options.runTimeoutMs ?? 10 * 60 * 1000
    const timer = setTimeout(() => deadline.abort(new Error(`Run timeout after ${timeoutMs}ms`)), timeoutMs)
    const signal = runOptions.signal ? AbortSignal.any([deadline.signal, runOptions.signal]) : deadline.signal

    try {
      this.transition('loading')
      const configured = (await this.options.loadSources()).filter(source => source.enabled)
      if (configured.length === 0) {
        throw new ConfigError('No enabled sources configured', [{ entry: 'sources', message: 'no enabled sources' }])
      }
      const manual = (await this.options.loadManualEvents?.()) ?? []
      if (manual.length > 0) this.logger.info('Manual events loaded', { count: manual.length })
      const { geocoder, stateStore } = this.options
      if (geocoder) geocoder.load(await stateStore.readGeocodeCache())
      const rawQuality = await stateStore.readQuality()
      const tracker = rawQuality === undefined
        ? new SourceQualityTracker(this.options.quality, this.logger)
        : SourceQualityTracker.fromJSON(rawQuality, this.options.quality, this.logger)

      const plan = tracker.planRun(configured.map(source => source.name))
      const active = new Set(plan.active)
      const sources = configured.filter(source => active.has(source.name))
      for (const source of sources) {
        if (source.minIntervalMs !== undefined) this.options.limiter.setInterval(source.domain, source.minIntervalMs)
      }

      this.transition('dispatching')
      const harvests = await runPool(
        sources,
        this.options.concurrency ?? 5,
        source => this.harvestSource(source, tracker, signal),
        signal
      )
      const notAttempted = sources.filter((_, index) => harvests[index] === undefined).map(source => source.name)
      if (signal.aborted) {
        this.logger.warn('Run cancelled', { reason: errorMessage(signal.reason), notAttempted: notAttempted.length })
      }

      this.transition('collecting')
      const completed = harvests.filter((harvest): harvest is SourceHarvest => harvest !== undefined)
      const { records: candidates, duplicates } = mergeCandidates([manual, ...completed.map(harvest => harvest.records)])
      this.logger.info('Candidates merged', { candidates: candidates.length + duplicates, duplicates })

      this.transition('enriching')
      const enricher = new Enricher({
        geocoder,
        sourceCategories: new Map(configured.map(source => [source.name, source.categories])),
        logger: this.logger,
      })
      const enriched = await runPool(candidates, this.options.enrichConcurrency ?? 10, candidate =>
        enricher.enrich(candidate, { signal, cacheOnly: signal.aborted })
      )
      const events: EnrichedEvent[] = []
      const locations: EnrichedLocation[] = []
      for (const record of enriched) {
        if (record?.kind === 'event') events.push(record)
        else if (record?.kind === 'location') locations.push(record)
      }

      const finishedAt = this.now()
      const results = completed.map(harvest => harvest.result)
      const count = (kinds: string[]) => results.filter(result => result.outcome && kinds.includes(result.outcome)).length
      const summary: RunSummary = {
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        cancelled: signal.aborted,
        sources: {
          configured: configured.length,
          excluded: plan.excluded,
          notAttempted,
          attempted: results.length,
          succeeded: count(['success']),
          empty: count(['empty']),
          failed: count(['http_error', 'parse_error']),
          timedOut: count(['timeout']),
        },
        items: {
          candidates: candidates.length + duplicates,
          manual: manual.length,
          duplicates,
          dropped: enriched.length - events.length - locations.length,
          events: events.length,
          locations: locations.length,
          geocoded: [...events, ...locations].filter(record => record.coordinates !== null).length,
        },
        results,
      }

      this.transition('persisting')
      if (events.length === 0) this.logger.warn('No events found, keeping the stored events')
      if (locations.length === 0) this.logger.warn('No locations found, keeping the stored locations')
      await this.options.datasetStore.write({ generatedAt: summary.finishedAt, events, locations, summary })
      this.logger.info('Dataset written', { events: events.length, locations: locations.length })
      if (geocoder) {
        await stateStore.writeGeocodeCache(geocoder.snapshot())
        this.logger.info('Geocode cache written', { entries: geocoder.size, lookups: geocoder.lookups })
      }
      await stateStore.writeQuality(tracker.toJSON())

      this.transition('done')
      this.logger.info('Run complete', {
        durationMs: summary.durationMs,
        succeeded: summary.sources.succeeded,
        failed: summary.sources.failed,
        timedOut: summary.sources.timedOut,
        events: events.length,
        locations: locations.length,
      })
      return summary
    } catch (error) {
      this.logger.error('Run failed', { state: this.current }, error)
      this.transition('failed')
      throw error
    } finally {
      clearTimeout(timer)
    }
  }

  /** Fetch, extract and report one source. Never throws. */
  private async harvestSource(source: SourceDescriptor, tracker: SourceQualityTracker, signal: AbortSignal): Promise<SourceHarvest> {
    const started = Date.now()
    const log = this.logger.child('source', { source: source.name })
    const fetcher = this.options.fetchers[source.transport ?? this.options.transport]
    const { limiter } = this.options

    let outcome: Outcome
    let records: CandidateRecord[] = []
    let skipped = 0
    let retries = 0
    let bytes = 0

    try {
      await limiter.acquire(source.domain, signal)
    } catch (error) {
      outcome = { kind: 'timeout', failure: 'transient' }
      return this.finish(source, tracker, log, { outcome, records, skipped, retries, bytes, started, error: errorMessage(error) })
    }

    const response = await fetcher.fetch(source.url, {}, { signal })
    retries = Math.max(0, response.attempts - 1)

    if (!response.ok) {
      if (response.error.kind !== 'cancelled') limiter.reportFailure(source.domain)
      outcome = failureOutcome(response.error)
      return this.finish(source, tracker, log, { outcome, records, skipped, retries, bytes, started, error: response.error.message })
    }

    limiter.reportSuccess(source.domain)
    bytes = response.bytes

    try {
      const extracted = extractDocument(source.format, response.body, {
        source: source.name,
        url: response.finalUrl,
        selectors: source.selectors,
        reference: this.now(),
      })
      records = extracted.records
      skipped = extracted.skipped
      outcome = outcomeOf(extracted)
    } catch (error) {
      outcome = { kind: 'parse_error', message: errorMessage(error) }
    }

    const error = outcome.kind === 'parse_error' ? outcome.message : undefined
    return this.finish(source, tracker, log, { outcome, records, skipped, retries, bytes, started, error })
  }

  private finish(
    source: SourceDescriptor,
    tracker: SourceQualityTracker,
    log: ILogger,
    run: { outcome: Outcome; records: CandidateRecord[]; skipped: number; retries: number; bytes: number; started: number; error?: string }
  ): SourceHarvest {
    const durationMs = Date.now() - run.started
    const attempt: FetchAttempt = {
      source: source.name,
      timestamp: this.now(),
      outcome: run.outcome,
      retries: run.retries,
      bytes: run.bytes,
      latencyMs: durationMs,
      itemsExtracted: run.records.length,
      itemsSkipped: run.skipped,
    }
    tracker.report(attempt)

    const meta = { outcome: run.outcome.kind, items: run.records.length, skipped: run.skipped, retries: run.retries, durationMs }
    if (run.outcome.kind === 'success' || run.outcome.kind === 'empty') log.info('Source harvested', meta)
    else log.warn('Source failed', { ...meta, error: run.error })

    return {
      records: run.records,
      result: {
        source: source.name,
        attempted: true,
        outcome: run.outcome.kind,
        items: run.records.length,
        skipped: run.skipped,
        retries: run.retries,
        durationMs,
        ...(run.error ? { error: run.error } : {}),
      },
    }
  }

  private transition(next: PipelineState): void {
    const previous = this.current
    this.current = next
    this.logger.info('State change', { from: previous, to: next })
    this.options.onStateChange?.(next, previous)
  }
}
