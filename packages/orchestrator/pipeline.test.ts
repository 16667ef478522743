import { afterEach, describe, it, expect, vi } from 'vitest'
import { ConfigError, PersistenceError } from '../core/errors.js'
import type { CandidateRecord, Dataset, SourceDescriptor, SourceFormat } from '../core/types.js'
import { cancelledError, type Fetcher, type FetchOptions, type FetchResponse } from '../fetch/fetcher.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { RateLimiter } from '../fetch/rate-limiter.js'
import { Geocoder, type GeocodeCacheEntry } from '../geocode/geocoder.js'
import type { QualitySnapshot } from '../quality/tracker.js'
import type { DatasetStore } from '../store/dataset-store.js'
import type { StateStore } from '../store/state-store.js'
import { mergeCandidates, Pipeline, type PipelineOptions, type PipelineState } from './pipeline.js'

class MemoryStateStore implements StateStore {
  geocode: Record<string, GeocodeCacheEntry> = {}
  quality: unknown = undefined

  async readGeocodeCache() {
    return this.geocode
  }

  async writeGeocodeCache(entries: Record<string, GeocodeCacheEntry>) {
    this.geocode = entries
  }

  async readQuality() {
    return this.quality
  }

  async writeQuality(snapshot: QualitySnapshot) {
    this.quality = snapshot
  }
}

class MemoryDatasetStore implements DatasetStore {
  written: Dataset[] = []

  async write(dataset: Dataset) {
    this.written.push(dataset)
  }
}

function source(name: string, url: string, format: SourceFormat = 'rss'): SourceDescriptor {
  return { name, url, domain: new URL(url).host, format, categories: [], enabled: true }
}

function item(title: string, start: string, location?: string): string {
  const where = location ? `<ev:location>${location}</ev:location>` : ''
  return `<item><title>${title}</title><ev:startdate>${start}</ev:startdate>${where}</item>`
}

function feed(...items: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:ev="http://purl.org/rss/1.0/modules/event/">
<channel><title>Termine</title>${items.join('\n')}</channel>
</rss>`
}

function okResponse(url: string, body: string): FetchResponse {
  return { ok: true, status: 200, body, finalUrl: url, bytes: body.length, attempts: 1 }
}

/** Serves a one-item feed per URL; URLs in `hanging` answer only when the run is cancelled */
function scriptedFetcher(hanging: Set<string>) {
  const fetch = vi.fn(async (url: string, _headers?: Record<string, string>, options?: FetchOptions): Promise<FetchResponse> => {
    if (hanging.has(url)) {
      return new Promise(resolve => {
        options?.signal?.addEventListener(
          'abort',
          () => resolve({ ok: false, error: cancelledError(url), attempts: 1 }),
          { once: true }
        )
      })
    }
    return okResponse(url, feed(item(`Termin ${new URL(url).host}`, '2025-06-10T10:00:00+02:00')))
  })
  const fetcher: Fetcher = { fetch, close: async () => undefined }
  return { fetcher, fetch }
}

function setup(overrides: Partial<PipelineOptions> & Pick<PipelineOptions, 'loadSources' | 'fetchers'>) {
  const stateStore = new MemoryStateStore()
  const datasetStore = new MemoryDatasetStore()
  const states: PipelineState[] = []
  const pipeline = new Pipeline({
    transport: 'http',
    limiter: new RateLimiter({ baseIntervalMs: 0, jitter: 0 }),
    stateStore,
    datasetStore,
    now: () => new Date('2025-06-01T08:00:00Z'),
    onStateChange: state => states.push(state),
    ...overrides,
  })
  return { pipeline, stateStore, datasetStore, states }
}

describe('Pipeline', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('keeps going when sources fail and reports each outcome', async () => {
    const bodies: Record<string, Response> = {
      'https://a.example/feed.xml': new Response(
        feed(item('Bilderbuchkino', '2025-06-10T10:00:00+02:00'), item('Laternenbasteln', '2025-06-11T15:00:00+02:00'))
      ),
      'https://b.example/termine': new Response('denied', { status: 403 }),
      'https://c.example/feed.xml': new Response(
        feed(item('Familienfest', '2025-07-05T11:00:00+02:00'), '<item><title>Kaputt<link>https://c.example/x</link></item>')
      ),
    }
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async input => {
      const response = bodies[String(input)]
      if (!response) throw new Error(`unexpected request ${String(input)}`)
      return response
    })

    const http = new HttpFetcher({
      userAgents: ['test-agent'],
      acceptLanguage: 'de-DE',
      requestTimeoutMs: 1000,
      retryPolicy: { maxRetries: 3, initialDelayMs: 1, maxDelayMs: 1 },
    })
    const { pipeline, datasetStore, stateStore, states } = setup({
      loadSources: async () => [
        source('a', 'https://a.example/feed.xml'),
        source('b', 'https://b.example/termine', 'html'),
        source('c', 'https://c.example/feed.xml'),
      ],
      fetchers: { http, browser: http },
    })

    const summary = await pipeline.run()

    expect(states).toEqual(['loading', 'dispatching', 'collecting', 'enriching', 'persisting', 'done'])
    expect(fetchSpy).toHaveBeenCalledTimes(3)

    const dataset = datasetStore.written[0]
    expect(dataset.events.map(event => [event.source, event.title])).toEqual([
      ['a', 'Bilderbuchkino'],
      ['a', 'Laternenbasteln'],
      ['c', 'Familienfest'],
    ])
    expect(dataset.locations).toEqual([])

    expect(summary.results).toEqual([
      { source: 'a', attempted: true, outcome: 'success', items: 2, skipped: 0, retries: 0, durationMs: expect.any(Number) },
      {
        source: 'b',
        attempted: true,
        outcome: 'http_error',
        items: 0,
        skipped: 0,
        retries: 0,
        durationMs: expect.any(Number),
        error: 'HTTP 403 from https://b.example/termine',
      },
      { source: 'c', attempted: true, outcome: 'success', items: 1, skipped: 1, retries: 0, durationMs: expect.any(Number) },
    ])
    expect(summary.sources).toEqual({
      configured: 3,
      excluded: [],
      notAttempted: [],
      attempted: 3,
      succeeded: 2,
      empty: 0,
      failed: 1,
      timedOut: 0,
    })
    expect(summary.items).toEqual({ candidates: 3, manual: 0, duplicates: 0, dropped: 0, events: 3, locations: 0, geocoded: 0 })
    expect(summary.cancelled).toBe(false)

    const quality = stateStore.quality
    expect(quality).toMatchObject({
      version: 1,
      sources: {
        a: { window: ['success'], consecutiveFailures: 0, itemsExtracted: 2 },
        b: { window: ['http_error'], consecutiveFailures: 1, lastSuccessAt: null },
        c: { window: ['success'], itemsExtracted: 1 },
      },
    })
  })

  it('reports in-flight sources as timeouts when the deadline passes', async () => {
    const urls = [1, 2, 3, 4, 5].map(n => `https://quelle${n}.example/feed.xml`)
    const { fetcher } = scriptedFetcher(new Set([urls[1], urls[3]]))
    const { pipeline, datasetStore, states } = setup({
      loadSources: async () => urls.map((url, index) => source(`quelle${index + 1}`, url)),
      fetchers: { http: fetcher, browser: fetcher },
      runTimeoutMs: 50,
    })

    const summary = await pipeline.run()

    expect(summary.cancelled).toBe(true)
    expect(summary.results.map(result => [result.source, result.outcome])).toEqual([
      ['quelle1', 'success'],
      ['quelle2', 'timeout'],
      ['quelle3', 'success'],
      ['quelle4', 'timeout'],
      ['quelle5', 'success'],
    ])
    expect(summary.sources.timedOut).toBe(2)
    expect(summary.sources.notAttempted).toEqual([])
    expect(states).toContain('persisting')
    expect(states.at(-1)).toBe('done')
    expect(datasetStore.written[0].events.map(event => event.title)).toEqual([
      'Termin quelle1.example',
      'Termin quelle3.example',
      'Termin quelle5.example',
    ])
  })

  it('lists sources that never started as not attempted', async () => {
    const urls = ['https://langsam.example/', 'https://zwei.example/', 'https://drei.example/']
    const { fetcher, fetch } = scriptedFetcher(new Set([urls[0]]))
    const controller = new AbortController()
    const { pipeline, stateStore } = setup({
      loadSources: async () => urls.map((url, index) => source(`s${index}`, url)),
      fetchers: { http: fetcher, browser: fetcher },
      concurrency: 1,
    })

    setTimeout(() => controller.abort(), 20)
    const summary = await pipeline.run({ signal: controller.signal })

    expect(fetch).toHaveBeenCalledTimes(1)
    expect(summary.results.map(result => [result.source, result.outcome])).toEqual([['s0', 'timeout']])
    expect(summary.sources.notAttempted).toEqual(['s1', 's2'])
    expect(stateStore.quality).toMatchObject({ sources: { s0: { window: ['timeout'] } } })
    expect(stateStore.quality).not.toHaveProperty('sources.s1')
  })

  it('skips sources the quality tracker excludes', async () => {
    const { fetcher, fetch } = scriptedFetcher(new Set())
    const { pipeline, stateStore } = setup({
      loadSources: async () => [source('gut', 'https://gut.example/'), source('kaputt', 'https://kaputt.example/')],
      fetchers: { http: fetcher, browser: fetcher },
    })
    stateStore.quality = {
      version: 1,
      sources: {
        kaputt: {
          window: ['http_error', 'http_error', 'http_error', 'http_error', 'http_error'],
          totalAttempts: 5,
          lastSuccessAt: null,
          consecutiveFailures: 5,
          skippedRuns: 0,
          itemsExtracted: 0,
        },
      },
    }

    const summary = await pipeline.run()

    expect(summary.sources.excluded).toEqual(['kaputt'])
    expect(fetch).toHaveBeenCalledTimes(1)
    expect(fetch.mock.calls[0][0]).toBe('https://gut.example/')
    expect(stateStore.quality).toMatchObject({ sources: { kaputt: { skippedRuns: 1 } } })
  })

  it('uses the transport a source asks for', async () => {
    const http = scriptedFetcher(new Set())
    const browser = scriptedFetcher(new Set())
    const { pipeline } = setup({
      loadSources: async () => [
        source('normal', 'https://normal.example/'),
        { ...source('geschuetzt', 'https://geschuetzt.example/'), transport: 'browser' },
      ],
      fetchers: { http: http.fetcher, browser: browser.fetcher },
    })

    await pipeline.run()

    expect(http.fetch.mock.calls.map(call => call[0])).toEqual(['https://normal.example/'])
    expect(browser.fetch.mock.calls.map(call => call[0])).toEqual(['https://geschuetzt.example/'])
  })

  it('geocodes each distinct location once and persists the cache', async () => {
    const lookup = vi.fn(async () => ({ lat: 48.1, lon: 11.6 }))
    const geocoder = new Geocoder({
      provider: { domain: 'geo.example', lookup },
      limiter: new RateLimiter({ baseIntervalMs: 0, jitter: 0 }),
      now: () => Date.parse('2025-06-01T08:00:00Z'),
    })
    const body = feed(
      item('Bilderbuchkino', '2025-06-10T10:00:00+02:00', 'Stadtpark'),
      item('Laternenbasteln', '2025-06-11T15:00:00+02:00', 'Stadtpark')
    )
    const fetcher: Fetcher = { fetch: async url => okResponse(url, body), close: async () => undefined }
    const { pipeline, stateStore } = setup({
      loadSources: async () => [source('park', 'https://park.example/feed.xml')],
      fetchers: { http: fetcher, browser: fetcher },
      geocoder,
    })

    const summary = await pipeline.run()

    expect(lookup).toHaveBeenCalledTimes(1)
    expect(summary.items.geocoded).toBe(2)
    expect(stateStore.geocode).toEqual({
      stadtpark: { status: 'resolved', lat: 48.1, lon: 11.6, resolvedAt: '2025-06-01T08:00:00.000Z' },
    })
  })

  it('fails the run on invalid configuration', async () => {
    const { fetcher } = scriptedFetcher(new Set())
    const { pipeline, datasetStore, states } = setup({
      loadSources: async () => {
        throw new ConfigError('Invalid source configuration', [{ entry: 'sources.json #0', message: 'url: Invalid url' }])
      },
      fetchers: { http: fetcher, browser: fetcher },
    })

    await expect(pipeline.run()).rejects.toBeInstanceOf(ConfigError)
    expect(states).toEqual(['loading', 'failed'])
    expect(datasetStore.written).toEqual([])
  })

  it('merges curated events ahead of harvested duplicates', async () => {
    const { fetcher } = scriptedFetcher(new Set())
    const curated: CandidateRecord = {
      kind: 'event',
      title: 'Termin a.example',
      start: { kind: 'instant', iso: '2025-06-10T08:00:00.000Z' },
      address: 'Marienplatz 8, München',
      source: 'manual',
      format: 'manual',
      itemIndex: 0,
    }
    const { pipeline, datasetStore } = setup({
      loadSources: async () => [source('a', 'https://a.example/'), source('b', 'https://b.example/')],
      loadManualEvents: async () => [curated],
      fetchers: { http: fetcher, browser: fetcher },
    })

    const summary = await pipeline.run()

    expect(summary.items).toMatchObject({ candidates: 3, manual: 1, duplicates: 1, events: 2 })
    expect(datasetStore.written[0].events.map(event => [event.source, event.title])).toEqual([
      ['manual', 'Termin a.example'],
      ['b', 'Termin b.example'],
    ])
  })

  it('fails the run when no source is configured', async () => {
    const { fetcher, fetch } = scriptedFetcher(new Set())
    const { pipeline, datasetStore, states } = setup({
      loadSources: async () => [],
      fetchers: { http: fetcher, browser: fetcher },
    })

    await expect(pipeline.run()).rejects.toBeInstanceOf(ConfigError)
    expect(states).toEqual(['loading', 'failed'])
    expect(fetch).not.toHaveBeenCalled()
    expect(datasetStore.written).toEqual([])
  })

  it('fails the run when every source is disabled', async () => {
    const { fetcher } = scriptedFetcher(new Set())
    const { pipeline, datasetStore, states } = setup({
      loadSources: async () => [{ ...source('aus', 'https://aus.example/'), enabled: false }],
      fetchers: { http: fetcher, browser: fetcher },
    })

    await expect(pipeline.run()).rejects.toBeInstanceOf(ConfigError)
    expect(states).toEqual(['loading', 'failed'])
    expect(datasetStore.written).toEqual([])
  })

  it('fails the run when the dataset cannot be written', async () => {
    const { fetcher } = scriptedFetcher(new Set())
    const stateless = new MemoryStateStore()
    const { pipeline } = setup({
      loadSources: async () => [source('a', 'https://a.example/')],
      fetchers: { http: fetcher, browser: fetcher },
      stateStore: stateless,
      datasetStore: {
        write: async () => {
          throw new PersistenceError('events.json', 'disk full')
        },
      },
    })

    await expect(pipeline.run()).rejects.toBeInstanceOf(PersistenceError)
    expect(pipeline.state).toBe('failed')
    expect(stateless.quality).toBeUndefined()
  })
})

describe('mergeCandidates', () => {
  function candidate(fields: Partial<CandidateRecord>): CandidateRecord {
    return {
      kind: 'event',
      title: 'Puppentheater',
      start: { kind: 'date', date: '2025-06-14' },
      source: 'a',
      format: 'rss',
      itemIndex: 0,
      ...fields,
    }
  }

  it('orders by source, then item index', () => {
    const { records } = mergeCandidates([
      [candidate({ title: 'Zwei', itemIndex: 1 }), candidate({ title: 'Eins', itemIndex: 0 })],
      [candidate({ title: 'Drei', source: 'b' })],
    ])
    expect(records.map(record => record.title)).toEqual(['Eins', 'Zwei', 'Drei'])
  })

  it('keeps the structured duplicate at its own position', () => {
    const rss = candidate({ format: 'rss' })
    const jsonld = candidate({ title: 'PUPPENTHEATER!', source: 'b', format: 'jsonld' })

    const { records, duplicates } = mergeCandidates([[rss, candidate({ title: 'Andere', itemIndex: 1 })], [jsonld]])

    expect(records.map(record => [record.source, record.title])).toEqual([
      ['a', 'Andere'],
      ['b', 'PUPPENTHEATER!'],
    ])
    expect(duplicates).toBe(1)
  })

  it('keeps the first of equally ranked duplicates', () => {
    const { records } = mergeCandidates([[candidate({})], [candidate({ source: 'b', format: 'atom' })]])
    expect(records.map(record => record.source)).toEqual(['a'])
  })

  it('keeps same-named venues at different addresses apart', () => {
    const venue = (address: string, source: string) =>
      candidate({ kind: 'location', title: 'Wasserspielplatz', start: undefined, address, source })

    const { records, duplicates } = mergeCandidates([
      [venue('Parkweg 1, 80331 München', 'a')],
      [venue('Seestraße 9, 80802 München', 'b'), venue('parkweg 1,  80331 münchen', 'c')],
    ])

    expect(records.map(record => record.address)).toEqual(['Parkweg 1, 80331 München', 'Seestraße 9, 80802 München'])
    expect(duplicates).toBe(1)
  })

  it('does not merge different days or kinds', () => {
    const { records } = mergeCandidates([
      [candidate({}), candidate({ itemIndex: 1, start: { kind: 'date', date: '2025-06-15' } })],
      [candidate({ source: 'b', kind: 'location', start: undefined })],
    ])
    expect(records).toHaveLength(3)
  })
})
