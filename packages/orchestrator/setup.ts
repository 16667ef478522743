/**
 * Builds the pipeline's collaborators from the effective configuration
 */

import path from 'path'
import type { Config } from '../../config.js'
import { ConfigError } from '../core/errors.js'
import { logger as rootLogger, type ILogger } from '../core/logger.js'
import type { Transport } from '../core/types.js'
import { loadManualEvents } from '../config/manual-events.js'
import { loadSources } from '../config/sources.js'
import { BrowserFetcher } from '../fetch/browser-fetcher.js'
import type { Fetcher, FetcherOptions } from '../fetch/fetcher.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { RateLimiter } from '../fetch/rate-limiter.js'
import { Geocoder } from '../geocode/geocoder.js'
import { NominatimProvider } from '../geocode/nominatim.js'
import { JsonDatasetStore, type DatasetStore } from '../store/dataset-store.js'
import { JsonStateStore } from '../store/state-store.js'
import { SupabaseDatasetStore } from '../store/supabase-store.js'
import { Pipeline, type PipelineOptions } from './pipeline.js'

export function createLimiter(config: Config): RateLimiter {
  return new RateLimiter({
    baseIntervalMs: config.rateLimit.baseIntervalMs,
    jitter: config.rateLimit.jitter,
    maxMultiplier: config.rateLimit.maxMultiplier,
    decayAfterSuccesses: config.rateLimit.decayAfterSuccesses,
  })
}

/** Both transports; the browser only launches when a source uses it */
export function createFetchers(config: Config, logger: ILogger = rootLogger): Record<Transport, Fetcher> {
  const options: FetcherOptions = {
    userAgents: config.fetch.userAgents,
    acceptLanguage: config.fetch.acceptLanguage,
    requestTimeoutMs: config.fetch.requestTimeoutMs,
    retryPolicy: {
      maxRetries: config.fetch.maxRetries,
      initialDelayMs: config.fetch.retryInitialDelayMs,
      maxDelayMs: config.fetch.retryMaxDelayMs,
    },
  }

  return {
    http: new HttpFetcher({ ...options, logger: logger.child('http') }),
    browser: new BrowserFetcher({
      ...options,
      logger: logger.child('browser'),
      executablePath: config.fetch.browserExecutablePath,
    }),
  }
}

export function createDatasetStore(config: Config): DatasetStore {
  const { kind, supabaseUrl, supabaseKey } = config.store
  if (kind === 'json') return new JsonDatasetStore(config.dataDir)
  if (!supabaseUrl || !supabaseKey) {
    throw new ConfigError('STORE=supabase needs credentials', [
      { entry: 'SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY', message: 'Required when STORE=supabase' },
    ])
  }
  return new SupabaseDatasetStore(supabaseUrl, supabaseKey)
}

export function createGeocoder(config: Config, logger: ILogger = rootLogger): Geocoder | undefined {
  if (!config.geocoder.enabled) return undefined
  return new Geocoder({
    provider: new NominatimProvider({
      url: config.geocoder.url,
      userAgent: config.geocoder.userAgent,
      countryCodes: config.geocoder.countryCodes || undefined,
      city: config.geocoder.city || undefined,
      requestTimeoutMs: config.fetch.requestTimeoutMs,
    }),
    intervalMs: config.geocoder.intervalMs,
    staleAfterMs: config.geocoder.staleAfterMs,
    negativeStaleAfterMs: config.geocoder.negativeStaleAfterMs,
    logger,
  })
}

export interface Runtime {
  pipeline: Pipeline
  fetchers: Record<Transport, Fetcher>
  close(): Promise<void>
}

export function createRuntime(
  config: Config,
  overrides: Pick<Partial<PipelineOptions>, 'onStateChange' | 'logger'> = {},
  cwd: string = process.cwd()
): Runtime {
  const logger = overrides.logger ?? rootLogger
  const fetchers = createFetchers(config, logger)

  const pipeline = new Pipeline({
    loadSources: () => loadSources(config.sources, cwd),
    loadManualEvents: () => loadManualEvents(config.manualEvents, cwd),
    fetchers,
    transport: config.fetch.transport,
    limiter: createLimiter(config),
    stateStore: new JsonStateStore(path.resolve(cwd, config.dataDir)),
    datasetStore: createDatasetStore({ ...config, dataDir: path.resolve(cwd, config.dataDir) }),
    geocoder: createGeocoder(config, logger),
    quality: config.quality,
    concurrency: config.concurrency,
    runTimeoutMs: config.runTimeoutMs,
    logger,
    onStateChange: overrides.onStateChange,
  })

  return {
    pipeline,
    fetchers,
    close: async () => {
      await Promise.all([fetchers.http.close(), fetchers.browser.close()])
    },
  }
}
