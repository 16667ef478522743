/**
 * Root configuration for the harvester
 *
 * Defaults live here; `loadConfig()` overlays environment variables
 * (loaded by the CLI through dotenv) and validates them.
 */

import { z } from 'zod'
import { ConfigError } from './packages/core/errors.js'
import type { Transport } from './packages/core/types.js'

interface RateLimitConfig {
  /** Minimum interval between two requests to the same domain (ms) */
  baseIntervalMs: number;
  /** Relative jitter applied to every interval (0.2 = ±20%) */
  jitter: number;
  /** Upper bound of the failure backoff, as a multiple of the base interval */
  maxMultiplier: number;
  /** Consecutive successes needed to lower the backoff by one level */
  decayAfterSuccesses: number;
}

interface FetchConfig {
  /** Default transport for sources without an override */
  transport: Transport;
  /** Per-attempt timeout (ms) */
  requestTimeoutMs: number;
  /** Retries after the first attempt, transient failures only */
  maxRetries: number;
  retryInitialDelayMs: number;
  retryMaxDelayMs: number;
  acceptLanguage: string;
  /** Rotated on every request */
  userAgents: string[];
  /** Chromium binary for the browser transport */
  browserExecutablePath?: string;
}

interface GeocoderConfig {
  enabled: boolean;
  url: string;
  userAgent: string;
  /** Comma-separated ISO country codes passed to the provider, empty for none */
  countryCodes: string;
  /** Appended to queries that do not name it already, empty for none */
  city: string;
  intervalMs: number;
  staleAfterMs: number;
  negativeStaleAfterMs: number;
}

interface QualityConfig {
  windowSize: number;
  exclusionThreshold: number;
  cooldownRuns: number;
  minAttemptsForScore: number;
  minScore: number;
}

interface StoreConfig {
  kind: 'json' | 'supabase';
  supabaseUrl?: string;
  supabaseKey?: string;
}

export interface Config {
  /** Source configuration file(s): a path or glob pattern */
  sources: string;
  /** Curated events merged into every run; a missing file means none */
  manualEvents: string;
  /** Directory for dataset, geocode cache and tracker state */
  dataDir: string;
  concurrency: number;
  runTimeoutMs: number;
  rateLimit: RateLimitConfig;
  fetch: FetchConfig;
  geocoder: GeocoderConfig;
  quality: QualityConfig;
  store: StoreConfig;
}

const DAY_MS = 24 * 60 * 60 * 1000

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.6 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:131.0) Gecko/20100101 Firefox/131.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36'
]

const config: Config = {
  sources: 'sources.json',
  manualEvents: 'manual_events.json',
  dataDir: 'data',

  // Worker pool width
  concurrency: 5,

  // Whole-run deadline, outstanding sources are reported as timeouts
  runTimeoutMs: 10 * 60 * 1000,

  rateLimit: {
    baseIntervalMs: 4000,
    jitter: 0.2,
    maxMultiplier: 8,
    decayAfterSuccesses: 3,
  },

  fetch: {
    transport: 'http',
    requestTimeoutMs: 30000,
    maxRetries: 3,
    retryInitialDelayMs: 2000,
    retryMaxDelayMs: 10000,
    acceptLanguage: 'de-DE,de;q=0.9,en-US;q=0.8,en;q=0.7',
    userAgents: USER_AGENTS,
  },

  geocoder: {
    enabled: true,
    url: 'https://nominatim.openstreetmap.org/search',
    userAgent: 'kids-events-harvester/1.0',
    countryCodes: 'de',
    city: 'München, Germany',
    intervalMs: 1000,
    staleAfterMs: 90 * DAY_MS,
    negativeStaleAfterMs: 7 * DAY_MS,
  },

  quality: {
    windowSize: 20,
    exclusionThreshold: 5,
    cooldownRuns: 3,
    minAttemptsForScore: 10,
    minScore: 0.2,
  },

  store: {
    kind: 'json',
  },
}

const intFromEnv = z.coerce.number().int().positive()
const flag = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1')

const envSchema = z.object({
  SOURCES: z.string().min(1).optional(),
  MANUAL_EVENTS: z.string().min(1).optional(),
  DATA_DIR: z.string().min(1).optional(),
  CONCURRENCY: intFromEnv.optional(),
  RATE_LIMIT_BASE_MS: z.coerce.number().int().nonnegative().optional(),
  RATE_LIMIT_JITTER: z.coerce.number().min(0).max(1).optional(),
  REQUEST_TIMEOUT_MS: intFromEnv.optional(),
  RUN_TIMEOUT_MS: intFromEnv.optional(),
  FETCHER: z.enum(['http', 'browser']).optional(),
  CHROMIUM_PATH: z.string().min(1).optional(),
  ACCEPT_LANGUAGE: z.string().min(1).optional(),
  GEOCODER_URL: z.string().url().optional(),
  GEOCODER_USER_AGENT: z.string().min(1).optional(),
  GEOCODER_COUNTRY_CODES: z.string().optional(),
  GEOCODER_CITY: z.string().min(1).optional(),
  GEOCODER_INTERVAL_MS: z.coerce.number().int().nonnegative().optional(),
  GEOCODING_ENABLED: flag.optional(),
  STORE: z.enum(['json', 'supabase']).optional(),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
})

/**
 * Build the effective configuration from the environment
 *
 * Empty variables count as unset. Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )
  const parsed = envSchema.safeParse(present)

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid environment configuration',
      parsed.error.issues.map(issue => ({
        entry: issue.path.join('.') || 'environment',
        message: issue.message,
      }))
    )
  }

  const vars = parsed.data
  const store: StoreConfig = {
    kind: vars.STORE ?? config.store.kind,
    supabaseUrl: vars.SUPABASE_URL,
    supabaseKey: vars.SUPABASE_SERVICE_ROLE_KEY,
  }

  if (store.kind === 'supabase' && (!store.supabaseUrl || !store.supabaseKey)) {
    throw new ConfigError('STORE=supabase needs credentials', [
      { entry: 'SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY', message: 'Required when STORE=supabase' },
    ])
  }

  return {
    ...config,
    sources: vars.SOURCES ?? config.sources,
    manualEvents: vars.MANUAL_EVENTS ?? config.manualEvents,
    dataDir: vars.DATA_DIR ?? config.dataDir,
    concurrency: vars.CONCURRENCY ?? config.concurrency,
    runTimeoutMs: vars.RUN_TIMEOUT_MS ?? config.runTimeoutMs,
    rateLimit: {
      ...config.rateLimit,
      baseIntervalMs: vars.RATE_LIMIT_BASE_MS ?? config.rateLimit.baseIntervalMs,
      jitter: vars.RATE_LIMIT_JITTER ?? config.rateLimit.jitter,
    },
    fetch: {
      ...config.fetch,
      transport: vars.FETCHER ?? config.fetch.transport,
      requestTimeoutMs: vars.REQUEST_TIMEOUT_MS ?? config.fetch.requestTimeoutMs,
      acceptLanguage: vars.ACCEPT_LANGUAGE ?? config.fetch.acceptLanguage,
      browserExecutablePath: vars.CHROMIUM_PATH,
    },
    geocoder: {
      ...config.geocoder,
      enabled: vars.GEOCODING_ENABLED ?? config.geocoder.enabled,
      url: vars.GEOCODER_URL ?? config.geocoder.url,
      userAgent: vars.GEOCODER_USER_AGENT ?? config.geocoder.userAgent,
      countryCodes: vars.GEOCODER_COUNTRY_CODES ?? config.geocoder.countryCodes,
      city: vars.GEOCODER_CITY ?? config.geocoder.city,
      intervalMs: vars.GEOCODER_INTERVAL_MS ?? config.geocoder.intervalMs,
    },
    store,
  }
}

export default config
