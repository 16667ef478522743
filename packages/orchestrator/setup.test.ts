import { describe, it, expect } from 'vitest'
import { loadConfig } from '../../config.js'
import { BrowserFetcher } from '../fetch/browser-fetcher.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { Geocoder } from '../geocode/geocoder.js'
import { JsonDatasetStore } from '../store/dataset-store.js'
import { SupabaseDatasetStore } from '../store/supabase-store.js'
import { createDatasetStore, createFetchers, createGeocoder, createLimiter, createRuntime } from './setup.js'

describe('setup', () => {
  it('builds both transports', () => {
    const fetchers = createFetchers(loadConfig({}))
    expect(fetchers.http).toBeInstanceOf(HttpFetcher)
    expect(fetchers.browser).toBeInstanceOf(BrowserFetcher)
  })

  it('picks the dataset store from the configuration', () => {
    expect(createDatasetStore(loadConfig({}))).toBeInstanceOf(JsonDatasetStore)
    expect(
      createDatasetStore(loadConfig({ STORE: 'supabase', SUPABASE_URL: 'https://db.example', SUPABASE_SERVICE_ROLE_KEY: 'test-key' }))
    ).toBeInstanceOf(SupabaseDatasetStore)
  })

  it('leaves the geocoder out when geocoding is disabled', () => {
    expect(createGeocoder(loadConfig({ GEOCODING_ENABLED: 'false' }))).toBeUndefined()
    expect(createGeocoder(loadConfig({}))).toBeInstanceOf(Geocoder)
  })

  it('configures the limiter from the rate limit settings', () => {
    const limiter = createLimiter(loadConfig({ RATE_LIMIT_BASE_MS: '1500' }))
    expect(limiter.intervalFor('any.example')).toBe(1500)
  })

  it('starts an idle pipeline', async () => {
    const runtime = createRuntime(loadConfig({}))
    expect(runtime.pipeline.state).toBe('idle')
    await runtime.close()
  })
})
