import { describe, it, expect } from 'vitest'
import { FetchError } from '../core/errors.js'
import type { SourceDescriptor } from '../core/types.js'
import type { Fetcher, FetchResponse } from '../fetch/fetcher.js'
import { RateLimiter } from '../fetch/rate-limiter.js'
import { checkSources, reachabilityOf } from './check.js'

function source(name: string, url: string): SourceDescriptor {
  return { name, url, domain: new URL(url).host, format: 'html', categories: [], enabled: true }
}

const responses: Record<string, FetchResponse> = {
  'https://offen.example/': { ok: true, status: 200, body: '<html></html>', finalUrl: 'https://offen.example/', bytes: 13, attempts: 1 },
  'https://gesperrt.example/': {
    ok: false,
    status: 403,
    error: new FetchError('http', 'permanent', 'HTTP 403 from https://gesperrt.example/', 403),
    attempts: 1,
  },
  'https://weg.example/': {
    ok: false,
    error: new FetchError('network', 'transient', 'Request to https://weg.example/ failed: ENOTFOUND'),
    attempts: 4,
  },
}

const fetcher: Fetcher = {
  fetch: async url => responses[url],
  close: async () => undefined,
}

describe('reachabilityOf', () => {
  it('treats 401, 403 and 429 as blocked', () => {
    const error = new FetchError('http', 'permanent', 'HTTP')
    expect(reachabilityOf({ ok: false, status: 401, error, attempts: 1 })).toBe('blocked')
    expect(reachabilityOf({ ok: false, status: 429, error, attempts: 4 })).toBe('blocked')
    expect(reachabilityOf({ ok: false, status: 404, error, attempts: 1 })).toBe('error')
  })
})

describe('checkSources', () => {
  it('reports every source in configuration order', async () => {
    const checks = await checkSources(
      [source('offen', 'https://offen.example/'), source('gesperrt', 'https://gesperrt.example/'), source('weg', 'https://weg.example/')],
      { fetchers: { http: fetcher, browser: fetcher }, transport: 'http', limiter: new RateLimiter({ baseIntervalMs: 0, jitter: 0 }) }
    )

    expect(checks.map(check => [check.source, check.status, check.statusCode, check.bytes])).toEqual([
      ['offen', 'working', 200, 13],
      ['gesperrt', 'blocked', 403, 0],
      ['weg', 'error', undefined, 0],
    ])
    expect(checks[2].message).toBe('Request to https://weg.example/ failed: ENOTFOUND')
  })
})
