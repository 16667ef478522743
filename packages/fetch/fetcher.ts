/**
 * Fetcher contract and the pieces both transports share
 *
 * A fetcher performs one logical retrieval: it picks a user agent, sends
 * browser-like headers, replays the domain's cookies and retries transient
 * failures. Domain pacing is not its concern; callers go through the
 * RateLimiter first.
 */

import { FetchError } from '../core/errors.js'
import { retry, type RetryOptions } from '../core/retry.js'
import type { ILogger } from '../core/logger.js'
import type { FailureClass } from '../core/types.js'

export interface FetchOptions {
  /** Run-level cancellation */
  signal?: AbortSignal
}

export type FetchResponse =
  | {
      ok: true
      status: number
      body: string
      finalUrl: string
      bytes: number
      /** Attempts made, first one included */
      attempts: number
    }
  | {
      ok: false
      status?: number
      error: FetchError
      attempts: number
    }

export interface Fetcher {
  fetch(url: string, headers?: Record<string, string>, options?: FetchOptions): Promise<FetchResponse>
  close(): Promise<void>
}

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number
  initialDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 2000,
  maxDelayMs: 10000,
}

/** Raw result of a single attempt that reached the server */
export interface AttemptResult {
  status: number
  body: string
  finalUrl: string
}

export interface FetcherOptions {
  userAgents: string[]
  acceptLanguage: string
  requestTimeoutMs: number
  retryPolicy?: RetryPolicy
  logger?: ILogger
}

/**
 * Round-robin user agent rotation
 */
export class UserAgentPool {
  private index = 0

  constructor(private readonly agents: string[]) {
    if (agents.length === 0) {
      throw new Error('UserAgentPool needs at least one user agent')
    }
  }

  next(): string {
    const agent = this.agents[this.index % this.agents.length]
    this.index++
    return agent
  }
}

/**
 * Per-domain cookie store, name → value only
 */
export class CookieJar {
  private readonly jars = new Map<string, Map<string, string>>()

  capture(domain: string, setCookies: string[]): void {
    if (setCookies.length === 0) return

    let jar = this.jars.get(domain)
    if (!jar) {
      jar = new Map()
      this.jars.set(domain, jar)
    }

    for (const cookie of setCookies) {
      const pair = cookie.split(';', 1)[0]
      const eq = pair.indexOf('=')
      if (eq <= 0) continue
      jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim())
    }
  }

  header(domain: string): string | undefined {
    const jar = this.jars.get(domain)
    if (!jar || jar.size === 0) return undefined
    return [...jar].map(([name, value]) => `${name}=${value}`).join('; ')
  }
}

export function parseTargetUrl(url: string): URL {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch (error) {
    throw new FetchError('malformed_url', 'permanent', `Malformed URL: ${url}`, null, error)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new FetchError('malformed_url', 'permanent', `Unsupported protocol: ${parsed.protocol}`)
  }
  return parsed
}

/** 429 and 5xx are worth another attempt, every other error status is not */
export function classifyStatus(status: number): FailureClass {
  return status === 429 || status >= 500 ? 'transient' : 'permanent'
}

export function browserHeaders(target: URL, userAgent: string, acceptLanguage: string): Record<string, string> {
  return {
    'user-agent': userAgent,
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,text/calendar;q=0.9,*/*;q=0.8',
    'accept-language': acceptLanguage,
    'accept-encoding': 'gzip, deflate, br',
    referer: `${target.origin}/`,
    'cache-control': 'no-cache',
    pragma: 'no-cache',
    'upgrade-insecure-requests': '1',
  }
}

export function cancelledError(url: string, cause?: unknown): FetchError {
  return new FetchError('cancelled', 'transient', `Fetch of ${url} cancelled`, null, cause)
}

/**
 * Shared retry and header handling; transports implement one attempt.
 */
export abstract class BaseFetcher implements Fetcher {
  protected readonly agents: UserAgentPool
  protected readonly retryPolicy: RetryPolicy

  constructor(protected readonly options: FetcherOptions) {
    this.agents = new UserAgentPool(options.userAgents)
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
  }

  /**
   * Perform one attempt. Resolves for any response the server sent;
   * rejects with a FetchError for network failures and timeouts.
   */
  protected abstract attempt(target: URL, headers: Record<string, string>, signal?: AbortSignal): Promise<AttemptResult>

  abstract close(): Promise<void>

  /** Headers of one logical fetch; transports add session state */
  protected requestHeaders(target: URL, overrides: Record<string, string>): Record<string, string> {
    return {
      ...browserHeaders(target, this.agents.next(), this.options.acceptLanguage),
      ...lowerCaseKeys(overrides),
    }
  }

  async fetch(url: string, headers: Record<string, string> = {}, options: FetchOptions = {}): Promise<FetchResponse> {
    const { signal } = options
    let attempts = 0
    let lastStatus: number | undefined

    let target: URL
    try {
      target = parseTargetUrl(url)
    } catch (error) {
      return { ok: false, error: toFetchError(url, error), attempts }
    }

    const requestHeaders = this.requestHeaders(target, headers)

    const retryOptions: RetryOptions = {
      maxAttempts: this.retryPolicy.maxRetries + 1,
      initialDelay: this.retryPolicy.initialDelayMs,
      maxDelay: this.retryPolicy.maxDelayMs,
      backoffMultiplier: 2,
      signal,
      shouldRetry: error => error instanceof FetchError && error.transient && error.kind !== 'cancelled' && !signal?.aborted,
      onRetry: (error, attempt, delay) => {
        this.options.logger?.warn('Retrying fetch', { url, attempt, delayMs: delay, reason: error.message })
      },
    }

    try {
      const result = await retry(async () => {
        attempts++
        lastStatus = undefined
        if (signal?.aborted) throw cancelledError(url, signal.reason)

        const response = await this.attempt(target, requestHeaders, signal)
        lastStatus = response.status

        if (response.status >= 400) {
          throw new FetchError(
            'http',
            classifyStatus(response.status),
            `HTTP ${response.status} from ${url}`,
            response.status
          )
        }
        return response
      }, retryOptions)

      return {
        ok: true,
        status: result.status,
        body: result.body,
        finalUrl: result.finalUrl,
        bytes: Buffer.byteLength(result.body),
        attempts,
      }
    } catch (error) {
      const fetchError = signal?.aborted ? cancelledError(url, error) : toFetchError(url, error)
      return { ok: false, status: lastStatus, error: fetchError, attempts }
    }
  }
}

function toFetchError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new FetchError('network', 'transient', `Fetch of ${url} failed: ${message}`, null, error)
}

function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]))
}
