/**
 * HTTP Fetcher
 *
 * Uses the runtime's global fetch; connection reuse comes from its
 * keep-alive dispatcher. Cookies set by a domain are replayed on later
 * requests to the same domain.
 */

import { FetchError } from '../core/errors.js'
import { BaseFetcher, CookieJar, cancelledError, type AttemptResult, type FetcherOptions } from './fetcher.js'

export class HttpFetcher extends BaseFetcher {
  private readonly cookies = new CookieJar()

  constructor(options: FetcherOptions) {
    super(options)
  }

  protected async attempt(target: URL, headers: Record<string, string>, signal?: AbortSignal): Promise<AttemptResult> {
    const domain = target.hostname.toLowerCase()
    const cookie = this.cookies.header(domain)
    const controller = new AbortController()
    const timeoutMs = this.options.requestTimeoutMs

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    const onRunAbort = () => controller.abort()
    signal?.addEventListener('abort', onRunAbort, { once: true })

    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: cookie ? { ...headers, cookie } : headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      this.cookies.capture(domain, response.headers.getSetCookie())
      const body = await response.text()

      return { status: response.status, body, finalUrl: response.url || target.href }
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError(target.href, error)
      }
      if (controller.signal.aborted) {
        throw new FetchError('timeout', 'transient', `Request to ${target.href} timed out after ${timeoutMs}ms`, null, error)
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new FetchError('network', 'transient', `Request to ${target.href} failed: ${message}`, null, error)
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onRunAbort)
    }
  }

  async close(): Promise<void> {
    // Nothing to release; the global dispatcher owns the sockets
  }
}
