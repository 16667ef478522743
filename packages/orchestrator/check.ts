/**
 * Reachability check
 *
 * Fetches every source once through the configured transports and sorts
 * them into working, blocked and error. Nothing is extracted and no state
 * is written.
 */

import type { FetchResponse, Fetcher } from '../fetch/fetcher.js'
import type { RateLimiter } from '../fetch/rate-limiter.js'
import type { SourceDescriptor, Transport } from '../core/types.js'
import { runPool } from './pool.js'

export type Reachability = 'working' | 'blocked' | 'error'

export interface SourceCheck {
  source: string
  url: string
  transport: Transport
  status: Reachability
  statusCode?: number
  bytes: number
  latencyMs: number
  message?: string
}

export interface CheckOptions {
  fetchers: Record<Transport, Fetcher>
  transport: Transport
  limiter: RateLimiter
  concurrency?: number
  signal?: AbortSignal
}

const BLOCKING_STATUSES = new Set([401, 403, 429])

export function reachabilityOf(response: FetchResponse): Reachability {
  if (response.ok) return 'working'
  return response.status !== undefined && BLOCKING_STATUSES.has(response.status) ? 'blocked' : 'error'
}

export async function checkSources(sources: readonly SourceDescriptor[], options: CheckOptions): Promise<SourceCheck[]> {
  const checks = await runPool(
    sources,
    options.concurrency ?? 5,
    async (source): Promise<SourceCheck> => {
      const transport = source.transport ?? options.transport
      const started = Date.now()
      await options.limiter.acquire(source.domain, options.signal)
      const response = await options.fetchers[transport].fetch(source.url, {}, { signal: options.signal })

      return {
        source: source.name,
        url: source.url,
        transport,
        status: reachabilityOf(response),
        ...(response.status !== undefined ? { statusCode: response.status } : {}),
        bytes: response.ok ? response.bytes : 0,
        latencyMs: Date.now() - started,
        ...(response.ok ? {} : { message: response.error.message }),
      }
    },
    options.signal
  )
  return checks.filter((check): check is SourceCheck => check !== undefined)
}
