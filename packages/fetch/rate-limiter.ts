/**
 * Per-domain rate limiter
 *
 * In-process, one state per domain. Grants for the same domain are serialized
 * through a promise chain; different domains never wait on each other.
 *
 * The interval between two grants is `base * 2^level * (1 ± u * jitter)`.
 * Failures raise the backoff level (capped at `maxMultiplier`), a run of
 * successes lowers it again.
 */

import { sleep as defaultSleep } from '../core/retry.js'

export interface RateLimiterOptions {
  /** Minimum interval between grants (ms) */
  baseIntervalMs: number
  /** Relative jitter, 0.2 = ±20% */
  jitter: number
  /** Cap of the failure backoff as a multiple of the base interval */
  maxMultiplier?: number
  /** Consecutive successes that lower the backoff by one level */
  decayAfterSuccesses?: number
  /** Per-domain base interval overrides */
  overrides?: Map<string, number>
  now?: () => number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
}

interface DomainState {
  lastGrantAt: number | null
  level: number
  successes: number
  chain: Promise<void>
}

export interface DomainSnapshot {
  lastGrantAt: number | null
  level: number
  intervalMs: number
}

export class RateLimiter {
  private readonly domains = new Map<string, DomainState>()
  private readonly overrides: Map<string, number>
  private readonly maxMultiplier: number
  private readonly decayAfterSuccesses: number
  private readonly now: () => number
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number

  constructor(private readonly options: RateLimiterOptions) {
    this.overrides = options.overrides ?? new Map()
    this.maxMultiplier = options.maxMultiplier ?? 8
    this.decayAfterSuccesses = options.decayAfterSuccesses ?? 3
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
  }

  /**
   * Wait until the domain may be contacted again, then claim the slot.
   * Rejects with the signal's reason when aborted while waiting.
   */
  acquire(domain: string, signal?: AbortSignal): Promise<void> {
    const state = this.state(domain)
    const turn = state.chain.then(() => this.grant(domain, state, signal))
    // A cancelled waiter must not block the ones queued behind it
    state.chain = turn.catch(() => undefined)
    return turn
  }

  reportSuccess(domain: string): void {
    const state = this.state(domain)
    state.successes++
    if (state.level > 0 && state.successes >= this.decayAfterSuccesses) {
      state.level--
      state.successes = 0
    }
  }

  reportFailure(domain: string): void {
    const state = this.state(domain)
    state.successes = 0
    state.level = Math.min(state.level + 1, Math.ceil(Math.log2(this.maxMultiplier)))
  }

  setInterval(domain: string, intervalMs: number): void {
    this.overrides.set(domain, intervalMs)
  }

  /** Current interval for a domain, before jitter */
  intervalFor(domain: string): number {
    const base = this.overrides.get(domain) ?? this.options.baseIntervalMs
    const level = this.domains.get(domain)?.level ?? 0
    return Math.min(base * Math.pow(2, level), base * this.maxMultiplier)
  }

  snapshot(domain: string): DomainSnapshot {
    const state = this.domains.get(domain)
    return {
      lastGrantAt: state?.lastGrantAt ?? null,
      level: state?.level ?? 0,
      intervalMs: this.intervalFor(domain),
    }
  }

  private state(domain: string): DomainState {
    let state = this.domains.get(domain)
    if (!state) {
      state = { lastGrantAt: null, level: 0, successes: 0, chain: Promise.resolve() }
      this.domains.set(domain, state)
    }
    return state
  }

  private async grant(domain: string, state: DomainState, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()

    if (state.lastGrantAt !== null) {
      const sign = this.random() < 0.5 ? -1 : 1
      const factor = 1 + sign * this.random() * this.options.jitter
      const wait = this.intervalFor(domain) * factor - (this.now() - state.lastGrantAt)
      if (wait > 0) {
        await this.sleep(wait, signal)
      }
    }

    state.lastGrantAt = this.now()
  }
}
