import { describe, it, expect } from 'vitest'
import { ConfigError } from '../core/errors.js'
import type { FetchAttempt, Outcome } from '../core/types.js'
import { SourceQualityTracker } from './tracker.js'

const OUTCOMES: Record<Outcome['kind'], Outcome> = {
  success: { kind: 'success' },
  empty: { kind: 'empty' },
  parse_error: { kind: 'parse_error', message: 'kaputt' },
  timeout: { kind: 'timeout', failure: 'transient' },
  http_error: { kind: 'http_error', statusCode: 503, failure: 'transient', message: 'HTTP 503' },
}

function attempt(source: string, kind: Outcome['kind'], itemsExtracted = 0): FetchAttempt {
  return {
    source,
    timestamp: new Date('2025-06-01T08:00:00.000Z'),
    outcome: OUTCOMES[kind],
    retries: 0,
    bytes: 0,
    latencyMs: 10,
    itemsExtracted,
    itemsSkipped: 0,
  }
}

function feed(tracker: SourceQualityTracker, source: string, kinds: Outcome['kind'][]) {
  for (const kind of kinds) tracker.report(attempt(source, kind))
}

describe('SourceQualityTracker', () => {
  it('scores unknown sources as neutral', () => {
    expect(new SourceQualityTracker().score('neu')).toBe(0.5)
  })

  it('averages outcome weights over the window', () => {
    const tracker = new SourceQualityTracker()
    feed(tracker, 'a', ['success', 'empty', 'timeout', 'success'])
    expect(tracker.score('a')).toBe((1 + 0.25 + 0 + 1) / 4)
  })

  it('keeps only the last windowSize outcomes', () => {
    const tracker = new SourceQualityTracker({ windowSize: 3 })
    feed(tracker, 'a', ['http_error', 'http_error', 'success', 'success', 'success'])
    expect(tracker.score('a')).toBe(1)
    expect(tracker.state('a')?.window).toEqual(['success', 'success', 'success'])
    expect(tracker.state('a')?.totalAttempts).toBe(5)
  })

  it('stays within bounds and rises with a success', () => {
    const tracker = new SourceQualityTracker()
    feed(tracker, 'a', ['timeout', 'parse_error', 'empty'])
    const before = tracker.score('a')
    tracker.report(attempt('a', 'success'))

    expect(before).toBeGreaterThanOrEqual(0)
    expect(tracker.score('a')).toBeGreaterThan(before)
    expect(tracker.score('a')).toBeLessThanOrEqual(1)
  })

  it('counts failure streaks, resets them on success and ignores empty runs', () => {
    const tracker = new SourceQualityTracker()
    feed(tracker, 'a', ['timeout', 'http_error', 'empty', 'parse_error'])
    expect(tracker.state('a')?.consecutiveFailures).toBe(3)

    tracker.report(attempt('a', 'success', 4))
    expect(tracker.state('a')?.consecutiveFailures).toBe(0)
    expect(tracker.state('a')?.lastSuccessAt).toBe('2025-06-01T08:00:00.000Z')
    expect(tracker.state('a')?.itemsExtracted).toBe(4)
  })

  it('excludes a source after five consecutive failures', () => {
    const tracker = new SourceQualityTracker()
    feed(tracker, 'a', ['timeout', 'timeout', 'timeout', 'timeout'])
    expect(tracker.isExcluded('a')).toBe(false)

    tracker.report(attempt('a', 'http_error'))
    expect(tracker.isExcluded('a')).toBe(true)
  })

  it('excludes a source with ten attempts and a score below 0.2', () => {
    const tracker = new SourceQualityTracker()
    const kinds: Outcome['kind'][] = []
    for (let i = 0; i < 3; i++) kinds.push('timeout', 'timeout', 'empty')
    kinds.push('empty')
    feed(tracker, 'a', kinds)

    expect(tracker.state('a')?.consecutiveFailures).toBe(2)
    expect(tracker.score('a')).toBe(0.1)
    expect(tracker.isExcluded('a')).toBe(true)
  })

  it('skips an excluded source for the cooldown and then tries it again', () => {
    const tracker = new SourceQualityTracker({ cooldownRuns: 2 })
    feed(tracker, 'a', ['timeout', 'timeout', 'timeout', 'timeout', 'timeout'])

    expect(tracker.planRun(['a', 'b'])).toEqual({ active: ['b'], excluded: ['a'] })
    expect(tracker.planRun(['a', 'b'])).toEqual({ active: ['b'], excluded: ['a'] })
    expect(tracker.planRun(['a', 'b'])).toEqual({ active: ['a', 'b'], excluded: [] })

    tracker.report(attempt('a', 'timeout'))
    expect(tracker.planRun(['a'])).toEqual({ active: [], excluded: ['a'] })
  })

  it('lets a source back in once the retry run succeeds', () => {
    const tracker = new SourceQualityTracker({ cooldownRuns: 1 })
    feed(tracker, 'a', ['timeout', 'timeout', 'timeout', 'timeout', 'timeout'])
    tracker.planRun(['a'])
    tracker.planRun(['a'])

    tracker.report(attempt('a', 'success'))

    expect(tracker.isExcluded('a')).toBe(false)
    expect(tracker.planRun(['a'])).toEqual({ active: ['a'], excluded: [] })
  })

  it('round-trips its state through JSON', () => {
    const tracker = new SourceQualityTracker()
    feed(tracker, 'a', ['success', 'timeout', 'empty'])
    feed(tracker, 'b', ['http_error'])
    tracker.planRun(['a', 'b'])

    const restored = SourceQualityTracker.fromJSON(JSON.parse(JSON.stringify(tracker)))

    expect(restored.toJSON()).toEqual(tracker.toJSON())
    expect(restored.score('a')).toBe(tracker.score('a'))
  })

  it('rejects malformed state', () => {
    expect(() => SourceQualityTracker.fromJSON({ version: 1, sources: { a: { window: ['great'] } } })).toThrow(ConfigError)
  })
})
