/**
 * Source quality tracking
 *
 * Rolling window of fetch outcomes per source. The score is the mean outcome
 * weight over the window. A source is excluded from the next run after a
 * failure streak of `exclusionThreshold`, or once it has `minAttemptsForScore`
 * attempts and a score below `minScore`. Exclusion lasts `cooldownRuns` runs,
 * after which the source is tried again.
 */

import { z } from 'zod'
import { ConfigError } from '../core/errors.js'
import { logger as rootLogger, type ILogger } from '../core/logger.js'
import type { FetchAttempt, OutcomeKind } from '../core/types.js'

export interface QualityOptions {
  windowSize: number
  exclusionThreshold: number
  cooldownRuns: number
  minAttemptsForScore: number
  minScore: number
}

export const DEFAULT_QUALITY_OPTIONS: QualityOptions = {
  windowSize: 20,
  exclusionThreshold: 5,
  cooldownRuns: 3,
  minAttemptsForScore: 10,
  minScore: 0.2,
}

const OUTCOME_KINDS = ['success', 'http_error', 'timeout', 'parse_error', 'empty'] as const

const SourceStateSchema = z.object({
  window: z.array(z.enum(OUTCOME_KINDS)),
  totalAttempts: z.number().int().min(0),
  lastSuccessAt: z.string().nullable(),
  consecutiveFailures: z.number().int().min(0),
  skippedRuns: z.number().int().min(0),
  itemsExtracted: z.number().int().min(0),
})

const SnapshotSchema = z.object({
  version: z.literal(1),
  sources: z.record(SourceStateSchema),
})

export type SourceState = z.infer<typeof SourceStateSchema>
export type QualitySnapshot = z.infer<typeof SnapshotSchema>

const WEIGHTS: Record<OutcomeKind, number> = {
  success: 1,
  empty: 0.25,
  http_error: 0,
  timeout: 0,
  parse_error: 0,
}

const NEUTRAL_SCORE = 0.5

export interface RunPlan {
  active: string[]
  excluded: string[]
}

export class SourceQualityTracker {
  private readonly sources = new Map<string, SourceState>()
  private readonly options: QualityOptions
  private readonly logger: ILogger

  constructor(options: Partial<QualityOptions> = {}, logger: ILogger = rootLogger) {
    this.options = { ...DEFAULT_QUALITY_OPTIONS, ...options }
    this.logger = logger.child('quality')
  }

  static fromJSON(json: unknown, options: Partial<QualityOptions> = {}, logger?: ILogger): SourceQualityTracker {
    const parsed = SnapshotSchema.safeParse(json)
    if (!parsed.success) {
      throw new ConfigError(
        'Invalid source quality state',
        parsed.error.issues.map(issue => ({ entry: issue.path.join('.') || 'state', message: issue.message }))
      )
    }

    const tracker = new SourceQualityTracker(options, logger)
    for (const [name, state] of Object.entries(parsed.data.sources)) {
      tracker.sources.set(name, { ...state, window: state.window.slice(-tracker.options.windowSize) })
    }
    return tracker
  }

  report(attempt: FetchAttempt): void {
    const state = this.stateFor(attempt.source)
    const kind = attempt.outcome.kind
    const wasExcluded = this.meetsExclusion(state)

    state.window.push(kind)
    if (state.window.length > this.options.windowSize) state.window.shift()
    state.totalAttempts++
    state.itemsExtracted += attempt.itemsExtracted

    if (kind === 'success') {
      state.consecutiveFailures = 0
      state.lastSuccessAt = attempt.timestamp.toISOString()
    } else if (kind !== 'empty') {
      state.consecutiveFailures++
    }

    if (!wasExcluded && this.meetsExclusion(state)) {
      this.logger.warn('Source will be excluded from the next run', {
        source: attempt.source,
        consecutiveFailures: state.consecutiveFailures,
        score: this.score(attempt.source),
      })
    }
  }

  /** Mean outcome weight over the window, 0.5 for a source without history */
  score(name: string): number {
    const window = this.sources.get(name)?.window ?? []
    if (window.length === 0) return NEUTRAL_SCORE
    return window.reduce((sum, kind) => sum + WEIGHTS[kind], 0) / window.length
  }

  isExcluded(name: string): boolean {
    const state = this.sources.get(name)
    return state !== undefined && this.meetsExclusion(state) && state.skippedRuns < this.options.cooldownRuns
  }

  /**
   * Split the configured sources into the run's active and excluded sets.
   * Called once per run, before dispatching.
   */
  planRun(names: readonly string[]): RunPlan {
    const plan: RunPlan = { active: [], excluded: [] }

    for (const name of names) {
      const state = this.sources.get(name)
      if (!state || !this.meetsExclusion(state)) {
        if (state) state.skippedRuns = 0
        plan.active.push(name)
        continue
      }

      if (state.skippedRuns < this.options.cooldownRuns) {
        state.skippedRuns++
        plan.excluded.push(name)
        this.logger.info('Source excluded', { source: name, skippedRuns: state.skippedRuns, score: this.score(name) })
      } else {
        state.skippedRuns = 0
        plan.active.push(name)
        this.logger.info('Probing excluded source after cooldown', { source: name })
      }
    }

    return plan
  }

  state(name: string): Readonly<SourceState> | undefined {
    return this.sources.get(name)
  }

  toJSON(): QualitySnapshot {
    const sources: Record<string, SourceState> = {}
    for (const [name, state] of this.sources) {
      sources[name] = { ...state, window: [...state.window] }
    }
    return { version: 1, sources }
  }

  private meetsExclusion(state: SourceState): boolean {
    if (state.consecutiveFailures >= this.options.exclusionThreshold) return true
    if (state.totalAttempts < this.options.minAttemptsForScore || state.window.length === 0) return false
    const score = state.window.reduce((sum, kind) => sum + WEIGHTS[kind], 0) / state.window.length
    return score < this.options.minScore
  }

  private stateFor(name: string): SourceState {
    let state = this.sources.get(name)
    if (!state) {
      state = {
        window: [],
        totalAttempts: 0,
        lastSuccessAt: null,
        consecutiveFailures: 0,
        skippedRuns: 0,
        itemsExtracted: 0,
      }
      this.sources.set(name, state)
    }
    return state
  }
}
