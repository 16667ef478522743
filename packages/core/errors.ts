/**
 * Error taxonomy
 *
 * Only ConfigError and PersistenceError abort a run. Everything else is
 * contained per source, per item or per field and turned into degraded output
 * plus a quality signal.
 */

import type { FailureClass } from './types.js'

export type ErrorCode =
  | 'CONFIG'
  | 'FETCH'
  | 'PARSE'
  | 'ENRICHMENT'
  | 'GEOCODE'
  | 'PERSISTENCE'

export class HarvestError extends Error {
  readonly code: ErrorCode
  cause?: unknown

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message)
    this.name = 'HarvestError'
    this.code = code
    this.cause = cause
  }
}

export interface ConfigIssue {
  entry: string                  // e.g. "sources.json #3 (Stadtbibliothek)"
  message: string
}

export class ConfigError extends HarvestError {
  readonly issues: ConfigIssue[]

  constructor(message: string, issues: ConfigIssue[] = [], cause?: unknown) {
    super('CONFIG', formatIssues(message, issues), cause)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

function formatIssues(message: string, issues: ConfigIssue[]): string {
  if (issues.length === 0) return message
  return `${message}\n${issues.map(issue => `  - ${issue.entry}: ${issue.message}`).join('\n')}`
}

export type FetchErrorKind = 'http' | 'timeout' | 'network' | 'malformed_url' | 'cancelled'

export class FetchError extends HarvestError {
  readonly kind: FetchErrorKind
  readonly failure: FailureClass
  readonly statusCode: number | null

  constructor(
    kind: FetchErrorKind,
    failure: FailureClass,
    message: string,
    statusCode: number | null = null,
    cause?: unknown
  ) {
    super('FETCH', message, cause)
    this.name = 'FetchError'
    this.kind = kind
    this.failure = failure
    this.statusCode = statusCode
  }

  get transient(): boolean {
    return this.failure === 'transient'
  }
}

export class ParseError extends HarvestError {
  constructor(message: string, cause?: unknown) {
    super('PARSE', message, cause)
    this.name = 'ParseError'
  }
}

export class EnrichmentError extends HarvestError {
  readonly field: string

  constructor(field: string, message: string, cause?: unknown) {
    super('ENRICHMENT', message, cause)
    this.name = 'EnrichmentError'
    this.field = field
  }
}

export type GeocodeErrorReason = 'not_found' | 'error' | 'cancelled'

export class GeocodeError extends HarvestError {
  readonly reason: GeocodeErrorReason

  constructor(reason: GeocodeErrorReason, message: string, cause?: unknown) {
    super('GEOCODE', message, cause)
    this.name = 'GeocodeError'
    this.reason = reason
  }
}

export class PersistenceError extends HarvestError {
  readonly target: string

  constructor(target: string, message: string, cause?: unknown) {
    super('PERSISTENCE', message, cause)
    this.name = 'PersistenceError'
    this.target = target
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
