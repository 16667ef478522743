/**
 * Structured logging
 *
 * JSON lines in production, coloured single lines otherwise.
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (debug, info, warn, error, silent). Default: info
 * - LOG_FORMAT: json or pretty. Default: json when NODE_ENV=production
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  [key: string]: unknown
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

const LOG_LEVELS: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m'
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

function isThreshold(value: string): value is LogLevel | 'silent' {
  return value in LOG_LEVELS
}

function threshold(): number {
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? ''
  return isThreshold(level) ? LOG_LEVELS[level] : LOG_LEVELS.info
}

function logFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') return format
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'UnknownError', message: String(error) }
}

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const path = component ? `${service}:${component}` : service
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${LOG_COLORS[level]}${BRIGHT}${level.toUpperCase().padEnd(5)}${RESET} ${DIM}[${path}]${RESET} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const line = logFormat() === 'json' ? JSON.stringify(entry) : formatPretty(entry)

  switch (entry.level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
      console.error(line)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  child(component: string, context?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly context: LogContext = {}
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < threshold()) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.context,
      ...meta
    }
    if (this.component) entry.component = this.component
    if (error !== undefined) entry.error = formatError(error)

    output(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  child(component: string, context: LogContext = {}): ILogger {
    const path = this.component ? `${this.component}:${component}` : component
    return new Logger(this.service, path, { ...this.context, ...context })
  }
}

export function createLogger(service: string): ILogger {
  return new Logger(service)
}

/** Root logger of the harvester */
export const logger = createLogger('harvester')
