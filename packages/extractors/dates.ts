/**
 * Date recognition for feeds and listing pages
 *
 * Everything maps onto EventTime: zoned values become instants, wall-clock
 * values without a zone stay floating, plain dates stay dates.
 */

import { MONTH_WORDS } from '../core/calendar.js'
import type { EventTime } from '../core/types.js'

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/
const ISO_TOKEN = /\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2})?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)?/
const NUMERIC_DATE = /(?<![\d.])(\d{1,2})\.\s?(\d{1,2})\.\s?(\d{4}|\d{2})(?!\d)/
const TIME_AFTER_DATE = /^[\s,|/–-]*(?:um\s+|ab\s+|at\s+|from\s+)?(\d{1,2})(?:[:.](\d{2}))?(?![.\d])\s*(uhr|h\b)?/i

const monthPattern = [...MONTH_WORDS.keys()]
  .sort((a, b) => b.length - a.length)
  .join('|')
const NAMED_DATE = new RegExp(`(\\d{1,2})\\.?\\s*(${monthPattern})\\.?(?![a-zäöü])(?:\\s*(\\d{4}))?`, 'i')

const pad = (value: number) => String(value).padStart(2, '0')

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false
  const value = new Date(Date.UTC(year, month - 1, day))
  return value.getUTCMonth() === month - 1 && value.getUTCDate() === day
}

function dateString(year: number, month: number, day: number): string {
  return `${year}-${pad(month)}-${pad(day)}`
}

/**
 * Parse an ISO 8601 date or date-time (JSON-LD, Atom, ISO text)
 */
export function parseIsoDateTime(value: string): EventTime | undefined {
  const text = value.trim()

  const dateOnly = ISO_DATE.exec(text)
  if (dateOnly) {
    const [, y, m, d] = dateOnly
    return isValidDate(+y, +m, +d) ? { kind: 'date', date: text } : undefined
  }

  const match = ISO_DATE_TIME.exec(text)
  if (!match) return undefined

  const [, y, m, d, hh, mm, ss = '00', zone] = match
  if (!isValidDate(+y, +m, +d) || +hh > 24 || +mm > 59) return undefined

  const local = `${y}-${m}-${d}T${hh}:${mm}:${ss}`
  if (!zone) return { kind: 'floating', local }

  const offset = zone === 'Z' ? 'Z' : `${zone.slice(0, 3)}:${zone.slice(-2)}`
  const instant = new Date(`${local}${offset}`)
  return Number.isNaN(instant.getTime()) ? undefined : { kind: 'instant', iso: instant.toISOString() }
}

/**
 * Parse an RFC 822 date (RSS pubDate), falling back to ISO 8601
 */
export function parseFeedDate(value: string): EventTime | undefined {
  const text = value.trim()
  if (!text) return undefined

  const iso = parseIsoDateTime(text)
  if (iso) return iso

  const time = Date.parse(text)
  return Number.isNaN(time) ? undefined : { kind: 'instant', iso: new Date(time).toISOString() }
}

function withTime(date: string, rest: string): EventTime {
  const time = TIME_AFTER_DATE.exec(rest)
  // A bare number after a date is only a time with a minute part or an "Uhr"
  if (time && (time[2] !== undefined || time[3] !== undefined)) {
    const hours = Number(time[1])
    const minutes = Number(time[2] ?? '0')
    if (hours <= 23 && minutes <= 59) {
      return { kind: 'floating', local: `${date}T${pad(hours)}:${pad(minutes)}:00` }
    }
  }
  return { kind: 'date', date }
}

/**
 * Find the first date in free text ("12.03.2025, 15:00 Uhr", "3. Mai",
 * "2025-03-12T10:00"). A missing year is taken from the reference date,
 * rolling over to the next year for dates more than 60 days in the past.
 */
export function findDateInText(text: string, reference: Date = new Date()): EventTime | undefined {
  const iso = ISO_TOKEN.exec(text)
  if (iso) {
    const parsed = parseIsoDateTime(iso[0])
    if (parsed) return parsed.kind === 'date' ? withTime(parsed.date, text.slice(iso.index + iso[0].length)) : parsed
  }

  const numeric = NUMERIC_DATE.exec(text)
  if (numeric) {
    const [, d, m, y] = numeric
    const year = y.length === 2 ? 2000 + Number(y) : Number(y)
    if (isValidDate(year, +m, +d)) {
      return withTime(dateString(year, +m, +d), text.slice(numeric.index + numeric[0].length))
    }
  }

  const named = NAMED_DATE.exec(text)
  if (named) {
    const [, d, monthWord, y] = named
    const month = MONTH_WORDS.get(monthWord.toLowerCase())
    if (month !== undefined) {
      const year = y ? Number(y) : inferYear(month, Number(d), reference)
      if (isValidDate(year, month, +d)) {
        return withTime(dateString(year, month, +d), text.slice(named.index + named[0].length))
      }
    }
  }

  return undefined
}

function inferYear(month: number, day: number, reference: Date): number {
  const year = reference.getUTCFullYear()
  const candidate = Date.UTC(year, month - 1, day)
  const sixtyDays = 60 * 24 * 60 * 60 * 1000
  return candidate < reference.getTime() - sixtyDays ? year + 1 : year
}

/**
 * Date text from a configured selector: recognised dates, else the text itself
 */
export function dateFromSelectorText(text: string, reference?: Date): EventTime | undefined {
  const trimmed = text.replace(/\s+/g, ' ').trim()
  if (!trimmed) return undefined
  return findDateInText(trimmed, reference) ?? { kind: 'expression', text: trimmed }
}
