/**
 * Opening hours parser
 *
 * Turns free text such as "Di-So 10:00-17:00, Mo geschlossen" or
 * "Mon-Fri 9am-5pm" into a weekly schedule. The result is tri-state:
 * a schedule, a plain "closed", or the original text when anything in it
 * was not understood. Intervals are half-open [start, end).
 */

import { WEEKDAYS, WEEKDAY_WORDS } from '../core/calendar.js'
import type { DayHours, OpeningHours, TimeInterval, Weekday } from '../core/types.js'

type Token =
  | { type: 'day'; day: Weekday }
  | { type: 'dash' }
  | { type: 'daily' }
  | { type: 'closed' }
  | { type: 'time'; start: number; end: number }
  | { type: 'unknown'; text: string }

const DAILY = new Set(['täglich', 'taeglich', 'tägl', 'tgl', 'daily'])
const CLOSED = new Set(['geschlossen', 'closed', 'ruhetag', 'ruhetage'])
const FILLER = new Set([
  'geöffnet',
  'geoeffnet',
  'open',
  'opening',
  'öffnungszeiten',
  'oeffnungszeiten',
  'hours',
  'uhr',
  'von',
  'from',
  'und',
  'and',
  'sowie',
  'jeweils',
])
const RANGE_WORDS = new Set(['bis', 'to', 'through', 'thru', 'till', 'until'])

const SUFFIX = '(?:\\s*(am|pm|a\\.m\\.|p\\.m\\.)(?![a-zäöü]))?'
const UNIT = '(?:\\s*(?:uhr|h)(?![a-zäöü]))?'
const TIME_RANGE = new RegExp(
  `(\\d{1,2})(?:[:.](\\d{2}))?${SUFFIX}${UNIT}\\s*-\\s*(\\d{1,2})(?:[:.](\\d{2}))?${SUFFIX}${UNIT}`,
  'y'
)
const WORD = /[a-zäöüß]+/y
const SEPARATOR = /[\s,;|/&+.:()]+/y

const DAY_MINUTES = 24 * 60

function clockMinutes(hours: string, minutes: string | undefined, suffix: string | undefined): number | null {
  let h = Number(hours)
  const m = Number(minutes ?? '0')
  if (m > 59) return null

  if (suffix && h <= 12) {
    const pm = suffix.startsWith('p')
    if (pm && h < 12) h += 12
    if (!pm && h === 12) h = 0
  }

  if (h > 24 || (h === 24 && m > 0)) return null
  return h * 60 + m
}

function timeToken(match: RegExpExecArray): Token | null {
  const [, startH, startM, startSuffix, endH, endM, endSuffix] = match
  const end = clockMinutes(endH, endM, endSuffix)
  let start = clockMinutes(startH, startM, startSuffix)
  if (start === null || end === null || start >= DAY_MINUTES) return null

  // "1-5pm": the suffix of the end applies to the start when that keeps the order
  if (!startSuffix && endSuffix?.startsWith('p') && start < 12 * 60 && start + 12 * 60 < end) {
    start += 12 * 60
  }
  return { type: 'time', start, end }
}

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[–—‒−]/g, '-')
    .replace(/\s+(?:bis|to|till|until)\s+/g, ' - ')
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = []
  let position = 0

  const at = (pattern: RegExp): RegExpExecArray | null => {
    pattern.lastIndex = position
    return pattern.exec(text)
  }

  while (position < text.length) {
    const separator = at(SEPARATOR)
    if (separator) {
      position += separator[0].length
      continue
    }

    if (/\d/.test(text[position])) {
      const range = at(TIME_RANGE)
      const token = range ? timeToken(range) : null
      if (!range || !token) {
        const digits = /\d+/y
        digits.lastIndex = position
        const number = digits.exec(text)?.[0] ?? text[position]
        tokens.push({ type: 'unknown', text: number })
        position += number.length
        continue
      }
      tokens.push(token)
      position += range[0].length
      continue
    }

    if (text[position] === '-') {
      tokens.push({ type: 'dash' })
      position++
      continue
    }

    const word = at(WORD)
    if (!word) {
      tokens.push({ type: 'unknown', text: text[position] })
      position++
      continue
    }

    const value = word[0]
    position += value.length
    const day = WEEKDAY_WORDS.get(value)

    if (day) tokens.push({ type: 'day', day })
    else if (RANGE_WORDS.has(value)) tokens.push({ type: 'dash' })
    else if (DAILY.has(value)) tokens.push({ type: 'daily' })
    else if (CLOSED.has(value)) tokens.push({ type: 'closed' })
    else if (!FILLER.has(value)) tokens.push({ type: 'unknown', text: value })
  }

  return tokens
}

interface Group {
  days: Set<Weekday>
  times: { start: number; end: number }[]
  closed: boolean
}

function dayRange(from: Weekday, to: Weekday): Weekday[] {
  const start = WEEKDAYS.indexOf(from)
  const length = (WEEKDAYS.indexOf(to) - start + 7) % 7
  return Array.from({ length: length + 1 }, (_, offset) => WEEKDAYS[(start + offset) % 7])
}

/** Null when the token sequence does not form a schedule */
function group(tokens: Token[]): Group[] | null {
  const groups: Group[] = []
  let current: Group = { days: new Set(), times: [], closed: false }
  let lastDay: Weekday | null = null
  let rangeOpen = false

  const startGroup = () => {
    if (current.times.length > 0 || current.closed) {
      groups.push(current)
      current = { days: new Set(), times: [], closed: false }
    }
  }

  for (const token of tokens) {
    switch (token.type) {
      case 'unknown':
        return null
      case 'day':
        if (rangeOpen && lastDay) {
          for (const day of dayRange(lastDay, token.day)) current.days.add(day)
          rangeOpen = false
        } else {
          startGroup()
          current.days.add(token.day)
        }
        lastDay = token.day
        break
      case 'dash':
        if (!lastDay || rangeOpen || current.times.length > 0) return null
        rangeOpen = true
        break
      case 'daily':
        startGroup()
        for (const day of WEEKDAYS) current.days.add(day)
        lastDay = null
        break
      case 'closed':
        current.closed = true
        lastDay = null
        break
      case 'time':
        if (rangeOpen) return null
        current.times.push({ start: token.start, end: token.end })
        lastDay = null
        break
    }
  }

  if (rangeOpen) return null
  if (current.days.size > 0 || current.times.length > 0 || current.closed) groups.push(current)
  return groups
}

function formatMinutes(minutes: number): string {
  return `${String(Math.floor(minutes / 60)).padStart(2, '0')}:${String(minutes % 60).padStart(2, '0')}`
}

/** Sort, clamp and merge so that no two intervals overlap */
export function mergeIntervals(intervals: { start: number; end: number }[]): TimeInterval[] {
  const sorted = intervals
    .map(({ start, end }) => ({ start, end: end <= start ? DAY_MINUTES : end }))
    .sort((a, b) => a.start - b.start || a.end - b.end)

  const merged: { start: number; end: number }[] = []
  for (const interval of sorted) {
    const last = merged[merged.length - 1]
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end)
    } else {
      merged.push({ ...interval })
    }
  }

  return merged.map(({ start, end }) => ({ start: formatMinutes(start), end: formatMinutes(end) }))
}

export function parseOpeningHours(text: string): OpeningHours {
  const original = text.trim()
  const tokens = tokenize(normalize(original))
  const groups = group(tokens)

  if (!groups || groups.length === 0) return { kind: 'unparsed', text: original }

  if (tokens.every(token => token.type === 'closed')) {
    return { kind: 'closed', text: original }
  }

  // "10-18 Uhr Mo-Fr": days written after their times
  const resolved: Group[] = []
  for (const entry of groups) {
    const previous = resolved[resolved.length - 1]
    if (entry.times.length === 0 && !entry.closed && previous && previous.days.size === 0 && previous.times.length > 0) {
      previous.days = entry.days
      continue
    }
    resolved.push(entry)
  }

  if (!resolved.some(entry => entry.times.length > 0)) return { kind: 'unparsed', text: original }
  if (resolved.some(entry => entry.times.length === 0 && !entry.closed)) return { kind: 'unparsed', text: original }

  const open = new Map<Weekday, { start: number; end: number }[]>()
  for (const entry of resolved) {
    const days = entry.days.size > 0 ? [...entry.days] : [...WEEKDAYS]
    for (const day of days) {
      if (entry.closed) {
        open.delete(day)
      } else {
        open.set(day, [...(open.get(day) ?? []), ...entry.times])
      }
    }
  }

  const hours = (day: Weekday): DayHours => {
    const intervals = open.get(day)
    return intervals && intervals.length > 0
      ? { status: 'open', intervals: mergeIntervals(intervals) }
      : { status: 'closed' }
  }

  return {
    kind: 'schedule',
    days: {
      monday: hours('monday'),
      tuesday: hours('tuesday'),
      wednesday: hours('wednesday'),
      thursday: hours('thursday'),
      friday: hours('friday'),
      saturday: hours('saturday'),
      sunday: hours('sunday'),
    },
  }
}
