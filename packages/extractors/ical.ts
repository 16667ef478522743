/**
 * iCalendar extractor
 *
 * Each VEVENT is parsed by node-ical on its own, wrapped in a calendar that
 * carries the document's VTIMEZONE definitions, so a broken event only costs
 * itself. The kind of DTSTART/DTEND (all-day, UTC, zoned or floating) is read
 * from the raw property line: node-ical turns floating times into host-local
 * Dates, which would silently shift them.
 */

import ical from 'node-ical'
import { ParseError } from '../core/errors.js'
import type { CandidateRecord, EventTime } from '../core/types.js'
import { absoluteUrl, cleanText, isRecord, textOf, toCoordinates } from './text.js'
import { makeRecord, type ExtractionContext, type ExtractionResult } from './types.js'

const VEVENT_BLOCK = /BEGIN:VEVENT[\s\S]*?END:VEVENT/g
const VTIMEZONE_BLOCK = /BEGIN:VTIMEZONE[\s\S]*?END:VTIMEZONE/g

export function unfold(text: string): string {
  return text.replace(/\r?\n[ \t]/g, '')
}

/**
 * Raw DTSTART/DTEND → EventTime; `parsed` is node-ical's Date for zoned values
 */
function timeOf(block: string, property: 'DTSTART' | 'DTEND', parsed: unknown): EventTime | undefined {
  const line = new RegExp(`^${property}((?:;[^:\\r\\n]*)?):([^\\r\\n]+)$`, 'm').exec(block)
  if (!line) return undefined

  const params = line[1].toUpperCase()
  const value = line[2].trim()

  const date = /^(\d{4})(\d{2})(\d{2})$/.exec(value)
  if (date || params.includes('VALUE=DATE;') || params.endsWith('VALUE=DATE')) {
    const digits = date ?? /^(\d{4})(\d{2})(\d{2})/.exec(value)
    return digits ? { kind: 'date', date: `${digits[1]}-${digits[2]}-${digits[3]}` } : undefined
  }

  const dateTime = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})?(Z)?$/.exec(value)
  if (!dateTime) return undefined
  const [, y, mo, d, h, mi, s = '00', utc] = dateTime

  if (utc) {
    const instant = new Date(`${y}-${mo}-${d}T${h}:${mi}:${s}Z`)
    return Number.isNaN(instant.getTime()) ? undefined : { kind: 'instant', iso: instant.toISOString() }
  }

  if (params.includes('TZID=')) {
    return parsed instanceof Date && !Number.isNaN(parsed.getTime())
      ? { kind: 'instant', iso: parsed.toISOString() }
      : undefined
  }

  return { kind: 'floating', local: `${y}-${mo}-${d}T${h}:${mi}:${s}` }
}

function geoOf(value: unknown): CandidateRecord['coordinates'] {
  if (isRecord(value)) return toCoordinates(value.lat, value.lon)
  return undefined
}

function parseEvent(block: string, timezones: string): Record<string, unknown> | null {
  const calendar = ['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//harvester//block//EN', timezones, block, 'END:VCALENDAR']
    .filter(Boolean)
    .join('\r\n')

  const parsed = ical.sync.parseICS(calendar)
  for (const component of Object.values(parsed)) {
    if (component.type === 'VEVENT') {
      return { ...component }
    }
  }
  return null
}

export function extractIcal(body: string, context: ExtractionContext): ExtractionResult {
  const text = unfold(body)
  if (!/BEGIN:VCALENDAR/i.test(text)) {
    throw new ParseError(`${context.source}: no VCALENDAR found`)
  }

  const timezones = (text.match(VTIMEZONE_BLOCK) ?? []).join('\r\n')
  const blocks = text.match(VEVENT_BLOCK) ?? []

  const records: CandidateRecord[] = []
  let skipped = 0

  for (const [index, block] of blocks.entries()) {
    let event: Record<string, unknown> | null
    try {
      event = parseEvent(block, timezones)
    } catch {
      skipped++
      continue
    }

    const title = cleanText(textOf(event?.summary) ?? '')
    if (!event || !title) {
      skipped++
      continue
    }

    const description = cleanText(textOf(event.description) ?? '')
    const location = cleanText(textOf(event.location) ?? '')

    records.push(
      makeRecord(
        {
          kind: context.kind,
          title,
          description: description || undefined,
          start: timeOf(block, 'DTSTART', event.start),
          end: timeOf(block, 'DTEND', event.end),
          location: location || undefined,
          coordinates: geoOf(event.geo),
          url: absoluteUrl(textOf(event.url), context.url),
        },
        context,
        'ical',
        index
      )
    )
  }

  return { records, skipped }
}
