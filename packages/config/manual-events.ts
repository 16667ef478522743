/**
 * Curated events
 *
 * A JSON file of hand-maintained events merged into every run, either an
 * array or `{ "events": [...] }`. Entries use the record fields (`title`,
 * `start` as ISO 8601, ...) or the older display layout with `name`, `date`
 * and an optional `time` such as "10:00-16:00". A missing file means no
 * curated events; an invalid one is a ConfigError.
 */

import path from 'path'
import { z } from 'zod'
import { ConfigError, type ConfigIssue } from '../core/errors.js'
import type { CandidateRecord, EventTime } from '../core/types.js'
import { parseIsoDateTime } from '../extractors/dates.js'
import { readJson } from '../store/json-file.js'
import { httpUrl, issuesOf } from './sources.js'

/** Source name of curated records */
export const MANUAL_SOURCE = 'manual'

const eventTime = z.string().transform((value, ctx): EventTime => {
  const time = parseIsoDateTime(value)
  if (!time) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected an ISO 8601 date or date-time' })
    return z.NEVER
  }
  return time
})

const coordinates = z.object({ lat: z.number().min(-90).max(90), lon: z.number().min(-180).max(180) })

const ManualEventSchema = z
  .object({
    title: z.string().trim().min(1),
    start: eventTime,
    end: eventTime.optional(),
    description: z.string().optional(),
    location: z.string().min(1).optional(),
    address: z.string().min(1).optional(),
    url: httpUrl.optional(),
    categories: z.array(z.string().min(1)).optional(),
    coordinates: coordinates.optional(),
  })
  .strict()

// Display-only fields of this layout (nameKids, ageGroups, ...) are ignored
const LegacyManualEventSchema = z.object({
  name: z.string().trim().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  time: z.string().optional(),
  description: z.string().optional(),
  address: z.string().min(1).optional(),
  link: httpUrl.optional(),
  category: z.string().min(1).optional(),
  gps: coordinates.optional(),
})

type ManualFields = Omit<CandidateRecord, 'kind' | 'source' | 'format' | 'itemIndex'>

const TIME_RANGE = /^(\d{1,2})[:.](\d{2})(?:\s*(?:-|–|bis)\s*(\d{1,2})[:.](\d{2}))?/

function legacyTimes(date: string, time: string | undefined): Pick<CandidateRecord, 'start' | 'end'> | undefined {
  const day = parseIsoDateTime(date)
  if (!day) return undefined

  const match = time ? TIME_RANGE.exec(time.trim()) : null
  if (!match) return { start: day }

  const at = (hours: string, minutes: string) => parseIsoDateTime(`${date}T${hours.padStart(2, '0')}:${minutes}:00`)
  const start = at(match[1], match[2])
  const end = match[3] && match[4] ? at(match[3], match[4]) : undefined
  return start ? { start, end } : undefined
}

function parseEntry(raw: unknown, entry: string, issues: ConfigIssue[]): ManualFields | undefined {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && !('title' in raw)) {
    const parsed = LegacyManualEventSchema.safeParse(raw)
    if (!parsed.success) {
      issues.push(...issuesOf(parsed.error, entry))
      return undefined
    }
    const legacy = parsed.data
    const times = legacyTimes(legacy.date, legacy.time)
    if (!times) {
      issues.push({ entry, message: `date: ${legacy.date} is not a calendar date` })
      return undefined
    }
    return {
      title: legacy.name,
      ...times,
      description: legacy.description,
      address: legacy.address,
      url: legacy.link,
      categories: legacy.category ? [legacy.category] : undefined,
      coordinates: legacy.gps,
    }
  }

  const parsed = ManualEventSchema.safeParse(raw)
  if (!parsed.success) {
    issues.push(...issuesOf(parsed.error, entry))
    return undefined
  }
  return parsed.data
}

/**
 * Turn the content of a curated events file into candidate records.
 * Problems are appended to `issues`; valid entries are returned.
 */
export function parseManualEvents(raw: unknown, file: string, issues: ConfigIssue[]): CandidateRecord[] {
  let entries: unknown[]
  if (Array.isArray(raw)) {
    entries = raw
  } else if (typeof raw === 'object' && raw !== null && 'events' in raw && Array.isArray(raw.events)) {
    entries = raw.events
  } else {
    issues.push({ entry: file, message: 'expected an array of events or { "events": [...] }' })
    return []
  }

  const records: CandidateRecord[] = []
  entries.forEach((value, index) => {
    const fields = parseEntry(value, `${file} #${index}`, issues)
    if (fields) records.push({ ...fields, kind: 'event', source: MANUAL_SOURCE, format: 'manual', itemIndex: index })
  })
  return records
}

/** Load the curated events file; throws ConfigError listing every invalid entry */
export async function loadManualEvents(file: string, cwd: string = process.cwd()): Promise<CandidateRecord[]> {
  const raw = await readJson(path.resolve(cwd, file))
  if (raw === undefined) return []

  const issues: ConfigIssue[] = []
  const records = parseManualEvents(raw, file, issues)
  if (issues.length > 0) {
    throw new ConfigError(`Invalid manual events (${issues.length} problem${issues.length === 1 ? '' : 's'})`, issues)
  }
  return records
}
