/**
 * Month and weekday vocabulary (German and English)
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import type { Weekday } from './types.js'

export const WEEKDAYS: readonly Weekday[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
]

const CalendarSchema = z.object({
  months: z.record(z.number().int().min(1).max(12)),
  weekdays: z.record(z.enum(['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'])),
})

const calendar = CalendarSchema.parse(JSON.parse(readFileSync(new URL('./data/calendar.json', import.meta.url), 'utf8')))

/** Lower-cased month word → month number (1-12) */
export const MONTH_WORDS: ReadonlyMap<string, number> = new Map(Object.entries(calendar.months))

/** Lower-cased weekday word or abbreviation → weekday */
export const WEEKDAY_WORDS: ReadonlyMap<string, Weekday> = new Map(Object.entries(calendar.weekdays))
