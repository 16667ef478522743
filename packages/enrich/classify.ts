/**
 * Keyword classification
 *
 * Category, age range, kid-friendly name, weather and energy hints, parent
 * tips and venue amenities, all driven by data/taxonomy.json. Keywords match at the
 * start of a word in the lower-cased title and description, so "tier" also
 * finds "Tierpark" while "park" does not fire inside "Skatepark".
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import type { EnergyLevel, RecordKind, WeatherHint } from '../core/types.js'

const keywords = z.array(z.string().min(1))
const ageTuple = z.tuple([z.number().int().min(0), z.number().int().min(0)])
const emojiRules = z.object({
  rules: z.array(z.object({ keywords, categories: z.array(z.string()).optional(), emoji: z.string() })),
  fallback: z.string(),
})
const labelled = z.array(z.object({ label: z.string(), keywords }))

const TaxonomySchema = z.object({
  categories: z.object({
    event: z.array(z.object({ id: z.string(), keywords })),
    location: z.array(z.object({ id: z.string(), keywords })),
  }),
  ageGroups: z.array(z.object({ keywords, minAge: z.number().int(), maxAge: z.number().int() })),
  categoryAges: z.object({ event: z.record(ageTuple), location: z.record(ageTuple) }),
  emoji: z.object({ event: emojiRules, location: emojiRules }),
  weather: z.object({ 'good-weather': keywords, indoor: keywords }),
  energy: z.object({ active: keywords, calm: keywords }),
  amenities: labelled,
  highlights: labelled,
  parentTips: z.object({
    event: z.array(z.string()),
    location: z.array(z.string()),
    weather: z.object({ 'good-weather': z.array(z.string()), indoor: z.array(z.string()) }),
    rules: labelled,
  }),
})

export type Taxonomy = z.infer<typeof TaxonomySchema>

export const taxonomy: Taxonomy = TaxonomySchema.parse(
  JSON.parse(readFileSync(new URL('./data/taxonomy.json', import.meta.url), 'utf8'))
)

const KID_NAME_LENGTH = 50
const MAX_AGE = 18

const patterns = new Map<string, RegExp>()

function escape(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export function mentions(text: string, keyword: string): boolean {
  let pattern = patterns.get(keyword)
  if (!pattern) {
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escape(keyword.toLowerCase())}`, 'u')
    patterns.set(keyword, pattern)
  }
  return pattern.test(text)
}

export function mentionsAny(text: string, words: readonly string[]): boolean {
  return words.some(word => mentions(text, word))
}

/** Lower-cased title and description, the text every classifier reads */
export function classificationText(title: string, description?: string): string {
  return `${title} ${description ?? ''}`.toLowerCase().replace(/\s+/g, ' ').trim()
}

/** First taxonomy category with a keyword in the text, else the first known source tag */
export function classifyCategory(kind: RecordKind, text: string, sourceTags: readonly string[] = []): string {
  const categories = taxonomy.categories[kind]
  const match = categories.find(category => mentionsAny(text, category.keywords))
  if (match) return match.id

  const tag = sourceTags.map(value => value.toLowerCase()).find(value => categories.some(category => category.id === value))
  return tag ?? kind
}

export interface AgeRange {
  minAge?: number
  maxAge?: number
}

const RANGE_PATTERNS = [
  /(\d{1,2})\s*(?:-|–|bis)\s*(\d{1,2})\s*(?:jahre\p{L}*|j\.|years?)/u,
  /\bvon\s+(\d{1,2})\s+bis\s+(\d{1,2})(?![\d:.]|\s*uhr)/u,
  /\bages?\s+(\d{1,2})\s*(?:-|–|to)\s*(\d{1,2})/u,
]

const MINIMUM_PATTERNS = [
  /\bages?\s+(\d{1,2})\s*(?:\+|and up|and older|or older)/u,
  /\bab\s+(\d{1,2})(?!\d|[:.,]\d|\s*(?:uhr|€|euro|min))/u,
  /(?<![\p{L}\p{N}])(\d{1,2})\s?\+(?!\d)/u,
]

function explicitAges(text: string): AgeRange | null {
  for (const pattern of RANGE_PATTERNS) {
    const match = pattern.exec(text)
    if (!match) continue
    const minAge = Number(match[1])
    const maxAge = Number(match[2])
    if (minAge <= maxAge && maxAge <= MAX_AGE) return { minAge, maxAge }
  }

  for (const pattern of MINIMUM_PATTERNS) {
    const match = pattern.exec(text)
    if (!match) continue
    const minAge = Number(match[1])
    if (minAge <= MAX_AGE) return { minAge }
  }

  return null
}

function groupAges(text: string): AgeRange | null {
  const groups = taxonomy.ageGroups.filter(group => mentionsAny(text, group.keywords))
  if (groups.length === 0) return null
  return {
    minAge: Math.min(...groups.map(group => group.minAge)),
    maxAge: Math.max(...groups.map(group => group.maxAge)),
  }
}

/** Explicit mentions, then age-group words, then the category default; empty when none apply */
export function inferAgeRange(kind: RecordKind, text: string, category: string): AgeRange {
  const explicit = explicitAges(text)
  if (explicit) return explicit

  const grouped = groupAges(text)
  if (grouped) return grouped

  const defaults = taxonomy.categoryAges[kind][category]
  return defaults ? { minAge: defaults[0], maxAge: defaults[1] } : {}
}

export function kidFriendlyName(kind: RecordKind, title: string, text: string, category: string): string {
  const { rules, fallback } = taxonomy.emoji[kind]
  const rule = rules.find(entry => mentionsAny(text, entry.keywords) || entry.categories?.includes(category))
  const short = [...title.trim()].slice(0, KID_NAME_LENGTH).join('')
  return `${rule?.emoji ?? fallback} ${short}`
}

export function weatherHint(text: string): WeatherHint {
  if (mentionsAny(text, taxonomy.weather['good-weather'])) return 'good-weather'
  if (mentionsAny(text, taxonomy.weather.indoor)) return 'indoor'
  return 'any'
}

export function energyLevel(text: string): EnergyLevel {
  if (mentionsAny(text, taxonomy.energy.active)) return 'active'
  if (mentionsAny(text, taxonomy.energy.calm)) return 'calm'
  return 'moderate'
}

export function amenities(text: string): string[] {
  return taxonomy.amenities.filter(entry => mentionsAny(text, entry.keywords)).map(entry => entry.label)
}

export function highlights(text: string): string[] {
  return taxonomy.highlights.filter(entry => mentionsAny(text, entry.keywords)).map(entry => entry.label)
}

/** Fixed tips for the kind, then tips for the weather hint and for keywords in the text */
export function parentTips(kind: RecordKind, text: string, weather: WeatherHint): string[] {
  const tips = taxonomy.parentTips
  const matched = tips.rules.filter(entry => mentionsAny(text, entry.keywords)).map(entry => entry.label)
  return [...new Set([...tips[kind], ...(weather === 'any' ? [] : tips.weather[weather]), ...matched])]
}
