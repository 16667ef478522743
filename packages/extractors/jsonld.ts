/**
 * JSON-LD extractor
 *
 * Reads every <script type="application/ld+json"> block. Blocks that are not
 * valid JSON are ignored; objects of the wrong type are ignored; objects of
 * the right type without a name are counted as skipped.
 */

import * as cheerio from 'cheerio'
import type { CandidateRecord, EventTime } from '../core/types.js'
import { parseIsoDateTime } from './dates.js'
import { absoluteUrl, cleanText, isRecord, stripHtml, toCoordinates } from './text.js'
import { makeRecord, type CandidateFields, type ExtractionContext, type ExtractionResult } from './types.js'

const EVENT_TYPES = new Set([
  'Event',
  'ChildrensEvent',
  'ComedyEvent',
  'CourseInstance',
  'DanceEvent',
  'EducationEvent',
  'ExhibitionEvent',
  'Festival',
  'FoodEvent',
  'LiteraryEvent',
  'MusicEvent',
  'ScreeningEvent',
  'SocialEvent',
  'SportsEvent',
  'TheaterEvent',
  'VisualArtsEvent',
])

const PLACE_TYPES = new Set([
  'Place',
  'LocalBusiness',
  'TouristAttraction',
  'Museum',
  'Playground',
  'Park',
  'Zoo',
  'Aquarium',
  'AmusementPark',
  'Library',
  'MovieTheater',
  'PublicSwimmingPool',
  'SportsActivityLocation',
  'EntertainmentBusiness',
  'CivicStructure',
  'LandmarksOrHistoricalBuildings',
  'ChildCare',
])

type JsonObject = Record<string, unknown>

function typesOf(node: JsonObject): string[] {
  const type = node['@type']
  const list = Array.isArray(type) ? type : [type]
  return list
    .filter((value): value is string => typeof value === 'string')
    .map(value => value.replace(/^https?:\/\/schema\.org\//, ''))
}

function collect(value: unknown, wanted: Set<string>, into: JsonObject[]): void {
  if (Array.isArray(value)) {
    for (const item of value) collect(item, wanted, into)
    return
  }
  if (!isRecord(value)) return

  if (typesOf(value).some(type => wanted.has(type))) {
    into.push(value)
    return
  }

  collect(value['@graph'], wanted, into)

  // ItemList wraps its entries in ListItem.item
  const elements = value.itemListElement
  if (Array.isArray(elements)) {
    for (const element of elements) {
      collect(isRecord(element) && 'item' in element ? element.item : element, wanted, into)
    }
  }
}

function str(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const text = cleanText(value)
    return text || undefined
  }
  if (typeof value === 'number') return String(value)
  return undefined
}

function first(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value
}

function formatAddress(value: unknown): string | undefined {
  const address = first(value)
  if (typeof address === 'string') return str(address)
  if (!isRecord(address)) return undefined

  const street = str(address.streetAddress)
  const postal = str(address.postalCode)
  const city = str(address.addressLocality)
  const locality = [postal, city].filter(Boolean).join(' ')

  if (street) return locality ? `${street}, ${locality}` : street
  return locality || undefined
}

function timeOf(value: unknown): EventTime | undefined {
  const text = str(first(value))
  if (!text) return undefined
  return parseIsoDateTime(text) ?? { kind: 'expression', text }
}

function geoOf(node: JsonObject): ReturnType<typeof toCoordinates> {
  const geo = first(node.geo)
  return isRecord(geo) ? toCoordinates(geo.latitude, geo.longitude) : undefined
}

const DAY_NAMES = /^(?:https?:\/\/schema\.org\/)?(Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday|PublicHolidays)$/

/** openingHours ("Mo-Fr 10:00-18:00") or openingHoursSpecification, as text */
function openingHoursText(node: JsonObject): string | undefined {
  const hours = node.openingHours
  if (typeof hours === 'string') return str(hours)
  if (Array.isArray(hours)) {
    const parts = hours.map(str).filter((part): part is string => part !== undefined)
    if (parts.length > 0) return parts.join(', ')
  }

  const specs = node.openingHoursSpecification
  const list = Array.isArray(specs) ? specs : [specs]
  const parts: string[] = []
  for (const spec of list) {
    if (!isRecord(spec)) continue
    const opens = str(spec.opens)
    const closes = str(spec.closes)
    if (!opens || !closes) continue
    const days = (Array.isArray(spec.dayOfWeek) ? spec.dayOfWeek : [spec.dayOfWeek])
      .map(day => (typeof day === 'string' ? DAY_NAMES.exec(day)?.[1] : undefined))
      .filter((day): day is string => day !== undefined && day !== 'PublicHolidays')
    for (const day of days) parts.push(`${day} ${opens.slice(0, 5)}-${closes.slice(0, 5)}`)
  }
  return parts.length > 0 ? parts.join(', ') : undefined
}

function eventFields(node: JsonObject, baseUrl: string): CandidateFields | null {
  const title = str(node.name)
  if (!title) return null

  const place = first(node.location)
  let location: string | undefined
  let address: string | undefined
  let coordinates = geoOf(node)

  if (typeof place === 'string') {
    location = str(place)
  } else if (isRecord(place)) {
    location = str(place.name)
    address = formatAddress(place.address)
    coordinates = coordinates ?? geoOf(place)
  }

  const description = typeof node.description === 'string' ? stripHtml(node.description) : undefined

  return {
    kind: 'event',
    title,
    description: description || undefined,
    start: timeOf(node.startDate),
    end: timeOf(node.endDate),
    location: location ?? address,
    address,
    coordinates,
    url: absoluteUrl(str(first(node.url)), baseUrl),
  }
}

function locationFields(node: JsonObject, baseUrl: string): CandidateFields | null {
  const title = str(node.name)
  if (!title) return null

  const description = typeof node.description === 'string' ? stripHtml(node.description) : undefined
  const address = formatAddress(node.address)

  return {
    kind: 'location',
    title,
    description: description || undefined,
    location: address ?? title,
    address,
    openingHoursText: openingHoursText(node),
    coordinates: geoOf(node),
    url: absoluteUrl(str(first(node.url)), baseUrl) ?? baseUrl,
  }
}

function identity(fields: CandidateFields): string {
  return JSON.stringify([fields.title, fields.start, fields.location, fields.url])
}

export function extractJsonLd(body: string, context: ExtractionContext): ExtractionResult {
  const $ = cheerio.load(body)
  const wanted = context.kind === 'event' ? EVENT_TYPES : PLACE_TYPES
  const nodes: JsonObject[] = []

  $('script[type="application/ld+json"]').each((_, script) => {
    const raw = ($(script).html() ?? '').trim()
    if (!raw) return
    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch {
      // Broken blocks are common next to valid ones
      return
    }
    collect(data, wanted, nodes)
  })

  const seen = new Set<string>()
  const records: CandidateRecord[] = []
  let skipped = 0

  for (const [index, node] of nodes.entries()) {
    const fields = context.kind === 'event' ? eventFields(node, context.url) : locationFields(node, context.url)
    if (!fields) {
      skipped++
      continue
    }

    const key = identity(fields)
    if (seen.has(key)) continue
    seen.add(key)

    records.push(makeRecord(fields, context, 'jsonld', index))
  }

  return { records, skipped }
}
