/**
 * Fingerprint generation for deduplication
 * Creates stable ids from title + start time + location
 */

import { createHash } from 'crypto'
import type { CandidateRecord, EventTime } from './types.js'

const TRANSLITERATION: Record<string, string> = { ä: 'ae', ö: 'oe', ü: 'ue', ß: 'ss' }

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[äöüß]/g, char => TRANSLITERATION[char] ?? char)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '')
}

export function timeKey(time: EventTime | undefined): string {
  if (!time) return ''
  switch (time.kind) {
    case 'instant':
      return time.iso.split('.')[0] + 'Z'
    case 'floating':
      return time.local
    case 'date':
      return time.date
    case 'expression':
      return time.text.toLowerCase().replace(/\s+/g, ' ').trim()
  }
}

function placeKey(record: Pick<CandidateRecord, 'location' | 'address'>): string {
  return (record.address ?? record.location ?? '').toLowerCase().replace(/\s+/g, ' ').trim()
}

/**
 * Key under which records from different sources count as the same listing.
 * Events match on title and start; venues have no start and match on title
 * and address, or on coordinates when no address is known.
 */
export function dedupKey(
  record: Pick<CandidateRecord, 'kind' | 'title' | 'start' | 'location' | 'address' | 'coordinates'>
): string {
  if (record.kind === 'event') {
    return `event::${normalizeTitle(record.title)}::${timeKey(record.start)}`
  }
  const place = placeKey(record)
  const where = place || (record.coordinates ? `${record.coordinates.lat.toFixed(4)},${record.coordinates.lon.toFixed(4)}` : '')
  return `location::${normalizeTitle(record.title)}::${where}`
}

export function recordId(record: Pick<CandidateRecord, 'kind' | 'title' | 'start' | 'location' | 'address' | 'url'>): string {
  const place = placeKey(record)
  const input =
    record.kind === 'event'
      ? `${normalizeTitle(record.title)}::${timeKey(record.start)}::${place}`
      : `${normalizeTitle(record.title)}::${place}::${record.url ?? ''}`

  const hash = createHash('sha256').update(input).digest('hex').substring(0, 32)
  return `${record.kind === 'event' ? 'evt' : 'loc'}-${hash}`
}
