/**
 * HTML heuristic extractor
 *
 * For listing pages without structured data. Tries the source's item
 * selector first, then generic listing selectors, and reads each item block
 * for a title, a date (German and ISO formats), a link and, for venues, an
 * address and opening hours.
 *
 * Only blocks matched by the configured item selector count as skipped when
 * they lack a title; generic selectors pick up plenty of non-items.
 */

import * as cheerio from 'cheerio'
import type { CandidateRecord, RecordKind, SourceSelectors } from '../core/types.js'
import { dateFromSelectorText, findDateInText } from './dates.js'
import { absoluteUrl, cleanText, spaceBlocks, truncate } from './text.js'
import { makeRecord, type CandidateFields, type ExtractionContext, type ExtractionResult } from './types.js'

const EVENT_SELECTORS = [
  "div[class*='event']",
  "div[class*='veranstaltung']",
  "article[class*='event']",
  "article[class*='teaser']",
  "div[class*='teaser']",
  "div[class*='item']",
  "div[class*='card']",
  "li[class*='event']",
  '.m-teaser',
  '.event-card',
  '.list-item',
  "a[href*='/event']",
]

const LOCATION_SELECTORS = [
  "div[class*='location']",
  "div[class*='place']",
  "article[class*='location']",
  "div[class*='item']",
  '.location-card',
  '.place-item',
]

const ADDRESS_FALLBACK = "address, [class*='address'], [class*='adresse'], [itemprop='address']"
const HOURS_FALLBACK = "[class*='hours'], [class*='oeffnungszeiten'], [class*='opening'], [itemprop='openingHours']"

const PER_SELECTOR = 20
const MAX_ITEMS = 30

const LIMITS: Record<RecordKind, { minBlockText: number; minTitle: number }> = {
  event: { minBlockText: 20, minTitle: 5 },
  location: { minBlockText: 15, minTitle: 3 },
}

interface Block {
  html: string
  configured: boolean
}

function findBlocks($: cheerio.CheerioAPI, kind: RecordKind, selectors?: SourceSelectors): Block[] {
  const candidates: { selector: string; configured: boolean }[] = [
    ...(selectors?.item ? [{ selector: selectors.item, configured: true }] : []),
    ...(kind === 'event' ? EVENT_SELECTORS : LOCATION_SELECTORS).map(selector => ({ selector, configured: false })),
  ]

  const found: Block[] = []
  for (const { selector, configured } of candidates) {
    let matches: string[]
    try {
      matches = $(selector)
        .slice(0, PER_SELECTOR)
        .toArray()
        .map(element => $.html(element))
    } catch {
      // Invalid selector in the source configuration
      continue
    }
    found.push(...matches.map(html => ({ html, configured })))
    if (found.length >= MAX_ITEMS) break
  }

  const seen = new Set<string>()
  const unique: Block[] = []
  for (const block of found) {
    const text = cleanText(cheerio.load(block.html, null, false).root().text()).slice(0, 100)
    if (text.length <= LIMITS[kind].minBlockText || seen.has(text)) continue
    seen.add(text)
    unique.push(block)
  }
  return unique.slice(0, MAX_ITEMS)
}

function selectText($: cheerio.CheerioAPI, selector: string | undefined): string | undefined {
  if (!selector) return undefined
  try {
    const text = cleanText($(selector).first().text())
    return text || undefined
  } catch {
    return undefined
  }
}

function titleOf($: cheerio.CheerioAPI, selectors?: SourceSelectors, kind?: RecordKind): string | undefined {
  const configured = selectText($, kind === 'location' ? selectors?.name ?? selectors?.title : selectors?.title)
  if (configured) return configured

  for (const heading of ['h1', 'h2', 'h3', 'h4']) {
    const text = selectText($, heading)
    if (text) return text
  }

  // The block itself may be the link
  const root = $.root().children().first()
  if (root.is('a')) return cleanText(root.text()) || undefined
  return selectText($, 'a')
}

function linkOf($: cheerio.CheerioAPI, baseUrl: string, selector?: string): string | undefined {
  const root = $.root().children().first()
  const anchor = selector ? $(selector).first() : root.is('a[href]') ? root : $('a[href]').first()
  const href = anchor.attr('href') ?? anchor.find('a[href]').first().attr('href')
  return absoluteUrl(href, baseUrl)
}

function readBlock(block: Block, context: ExtractionContext): CandidateFields | null {
  const $ = cheerio.load(spaceBlocks(block.html), null, false)
  const { kind, selectors } = context

  const title = titleOf($, selectors, kind)
  if (!title || title.length < LIMITS[kind].minTitle) return null

  const text = cleanText($.root().text())
  const description = selectText($, selectors?.description) ?? truncate(text, 500)
  const url = linkOf($, context.url, selectors?.link) ?? context.url

  if (kind === 'location') {
    const address = selectText($, selectors?.address) ?? selectText($, ADDRESS_FALLBACK)
    return {
      kind,
      title: truncate(title, 200),
      description,
      location: address ?? title,
      address,
      openingHoursText: selectText($, selectors?.hours) ?? selectText($, HOURS_FALLBACK),
      url,
    }
  }

  const dateText = selectText($, selectors?.date)
  const start = dateText
    ? dateFromSelectorText(dateText, context.reference)
    : findDateInText(text, context.reference)

  return {
    kind,
    title: truncate(title, 200),
    description,
    start,
    url,
  }
}

export function extractHtml(body: string, context: ExtractionContext): ExtractionResult {
  const $ = cheerio.load(body)
  $('script, style, noscript, template').remove()

  const records: CandidateRecord[] = []
  let skipped = 0

  for (const [index, block] of findBlocks($, context.kind, context.selectors).entries()) {
    const fields = readBlock(block, context)
    if (!fields) {
      if (block.configured) skipped++
      continue
    }
    records.push(makeRecord(fields, context, 'html', index))
  }

  return { records, skipped }
}
