/**
 * RSS 2.0 / RSS 1.0 extractor
 *
 * Understands the event module (ev:startdate, ev:enddate, ev:location) and
 * georss:point on top of the core item fields.
 */

import { ParseError } from '../core/errors.js'
import type { CandidateRecord } from '../core/types.js'
import { parseFeedDate } from './dates.js'
import { hasTag, parseBlock, splitBlocks, type FeedNode } from './feed.js'
import { absoluteUrl, cleanText, stripHtml, textOf, toCoordinates } from './text.js'
import { makeRecord, type ExtractionContext, type ExtractionResult } from './types.js'

function firstText(node: FeedNode, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = textOf(node[key])
    if (value && value.trim()) return value
  }
  return undefined
}

function georss(node: FeedNode): CandidateRecord['coordinates'] {
  const point = firstText(node, 'georss:point')
  if (!point) return undefined
  const [lat, lon] = point.trim().split(/[\s,]+/)
  return toCoordinates(lat, lon)
}

export function isRssDocument(body: string): boolean {
  return hasTag(body, 'rss') || hasTag(body, 'rdf:RDF') || hasTag(body, 'channel')
}

export function extractRss(body: string, context: ExtractionContext): ExtractionResult {
  const blocks = splitBlocks(body, 'item')
  if (blocks.length === 0 && !isRssDocument(body)) {
    throw new ParseError(`${context.source}: no RSS markup found`)
  }

  const records: CandidateRecord[] = []
  let skipped = 0

  for (const [index, block] of blocks.entries()) {
    const parsed = parseBlock(block, 'item')
    if (!parsed.ok) {
      skipped++
      continue
    }

    const item = parsed.node
    const title = cleanText(stripHtml(firstText(item, 'title') ?? ''))
    if (!title) {
      skipped++
      continue
    }

    const description = stripHtml(firstText(item, 'content:encoded', 'description') ?? '')
    const guid = firstText(item, 'guid')
    const link = firstText(item, 'link') ?? (guid && /^https?:\/\//.test(guid) ? guid : undefined)
    const start = firstText(item, 'ev:startdate', 'dc:date', 'pubDate')
    const end = firstText(item, 'ev:enddate')
    const location = firstText(item, 'ev:location')

    records.push(
      makeRecord(
        {
          kind: context.kind,
          title,
          description: description || undefined,
          start: start ? parseFeedDate(start) : undefined,
          end: end ? parseFeedDate(end) : undefined,
          location: location ? cleanText(location) : undefined,
          coordinates: georss(item),
          url: absoluteUrl(link, context.url),
        },
        context,
        'rss',
        index
      )
    )
  }

  return { records, skipped }
}
