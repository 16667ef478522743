/**
 * Atom extractor
 */

import { ParseError } from '../core/errors.js'
import type { CandidateRecord } from '../core/types.js'
import { parseFeedDate } from './dates.js'
import { hasTag, parseBlock, splitBlocks, type FeedNode } from './feed.js'
import { absoluteUrl, cleanText, isRecord, stripHtml, textOf } from './text.js'
import { makeRecord, type ExtractionContext, type ExtractionResult } from './types.js'

/** rel="alternate" (or no rel) wins over any other link */
function entryLink(entry: FeedNode): string | undefined {
  const links = Array.isArray(entry.link) ? entry.link : [entry.link]
  let fallback: string | undefined

  for (const link of links) {
    if (typeof link === 'string' && link.trim()) {
      fallback = fallback ?? link
      continue
    }
    if (!isRecord(link)) continue
    const href = link['@_href']
    if (typeof href !== 'string' || !href) continue
    const rel = link['@_rel']
    if (rel === undefined || rel === 'alternate') return href
    fallback = fallback ?? href
  }
  return fallback
}

export function extractAtom(body: string, context: ExtractionContext): ExtractionResult {
  const blocks = splitBlocks(body, 'entry')
  if (blocks.length === 0 && !hasTag(body, 'feed')) {
    throw new ParseError(`${context.source}: no Atom markup found`)
  }

  const records: CandidateRecord[] = []
  let skipped = 0

  for (const [index, block] of blocks.entries()) {
    const parsed = parseBlock(block, 'entry')
    if (!parsed.ok) {
      skipped++
      continue
    }

    const entry = parsed.node
    const title = cleanText(stripHtml(textOf(entry.title) ?? ''))
    if (!title) {
      skipped++
      continue
    }

    const description = stripHtml(textOf(entry.summary) ?? textOf(entry.content) ?? '')
    const published = textOf(entry.published) ?? textOf(entry.updated)

    records.push(
      makeRecord(
        {
          kind: context.kind,
          title,
          description: description || undefined,
          start: published ? parseFeedDate(published) : undefined,
          url: absoluteUrl(entryLink(entry), context.url),
        },
        context,
        'atom',
        index
      )
    )
  }

  return { records, skipped }
}
