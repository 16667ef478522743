/**
 * Block-wise XML feed parsing
 *
 * Feeds in the wild are often broken somewhere in the middle. Instead of
 * parsing the whole document, each <item>/<entry> block is validated and
 * parsed on its own so one bad entry costs one record.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { isRecord } from './text.js'

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  htmlEntities: true,
})

export type FeedNode = Record<string, unknown>

export type BlockResult =
  | { ok: true; node: FeedNode }
  | { ok: false; reason: string }

/**
 * Cut the document into <item>/<entry> blocks. A block ends at its closing
 * tag or, when that is missing, right before the next opening tag; such an
 * unclosed fragment is returned as is and fails validation on its own.
 */
export function splitBlocks(body: string, tag: 'item' | 'entry'): string[] {
  const opening = new RegExp(`<${tag}(?:\\s[^>]*)?>`, 'gi')
  const closing = new RegExp(`</${tag}\\s*>`, 'i')
  const starts: number[] = []
  for (let match = opening.exec(body); match; match = opening.exec(body)) starts.push(match.index)

  return starts.map((start, index) => {
    const next = starts[index + 1] ?? body.length
    const segment = body.slice(start, next)
    const close = closing.exec(segment)
    return close ? segment.slice(0, close.index + close[0].length) : segment
  })
}

export function hasTag(body: string, tag: string): boolean {
  return new RegExp(`<${tag}(?:[\\s>/])`, 'i').test(body)
}

export function parseBlock(block: string, tag: 'item' | 'entry'): BlockResult {
  const valid = XMLValidator.validate(block)
  if (valid !== true) {
    return { ok: false, reason: valid.err.msg }
  }

  const parsed: unknown = parser.parse(block)
  const node = isRecord(parsed) ? parsed[tag] : undefined
  if (!isRecord(node)) {
    return { ok: false, reason: `empty <${tag}>` }
  }
  return { ok: true, node }
}
