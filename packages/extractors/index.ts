/**
 * Extractor selection per declared source format
 */

import type { Outcome, RecordKind, SourceFormat } from '../core/types.js'
import { extractAtom } from './atom.js'
import { hasTag } from './feed.js'
import { extractHtml } from './html.js'
import { extractIcal } from './ical.js'
import { extractJsonLd } from './jsonld.js'
import { extractRss } from './rss.js'
import type { ExtractionContext, ExtractionResult, Extractor, ExtractorKind } from './types.js'

export type { ExtractionContext, ExtractionResult, Extractor, ExtractorKind } from './types.js'

export const EXTRACTORS: Record<ExtractorKind, Extractor> = {
  jsonld: extractJsonLd,
  rss: extractRss,
  atom: extractAtom,
  ical: extractIcal,
  html: extractHtml,
}

export function recordKindOf(format: SourceFormat): RecordKind {
  return format === 'location-directory' ? 'location' : 'event'
}

/** Structured data first; the heuristic only runs when it found nothing */
function structuredThenHeuristic(body: string, context: ExtractionContext): ExtractionResult {
  const structured = EXTRACTORS.jsonld(body, context)
  if (structured.records.length > 0) return structured

  const heuristic = EXTRACTORS.html(body, context)
  return { records: heuristic.records, skipped: structured.skipped + heuristic.skipped }
}

/**
 * Extract candidates from a fetched document.
 * Throws ParseError when the document is not of the declared kind.
 */
export function extractDocument(format: SourceFormat, body: string, context: Omit<ExtractionContext, 'kind'>): ExtractionResult {
  const ctx: ExtractionContext = { ...context, kind: recordKindOf(format) }

  switch (format) {
    case 'html':
    case 'location-directory':
      return structuredThenHeuristic(body, ctx)
    case 'rss':
      return !hasTag(body, 'item') && hasTag(body, 'entry') ? EXTRACTORS.atom(body, ctx) : EXTRACTORS.rss(body, ctx)
    case 'atom':
      return !hasTag(body, 'entry') && hasTag(body, 'item') ? EXTRACTORS.rss(body, ctx) : EXTRACTORS.atom(body, ctx)
    case 'ical':
      return EXTRACTORS.ical(body, ctx)
  }
}

export function outcomeOf(result: ExtractionResult): Outcome {
  if (result.records.length > 0) return { kind: 'success' }
  if (result.skipped === 0) return { kind: 'empty' }
  return { kind: 'parse_error', message: `All ${result.skipped} items were unparseable` }
}
