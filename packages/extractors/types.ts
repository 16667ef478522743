/**
 * Extractor contract
 *
 * Extractors are pure functions of (body, context). Per-item problems are
 * counted in `skipped`; a document that is not of the expected kind at all
 * raises ParseError.
 */

import type { CandidateRecord, ExtractionFormat, RecordKind, SourceSelectors } from '../core/types.js'

export type ExtractorKind = ExtractionFormat

export interface ExtractionContext {
  source: string
  /** Final URL of the document, base for relative links */
  url: string
  kind: RecordKind
  selectors?: SourceSelectors
  /** Reference date for dates written without a year */
  reference?: Date
}

export interface ExtractionResult {
  records: CandidateRecord[]
  skipped: number
}

export type Extractor = (body: string, context: ExtractionContext) => ExtractionResult

export type CandidateFields = Omit<CandidateRecord, 'source' | 'format' | 'itemIndex'>

export function makeRecord(
  fields: CandidateFields,
  context: ExtractionContext,
  format: ExtractionFormat,
  itemIndex: number
): CandidateRecord {
  return Object.freeze({ ...fields, source: context.source, format, itemIndex })
}
