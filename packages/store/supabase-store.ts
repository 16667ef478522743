/**
 * Dataset store (Supabase)
 * Upserts events and locations by id; rows keep first_seen across runs
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { PersistenceError } from '../core/errors.js'
import type { Dataset, EnrichedEvent, EnrichedLocation, EnrichedRecord, EventTime } from '../core/types.js'
import type { DatasetStore } from './dataset-store.js'

// Supabase has a limit on batch size
const BATCH_SIZE = 500

type Row = Record<string, unknown>

function timeColumns(prefix: 'start' | 'end', time: EventTime | undefined): Row {
  if (!time) return { [`${prefix}_kind`]: null, [`${prefix}_value`]: null }
  const value = time.kind === 'instant' ? time.iso : time.kind === 'floating' ? time.local : time.kind === 'date' ? time.date : time.text
  return { [`${prefix}_kind`]: time.kind, [`${prefix}_value`]: value }
}

function commonRow(record: EnrichedRecord, seenAt: string): Row {
  return {
    id: record.id,
    source: record.source,
    format: record.format,
    title: record.title,
    kid_name: record.kidName,
    description: record.description ?? null,
    category: record.category,
    min_age: record.minAge ?? null,
    max_age: record.maxAge ?? null,
    location: record.location ?? null,
    address: record.address ?? null,
    lat: record.coordinates?.lat ?? null,
    lon: record.coordinates?.lon ?? null,
    url: record.url ?? null,
    opening_hours: record.openingHours ?? null,
    weather: record.weather,
    energy: record.energy,
    parent_tips: record.parentTips,
    first_seen: seenAt,
    last_seen: seenAt,
  }
}

/**
 * Transform an enriched event to its database row
 */
export function eventToRow(event: EnrichedEvent, seenAt: string): Row {
  return {
    ...commonRow(event, seenAt),
    ...timeColumns('start', event.start),
    ...timeColumns('end', event.end),
  }
}

/**
 * Transform an enriched location to its database row
 */
export function locationToRow(location: EnrichedLocation, seenAt: string): Row {
  return {
    ...commonRow(location, seenAt),
    opening_hours_text: location.openingHoursText ?? null,
    amenities: location.amenities,
    highlights: location.highlights,
  }
}

export class SupabaseDatasetStore implements DatasetStore {
  private client: SupabaseClient

  constructor(url: string, key: string) {
    this.client = createClient(url, key, { auth: { persistSession: false } })
  }

  async write(dataset: Dataset): Promise<void> {
    await this.upsert('events', dataset.events.map(event => eventToRow(event, dataset.generatedAt)))
    await this.upsert('locations', dataset.locations.map(location => locationToRow(location, dataset.generatedAt)))
  }

  private async upsert(table: 'events' | 'locations', rows: Row[]): Promise<void> {
    if (rows.length === 0) {
      return
    }

    // Preserve first_seen for rows that already exist
    const { data: existingRows, error: selectError } = await this.client
      .from(table)
      .select('id, first_seen')
      .in('id', rows.map(row => row.id))

    if (selectError) {
      throw new PersistenceError(table, `Failed to read existing ${table}: ${selectError.message}`, selectError)
    }

    const firstSeen = new Map<unknown, unknown>((existingRows ?? []).map(row => [row.id, row.first_seen]))
    for (const row of rows) {
      if (firstSeen.has(row.id)) {
        row.first_seen = firstSeen.get(row.id)
      }
    }

    for (let i = 0; i < rows.length; i += BATCH_SIZE) {
      const batch = rows.slice(i, i + BATCH_SIZE)

      const { error } = await this.client
        .from(table)
        .upsert(batch, {
          onConflict: 'id'
        })

      if (error) {
        throw new PersistenceError(table, `Failed to upsert ${table} batch: ${error.message}`, error)
      }
    }
  }
}
