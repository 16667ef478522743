import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import { ConfigError, type ConfigIssue } from '../core/errors.js'
import { loadManualEvents, parseManualEvents } from './manual-events.js'

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'harvester-manual-'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

describe('parseManualEvents', () => {
  it('reads record-shaped entries', () => {
    const issues: ConfigIssue[] = []
    const records = parseManualEvents(
      [
        {
          title: 'Sommerfest im Westpark',
          start: '2025-07-12T14:00:00+02:00',
          address: 'Westendstraße 305, München',
          categories: ['outdoor'],
        },
      ],
      'manual_events.json',
      issues
    )

    expect(issues).toEqual([])
    expect(records).toEqual([
      {
        kind: 'event',
        title: 'Sommerfest im Westpark',
        start: { kind: 'instant', iso: '2025-07-12T12:00:00.000Z' },
        address: 'Westendstraße 305, München',
        categories: ['outdoor'],
        source: 'manual',
        format: 'manual',
        itemIndex: 0,
      },
    ])
  })

  it('reads the display layout with name, date and time range', () => {
    const issues: ConfigIssue[] = []
    const records = parseManualEvents(
      {
        events: [
          {
            name: 'Winterfest im Tierpark',
            nameKids: 'Winter-Party bei den Tieren',
            date: '2025-12-06',
            time: '10:00-16:00',
            category: 'tierpark',
            link: 'https://tierpark.example/winterfest',
            gps: { lat: 48.0986, lon: 11.5583 },
          },
          { name: 'Laternenumzug', date: '2025-11-11' },
        ],
      },
      'manual_events.json',
      issues
    )

    expect(issues).toEqual([])
    expect(records).toEqual([
      {
        kind: 'event',
        title: 'Winterfest im Tierpark',
        start: { kind: 'floating', local: '2025-12-06T10:00:00' },
        end: { kind: 'floating', local: '2025-12-06T16:00:00' },
        url: 'https://tierpark.example/winterfest',
        categories: ['tierpark'],
        coordinates: { lat: 48.0986, lon: 11.5583 },
        source: 'manual',
        format: 'manual',
        itemIndex: 0,
      },
      {
        kind: 'event',
        title: 'Laternenumzug',
        start: { kind: 'date', date: '2025-11-11' },
        source: 'manual',
        format: 'manual',
        itemIndex: 1,
      },
    ])
  })

  it('reports every invalid entry', () => {
    const issues: ConfigIssue[] = []
    const records = parseManualEvents(
      [
        { title: 'Ohne Datum' },
        { title: 'Falsches Datum', start: '31.02.2025' },
        { name: 'Kein Kalendertag', date: '2025-02-30' },
        { title: 'Gut', start: '2025-05-01' },
      ],
      'manual_events.json',
      issues
    )

    expect(records.map(record => record.title)).toEqual(['Gut'])
    expect(issues.map(issue => issue.entry)).toEqual([
      'manual_events.json #0',
      'manual_events.json #1',
      'manual_events.json #2',
    ])
  })

  it('rejects files of another shape', () => {
    const issues: ConfigIssue[] = []
    expect(parseManualEvents({ termine: [] }, 'manual_events.json', issues)).toEqual([])
    expect(issues).toEqual([{ entry: 'manual_events.json', message: 'expected an array of events or { "events": [...] }' }])
  })
})

describe('loadManualEvents', () => {
  it('treats a missing file as no curated events', async () => {
    expect(await loadManualEvents('manual_events.json', dir)).toEqual([])
  })

  it('raises ConfigError for invalid entries', async () => {
    await fs.writeFile(path.join(dir, 'manual_events.json'), JSON.stringify({ events: [{ title: '' }] }))

    const error = await loadManualEvents('manual_events.json', dir).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ConfigError)
    if (error instanceof ConfigError) {
      expect(error.issues.every(issue => issue.entry === 'manual_events.json #0')).toBe(true)
    }
  })
})
