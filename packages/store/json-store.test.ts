import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import { ConfigError, PersistenceError } from '../core/errors.js'
import { readJson, writeJsonAtomic } from './json-file.js'
import { JsonStateStore } from './state-store.js'

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'harvester-store-'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

describe('writeJsonAtomic', () => {
  it('replaces the target and leaves no temp files', async () => {
    const file = path.join(dir, 'nested', 'state.json')
    await writeJsonAtomic(file, { version: 1 })
    await writeJsonAtomic(file, { version: 2 })

    expect(await readJson(file)).toEqual({ version: 2 })
    expect(await fs.readdir(path.dirname(file))).toEqual(['state.json'])
  })

  it('raises PersistenceError when the target cannot be written', async () => {
    const blocker = path.join(dir, 'file')
    await fs.writeFile(blocker, 'x')

    await expect(writeJsonAtomic(path.join(blocker, 'out.json'), {})).rejects.toBeInstanceOf(PersistenceError)
  })
})

describe('readJson', () => {
  it('returns undefined for missing files', async () => {
    expect(await readJson(path.join(dir, 'missing.json'))).toBeUndefined()
  })

  it('raises ConfigError for invalid JSON', async () => {
    const file = path.join(dir, 'broken.json')
    await fs.writeFile(file, '{ nope')
    await expect(readJson(file)).rejects.toBeInstanceOf(ConfigError)
  })
})

describe('JsonStateStore', () => {
  it('starts empty and keeps unresolvable markers across a reload', async () => {
    const store = new JsonStateStore(dir)
    expect(await store.readGeocodeCache()).toEqual({})

    const entries = {
      'marienplatz 1': { status: 'resolved' as const, lat: 48.137, lon: 11.575, resolvedAt: '2025-06-01T00:00:00.000Z' },
      'nirgendwo 0': { status: 'unresolvable' as const, reason: 'not_found' as const, resolvedAt: '2025-06-01T00:00:00.000Z' },
    }
    await store.writeGeocodeCache(entries)

    expect(await new JsonStateStore(dir).readGeocodeCache()).toEqual(entries)
  })

  it('rejects a geocode cache with unknown entries', async () => {
    await fs.writeFile(path.join(dir, 'geocode-cache.json'), JSON.stringify({ a: { status: 'maybe' } }))
    await expect(new JsonStateStore(dir).readGeocodeCache()).rejects.toBeInstanceOf(ConfigError)
  })

  it('stores the quality snapshot as written', async () => {
    const store = new JsonStateStore(dir)
    expect(await store.readQuality()).toBeUndefined()

    const snapshot = {
      version: 1 as const,
      sources: {
        bib: {
          window: ['success' as const],
          totalAttempts: 1,
          lastSuccessAt: null,
          consecutiveFailures: 0,
          skippedRuns: 0,
          itemsExtracted: 2,
        },
      },
    }
    await store.writeQuality(snapshot)
    expect(await store.readQuality()).toEqual(snapshot)
  })
})
