/**
 * Dataset persistence
 * Swappable between JSON files and Supabase without changing the pipeline
 */

import { randomBytes } from 'crypto'
import { promises as fs } from 'fs'
import path from 'path'
import { z } from 'zod'
import { ConfigError, errorMessage, PersistenceError } from '../core/errors.js'
import type { Dataset } from '../core/types.js'
import { readJson, writeJsonAtomic } from './json-file.js'

export interface DatasetStore {
  /**
   * Persist one run's events, locations and summary. An empty events or
   * locations list keeps the list already stored. Throws PersistenceError.
   */
  write(dataset: Dataset): Promise<void>
}

export const DATASET_FILES = {
  events: 'events.json',
  locations: 'locations.json',
  summary: 'run-summary.json',
} as const

export const DATASET_POINTER = 'current.json'

const GENERATIONS_DIR = 'generations'

const PointerSchema = z.object({ generation: z.string().regex(/^\w[\w.-]*$/), generatedAt: z.string() })

/**
 * Each write goes to a fresh directory under generations/; current.json is
 * switched to it by one rename once every file is on disk. Readers follow
 * the pointer and never see a half-written dataset.
 *
 *   data/current.json                 { "generation": "2025-06-01T08-00-00-000Z-1a2b3c", ... }
 *   data/generations/<id>/events.json
 *   data/generations/<id>/locations.json
 *   data/generations/<id>/run-summary.json
 */
export class JsonDatasetStore implements DatasetStore {
  constructor(private readonly dataDir: string) {}

  /** Directory of the published generation, undefined before the first write */
  async currentGeneration(): Promise<string | undefined> {
    const file = path.join(this.dataDir, DATASET_POINTER)
    const raw = await readJson(file)
    if (raw === undefined) return undefined

    const parsed = PointerSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid dataset pointer ${file}`,
        parsed.error.issues.map(issue => ({ entry: file, message: `${issue.path.join('.') || 'pointer'}: ${issue.message}` }))
      )
    }
    return path.join(this.dataDir, GENERATIONS_DIR, parsed.data.generation)
  }

  async write(dataset: Dataset): Promise<void> {
    const previous = await this.currentGeneration()
    await this.prune(previous)

    const generation = `${dataset.generatedAt.replace(/[:.]/g, '-')}-${randomBytes(3).toString('hex')}`
    const dir = path.join(this.dataDir, GENERATIONS_DIR, generation)

    try {
      if (dataset.events.length === 0 && previous) {
        await this.carryOver(previous, dir, DATASET_FILES.events)
      } else {
        await writeJsonAtomic(path.join(dir, DATASET_FILES.events), {
          generatedAt: dataset.generatedAt,
          count: dataset.events.length,
          events: dataset.events,
        })
      }
      if (dataset.locations.length === 0 && previous) {
        await this.carryOver(previous, dir, DATASET_FILES.locations)
      } else {
        await writeJsonAtomic(path.join(dir, DATASET_FILES.locations), {
          generatedAt: dataset.generatedAt,
          count: dataset.locations.length,
          locations: dataset.locations,
        })
      }
      await writeJsonAtomic(path.join(dir, DATASET_FILES.summary), dataset.summary)
    } catch (error) {
      await fs.rm(dir, { recursive: true, force: true })
      throw error
    }

    await writeJsonAtomic(path.join(this.dataDir, DATASET_POINTER), { generation, generatedAt: dataset.generatedAt })
  }

  /** Copy a file of the previous generation unchanged */
  private async carryOver(previous: string, dir: string, name: string): Promise<void> {
    const target = path.join(dir, name)
    try {
      await fs.mkdir(dir, { recursive: true })
      await fs.copyFile(path.join(previous, name), target)
    } catch (error) {
      throw new PersistenceError(target, `Failed to keep previous ${name}: ${errorMessage(error)}`, error)
    }
  }

  /** Remove every generation except the published one */
  private async prune(keep: string | undefined): Promise<void> {
    const root = path.join(this.dataDir, GENERATIONS_DIR)
    try {
      const entries = await fs.readdir(root).catch((error: unknown) => {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return []
        throw error
      })
      for (const entry of entries) {
        const dir = path.join(root, entry)
        if (dir !== keep) await fs.rm(dir, { recursive: true, force: true })
      }
    } catch (error) {
      throw new PersistenceError(root, `Failed to prune ${root}: ${errorMessage(error)}`, error)
    }
  }
}
