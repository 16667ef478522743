/**
 * JSON file helpers with atomic replacement
 */

import { randomBytes } from 'crypto'
import { promises as fs } from 'fs'
import path from 'path'
import { ConfigError, errorMessage, PersistenceError } from '../core/errors.js'

/** Write to a temp file beside the target, then rename over it */
export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  const temp = path.join(path.dirname(file), `.${path.basename(file)}.${randomBytes(6).toString('hex')}.tmp`)

  try {
    await fs.mkdir(path.dirname(file), { recursive: true })
  } catch (error) {
    throw new PersistenceError(file, `Failed to create ${path.dirname(file)}: ${errorMessage(error)}`, error)
  }

  try {
    await fs.writeFile(temp, JSON.stringify(data, null, 2) + '\n', 'utf8')
    await fs.rename(temp, file)
  } catch (error) {
    await fs.rm(temp, { force: true })
    throw new PersistenceError(file, `Failed to write ${file}: ${errorMessage(error)}`, error)
  }
}

/** Parsed file content, or undefined when the file does not exist */
export async function readJson(file: string): Promise<unknown> {
  let raw: string
  try {
    raw = await fs.readFile(file, 'utf8')
  } catch (error) {
    if (isMissing(error)) return undefined
    throw new ConfigError(`Failed to read ${file}: ${errorMessage(error)}`, [], error)
  }

  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${file}`, [{ entry: file, message: errorMessage(error) }], error)
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
