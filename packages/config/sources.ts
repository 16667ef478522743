/**
 * Source configuration loader
 *
 * Reads every JSON file matching the configured path or glob. A file holds
 * either an array of descriptors, `{ "sources": [...] }`, or the grouped
 * layout `{ "rss": [url], "ical": [url], "html": [...], "locations": [...] }`.
 * Every invalid entry across all files is reported in one ConfigError.
 */

import { glob } from 'glob'
import path from 'path'
import { z } from 'zod'
import { ConfigError, type ConfigIssue } from '../core/errors.js'
import type { SourceDescriptor, SourceFormat, SourceSelectors } from '../core/types.js'
import { readJson } from '../store/json-file.js'

export const httpUrl = z
  .string()
  .url()
  .regex(/^https?:\/\//i, 'must be an http(s) URL')

const SelectorsSchema = z
  .object({
    item: z.string().min(1),
    title: z.string().min(1),
    date: z.string().min(1),
    description: z.string().min(1),
    link: z.string().min(1),
    name: z.string().min(1),
    address: z.string().min(1),
    hours: z.string().min(1),
  })
  .partial()
  .strict()

const DescriptorSchema = z
  .object({
    name: z.string().trim().min(1),
    url: httpUrl,
    format: z.enum(['html', 'rss', 'atom', 'ical', 'location-directory']),
    categories: z.array(z.string().min(1)).default([]),
    enabled: z.boolean().default(true),
    selectors: SelectorsSchema.optional(),
    transport: z.enum(['http', 'browser']).optional(),
    minIntervalMs: z.number().int().positive().optional(),
  })
  .strict()

const LegacyHtmlEntry = z.union([
  httpUrl.transform(url => ({ url })),
  z.object({
    url: httpUrl,
    name: z.string().min(1).optional(),
    selector: z.string().min(1).optional(),
    title_selector: z.string().min(1).optional(),
    date_selector: z.string().min(1).optional(),
    desc_selector: z.string().min(1).optional(),
    link_selector: z.string().min(1).optional(),
    categories: z.array(z.string()).optional(),
  }),
])

const LegacyLocationEntry = z.union([
  httpUrl.transform(url => ({ url })),
  z.object({
    url: httpUrl,
    name: z.string().min(1).optional(),
    selector: z.string().min(1).optional(),
    name_selector: z.string().min(1).optional(),
    address_selector: z.string().min(1).optional(),
    desc_selector: z.string().min(1).optional(),
    hours_selector: z.string().min(1).optional(),
    categories: z.array(z.string()).optional(),
  }),
])

const GroupedSchema = z.object({
  rss: z.array(z.unknown()).optional(),
  atom: z.array(z.unknown()).optional(),
  ical: z.array(z.unknown()).optional(),
  html: z.array(z.unknown()).optional(),
  locations: z.array(z.unknown()).optional(),
})

/** Name for entries of the grouped layout, which carry only a URL */
export function nameFromUrl(url: string): string {
  const { host, pathname } = new URL(url)
  return `${host}${pathname}`.toLowerCase().replace(/\/+$/, '')
}

function describe(fields: Omit<SourceDescriptor, 'domain'>): SourceDescriptor {
  return { ...fields, domain: new URL(fields.url).host.toLowerCase() }
}

export function issuesOf(error: z.ZodError, entry: string): ConfigIssue[] {
  return error.issues.map(issue => ({
    entry,
    message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  }))
}

function label(file: string, position: string, raw: unknown): string {
  if (typeof raw === 'string') return `${file} ${position} (${raw})`
  if (typeof raw === 'object' && raw !== null) {
    const name = 'name' in raw && typeof raw.name === 'string' ? raw.name : undefined
    const url = 'url' in raw && typeof raw.url === 'string' ? raw.url : undefined
    if (name ?? url) return `${file} ${position} (${name ?? url})`
  }
  return `${file} ${position}`
}

function parseDescriptors(entries: unknown[], file: string, issues: ConfigIssue[]): SourceDescriptor[] {
  const sources: SourceDescriptor[] = []
  entries.forEach((raw, index) => {
    const parsed = DescriptorSchema.safeParse(raw)
    if (parsed.success) sources.push(describe(parsed.data))
    else issues.push(...issuesOf(parsed.error, label(file, `#${index}`, raw)))
  })
  return sources
}

interface LegacyEntry {
  url: string
  name?: string
  categories?: string[]
  selector?: string
  title_selector?: string
  date_selector?: string
  desc_selector?: string
  link_selector?: string
  name_selector?: string
  address_selector?: string
  hours_selector?: string
}

function legacyDescriptor(entry: LegacyEntry, format: SourceFormat, selectors: SourceSelectors): SourceDescriptor {
  return describe({
    name: entry.name ?? nameFromUrl(entry.url),
    url: entry.url,
    format,
    categories: entry.categories ?? [],
    enabled: true,
    ...(Object.values(selectors).some(Boolean) ? { selectors } : {}),
  })
}

function parseGrouped(grouped: z.infer<typeof GroupedSchema>, file: string, issues: ConfigIssue[]): SourceDescriptor[] {
  const sources: SourceDescriptor[] = []

  const feeds: [SourceFormat, unknown[] | undefined][] = [
    ['rss', grouped.rss],
    ['atom', grouped.atom],
    ['ical', grouped.ical],
  ]
  for (const [format, entries] of feeds) {
    entries?.forEach((raw, index) => {
      const parsed = httpUrl.safeParse(raw)
      if (parsed.success) {
        sources.push(describe({ name: nameFromUrl(parsed.data), url: parsed.data, format, categories: [], enabled: true }))
      } else {
        issues.push(...issuesOf(parsed.error, label(file, `${format}[${index}]`, raw)))
      }
    })
  }

  grouped.html?.forEach((raw, index) => {
    const parsed = LegacyHtmlEntry.safeParse(raw)
    if (!parsed.success) {
      issues.push(...issuesOf(parsed.error, label(file, `html[${index}]`, raw)))
      return
    }
    const entry: LegacyEntry = parsed.data
    sources.push(
      legacyDescriptor(entry, 'html', {
        item: entry.selector,
        title: entry.title_selector,
        date: entry.date_selector,
        description: entry.desc_selector,
        link: entry.link_selector,
      })
    )
  })

  grouped.locations?.forEach((raw, index) => {
    const parsed = LegacyLocationEntry.safeParse(raw)
    if (!parsed.success) {
      issues.push(...issuesOf(parsed.error, label(file, `locations[${index}]`, raw)))
      return
    }
    const entry: LegacyEntry = parsed.data
    sources.push(
      legacyDescriptor(entry, 'location-directory', {
        item: entry.selector,
        name: entry.name_selector,
        address: entry.address_selector,
        description: entry.desc_selector,
        hours: entry.hours_selector,
      })
    )
  })

  return sources
}

/**
 * Parse the content of one configuration file.
 * Problems are appended to `issues`; valid entries are returned.
 */
export function parseSourceFile(raw: unknown, file: string, issues: ConfigIssue[]): SourceDescriptor[] {
  if (Array.isArray(raw)) return parseDescriptors(raw, file, issues)

  if (typeof raw === 'object' && raw !== null && 'sources' in raw) {
    if (Array.isArray(raw.sources)) return parseDescriptors(raw.sources, file, issues)
    issues.push({ entry: file, message: '"sources" must be an array' })
    return []
  }

  const grouped = GroupedSchema.strict().safeParse(raw)
  if (grouped.success) return parseGrouped(grouped.data, file, issues)

  issues.push({
    entry: file,
    message: 'expected an array of sources, { "sources": [...] } or { "rss", "atom", "ical", "html", "locations" }',
  })
  return []
}

/** Check a merged source list for duplicate names */
export function validateSources(sources: SourceDescriptor[], issues: ConfigIssue[]): void {
  const seen = new Set<string>()
  for (const source of sources) {
    if (seen.has(source.name)) issues.push({ entry: source.name, message: 'duplicate source name' })
    seen.add(source.name)
  }
}

/**
 * Load and validate all source descriptors matching a path or glob pattern.
 * Throws ConfigError listing every offending entry.
 */
export async function loadSources(pattern: string, cwd: string = process.cwd()): Promise<SourceDescriptor[]> {
  const files = (await glob(pattern, { cwd, absolute: true, nodir: true })).sort()
  if (files.length === 0) {
    throw new ConfigError(`No source configuration matches ${pattern}`, [{ entry: pattern, message: 'no such file' }])
  }

  const issues: ConfigIssue[] = []
  const sources: SourceDescriptor[] = []

  for (const file of files) {
    const raw = await readJson(file)
    sources.push(...parseSourceFile(raw, path.relative(cwd, file) || file, issues))
  }
  validateSources(sources, issues)
  if (issues.length === 0 && !sources.some(source => source.enabled)) {
    issues.push({ entry: pattern, message: sources.length === 0 ? 'no sources configured' : 'every source is disabled' })
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid source configuration (${issues.length} problem${issues.length === 1 ? '' : 's'})`, issues)
  }
  return sources
}
