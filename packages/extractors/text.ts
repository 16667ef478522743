/**
 * Text helpers shared by the extractors
 */

import * as cheerio from 'cheerio'
import type { Coordinates } from '../core/types.js'

export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

export function stripHtml(value: string): string {
  if (!/[<&]/.test(value)) return cleanText(value)
  return cleanText(cheerio.load(spaceBlocks(value), null, false).root().text())
}

/** Put a space after block-level closing tags so text() keeps word boundaries */
export function spaceBlocks(html: string): string {
  return html.replace(/<\/(?:p|div|h[1-6]|li|td|th|dt|dd|time|span|section|article|header|footer|a)>|<br\s*\/?>/gi, '$& ')
}

export function truncate(value: string, limit: number): string {
  return value.length <= limit ? value : `${value.slice(0, limit - 1)}…`
}

export function absoluteUrl(href: string | undefined, base: string): string | undefined {
  if (!href) return undefined
  const trimmed = href.trim()
  if (!trimmed || trimmed.startsWith('javascript:') || trimmed.startsWith('mailto:')) return undefined
  try {
    return new URL(trimmed, base).href
  } catch {
    return undefined
  }
}

/** Finite, in range and not the 0/0 placeholder */
export function toCoordinates(lat: unknown, lon: unknown): Coordinates | undefined {
  const latitude = typeof lat === 'string' ? Number.parseFloat(lat) : lat
  const longitude = typeof lon === 'string' ? Number.parseFloat(lon) : lon
  if (typeof latitude !== 'number' || typeof longitude !== 'number') return undefined
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return undefined
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return undefined
  if (latitude === 0 && longitude === 0) return undefined
  return { lat: latitude, lon: longitude }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Text content of a parsed XML/JSON node: a string, a number or a node with '#text' */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  if (Array.isArray(value)) return textOf(value[0])
  if (isRecord(value)) {
    if ('#text' in value) return textOf(value['#text'])
    if ('val' in value) return textOf(value.val)
  }
  return undefined
}
