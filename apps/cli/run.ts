#!/usr/bin/env node
/**
 * CLI runner
 *
 * Usage:
 *   npm run harvest -- run       one harvest run, prints the summary
 *   npm run harvest -- sources   configured sources with their quality
 *   npm run harvest -- check     fetch every source once and report reachability
 */

import 'dotenv/config'
import path from 'path'
import { loadConfig, type Config } from '../../config.js'
import { ConfigError, errorMessage } from '../../packages/core/errors.js'
import { logger } from '../../packages/core/logger.js'
import type { RunSummary } from '../../packages/core/types.js'
import { loadSources } from '../../packages/config/sources.js'
import { checkSources, type SourceCheck } from '../../packages/orchestrator/check.js'
import { createFetchers, createLimiter, createRuntime } from '../../packages/orchestrator/setup.js'
import { SourceQualityTracker } from '../../packages/quality/tracker.js'
import { JsonStateStore } from '../../packages/store/state-store.js'

const command = process.argv[2]

function usage(): void {
  console.error('Usage: npm run harvest -- <command>')
  console.error('')
  console.error('Commands:')
  console.error('  run      - Harvest all active sources and write the dataset')
  console.error('  sources  - List configured sources with score and exclusion state')
  console.error('  check    - Fetch every source once and report working / blocked / error')
}

function printSummary(summary: RunSummary): void {
  const { sources, items } = summary

  console.log(`\n✨ Run ${summary.cancelled ? 'cancelled' : 'complete'} in ${summary.durationMs}ms`)
  console.log(`  Sources: ${sources.attempted}/${sources.configured} attempted, ${sources.succeeded} ok, ${sources.empty} empty, ${sources.failed} failed, ${sources.timedOut} timed out`)
  if (sources.excluded.length > 0) console.log(`  Excluded: ${sources.excluded.join(', ')}`)
  if (sources.notAttempted.length > 0) console.log(`  Not attempted: ${sources.notAttempted.join(', ')}`)
  console.log(`  Items: ${items.events} events, ${items.locations} locations (${items.manual} curated, ${items.duplicates} duplicates, ${items.dropped} dropped, ${items.geocoded} geocoded)`)

  for (const result of summary.results) {
    if (result.outcome === 'success' || result.outcome === 'empty') continue
    console.log(`  ✗ ${result.source}: ${result.outcome}${result.error ? ` - ${result.error}` : ''}`)
  }
}

async function run(config: Config): Promise<void> {
  const runtime = createRuntime(config)

  // Ctrl-C ends the dispatch early; collected data is still written
  const controller = new AbortController()
  const onSignal = () => controller.abort(new Error('Interrupted'))
  process.once('SIGINT', onSignal)

  try {
    printSummary(await runtime.pipeline.run({ signal: controller.signal }))
  } finally {
    process.off('SIGINT', onSignal)
    await runtime.close()
  }
}

async function listSources(config: Config): Promise<void> {
  const sources = await loadSources(config.sources)
  const state = await new JsonStateStore(path.resolve(config.dataDir)).readQuality()
  const tracker = state === undefined
    ? new SourceQualityTracker(config.quality)
    : SourceQualityTracker.fromJSON(state, config.quality)

  console.log('\n📋 Configured sources:\n')

  for (const source of sources) {
    const quality = tracker.state(source.name)
    const flags = [
      source.enabled ? '' : 'disabled',
      tracker.isExcluded(source.name) ? 'excluded' : '',
      source.transport === 'browser' ? 'browser' : '',
    ].filter(Boolean)

    console.log(`  ${source.name}${flags.length > 0 ? ` [${flags.join(', ')}]` : ''}`)
    console.log(`    ${source.format} ${source.url}`)
    console.log(`    Score: ${tracker.score(source.name).toFixed(2)}, failure streak: ${quality?.consecutiveFailures ?? 0}, last success: ${quality?.lastSuccessAt ?? 'never'}`)
    console.log()
  }

  console.log(`Total: ${sources.length} source(s)`)
}

const CHECK_ICONS: Record<SourceCheck['status'], string> = {
  working: '✅',
  blocked: '🚫',
  error: '❌',
}

async function check(config: Config): Promise<void> {
  const sources = (await loadSources(config.sources)).filter(source => source.enabled)
  const fetchers = createFetchers(config, logger)

  console.log(`\n🧪 Checking ${sources.length} source(s)...\n`)

  try {
    const checks = await checkSources(sources, {
      fetchers,
      transport: config.fetch.transport,
      limiter: createLimiter(config),
      concurrency: config.concurrency,
    })

    for (const result of checks) {
      const detail = result.status === 'working' ? `${result.bytes} bytes` : result.message ?? `HTTP ${result.statusCode}`
      console.log(`  ${CHECK_ICONS[result.status]} ${result.source} - ${detail} (${result.latencyMs}ms)`)
    }

    const count = (status: SourceCheck['status']) => checks.filter(result => result.status === status).length
    console.log(`\n✅ Working: ${count('working')}  🚫 Blocked: ${count('blocked')}  ❌ Error: ${count('error')}`)
  } finally {
    await Promise.all([fetchers.http.close(), fetchers.browser.close()])
  }
}

async function main(): Promise<void> {
  try {
    if (!command) {
      usage()
      process.exit(1)
    }

    const config = loadConfig()

    if (command === 'run') {
      await run(config)
    } else if (command === 'sources') {
      await listSources(config)
    } else if (command === 'check') {
      await check(config)
    } else {
      console.error(`Unknown command: ${command}`)
      usage()
      process.exit(1)
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n❌ ${error.message}`)
    } else {
      console.error('\n❌ Error:', errorMessage(error))
      if (error instanceof Error && error.stack) console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
