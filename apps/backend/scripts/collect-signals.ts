#!/usr/bin/env tsx
import 'dotenv/config'
import process from 'node:process'
import { closeDb } from '../src/db/client.js'
import { createPostgresStore } from '../src/db/postgres-store.js'
import { getConfig } from '../src/lib/config.js'
import { isPlatform, type Platform } from '../src/lib/evidence.js'
import { SearchApiClient } from '../src/lib/searchapi.js'
import { createSignalCollector } from '../src/orchestrator/signalCollector.js'
import { parseArgs, requireArg } from './cli.js'

const USAGE = 'usage: collect-signals --campaign <id> --workspace <id> [--platforms google,meta] [--user <id>]'

async function main() {
  const args = parseArgs(process.argv.slice(2))
  const campaignId = requireArg(args, 'campaign', USAGE)
  const workspaceId = requireArg(args, 'workspace', USAGE)

  let platforms: Platform[] | undefined
  if (args.platforms) {
    const names = args.platforms.split(',').map((p) => p.trim().toLowerCase()).filter(Boolean)
    const unknown = names.filter((n) => !isPlatform(n))
    if (unknown.length) console.warn(`[signals] ignoring unknown platforms: ${unknown.join(', ')}`)
    platforms = names.filter(isPlatform)
  }

  const config = getConfig()
  if (!config.searchApi.apiKey) throw new Error('SEARCHAPI_KEY not configured')
  const search = new SearchApiClient({
    apiKey: config.searchApi.apiKey,
    minRequestIntervalMs: config.searchApi.minRequestIntervalMs,
    trace: config.trace,
  })

  const collector = createSignalCollector({
    store: createPostgresStore(),
    search,
    maxQueriesPerPlatform: config.signals.maxQueriesPerPlatform,
  })
  const summary = await collector.collectSignals({ campaignId, workspaceId, userId: args.user ?? 'cli', platforms })
  console.log(JSON.stringify(summary, null, 2))
}

main()
  .then(() => closeDb())
  .catch((err) => {
    console.error('❌ signal collection failed:', err instanceof Error ? err.message : err)
    return closeDb().finally(() => process.exit(1))
  })
