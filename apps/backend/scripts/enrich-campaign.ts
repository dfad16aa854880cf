#!/usr/bin/env tsx
import 'dotenv/config'
import process from 'node:process'
import { closeDb } from '../src/db/client.js'
import { createPostgresStore } from '../src/db/postgres-store.js'
import { createEnrichmentService } from '../src/orchestrator/enrichmentService.js'
import { optionalInt, parseArgs, requireArg } from './cli.js'

const USAGE = 'usage: enrich-campaign --campaign <id> --workspace <id> [--limit <n>] [--user <id>]'

async function main() {
  const args = parseArgs(process.argv.slice(2))
  const campaignId = requireArg(args, 'campaign', USAGE)
  const workspaceId = requireArg(args, 'workspace', USAGE)

  const service = createEnrichmentService({ store: createPostgresStore() })
  const summary = await service.enrichCampaign({
    campaignId,
    workspaceId,
    userId: args.user ?? 'cli',
    limit: optionalInt(args, 'limit'),
  })
  console.log(`created=${summary.created} skipped=${summary.skipped} processed=${summary.processed}`)
}

main()
  .then(() => closeDb())
  .catch((err) => {
    console.error('❌ enrichment failed:', err instanceof Error ? err.message : err)
    return closeDb().finally(() => process.exit(1))
  })
