#!/usr/bin/env tsx
import 'dotenv/config'
import process from 'node:process'
import { closeDb } from '../src/db/client.js'
import { createPostgresStore } from '../src/db/postgres-store.js'
import { getConfig } from '../src/lib/config.js'
import { createBlueprintService } from '../src/orchestrator/blueprintService.js'
import { parseArgs, requireArg } from './cli.js'

const USAGE =
  'usage: generate-blueprint --campaign <id> --workspace <id> [--llm | --no-llm] [--dry-run] [--history] [--user <id>]'

async function main() {
  const args = parseArgs(process.argv.slice(2))
  const campaignId = requireArg(args, 'campaign', USAGE)
  const workspaceId = requireArg(args, 'workspace', USAGE)

  const service = createBlueprintService({ store: createPostgresStore(), config: getConfig() })

  if (args.history) {
    const rows = await service.listBlueprints(campaignId, workspaceId)
    for (const row of rows) console.log(`${row.created_at}  ${row.artifact_id}  ${row.summary}`)
    return
  }

  const useLlm = args.llm ? true : args['no-llm'] ? false : null
  const blueprint = await service.generateBlueprint({
    campaignId,
    workspaceId,
    userId: args.user ?? 'cli',
    persist: !args['dry-run'],
    useLlm,
  })
  console.log(JSON.stringify(blueprint, null, 2))
}

main()
  .then(() => closeDb())
  .catch((err) => {
    console.error('❌ blueprint generation failed:', err instanceof Error ? err.message : err)
    return closeDb().finally(() => process.exit(1))
  })
