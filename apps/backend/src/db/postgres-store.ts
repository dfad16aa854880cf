// apps/backend/src/db/postgres-store.ts
// FieldcraftStore over drizzle + postgres.js.

import { and, desc, eq, inArray } from 'drizzle-orm'
import { z } from 'zod'
import { CampaignBriefSchema } from '@fieldcraft/prompts'
import type { Signal } from '../lib/evidence.js'
import type { SignalEnrichment } from '../lib/enrichment.js'
import { withDb } from '../util/withDb.js'
import { getDb, type Database } from './client.js'
import {
  auditLogs,
  campaignBlueprints,
  campaigns,
  signalAnalyses,
  signalEnrichments,
  signals,
  strategicBriefs,
} from './schema.js'
import type { FieldcraftStore } from './store.js'

const UuidSchema = z.string().uuid()

type SignalRow = typeof signals.$inferSelect
type EnrichmentRow = typeof signalEnrichments.$inferSelect

function toSignal(row: SignalRow): Signal {
  return {
    id: row.id,
    campaignId: row.campaignId,
    source: row.source,
    searchMethod: row.searchMethod,
    query: row.query,
    evidence: row.evidence,
    relevanceScore: row.relevanceScore,
    provenance: row.provenance,
    createdAt: row.createdAt,
  }
}

function toEnrichment(row: EnrichmentRow): SignalEnrichment {
  return {
    id: row.id,
    signalId: row.signalId,
    enrichmentType: row.enrichmentType,
    entities: row.entities,
    sentiment: row.sentiment,
    trendScore: row.trendScore,
    features: row.features,
    createdAt: row.createdAt,
  }
}

function firstRow<T>(rows: T[], what: string): T {
  const [row] = rows
  if (!row) throw new Error(`${what} insert returned no row`)
  return row
}

export function createPostgresStore(db: Database = getDb()): FieldcraftStore {
  return {
    campaigns: {
      async findInWorkspace(campaignId, workspaceId) {
        // Both columns are uuid; anything else cannot match and would fail the cast.
        if (!UuidSchema.safeParse(campaignId).success || !UuidSchema.safeParse(workspaceId).success) return null
        const rows = await withDb(async () =>
          db
            .select()
            .from(campaigns)
            .where(and(eq(campaigns.id, campaignId), eq(campaigns.workspaceId, workspaceId)))
            .limit(1)
        )
        const row = rows[0]
        if (!row) return null
        return { id: row.id, workspaceId: row.workspaceId, name: row.name, brief: CampaignBriefSchema.parse(row.brief) }
      },
    },

    signals: {
      async create(input) {
        const rows = await db.insert(signals).values(input).returning()
        return toSignal(firstRow(rows, 'Signal'))
      },
      async listByRelevance(campaignId, options = {}) {
        const conditions = [eq(signals.campaignId, campaignId)]
        if (options.source) conditions.push(eq(signals.source, options.source))
        const query = db
          .select()
          .from(signals)
          .where(and(...conditions))
          .orderBy(desc(signals.relevanceScore), desc(signals.createdAt))
          .$dynamic()
        const rows = await withDb(async () => (options.limit ? await query.limit(options.limit) : await query))
        return rows.map(toSignal)
      },
      async listRecent(campaignId, limit) {
        const query = db
          .select()
          .from(signals)
          .where(eq(signals.campaignId, campaignId))
          .orderBy(desc(signals.createdAt))
          .$dynamic()
        const rows = await withDb(async () => (limit ? await query.limit(limit) : await query))
        return rows.map(toSignal)
      },
    },

    enrichments: {
      async findSemantic(signalId) {
        const rows = await withDb(async () =>
          db
            .select()
            .from(signalEnrichments)
            .where(and(eq(signalEnrichments.signalId, signalId), eq(signalEnrichments.enrichmentType, 'semantic')))
            .limit(1)
        )
        return rows[0] ? toEnrichment(rows[0]) : null
      },
      async listForSignals(signalIds) {
        if (!signalIds.length) return []
        const rows = await withDb(async () =>
          db.select().from(signalEnrichments).where(inArray(signalEnrichments.signalId, signalIds))
        )
        return rows.map(toEnrichment)
      },
      async create(input) {
        const rows = await db
          .insert(signalEnrichments)
          .values(input)
          .onConflictDoNothing({ target: [signalEnrichments.signalId, signalEnrichments.enrichmentType] })
          .returning()
        return rows[0] ? toEnrichment(rows[0]) : null
      },
    },

    blueprints: {
      async create(input) {
        const rows = await db.insert(campaignBlueprints).values(input).returning()
        return firstRow(rows, 'Blueprint')
      },
      async listForCampaign(campaignId, limit) {
        return withDb(async () =>
          db
            .select()
            .from(campaignBlueprints)
            .where(eq(campaignBlueprints.campaignId, campaignId))
            .orderBy(desc(campaignBlueprints.createdAt))
            .limit(limit)
        )
      },
    },

    auditLogs: {
      async create(event) {
        await db.insert(auditLogs).values(event)
      },
    },

    analyses: {
      async listCompleted(campaignId, limit) {
        return withDb(async () =>
          db
            .select()
            .from(signalAnalyses)
            .where(and(eq(signalAnalyses.campaignId, campaignId), eq(signalAnalyses.status, 'completed')))
            .orderBy(desc(signalAnalyses.createdAt))
            .limit(limit)
        )
      },
    },

    strategicBriefs: {
      async findLatest(campaignId) {
        const rows = await withDb(async () =>
          db
            .select()
            .from(strategicBriefs)
            .where(eq(strategicBriefs.campaignId, campaignId))
            .orderBy(desc(strategicBriefs.createdAt))
            .limit(1)
        )
        return rows[0] ?? null
      },
    },
  }
}
