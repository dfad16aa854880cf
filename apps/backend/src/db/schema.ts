// apps/backend/src/db/schema.ts
import { pgTable, text, doublePrecision, timestamp, jsonb, uuid, index, uniqueIndex } from 'drizzle-orm/pg-core'
import type { Blueprint } from '@fieldcraft/prompts'
import { PLATFORM_NAMES, type Evidence } from '../lib/evidence.js'
import type { EnrichmentFeatures } from '../lib/enrichment.js'

// Campaign rows are owned by the workspace layer; the core only reads them.
export const campaigns = pgTable('campaigns', {
  id: uuid('id').primaryKey().defaultRandom(),
  workspaceId: uuid('workspace_id').notNull(),
  name: text('name').notNull(),
  brief: jsonb('brief').$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp('created_at').notNull().defaultNow(),
})

export const signals = pgTable('signals', {
  id: uuid('id').primaryKey().defaultRandom(),
  campaignId: uuid('campaign_id').notNull().references(() => campaigns.id, { onDelete: 'cascade' }),
  source: text('source', { enum: PLATFORM_NAMES }).notNull(),
  searchMethod: text('search_method').notNull(),
  query: text('query').notNull(),
  evidence: jsonb('evidence').$type<Evidence[]>().notNull().default([]),
  relevanceScore: doublePrecision('relevance_score').notNull().default(0),
  provenance: jsonb('provenance').$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (t) => ({
  campaignRelevanceIdx: index('signals_campaign_relevance_idx').on(t.campaignId, t.relevanceScore),
  campaignCreatedIdx: index('signals_campaign_created_idx').on(t.campaignId, t.createdAt),
}))

export const signalEnrichments = pgTable('signal_enrichments', {
  id: uuid('id').primaryKey().defaultRandom(),
  signalId: uuid('signal_id').notNull().references(() => signals.id, { onDelete: 'cascade' }),
  enrichmentType: text('enrichment_type', { enum: ['semantic'] }).notNull().default('semantic'),
  entities: jsonb('entities').$type<string[]>().notNull().default([]),
  sentiment: doublePrecision('sentiment').notNull().default(0),
  trendScore: doublePrecision('trend_score').notNull().default(0),
  features: jsonb('features').$type<EnrichmentFeatures>().notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (t) => ({
  signalTypeUnique: uniqueIndex('signal_enrichments_signal_type_uq').on(t.signalId, t.enrichmentType),
}))

// Artifacts are append-only: each generation inserts a new row.
export const campaignBlueprints = pgTable('campaign_blueprints', {
  id: uuid('id').primaryKey().defaultRandom(),
  campaignId: uuid('campaign_id').notNull().references(() => campaigns.id, { onDelete: 'cascade' }),
  summary: text('summary').notNull(),
  blueprint: jsonb('blueprint').$type<Blueprint>().notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (t) => ({
  campaignCreatedIdx: index('campaign_blueprints_campaign_created_idx').on(t.campaignId, t.createdAt),
}))

export const auditLogs = pgTable('audit_logs', {
  id: uuid('id').primaryKey().defaultRandom(),
  workspaceId: text('workspace_id').notNull(),
  userId: text('user_id').notNull(),
  eventType: text('event_type').notNull(),
  source: text('source').notNull(),
  details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp('created_at').notNull().defaultNow(),
})

export const signalAnalyses = pgTable('signal_analyses', {
  id: uuid('id').primaryKey().defaultRandom(),
  campaignId: uuid('campaign_id').notNull().references(() => campaigns.id, { onDelete: 'cascade' }),
  analysisType: text('analysis_type').notNull(),
  status: text('status').notNull(),
  insights: jsonb('insights').$type<Record<string, unknown>>(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
})

export const strategicBriefs = pgTable('strategic_briefs', {
  id: uuid('id').primaryKey().defaultRandom(),
  campaignId: uuid('campaign_id').notNull().references(() => campaigns.id, { onDelete: 'cascade' }),
  content: jsonb('content').$type<Record<string, unknown>>(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
})
