// apps/backend/src/db/store.ts
// Persistence seam for the core. The Postgres adapter lives in postgres-store.ts.

import type { Blueprint, CampaignBrief } from '@fieldcraft/prompts'
import type { NewSignal, Platform, Signal } from '../lib/evidence.js'
import type { NewSignalEnrichment, SignalEnrichment } from '../lib/enrichment.js'
import type { JsonRecord } from '../lib/json.js'

export type CampaignRecord = {
  id: string
  workspaceId: string
  name: string
  brief: CampaignBrief
}

export type BlueprintArtifact = {
  id: string
  campaignId: string
  summary: string
  blueprint: Blueprint
  createdAt: Date
}

export type AuditEvent = {
  workspaceId: string
  userId: string
  eventType: string
  source: string
  details: JsonRecord
}

export type SignalAnalysisRecord = {
  id: string
  campaignId: string
  analysisType: string
  status: string
  insights: JsonRecord | null
  createdAt: Date
}

export type StrategicBriefRecord = {
  id: string
  campaignId: string
  content: JsonRecord | null
  createdAt: Date
}

export type SignalListOptions = {
  source?: Platform
  limit?: number
}

export interface FieldcraftStore {
  campaigns: {
    findInWorkspace(campaignId: string, workspaceId: string): Promise<CampaignRecord | null>
  }
  signals: {
    create(input: NewSignal): Promise<Signal>
    /** Relevance-descending. */
    listByRelevance(campaignId: string, options?: SignalListOptions): Promise<Signal[]>
    /** Newest first. */
    listRecent(campaignId: string, limit?: number): Promise<Signal[]>
  }
  enrichments: {
    findSemantic(signalId: string): Promise<SignalEnrichment | null>
    listForSignals(signalIds: string[]): Promise<SignalEnrichment[]>
    /** Null when a semantic enrichment for the signal already exists. */
    create(input: NewSignalEnrichment): Promise<SignalEnrichment | null>
  }
  blueprints: {
    create(input: { campaignId: string; summary: string; blueprint: Blueprint }): Promise<BlueprintArtifact>
    /** Newest first. */
    listForCampaign(campaignId: string, limit: number): Promise<BlueprintArtifact[]>
  }
  auditLogs: {
    create(event: AuditEvent): Promise<void>
  }
  analyses: {
    /** Completed analyses, newest first. */
    listCompleted(campaignId: string, limit: number): Promise<SignalAnalysisRecord[]>
  }
  strategicBriefs: {
    findLatest(campaignId: string): Promise<StrategicBriefRecord | null>
  }
}
