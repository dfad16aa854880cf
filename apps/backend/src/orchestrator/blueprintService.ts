// apps/backend/src/orchestrator/blueprintService.ts
// Generates a campaign blueprint: rule-based baseline, optional LLM refinement, optional persistence.
// LLM failures never escape; persistence and audit failures do.

import { randomUUID } from 'node:crypto';
import type { Blueprint, BlueprintMetadata } from '@fieldcraft/prompts';
import type { FieldcraftStore } from '../db/store.js';
import type { AppConfig } from '../lib/config.js';
import type { SignalEnrichment } from '../lib/enrichment.js';
import { errorMessage, httpError } from '../lib/errors.js';
import { createLlmClient, type LlmClient } from '../lib/llm.js';
import { BLUEPRINT_LIMITS, buildRuleBasedBlueprint, buildRuleBasedPreview } from '../lib/orchestrator/blueprint.js';
import { buildLlmContext, requestLlmBlueprint } from '../lib/orchestrator/blueprint-llm.js';
import { normalizeBlueprint } from '../lib/orchestrator/blueprint-normalize.js';
import { createObservability } from './observability.js';

const ANALYSES_LIMIT = 5;

export type GenerateBlueprintArgs = {
  campaignId: string;
  workspaceId: string;
  userId: string;
  persist?: boolean;
  /** null falls back to BLUEPRINT_USE_LLM. */
  useLlm?: boolean | null;
};

export type BlueprintSummary = {
  artifact_id: string;
  campaign_id: string;
  summary: string;
  created_at: string;
};

export type BlueprintServiceDeps = {
  store: FieldcraftStore;
  config: AppConfig;
  /** Resolved only when the LLM path runs. */
  getLlm?: () => LlmClient;
  now?: () => Date;
  newId?: () => string;
};

/** Enrichments of the selected signals, in signal rank order. */
export function orderBySignalRank(signalIds: string[], enrichments: SignalEnrichment[]): SignalEnrichment[] {
  const rank = new Map(signalIds.map((id, i) => [id, i]));
  return enrichments
    .filter((e) => rank.has(e.signalId))
    .map((e, i) => ({ e, i }))
    .sort((a, b) => (rank.get(a.e.signalId) ?? 0) - (rank.get(b.e.signalId) ?? 0) || a.i - b.i)
    .map(({ e }) => e);
}

export function createBlueprintService(deps: BlueprintServiceDeps) {
  const { store, config } = deps;
  const getLlm = deps.getLlm ?? (() => createLlmClient(config));
  const now = deps.now ?? (() => new Date());
  const newId = deps.newId ?? randomUUID;
  const observability = createObservability(store);

  async function generateBlueprint(args: GenerateBlueprintArgs): Promise<Blueprint> {
    const { campaignId, workspaceId, userId } = args;
    const persist = args.persist ?? true;
    const useLlm = args.useLlm ?? config.blueprint.useLlm;

    const record = await store.campaigns.findInWorkspace(campaignId, workspaceId);
    if (!record) throw httpError(404, 'Campaign not found');
    const campaign = { id: record.id, name: record.name, brief: record.brief };

    const signals = await store.signals.listByRelevance(campaignId, { limit: BLUEPRINT_LIMITS.signals });
    const signalIds = signals.map((s) => s.id);
    const enrichments = orderBySignalRank(signalIds, await store.enrichments.listForSignals(signalIds));

    const ruleBased = buildRuleBasedBlueprint({
      campaign,
      signals,
      enrichments,
      generatedAt: now().toISOString(),
      newId,
    });
    const preview = buildRuleBasedPreview(ruleBased);

    let blueprint: Blueprint = ruleBased;
    let metadata: BlueprintMetadata = {
      generation_method: 'rule_based',
      llm_used: false,
      rule_based_preview: preview,
    };

    if (useLlm) {
      try {
        const [analyses, strategicBrief] = await Promise.all([
          store.analyses.listCompleted(campaignId, ANALYSES_LIMIT),
          store.strategicBriefs.findLatest(campaignId),
        ]);
        const { raw, meta } = await requestLlmBlueprint({
          llm: getLlm(),
          context: buildLlmContext({ campaign, signals, enrichments, analyses, strategicBrief }),
          ruleBased,
          maxTokens: config.blueprint.maxTokens,
          temperature: config.blueprint.temperature,
        });
        blueprint = normalizeBlueprint(raw, ruleBased, newId);
        metadata = {
          generation_method: 'llm',
          llm_used: true,
          ...meta,
          rule_based_preview: preview,
        };
      } catch (err) {
        console.warn(`[blueprint] LLM generation failed for campaign ${campaignId}`, err);
        blueprint = ruleBased;
        metadata = { ...metadata, llm_error: errorMessage(err) };
      }
    }

    let result: Blueprint = {
      ...blueprint,
      artifact_id: null,
      campaign_id: campaignId,
      metadata: { ...metadata, persisted: persist },
    };

    let artifactId: string | null = null;
    if (persist) {
      const artifact = await store.blueprints.create({ campaignId, summary: result.summary, blueprint: result });
      artifactId = artifact.id;
      result = { ...result, artifact_id: artifactId };
    }

    await observability.logEvent({
      workspaceId,
      userId,
      eventType: 'campaign.blueprint_generated',
      source: 'campaign_blueprint_service',
      details: {
        campaign_id: campaignId,
        artifact_id: artifactId,
        generation_method: result.metadata.generation_method,
      },
    });

    return result;
  }

  async function listBlueprints(campaignId: string, workspaceId: string, limit = 10): Promise<BlueprintSummary[]> {
    if (!Number.isInteger(limit) || limit < 1) throw httpError(400, 'limit must be a positive integer');
    const record = await store.campaigns.findInWorkspace(campaignId, workspaceId);
    if (!record) throw httpError(404, 'Campaign not found');
    const artifacts = await store.blueprints.listForCampaign(campaignId, limit);
    return artifacts.map((a) => ({
      artifact_id: a.id,
      campaign_id: a.campaignId,
      summary: a.summary,
      created_at: a.createdAt.toISOString(),
    }));
  }

  return { generateBlueprint, listBlueprints };
}

export type BlueprintService = ReturnType<typeof createBlueprintService>;
