// apps/backend/src/orchestrator/enrichmentService.ts
// Enriches a campaign's newest signals. At most one semantic enrichment per signal; existing ones are skipped.

import type { FieldcraftStore } from '../db/store.js';
import { enrichSignal, FEATURE_LIMITS } from '../lib/enrichment.js';
import { httpError } from '../lib/errors.js';
import { createObservability } from './observability.js';

export type EnrichCampaignArgs = {
  campaignId: string;
  workspaceId: string;
  userId: string;
  /** null or 0 means every signal. */
  limit?: number | null;
};

export type EnrichmentSummary = {
  created: number;
  skipped: number;
  processed: number;
};

export type EnrichmentServiceDeps = {
  store: FieldcraftStore;
  now?: () => Date;
};

export function createEnrichmentService(deps: EnrichmentServiceDeps) {
  const { store } = deps;
  const now = deps.now ?? (() => new Date());
  const observability = createObservability(store);

  async function enrichCampaign(args: EnrichCampaignArgs): Promise<EnrichmentSummary> {
    const { campaignId, workspaceId, userId } = args;
    const limit = args.limit ?? null;
    if (limit !== null && (!Number.isInteger(limit) || limit < 0)) {
      throw httpError(400, 'limit must be a non-negative integer');
    }

    const campaign = await store.campaigns.findInWorkspace(campaignId, workspaceId);
    if (!campaign) throw httpError(404, 'Campaign not found');

    const signals = await store.signals.listRecent(campaignId, limit || undefined);

    let created = 0;
    let skipped = 0;
    for (const signal of signals) {
      const existing = await store.enrichments.findSemantic(signal.id);
      if (existing) {
        skipped++;
        continue;
      }
      const result = enrichSignal(signal, { now: now(), patternLimit: FEATURE_LIMITS.languagePatterns });
      // A concurrent run may have stored one since the lookup.
      const stored = await store.enrichments.create({ signalId: signal.id, ...result });
      if (stored) created++;
      else skipped++;
    }

    const summary: EnrichmentSummary = { created, skipped, processed: signals.length };

    await observability.logEvent({
      workspaceId,
      userId,
      eventType: 'signals.enriched',
      source: 'signal_enrichment_service',
      details: { campaign_id: campaignId, ...summary },
    });

    return summary;
  }

  return { enrichCampaign };
}

export type EnrichmentService = ReturnType<typeof createEnrichmentService>;
