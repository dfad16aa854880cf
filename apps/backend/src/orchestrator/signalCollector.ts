// apps/backend/src/orchestrator/signalCollector.ts
// Runs each platform's default queries through the search client, scores the evidence, stores one signal per query.

import type { CampaignRecord, FieldcraftStore, SignalListOptions } from '../db/store.js';
import { aggregateSignal, PLATFORM_NAMES, type Platform, type Signal } from '../lib/evidence.js';
import { errorMessage, httpError } from '../lib/errors.js';
import type { JsonRecord } from '../lib/json.js';
import { scoreEvidence } from '../lib/relevance.js';
import { SearchApiError, type SearchClient } from '../lib/searchapi.js';
import { PLATFORMS, type PlatformDefinition } from '../lib/signals/platforms.js';
import { createObservability } from './observability.js';

export type CollectSignalsArgs = {
  campaignId: string;
  workspaceId: string;
  userId: string;
  /** Defaults to every platform. */
  platforms?: Platform[];
};

export type CollectionError = { cartridge: string; error: string };

export type CollectionSummary = {
  campaign_id: string;
  cartridges_run: number;
  total_signals: number;
  errors: CollectionError[];
  timestamp: string;
};

export type SignalCollectorDeps = {
  store: FieldcraftStore;
  search: SearchClient;
  maxQueriesPerPlatform?: number;
  now?: () => Date;
};

export function createSignalCollector(deps: SignalCollectorDeps) {
  const { store, search } = deps;
  const maxQueries = deps.maxQueriesPerPlatform ?? 10;
  const now = deps.now ?? (() => new Date());
  const observability = createObservability(store);

  async function runPlatform(definition: PlatformDefinition, campaign: CampaignRecord): Promise<Signal[]> {
    const created: Signal[] = [];
    const queries = definition.defaultQueries(campaign.brief, now()).slice(0, maxQueries);

    for (const query of queries) {
      let raw: JsonRecord;
      try {
        raw = await search.search(definition.engine, definition.buildParams(query));
      } catch (err) {
        if (!(err instanceof SearchApiError)) throw err;
        console.warn(`[signals] query '${query}' on ${definition.cartridge} failed:`, err.message);
        continue;
      }

      const evidence = definition
        .extractEvidence(raw, query)
        .map((item) => ({ ...item, relevance_score: scoreEvidence(item, campaign.brief) }));

      const signal = await store.signals.create(
        aggregateSignal({
          campaignId: campaign.id,
          source: definition.platform,
          searchMethod: definition.cartridge,
          query,
          evidence,
          provenance: {
            collected_at: now().toISOString(),
            engine: definition.engine,
            cartridge: definition.cartridge,
          },
        })
      );
      created.push(signal);
    }
    return created;
  }

  async function collectSignals(args: CollectSignalsArgs): Promise<CollectionSummary> {
    const { campaignId, workspaceId, userId } = args;
    const campaign = await store.campaigns.findInWorkspace(campaignId, workspaceId);
    if (!campaign) throw httpError(404, 'Campaign not found');

    const platforms = args.platforms ?? [...PLATFORM_NAMES];
    const errors: CollectionError[] = [];
    let total = 0;

    for (const platform of platforms) {
      const definition = PLATFORMS[platform];
      try {
        const signals = await runPlatform(definition, campaign);
        total += signals.length;
      } catch (err) {
        console.warn(`[signals] ${definition.cartridge} failed`, err);
        errors.push({ cartridge: definition.cartridge, error: errorMessage(err) });
      }
    }

    const summary: CollectionSummary = {
      campaign_id: campaignId,
      cartridges_run: platforms.length,
      total_signals: total,
      errors,
      timestamp: now().toISOString(),
    };

    await observability.logEvent({
      workspaceId,
      userId,
      eventType: 'signals.collected',
      source: 'signal_orchestrator',
      details: {
        campaign_id: campaignId,
        cartridges_run: summary.cartridges_run,
        total_signals: total,
        error_count: errors.length,
      },
    });

    return summary;
  }

  async function listSignals(campaignId: string, workspaceId: string, options: SignalListOptions = {}): Promise<Signal[]> {
    if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
      throw httpError(400, 'limit must be a positive integer');
    }
    const campaign = await store.campaigns.findInWorkspace(campaignId, workspaceId);
    if (!campaign) throw httpError(404, 'Campaign not found');

    const signals = await store.signals.listByRelevance(campaignId, options);
    if (!signals.length) throw httpError(404, 'No signals found for campaign');
    return signals;
  }

  return { collectSignals, listSignals };
}

export type SignalCollector = ReturnType<typeof createSignalCollector>;
