import type { CampaignBrief } from '@fieldcraft/prompts'
import type { Evidence, Platform, Signal } from '../../evidence.js'
import type { SignalEnrichment } from '../../enrichment.js'

export const mealKitBrief: CampaignBrief = {
  goal: 'grow signups',
  offer: 'meal kit',
  audiences: ['busy parents'],
  competitors: ['HelloFresh'],
  channels: ['meta'],
  budget_band: '5k-10k',
}

export function makeEvidence(overrides: Partial<Evidence> = {}): Evidence {
  return {
    title: 'HelloFresh meal kit review',
    snippet: 'busy parents love this growth in convenience',
    url: 'https://example.com/review',
    platform: 'meta',
    published_date: null,
    metadata: {},
    relevance_score: 0,
    ...overrides,
  }
}

export function makeSignal(overrides: Partial<Signal> & { id: string }): Signal {
  const source: Platform = overrides.source ?? 'meta'
  return {
    campaignId: 'camp-1',
    source,
    searchMethod: 'meta_ads',
    query: 'meal kit',
    evidence: [makeEvidence({ platform: source })],
    relevanceScore: 0.5,
    provenance: {},
    createdAt: new Date('2026-01-05T10:00:00.000Z'),
    ...overrides,
  }
}

export function makeEnrichment(overrides: Partial<SignalEnrichment> & { id: string; signalId: string }): SignalEnrichment {
  return {
    enrichmentType: 'semantic',
    entities: [],
    sentiment: 0,
    trendScore: 0.5,
    features: {
      avg_snippet_length: 0,
      evidence_count: 0,
      relevance_score: 0.5,
      primary_pain: 'efficiency',
      pain_points: [],
      language_patterns: [],
      key_topics: [],
    },
    createdAt: new Date('2026-01-05T11:00:00.000Z'),
    ...overrides,
  }
}

/** Deterministic UUID v4-shaped ids for tests. */
export function sequentialIds(): () => string {
  let n = 0
  return () => {
    n += 1
    return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`
  }
}
