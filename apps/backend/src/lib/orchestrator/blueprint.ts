// apps/backend/src/lib/orchestrator/blueprint.ts
// Deterministic rule-based blueprint. Always built: it is the fallback and the LLM's reference baseline.

import { randomUUID } from 'node:crypto'
import type {
  AudienceHypothesis,
  Blueprint,
  BlueprintPreview,
  CampaignBrief,
  CreativeVariation,
  DraftAsset,
  InsightsSummary,
  MessagingPillar,
  ValueProposition,
} from '@fieldcraft/prompts'
import type { Platform, Signal } from '../evidence.js'
import type { SignalEnrichment } from '../enrichment.js'
import { cleanText, firstNonBlank, keywordsOf, roundTo, topByFrequency, unique } from '../text.js'

export const BLUEPRINT_LIMITS = {
  signals: 75,
  topEntities: 8,
  trendingTopics: 8,
  summarySources: 5,
  supportingSignals: 5,
  focusEntities: 5,
  featureNotes: 6,
  valuePropositions: 5,
  messagingPillars: 6,
  draftAssets: 6,
  headline: 90,
  primaryText: 240,
} as const

const AWARENESS_PLATFORMS: ReadonlySet<Platform> = new Set(['youtube', 'pinterest'])

export type BlueprintCampaign = {
  id: string
  name: string
  brief: CampaignBrief
}

export type RuleBasedInput = {
  campaign: BlueprintCampaign
  /** Relevance-descending. */
  signals: Signal[]
  enrichments: SignalEnrichment[]
  generatedAt: string
  newId?: () => string
}

export function cleanSnippets(signal: Pick<Signal, 'evidence'>): string[] {
  return (signal.evidence ?? []).map((item) => cleanText(item.snippet)).filter(Boolean)
}

function lowerHaystack(signal: Signal): string {
  return [cleanText(signal.query).toLowerCase(), ...signal.evidence.map((e) => cleanText(e.snippet).toLowerCase())].join(' ')
}

export function buildSummary(campaign: BlueprintCampaign, signals: Signal[]): string {
  if (!signals.length) {
    return `No signals collected yet for ${campaign.name}. Run signal collection to populate blueprint.`
  }
  const sources = unique(signals.slice(0, BLUEPRINT_LIMITS.summarySources).map((s) => s.source)).sort()
  const goal = campaign.brief.goal || 'the campaign objective'
  return `Synthesized ${signals.length} signals across ${sources.join(', ')} to accelerate work on ${goal}.`
}

export function buildInsights(signals: Signal[], enrichments: SignalEnrichment[]): InsightsSummary {
  const topEntities = topByFrequency(
    enrichments.flatMap((e) => e.entities),
    BLUEPRINT_LIMITS.topEntities
  )

  const trendingTopics: string[] = []
  const seen = new Set<string>()
  for (const signal of signals) {
    const query = (signal.query ?? '').trim()
    if (query && !seen.has(query.toLowerCase())) {
      trendingTopics.push(query)
      seen.add(query.toLowerCase())
    }
    if (trendingTopics.length >= BLUEPRINT_LIMITS.trendingTopics) break
  }

  const counts = { positive: 0, neutral: 0, negative: 0 }
  for (const enrichment of enrichments) {
    const sentiment = enrichment.sentiment || 0
    if (sentiment > 0.1) counts.positive++
    else if (sentiment < -0.1) counts.negative++
    else counts.neutral++
  }
  const total = counts.positive + counts.neutral + counts.negative || 1

  return {
    top_entities: topEntities,
    trending_topics: trendingTopics,
    sentiment_distribution: {
      positive: roundTo(counts.positive / total, 3),
      neutral: roundTo(counts.neutral / total, 3),
      negative: roundTo(counts.negative / total, 3),
    },
  }
}

function collectFeatureList(enrichments: SignalEnrichment[], key: 'pain_points' | 'language_patterns' | 'key_topics'): string[] {
  return unique(enrichments.flatMap((e) => e.features?.[key] ?? []))
}

export function buildAudienceHypotheses(
  brief: CampaignBrief,
  signals: Signal[],
  enrichments: SignalEnrichment[]
): AudienceHypothesis[] {
  const painPoints = collectFeatureList(enrichments, 'pain_points').slice(0, BLUEPRINT_LIMITS.featureNotes)
  const languageNotes = collectFeatureList(enrichments, 'language_patterns').slice(0, BLUEPRINT_LIMITS.featureNotes)

  return (brief.audiences ?? []).map((audience) => {
    const tokens = keywordsOf(audience)

    const supportingSignals: string[] = []
    for (const signal of signals) {
      const haystack = lowerHaystack(signal)
      if (tokens.some((token) => haystack.includes(token))) supportingSignals.push(signal.id)
      if (supportingSignals.length >= BLUEPRINT_LIMITS.supportingSignals) break
    }

    const focusEntities = unique(
      enrichments.flatMap((e) => e.entities).filter((entity) => tokens.some((token) => entity.toLowerCase().includes(token)))
    ).slice(0, BLUEPRINT_LIMITS.focusEntities)

    return {
      audience,
      focus_entities: focusEntities,
      pain_points: [...painPoints],
      language_notes: [...languageNotes],
      supporting_signals: supportingSignals,
    }
  })
}

export function buildValuePropositions(
  brief: CampaignBrief,
  signals: Signal[],
  enrichments: SignalEnrichment[]
): ValueProposition[] {
  const offer = brief.offer || 'the product'
  const props: ValueProposition[] = enrichments.slice(0, BLUEPRINT_LIMITS.valuePropositions).map((enrichment) => {
    const snippets = signals.filter((s) => s.id === enrichment.signalId).flatMap((s) => cleanSnippets(s).slice(0, 2))
    const proofPoints = [...snippets, ...(enrichment.features?.key_topics ?? []).slice(0, 2)].slice(0, 4)
    return {
      statement: `${offer} addresses ${enrichment.features?.primary_pain || 'key pains'} with evidence-backed messaging.`,
      supporting_entities: enrichment.entities.slice(0, 3),
      trend_score: enrichment.trendScore,
      proof_points: proofPoints,
    }
  })

  if (!props.length) {
    props.push({
      statement: `${offer} delivers measurable outcomes against the campaign goal.`,
      supporting_entities: [],
      trend_score: null,
      proof_points: [],
    })
  }
  return props
}

export function buildMessagingPillars(signals: Signal[]): MessagingPillar[] {
  return signals.slice(0, BLUEPRINT_LIMITS.messagingPillars).map((signal) => ({
    pillar: signal.query,
    key_messages: cleanSnippets(signal).slice(0, 3),
    supporting_urls: signal.evidence.map((e) => e.url).filter(Boolean).slice(0, 4),
    relevance_score: signal.relevanceScore,
  }))
}

export function buildVariations(headline: string, primaryText: string): CreativeVariation[] {
  const truncated = primaryText.length > 200 ? `${primaryText.slice(0, 200)}...` : primaryText
  return [
    { headline, primary_text: primaryText, cta: 'Get Started' },
    {
      headline: `${headline.slice(0, 70)} | Limited Offer`,
      primary_text: `${truncated} Act today to stay ahead.`,
      cta: 'See How',
    },
  ]
}

export function buildDraftAssets(
  signals: Signal[],
  audiences: string[],
  newId: () => string = randomUUID
): DraftAsset[] {
  return signals.slice(0, BLUEPRINT_LIMITS.draftAssets).map((signal) => {
    const id = newId()
    const snippets = cleanSnippets(signal)
    const headline = (
      firstNonBlank(signal.evidence[0]?.title, signal.query) ?? `Campaign Asset ${id.slice(0, 8)}`
    ).slice(0, BLUEPRINT_LIMITS.headline)
    const primaryText = (firstNonBlank(snippets[0], signal.query) ?? headline).slice(0, BLUEPRINT_LIMITS.primaryText)

    const haystack = lowerHaystack(signal)
    const audienceFocus = audiences
      .filter((audience) => keywordsOf(audience).some((token) => haystack.includes(token)))
      .slice(0, 3)

    return {
      id,
      platform: signal.source,
      objective: AWARENESS_PLATFORMS.has(signal.source) ? 'awareness' : 'conversion',
      audience_focus: audienceFocus,
      headline,
      primary_text: primaryText,
      cta: 'Learn More',
      supporting_signals: [signal.id],
      creative_hooks: signal.evidence.slice(0, 3).map((e) => e.title || signal.query),
      variations: buildVariations(headline, primaryText),
    }
  })
}

export function buildNextActions(signals: Signal[], enrichments: SignalEnrichment[]): string[] {
  const actions: string[] = []
  if (!signals.length) {
    actions.push('Run signal collection to gather competitive and audience intelligence.')
  }
  if (!enrichments.length) {
    actions.push('Enrich signals to unlock audience hypotheses and messaging themes.')
  } else {
    actions.push('Review enriched entities to align creative briefs with audience language.')
  }
  actions.push('Select two priority pillars and produce long-form copy drafts.')
  actions.push('Validate asset hooks with stakeholders before export.')
  return actions
}

export function buildRuleBasedBlueprint(input: RuleBasedInput): Blueprint {
  const { campaign, signals, enrichments, generatedAt } = input
  const audienceHypotheses = buildAudienceHypotheses(campaign.brief, signals, enrichments)

  return {
    artifact_id: null,
    campaign_id: campaign.id,
    generated_at: generatedAt,
    summary: buildSummary(campaign, signals),
    insights: buildInsights(signals, enrichments),
    audience_hypotheses: audienceHypotheses,
    value_propositions: buildValuePropositions(campaign.brief, signals, enrichments),
    messaging_pillars: buildMessagingPillars(signals),
    draft_assets: buildDraftAssets(
      signals,
      audienceHypotheses.map((h) => h.audience),
      input.newId
    ),
    next_actions: buildNextActions(signals, enrichments),
    metadata: {
      generation_method: 'rule_based',
      llm_used: false,
    },
  }
}

/** Condensed view of the rule-based result, kept in metadata whichever path wins. */
export function buildRuleBasedPreview(blueprint: Blueprint): BlueprintPreview {
  return {
    summary: blueprint.summary,
    messaging_pillars: structuredClone(blueprint.messaging_pillars.slice(0, 3)),
    draft_assets: blueprint.draft_assets.slice(0, 3).map((asset) => ({
      platform: asset.platform,
      headline: asset.headline,
      audience_focus: [...asset.audience_focus],
    })),
  }
}
