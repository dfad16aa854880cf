// apps/backend/src/lib/orchestrator/blueprint-normalize.ts
// Merges model output over the rule-based blueprint so the result always satisfies BlueprintSchema.
// Anything malformed is dropped field by field in favour of the rule-based value.

import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import {
  AudienceHypothesisSchema,
  CreativeVariationSchema,
  DraftAssetSchema,
  MessagingPillarSchema,
  SentimentDistributionSchema,
  ValuePropositionSchema,
  type Blueprint,
  type CreativeVariation,
  type DraftAsset,
  type InsightsSummary,
} from '@fieldcraft/prompts'
import { asArray, asRecord, isRecord, type JsonRecord } from '../json.js'
import { BLUEPRINT_LIMITS } from './blueprint.js'

const StringListSchema = z.array(z.string())
const UuidSchema = z.string().uuid()
const DEFAULT_CTA = 'Learn More'
const DISTRIBUTION_TOLERANCE = 0.001

// Fractions must each lie in [0, 1] and sum to 1 within rounding.
const DistributionOverrideSchema = SentimentDistributionSchema.refine(
  ({ positive, neutral, negative }) =>
    [positive, neutral, negative].every((v) => v >= 0 && v <= 1) &&
    Math.abs(positive + neutral + negative - 1) <= DISTRIBUTION_TOLERANCE
)

function nonBlank(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length ? value : null
}

export function mergeInsights(base: InsightsSummary, override: unknown): InsightsSummary {
  if (!isRecord(override)) return structuredClone(base)
  const entities = StringListSchema.safeParse(override.top_entities)
  const topics = StringListSchema.safeParse(override.trending_topics)
  const sentiment = DistributionOverrideSchema.safeParse(override.sentiment_distribution)
  return {
    top_entities: entities.success ? entities.data : [...base.top_entities],
    trending_topics: topics.success ? topics.data : [...base.trending_topics],
    sentiment_distribution: sentiment.success ? sentiment.data : { ...base.sentiment_distribution },
  }
}

/**
 * Items that fail `schema` are dropped. An absent, empty or fully invalid list falls back.
 */
export function normalizeList<T>(value: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T[], max?: number): T[] {
  if (!Array.isArray(value)) return structuredClone(fallback)
  const valid: T[] = []
  for (const item of value) {
    if (!isRecord(item)) continue
    const parsed = schema.safeParse(item)
    if (parsed.success) valid.push(parsed.data)
  }
  if (!valid.length) return structuredClone(fallback)
  return max === undefined ? valid : valid.slice(0, max)
}

function normalizeVariations(value: unknown): CreativeVariation[] {
  const variations: CreativeVariation[] = []
  for (const item of asArray(value)) {
    const parsed = CreativeVariationSchema.safeParse(item)
    if (parsed.success) variations.push(parsed.data)
  }
  return variations
}

function normalizeAsset(asset: JsonRecord, newId: () => string): DraftAsset | null {
  const id = UuidSchema.safeParse(asset.id)
  const cta = nonBlank(asset.cta) ?? DEFAULT_CTA
  let variations = normalizeVariations(asset.variations)
  if (!variations.length) {
    variations = normalizeVariations([{ headline: asset.headline, primary_text: asset.primary_text, cta }])
  }
  const parsed = DraftAssetSchema.safeParse({
    ...asset,
    id: id.success ? id.data : newId(),
    cta,
    audience_focus: asset.audience_focus ?? [],
    supporting_signals: asset.supporting_signals ?? [],
    creative_hooks: asset.creative_hooks ?? [],
    variations,
  })
  return parsed.success ? parsed.data : null
}

export function normalizeAssets(value: unknown, fallback: DraftAsset[], newId: () => string = randomUUID): DraftAsset[] {
  const normalized: DraftAsset[] = []
  for (const item of asArray(value)) {
    if (!isRecord(item)) continue
    const asset = normalizeAsset(item, newId)
    if (asset) normalized.push(asset)
  }
  if (!normalized.length) return structuredClone(fallback)
  return normalized.slice(0, BLUEPRINT_LIMITS.draftAssets)
}

/**
 * Shapes raw model output into a Blueprint, using `fallback` wherever the output is missing or malformed.
 * Model-supplied metadata and unknown keys are ignored; the caller stamps metadata.
 */
export function normalizeBlueprint(raw: unknown, fallback: Blueprint, newId: () => string = randomUUID): Blueprint {
  const llm = asRecord(raw)
  const nextActions = Array.isArray(llm.next_actions)
    ? llm.next_actions.filter((item): item is string => typeof item === 'string')
    : [...fallback.next_actions]

  return {
    artifact_id: null,
    campaign_id: fallback.campaign_id,
    generated_at: nonBlank(llm.generated_at) ?? fallback.generated_at,
    summary: nonBlank(llm.summary) ?? fallback.summary,
    insights: mergeInsights(fallback.insights, llm.insights),
    audience_hypotheses: normalizeList(llm.audience_hypotheses, AudienceHypothesisSchema, fallback.audience_hypotheses),
    value_propositions: normalizeList(
      llm.value_propositions,
      ValuePropositionSchema,
      fallback.value_propositions,
      BLUEPRINT_LIMITS.valuePropositions
    ),
    messaging_pillars: normalizeList(
      llm.messaging_pillars,
      MessagingPillarSchema,
      fallback.messaging_pillars,
      BLUEPRINT_LIMITS.messagingPillars
    ),
    draft_assets: normalizeAssets(llm.draft_assets, fallback.draft_assets, newId),
    next_actions: nextActions,
    metadata: { ...fallback.metadata },
  }
}
