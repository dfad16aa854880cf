import { z } from "zod";

const stringList = z.array(z.string());

/** Campaign brief as stored on the campaign row. Missing fields degrade to empty values. */
export const CampaignBriefSchema = z.object({
  goal: z.string().default(""),
  offer: z.string().default(""),
  audiences: stringList.default([]),
  competitors: stringList.default([]),
  channels: stringList.default([]),
  budget_band: z.string().default(""),
  voice_constraints: z.string().nullable().optional(),
});
export type CampaignBrief = z.infer<typeof CampaignBriefSchema>;

export const GenerationMethodEnum = z.enum(["rule_based", "llm"]);
export type GenerationMethod = z.infer<typeof GenerationMethodEnum>;

export const SentimentDistributionSchema = z.object({
  positive: z.number(),
  neutral: z.number(),
  negative: z.number(),
});
export type SentimentDistribution = z.infer<typeof SentimentDistributionSchema>;

export const InsightsSummarySchema = z.object({
  top_entities: stringList,
  trending_topics: stringList,
  sentiment_distribution: SentimentDistributionSchema,
});
export type InsightsSummary = z.infer<typeof InsightsSummarySchema>;

/** One hypothesis per brief audience. List fields may be omitted by a model and default to empty. */
export const AudienceHypothesisSchema = z.object({
  audience: z.string().min(1),
  focus_entities: stringList.default([]),
  pain_points: stringList.default([]),
  language_notes: stringList.default([]),
  supporting_signals: stringList.default([]),
});
export type AudienceHypothesis = z.infer<typeof AudienceHypothesisSchema>;

export const ValuePropositionSchema = z.object({
  statement: z.string().min(1),
  supporting_entities: stringList.default([]),
  trend_score: z.number().nullable().default(null),
  proof_points: stringList.default([]),
});
export type ValueProposition = z.infer<typeof ValuePropositionSchema>;

export const MessagingPillarSchema = z.object({
  pillar: z.string().min(1),
  key_messages: stringList.default([]),
  supporting_urls: stringList.default([]),
  relevance_score: z.number().nullable().default(null),
});
export type MessagingPillar = z.infer<typeof MessagingPillarSchema>;

export const CreativeVariationSchema = z.object({
  headline: z.string().min(1),
  primary_text: z.string().min(1),
  cta: z.string().optional(),
});
export type CreativeVariation = z.infer<typeof CreativeVariationSchema>;

/** Draft ad asset. `variations` always holds at least one entry. */
export const DraftAssetSchema = z.object({
  id: z.string().uuid(),
  platform: z.string().min(1),
  objective: z.string().min(1),
  audience_focus: stringList,
  headline: z.string().min(1),
  primary_text: z.string().min(1),
  cta: z.string().min(1),
  supporting_signals: stringList,
  creative_hooks: stringList,
  variations: z.array(CreativeVariationSchema).min(1),
});
export type DraftAsset = z.infer<typeof DraftAssetSchema>;

export const BlueprintPreviewSchema = z.object({
  summary: z.string(),
  messaging_pillars: z.array(MessagingPillarSchema),
  draft_assets: z.array(
    z.object({
      platform: z.string(),
      headline: z.string(),
      audience_focus: stringList,
    })
  ),
});
export type BlueprintPreview = z.infer<typeof BlueprintPreviewSchema>;

export const BlueprintMetadataSchema = z.object({
  generation_method: GenerationMethodEnum,
  llm_used: z.boolean(),
  tokens_used: z.number().nullable().optional(),
  llm_provider: z.string().nullable().optional(),
  llm_model: z.string().nullable().optional(),
  llm_error: z.string().optional(),
  persisted: z.boolean().optional(),
  rule_based_preview: BlueprintPreviewSchema.optional(),
});
export type BlueprintMetadata = z.infer<typeof BlueprintMetadataSchema>;

/** The synthesized campaign blueprint: the JSON contract consumers rely on. */
export const BlueprintSchema = z.object({
  artifact_id: z.string().nullable(),
  campaign_id: z.string().min(1),
  generated_at: z.string().min(1),
  summary: z.string().min(1),
  insights: InsightsSummarySchema,
  audience_hypotheses: z.array(AudienceHypothesisSchema),
  value_propositions: z.array(ValuePropositionSchema).min(1).max(5),
  messaging_pillars: z.array(MessagingPillarSchema).max(6),
  draft_assets: z.array(DraftAssetSchema).max(6),
  next_actions: stringList,
  metadata: BlueprintMetadataSchema,
});
export type Blueprint = z.infer<typeof BlueprintSchema>;
