// ESM + NodeNext: include .js on local imports
export {
  AudienceHypothesisSchema,
  BlueprintMetadataSchema,
  BlueprintPreviewSchema,
  BlueprintSchema,
  CampaignBriefSchema,
  CreativeVariationSchema,
  DraftAssetSchema,
  GenerationMethodEnum,
  InsightsSummarySchema,
  MessagingPillarSchema,
  SentimentDistributionSchema,
  ValuePropositionSchema,
} from "./schemas.js";

export type {
  AudienceHypothesis,
  Blueprint,
  BlueprintMetadata,
  BlueprintPreview,
  CampaignBrief,
  CreativeVariation,
  DraftAsset,
  GenerationMethod,
  InsightsSummary,
  MessagingPillar,
  SentimentDistribution,
  ValueProposition,
} from "./schemas.js";

export * as strategist from "./agents/strategist.js";
export type { BlueprintPromptInput } from "./agents/strategist.js";
