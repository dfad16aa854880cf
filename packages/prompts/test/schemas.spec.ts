import { describe, it, expect } from "vitest";
import {
  BlueprintSchema,
  CampaignBriefSchema,
  DraftAssetSchema,
  ValuePropositionSchema,
  strategist,
} from "../src/index.js";

const asset = {
  id: "6f1c1c53-52a4-4c8e-9d0a-3b5e7f0c2a11",
  platform: "meta",
  objective: "conversion",
  audience_focus: ["busy parents"],
  headline: "Dinner sorted in 15 minutes",
  primary_text: "Pre-portioned ingredients delivered weekly.",
  cta: "Learn More",
  supporting_signals: ["sig-1"],
  creative_hooks: ["Dinner sorted"],
  variations: [
    { headline: "Dinner sorted in 15 minutes", primary_text: "Pre-portioned ingredients delivered weekly.", cta: "Get Started" },
  ],
};

describe("CampaignBriefSchema", () => {
  it("fills missing brief fields with empty values", () => {
    const parsed = CampaignBriefSchema.parse({ goal: "grow signups", audiences: ["busy parents"] });
    expect(parsed).toEqual({
      goal: "grow signups",
      offer: "",
      audiences: ["busy parents"],
      competitors: [],
      channels: [],
      budget_band: "",
    });
  });

  it("rejects a non-list audience field", () => {
    const parsed = CampaignBriefSchema.safeParse({ audiences: "busy parents" });
    expect(parsed.success).toBe(false);
  });
});

describe("DraftAssetSchema", () => {
  it("parses a complete draft asset", () => {
    expect(DraftAssetSchema.safeParse(asset).success).toBe(true);
  });

  it("rejects assets without variations or with a non-uuid id", () => {
    expect(DraftAssetSchema.safeParse({ ...asset, variations: [] }).success).toBe(false);
    expect(DraftAssetSchema.safeParse({ ...asset, id: "asset-1" }).success).toBe(false);
  });
});

describe("ValuePropositionSchema", () => {
  it("defaults omitted list fields and trend score", () => {
    const parsed = ValuePropositionSchema.parse({ statement: "Meal kits that save an hour a night." });
    expect(parsed).toEqual({
      statement: "Meal kits that save an hour a night.",
      supporting_entities: [],
      trend_score: null,
      proof_points: [],
    });
  });
});

describe("BlueprintSchema", () => {
  const blueprint = {
    artifact_id: null,
    campaign_id: "camp-1",
    generated_at: "2026-01-05T10:00:00.000Z",
    summary: "Synthesized 1 signals across meta to accelerate work on grow signups.",
    insights: {
      top_entities: ["HelloFresh"],
      trending_topics: ["meal kit"],
      sentiment_distribution: { positive: 1, neutral: 0, negative: 0 },
    },
    audience_hypotheses: [],
    value_propositions: [{ statement: "meal kit delivers measurable outcomes against the campaign goal." }],
    messaging_pillars: [],
    draft_assets: [asset],
    next_actions: ["Validate asset hooks with stakeholders before export."],
    metadata: { generation_method: "rule_based", llm_used: false },
  };

  it("accepts a rule-based blueprint", () => {
    expect(BlueprintSchema.safeParse(blueprint).success).toBe(true);
  });

  it("requires at least one value proposition", () => {
    expect(BlueprintSchema.safeParse({ ...blueprint, value_propositions: [] }).success).toBe(false);
  });

  it("rejects an unknown generation method", () => {
    const parsed = BlueprintSchema.safeParse({
      ...blueprint,
      metadata: { generation_method: "hybrid", llm_used: true },
    });
    expect(parsed.success).toBe(false);
  });
});

describe("strategist.blueprintPrompt", () => {
  it("embeds the context, the baseline and the schema template", () => {
    const prompt = strategist.blueprintPrompt({ context: "## Campaign Brief\n{}", baseline: '{"summary":"x"}' });
    expect(prompt).toContain("# DATA CONTEXT\n## Campaign Brief\n{}");
    expect(prompt).toContain('# BASELINE RULE-BASED BLUEPRINT (REFERENCE)\n{"summary":"x"}');
    expect(prompt).toContain('"generation_method": "llm"');
    expect(prompt.endsWith("Return JSON only. No prose, markdown, or additional commentary.")).toBe(true);
  });
});
