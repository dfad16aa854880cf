// Strategist: blueprint refinement voice.
// Receives the data context and the rule-based blueprint, returns the improved blueprint as JSON.

export const system =
  "You are an expert campaign strategist. Produce precise JSON, adhering strictly to the schema.";

/** Shape sample embedded in the prompt. Values are type hints, not content. */
export const blueprintTemplate = {
  artifact_id: null,
  campaign_id: "string UUID",
  generated_at: "ISO-8601 timestamp",
  summary: "string",
  insights: {
    top_entities: ["string"],
    trending_topics: ["string"],
    sentiment_distribution: { positive: 0.4, neutral: 0.4, negative: 0.2 },
  },
  audience_hypotheses: [
    {
      audience: "string",
      focus_entities: ["string"],
      pain_points: ["string"],
      language_notes: ["string"],
      supporting_signals: ["uuid-string"],
    },
  ],
  value_propositions: [
    {
      statement: "string",
      supporting_entities: ["string"],
      trend_score: 0.75,
      proof_points: ["string"],
    },
  ],
  messaging_pillars: [
    {
      pillar: "string",
      key_messages: ["string"],
      supporting_urls: ["https://example.com"],
      relevance_score: 0.8,
    },
  ],
  draft_assets: [
    {
      id: "uuid-string",
      platform: "meta",
      objective: "conversion",
      audience_focus: ["Audience A"],
      headline: "string",
      primary_text: "string",
      cta: "Learn More",
      supporting_signals: ["uuid-string"],
      creative_hooks: ["string"],
      variations: [{ headline: "string", primary_text: "string", cta: "Get Started" }],
    },
  ],
  next_actions: ["string"],
  metadata: { generation_method: "llm" },
} as const;

export type BlueprintPromptInput = {
  /** Rendered data context (brief, signals, enrichment highlights, analyses). */
  context: string;
  /** Rule-based blueprint without metadata, serialised for reference. */
  baseline: string;
};

export function blueprintPrompt({ context, baseline }: BlueprintPromptInput): string {
  return [
    "You are a senior marketing strategist tasked with producing a campaign blueprint.",
    "",
    "# DATA CONTEXT",
    context,
    "",
    "# BASELINE RULE-BASED BLUEPRINT (REFERENCE)",
    baseline,
    "",
    "# INSTRUCTIONS",
    "Using the context and baseline above, craft an improved campaign blueprint.",
    "Respond with valid JSON matching the exact schema provided below. " +
      "Ensure draft assets include an `id` (UUID), `headline`, `primary_text`, `cta`, " +
      "`audience_focus`, `supporting_signals`, `creative_hooks`, and at least one variation. " +
      "Ground every recommendation in the provided signals and analyses.",
    "Schema:",
    JSON.stringify(blueprintTemplate, null, 2),
    "Return JSON only. No prose, markdown, or additional commentary.",
  ].join("\n");
}
