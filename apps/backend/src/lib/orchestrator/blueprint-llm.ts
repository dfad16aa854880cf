// apps/backend/src/lib/orchestrator/blueprint-llm.ts
// LLM refinement pass: renders the data context, sends it with the rule-based baseline, parses the reply.

import { strategist, type Blueprint } from '@fieldcraft/prompts'
import type { Signal } from '../evidence.js'
import type { SignalEnrichment } from '../enrichment.js'
import { extractJsonValue, isRecord, type JsonRecord } from '../json.js'
import { LlmError, type LlmClient } from '../llm.js'
import { unique } from '../text.js'
import type { BlueprintCampaign } from './blueprint.js'

export type CompletedAnalysis = {
  analysisType: string
  insights: JsonRecord | null
}

export type StrategicBriefExcerpt = {
  content: JsonRecord | null
}

export type LlmContextInput = {
  campaign: BlueprintCampaign
  signals: Signal[]
  enrichments: SignalEnrichment[]
  analyses?: CompletedAnalysis[]
  strategicBrief?: StrategicBriefExcerpt | null
}

export type LlmBlueprintMeta = {
  llm_provider: string
  llm_model: string
  tokens_used: number | null
}

function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/_/g, ' ')
    .replace(/\b[a-z]/g, (c) => c.toUpperCase())
}

function flatFeature(enrichments: SignalEnrichment[], key: 'pain_points' | 'language_patterns' | 'key_topics'): string[] {
  return unique(enrichments.flatMap((e) => e.features?.[key] ?? []))
}

function briefExcerpt(content: JsonRecord): string {
  const sections = isRecord(content.sections) ? content.sections : {}
  const executive = sections['Executive Summary']
  if (typeof executive === 'string' && executive) return executive
  return typeof content.full_text === 'string' ? content.full_text : ''
}

export function buildLlmContext(input: LlmContextInput): string {
  const { campaign, signals, enrichments } = input
  const parts: string[] = []

  parts.push('## Campaign Brief\n')
  parts.push(JSON.stringify(campaign.brief, null, 2))

  parts.push('\n\n## Signals (Top 10)\n')
  signals.slice(0, 10).forEach((signal, i) => {
    const snippet = signal.evidence[0]?.snippet ?? ''
    const relevance = Math.round((signal.relevanceScore || 0) * 100) / 100
    parts.push(`${i + 1}. [${signal.source}] query='${signal.query}' (relevance=${relevance})\n`)
    if (snippet) parts.push(`   snippet: ${snippet.slice(0, 300)}\n`)
  })

  parts.push('\n## Enrichment Highlights\n')
  parts.push(`- Pain points: ${flatFeature(enrichments, 'pain_points').slice(0, 6).join(', ') || 'n/a'}\n`)
  parts.push(`- Language patterns: ${flatFeature(enrichments, 'language_patterns').slice(0, 6).join(', ') || 'n/a'}\n`)
  parts.push(`- Key topics: ${flatFeature(enrichments, 'key_topics').slice(0, 8).join(', ') || 'n/a'}\n`)

  const analyses = input.analyses ?? []
  if (analyses.length) {
    parts.push('\n## Completed Analyses\n')
    for (const analysis of analyses.slice(0, 3)) {
      const insights = analysis.insights ?? {}
      const summary = typeof insights.summary === 'string' ? insights.summary : ''
      const confidence = analysis.insights ? String(insights.confidence_score ?? 'n/a') : 'n/a'
      parts.push(`- ${titleCase(analysis.analysisType)} analysis (confidence=${confidence}): ${summary.slice(0, 400)}\n`)
    }
  }

  const content = input.strategicBrief?.content
  if (content) {
    parts.push('\n## Strategic Brief Snapshot\n')
    parts.push(briefExcerpt(content).slice(0, 800))
  }

  return parts.join('')
}

/** Rule-based blueprint as the model sees it: no metadata, no artifact id. */
export function baselineForPrompt(ruleBased: Blueprint): string {
  const { metadata: _metadata, ...rest } = ruleBased
  return JSON.stringify({ ...rest, artifact_id: null }, null, 2)
}

export async function requestLlmBlueprint(args: {
  llm: LlmClient
  context: string
  ruleBased: Blueprint
  maxTokens: number
  temperature: number
}): Promise<{ raw: JsonRecord; meta: LlmBlueprintMeta }> {
  const { llm } = args
  const result = await llm.generate({
    prompt: strategist.blueprintPrompt({ context: args.context, baseline: baselineForPrompt(args.ruleBased) }),
    systemPrompt: strategist.system,
    maxTokens: args.maxTokens,
    temperature: args.temperature,
    meta: { campaign_id: args.ruleBased.campaign_id, purpose: 'blueprint' },
  })

  const parsed = extractJsonValue(result.content)
  if (!parsed.ok) {
    throw new LlmError(llm.provider, `LLM returned invalid JSON: ${parsed.error}`)
  }
  if (!isRecord(parsed.value)) {
    throw new LlmError(llm.provider, 'LLM returned JSON that is not an object')
  }

  return {
    raw: parsed.value,
    meta: {
      llm_provider: result.provider,
      llm_model: result.model,
      tokens_used: result.usage.totalTokens,
    },
  }
}
