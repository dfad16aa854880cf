// apps/backend/src/lib/enrichment.ts
// Heuristic enrichment of a signal's evidence text: entities, sentiment, trend and derived features.
// Pure: reads only the signal passed in.

import type { Evidence, Signal } from './evidence.js'
import { clamp, cleanText, roundTo, topByFrequency, unique } from './text.js'

export const POSITIVE_WORDS = ['win', 'growth', 'increase', 'success', 'love', 'best', 'improve'] as const
export const NEGATIVE_WORDS = [
  'problem',
  'pain',
  'struggle',
  'issue',
  'hate',
  'decline',
  'risk',
  'friction',
  'bottleneck',
] as const

const ENTITY_PATTERN = /\b([A-Z][a-zA-Z0-9]+(?:\s+[A-Z][a-zA-Z0-9]+)*)\b/g
const TOPIC_WORD = /[a-zA-Z]{4,}/g

export const ENTITY_LIMIT = 15
export const LANGUAGE_PATTERN_LIMIT = 10
export const FEATURE_LIMITS = { painPoints: 5, languagePatterns: 5, keyTopics: 6 } as const
const KEY_TOPIC_CANDIDATES = 8
/** Freshness decays to zero over one week. */
const FRESHNESS_WINDOW_HOURS = 168
const DEFAULT_PRIMARY_PAIN = 'efficiency'

export type EnrichmentType = 'semantic'

export type EnrichmentFeatures = {
  avg_snippet_length: number
  evidence_count: number
  relevance_score: number
  primary_pain: string
  pain_points: string[]
  language_patterns: string[]
  key_topics: string[]
}

export type EnrichmentResult = {
  enrichmentType: EnrichmentType
  entities: string[]
  sentiment: number
  trendScore: number
  features: EnrichmentFeatures
}

export type SignalEnrichment = EnrichmentResult & {
  id: string
  signalId: string
  createdAt: Date
}

export type NewSignalEnrichment = EnrichmentResult & { signalId: string }

export type EnrichOptions = {
  now?: Date
  /** Cap on language patterns kept in features. */
  patternLimit?: number
}

type EnrichableSignal = Pick<Signal, 'evidence' | 'relevanceScore' | 'provenance'>

function evidenceText(evidence: readonly Evidence[]): string {
  return evidence.map((item) => `${item.title ?? ''} ${item.snippet ?? ''}`).join(' ')
}

/** Capitalised word runs, first-seen order. A heuristic, not NER. */
export function extractEntities(evidence: readonly Evidence[]): string[] {
  const text = evidenceText(evidence)
  const found = Array.from(text.matchAll(ENTITY_PATTERN), (match) => (match[1] ?? '').trim())
  return unique(found)
    .filter((entity) => entity.length > 3)
    .slice(0, ENTITY_LIMIT)
}

/** Each lexicon word counts at most once. */
export function scoreSentiment(evidence: readonly Evidence[]): number {
  const text = evidenceText(evidence).toLowerCase()
  const positive = POSITIVE_WORDS.filter((word) => text.includes(word)).length
  const negative = NEGATIVE_WORDS.filter((word) => text.includes(word)).length
  if (positive === 0 && negative === 0) return 0
  return clamp((positive - negative) / Math.max(positive + negative, 1), -1, 1)
}

const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?(Z|[+-]\d{2}:\d{2})?$/i

/** ISO-8601 date or date-time. A value without a zone designator is UTC. */
export function parseCollectedAt(value: string): Date | null {
  const match = ISO_TIMESTAMP.exec(value.trim())
  if (!match) return null
  const [, date, time, zone] = match
  const normalized = time
    ? `${date}T${time.replace(/(\.\d{3})\d+$/, '$1')}${zone ? zone.toUpperCase() : 'Z'}`
    : `${date}T00:00:00${zone ? zone.toUpperCase() : 'Z'}`
  const ms = Date.parse(normalized)
  return Number.isNaN(ms) ? null : new Date(ms)
}

export function computeTrendScore(signal: EnrichableSignal, now: Date = new Date()): number {
  const base = signal.relevanceScore || 0
  const collectedAt = signal.provenance?.collected_at
  if (typeof collectedAt !== 'string' || !collectedAt) return base

  const collected = parseCollectedAt(collectedAt)
  if (!collected) return base

  const ageHours = Math.max(0, (now.getTime() - collected.getTime()) / 3_600_000)
  const freshness = Math.max(0, 1 - Math.min(ageHours / FRESHNESS_WINDOW_HOURS, 1))
  return roundTo(base * 0.7 + freshness * 0.3, 4)
}

/** Snippets mentioning a negative word, deduplicated. */
export function extractPainPoints(snippets: readonly string[]): string[] {
  return unique(
    snippets.filter((snippet) => {
      const lowered = snippet.toLowerCase()
      return NEGATIVE_WORDS.some((word) => lowered.includes(word))
    })
  )
}

/** Non-overlapping three-word phrases longer than 10 characters, most frequent first. */
export function extractLanguagePatterns(snippets: readonly string[], limit = LANGUAGE_PATTERN_LIMIT): string[] {
  const phrases: string[] = []
  for (const snippet of snippets) {
    const words = snippet.split(/\s+/).filter(Boolean)
    for (let start = 0; start < words.length - 2; start += 3) {
      const phrase = words.slice(start, start + 3).join(' ')
      if (phrase.length > 10) phrases.push(phrase)
    }
  }
  return topByFrequency(phrases, limit)
}

export function deriveFeatures(
  signal: EnrichableSignal,
  patternLimit: number = FEATURE_LIMITS.languagePatterns
): EnrichmentFeatures {
  const evidence = signal.evidence ?? []
  const snippets = evidence.filter((item) => item.snippet).map((item) => cleanText(item.snippet))
  const words = snippets.join(' ').toLowerCase().match(TOPIC_WORD) ?? []
  const keyTopics = topByFrequency(words, KEY_TOPIC_CANDIDATES)
  const painPoints = extractPainPoints(snippets)
  const languagePatterns = extractLanguagePatterns(snippets)

  const avgSnippetLength = evidence.length
    ? evidence.reduce((sum, item) => sum + (item.snippet ?? '').length, 0) / evidence.length
    : 0

  return {
    avg_snippet_length: roundTo(avgSnippetLength, 2),
    evidence_count: evidence.length,
    relevance_score: signal.relevanceScore || 0,
    primary_pain: painPoints[0] ?? DEFAULT_PRIMARY_PAIN,
    pain_points: painPoints.slice(0, FEATURE_LIMITS.painPoints),
    language_patterns: languagePatterns.slice(0, Math.max(0, patternLimit)),
    key_topics: keyTopics.slice(0, FEATURE_LIMITS.keyTopics),
  }
}

export function enrichSignal(signal: EnrichableSignal, options: EnrichOptions = {}): EnrichmentResult {
  const evidence = signal.evidence ?? []
  return {
    enrichmentType: 'semantic',
    entities: extractEntities(evidence),
    sentiment: scoreSentiment(evidence),
    trendScore: computeTrendScore(signal, options.now ?? new Date()),
    features: deriveFeatures(signal, options.patternLimit),
  }
}
