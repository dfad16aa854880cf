// apps/backend/src/lib/relevance.ts
// Weighted multi-factor relevance of one evidence item against a campaign brief.
// The constants below are load-bearing for stored scores; change them only as a deliberate recalibration.

import type { CampaignBrief } from '@fieldcraft/prompts'
import type { Evidence } from './evidence.js'
import { keywordsOf } from './text.js'

export const RELEVANCE_WEIGHTS = {
  goal: 0.25,
  offer: 0.3,
  audience: 0.2,
  competitor: 0.25,
  titleBonus: 0.1,
} as const

export const TITLE_SHARE = 0.6
export const SNIPPET_SHARE = 0.4
export const TITLE_BONUS_MIN_TERMS = 2

export type RelevanceBrief = Partial<Pick<CampaignBrief, 'goal' | 'offer' | 'audiences' | 'competitors'>>
export type ScorableEvidence = Pick<Evidence, 'title' | 'snippet'>

export type RelevanceFactors = {
  goal: number
  offer: number
  audience: number
  competitor: number
  titleBonus: number
}

function keywordMatch(keywords: string[], titleText: string, snippetText: string): number {
  if (!keywords.length) return 0
  const titleMatches = keywords.filter((kw) => titleText.includes(kw)).length
  const snippetMatches = keywords.filter((kw) => snippetText.includes(kw)).length
  return (titleMatches / keywords.length) * TITLE_SHARE + (snippetMatches / keywords.length) * SNIPPET_SHARE
}

/** Weighted contribution of each factor, before clamping. */
export function relevanceFactors(evidence: ScorableEvidence, brief: RelevanceBrief): RelevanceFactors {
  const titleText = (evidence.title ?? '').toLowerCase()
  const snippetText = (evidence.snippet ?? '').toLowerCase()
  const combinedText = `${titleText} ${snippetText}`

  const goal = keywordMatch(keywordsOf(brief.goal), titleText, snippetText) * RELEVANCE_WEIGHTS.goal
  const offer = keywordMatch(keywordsOf(brief.offer), titleText, snippetText) * RELEVANCE_WEIGHTS.offer

  const audienceScores = (brief.audiences ?? [])
    .map((audience) => keywordsOf(audience))
    .filter((keywords) => keywords.length > 0)
    .map((keywords) => keywordMatch(keywords, titleText, snippetText))
  const audience = audienceScores.length ? Math.max(...audienceScores) * RELEVANCE_WEIGHTS.audience : 0

  // Blank names would match every text.
  const competitors = (brief.competitors ?? []).map((name) => name.trim().toLowerCase()).filter(Boolean)
  const competitorMatches = competitors.filter((name) => combinedText.includes(name)).length
  const competitor = competitorMatches
    ? Math.min(competitorMatches / competitors.length, 1) * RELEVANCE_WEIGHTS.competitor
    : 0

  const keyTerms = [...keywordsOf(brief.goal), ...keywordsOf(brief.offer)]
  const titleTermMatches = keyTerms.filter((term) => titleText.includes(term)).length
  const titleBonus = titleTermMatches >= TITLE_BONUS_MIN_TERMS ? RELEVANCE_WEIGHTS.titleBonus : 0

  return { goal, offer, audience, competitor, titleBonus }
}

/** Relevance in [0, 1]. Missing brief fields contribute nothing. */
export function scoreEvidence(evidence: ScorableEvidence, brief: RelevanceBrief): number {
  const f = relevanceFactors(evidence, brief)
  const score = f.goal + f.offer + f.audience + f.competitor + f.titleBonus
  return Math.min(Math.max(score, 0), 1)
}
