// apps/backend/src/lib/evidence.ts
// Evidence and Signal value types. Evidence is stored as JSON on the signal row, hence snake_case.

export const PLATFORM_NAMES = ['google', 'meta', 'linkedin', 'tiktok', 'youtube', 'pinterest', 'reddit'] as const
export type Platform = (typeof PLATFORM_NAMES)[number]

export function isPlatform(value: unknown): value is Platform {
  return typeof value === 'string' && PLATFORM_NAMES.some((name) => name === value)
}

export type Evidence = {
  title: string
  snippet: string
  url: string
  platform: Platform
  /** ISO-8601, when the source exposes one. */
  published_date: string | null
  metadata: Record<string, unknown>
  relevance_score: number
}

export type Signal = {
  id: string
  campaignId: string
  source: Platform
  /** Cartridge identifier, e.g. `google_serp`. */
  searchMethod: string
  query: string
  evidence: Evidence[]
  relevanceScore: number
  provenance: Record<string, unknown>
  createdAt: Date
}

export type NewSignal = Omit<Signal, 'id' | 'createdAt'>

/** Arithmetic mean of evidence scores, 0 when there is no evidence. */
export function meanRelevance(evidence: ReadonlyArray<Pick<Evidence, 'relevance_score'>>): number {
  if (!evidence.length) return 0
  return evidence.reduce((sum, item) => sum + item.relevance_score, 0) / evidence.length
}

/**
 * Groups one query execution's scored evidence into a signal ready to persist.
 */
export function aggregateSignal(input: {
  campaignId: string
  source: Platform
  searchMethod: string
  query: string
  evidence: Evidence[]
  provenance?: Record<string, unknown>
}): NewSignal {
  return {
    campaignId: input.campaignId,
    source: input.source,
    searchMethod: input.searchMethod,
    query: input.query,
    evidence: input.evidence,
    relevanceScore: meanRelevance(input.evidence),
    provenance: input.provenance ?? {},
  }
}
