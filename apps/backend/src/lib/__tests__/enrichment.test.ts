import { describe, it, expect } from 'vitest'
import {
  computeTrendScore,
  enrichSignal,
  extractEntities,
  extractLanguagePatterns,
  parseCollectedAt,
  scoreSentiment,
} from '../enrichment.js'
import { makeEvidence, makeSignal } from './helpers/fixtures.js'

const evidence = [
  makeEvidence(),
  makeEvidence({
    title: 'Dinner Problem Solved',
    snippet: '  the weeknight dinner   problem is real for Busy Parents  ',
  }),
]

describe('extractEntities', () => {
  it('collects capitalised runs in first-seen order', () => {
    expect(extractEntities(evidence)).toEqual(['HelloFresh', 'Dinner Problem Solved', 'Busy Parents'])
  })

  it('drops short entities and caps the list at 15', () => {
    const many = Array.from({ length: 20 }, (_, i) => makeEvidence({ title: `Brand${i} x`, snippet: 'Ace x' }))
    const entities = extractEntities(many)
    expect(entities).toHaveLength(15)
    expect(entities[0]).toBe('Brand0')
    expect(entities).not.toContain('Ace')
  })
})

describe('scoreSentiment', () => {
  it('balances positive and negative lexicon hits', () => {
    // growth + love against problem
    expect(scoreSentiment(evidence)).toBeCloseTo(1 / 3, 10)
  })

  it('counts each word once however often it appears', () => {
    const repeated = [makeEvidence({ title: 'Love love love', snippet: 'a real problem' })]
    expect(scoreSentiment(repeated)).toBe(0)
  })

  it('is exactly 0 when no lexicon word is present', () => {
    expect(scoreSentiment([makeEvidence({ title: 'Weekly menu', snippet: 'fresh ingredients' })])).toBe(0)
  })

  it('stays within [-1, 1]', () => {
    expect(scoreSentiment([makeEvidence({ title: 'pain', snippet: 'risk friction' })])).toBe(-1)
    expect(scoreSentiment([makeEvidence({ title: 'best', snippet: 'win' })])).toBe(1)
  })
})

describe('computeTrendScore', () => {
  const now = new Date('2026-01-06T10:00:00.000Z')

  it('blends relevance with one-week freshness', () => {
    const signal = makeSignal({ id: 's1', relevanceScore: 0.56, provenance: { collected_at: '2026-01-05T10:00:00' } })
    expect(computeTrendScore(signal, now)).toBe(0.6491)
  })

  it('treats future timestamps as fresh', () => {
    const signal = makeSignal({ id: 's1', relevanceScore: 0.56, provenance: { collected_at: '2026-02-01T00:00:00Z' } })
    expect(computeTrendScore(signal, now)).toBeCloseTo(0.692, 10)
  })

  it('bottoms out freshness after a week', () => {
    const signal = makeSignal({ id: 's1', relevanceScore: 0.56, provenance: { collected_at: '2025-12-01T00:00:00+00:00' } })
    expect(computeTrendScore(signal, now)).toBeCloseTo(0.392, 10)
  })

  it('returns the relevance unchanged without a parseable timestamp', () => {
    expect(computeTrendScore(makeSignal({ id: 's1', relevanceScore: 0.56 }), now)).toBe(0.56)
    const bad = makeSignal({ id: 's2', relevanceScore: 0.56, provenance: { collected_at: 'yesterday' } })
    expect(computeTrendScore(bad, now)).toBe(0.56)
  })
})

describe('parseCollectedAt', () => {
  it('reads zone-less timestamps as UTC and keeps explicit offsets', () => {
    expect(parseCollectedAt('2026-01-05T10:00:00.123456')?.toISOString()).toBe('2026-01-05T10:00:00.123Z')
    expect(parseCollectedAt('2026-01-05T10:00:00+02:00')?.toISOString()).toBe('2026-01-05T08:00:00.000Z')
    expect(parseCollectedAt('2026-01-05')?.toISOString()).toBe('2026-01-05T00:00:00.000Z')
    expect(parseCollectedAt('05/01/2026')).toBeNull()
  })
})

describe('extractLanguagePatterns', () => {
  it('ranks repeated phrases first and honours the cap', () => {
    const snippets = ['save time every night', 'save time every week', 'the quick brown fox']
    expect(extractLanguagePatterns(snippets, 2)).toEqual(['save time every', 'the quick brown'])
  })
})

describe('enrichSignal', () => {
  it('derives the full enrichment for a signal', () => {
    const signal = makeSignal({
      id: 's1',
      evidence,
      relevanceScore: 0.56,
      provenance: { collected_at: '2026-01-05T10:00:00Z' },
    })
    const result = enrichSignal(signal, { now: new Date('2026-01-06T10:00:00.000Z') })

    expect(result.enrichmentType).toBe('semantic')
    expect(result.entities).toEqual(['HelloFresh', 'Dinner Problem Solved', 'Busy Parents'])
    expect(result.trendScore).toBe(0.6491)
    expect(result.features).toEqual({
      avg_snippet_length: 51.5,
      evidence_count: 2,
      relevance_score: 0.56,
      primary_pain: 'the weeknight dinner problem is real for Busy Parents',
      pain_points: ['the weeknight dinner problem is real for Busy Parents'],
      language_patterns: [
        'busy parents love',
        'this growth in',
        'the weeknight dinner',
        'problem is real',
        'for Busy Parents',
      ],
      key_topics: ['busy', 'parents', 'love', 'this', 'growth', 'convenience'],
    })
  })

  it('falls back to defaults for a signal without evidence', () => {
    const result = enrichSignal(makeSignal({ id: 's1', evidence: [], relevanceScore: 0 }))
    expect(result.entities).toEqual([])
    expect(result.sentiment).toBe(0)
    expect(result.trendScore).toBe(0)
    expect(result.features.avg_snippet_length).toBe(0)
    expect(result.features.primary_pain).toBe('efficiency')
    expect(result.features.key_topics).toEqual([])
  })
})
