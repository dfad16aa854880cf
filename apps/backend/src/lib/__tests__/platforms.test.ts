import { describe, it, expect } from 'vitest'
import { PLATFORM_NAMES } from '../evidence.js'
import { PLATFORMS, toPublishedDate } from '../signals/platforms.js'
import { mealKitBrief } from './helpers/fixtures.js'

const NOW = new Date('2026-03-01T00:00:00.000Z')
const emptyBrief = { goal: '', offer: '', audiences: [], competitors: [] }

describe('PLATFORMS', () => {
  it('covers every platform with its cartridge and engine', () => {
    expect(Object.keys(PLATFORMS)).toEqual([...PLATFORM_NAMES])
    expect(PLATFORM_NAMES.map((p) => [PLATFORMS[p].cartridge, PLATFORMS[p].engine])).toEqual([
      ['google_serp', 'google'],
      ['meta_ads', 'meta_ad_library'],
      ['linkedin_ads', 'linkedin_ad_library'],
      ['tiktok_ads', 'tiktok_ads_library'],
      ['youtube', 'youtube'],
      ['pinterest', 'google'],
      ['reddit', 'reddit_ad_library'],
    ])
  })

  it('builds engine parameters', () => {
    expect(PLATFORMS.google.buildParams('meal kit')).toEqual({ q: 'meal kit', location: 'United States', num: 10 })
    expect(PLATFORMS.meta.buildParams('meal kit')).toEqual({ q: 'meal kit', country: 'ALL' })
    expect(PLATFORMS.youtube.buildParams('meal kit')).toEqual({ q: 'meal kit', gl: 'us', hl: 'en' })
    expect(PLATFORMS.pinterest.buildParams('meal kit')).toEqual({ q: 'site:pinterest.com meal kit' })
  })
})

describe('defaultQueries', () => {
  it('derives google queries from the brief and the current year', () => {
    expect(PLATFORMS.google.defaultQueries(mealKitBrief, NOW)).toEqual([
      'meal kit',
      'grow signups meal kit',
      'HelloFresh review',
      'busy parents meal kit',
      'grow signups trends 2026',
      'best meal kit 2026',
    ])
  })

  it('derives youtube queries including a comparison', () => {
    expect(PLATFORMS.youtube.defaultQueries(mealKitBrief, NOW)).toEqual([
      'meal kit review',
      'HelloFresh review',
      'meal kit vs HelloFresh',
      'how to meal kit',
      'best meal kit 2026',
      'grow signups tutorial',
      'meal kit explained',
      'meal kit guide',
    ])
  })

  it('derives reddit queries from offer and competitors', () => {
    expect(PLATFORMS.reddit.defaultQueries(mealKitBrief, NOW)).toEqual([
      'meal kit',
      'HelloFresh',
      'best meal kit',
      'meal kit deals',
      'meal kit sale',
      'buy meal kit',
    ])
  })

  it('yields nothing for an empty brief', () => {
    for (const platform of PLATFORM_NAMES) {
      expect(PLATFORMS[platform].defaultQueries({ ...emptyBrief, audiences: ['  '] }, NOW)).toEqual([])
    }
  })

  it('never exceeds ten queries', () => {
    const big = {
      goal: 'grow signups',
      offer: 'meal kit',
      audiences: ['a1', 'a2', 'a3', 'a4'],
      competitors: ['c1', 'c2', 'c3', 'c4', 'c5', 'c6'],
    }
    for (const platform of PLATFORM_NAMES) {
      expect(PLATFORMS[platform].defaultQueries(big, NOW).length).toBeLessThanOrEqual(10)
    }
  })
})

describe('extractEvidence', () => {
  it('reads google organic results, questions and related searches', () => {
    const organic = Array.from({ length: 6 }, (_, i) => ({
      title: `Result ${i}`,
      snippet: `Snippet ${i}`,
      link: `https://example.com/${i}`,
      position: i + 1,
      date: i === 0 ? '2026-01-02' : 'Jan 2, 2026',
    }))
    const evidence = PLATFORMS.google.extractEvidence(
      {
        organic_results: organic,
        related_questions: [{ question: 'Is a meal kit worth it?', snippet: 'Often.', link: 'https://example.com/q' }],
        related_searches: [{ query: 'meal kit delivery' }],
      },
      'meal kit'
    )

    expect(evidence).toHaveLength(7)
    expect(evidence[0]).toEqual({
      title: 'Result 0',
      snippet: 'Snippet 0',
      url: 'https://example.com/0',
      platform: 'google',
      published_date: '2026-01-02T00:00:00.000Z',
      metadata: { position: 1, source: null, rich_snippet: null },
    })
    expect(evidence[1]?.published_date).toBeNull()
    expect(evidence[5]).toMatchObject({ title: 'Is a meal kit worth it?', metadata: { type: 'related_question' } })
    expect(evidence[6]).toEqual({
      title: 'Related: meal kit delivery',
      snippet: 'Related search query: meal kit delivery',
      url: 'https://www.google.com/search?q=meal%20kit%20delivery',
      platform: 'google',
      published_date: null,
      metadata: { type: 'related_search', query: 'meal kit delivery' },
    })
  })

  it('reads meta ads with library links and defaults', () => {
    const [first, second] = PLATFORMS.meta.extractEvidence(
      {
        ads: [
          {
            ad_archive_id: '123',
            start_date: '2026-01-03',
            snapshot: { page_name: 'HelloFresh', body: { text: 'Dinner sorted' } },
          },
          { ad_archive_id: '456' },
        ],
      },
      'meal kit'
    )
    expect(first).toMatchObject({
      title: 'HelloFresh',
      snippet: 'Dinner sorted',
      url: 'https://www.facebook.com/ads/library/?id=123',
      published_date: '2026-01-03T00:00:00.000Z',
    })
    expect(second).toMatchObject({ title: 'Unknown Advertiser', snippet: 'No description' })
  })

  it('reads linkedin ads falling back from headline to text', () => {
    const [ad] = PLATFORMS.linkedin.extractEvidence(
      { ads: [{ advertiser: { name: 'Acme' }, content: { headline: '', text: 'Text body', url: 'https://example.com/ad' } }] },
      'q'
    )
    expect(ad).toMatchObject({ title: 'Acme', snippet: 'Text body', url: 'https://example.com/ad' })
  })

  it('reads tiktok ads with epoch timestamps', () => {
    const [withDescription, bare] = PLATFORMS.tiktok.extractEvidence(
      {
        ads: [
          { advertiser: 'Acme', description: 'Weeknight hack', first_shown_datetime: 1767225600 },
          { advertiser: 'Other' },
        ],
      },
      'q'
    )
    expect(withDescription).toMatchObject({ snippet: 'Weeknight hack', published_date: '2026-01-01T00:00:00.000Z' })
    expect(bare).toMatchObject({ title: 'Other', snippet: 'No description', published_date: null })
  })

  it('reads youtube videos and truncates descriptions', () => {
    const [video] = PLATFORMS.youtube.extractEvidence(
      { videos: [{ title: 'Review', description: 'd'.repeat(600), channel: { name: 'Chef Ana' } }] },
      'q'
    )
    expect(video?.snippet).toHaveLength(500)
    expect(video?.metadata.channel).toBe('Chef Ana')
  })

  it('reads reddit ads from the first content item', () => {
    const [withContent, headlineOnly, empty] = PLATFORMS.reddit.extractEvidence(
      {
        ads: [
          { creative: { headline: 'Dinner in 10', content: [{ text: 'Try it free' }] } },
          { creative: { headline: 'Dinner in 10', content: [] } },
          {},
        ],
      },
      'q'
    )
    expect(withContent?.snippet).toBe('Try it free')
    expect(headlineOnly?.snippet).toBe('Dinner in 10')
    expect(empty).toMatchObject({ title: 'No headline', snippet: 'No headline' })
  })

  it('defaults pinterest titles', () => {
    const [pin] = PLATFORMS.pinterest.extractEvidence({ organic_results: [{ link: 'https://pinterest.com/pin/1' }] }, 'q')
    expect(pin).toMatchObject({ title: 'Untitled Pin', snippet: 'No description', platform: 'pinterest' })
  })

  it('tolerates missing result lists', () => {
    for (const platform of PLATFORM_NAMES) {
      expect(PLATFORMS[platform].extractEvidence({}, 'q')).toEqual([])
    }
  })
})

describe('toPublishedDate', () => {
  it('accepts ISO strings and epoch seconds only', () => {
    expect(toPublishedDate('2026-01-02T03:04:05Z')).toBe('2026-01-02T03:04:05.000Z')
    expect(toPublishedDate(0)).toBe('1970-01-01T00:00:00.000Z')
    expect(toPublishedDate('2 days ago')).toBeNull()
    expect(toPublishedDate(null)).toBeNull()
  })
})
