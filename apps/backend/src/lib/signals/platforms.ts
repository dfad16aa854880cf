// apps/backend/src/lib/signals/platforms.ts
// One entry per platform: search engine, default queries from the brief, evidence extraction from raw results.

import type { CampaignBrief } from '@fieldcraft/prompts'
import type { Evidence, Platform } from '../evidence.js'
import { parseCollectedAt } from '../enrichment.js'
import { asArray, asRecord, asString, isRecord, type JsonRecord } from '../json.js'
import type { SearchParams } from '../searchapi.js'

export const MAX_DEFAULT_QUERIES = 10
export const SNIPPET_MAX = 500

/** Evidence before scoring. */
export type RawEvidence = Omit<Evidence, 'relevance_score'>

export type QueryBrief = Pick<CampaignBrief, 'goal' | 'offer' | 'audiences' | 'competitors'>

export type PlatformDefinition = {
  platform: Platform
  /** Stored as the signal's search method. */
  cartridge: string
  engine: string
  buildParams(query: string): SearchParams
  defaultQueries(brief: QueryBrief, now: Date): string[]
  extractEvidence(raw: JsonRecord, query: string): RawEvidence[]
}

function finalize(queries: string[]): string[] {
  return queries.map((q) => q.trim()).filter(Boolean).slice(0, MAX_DEFAULT_QUERIES)
}

/** ISO string for an ISO-ish date, or epoch seconds when numeric. */
export function toPublishedDate(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    const date = new Date(value * 1000)
    return Number.isNaN(date.getTime()) ? null : date.toISOString()
  }
  if (typeof value !== 'string' || !value) return null
  return parseCollectedAt(value)?.toISOString() ?? null
}

function truncate(value: string): string {
  return value.slice(0, SNIPPET_MAX)
}

function field(record: JsonRecord, key: string): unknown {
  return record[key] ?? null
}

function items(raw: JsonRecord, key: string, max: number): JsonRecord[] {
  return asArray(raw[key]).filter(isRecord).slice(0, max)
}

const google: PlatformDefinition = {
  platform: 'google',
  cartridge: 'google_serp',
  engine: 'google',
  buildParams: (q) => ({ q, location: 'United States', num: 10 }),
  defaultQueries({ goal, offer, competitors, audiences }, now) {
    const year = now.getUTCFullYear()
    return finalize([
      offer,
      goal && offer ? `${goal} ${offer}` : '',
      ...competitors.slice(0, 3).map((c) => `${c} review`),
      ...audiences.slice(0, 3).map((a) => `${a} ${offer}`),
      goal ? `${goal} trends ${year}` : '',
      offer ? `best ${offer} ${year}` : '',
    ])
  },
  extractEvidence(raw) {
    const evidence: RawEvidence[] = []
    for (const result of items(raw, 'organic_results', 5)) {
      evidence.push({
        title: asString(result.title),
        snippet: asString(result.snippet),
        url: asString(result.link),
        platform: 'google',
        published_date: toPublishedDate(result.date),
        metadata: {
          position: field(result, 'position'),
          source: field(result, 'source'),
          rich_snippet: field(result, 'rich_snippet'),
        },
      })
    }
    for (const question of items(raw, 'related_questions', 3)) {
      evidence.push({
        title: asString(question.question),
        snippet: asString(question.snippet),
        url: asString(question.link),
        platform: 'google',
        published_date: null,
        metadata: { type: 'related_question', source: field(question, 'source') },
      })
    }
    for (const search of items(raw, 'related_searches', 3)) {
      const q = asString(search.query)
      evidence.push({
        title: `Related: ${q}`,
        snippet: `Related search query: ${q}`,
        url: `https://www.google.com/search?q=${encodeURIComponent(q)}`,
        platform: 'google',
        published_date: null,
        metadata: { type: 'related_search', query: field(search, 'query') },
      })
    }
    return evidence
  },
}

const meta: PlatformDefinition = {
  platform: 'meta',
  cartridge: 'meta_ads',
  engine: 'meta_ad_library',
  buildParams: (q) => ({ q, country: 'ALL' }),
  defaultQueries: ({ offer, competitors, audiences }) =>
    finalize([
      offer,
      ...competitors.slice(0, 4),
      ...audiences.slice(0, 3).map((a) => `${a} ${offer}`),
      offer ? `best ${offer}` : '',
      offer ? `buy ${offer}` : '',
    ]),
  extractEvidence(raw) {
    return items(raw, 'ads', 10).map((ad) => {
      const snapshot = asRecord(ad.snapshot)
      const body = snapshot.body
      const snippet =
        body == null || isRecord(body) ? asString(asRecord(body).text, 'No description') : asString(body, JSON.stringify(body))
      const pageName = asString(snapshot.page_name, 'Unknown Advertiser')
      const archiveId = asString(ad.ad_archive_id)
      return {
        title: pageName,
        snippet: truncate(snippet),
        url: archiveId ? `https://www.facebook.com/ads/library/?id=${archiveId}` : '',
        platform: 'meta',
        published_date: toPublishedDate(ad.start_date),
        metadata: {
          ad_archive_id: archiveId,
          page_id: field(ad, 'page_id'),
          page_name: pageName,
          platforms: asArray(snapshot.platforms),
          cta_text: field(snapshot, 'cta_text'),
          cards: asArray(snapshot.cards),
          link_url: field(snapshot, 'link_url'),
          link_description: field(snapshot, 'link_description'),
        },
      }
    })
  },
}

const linkedin: PlatformDefinition = {
  platform: 'linkedin',
  cartridge: 'linkedin_ads',
  engine: 'linkedin_ad_library',
  buildParams: (q) => ({ q }),
  defaultQueries: ({ offer, competitors }) =>
    finalize([
      offer,
      ...competitors.slice(0, 5),
      ...(offer ? [`${offer} solution`, `${offer} platform`, `${offer} software`, `enterprise ${offer}`] : []),
    ]),
  extractEvidence(raw) {
    return items(raw, 'ads', 10).map((ad) => {
      const advertiser = asRecord(ad.advertiser)
      const content = asRecord(ad.content)
      const advertiserName = asString(advertiser.name, 'Unknown Advertiser')
      const headline = asString(content.headline)
      const text = asString(content.text)
      return {
        title: advertiserName,
        snippet: truncate(headline || text || 'No description'),
        url: asString(content.url),
        platform: 'linkedin',
        published_date: toPublishedDate(ad.first_shown_date),
        metadata: {
          advertiser_name: advertiserName,
          advertiser_thumbnail: field(advertiser, 'thumbnail'),
          ad_type: field(ad, 'ad_type'),
          headline,
          image: field(content, 'image'),
          cta: field(content, 'cta'),
          first_shown_date: field(ad, 'first_shown_date'),
          last_shown_date: field(ad, 'last_shown_date'),
        },
      }
    })
  },
}

const tiktok: PlatformDefinition = {
  platform: 'tiktok',
  cartridge: 'tiktok_ads',
  engine: 'tiktok_ads_library',
  buildParams: (q) => ({ country: 'ALL', q }),
  defaultQueries: ({ offer, competitors, audiences }) =>
    finalize([
      offer,
      ...competitors.slice(0, 4),
      ...(offer ? [`${offer} viral`, `best ${offer}`, `${offer} challenge`] : []),
      ...audiences.slice(0, 2).map((a) => `${a} ${offer}`),
    ]),
  extractEvidence(raw) {
    return items(raw, 'ads', 10).map((ad) => {
      const advertiser = asString(ad.advertiser, 'Unknown Advertiser')
      const videoLink = asString(ad.video_link)
      const caption = asString(ad.caption) || asString(ad.description)
      return {
        title: advertiser,
        snippet: caption ? truncate(caption) : 'No description',
        url: videoLink,
        platform: 'tiktok',
        published_date: toPublishedDate(ad.first_shown_datetime),
        metadata: {
          ad_id: field(ad, 'id'),
          advertiser,
          video_link: videoLink,
          cover_image: field(ad, 'cover_image'),
          estimated_audience: field(ad, 'estimated_audience'),
          first_shown_datetime: field(ad, 'first_shown_datetime'),
          last_shown_datetime: field(ad, 'last_shown_datetime'),
          reach: field(ad, 'reach'),
        },
      }
    })
  },
}

const youtube: PlatformDefinition = {
  platform: 'youtube',
  cartridge: 'youtube',
  engine: 'youtube',
  buildParams: (q) => ({ q, gl: 'us', hl: 'en' }),
  defaultQueries({ goal, offer, competitors }, now) {
    const year = now.getUTCFullYear()
    return finalize([
      offer ? `${offer} review` : '',
      ...competitors.slice(0, 3).map((c) => `${c} review`),
      offer && competitors[0] ? `${offer} vs ${competitors[0]}` : '',
      offer ? `how to ${offer}` : '',
      offer ? `best ${offer} ${year}` : '',
      goal ? `${goal} tutorial` : '',
      offer ? `${offer} explained` : '',
      offer ? `${offer} guide` : '',
    ])
  },
  extractEvidence(raw) {
    return items(raw, 'videos', 10).map((video) => {
      const channel = asRecord(video.channel)
      return {
        title: asString(video.title),
        snippet: truncate(asString(video.description)),
        url: asString(video.link),
        platform: 'youtube',
        published_date: toPublishedDate(video.published_time),
        metadata: {
          channel: asString(channel.title) || asString(channel.name),
          channel_link: field(channel, 'link'),
          views: field(video, 'views'),
          extracted_views: field(video, 'extracted_views'),
          length: field(video, 'length'),
          published: field(video, 'published_time'),
          date: field(video, 'date'),
        },
      }
    })
  },
}

const pinterest: PlatformDefinition = {
  platform: 'pinterest',
  cartridge: 'pinterest',
  engine: 'google',
  buildParams: (q) => ({ q: `site:pinterest.com ${q}` }),
  defaultQueries: ({ offer, audiences }) =>
    finalize([
      offer,
      ...audiences.slice(0, 3).map((a) => `${a} ${offer}`),
      ...(offer
        ? [`${offer} ideas`, `${offer} inspiration`, `best ${offer}`, `${offer} aesthetic`, `${offer} style`, `${offer} design`]
        : []),
    ]),
  extractEvidence(raw) {
    return items(raw, 'organic_results', 10).map((result) => ({
      title: asString(result.title) || 'Untitled Pin',
      snippet: truncate(asString(result.snippet) || 'No description'),
      url: asString(result.link),
      platform: 'pinterest',
      published_date: toPublishedDate(result.date),
      metadata: { position: field(result, 'position'), source: field(result, 'source') },
    }))
  },
}

const reddit: PlatformDefinition = {
  platform: 'reddit',
  cartridge: 'reddit',
  engine: 'reddit_ad_library',
  buildParams: (q) => ({ q }),
  defaultQueries: ({ offer, competitors }) =>
    finalize([
      offer,
      ...competitors.slice(0, 5),
      ...(offer ? [`best ${offer}`, `${offer} deals`, `${offer} sale`, `buy ${offer}`] : []),
    ]),
  extractEvidence(raw) {
    return items(raw, 'ads', 10).map((ad) => {
      const creative = asRecord(ad.creative)
      const headline = asString(creative.headline, 'No headline')
      const content = asArray(creative.content)
      const first = content[0]
      const snippet = isRecord(first) && 'text' in first ? asString(first.text, headline) : headline
      return {
        title: headline,
        snippet: truncate(snippet),
        url: asString(ad.url),
        platform: 'reddit',
        published_date: toPublishedDate(ad.created_date),
        metadata: {
          ad_id: field(ad, 'id'),
          budget_category: field(ad, 'budget_category'),
          industry: field(ad, 'industry'),
          creative_type: asString(creative.type, 'UNKNOWN'),
          creative_content: content,
          subreddits: asArray(ad.subreddits),
          devices: asArray(ad.devices),
        },
      }
    })
  },
}

export const PLATFORMS: Record<Platform, PlatformDefinition> = {
  google,
  meta,
  linkedin,
  tiktok,
  youtube,
  pinterest,
  reddit,
}
