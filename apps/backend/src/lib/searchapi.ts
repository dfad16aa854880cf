// apps/backend/src/lib/searchapi.ts
// SearchApi.io client: minimum request spacing, exponential backoff on rate limits and network failures.

import { isRecord, type JsonRecord } from './json.js'
import { errorMessage } from './errors.js'

export const SEARCHAPI_BASE_URL = 'https://www.searchapi.io/api/v1/search'

export type SearchParams = Record<string, string | number>

export interface SearchClient {
  search(engine: string, params: SearchParams): Promise<JsonRecord>
}

export class SearchApiError extends Error {
  /** Network and rate-limit failures are retried; API-reported errors are not. */
  readonly retryable: boolean

  constructor(message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'SearchApiError'
    this.retryable = options?.retryable ?? false
  }
}

export class SearchApiRateLimitError extends SearchApiError {
  constructor(message = 'Rate limit exceeded') {
    super(message, { retryable: true })
    this.name = 'SearchApiRateLimitError'
  }
}

type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export type SearchApiClientOptions = {
  apiKey: string
  baseUrl?: string
  minRequestIntervalMs?: number
  maxAttempts?: number
  timeoutMs?: number
  fetchFn?: FetchFn
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  trace?: boolean
}

const DEFAULT_MIN_INTERVAL_MS = 100
const MAX_MIN_INTERVAL_MS = 5000
const BACKOFF_MIN_MS = 2000
const BACKOFF_MAX_MS = 20000

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** Wait before retry number `attempt` (1-based): 2s, 2s, 4s, 8s ... capped at 20s. */
export function backoffMs(attempt: number): number {
  return Math.min(Math.max(1000 * 2 ** (attempt - 1), BACKOFF_MIN_MS), BACKOFF_MAX_MS)
}

export class SearchApiClient implements SearchClient {
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly maxAttempts: number
  private readonly timeoutMs: number
  private readonly fetchFn: FetchFn
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => number
  private readonly trace: boolean
  private minIntervalMs: number
  private lastRequestAt = 0

  constructor(options: SearchApiClientOptions) {
    if (!options.apiKey) throw new Error('SEARCHAPI_KEY not configured')
    this.apiKey = options.apiKey
    this.baseUrl = options.baseUrl ?? SEARCHAPI_BASE_URL
    this.minIntervalMs = options.minRequestIntervalMs || DEFAULT_MIN_INTERVAL_MS
    this.maxAttempts = options.maxAttempts ?? 5
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init))
    this.sleep = options.sleep ?? delay
    this.now = options.now ?? Date.now
    this.trace = options.trace ?? false
  }

  get minRequestIntervalMs(): number {
    return this.minIntervalMs
  }

  async search(engine: string, params: SearchParams): Promise<JsonRecord> {
    let attempt = 0
    for (;;) {
      attempt++
      try {
        return await this.request(engine, params)
      } catch (err) {
        const retryable = err instanceof SearchApiError && err.retryable
        if (!retryable || attempt >= this.maxAttempts) throw err
        const wait = backoffMs(attempt)
        if (this.trace) console.warn(`[searchapi] retry ${attempt}/${this.maxAttempts - 1} in ${wait}ms`, errorMessage(err))
        await this.sleep(wait)
      }
    }
  }

  private async throttle(): Promise<void> {
    const elapsed = this.now() - this.lastRequestAt
    if (elapsed < this.minIntervalMs) await this.sleep(this.minIntervalMs - elapsed)
    this.lastRequestAt = this.now()
  }

  private async request(engine: string, params: SearchParams): Promise<JsonRecord> {
    await this.throttle()

    const url = new URL(this.baseUrl)
    url.searchParams.set('engine', engine)
    url.searchParams.set('api_key', this.apiKey)
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, String(value))

    const started = this.now()
    const ctrl = new AbortController()
    const t = setTimeout(() => ctrl.abort(), this.timeoutMs)
    let res: Response
    try {
      res = await this.fetchFn(url.toString(), { signal: ctrl.signal, headers: { Accept: 'application/json' } })
    } catch (err) {
      throw new SearchApiError(`Request failed: ${errorMessage(err)}`, { retryable: true, cause: err })
    } finally {
      clearTimeout(t)
    }

    if (this.trace) {
      console.info(JSON.stringify({
        type: 'search.request',
        engine,
        query: params.q ?? null,
        status: res.status,
        duration_ms: this.now() - started,
      }))
    }

    if (res.status === 429) {
      this.minIntervalMs = Math.min(this.minIntervalMs * 2, MAX_MIN_INTERVAL_MS)
      throw new SearchApiRateLimitError()
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '')
      throw new SearchApiError(`HTTP ${res.status}: ${text}`)
    }

    let body: unknown
    try {
      body = await res.json()
    } catch (err) {
      throw new SearchApiError(`SearchAPI request failed: ${errorMessage(err)}`, { cause: err })
    }
    if (!isRecord(body)) throw new SearchApiError('SearchAPI returned a non-object response')

    if (body.error !== undefined && body.error !== null) {
      const message = typeof body.error === 'string' ? body.error : JSON.stringify(body.error)
      if (message.toLowerCase().includes('rate limit')) throw new SearchApiRateLimitError(message)
      throw new SearchApiError(message)
    }
    return body
  }
}
