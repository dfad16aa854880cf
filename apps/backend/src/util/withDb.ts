import { isRecord } from '../lib/json.js'

// postgres.js connection-level failures worth one more try.
const TRANSIENT_CODES = new Set(['CONNECTION_CLOSED', 'CONNECTION_ENDED', 'CONNECT_TIMEOUT', 'ECONNRESET', 'ECONNREFUSED', '57P01'])

export function isTransientDbError(err: unknown): boolean {
  return isRecord(err) && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code)
}

/** Retry wrapper for transient connection errors. Anything else is rethrown immediately. */
export async function withDb<T>(fn: () => Promise<T>, tries = 3, delayMs = 250): Promise<T> {
  let lastErr: unknown
  for (let i = 0; i < tries; i++) {
    try {
      return await fn()
    } catch (e) {
      lastErr = e
      if (!isTransientDbError(e)) throw e
      await new Promise((r) => setTimeout(r, delayMs * (i + 1)))
    }
  }
  throw lastErr
}
