// apps/backend/src/lib/json.ts
// Narrowing helpers for untyped JSON, plus JSON extraction from model output.

export type JsonRecord = Record<string, unknown>

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {}
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

export function asString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return fallback
}

export function asStringList(value: unknown): string[] {
  return asArray(value).filter((item): item is string => typeof item === 'string')
}

/** Removes a leading ```lang fence and a trailing ``` fence. */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim()
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.replace(/^```[a-zA-Z]*/, '').trim()
    if (cleaned.endsWith('```')) {
      cleaned = cleaned.slice(0, -3).trim()
    }
  }
  return cleaned
}

export type JsonExtraction =
  | { ok: true; value: unknown }
  | { ok: false; error: string }

/**
 * Parses the first JSON value in possibly fenced model output.
 * Falls back to the outermost {...} or [...] span when prose surrounds the payload.
 */
export function extractJsonValue(text: string): JsonExtraction {
  const cleaned = stripCodeFences(text)
  if (!cleaned) return { ok: false, error: 'Empty response' }

  const direct = tryParse(cleaned)
  if (direct.ok) return direct

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const start = cleaned.indexOf(open)
    const end = cleaned.lastIndexOf(close)
    if (start !== -1 && end > start) {
      const candidate = tryParse(cleaned.slice(start, end + 1))
      if (candidate.ok) return candidate
    }
  }
  return direct
}

function tryParse(text: string): JsonExtraction {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) }
  }
}
