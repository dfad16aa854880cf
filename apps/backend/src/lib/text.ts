// apps/backend/src/lib/text.ts
// Small text helpers shared by scoring, enrichment and blueprint synthesis.

/** Collapse runs of whitespace and trim. */
export function cleanText(value: string | null | undefined): string {
  return String(value ?? '').split(/\s+/).filter(Boolean).join(' ')
}

/** Lower-cased words strictly longer than `minExclusive` characters. */
export function keywordsOf(value: string | null | undefined, minExclusive = 3): string[] {
  return String(value ?? '')
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > minExclusive)
}

export function unique<T>(items: Iterable<T>): T[] {
  return Array.from(new Set(items))
}

/**
 * Most frequent items first. Ties keep first-seen order.
 */
export function topByFrequency(items: Iterable<string>, limit: number): string[] {
  const counts = new Map<string, number>()
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1)
  }
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit))
    .map(([item]) => item)
}

export function firstNonBlank(...candidates: Array<string | null | undefined>): string | null {
  for (const candidate of candidates) {
    if (candidate && candidate.trim().length) return candidate.trim()
  }
  return null
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places
  return Math.round(value * factor) / factor
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}
