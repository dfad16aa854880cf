// apps/backend/src/lib/models.ts
// Centralised model resolution so every LLM call site shares defaults.

export type LlmProvider = 'openai' | 'anthropic'

const PROVIDER_DEFAULTS: Record<LlmProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-sonnet-latest',
}

export function defaultModel(provider: LlmProvider): string {
  return PROVIDER_DEFAULTS[provider]
}

export function resolveModel(provider: LlmProvider, ...candidates: Array<string | undefined | null>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim().length) {
      return candidate.trim()
    }
  }
  return defaultModel(provider)
}
