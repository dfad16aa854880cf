// apps/backend/src/lib/llm.ts
// Provider-neutral LLM capability. Callers depend on LlmClient; adapters live in openai.ts / anthropic.ts.

import type { AppConfig } from './config.js'
import type { LlmProvider } from './models.js'
import { createAnthropicClient } from './anthropic.js'
import { createOpenAiClient } from './openai.js'

export type LlmGenerateArgs = {
  prompt: string
  systemPrompt?: string
  maxTokens: number
  temperature: number
  /** Echoed into request/response log lines. */
  meta?: Record<string, unknown>
}

export type LlmResult = {
  content: string
  usage: { totalTokens: number | null }
  model: string
  provider: LlmProvider
}

export interface LlmClient {
  readonly provider: LlmProvider
  readonly model: string
  generate(args: LlmGenerateArgs): Promise<LlmResult>
}

export class LlmError extends Error {
  readonly provider: LlmProvider

  constructor(provider: LlmProvider, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LlmError'
    this.provider = provider
  }
}

export function createLlmClient(config: AppConfig, provider: LlmProvider = config.blueprint.provider): LlmClient {
  return provider === 'anthropic' ? createAnthropicClient(config) : createOpenAiClient(config)
}

export function logLlmRequest(client: LlmClient, args: LlmGenerateArgs): void {
  console.info(JSON.stringify({
    type: 'llm.request',
    provider: client.provider,
    model: client.model,
    temperature: args.temperature,
    max_tokens: args.maxTokens,
    prompt_chars: args.prompt.length,
    meta: args.meta ?? {},
  }))
}

export function logLlmResponse(client: LlmClient, args: LlmGenerateArgs, result: LlmResult, durationMs: number): void {
  console.info(JSON.stringify({
    type: 'llm.response',
    provider: client.provider,
    model: result.model,
    duration_ms: durationMs,
    total_tokens: result.usage.totalTokens,
    content_chars: result.content.length,
    meta: args.meta ?? {},
  }))
}

export function logLlmError(client: LlmClient, args: LlmGenerateArgs, err: unknown, durationMs: number): void {
  console.error(JSON.stringify({
    type: 'llm.error',
    provider: client.provider,
    model: client.model,
    duration_ms: durationMs,
    meta: args.meta ?? {},
    error: err instanceof Error ? err.message : String(err),
  }))
}
