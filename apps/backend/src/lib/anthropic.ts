// apps/backend/src/lib/anthropic.ts
import Anthropic from '@anthropic-ai/sdk'
import type { AppConfig } from './config.js'
import { LlmError, logLlmError, logLlmRequest, logLlmResponse } from './llm.js'
import type { LlmClient, LlmGenerateArgs, LlmResult } from './llm.js'
import { resolveModel } from './models.js'

const REQUEST_TIMEOUT_MS = 90_000

export class AnthropicLlmClient implements LlmClient {
  readonly provider = 'anthropic' as const

  constructor(
    private readonly client: Anthropic,
    readonly model: string,
    private readonly trace = false,
  ) {}

  async generate(args: LlmGenerateArgs): Promise<LlmResult> {
    if (this.trace) {
      console.log('[anthropic] model=%s temp=%s max=%s', this.model, args.temperature, args.maxTokens)
    }

    const start = Date.now()
    logLlmRequest(this, args)

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: args.maxTokens,
        temperature: args.temperature,
        ...(args.systemPrompt ? { system: args.systemPrompt } : {}),
        messages: [{ role: 'user', content: args.prompt }],
      })
      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('\n')
        .trim()
      const result: LlmResult = {
        content,
        usage: { totalTokens: response.usage.input_tokens + response.usage.output_tokens },
        model: response.model || this.model,
        provider: this.provider,
      }
      logLlmResponse(this, args, result, Date.now() - start)
      return result
    } catch (err) {
      logLlmError(this, args, err, Date.now() - start)
      throw new LlmError(this.provider, err instanceof Error ? err.message : String(err), { cause: err })
    }
  }
}

export function createAnthropicClient(config: AppConfig): AnthropicLlmClient {
  if (!config.anthropicApiKey) {
    throw new LlmError('anthropic', 'ANTHROPIC_API_KEY is not configured.')
  }
  const client = new Anthropic({ apiKey: config.anthropicApiKey, timeout: REQUEST_TIMEOUT_MS })
  const model = config.blueprint.provider === 'anthropic' ? config.blueprint.model : resolveModel('anthropic')
  return new AnthropicLlmClient(client, model, config.trace)
}
