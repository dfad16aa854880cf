import { describe, it, expect } from 'vitest'
import { AnthropicLlmClient } from '../anthropic.js'
import { loadConfig } from '../config.js'
import { createLlmClient, LlmError } from '../llm.js'
import { OpenAiLlmClient } from '../openai.js'

describe('createLlmClient', () => {
  it('builds the configured provider with the resolved model', () => {
    const config = loadConfig({
      BLUEPRINT_LLM_PROVIDER: 'anthropic',
      MODEL_BLUEPRINT: 'claude-test',
      ANTHROPIC_API_KEY: 'test-secret',
    })
    const client = createLlmClient(config)
    expect(client).toBeInstanceOf(AnthropicLlmClient)
    expect(client.provider).toBe('anthropic')
    expect(client.model).toBe('claude-test')
  })

  it('uses the provider default model when another provider is configured', () => {
    const config = loadConfig({ MODEL_BLUEPRINT: 'claude-test', OPENAI_API_KEY: 'test-secret', BLUEPRINT_LLM_PROVIDER: 'anthropic' })
    const client = createLlmClient(config, 'openai')
    expect(client).toBeInstanceOf(OpenAiLlmClient)
    expect(client.model).toBe('gpt-4o-mini')
  })

  it('refuses to build a provider without its key', () => {
    expect(() => createLlmClient(loadConfig({}))).toThrow(LlmError)
    expect(() => createLlmClient(loadConfig({}))).toThrow('OPENAI_API_KEY is not configured.')
    expect(() => createLlmClient(loadConfig({}), 'anthropic')).toThrow('ANTHROPIC_API_KEY is not configured.')
  })
})
