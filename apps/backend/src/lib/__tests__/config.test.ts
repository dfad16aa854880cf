import { describe, it, expect } from 'vitest'
import { loadConfig } from '../config.js'
import { defaultModel, resolveModel } from '../models.js'

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: undefined,
      dbPoolMax: 10,
      blueprint: {
        useLlm: false,
        provider: 'openai',
        model: 'gpt-4o-mini',
        maxTokens: 4096,
        temperature: 0.7,
      },
      openaiApiKey: undefined,
      anthropicApiKey: undefined,
      searchApi: { apiKey: undefined, minRequestIntervalMs: 100 },
      signals: { maxQueriesPerPlatform: 10 },
      trace: false,
    })
  })

  it('reads flags, numbers and the provider', () => {
    const config = loadConfig({
      BLUEPRINT_USE_LLM: 'Yes',
      BLUEPRINT_LLM_PROVIDER: ' Anthropic ',
      BLUEPRINT_LLM_TEMPERATURE: '0.2',
      SEARCHAPI_KEY: 'test-secret',
      SIGNALS_MAX_QUERIES_PER_PLATFORM: '4',
      FIELDCRAFT_TRACE: '1',
    })
    expect(config.blueprint).toMatchObject({ useLlm: true, provider: 'anthropic', model: 'claude-3-5-sonnet-latest', temperature: 0.2 })
    expect(config.searchApi.apiKey).toBe('test-secret')
    expect(config.signals.maxQueriesPerPlatform).toBe(4)
    expect(config.trace).toBe(true)
  })

  it('falls back to openai for an unknown provider and treats blanks as unset', () => {
    const config = loadConfig({ BLUEPRINT_LLM_PROVIDER: 'mystery', DB_POOL_MAX: '  ', MODEL_BLUEPRINT: '' })
    expect(config.blueprint.provider).toBe('openai')
    expect(config.dbPoolMax).toBe(10)
    expect(config.blueprint.model).toBe('gpt-4o-mini')
  })

  it('prefers the blueprint model over the default model', () => {
    expect(loadConfig({ MODEL_DEFAULT: 'gpt-4o', MODEL_BLUEPRINT: 'gpt-4.1' }).blueprint.model).toBe('gpt-4.1')
    expect(loadConfig({ MODEL_DEFAULT: 'gpt-4o' }).blueprint.model).toBe('gpt-4o')
  })

  it('fails fast on invalid values', () => {
    expect(() => loadConfig({ DB_POOL_MAX: 'many' })).toThrow(/^Invalid environment configuration: DB_POOL_MAX/)
    expect(() => loadConfig({ BLUEPRINT_LLM_TEMPERATURE: '5' })).toThrow(/BLUEPRINT_LLM_TEMPERATURE/)
  })
})

describe('models', () => {
  it('resolves the first non-blank candidate or the provider default', () => {
    expect(defaultModel('anthropic')).toBe('claude-3-5-sonnet-latest')
    expect(resolveModel('openai', undefined, '  ', 'gpt-4o')).toBe('gpt-4o')
    expect(resolveModel('openai')).toBe('gpt-4o-mini')
  })
})
