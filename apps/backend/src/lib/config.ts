// apps/backend/src/lib/config.ts
// Environment-driven settings. Scripts load .env through `dotenv/config` before calling getConfig().

import { z } from 'zod'
import { resolveModel, type LlmProvider } from './models.js'

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

const flag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((value) => (value == null ? fallback : TRUE_VALUES.has(value.trim().toLowerCase())))
  )

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback))

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional())

export const EnvSchema = z.object({
  DATABASE_URL: optionalString,
  DB_POOL_MAX: positiveInt(10),
  BLUEPRINT_USE_LLM: flag(false),
  BLUEPRINT_LLM_PROVIDER: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['openai', 'anthropic']).catch('openai')
  ),
  BLUEPRINT_LLM_MAX_TOKENS: positiveInt(4096),
  BLUEPRINT_LLM_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0.7)),
  MODEL_BLUEPRINT: optionalString,
  MODEL_DEFAULT: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  SEARCHAPI_KEY: optionalString,
  SEARCHAPI_MIN_REQUEST_INTERVAL_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(100)),
  SIGNALS_MAX_QUERIES_PER_PLATFORM: positiveInt(10),
  FIELDCRAFT_TRACE: flag(false),
})

export type AppConfig = {
  databaseUrl?: string
  dbPoolMax: number
  blueprint: {
    useLlm: boolean
    provider: LlmProvider
    model: string
    maxTokens: number
    temperature: number
  }
  openaiApiKey?: string
  anthropicApiKey?: string
  searchApi: {
    apiKey?: string
    minRequestIntervalMs: number
  }
  signals: {
    maxQueriesPerPlatform: number
  }
  trace: boolean
}

export type EnvSource = Record<string, string | undefined>

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid environment configuration: ${details}`)
  }
  const vars = parsed.data
  const provider = vars.BLUEPRINT_LLM_PROVIDER
  return {
    databaseUrl: vars.DATABASE_URL,
    dbPoolMax: vars.DB_POOL_MAX,
    blueprint: {
      useLlm: vars.BLUEPRINT_USE_LLM,
      provider,
      model: resolveModel(provider, vars.MODEL_BLUEPRINT, vars.MODEL_DEFAULT),
      maxTokens: vars.BLUEPRINT_LLM_MAX_TOKENS,
      temperature: vars.BLUEPRINT_LLM_TEMPERATURE,
    },
    openaiApiKey: vars.OPENAI_API_KEY,
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    searchApi: {
      apiKey: vars.SEARCHAPI_KEY,
      minRequestIntervalMs: vars.SEARCHAPI_MIN_REQUEST_INTERVAL_MS,
    },
    signals: {
      maxQueriesPerPlatform: vars.SIGNALS_MAX_QUERIES_PER_PLATFORM,
    },
    trace: vars.FIELDCRAFT_TRACE,
  }
}

let cached: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig(process.env)
  return cached
}
