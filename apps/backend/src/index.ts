// apps/backend/src/index.ts
// Public surface of the backend core. Scripts under ../scripts wire these to Postgres and the live capabilities.

export { scoreEvidence, relevanceFactors, RELEVANCE_WEIGHTS } from './lib/relevance.js'
export type { RelevanceBrief, RelevanceFactors } from './lib/relevance.js'

export { aggregateSignal, meanRelevance, isPlatform, PLATFORM_NAMES } from './lib/evidence.js'
export type { Evidence, NewSignal, Platform, Signal } from './lib/evidence.js'

export { enrichSignal, computeTrendScore, extractEntities, scoreSentiment } from './lib/enrichment.js'
export type { EnrichmentFeatures, EnrichmentResult, SignalEnrichment } from './lib/enrichment.js'

export { buildRuleBasedBlueprint, buildRuleBasedPreview } from './lib/orchestrator/blueprint.js'
export { normalizeBlueprint } from './lib/orchestrator/blueprint-normalize.js'
export { buildLlmContext } from './lib/orchestrator/blueprint-llm.js'

export { extractJsonValue } from './lib/json.js'
export type { JsonExtraction } from './lib/json.js'
export { httpError, isHttpError } from './lib/errors.js'
export type { HttpError } from './lib/errors.js'
export { getConfig, loadConfig } from './lib/config.js'
export type { AppConfig } from './lib/config.js'

export { createLlmClient, LlmError } from './lib/llm.js'
export type { LlmClient, LlmGenerateArgs, LlmResult } from './lib/llm.js'
export { SearchApiClient, SearchApiError, SearchApiRateLimitError } from './lib/searchapi.js'
export type { SearchClient, SearchParams } from './lib/searchapi.js'
export { PLATFORMS } from './lib/signals/platforms.js'
export type { PlatformDefinition } from './lib/signals/platforms.js'

export { createSignalCollector } from './orchestrator/signalCollector.js'
export type { CollectionSummary, SignalCollector } from './orchestrator/signalCollector.js'
export { createEnrichmentService } from './orchestrator/enrichmentService.js'
export type { EnrichmentService, EnrichmentSummary } from './orchestrator/enrichmentService.js'
export { createBlueprintService } from './orchestrator/blueprintService.js'
export type { BlueprintService, BlueprintSummary } from './orchestrator/blueprintService.js'
export { createObservability } from './orchestrator/observability.js'

export type { FieldcraftStore } from './db/store.js'
export { createPostgresStore } from './db/postgres-store.js'
export { closeDb, getDb } from './db/client.js'
