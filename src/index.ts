export { ModerationPipeline, type ModerationPipelineDeps, type ModerateOptions } from './pipeline.js';
export { PolicyIndex, type PolicyIndexOptions } from './retrieval/policy-index.js';
export { cosineSimilarity } from './retrieval/similarity.js';
export { PolicyIngestor, type IngestReport, type PolicyIngestorOptions } from './ingest/ingestor.js';
export { normalizePolicyText, policyId } from './ingest/normalize.js';
export { StaticPolicySource, YamlPolicySource } from './ingest/sources.js';
export { DecisionEngine, type DecisionEngineOptions, type DecisionState } from './decision/engine.js';
export { buildAugmentedPrompt, MODERATION_SYSTEM_PROMPT, type AugmentedPrompt } from './decision/prompt.js';
export { parseDecisionResponse, extractJSON } from './decision/response.js';
export { AuditLogger, type AuditLoggerOptions } from './audit/audit-logger.js';
export {
  createEmbeddingProvider,
  OpenAIEmbeddingProvider,
  OllamaEmbeddingProvider,
  type EmbeddingProvider,
  type EmbeddingBackend
} from './embedding/provider.js';
export {
  createGenerationProvider,
  AnthropicGenerationProvider,
  OllamaGenerationProvider,
  type GenerationProvider,
  type GenerationBackend,
  type GenerationRequest
} from './inference/router.js';
export { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from './inference/retry.js';
export { loadConfig, parseConfig, configSchema, type PolicyGuardConfig } from './config.js';
export { createModerationService, type ModerationService } from './service.js';
export { buildServer } from './server.js';
export * from './crypto/index.js';
export * from './errors.js';
export * from './types/index.js';
