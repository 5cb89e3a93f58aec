import pino, { type Logger } from 'pino';
import type { PolicyGuardConfig, GenerationBackendConfig } from './config.js';
import { AuditLogger } from './audit/audit-logger.js';
import { AuditLog } from './crypto/audit-log.js';
import { DecisionEngine } from './decision/engine.js';
import { createEmbeddingProvider, type EmbeddingProvider } from './embedding/provider.js';
import { createGenerationProvider, type GenerationBackend } from './inference/router.js';
import { PolicyIngestor } from './ingest/ingestor.js';
import { ModerationPipeline } from './pipeline.js';
import { PolicyIndex } from './retrieval/policy-index.js';

export interface ModerationService {
  index: PolicyIndex;
  embedder: EmbeddingProvider;
  ingestor: PolicyIngestor;
  engine: DecisionEngine;
  auditLog: AuditLog;
  pipeline: ModerationPipeline;
}

function toBackend(config: GenerationBackendConfig): GenerationBackend {
  return { name: config.name, type: config.type, model: config.model, baseUrl: config.base_url };
}

/**
 * Wires the pipeline components from configuration. Nothing here touches
 * the network; providers connect on first use.
 */
export function createModerationService(config: PolicyGuardConfig, logger: Logger = pino({ level: 'silent' })): ModerationService {
  const index = new PolicyIndex();

  const embedder = createEmbeddingProvider({
    type: config.embedding.type,
    model: config.embedding.model,
    baseUrl: config.embedding.base_url,
    timeoutMs: config.embedding.timeout_ms,
    retries: config.embedding.retries
  });

  const { generation } = config;
  const engine = new DecisionEngine({
    primary: createGenerationProvider(toBackend(generation.primary)),
    fallback: generation.fallback ? createGenerationProvider(toBackend(generation.fallback)) : undefined,
    retry: {
      retries: generation.max_retries,
      attemptTimeoutMs: generation.attempt_timeout_ms,
      delayMs: generation.retry_delay_ms
    },
    decideTimeoutMs: generation.decide_timeout_ms,
    promptCharBudget: config.retrieval.prompt_char_budget,
    maxOutputTokens: generation.max_output_tokens,
    logger: logger.child({ component: 'decision' })
  });

  const auditLog = new AuditLog(config.audit.log_path, config.audit.key_dir);
  const auditLogger = new AuditLogger(auditLog, {
    hashSalt: config.audit.hash_salt,
    logger: logger.child({ component: 'audit' })
  });

  const ingestor = new PolicyIngestor(index, embedder, { logger: logger.child({ component: 'ingest' }) });

  const pipeline = new ModerationPipeline({
    embedder,
    index,
    engine,
    auditLogger,
    topK: config.retrieval.top_k,
    logger: logger.child({ component: 'pipeline' })
  });

  return { index, embedder, ingestor, engine, auditLog, pipeline };
}
