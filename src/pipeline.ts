import pino, { type Logger } from 'pino';
import { ModerationAbortedError } from './errors.js';
import type { AuditLogger } from './audit/audit-logger.js';
import type { DecisionEngine } from './decision/engine.js';
import type { EmbeddingProvider } from './embedding/provider.js';
import type { PolicyIndex } from './retrieval/policy-index.js';
import { createContentItem, type AuditRecord, type ContentItem, type Decision } from './types/index.js';

export interface ModerationPipelineDeps {
  embedder: EmbeddingProvider;
  index: PolicyIndex;
  engine: DecisionEngine;
  auditLogger: AuditLogger;
  topK?: number;
  logger?: Logger;
}

export interface ModerateOptions {
  signal?: AbortSignal;
  /** Receives the audit record once it is written */
  onAudit?: (record: AuditRecord) => void;
}

/**
 * Fixed four-stage pipeline: embed → retrieve → decide → log.
 *
 * Each stage raises its own error kind and nothing is caught here, so a
 * caller can tell a retrieval failure from a decision failure from a
 * logging failure. `AuditWriteFailedError` still carries the decision.
 */
export class ModerationPipeline {
  private embedder: EmbeddingProvider;
  private index: PolicyIndex;
  private engine: DecisionEngine;
  private auditLogger: AuditLogger;
  private topK: number;
  private logger: Logger;

  constructor(deps: ModerationPipelineDeps) {
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.engine = deps.engine;
    this.auditLogger = deps.auditLogger;
    this.topK = deps.topK ?? 5;
    this.logger = deps.logger ?? pino({ level: 'silent' });
  }

  async moderate(content: string | ContentItem, options: ModerateOptions = {}): Promise<Decision> {
    const { signal, onAudit } = options;
    const item = typeof content === 'string' ? createContentItem(content) : content;

    const checkpoint = (stage: string) => {
      if (signal?.aborted) throw new ModerationAbortedError(stage);
    };

    checkpoint('embedding');
    const embedding = await this.embedder.embed(item.text, signal);

    checkpoint('retrieval');
    const retrieved = this.index.query(embedding, this.topK);
    this.logger.debug(
      { retrieved: retrieved.length, top_score: retrieved[0]?.score },
      'Policies retrieved'
    );

    checkpoint('decision');
    const decision = await this.engine.decide(item, retrieved, signal);

    // The decision exists from here on; logging is not cancellable
    const record = await this.auditLogger.record(item, decision);
    onAudit?.(record);

    return decision;
  }
}
