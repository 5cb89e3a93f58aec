import { v4 as uuidv4 } from 'uuid';
import pino, { type Logger } from 'pino';
import { AuditWriteFailedError } from '../errors.js';
import { hashContent } from '../crypto/hasher.js';
import type { AuditStore } from '../crypto/audit-log.js';
import { SERVICE_VERSION, type AuditRecord, type ContentItem, type Decision } from '../types/index.js';

export interface AuditLoggerOptions {
  /** Keys the content digest; leave unset for plain SHA-256 */
  hashSalt?: string;
  logger?: Logger;
}

/**
 * Writes one anonymized record per decision. The raw text only ever reaches
 * the digest function; the record keeps its hash and length.
 */
export class AuditLogger {
  private store: AuditStore;
  private hashSalt?: string;
  private logger: Logger;

  constructor(store: AuditStore, options: AuditLoggerOptions = {}) {
    this.store = store;
    this.hashSalt = options.hashSalt;
    this.logger = options.logger ?? pino({ level: 'silent' });
  }

  async record(content: ContentItem, decision: Decision): Promise<AuditRecord> {
    const entry = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      content_hash: hashContent(content.text, this.hashSalt),
      content_length: content.text.length,
      verdict: decision.verdict,
      provider_used: decision.provider_used,
      policies_cited: [...decision.policies_cited],
      latency_ms: decision.latency_ms,
      service_version: SERVICE_VERSION
    };

    try {
      return await this.store.append(entry);
    } catch (error) {
      this.logger.error({ err: error, event_id: entry.event_id }, 'Audit write failed');
      throw new AuditWriteFailedError(decision, { cause: error });
    }
  }
}
