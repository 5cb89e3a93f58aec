import { describe, it, expect } from 'vitest';
import { AuditLogger } from '../../src/audit/audit-logger.js';
import { hashContent } from '../../src/crypto/hasher.js';
import { AuditWriteFailedError } from '../../src/errors.js';
import { SERVICE_VERSION, createContentItem, type Decision } from '../../src/types/index.js';
import { FailingAuditStore, MemoryAuditStore } from '../helpers/fakes.js';

const decision: Decision = Object.freeze({
  verdict: 'FLAGGED',
  reason: 'Contains a threat against staff',
  policies_cited: ['pol_threats'],
  provider_used: 'FALLBACK',
  latency_ms: 842
});

const content = createContentItem('I will find the manager after work');

describe('AuditLogger', () => {
  it('should record the decision without the raw content', async () => {
    const store = new MemoryAuditStore();
    const logger = new AuditLogger(store);

    const record = await logger.record(content, decision);

    expect(record).toMatchObject({
      content_hash: hashContent(content.text),
      content_length: 34,
      verdict: 'FLAGGED',
      provider_used: 'FALLBACK',
      policies_cited: ['pol_threats'],
      latency_ms: 842,
      service_version: SERVICE_VERSION,
      prev_record_hash: 'link-0'
    });
    expect(record.event_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(JSON.stringify(store.records)).not.toContain('manager');
  });

  it('should give each record a fresh event id', async () => {
    const store = new MemoryAuditStore();
    const logger = new AuditLogger(store);

    const first = await logger.record(content, decision);
    const second = await logger.record(content, decision);

    expect(first.event_id).not.toBe(second.event_id);
    expect(first.content_hash).toBe(second.content_hash);
  });

  it('should key the content hash when a salt is configured', async () => {
    const store = new MemoryAuditStore();
    const record = await new AuditLogger(store, { hashSalt: 'test-salt' }).record(content, decision);

    expect(record.content_hash).toBe(hashContent(content.text, 'test-salt'));
    expect(record.content_hash).not.toBe(hashContent(content.text));
  });

  it('should surface a store failure with the decision attached', async () => {
    const error = await new AuditLogger(new FailingAuditStore()).record(content, decision).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuditWriteFailedError);
    if (!(error instanceof AuditWriteFailedError)) return;
    expect(error.decision).toBe(decision);
    expect(error.message).toBe('Audit record could not be written: disk full');
    expect(error.code).toBe('AUDIT_WRITE_FAILED');
  });
});
