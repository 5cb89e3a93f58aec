import { describe, it, expect, beforeEach } from 'vitest';
import { AuditLogger } from '../src/audit/audit-logger.js';
import { hashContent } from '../src/crypto/hasher.js';
import { DecisionEngine } from '../src/decision/engine.js';
import type { EmbeddingProvider } from '../src/embedding/provider.js';
import {
  AuditWriteFailedError,
  DecisionUnavailableError,
  EmbeddingUnavailableError,
  ModerationAbortedError
} from '../src/errors.js';
import { PolicyIngestor } from '../src/ingest/ingestor.js';
import { policyId } from '../src/ingest/normalize.js';
import { StaticPolicySource } from '../src/ingest/sources.js';
import { ModerationPipeline } from '../src/pipeline.js';
import { PolicyIndex } from '../src/retrieval/policy-index.js';
import type { AuditRecord } from '../src/types/index.js';
import {
  FailingAuditStore,
  FakeEmbeddingProvider,
  MemoryAuditStore,
  ScriptedGenerationProvider,
  decisionJson,
  transientError
} from './helpers/fakes.js';

const CONTENT = 'This service is terrible!';
const STATIC_POLICY = 'Negative reviews must not include threats';
const SCRAPED_POLICY = 'Customers may voice dissatisfaction with a service';

const STATIC_ID = policyId(STATIC_POLICY, 'static');
const SCRAPED_ID = policyId(SCRAPED_POLICY, 'scraped');

const noDelay = { retries: 1, attemptTimeoutMs: 1000, delayMs: 0 };

function embedder(): FakeEmbeddingProvider {
  return new FakeEmbeddingProvider({
    [CONTENT]: [0.9, 0.3, 0],
    [STATIC_POLICY]: [0, 1, 0],
    [SCRAPED_POLICY]: [1, 0, 0]
  });
}

async function seededIndex(provider: EmbeddingProvider): Promise<PolicyIndex> {
  const index = new PolicyIndex();
  const ingestor = new PolicyIngestor(index, provider);
  await ingestor.ingest(new StaticPolicySource('handbook', [STATIC_POLICY]));
  await ingestor.ingest(new StaticPolicySource('scraper', [SCRAPED_POLICY], 'scraped'));
  return index;
}

describe('ModerationPipeline', () => {
  let store: MemoryAuditStore;

  beforeEach(() => {
    store = new MemoryAuditStore();
  });

  it('should moderate a critical review end to end', async () => {
    const provider = embedder();
    const index = await seededIndex(provider);
    const primary = new ScriptedGenerationProvider('primary', [
      decisionJson('APPROVED', 'Critical but non-threatening opinion', [SCRAPED_ID])
    ]);
    const pipeline = new ModerationPipeline({
      embedder: provider,
      index,
      engine: new DecisionEngine({ primary, retry: noDelay }),
      auditLogger: new AuditLogger(store)
    });

    let audited: AuditRecord | undefined;
    const decision = await pipeline.moderate(CONTENT, { onAudit: record => (audited = record) });

    expect(decision).toMatchObject({
      verdict: 'APPROVED',
      reason: 'Critical but non-threatening opinion',
      policies_cited: [SCRAPED_ID],
      provider_used: 'PRIMARY'
    });

    // Scraped policy is the closer match, so it is listed first
    const prompt = primary.requests[0].prompt;
    expect(prompt.indexOf(SCRAPED_ID)).toBeGreaterThan(-1);
    expect(prompt.indexOf(SCRAPED_ID)).toBeLessThan(prompt.indexOf(STATIC_ID));

    expect(store.records).toHaveLength(1);
    const [record] = store.records;
    expect(audited).toBe(record);
    expect(record).toMatchObject({
      content_hash: hashContent(CONTENT),
      content_length: 25,
      verdict: 'APPROVED',
      provider_used: 'PRIMARY',
      policies_cited: [SCRAPED_ID]
    });
    expect(JSON.stringify(record)).not.toContain('terrible');
  });

  it('should limit retrieval to topK policies', async () => {
    const provider = embedder();
    const index = await seededIndex(provider);
    const primary = new ScriptedGenerationProvider('primary', [decisionJson('APPROVED', 'ok', [])]);
    const pipeline = new ModerationPipeline({
      embedder: provider,
      index,
      engine: new DecisionEngine({ primary, retry: noDelay }),
      auditLogger: new AuditLogger(store),
      topK: 1
    });

    await pipeline.moderate(CONTENT);

    expect(primary.requests[0].prompt).toContain(SCRAPED_ID);
    expect(primary.requests[0].prompt).not.toContain(STATIC_ID);
  });

  it('should decide with no policy context when the index is empty', async () => {
    const primary = new ScriptedGenerationProvider('primary', [decisionJson('APPROVED', 'ok', [])]);
    const pipeline = new ModerationPipeline({
      embedder: embedder(),
      index: new PolicyIndex(),
      engine: new DecisionEngine({ primary, retry: noDelay }),
      auditLogger: new AuditLogger(store)
    });

    const decision = await pipeline.moderate(CONTENT);

    expect(decision.policies_cited).toEqual([]);
    expect(primary.requests[0].prompt).toContain('(no relevant policies found)');
    expect(store.records).toHaveLength(1);
  });

  it('should write no audit record when no decision is available', async () => {
    const provider = embedder();
    const pipeline = new ModerationPipeline({
      embedder: provider,
      index: await seededIndex(provider),
      engine: new DecisionEngine({
        primary: new ScriptedGenerationProvider('primary', [transientError()]),
        fallback: new ScriptedGenerationProvider('fallback', ['no json here']),
        retry: noDelay
      }),
      auditLogger: new AuditLogger(store)
    });

    await expect(pipeline.moderate(CONTENT)).rejects.toBeInstanceOf(DecisionUnavailableError);
    expect(store.records).toHaveLength(0);
  });

  it('should propagate an embedding failure before any decision is attempted', async () => {
    const primary = new ScriptedGenerationProvider('primary', [decisionJson('APPROVED', 'ok', [])]);
    const pipeline = new ModerationPipeline({
      embedder: new FakeEmbeddingProvider({}, [1, 0, 0], new Set([CONTENT])),
      index: new PolicyIndex(),
      engine: new DecisionEngine({ primary, retry: noDelay }),
      auditLogger: new AuditLogger(store)
    });

    await expect(pipeline.moderate(CONTENT)).rejects.toBeInstanceOf(EmbeddingUnavailableError);
    expect(primary.calls).toBe(0);
    expect(store.records).toHaveLength(0);
  });

  it('should return the decision inside AuditWriteFailedError when logging fails', async () => {
    const provider = embedder();
    const pipeline = new ModerationPipeline({
      embedder: provider,
      index: await seededIndex(provider),
      engine: new DecisionEngine({
        primary: new ScriptedGenerationProvider('primary', [decisionJson('FLAGGED', 'Hostile', [STATIC_ID])]),
        retry: noDelay
      }),
      auditLogger: new AuditLogger(new FailingAuditStore())
    });

    const error = await pipeline.moderate(CONTENT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuditWriteFailedError);
    if (!(error instanceof AuditWriteFailedError)) return;
    expect(error.decision).toMatchObject({ verdict: 'FLAGGED', policies_cited: [STATIC_ID] });
  });

  it('should stop before retrieval when cancelled during embedding', async () => {
    const controller = new AbortController();
    const cancelling: EmbeddingProvider = {
      name: 'cancelling',
      embed: async () => {
        controller.abort();
        return [1, 0, 0];
      }
    };
    const primary = new ScriptedGenerationProvider('primary', [decisionJson('APPROVED', 'ok', [])]);
    const pipeline = new ModerationPipeline({
      embedder: cancelling,
      index: new PolicyIndex(),
      engine: new DecisionEngine({ primary, retry: noDelay }),
      auditLogger: new AuditLogger(store)
    });

    await expect(pipeline.moderate(CONTENT, { signal: controller.signal })).rejects.toThrow(
      new ModerationAbortedError('retrieval')
    );
    expect(primary.calls).toBe(0);
    expect(store.records).toHaveLength(0);
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const provider = embedder();
    const pipeline = new ModerationPipeline({
      embedder: provider,
      index: new PolicyIndex(),
      engine: new DecisionEngine({
        primary: new ScriptedGenerationProvider('primary', [decisionJson('APPROVED', 'ok', [])]),
        retry: noDelay
      }),
      auditLogger: new AuditLogger(store)
    });

    await expect(pipeline.moderate(CONTENT, { signal: controller.signal })).rejects.toBeInstanceOf(
      ModerationAbortedError
    );
    expect(provider.calls).toEqual([]);
  });
});
