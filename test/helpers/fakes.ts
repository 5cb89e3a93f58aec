/**
 * In-process stand-ins for the network-backed collaborators.
 */

import { EmbeddingUnavailableError, ProviderError } from '../../src/errors.js';
import type { AuditEntry, AuditStore } from '../../src/crypto/audit-log.js';
import type { EmbeddingProvider } from '../../src/embedding/provider.js';
import type { GenerationProvider, GenerationRequest } from '../../src/inference/router.js';
import type { AuditRecord, PolicyRecord } from '../../src/types/index.js';

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fake-embeddings';
  readonly calls: string[] = [];

  constructor(
    private vectors: Record<string, number[]>,
    private fallbackVector: number[] = [0, 0, 1],
    private failing: Set<string> = new Set()
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failing.has(text)) {
      throw new EmbeddingUnavailableError(`fake backend refused: ${text}`);
    }
    return this.vectors[text] ?? this.fallbackVector;
  }
}

export type ScriptStep = string | ProviderError | { hang: true };

/**
 * Plays back a fixed script of responses; the last step repeats.
 */
export class ScriptedGenerationProvider implements GenerationProvider {
  readonly model = 'scripted';
  readonly requests: GenerationRequest[] = [];

  constructor(
    readonly name: string,
    private script: ScriptStep[]
  ) {}

  get calls(): number {
    return this.requests.length;
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    const step = this.script[Math.min(this.requests.length - 1, this.script.length - 1)];
    if (step instanceof ProviderError) throw step;
    if (typeof step === 'string') return step;
    return new Promise<string>(() => {
      // never settles
    });
  }
}

export class MemoryAuditStore implements AuditStore {
  readonly records: AuditRecord[] = [];

  append(entry: AuditEntry): AuditRecord {
    const record: AuditRecord = { ...entry, prev_record_hash: `link-${this.records.length}` };
    this.records.push(record);
    return record;
  }

  readAll(): AuditRecord[] {
    return [...this.records];
  }
}

export class FailingAuditStore implements AuditStore {
  append(): AuditRecord {
    throw new Error('disk full');
  }

  readAll(): AuditRecord[] {
    return [];
  }
}

export function policyRecord(id: string, embedding: number[], overrides: Partial<PolicyRecord> = {}): PolicyRecord {
  return {
    id,
    text: `policy ${id}`,
    source: 'static',
    embedding,
    ingested_at: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

export function decisionJson(verdict: string, reason: string, cited: string[]): string {
  return JSON.stringify({ verdict, reason, policies_cited: cited });
}

export const transientError = (message = 'upstream 503') => new ProviderError(message, true, 503);
export const fatalError = (message = 'bad request') => new ProviderError(message, false, 400);
