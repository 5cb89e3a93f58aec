import { appendFileSync, readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { AuditRecord } from '../types/index.js';
import { HashChain, GENESIS_HASH, sha256 } from './hasher.js';
import { signAuditRecord, verifyAuditRecord, loadKeyPair, type KeyPair } from './signer.js';

export type AuditEntry = Omit<AuditRecord, 'prev_record_hash' | 'signature'>;

/**
 * Append-only persistence for audit records. Implementations own the
 * integrity fields (chain link, signature).
 */
export interface AuditStore {
  append(entry: AuditEntry): AuditRecord | Promise<AuditRecord>;
  readAll(): AuditRecord[] | Promise<AuditRecord[]>;
}

export const auditRecordSchema = z.object({
  event_id: z.string(),
  timestamp: z.string(),
  content_hash: z.string(),
  content_length: z.number().int().nonnegative(),
  verdict: z.enum(['APPROVED', 'FLAGGED']),
  provider_used: z.enum(['PRIMARY', 'FALLBACK']),
  policies_cited: z.array(z.string()),
  latency_ms: z.number().int().nonnegative(),
  prev_record_hash: z.string(),
  service_version: z.string(),
  signature: z.string().optional()
});

export interface AuditVerification {
  valid: boolean;
  records: number;
  errors: string[];
}

type ParsedLine = { ok: true; record: AuditRecord } | { ok: false; problem: 'Invalid JSON' | 'Schema violation' };

function parseLine(line: string): ParsedLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return { ok: false, problem: 'Invalid JSON' };
  }
  const parsed = auditRecordSchema.safeParse(json);
  return parsed.success ? { ok: true, record: parsed.data } : { ok: false, problem: 'Schema violation' };
}

function readLines(path: string): string[] {
  if (!existsSync(path)) return [];
  return readFileSync(path, 'utf-8').split('\n').filter(Boolean);
}

/**
 * JSONL audit log. Each line links to the digest of the line before it and
 * is signed when an Ed25519 key pair is present in `keyDir`.
 */
export class AuditLog implements AuditStore {
  private logPath: string;
  private keyPair: KeyPair | null;
  private chain: HashChain;
  private count: number;

  constructor(logPath: string, keyDir?: string) {
    this.logPath = logPath;
    this.keyPair = keyDir ? loadKeyPair(keyDir) : null;

    // Ensure directory exists
    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    // Resume the chain from the last line on disk
    const lines = readLines(logPath);
    const last = lines[lines.length - 1];
    this.count = lines.length;
    this.chain = new HashChain(last === undefined ? GENESIS_HASH : sha256(last));
  }

  get path(): string {
    return this.logPath;
  }

  get signing(): boolean {
    return this.keyPair !== null;
  }

  /** Lines in the log, counted without reading it back */
  get size(): number {
    return this.count;
  }

  append(entry: AuditEntry): AuditRecord {
    const record: AuditRecord = {
      ...entry,
      policies_cited: [...entry.policies_cited],
      prev_record_hash: this.chain.getCurrentHash()
    };

    if (this.keyPair) {
      record.signature = signAuditRecord(record, this.keyPair.privateKey);
    }

    const line = JSON.stringify(record);
    appendFileSync(this.logPath, line + '\n');

    // Only advance the chain once the line is on disk
    this.chain.link(line);
    this.count++;

    return record;
  }

  /** Lines that do not parse are left out; `verify()` reports them */
  readAll(): AuditRecord[] {
    return readLines(this.logPath).flatMap(line => {
      const parsed = parseLine(line);
      return parsed.ok ? [parsed.record] : [];
    });
  }

  tail(limit: number): AuditRecord[] {
    const all = this.readAll();
    return limit > 0 ? all.slice(-limit) : [];
  }

  verify(): AuditVerification {
    const lines = readLines(this.logPath);
    const errors: string[] = [];
    const publicKey = this.keyPair?.publicKey;

    let expectedPrev = GENESIS_HASH;

    for (let i = 0; i < lines.length; i++) {
      const parsed = parseLine(lines[i]);
      if (!parsed.ok) {
        errors.push(`Record ${i}: ${parsed.problem}`);
      } else {
        const record = parsed.record;

        // Verify chain continuity
        if (record.prev_record_hash !== expectedPrev) {
          errors.push(`Record ${i}: Chain broken - expected prev_hash ${expectedPrev}, got ${record.prev_record_hash}`);
        }

        if (publicKey) {
          if (record.signature === undefined) {
            errors.push(`Record ${i}: Signature missing`);
          } else if (!verifyAuditRecord(record, publicKey)) {
            errors.push(`Record ${i}: Signature invalid`);
          }
        }
      }

      expectedPrev = sha256(lines[i]);
    }

    return {
      valid: errors.length === 0,
      records: lines.length,
      errors
    };
  }
}
