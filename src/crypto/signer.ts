import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { sign, verify, generateKeyPairSync } from 'crypto';
import { join } from 'path';
import type { AuditRecord } from '../types/index.js';

export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

export const PRIVATE_KEY_FILE = 'policyguard.key';
export const PUBLIC_KEY_FILE = 'policyguard.pub';

export function generateKeyPair(): KeyPair {
  const { privateKey, publicKey } = generateKeyPairSync('ed25519', {
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' }
  });

  return { privateKey, publicKey };
}

export function saveKeyPair(keyDir: string, keyPair: KeyPair): void {
  if (!existsSync(keyDir)) {
    mkdirSync(keyDir, { recursive: true, mode: 0o700 });
  }

  writeFileSync(join(keyDir, PRIVATE_KEY_FILE), keyPair.privateKey, { mode: 0o600 });
  writeFileSync(join(keyDir, PUBLIC_KEY_FILE), keyPair.publicKey, { mode: 0o644 });
}

export function loadKeyPair(keyDir: string): KeyPair | null {
  const privPath = join(keyDir, PRIVATE_KEY_FILE);
  const pubPath = join(keyDir, PUBLIC_KEY_FILE);

  if (!existsSync(privPath) || !existsSync(pubPath)) {
    return null;
  }

  return {
    privateKey: readFileSync(privPath, 'utf-8'),
    publicKey: readFileSync(pubPath, 'utf-8')
  };
}

export function signData(data: string, privateKey: string): string {
  const signature = sign(null, Buffer.from(data), privateKey);
  return signature.toString('base64');
}

export function verifySignature(data: string, signature: string, publicKey: string): boolean {
  try {
    return verify(null, Buffer.from(data), publicKey, Buffer.from(signature, 'base64'));
  } catch {
    return false;
  }
}

export type SignableAuditRecord = Omit<AuditRecord, 'signature'>;

// Every record field except the signature itself, in a fixed order
export function auditSigningPayload(record: SignableAuditRecord): string {
  return JSON.stringify([
    record.event_id,
    record.timestamp,
    record.content_hash,
    record.content_length,
    record.verdict,
    record.provider_used,
    record.policies_cited,
    record.latency_ms,
    record.prev_record_hash,
    record.service_version
  ]);
}

export function signAuditRecord(record: SignableAuditRecord, privateKey: string): string {
  return signData(auditSigningPayload(record), privateKey);
}

export function verifyAuditRecord(record: SignableAuditRecord & { signature?: string }, publicKey: string): boolean {
  if (!record.signature) return false;
  return verifySignature(auditSigningPayload(record), record.signature, publicKey);
}
