import { createHash, createHmac } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export function hmacSha256(data: string, key: string): string {
  return createHmac('sha256', key).update(data).digest('hex');
}

/**
 * One-way digest of submitted content. With a salt the digest is keyed, so
 * short texts cannot be recovered by hashing guesses.
 */
export function hashContent(text: string, salt?: string): string {
  return salt ? hmacSha256(text, salt) : sha256(text);
}

export const GENESIS_HASH = sha256('policyguard-audit-genesis');

// Hash chain for tamper-evident log: each link is the digest of the previous serialized record
export class HashChain {
  private head: string;

  constructor(head: string = GENESIS_HASH) {
    this.head = head;
  }

  getCurrentHash(): string {
    return this.head;
  }

  link(serializedRecord: string): { prevHash: string; headHash: string } {
    const prevHash = this.head;
    this.head = sha256(serializedRecord);
    return { prevHash, headHash: this.head };
  }
}
