import { sha256 } from '../crypto/hasher.js';
import type { PolicySourceTag } from '../types/index.js';

export function normalizePolicyText(raw: string): string {
  return raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.trimEnd())
    .join('\n')
    .replace(/\n{2,}/g, '\n')
    .trim();
}

/**
 * Content-addressed id: the same normalized text from the same source always
 * maps to the same record.
 */
export function policyId(normalizedText: string, source: PolicySourceTag): string {
  return `pol_${sha256(`${source}\n${normalizedText}`).slice(0, 24)}`;
}
