export type {
  PolicySourceTag,
  PolicyRecord,
  RetrievedPolicy,
  RetrievalResult,
  RawPolicy,
  PolicySource
} from './policy.js';
export { POLICY_SOURCE_TAGS } from './policy.js';
export type { Verdict, ProviderRole, ContentItem, Decision } from './decision.js';
export { VERDICTS, createContentItem } from './decision.js';
export type { AuditRecord } from './audit.js';

export const SERVICE_VERSION = '1.0.0';
