import type { ProviderRole, Verdict } from './decision.js';

export interface AuditRecord {
  event_id: string;
  timestamp: string;
  content_hash: string;
  content_length: number;
  verdict: Verdict;
  provider_used: ProviderRole;
  policies_cited: string[];
  latency_ms: number;
  prev_record_hash: string;
  service_version: string;
  signature?: string;
}
