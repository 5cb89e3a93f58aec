export type Verdict = 'APPROVED' | 'FLAGGED';

export const VERDICTS: readonly Verdict[] = ['APPROVED', 'FLAGGED'];

export type ProviderRole = 'PRIMARY' | 'FALLBACK';

export interface ContentItem {
  text: string;
  received_at: string;
}

export interface Decision {
  readonly verdict: Verdict;
  readonly reason: string;
  readonly policies_cited: readonly string[];
  readonly provider_used: ProviderRole;
  readonly latency_ms: number;
}

export function createContentItem(text: string, receivedAt: Date = new Date()): ContentItem {
  return { text, received_at: receivedAt.toISOString() };
}
