export type PolicySourceTag = 'static' | 'scraped' | 'news_feed';

export const POLICY_SOURCE_TAGS: readonly PolicySourceTag[] = ['static', 'scraped', 'news_feed'];

export interface PolicyRecord {
  id: string;
  text: string;
  source: PolicySourceTag;
  embedding: readonly number[];
  ingested_at: string;
}

export interface RetrievedPolicy {
  record: PolicyRecord;
  /** Cosine similarity clamped to [0, 1] */
  score: number;
}

/** Ranked descending by score, length <= top_k */
export type RetrievalResult = RetrievedPolicy[];

export interface RawPolicy {
  text: string;
  source: PolicySourceTag;
}

/**
 * Pull-based supplier of raw policy text. May be fetched repeatedly; the
 * ingestor deduplicates through content-addressed ids.
 */
export interface PolicySource {
  readonly name: string;
  fetch(): Iterable<RawPolicy> | AsyncIterable<RawPolicy> | Promise<RawPolicy[]>;
}
