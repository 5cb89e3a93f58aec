import { DimensionMismatchError } from '../errors.js';
import type { PolicyRecord, RetrievalResult } from '../types/index.js';
import { cosineSimilarity, toRelevanceScore, vectorNorm } from './similarity.js';

interface IndexEntry {
  record: PolicyRecord;
  norm: number;
}

export interface PolicyIndexOptions {
  /** Fixes the dimension up front; otherwise the first upsert sets it */
  dimension?: number;
}

function freezeRecord(record: PolicyRecord): PolicyRecord {
  return Object.freeze({
    ...record,
    embedding: Object.freeze([...record.embedding])
  });
}

/**
 * In-memory vector store of policy records.
 *
 * Writers build a new map and swap the reference in one assignment, so a
 * query always scans one consistent snapshot and never sees a half-applied
 * upsert. Records are frozen on the way in.
 */
export class PolicyIndex {
  private snapshot: ReadonlyMap<string, IndexEntry> = new Map();
  private dimension?: number;

  constructor(options: PolicyIndexOptions = {}) {
    this.dimension = options.dimension;
  }

  get size(): number {
    return this.snapshot.size;
  }

  getDimension(): number | undefined {
    return this.dimension;
  }

  has(id: string): boolean {
    return this.snapshot.has(id);
  }

  get(id: string): PolicyRecord | undefined {
    return this.snapshot.get(id)?.record;
  }

  /** All records in insertion order */
  records(): PolicyRecord[] {
    return Array.from(this.snapshot.values(), entry => entry.record);
  }

  upsert(record: PolicyRecord): void {
    this.upsertMany([record]);
  }

  /**
   * Validates the whole batch before publishing it, so a bad record leaves
   * the index untouched.
   */
  upsertMany(records: readonly PolicyRecord[]): void {
    if (records.length === 0) return;

    let dimension = this.dimension;
    const entries: IndexEntry[] = [];

    for (const record of records) {
      const length = record.embedding.length;
      if (dimension === undefined) {
        dimension = length;
      } else if (length !== dimension) {
        throw new DimensionMismatchError(dimension, length);
      }

      const frozen = freezeRecord(record);
      entries.push({ record: frozen, norm: vectorNorm(frozen.embedding) });
    }

    const next = new Map(this.snapshot);
    for (const entry of entries) {
      next.set(entry.record.id, entry);
    }

    this.dimension = dimension;
    this.snapshot = next;
  }

  query(embedding: readonly number[], topK: number): RetrievalResult {
    const snapshot = this.snapshot;
    const limit = Math.floor(topK);

    if (snapshot.size === 0 || limit <= 0) return [];

    if (this.dimension !== undefined && embedding.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, embedding.length);
    }

    const queryNorm = vectorNorm(embedding);
    const scored: RetrievalResult = [];

    for (const { record, norm } of snapshot.values()) {
      const cosine = cosineSimilarity(embedding, record.embedding, queryNorm, norm);
      scored.push({ record, score: toRelevanceScore(cosine) });
    }

    scored.sort((a, b) => {
      if (b.score !== a.score) return b.score - a.score;
      // Newer policy text wins an exact tie
      const recency = Date.parse(b.record.ingested_at) - Date.parse(a.record.ingested_at);
      if (recency !== 0) return recency;
      return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
    });

    return scored.slice(0, limit);
  }
}
