import pino, { type Logger } from 'pino';
import { ModerationAbortedError } from '../errors.js';
import type { EmbeddingProvider } from '../embedding/provider.js';
import type { PolicyIndex } from '../retrieval/policy-index.js';
import type { PolicySource } from '../types/index.js';
import { normalizePolicyText, policyId } from './normalize.js';

export interface IngestReport {
  source: string;
  fetched: number;
  upserted: number;
  unchanged: number;
  skippedEmpty: number;
  failed: number;
}

export interface PolicyIngestorOptions {
  logger?: Logger;
  clock?: () => Date;
}

export class PolicyIngestor {
  private index: PolicyIndex;
  private embedder: EmbeddingProvider;
  private logger: Logger;
  private clock: () => Date;

  constructor(index: PolicyIndex, embedder: EmbeddingProvider, options: PolicyIngestorOptions = {}) {
    this.index = index;
    this.embedder = embedder;
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.clock = options.clock ?? (() => new Date());
  }

  /** Returns the number of records upserted */
  async ingest(source: PolicySource, signal?: AbortSignal): Promise<number> {
    const report = await this.ingestWithReport(source, signal);
    return report.upserted;
  }

  async ingestWithReport(source: PolicySource, signal?: AbortSignal): Promise<IngestReport> {
    const report: IngestReport = {
      source: source.name,
      fetched: 0,
      upserted: 0,
      unchanged: 0,
      skippedEmpty: 0,
      failed: 0
    };
    const seen = new Set<string>();

    for await (const raw of await source.fetch()) {
      if (signal?.aborted) throw new ModerationAbortedError('policy ingestion');
      report.fetched++;

      const text = normalizePolicyText(raw.text);
      if (!text) {
        report.skippedEmpty++;
        continue;
      }

      const id = policyId(text, raw.source);
      // Same id means same text, so there is nothing to re-embed
      if (seen.has(id) || this.index.has(id)) {
        report.unchanged++;
        continue;
      }
      seen.add(id);

      let embedding: number[];
      try {
        embedding = await this.embedder.embed(text, signal);
      } catch (error) {
        if (error instanceof ModerationAbortedError) throw error;
        report.failed++;
        this.logger.warn({ err: error, policy_id: id, source: raw.source }, 'Skipping policy: embedding failed');
        continue;
      }

      this.index.upsert({
        id,
        text,
        source: raw.source,
        embedding,
        ingested_at: this.clock().toISOString()
      });
      report.upserted++;
    }

    this.logger.info(report, 'Policy ingestion finished');
    return report;
  }
}
