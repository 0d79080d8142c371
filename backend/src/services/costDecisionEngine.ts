import NodeCache from 'node-cache';
import logger from 'jet-logger';

import type {
  CanonicalRecord,
  EnrichmentEntry,
  EnrichmentOutcome,
  RefreshPolicy,
} from '@src/types/pipeline';
import { addressFingerprint } from '@src/utils/fingerprint';
import type { EnrichmentCache } from './enrichmentCache';
import type { EnrichmentClient } from './enrichmentClient';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DecisionContext {
  batchId: string;
  refreshPolicy: RefreshPolicy;
  /** When the batch first started processing; entries older than this are stale under force_refresh. */
  processingStartedAt: Date;
}

export interface CostDecisionOptions {
  /** 0 keeps entries forever under prefer_cache. */
  maxAgeDays: number;
  /** How long a not-found answer is remembered for a batch. */
  notFoundTtlSeconds: number;
  now?: () => Date;
}

/**
 * Cost Decision Engine
 *
 * Decides per record whether a purchased result can be reused or a fresh
 * (billable) lookup is needed:
 * - prefer_cache: reuse any usable entry, fetch only on a miss
 * - force_refresh: entries fetched before the batch started are stale, so
 *   each fingerprint is paid for once per batch run and reused after that
 *
 * Not-found answers never reach the durable cache, but are remembered per
 * batch so the same unknown address is not paid for twice.
 */
export class CostDecisionEngine {
  private readonly notFound: NodeCache;
  private readonly now: () => Date;

  constructor(
    private readonly cache: EnrichmentCache,
    private readonly client: EnrichmentClient,
    private readonly options: CostDecisionOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.notFound = new NodeCache({
      stdTTL: options.notFoundTtlSeconds,
      checkperiod: Math.max(60, Math.floor(options.notFoundTtlSeconds / 4)),
      useClones: false,
    });
  }

  async decide(record: CanonicalRecord, context: DecisionContext): Promise<EnrichmentOutcome> {
    const fingerprint = addressFingerprint(record.property);

    return this.cache.exclusive(fingerprint, async (): Promise<EnrichmentOutcome> => {
      const memoKey = `${context.batchId}:${fingerprint}`;
      if (this.notFound.has(memoKey)) {
        return { source: 'not_found', fingerprint };
      }

      let entry = await this.cache.get(fingerprint);
      if (!entry || !this.isUsable(entry, context)) {
        entry = await this.cache.refresh(fingerprint);
      }
      if (entry && this.isUsable(entry, context)) {
        return {
          source: 'cache',
          fingerprint,
          fetchedAt: entry.fetchedAt,
          contact: entry.contact,
        };
      }

      const response = await this.client.lookup({
        address: record.property,
        firstName: record.firstName || undefined,
        lastName: record.lastName || undefined,
      });

      if (response.status === 'not_found') {
        this.notFound.set(memoKey, true);
        logger.info(`🔍 No skip-trace data for ${fingerprint}`);
        return { source: 'not_found', fingerprint };
      }

      const fresh = await this.cache.put({
        fingerprint,
        contact: response.contact,
        fetchedAt: this.now(),
        sourceBatchId: context.batchId,
      });
      return {
        source: 'fresh',
        fingerprint,
        fetchedAt: fresh.fetchedAt,
        contact: fresh.contact,
      };
    });
  }

  /**
   * Forget per-batch not-found answers, e.g. when a batch is purged.
   */
  forgetBatch(batchId: string): void {
    const prefix = `${batchId}:`;
    this.notFound.del(this.notFound.keys().filter((key) => key.startsWith(prefix)));
  }

  close(): void {
    this.notFound.close();
  }

  private isUsable(entry: EnrichmentEntry, context: DecisionContext): boolean {
    if (context.refreshPolicy === 'force_refresh') {
      return entry.fetchedAt.getTime() >= context.processingStartedAt.getTime();
    }
    if (this.options.maxAgeDays > 0) {
      const age = this.now().getTime() - entry.fetchedAt.getTime();
      return age <= this.options.maxAgeDays * DAY_MS;
    }
    return true;
  }
}
