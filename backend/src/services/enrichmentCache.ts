import NodeCache from 'node-cache';
import logger from 'jet-logger';

import type { EnrichmentEntry } from '@src/types/pipeline';
import type { EnrichmentStore } from '@src/types/stores';
import { KeyedLock } from '@src/utils/keyedLock';

export interface EnrichmentCacheOptions {
  /** Seconds an entry stays in the in-process layer. */
  hotTtlSeconds: number;
}

export interface EnrichmentCacheStats {
  hits: number;
  misses: number;
  keys: number;
  hitRate: string;
}

/**
 * Enrichment Cache
 *
 * Purchased skip-trace results keyed by property-address fingerprint and
 * shared by every batch and owner. The durable store is the source of truth;
 * a node-cache layer in front of it saves a round trip for fingerprints seen
 * recently in this process.
 *
 * Reads and writes that decide whether to pay for a lookup must happen inside
 * `exclusive(fingerprint, ...)`, which serializes them per fingerprint.
 */
export class EnrichmentCache {
  private readonly hot: NodeCache;
  private readonly lock = new KeyedLock();

  constructor(
    private readonly store: EnrichmentStore,
    options: EnrichmentCacheOptions,
  ) {
    this.hot = new NodeCache({
      stdTTL: options.hotTtlSeconds,
      checkperiod: Math.max(60, Math.floor(options.hotTtlSeconds / 4)),
      useClones: false,
      deleteOnExpire: true,
    });
  }

  /**
   * Entry for a fingerprint, from the hot layer when present.
   */
  async get(fingerprint: string): Promise<EnrichmentEntry | null> {
    const hot = this.hot.get<EnrichmentEntry>(fingerprint);
    if (hot) {
      return hot;
    }
    return this.refresh(fingerprint);
  }

  /**
   * Entry for a fingerprint read straight from the durable store. Another
   * process may have written a newer one since the hot layer was filled.
   */
  async refresh(fingerprint: string): Promise<EnrichmentEntry | null> {
    const entry = await this.store.get(fingerprint);
    if (entry) {
      this.hot.set(fingerprint, entry);
    } else {
      this.hot.del(fingerprint);
    }
    return entry;
  }

  /**
   * Create or overwrite the entry. The last successful fetch wins.
   */
  async put(entry: EnrichmentEntry): Promise<EnrichmentEntry> {
    await this.store.put(entry);
    this.hot.set(entry.fingerprint, entry);
    logger.info(`💾 Enrichment cached: ${entry.fingerprint} (batch ${entry.sourceBatchId})`);
    return entry;
  }

  /**
   * Run `fn` while no other decision for the same fingerprint is running in
   * this process.
   */
  exclusive<T>(fingerprint: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.run(fingerprint, fn);
  }

  getStats(): EnrichmentCacheStats {
    const stats = this.hot.getStats();
    const hitRate = stats.hits + stats.misses > 0
      ? ((stats.hits / (stats.hits + stats.misses)) * 100).toFixed(2)
      : '0.00';

    return {
      hits: stats.hits,
      misses: stats.misses,
      keys: stats.keys,
      hitRate: `${hitRate}%`,
    };
  }

  /**
   * Stop the hot layer's expiry timer.
   */
  close(): void {
    this.hot.flushAll();
    this.hot.close();
  }
}
