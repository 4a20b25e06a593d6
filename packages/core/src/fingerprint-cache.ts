/**
 * In-process memo of existence verdicts keyed by (hypertable, fingerprint)
 *
 * Entries expire after the TTL and the total count is bounded; when full,
 * the least recently written entry is evicted. Expired entries are removed
 * lazily on read and in bulk by `sweep()`.
 */

export interface FingerprintCacheEntry {
  exists: boolean;
  /** Epoch milliseconds when the verdict was recorded */
  recordedAt: number;
}

export interface FingerprintCacheOptions {
  ttlSeconds?: number;
  maxEntries?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface FingerprintCacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

export const DEFAULT_CACHE_TTL_SECONDS = 3600;
export const DEFAULT_CACHE_MAX_ENTRIES = 10000;

export class FingerprintCache {
  private readonly entries = new Map<string, FingerprintCacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: FingerprintCacheOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS) * 1000;
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  private static key(hypertable: string, fingerprint: string): string {
    return `${hypertable}:${fingerprint}`;
  }

  private isFresh(entry: FingerprintCacheEntry, at: number): boolean {
    return at - entry.recordedAt < this.ttlMs;
  }

  /**
   * Fresh verdict for the pair, or undefined on a miss or an expired entry
   */
  get(hypertable: string, fingerprint: string): boolean | undefined {
    const key = FingerprintCache.key(hypertable, fingerprint);
    const entry = this.entries.get(key);

    if (entry && this.isFresh(entry, this.now())) {
      this.hits++;
      return entry.exists;
    }

    if (entry) {
      this.entries.delete(key);
    }
    this.misses++;
    return undefined;
  }

  set(hypertable: string, fingerprint: string, exists: boolean): void {
    const key = FingerprintCache.key(hypertable, fingerprint);
    // Re-insert so Map order tracks write recency
    this.entries.delete(key);
    this.entries.set(key, { exists, recordedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  /**
   * Remove every expired entry; returns the number removed
   */
  sweep(): number {
    const at = this.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry, at)) {
        this.entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): FingerprintCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
