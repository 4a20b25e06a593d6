/**
 * Deduplication Engine
 *
 * Decides whether an observation is new. Equivalent observations (same
 * identity, same time bucket) share a fingerprint; existence is answered from
 * the in-process cache when fresh, otherwise by the durable store.
 *
 * When the store cannot answer, the observation is treated as new and the
 * verdict is not cached: availability over strict deduplication.
 */

import type { Observation } from '@dbsentinel/types';
import { InvalidConfigurationError } from './errors.js';
import type { ObservationStore } from './database.js';
import {
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CACHE_TTL_SECONDS,
  FingerprintCache,
} from './fingerprint-cache.js';
import {
  DEFAULT_BUCKET_MINUTES,
  buildFingerprintKey,
  hashFingerprintKey,
  parseObservationTime,
  renderTimePart,
} from './fingerprint.js';
import { createLogger, fingerprintPrefix, type Logger } from './logger.js';
import { QueryBuilder } from './query-builder.js';

export const DEFAULT_LOOKBACK_HOURS = 1;
export const MIN_BUCKET_MINUTES = 1;
export const MAX_BUCKET_MINUTES = 60;

export interface DeduplicationEngineOptions {
  store: ObservationStore;
  queryBuilder?: QueryBuilder;
  logger?: Logger;
  bucketMinutes?: number;
  cacheTtlSeconds?: number;
  maxCacheEntries?: number;
  /** Clock; drives both cache freshness and the unparsable-timestamp fallback */
  now?: () => Date;
}

export interface AdmissionDecision {
  admit: boolean;
  fingerprint: string;
}

export interface DeduplicationStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  oracleQueries: number;
  oracleFailures: number;
  bucketMinutes: number;
}

function assertBucketMinutes(minutes: number): void {
  if (!Number.isInteger(minutes) || minutes < MIN_BUCKET_MINUTES || minutes > MAX_BUCKET_MINUTES) {
    throw new InvalidConfigurationError(
      `Bucket interval must be an integer between ${MIN_BUCKET_MINUTES} and ${MAX_BUCKET_MINUTES} minutes, got ${minutes}`,
      { bucketMinutes: minutes }
    );
  }
}

export class DeduplicationEngine {
  private readonly store: ObservationStore;
  private readonly queryBuilder: QueryBuilder;
  private readonly logger: Logger;
  private readonly cache: FingerprintCache;
  private readonly now: () => Date;
  private bucketMinutes: number;
  private oracleQueries = 0;
  private oracleFailures = 0;

  constructor(options: DeduplicationEngineOptions) {
    const bucketMinutes = options.bucketMinutes ?? DEFAULT_BUCKET_MINUTES;
    assertBucketMinutes(bucketMinutes);

    this.store = options.store;
    this.logger = options.logger ?? createLogger({ name: 'deduplication' });
    this.queryBuilder = options.queryBuilder ?? new QueryBuilder({ logger: this.logger });
    this.now = options.now ?? (() => new Date());
    this.bucketMinutes = bucketMinutes;
    this.cache = new FingerprintCache({
      ttlSeconds: options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS,
      maxEntries: options.maxCacheEntries ?? DEFAULT_CACHE_MAX_ENTRIES,
      now: () => this.now().getTime(),
    });

    this.logger.info(
      {
        bucketMinutes,
        cacheTtlSeconds: options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS,
        maxCacheEntries: options.maxCacheEntries ?? DEFAULT_CACHE_MAX_ENTRIES,
      },
      'Deduplication engine initialized'
    );
  }

  /**
   * Fingerprint an observation. With `bucketTime`, the time component is the
   * start of its bucket; without it, the raw value as text.
   */
  generateFingerprint(observation: Readonly<Observation>, bucketTime = true): string {
    const timePart = renderTimePart(observation, {
      bucketTime,
      bucketMinutes: this.bucketMinutes,
      now: this.now,
      onUnparsable: (raw) => {
        this.logger.warn(
          { degraded: true, rawTimestamp: String(raw) },
          'Unparsable observation timestamp, bucketing by current time'
        );
      },
    });
    const key = buildFingerprintKey(observation, timePart);
    const fingerprint = hashFingerprintKey(key);

    this.logger.debug({ fingerprint: fingerprintPrefix(fingerprint) }, 'Generated fingerprint');
    return fingerprint;
  }

  /**
   * Whether the fingerprint is already recorded in the hypertable within the lookback window
   */
  async alreadyExists(
    fingerprint: string,
    hypertable: string,
    lookbackHours = DEFAULT_LOOKBACK_HOURS
  ): Promise<boolean> {
    const cached = this.cache.get(hypertable, fingerprint);
    if (cached !== undefined) {
      this.logger.debug(
        { fingerprint: fingerprintPrefix(fingerprint), hypertable },
        'Fingerprint cache hit'
      );
      return cached;
    }

    // Identifier rejection propagates: it is a correctness failure, not an outage
    const statement = this.queryBuilder.render({
      kind: 'fingerprint_exists',
      hypertable,
      fingerprint,
      lookbackHours,
    });

    this.oracleQueries++;
    let exists: boolean;
    try {
      const value = await this.store.fetchOneValue(statement.text, statement.values);
      exists = value === true;
    } catch (error) {
      this.oracleFailures++;
      this.logger.error(
        { err: error, fingerprint: fingerprintPrefix(fingerprint), hypertable },
        'Existence check failed, treating observation as new'
      );
      return false;
    }

    this.cache.set(hypertable, fingerprint, exists);
    return exists;
  }

  /**
   * Fingerprint the observation and decide whether it should be inserted
   */
  async shouldInsert(
    observation: Readonly<Observation>,
    hypertable: string,
    lookbackHours = DEFAULT_LOOKBACK_HOURS
  ): Promise<AdmissionDecision> {
    const fingerprint = this.generateFingerprint(observation);
    const exists = await this.alreadyExists(fingerprint, hypertable, lookbackHours);

    if (exists) {
      this.logger.debug(
        { fingerprint: fingerprintPrefix(fingerprint), hypertable },
        'Duplicate observation skipped'
      );
    }

    return { admit: !exists, fingerprint };
  }

  /**
   * Record a successful write so later checks skip the store
   */
  markInserted(fingerprint: string, hypertable: string): void {
    this.cache.set(hypertable, fingerprint, true);
  }

  /**
   * Latest recorded time for the database in the hypertable, or null when
   * there is none or the store cannot answer
   */
  async getLastSyncTime(dbId: string, hypertable: string): Promise<Date | null> {
    const statement = this.queryBuilder.render({ kind: 'last_sync_time', hypertable, dbId });

    try {
      const value = await this.store.fetchOneValue(statement.text, statement.values);
      return value === null || value === undefined ? null : parseObservationTime(value);
    } catch (error) {
      this.logger.error({ err: error, hypertable }, 'Failed to read last sync time');
      return null;
    }
  }

  clearCache(): void {
    const size = this.cache.size;
    this.cache.clear();
    this.logger.info({ cleared: size }, 'Fingerprint cache cleared');
  }

  /**
   * Drop expired cache entries; returns the number removed
   */
  cleanupOldCache(): number {
    const removed = this.cache.sweep();
    if (removed > 0) {
      this.logger.debug({ removed }, 'Expired cache entries removed');
    }
    return removed;
  }

  setBucketInterval(minutes: number): void {
    assertBucketMinutes(minutes);
    this.bucketMinutes = minutes;
    this.logger.info({ bucketMinutes: minutes }, 'Bucket interval updated');
  }

  getBucketInterval(): number {
    return this.bucketMinutes;
  }

  getCacheStats(): DeduplicationStats {
    return {
      ...this.cache.getStats(),
      oracleQueries: this.oracleQueries,
      oracleFailures: this.oracleFailures,
      bucketMinutes: this.bucketMinutes,
    };
  }
}
