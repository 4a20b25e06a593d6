import { createHash } from 'node:crypto';
import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { DeduplicationEngine } from '../deduplication.js';
import {
  DatabaseConnectionError,
  InvalidConfigurationError,
  InvalidIdentifierError,
} from '../errors.js';
import { createStubStore } from './helpers/fakes.js';
import { createCapturingLogger, type CapturingLogger } from './helpers/logger.js';

const sha256 = (key: string): string => createHash('sha256').update(key).digest('hex');

const slowQuery = (executedAt: string) => ({
  db_id: 'db1',
  table_name: 'orders',
  event_type: 'slow_query',
  query_hash: 'abc123',
  executed_at: executedAt,
});

const EXISTS_SQL =
  'SELECT EXISTS (SELECT 1 FROM _agentic.query_performance WHERE fingerprint = $1 AND executed_at > NOW() - make_interval(hours => $2))';

describe('DeduplicationEngine', () => {
  let clock: number;
  let store: ReturnType<typeof createStubStore>;
  let log: CapturingLogger;
  let engine: DeduplicationEngine;

  beforeEach(() => {
    clock = Date.parse('2024-01-01T12:00:00Z');
    store = createStubStore(false);
    log = createCapturingLogger('deduplication');
    engine = new DeduplicationEngine({
      store,
      logger: log.logger,
      bucketMinutes: 5,
      cacheTtlSeconds: 60,
      now: () => new Date(clock),
    });
  });

  describe('generateFingerprint', () => {
    it('should hash the bucketed key', () => {
      expect(engine.generateFingerprint(slowQuery('2024-01-01T10:03:30Z'))).toBe(
        sha256('db1:orders:slow_query:2024-01-01T10:00:00:abc123')
      );
    });

    it('should collapse observations within one bucket', () => {
      const first = engine.generateFingerprint(slowQuery('2024-01-01T10:03:30Z'));

      expect(engine.generateFingerprint(slowQuery('2024-01-01T10:04:50Z'))).toBe(first);
      expect(engine.generateFingerprint(slowQuery('2024-01-01T10:05:01Z'))).not.toBe(first);
    });

    it('should separate observations in different buckets', () => {
      expect(engine.generateFingerprint(slowQuery('2024-01-01T10:02:00Z'))).not.toBe(
        engine.generateFingerprint(slowQuery('2024-01-01T10:08:00Z'))
      );
    });

    it('should use the raw timestamp when bucketing is off', () => {
      expect(engine.generateFingerprint(slowQuery('2024-01-01T10:03:30Z'), false)).toBe(
        sha256('db1:orders:slow_query:2024-01-01T10:03:30Z:abc123')
      );
    });

    it('should bucket unparsable timestamps at the current time and log the degradation', () => {
      const fingerprint = engine.generateFingerprint(slowQuery('around ten'));

      expect(fingerprint).toBe(sha256('db1:orders:slow_query:2024-01-01T12:00:00:abc123'));
      expect(log.find('Unparsable observation timestamp, bucketing by current time')).toEqual([
        expect.objectContaining({ level: 'warn', degraded: true, rawTimestamp: 'around ten' }),
      ]);
    });

    it('should treat slash-separated dates as unparsable', () => {
      const fingerprint = engine.generateFingerprint(slowQuery('2024/01/01 10:03:30'));

      expect(fingerprint).toBe(sha256('db1:orders:slow_query:2024-01-01T12:00:00:abc123'));
      expect(log.find('Unparsable observation timestamp, bucketing by current time')).toEqual([
        expect.objectContaining({ degraded: true, rawTimestamp: '2024/01/01 10:03:30' }),
      ]);
    });

    it('should follow a changed bucket interval', () => {
      engine.setBucketInterval(15);

      expect(engine.generateFingerprint(slowQuery('2024-01-01T10:14:59Z'))).toBe(
        sha256('db1:orders:slow_query:2024-01-01T10:00:00:abc123')
      );
    });
  });

  describe('alreadyExists', () => {
    it('should ask the store with the hypertable time column and lookback', async () => {
      store.fetchOneValue.mockResolvedValueOnce(true);

      await expect(engine.alreadyExists('fp-1', 'query_performance', 6)).resolves.toBe(true);
      expect(store.fetchOneValue).toHaveBeenCalledWith(EXISTS_SQL, ['fp-1', 6]);
    });

    it('should default unknown hypertables to the timestamp column', async () => {
      await engine.alreadyExists('fp-1', 'custom_metrics');

      expect(store.fetchOneValue).toHaveBeenCalledWith(
        'SELECT EXISTS (SELECT 1 FROM _agentic.custom_metrics WHERE fingerprint = $1 AND timestamp > NOW() - make_interval(hours => $2))',
        ['fp-1', 1]
      );
    });

    it('should answer a repeated check from the cache', async () => {
      const first = await engine.alreadyExists('fp-1', 'query_performance');
      const second = await engine.alreadyExists('fp-1', 'query_performance');

      expect(first).toBe(false);
      expect(second).toBe(false);
      expect(store.fetchOneValue).toHaveBeenCalledTimes(1);
    });

    it('should ask the store again once the cached verdict expires', async () => {
      await engine.alreadyExists('fp-1', 'query_performance');
      clock += 60_000;
      await engine.alreadyExists('fp-1', 'query_performance');

      expect(store.fetchOneValue).toHaveBeenCalledTimes(2);
    });

    it('should treat store failures as not found without caching', async () => {
      store.fetchOneValue.mockRejectedValueOnce(new DatabaseConnectionError('connection refused'));

      await expect(engine.alreadyExists('a'.repeat(64), 'query_performance')).resolves.toBe(false);
      await engine.alreadyExists('a'.repeat(64), 'query_performance');

      expect(store.fetchOneValue).toHaveBeenCalledTimes(2);
      expect(log.find('Existence check failed, treating observation as new')).toEqual([
        expect.objectContaining({
          level: 'error',
          fingerprint: 'a'.repeat(16),
          hypertable: 'query_performance',
        }),
      ]);
      expect(engine.getCacheStats().oracleFailures).toBe(1);
    });

    it('should refuse a fractional lookback instead of admitting every observation', async () => {
      await expect(engine.alreadyExists('fp-1', 'query_performance', 0.5)).rejects.toBeInstanceOf(ZodError);

      expect(store.fetchOneValue).not.toHaveBeenCalled();
      expect(engine.getCacheStats().oracleFailures).toBe(0);
    });

    it('should refuse invalid hypertable identifiers without querying', async () => {
      await expect(engine.alreadyExists('fp-1', 'orders; DROP TABLE x')).rejects.toBeInstanceOf(
        InvalidIdentifierError
      );
      expect(store.fetchOneValue).not.toHaveBeenCalled();
    });
  });

  describe('markInserted', () => {
    it('should make the next check a cache hit', async () => {
      engine.markInserted('fp-1', 'query_performance');

      await expect(engine.alreadyExists('fp-1', 'query_performance')).resolves.toBe(true);
      expect(store.fetchOneValue).not.toHaveBeenCalled();
    });

    it('should override a cached negative verdict', async () => {
      await engine.alreadyExists('fp-1', 'query_performance');
      engine.markInserted('fp-1', 'query_performance');

      await expect(engine.alreadyExists('fp-1', 'query_performance')).resolves.toBe(true);
      expect(store.fetchOneValue).toHaveBeenCalledTimes(1);
    });
  });

  describe('shouldInsert', () => {
    it('should admit novel observations and refuse marked ones', async () => {
      const observation = slowQuery('2024-01-01T10:03:30Z');
      const fingerprint = sha256('db1:orders:slow_query:2024-01-01T10:00:00:abc123');

      await expect(engine.shouldInsert(observation, 'query_performance')).resolves.toEqual({
        admit: true,
        fingerprint,
      });

      engine.markInserted(fingerprint, 'query_performance');

      await expect(
        engine.shouldInsert(slowQuery('2024-01-01T10:04:50Z'), 'query_performance')
      ).resolves.toEqual({ admit: false, fingerprint });
    });

    it('should refuse observations the store already holds', async () => {
      store.fetchOneValue.mockResolvedValueOnce(true);

      const decision = await engine.shouldInsert(slowQuery('2024-01-01T10:03:30Z'), 'query_performance');

      expect(decision.admit).toBe(false);
    });
  });

  describe('getLastSyncTime', () => {
    it('should return the latest time column value for the database', async () => {
      const latest = new Date('2024-01-01T11:55:00Z');
      store.fetchOneValue.mockResolvedValueOnce(latest);

      await expect(engine.getLastSyncTime('db1', 'table_statistics')).resolves.toEqual(latest);
      expect(store.fetchOneValue).toHaveBeenCalledWith(
        'SELECT MAX(recorded_at) FROM _agentic.table_statistics WHERE db_id = $1',
        ['db1']
      );
    });

    it('should return null when there is no prior sync', async () => {
      store.fetchOneValue.mockResolvedValueOnce(null);

      await expect(engine.getLastSyncTime('db1', 'table_statistics')).resolves.toBeNull();
    });

    it('should return null when the store fails', async () => {
      store.fetchOneValue.mockRejectedValueOnce(new DatabaseConnectionError());

      await expect(engine.getLastSyncTime('db1', 'table_statistics')).resolves.toBeNull();
      expect(log.find('Failed to read last sync time')).toHaveLength(1);
    });
  });

  describe('cache maintenance', () => {
    it('should remove expired entries and report how many', async () => {
      engine.markInserted('fp-1', 'system_health');
      engine.markInserted('fp-2', 'system_health');
      clock += 30_000;
      engine.markInserted('fp-3', 'system_health');
      clock += 30_000;

      expect(engine.cleanupOldCache()).toBe(2);
      await expect(engine.alreadyExists('fp-3', 'system_health')).resolves.toBe(true);
    });

    it('should clear the cache on demand', async () => {
      engine.markInserted('fp-1', 'system_health');
      engine.clearCache();

      await engine.alreadyExists('fp-1', 'system_health');
      expect(store.fetchOneValue).toHaveBeenCalledTimes(1);
      expect(engine.getCacheStats().size).toBe(1);
    });

    it('should report cache and store statistics', async () => {
      await engine.alreadyExists('fp-1', 'system_health');
      await engine.alreadyExists('fp-1', 'system_health');

      expect(engine.getCacheStats()).toEqual({
        size: 1,
        hits: 1,
        misses: 1,
        evictions: 0,
        oracleQueries: 1,
        oracleFailures: 0,
        bucketMinutes: 5,
      });
    });
  });

  describe('setBucketInterval', () => {
    it.each([0, 61, -5, 2.5])('should reject %s', (minutes) => {
      expect(() => engine.setBucketInterval(minutes)).toThrow(InvalidConfigurationError);
      expect(engine.getBucketInterval()).toBe(5);
    });

    it.each([1, 60])('should accept %s', (minutes) => {
      engine.setBucketInterval(minutes);
      expect(engine.getBucketInterval()).toBe(minutes);
    });

    it('should validate the interval at construction', () => {
      expect(() => new DeduplicationEngine({ store, logger: log.logger, bucketMinutes: 0 })).toThrow(
        InvalidConfigurationError
      );
    });
  });
});
