import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CHANNELS } from '@dbsentinel/types';
import { MonitoringAgent, type AgentRun } from '../agent.js';
import { loadAgentConfig } from '../env.js';
import { TransportError } from '../errors.js';
import { FakeMonitoringDatabase } from './helpers/fakes.js';
import { createCapturingLogger, type CapturingLogger } from './helpers/logger.js';

const slowQueryEvent = (executedAt: string): string =>
  JSON.stringify({
    event_type: 'slow_query',
    hypertable: 'query_performance',
    db_id: 'db1',
    table_name: 'orders',
    query_hash: 'abc123',
    executed_at: executedAt,
    execution_time_ms: 812,
  });

describe('MonitoringAgent', () => {
  let database: FakeMonitoringDatabase;
  let log: CapturingLogger;
  let agent: MonitoringAgent;

  beforeEach(() => {
    database = new FakeMonitoringDatabase();
    log = createCapturingLogger('agent');
    agent = MonitoringAgent.create(
      loadAgentConfig({
        DB_ID: 'db1',
        SOURCE_DATABASE_URL: 'postgresql://monitor@localhost:5432/app',
        META_DATABASE_URL: 'postgresql://monitor@localhost:5433/agentic_meta',
      }),
      { database, logger: log.logger }
    );
  });

  afterEach(async () => {
    await agent.shutdown();
    vi.useRealTimers();
  });

  async function startAndWaitForListens(): Promise<AgentRun> {
    const run = await agent.start();
    await vi.waitFor(() => {
      expect(agent.router.getListeningChannels()).toHaveLength(3);
    });
    return run;
  }

  it('should connect and listen on the default channels', async () => {
    await startAndWaitForListens();

    expect(database.connect).toHaveBeenCalledTimes(1);
    expect(agent.router.getListeningChannels()).toEqual([
      CHANNELS.monitoring,
      CHANNELS.performance,
      CHANNELS.semantic,
    ]);
    expect(agent.isRunning()).toBe(true);
    expect(log.find('Agent started')).toEqual([
      expect.objectContaining({
        dbId: 'db1',
        channels: [CHANNELS.monitoring, CHANNELS.performance, CHANNELS.semantic],
      }),
    ]);
  });

  it('should store novel events and skip near-duplicates', async () => {
    await startAndWaitForListens();

    await database.transport.deliver(CHANNELS.performance, slowQueryEvent('2024-01-01T10:03:30Z'));
    await database.transport.deliver(CHANNELS.performance, slowQueryEvent('2024-01-01T10:04:50Z'));

    expect(database.store.executed).toHaveLength(1);
    expect(database.store.executed[0]?.text).toMatch(/^INSERT INTO _agentic\.query_performance /);
    expect(database.store.fingerprints.size).toBe(1);
  });

  it('should return the same run when started twice', async () => {
    const first = await startAndWaitForListens();
    const second = await agent.start();

    expect(second).toBe(first);
    expect(database.connect).toHaveBeenCalledTimes(1);
    expect(log.find('Agent already started')).toHaveLength(1);
  });

  it('should release everything on shutdown', async () => {
    const run = await startAndWaitForListens();

    await agent.shutdown();

    await expect(run.done).resolves.toBeUndefined();
    expect(database.transport.unlisten).toHaveBeenCalledTimes(3);
    expect(database.close).toHaveBeenCalledTimes(1);
    expect(agent.router.getSubscriberCount(CHANNELS.performance)).toBe(0);
    expect(agent.router.isRunning()).toBe(false);
    expect(agent.isRunning()).toBe(false);
  });

  it('should end the run with the transport failure', async () => {
    const run = await startAndWaitForListens();
    const failure = new TransportError('Listen connection lost on monitoring_events', CHANNELS.monitoring);

    database.transport.fail(CHANNELS.monitoring, failure);

    await expect(run.done).rejects.toBe(failure);
    expect(database.transport.unlisten).toHaveBeenCalledTimes(3);
  });

  it('should listen again when restarted after a transport failure', async () => {
    const failed = await startAndWaitForListens();
    database.transport.fail(
      CHANNELS.monitoring,
      new TransportError('Listen connection lost on monitoring_events', CHANNELS.monitoring)
    );
    await expect(failed.done).rejects.toBeInstanceOf(TransportError);

    expect(agent.isRunning()).toBe(false);
    expect(agent.router.getSubscriberCount(CHANNELS.performance)).toBe(0);

    const restarted = await agent.start();
    await vi.waitFor(() => {
      expect(agent.router.getListeningChannels()).toHaveLength(3);
    });

    expect(restarted).not.toBe(failed);
    expect(database.transport.listen).toHaveBeenCalledTimes(6);
    expect(agent.router.getSubscriberCount(CHANNELS.performance)).toBe(1);
    expect(log.find('Agent already started')).toHaveLength(0);

    await database.transport.deliver(CHANNELS.performance, slowQueryEvent('2024-01-01T10:03:30Z'));
    expect(database.store.executed).toHaveLength(1);
  });

  it('should stop the cache sweep when a run fails', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const sweep = vi.spyOn(agent.dedup, 'cleanupOldCache');
    const run = await startAndWaitForListens();

    database.transport.fail(CHANNELS.semantic, new TransportError('Listen connection lost', CHANNELS.semantic));
    await expect(run.done).rejects.toBeInstanceOf(TransportError);

    vi.advanceTimersByTime(300_000);
    expect(sweep).not.toHaveBeenCalled();
  });

  it('should sweep the fingerprint cache periodically', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const sweep = vi.spyOn(agent.dedup, 'cleanupOldCache');
    await startAndWaitForListens();

    vi.advanceTimersByTime(300_000);
    expect(sweep).toHaveBeenCalledTimes(1);

    await agent.shutdown();
    vi.advanceTimersByTime(300_000);
    expect(sweep).toHaveBeenCalledTimes(1);
  });

  it('should expose per-agent settings', () => {
    expect(agent.getAgentSettings('performance')).toEqual({ enabled: true, slowQueryThresholdMs: 500 });
    expect(agent.getAgentSettings('semantic').enabled).toBe(false);
  });
});
