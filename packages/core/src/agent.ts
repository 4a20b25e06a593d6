/**
 * Monitoring Agent runtime
 *
 * Composition root: owns the logger, the database, and the lifecycle of the
 * router's listen run and the periodic cache sweep.
 */

import { CHANNELS } from '@dbsentinel/types';
import { DeduplicationEngine } from './deduplication.js';
import { PostgresMonitoringDatabase, type MonitoringDatabase } from './database.js';
import { getAgentSettings, type AgentConfig, type AgentName, type AgentSettingsMap } from './env.js';
import { EventRouter, type EventCallback } from './event-router.js';
import { IngestionPipeline, type IngestionTarget } from './ingestion-pipeline.js';
import { createFileDestination, createLogger, type Logger } from './logger.js';
import { QueryBuilder } from './query-builder.js';

export interface IngestionRoute {
  channel: string;
  /** Fixed hypertable or resolver; defaults to the envelope's `hypertable` field */
  target?: IngestionTarget;
}

export const DEFAULT_ROUTES: readonly IngestionRoute[] = [
  { channel: CHANNELS.monitoring },
  { channel: CHANNELS.performance },
  { channel: CHANNELS.semantic },
];

export interface MonitoringAgentDeps {
  database?: MonitoringDatabase;
  logger?: Logger;
}

export interface AgentRun {
  /** Settles when the listen run ends; rejects with TransportError on transport failure */
  done: Promise<void>;
}

interface AttachedRoute {
  channel: string;
  callback: EventCallback;
}

export class MonitoringAgent {
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private abortController: AbortController | null = null;
  private run: AgentRun | null = null;
  private attached: AttachedRoute[] = [];

  private constructor(
    private readonly config: AgentConfig,
    private readonly database: MonitoringDatabase,
    private readonly logger: Logger,
    readonly queryBuilder: QueryBuilder,
    readonly dedup: DeduplicationEngine,
    readonly router: EventRouter,
    readonly pipeline: IngestionPipeline
  ) {}

  static create(config: AgentConfig, deps: MonitoringAgentDeps = {}): MonitoringAgent {
    const logger =
      deps.logger ??
      createLogger({
        name: 'agent',
        level: config.logLevel,
        destination: config.logFile ? createFileDestination(config.logFile) : undefined,
      });

    const database =
      deps.database ??
      new PostgresMonitoringDatabase({
        sourceDatabaseUrl: config.sourceDatabaseUrl,
        metaDatabaseUrl: config.metaDatabaseUrl,
        logger: logger.child({ component: 'database' }),
      });

    const queryBuilder = new QueryBuilder({ logger: logger.child({ component: 'query-builder' }) });

    const dedup = new DeduplicationEngine({
      store: database,
      queryBuilder,
      logger: logger.child({ component: 'deduplication' }),
      bucketMinutes: config.dedup.bucketMinutes,
      cacheTtlSeconds: config.dedup.cacheTtlSeconds,
      maxCacheEntries: config.dedup.cacheMaxEntries,
    });

    const router = new EventRouter({
      transport: database,
      logger: logger.child({ component: 'event-router' }),
      stopGraceMs: config.router.stopGraceMs,
    });

    const pipeline = new IngestionPipeline({
      dedup,
      store: database,
      queryBuilder,
      logger: logger.child({ component: 'ingestion' }),
      lookbackHours: config.dedup.lookbackHours,
    });

    return new MonitoringAgent(config, database, logger, queryBuilder, dedup, router, pipeline);
  }

  getAgentSettings<N extends AgentName>(name: N): AgentSettingsMap[N] {
    return getAgentSettings(this.config, name);
  }

  isRunning(): boolean {
    return this.run !== null;
  }

  /**
   * Connect, attach the ingestion routes and start listening
   */
  async start(routes: readonly IngestionRoute[] = DEFAULT_ROUTES): Promise<AgentRun> {
    if (this.run) {
      this.logger.warn('Agent already started');
      return this.run;
    }

    await this.database.connect();

    this.attached = routes.map((route) => ({
      channel: route.channel,
      callback: this.pipeline.attach(this.router, route.channel, route.target),
    }));

    this.cleanupTimer = setInterval(() => {
      this.dedup.cleanupOldCache();
    }, this.config.dedup.cleanupIntervalSeconds * 1000);
    this.cleanupTimer.unref();

    const abortController = new AbortController();
    this.abortController = abortController;

    const run: AgentRun = { done: this.router.startListening({ signal: abortController.signal }) };
    this.run = run;

    // A run that ends on its own (transport failure) frees the agent for another start()
    const release = (): void => {
      if (this.run === run) {
        this.releaseRun();
        this.logger.info('Agent run ended');
      }
    };
    void run.done.then(release, release);

    this.logger.info(
      { dbId: this.config.dbId, channels: routes.map((route) => route.channel) },
      'Agent started'
    );
    return run;
  }

  private releaseRun(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }

    for (const { channel, callback } of this.attached) {
      this.router.unsubscribe(channel, callback);
    }
    this.attached = [];
    this.abortController = null;
    this.run = null;
  }

  /**
   * Stop listening, stop the sweep, detach routes and close the database
   */
  async shutdown(): Promise<void> {
    const run = this.run;
    this.abortController?.abort();
    await this.router.stop();

    if (run) {
      // Failure was already logged by the router; the listens are released either way
      await Promise.allSettled([run.done]);
    }

    this.releaseRun();

    await this.database.close();
    this.logger.info('Agent shut down');
  }
}
