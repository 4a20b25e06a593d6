/**
 * Monitoring database access
 *
 * Two PostgreSQL pools: the monitored (source) database, which also carries
 * LISTEN/NOTIFY, and the meta (TimescaleDB) database, which holds the
 * `_agentic` hypertables and answers existence lookups.
 */

import pg from 'pg';
import {
  AppError,
  ConstraintError,
  DatabaseConnectionError,
  TransportError,
  toError,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { validateIdentifier } from './query-builder.js';

// =============================================================================
// Interfaces
// =============================================================================

/**
 * Durable store of observations (the existence oracle)
 */
export interface ObservationStore {
  /** First column of the first row, or null when there are no rows */
  fetchOneValue(sql: string, values?: readonly unknown[]): Promise<unknown>;
  /** Affected row count */
  execute(sql: string, values?: readonly unknown[]): Promise<number>;
}

/**
 * Receiver of notifications; the transport passes the channel explicitly
 */
export interface NotificationHandler {
  handleNotification(channel: string, payload: string): Promise<unknown>;
  /** Connection-level failure reported after the listen was opened */
  handleTransportError(channel: string, error: TransportError): void;
}

export interface ListenSubscription {
  readonly channel: string;
}

export interface NotificationTransport {
  listen(channel: string, handler: NotificationHandler): Promise<ListenSubscription>;
  unlisten(subscription: ListenSubscription): Promise<void>;
  notify(channel: string, payload: string): Promise<void>;
}

export interface MonitoringDatabase extends ObservationStore, NotificationTransport {
  connect(): Promise<void>;
  close(): Promise<void>;
}

export type DatabaseTarget = 'source' | 'meta';

export interface PostgresMonitoringDatabaseOptions {
  sourceDatabaseUrl: string;
  metaDatabaseUrl: string;
  logger?: Logger;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

interface OpenListen {
  client: pg.PoolClient;
  onNotification: (message: pg.Notification) => void;
  onError: (error: Error) => void;
}

// =============================================================================
// Error mapping
// =============================================================================

function readStringProperty(error: unknown, key: string): string | undefined {
  if (typeof error === 'object' && error !== null && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * SQLSTATE class 23 is an integrity constraint violation; anything else is a
 * connection-level failure
 */
export function mapDatabaseError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  const cause = toError(error);
  const code = readStringProperty(error, 'code');

  if (code?.startsWith('23')) {
    return new ConstraintError(cause.message, readStringProperty(error, 'constraint'), cause);
  }
  return new DatabaseConnectionError(cause.message, cause);
}

// =============================================================================
// PostgreSQL implementation
// =============================================================================

export class PostgresMonitoringDatabase implements MonitoringDatabase {
  private sourcePool: pg.Pool | null = null;
  private metaPool: pg.Pool | null = null;
  private readonly listens = new Map<ListenSubscription, OpenListen>();
  private readonly logger: Logger;

  constructor(private readonly options: PostgresMonitoringDatabaseOptions) {
    this.logger = options.logger ?? createLogger({ name: 'database' });
  }

  private createPool(connectionString: string, target: DatabaseTarget): pg.Pool {
    const pool = new pg.Pool({
      connectionString,
      max: this.options.maxConnections ?? 5,
      idleTimeoutMillis: this.options.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: this.options.connectionTimeoutMs ?? 5000,
    });
    // Idle client errors would otherwise crash the process
    pool.on('error', (error) => {
      this.logger.error({ err: error, target }, 'Idle database client error');
    });
    return pool;
  }

  async connect(): Promise<void> {
    if (this.sourcePool && this.metaPool) return;

    const sourcePool = this.createPool(this.options.sourceDatabaseUrl, 'source');
    const metaPool = this.createPool(this.options.metaDatabaseUrl, 'meta');

    try {
      await sourcePool.query('SELECT 1');
      await metaPool.query('SELECT 1');
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to establish connection pools');
      await Promise.allSettled([sourcePool.end(), metaPool.end()]);
      throw new DatabaseConnectionError('Failed to establish connection pools', toError(error));
    }

    this.sourcePool = sourcePool;
    this.metaPool = metaPool;
    this.logger.info('Connection pools established (source and meta)');
  }

  async close(): Promise<void> {
    for (const subscription of [...this.listens.keys()]) {
      try {
        await this.unlisten(subscription);
      } catch (error) {
        this.logger.warn({ err: error, channel: subscription.channel }, 'Unlisten failed during close');
      }
    }

    const pools = [this.sourcePool, this.metaPool].filter((pool): pool is pg.Pool => pool !== null);
    this.sourcePool = null;
    this.metaPool = null;
    await Promise.all(pools.map((pool) => pool.end()));
    this.logger.info('Database connections closed');
  }

  private pool(target: DatabaseTarget): pg.Pool {
    const pool = target === 'source' ? this.sourcePool : this.metaPool;
    if (!pool) {
      throw new DatabaseConnectionError(`The ${target} database is not connected`);
    }
    return pool;
  }

  // ---------------------------------------------------------------------------
  // ObservationStore (meta database)
  // ---------------------------------------------------------------------------

  async fetchOneValue(sql: string, values: readonly unknown[] = []): Promise<unknown> {
    return this.fetchValue('meta', sql, values);
  }

  async execute(sql: string, values: readonly unknown[] = []): Promise<number> {
    try {
      const result = await this.pool('meta').query(sql, [...values]);
      return result.rowCount ?? 0;
    } catch (error) {
      throw mapDatabaseError(error);
    }
  }

  /**
   * Run one statement for many rows in a single transaction; returns the total affected count
   */
  async executeMany(sql: string, rows: readonly (readonly unknown[])[]): Promise<number> {
    let client: pg.PoolClient;
    try {
      client = await this.pool('meta').connect();
    } catch (error) {
      throw mapDatabaseError(error);
    }

    try {
      await client.query('BEGIN');
      let affected = 0;
      for (const values of rows) {
        const result = await client.query(sql, [...values]);
        affected += result.rowCount ?? 0;
      }
      await client.query('COMMIT');
      return affected;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.error({ err: rollbackError }, 'Rollback failed');
      });
      throw mapDatabaseError(error);
    } finally {
      client.release();
    }
  }

  // ---------------------------------------------------------------------------
  // Source database
  // ---------------------------------------------------------------------------

  async querySource<T extends pg.QueryResultRow = Record<string, unknown>>(
    sql: string,
    values: readonly unknown[] = []
  ): Promise<T[]> {
    try {
      const result = await this.pool('source').query<T>(sql, [...values]);
      return result.rows;
    } catch (error) {
      throw mapDatabaseError(error);
    }
  }

  private async fetchValue(
    target: DatabaseTarget,
    sql: string,
    values: readonly unknown[]
  ): Promise<unknown> {
    try {
      const result = await this.pool(target).query({
        text: sql,
        values: [...values],
        rowMode: 'array',
      });
      const firstRow: unknown[] | undefined = result.rows[0];
      return firstRow?.[0] ?? null;
    } catch (error) {
      throw mapDatabaseError(error);
    }
  }

  async tableExists(table: string, schema = 'public', target: DatabaseTarget = 'meta'): Promise<boolean> {
    const value = await this.fetchValue(
      target,
      'SELECT EXISTS (SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2)',
      [schema, table]
    );
    return value === true;
  }

  async tableHasData(table: string, schema = 'public', target: DatabaseTarget = 'meta'): Promise<boolean> {
    const qualified = `${validateIdentifier('schema', schema)}.${validateIdentifier('table', table)}`;
    const value = await this.fetchValue(target, `SELECT EXISTS (SELECT 1 FROM ${qualified} LIMIT 1)`, []);
    return value === true;
  }

  async getTableRowCount(table: string, schema = 'public', target: DatabaseTarget = 'meta'): Promise<number> {
    const qualified = `${validateIdentifier('schema', schema)}.${validateIdentifier('table', table)}`;
    // COUNT(*) is a bigint and arrives as a string
    const value = await this.fetchValue(target, `SELECT COUNT(*) FROM ${qualified}`, []);
    return Number(value ?? 0);
  }

  /**
   * Check both databases answer `SELECT 1`
   */
  async testConnection(): Promise<boolean> {
    try {
      const source = await this.fetchValue('source', 'SELECT 1', []);
      const meta = await this.fetchValue('meta', 'SELECT 1', []);
      return source === 1 && meta === 1;
    } catch (error) {
      this.logger.error({ err: error }, 'Connection test failed');
      return false;
    }
  }

  // ---------------------------------------------------------------------------
  // NotificationTransport (source database)
  // ---------------------------------------------------------------------------

  async listen(channel: string, handler: NotificationHandler): Promise<ListenSubscription> {
    const name = validateIdentifier('channel', channel);

    let client: pg.PoolClient;
    try {
      client = await this.pool('source').connect();
    } catch (error) {
      throw new TransportError(`Failed to acquire a connection to listen on ${channel}`, channel, toError(error));
    }

    const onNotification = (message: pg.Notification): void => {
      if (message.channel !== channel) return;
      void handler.handleNotification(channel, message.payload ?? '').catch((error: unknown) => {
        this.logger.error({ err: error, channel }, 'Notification handler failed');
      });
    };
    const onError = (error: Error): void => {
      handler.handleTransportError(
        channel,
        new TransportError(`Listen connection lost on ${channel}`, channel, error)
      );
    };

    client.on('notification', onNotification);
    client.on('error', onError);

    try {
      await client.query(`LISTEN "${name}"`);
    } catch (error) {
      client.removeListener('notification', onNotification);
      client.removeListener('error', onError);
      client.release(toError(error));
      throw new TransportError(`Failed to listen on ${channel}`, channel, toError(error));
    }

    const subscription: ListenSubscription = { channel };
    this.listens.set(subscription, { client, onNotification, onError });
    this.logger.info({ channel }, 'Listening on channel');
    return subscription;
  }

  async unlisten(subscription: ListenSubscription): Promise<void> {
    const open = this.listens.get(subscription);
    if (!open) return;
    this.listens.delete(subscription);

    const { client, onNotification, onError } = open;
    let failure: Error | undefined;
    try {
      await client.query(`UNLISTEN "${validateIdentifier('channel', subscription.channel)}"`);
    } catch (error) {
      failure = toError(error);
      throw new TransportError(`Failed to unlisten ${subscription.channel}`, subscription.channel, failure);
    } finally {
      client.removeListener('notification', onNotification);
      client.removeListener('error', onError);
      // A client that may still be listening is destroyed rather than pooled
      client.release(failure);
    }
    this.logger.info({ channel: subscription.channel }, 'Stopped listening on channel');
  }

  async notify(channel: string, payload: string): Promise<void> {
    try {
      await this.pool('source').query('SELECT pg_notify($1, $2)', [channel, payload]);
    } catch (error) {
      throw new TransportError(`Failed to notify ${channel}`, channel, toError(error));
    }
  }
}
