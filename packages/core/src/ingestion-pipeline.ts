/**
 * Ingestion Pipeline
 *
 * Gate between the router and the durable store: fingerprint, admit,
 * insert, then remember the write. A failed write is not remembered, so the
 * same observation can be retried.
 */

import {
  HYPERTABLE_COLUMNS,
  getTimeColumn,
  isHypertable,
  resolveTimestamp,
  type EventEnvelope,
  type Hypertable,
  type Observation,
} from '@dbsentinel/types';
import type { ObservationStore } from './database.js';
import { DEFAULT_LOOKBACK_HOURS, type DeduplicationEngine } from './deduplication.js';
import type { EventCallback, EventRouter } from './event-router.js';
import { createLogger, fingerprintPrefix, type Logger } from './logger.js';
import { QueryBuilder, type RenderedStatement } from './query-builder.js';

export type IngestionStatus = 'inserted' | 'duplicate';

export interface IngestionResult {
  status: IngestionStatus;
  fingerprint: string;
  hypertable: Hypertable;
}

/** Chooses the destination hypertable for an event; null skips it */
export type HypertableResolver = (event: Readonly<EventEnvelope>) => Hypertable | null;

export type IngestionTarget = Hypertable | HypertableResolver;

export interface IngestionPipelineOptions {
  dedup: DeduplicationEngine;
  store: ObservationStore;
  queryBuilder?: QueryBuilder;
  logger?: Logger;
  lookbackHours?: number;
}

/**
 * Default resolver: the envelope names its hypertable in `hypertable`
 */
export function resolveHypertableFromEvent(event: Readonly<EventEnvelope>): Hypertable | null {
  const hypertable = event.hypertable;
  return isHypertable(hypertable) ? hypertable : null;
}

/**
 * Insert row for a hypertable. When the observation lacks the table's time
 * column, its resolved timestamp field stands in.
 */
export function buildObservationRow(
  observation: Readonly<Observation>,
  hypertable: Hypertable
): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  const columns: readonly string[] = HYPERTABLE_COLUMNS[hypertable];

  for (const column of columns) {
    row[column] = observation[column] ?? null;
  }

  const timeColumn = getTimeColumn(hypertable);
  if (row[timeColumn] === null) {
    row[timeColumn] = resolveTimestamp(observation)?.value ?? null;
  }

  return row;
}

export class IngestionPipeline {
  private readonly dedup: DeduplicationEngine;
  private readonly store: ObservationStore;
  private readonly queryBuilder: QueryBuilder;
  private readonly logger: Logger;
  private readonly lookbackHours: number;

  constructor(options: IngestionPipelineOptions) {
    this.dedup = options.dedup;
    this.store = options.store;
    this.logger = options.logger ?? createLogger({ name: 'ingestion' });
    this.queryBuilder = options.queryBuilder ?? new QueryBuilder({ logger: this.logger });
    this.lookbackHours = options.lookbackHours ?? DEFAULT_LOOKBACK_HOURS;
  }

  /**
   * Admit and persist one observation.
   * Rejects when the statement is refused or the write fails.
   */
  async ingest(observation: Readonly<Observation>, hypertable: Hypertable): Promise<IngestionResult> {
    const { admit, fingerprint } = await this.dedup.shouldInsert(
      observation,
      hypertable,
      this.lookbackHours
    );
    const context = { fingerprint: fingerprintPrefix(fingerprint), hypertable };

    if (!admit) {
      return { status: 'duplicate', fingerprint, hypertable };
    }

    let statement: RenderedStatement;
    try {
      statement = this.queryBuilder.render({
        kind: 'insert_observation',
        hypertable,
        row: buildObservationRow(observation, hypertable),
        fingerprint,
      });
    } catch (error) {
      this.logger.error({ err: error, ...context }, 'Insert statement refused');
      throw error;
    }

    try {
      await this.store.execute(statement.text, statement.values);
    } catch (error) {
      this.logger.error({ err: error, ...context }, 'Observation insert failed');
      throw error;
    }

    this.dedup.markInserted(fingerprint, hypertable);
    this.logger.debug(context, 'Observation inserted');
    return { status: 'inserted', fingerprint, hypertable };
  }

  /**
   * Subscribe the pipeline to a channel. Returns the registered callback so it
   * can be unsubscribed.
   */
  attach(
    router: EventRouter,
    channel: string,
    target: IngestionTarget = resolveHypertableFromEvent
  ): EventCallback {
    const callback: EventCallback = async (event, eventChannel) => {
      const hypertable = typeof target === 'function' ? target(event) : target;
      if (hypertable === null) {
        this.logger.debug({ channel: eventChannel }, 'Event has no destination hypertable, skipped');
        return;
      }
      await this.ingest(event, hypertable);
    };

    router.subscribe(channel, callback);
    return callback;
  }
}
