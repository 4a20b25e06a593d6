import { z } from 'zod';

/**
 * Hypertable Schemas
 * Time-partitioned destination tables in the meta (TimescaleDB) database
 */

/** Schema that holds every agent-owned hypertable */
export const HYPERTABLE_SCHEMA = '_agentic';

export const HYPERTABLES = [
  'schema_metadata',
  'query_performance',
  'index_analytics',
  'table_statistics',
  'semantic_relationships',
  'system_health',
  'data_quality_metrics',
  'agent_actions',
] as const;

export const HypertableSchema = z.enum(HYPERTABLES);

export type Hypertable = z.infer<typeof HypertableSchema>;

/** Time column used when a table is not a known hypertable */
export const DEFAULT_TIME_COLUMN = 'timestamp';

/**
 * Primary time column of each hypertable.
 * Drives both existence lookups and last-sync queries.
 */
export const HYPERTABLE_TIME_COLUMNS = {
  schema_metadata: 'captured_at',
  query_performance: 'executed_at',
  index_analytics: 'measured_at',
  table_statistics: 'recorded_at',
  semantic_relationships: 'discovered_at',
  system_health: 'timestamp',
  data_quality_metrics: 'measured_at',
  agent_actions: 'executed_at',
} as const satisfies Record<Hypertable, string>;

/**
 * Insert column lists, time column first.
 * The `fingerprint` column is written separately by the ingestion pipeline.
 */
export const HYPERTABLE_COLUMNS = {
  schema_metadata: [
    'captured_at',
    'db_id',
    'schema_name',
    'table_name',
    'column_name',
    'data_type',
    'is_nullable',
    'column_default',
  ],
  query_performance: [
    'executed_at',
    'db_id',
    'query_hash',
    'query_text',
    'execution_time_ms',
    'rows_returned',
    'calls',
    'user_name',
    'application_name',
    'error_occurred',
  ],
  index_analytics: [
    'measured_at',
    'db_id',
    'table_name',
    'index_name',
    'index_type',
    'columns',
    'size_bytes',
    'scans',
    'tuples_read',
    'tuples_fetched',
    'effectiveness_score',
  ],
  table_statistics: [
    'recorded_at',
    'db_id',
    'table_name',
    'schema_name',
    'total_rows',
    'live_rows',
    'dead_rows',
    'table_size_bytes',
    'index_size_bytes',
    'last_vacuum',
    'last_analyze',
    'seq_scans',
    'index_scans',
  ],
  semantic_relationships: [
    'discovered_at',
    'db_id',
    'source_table',
    'source_column',
    'target_table',
    'target_column',
    'relationship_type',
    'confidence_score',
  ],
  system_health: [
    'timestamp',
    'db_id',
    'cpu_usage',
    'memory_usage',
    'active_connections',
    'idle_connections',
    'waiting_queries',
  ],
  data_quality_metrics: [
    'measured_at',
    'db_id',
    'table_name',
    'column_name',
    'null_count',
    'null_percentage',
    'distinct_count',
    'cardinality_ratio',
    'anomaly_score',
  ],
  agent_actions: [
    'executed_at',
    'db_id',
    'agent_name',
    'action_type',
    'action_details',
    'sql_executed',
    'success',
    'impact_score',
    'performance_delta',
    'rollback_available',
    'rollback_sql',
  ],
} as const satisfies Record<Hypertable, readonly string[]>;

export function isHypertable(value: unknown): value is Hypertable {
  return HypertableSchema.safeParse(value).success;
}

/**
 * Get the time column for a hypertable name.
 * Unknown names fall back to `timestamp`.
 */
export function getTimeColumn(hypertable: string): string {
  return isHypertable(hypertable) ? HYPERTABLE_TIME_COLUMNS[hypertable] : DEFAULT_TIME_COLUMN;
}
