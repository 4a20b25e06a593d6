import { z } from 'zod';
import {
  HYPERTABLE_COLUMNS,
  HYPERTABLE_SCHEMA,
  HYPERTABLES,
  HypertableSchema,
  getTimeColumn,
} from '@dbsentinel/types';
import { InvalidIdentifierError, UnknownTemplateError, UnsafeQueryError } from './errors.js';
import { createLogger, type Logger } from './logger.js';

/**
 * SQL Query Builder
 *
 * Every statement the agents run is one of a closed set of intents. Values
 * travel as bind parameters; identifiers that must be spliced into the text
 * are validated first, and the rendered text passes a safety check before it
 * is returned.
 */

export const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_.]*$/;
export const MAX_IDENTIFIER_LENGTH = 63;

export const ALLOWED_COMMANDS = [
  'SELECT',
  'INSERT',
  'UPDATE',
  'CREATE INDEX',
  'VACUUM',
  'ANALYZE',
] as const;

export const FORBIDDEN_KEYWORDS = [
  'DROP',
  'TRUNCATE',
  'DELETE',
  'GRANT',
  'REVOKE',
  'SHUTDOWN',
  'ALTER',
] as const;

const ALLOWED_WRITE_TABLES: ReadonlySet<string> = new Set(HYPERTABLES);

// =============================================================================
// Intents
// =============================================================================

const schemaName = z.string().default('public');

export const StatementIntentSchema = z.discriminatedUnion('kind', [
  // Meta database
  z.object({
    kind: z.literal('fingerprint_exists'),
    hypertable: z.string(),
    fingerprint: z.string(),
    lookbackHours: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal('last_sync_time'),
    hypertable: z.string(),
    dbId: z.string(),
  }),
  z.object({
    kind: z.literal('insert_observation'),
    hypertable: HypertableSchema,
    row: z.record(z.string(), z.unknown()),
    fingerprint: z.string(),
  }),
  // Source database probes
  z.object({
    kind: z.literal('slow_queries'),
    thresholdMs: z.number().nonnegative(),
    limit: z.number().int().positive().default(50),
  }),
  z.object({ kind: z.literal('table_stats'), schema: schemaName }),
  z.object({ kind: z.literal('index_usage'), schema: schemaName }),
  z.object({ kind: z.literal('connection_health') }),
  z.object({ kind: z.literal('table_sizes'), schema: schemaName }),
  z.object({
    kind: z.literal('index_exists'),
    schema: schemaName,
    table: z.string(),
    index: z.string(),
  }),
  z.object({ kind: z.literal('table_columns'), schema: schemaName, table: z.string() }),
  z.object({ kind: z.literal('foreign_keys'), schema: schemaName, table: z.string() }),
  // Maintenance
  z.object({
    kind: z.literal('create_index'),
    schema: schemaName,
    table: z.string(),
    index: z.string(),
    columns: z.array(z.string()).min(1),
  }),
  z.object({ kind: z.literal('vacuum_table'), schema: schemaName, table: z.string() }),
  z.object({ kind: z.literal('analyze_table'), schema: schemaName, table: z.string() }),
]);

export type StatementIntent = z.infer<typeof StatementIntentSchema>;
export type StatementKind = StatementIntent['kind'];

export const STATEMENT_KINDS: readonly StatementKind[] = StatementIntentSchema.options.map(
  (option) => option.shape.kind.value
);

function isStatementKind(name: string): name is StatementKind {
  return STATEMENT_KINDS.some((kind) => kind === name);
}

export interface RenderedStatement {
  text: string;
  values: unknown[];
}

export interface SelectOptions {
  table: string;
  /** Column names, or `*` */
  columns?: readonly string[] | '*';
  /** Raw predicate; use `$n` placeholders for values */
  where?: string;
  values?: unknown[];
  limit?: number;
  schema?: string;
}

export interface QueryBuilderOptions {
  logger?: Logger;
}

// =============================================================================
// Validation
// =============================================================================

export function isValidIdentifier(name: string): boolean {
  return name.length > 0 && name.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_PATTERN.test(name);
}

/**
 * Return the identifier unchanged, or throw InvalidIdentifierError
 */
export function validateIdentifier(field: string, value: string): string {
  if (!isValidIdentifier(value)) {
    throw new InvalidIdentifierError(field, value);
  }
  return value;
}

function stripStringLiterals(sql: string): string {
  return sql.replace(/'(?:[^']|'')*'/g, "''");
}

function extractWriteTarget(upperSql: string): string | null {
  const match = /^INSERT INTO ([^\s(]+)/.exec(upperSql) ?? /^UPDATE ([^\s]+)/.exec(upperSql);
  const target = match?.[1];
  if (!target) return null;
  const dot = target.indexOf('.');
  return (dot >= 0 ? target.slice(dot + 1) : target).toLowerCase();
}

/**
 * Reason the statement is refused, or null when it passes
 */
export function findSafetyViolation(sql: string): string | null {
  const stripped = stripStringLiterals(sql).trim();
  if (!stripped) {
    return 'empty statement';
  }

  const body = stripped.replace(/;\s*$/, '');
  if (body.includes(';')) {
    return 'multiple statements';
  }

  const normalized = body.replace(/\s+/g, ' ').toUpperCase();
  const command = ALLOWED_COMMANDS.find(
    (cmd) => normalized === cmd || normalized.startsWith(`${cmd} `) || normalized.startsWith(`${cmd}(`)
  );
  if (!command) {
    return `command not allowed: ${normalized.split(' ')[0] ?? ''}`;
  }

  for (const keyword of FORBIDDEN_KEYWORDS) {
    if (new RegExp(`\\b${keyword}\\b`).test(normalized)) {
      return `forbidden keyword: ${keyword}`;
    }
  }

  if (command === 'INSERT' || command === 'UPDATE') {
    const target = extractWriteTarget(normalized);
    if (!target || !ALLOWED_WRITE_TABLES.has(target)) {
      return `table not in allow-list: ${target ?? '(unknown)'}`;
    }
  }

  return null;
}

export function isSafe(sql: string): boolean {
  return findSafetyViolation(sql) === null;
}

function placeholders(count: number, offset = 0): string {
  return Array.from({ length: count }, (_, i) => `$${i + 1 + offset}`).join(', ');
}

// =============================================================================
// Query Builder
// =============================================================================

export class QueryBuilder {
  private readonly logger: Logger;

  constructor(options: QueryBuilderOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: 'query-builder' });
  }

  /**
   * Render an intent to statement text and bind values.
   * Parameters are checked against the intent schema first; a mismatch fails with a ZodError.
   */
  render(intent: StatementIntent): RenderedStatement {
    return this.renderValidated(StatementIntentSchema.parse(intent));
  }

  private renderValidated(intent: StatementIntent): RenderedStatement {
    const statement = this.renderIntent(intent);
    this.assertSafe(statement.text, intent.kind);
    return statement;
  }

  /**
   * Render from an untyped template name and parameters.
   * Unknown names fail with UnknownTemplateError; bad parameters with a ZodError.
   */
  renderByName(name: string, params: Record<string, unknown> = {}): RenderedStatement {
    if (!isStatementKind(name)) {
      throw new UnknownTemplateError(name);
    }
    return this.renderValidated(StatementIntentSchema.parse({ ...params, kind: name }));
  }

  /**
   * Build a SELECT over a single table
   */
  buildSelect(options: SelectOptions): RenderedStatement {
    const schema = validateIdentifier('schema', options.schema ?? 'public');
    const table = validateIdentifier('table', options.table);
    const columns =
      options.columns === undefined || options.columns === '*'
        ? '*'
        : options.columns.map((column) => validateIdentifier('column', column)).join(', ');

    let text = `SELECT ${columns} FROM ${schema}.${table}`;
    if (options.where) {
      text += ` WHERE ${options.where}`;
    }
    if (options.limit !== undefined) {
      if (!Number.isInteger(options.limit) || options.limit <= 0) {
        throw new UnsafeQueryError(`invalid limit: ${options.limit}`);
      }
      text += ` LIMIT ${options.limit}`;
    }

    this.assertSafe(text, 'select');
    return { text, values: options.values ?? [] };
  }

  private assertSafe(text: string, kind: string): void {
    const violation = findSafetyViolation(text);
    if (violation) {
      this.logger.warn({ kind, reason: violation }, 'Blocked unsafe statement');
      throw new UnsafeQueryError(violation);
    }
  }

  private renderIntent(intent: StatementIntent): RenderedStatement {
    switch (intent.kind) {
      case 'fingerprint_exists': {
        const hypertable = validateIdentifier('hypertable', intent.hypertable);
        const timeColumn = getTimeColumn(hypertable);
        return {
          text: `SELECT EXISTS (SELECT 1 FROM ${HYPERTABLE_SCHEMA}.${hypertable} WHERE fingerprint = $1 AND ${timeColumn} > NOW() - make_interval(hours => $2))`,
          values: [intent.fingerprint, intent.lookbackHours],
        };
      }

      case 'last_sync_time': {
        const hypertable = validateIdentifier('hypertable', intent.hypertable);
        const timeColumn = getTimeColumn(hypertable);
        return {
          text: `SELECT MAX(${timeColumn}) FROM ${HYPERTABLE_SCHEMA}.${hypertable} WHERE db_id = $1`,
          values: [intent.dbId],
        };
      }

      case 'insert_observation': {
        const rowColumns: readonly string[] = HYPERTABLE_COLUMNS[intent.hypertable];
        const columns = [...rowColumns, 'fingerprint'];
        const values: unknown[] = rowColumns.map((column) => intent.row[column] ?? null);
        values.push(intent.fingerprint);
        return {
          text: `INSERT INTO ${HYPERTABLE_SCHEMA}.${intent.hypertable} (${columns.join(', ')}) VALUES (${placeholders(columns.length)})`,
          values,
        };
      }

      case 'slow_queries':
        return {
          text: `SELECT query, mean_exec_time, calls, queryid
            FROM pg_stat_statements
            WHERE mean_exec_time > $1
            ORDER BY mean_exec_time DESC
            LIMIT $2`,
          values: [intent.thresholdMs, intent.limit],
        };

      case 'table_stats':
        return {
          text: `SELECT schemaname, relname AS table_name, n_live_tup AS live_rows, n_dead_tup AS dead_rows,
              seq_scan AS seq_scans, idx_scan AS index_scans, last_vacuum, last_autovacuum, last_analyze
            FROM pg_stat_user_tables
            WHERE schemaname = $1`,
          values: [intent.schema],
        };

      case 'index_usage':
        return {
          text: `SELECT schemaname, relname AS table_name, indexrelname AS index_name,
              idx_scan AS index_scans, idx_tup_read, idx_tup_fetch
            FROM pg_stat_user_indexes
            WHERE schemaname = $1
            ORDER BY idx_scan DESC`,
          values: [intent.schema],
        };

      case 'connection_health':
        return {
          text: `SELECT COUNT(*) FILTER (WHERE state = 'active') AS active_connections,
              COUNT(*) FILTER (WHERE state = 'idle') AS idle_connections,
              COUNT(*) FILTER (WHERE wait_event IS NOT NULL) AS waiting_queries
            FROM pg_stat_activity`,
          values: [],
        };

      case 'table_sizes':
        return {
          text: `SELECT schemaname, tablename,
              pg_total_relation_size(quote_ident(schemaname) || '.' || quote_ident(tablename)) AS total_bytes,
              pg_relation_size(quote_ident(schemaname) || '.' || quote_ident(tablename)) AS table_bytes,
              pg_indexes_size(quote_ident(schemaname) || '.' || quote_ident(tablename)) AS index_bytes
            FROM pg_tables
            WHERE schemaname = $1`,
          values: [intent.schema],
        };

      case 'index_exists':
        return {
          text: 'SELECT EXISTS (SELECT 1 FROM pg_indexes WHERE schemaname = $1 AND tablename = $2 AND indexname = $3)',
          values: [intent.schema, intent.table, intent.index],
        };

      case 'table_columns':
        return {
          text: `SELECT column_name, data_type, is_nullable, column_default
            FROM information_schema.columns
            WHERE table_schema = $1 AND table_name = $2
            ORDER BY ordinal_position`,
          values: [intent.schema, intent.table],
        };

      case 'foreign_keys':
        return {
          text: `SELECT tc.constraint_name, kcu.column_name,
              ccu.table_name AS foreign_table_name, ccu.column_name AS foreign_column_name
            FROM information_schema.table_constraints AS tc
            JOIN information_schema.key_column_usage AS kcu
              ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
            JOIN information_schema.constraint_column_usage AS ccu
              ON ccu.constraint_name = tc.constraint_name
            WHERE tc.constraint_type = 'FOREIGN KEY'
              AND tc.table_schema = $1
              AND tc.table_name = $2`,
          values: [intent.schema, intent.table],
        };

      case 'create_index': {
        const schema = validateIdentifier('schema', intent.schema);
        const table = validateIdentifier('table', intent.table);
        const index = validateIdentifier('index', intent.index);
        const columns = intent.columns.map((column) => validateIdentifier('column', column));
        return {
          text: `CREATE INDEX CONCURRENTLY IF NOT EXISTS ${index} ON ${schema}.${table} (${columns.join(', ')})`,
          values: [],
        };
      }

      case 'vacuum_table': {
        const schema = validateIdentifier('schema', intent.schema);
        const table = validateIdentifier('table', intent.table);
        return { text: `VACUUM ANALYZE ${schema}.${table}`, values: [] };
      }

      case 'analyze_table': {
        const schema = validateIdentifier('schema', intent.schema);
        const table = validateIdentifier('table', intent.table);
        return { text: `ANALYZE ${schema}.${table}`, values: [] };
      }
    }
  }
}
