import { z } from 'zod';
import { InvalidConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Ensures database coordinates and dedup tuning are valid at boot time
 */

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .optional()
    .default(defaultValue)
    .transform((v) => v === 'true');

// Base runtime config
const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  /** Write logs to this file instead of stdout */
  LOG_FILE: z.string().min(1).optional(),
  /** Identifier of the monitored database, stamped on every observation */
  DB_ID: z.string().min(1, 'DB_ID is required'),
});

// Monitored (source) database: LISTEN/NOTIFY and probes
const SourceDatabaseEnvSchema = z.object({
  SOURCE_DATABASE_URL: z.string().url().optional(),
  SOURCE_DB_HOST: z.string().default('localhost'),
  SOURCE_DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  SOURCE_DB_NAME: z.string().optional(),
  SOURCE_DB_USER: z.string().optional(),
  SOURCE_DB_PASSWORD: z.string().default(''),
});

// Meta (TimescaleDB) database: hypertables and the existence oracle
const MetaDatabaseEnvSchema = z.object({
  META_DATABASE_URL: z.string().url().optional(),
  META_DB_HOST: z.string().default('localhost'),
  META_DB_PORT: z.coerce.number().int().min(1).max(65535).default(5433),
  META_DB_NAME: z.string().default('agentic_meta'),
  META_DB_USER: z.string().optional(),
  META_DB_PASSWORD: z.string().default(''),
});

// Deduplication tuning
const DedupEnvSchema = z.object({
  /** Bucket width in minutes; observations in the same bucket are equivalent */
  DEDUP_BUCKET_MINUTES: z.coerce.number().int().min(1).max(60).default(5),
  /** How far back the existence oracle looks */
  DEDUP_LOOKBACK_HOURS: z.coerce.number().int().min(1).default(1),
  DEDUP_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(3600),
  DEDUP_CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).default(10000),
  DEDUP_CLEANUP_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(300),
});

const RouterEnvSchema = z.object({
  /** How long stop() waits for in-flight dispatches */
  ROUTER_STOP_GRACE_MS: z.coerce.number().int().min(0).default(500),
});

// Per-agent toggles
const AgentsEnvSchema = z.object({
  MONITORING_ENABLED: booleanFlag('true'),
  MONITORING_FREQUENCY: z.coerce.number().int().min(1).default(60),
  PERFORMANCE_ENABLED: booleanFlag('true'),
  PERFORMANCE_SLOW_THRESHOLD_MS: z.coerce.number().int().min(1).default(500),
  INDEXING_ENABLED: booleanFlag('true'),
  INDEXING_FREQUENCY: z.coerce.number().int().min(1).default(3600),
  SEMANTIC_ENABLED: booleanFlag('false'),
  SEMANTIC_FREQUENCY: z.coerce.number().int().min(1).default(86400),
});

export const AgentEnvSchema = RuntimeEnvSchema.merge(SourceDatabaseEnvSchema)
  .merge(MetaDatabaseEnvSchema)
  .merge(DedupEnvSchema)
  .merge(RouterEnvSchema)
  .merge(AgentsEnvSchema)
  .superRefine((env, ctx) => {
    if (!env.SOURCE_DATABASE_URL) {
      if (!env.SOURCE_DB_NAME) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SOURCE_DB_NAME'],
          message: 'SOURCE_DB_NAME is required when SOURCE_DATABASE_URL is not set',
        });
      }
      if (!env.SOURCE_DB_USER) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SOURCE_DB_USER'],
          message: 'SOURCE_DB_USER is required when SOURCE_DATABASE_URL is not set',
        });
      }
    }
    if (!env.META_DATABASE_URL && !env.META_DB_USER) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['META_DB_USER'],
        message: 'META_DB_USER is required when META_DATABASE_URL is not set',
      });
    }
  });

export type AgentEnv = z.infer<typeof AgentEnvSchema>;

export interface DedupSettings {
  bucketMinutes: number;
  lookbackHours: number;
  cacheTtlSeconds: number;
  cacheMaxEntries: number;
  cleanupIntervalSeconds: number;
}

export interface AgentSettingsMap {
  monitoring: { enabled: boolean; frequencySeconds: number };
  performance: { enabled: boolean; slowQueryThresholdMs: number };
  indexing: { enabled: boolean; frequencySeconds: number };
  semantic: { enabled: boolean; frequencySeconds: number };
}

export type AgentName = keyof AgentSettingsMap;

export interface AgentConfig {
  nodeEnv: AgentEnv['NODE_ENV'];
  logLevel: AgentEnv['LOG_LEVEL'];
  logFile: string | undefined;
  dbId: string;
  sourceDatabaseUrl: string;
  metaDatabaseUrl: string;
  dedup: DedupSettings;
  router: { stopGraceMs: number };
  agents: AgentSettingsMap;
}

export interface PostgresUrlParts {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

/**
 * Build a postgres:// URL from discrete parts; credentials are percent-encoded
 */
export function buildPostgresUrl(parts: PostgresUrlParts): string {
  const user = encodeURIComponent(parts.user);
  const auth = parts.password ? `${user}:${encodeURIComponent(parts.password)}` : user;
  return `postgresql://${auth}@${parts.host}:${parts.port}/${encodeURIComponent(parts.database)}`;
}

function formatIssues(error: z.ZodError): string {
  const fieldErrors = error.flatten().fieldErrors;
  const lines = Object.entries(fieldErrors).map(
    ([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`
  );
  return lines.join('\n');
}

/**
 * Validate environment variables and build the agent configuration.
 * Throws InvalidConfigurationError listing every invalid field.
 */
export function loadAgentConfig(
  env: Record<string, string | undefined> = process.env
): AgentConfig {
  const result = AgentEnvSchema.safeParse(env);

  if (!result.success) {
    throw new InvalidConfigurationError(
      `Environment validation failed:\n${formatIssues(result.error)}`,
      result.error.flatten().fieldErrors
    );
  }

  const e = result.data;

  return {
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    logFile: e.LOG_FILE,
    dbId: e.DB_ID,
    sourceDatabaseUrl:
      e.SOURCE_DATABASE_URL ??
      buildPostgresUrl({
        host: e.SOURCE_DB_HOST,
        port: e.SOURCE_DB_PORT,
        database: e.SOURCE_DB_NAME ?? '',
        user: e.SOURCE_DB_USER ?? '',
        password: e.SOURCE_DB_PASSWORD,
      }),
    metaDatabaseUrl:
      e.META_DATABASE_URL ??
      buildPostgresUrl({
        host: e.META_DB_HOST,
        port: e.META_DB_PORT,
        database: e.META_DB_NAME,
        user: e.META_DB_USER ?? '',
        password: e.META_DB_PASSWORD,
      }),
    dedup: {
      bucketMinutes: e.DEDUP_BUCKET_MINUTES,
      lookbackHours: e.DEDUP_LOOKBACK_HOURS,
      cacheTtlSeconds: e.DEDUP_CACHE_TTL_SECONDS,
      cacheMaxEntries: e.DEDUP_CACHE_MAX_ENTRIES,
      cleanupIntervalSeconds: e.DEDUP_CLEANUP_INTERVAL_SECONDS,
    },
    router: {
      stopGraceMs: e.ROUTER_STOP_GRACE_MS,
    },
    agents: {
      monitoring: { enabled: e.MONITORING_ENABLED, frequencySeconds: e.MONITORING_FREQUENCY },
      performance: {
        enabled: e.PERFORMANCE_ENABLED,
        slowQueryThresholdMs: e.PERFORMANCE_SLOW_THRESHOLD_MS,
      },
      indexing: { enabled: e.INDEXING_ENABLED, frequencySeconds: e.INDEXING_FREQUENCY },
      semantic: { enabled: e.SEMANTIC_ENABLED, frequencySeconds: e.SEMANTIC_FREQUENCY },
    },
  };
}

/**
 * Settings block for one monitoring agent
 */
export function getAgentSettings<N extends AgentName>(
  config: AgentConfig,
  name: N
): AgentSettingsMap[N] {
  return config.agents[name];
}
