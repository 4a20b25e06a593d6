/**
 * @module @dbsentinel/core
 * @description Ingestion core for the database-monitoring agents
 *
 * Exports:
 * - Event router (channel pub/sub over LISTEN/NOTIFY)
 * - Deduplication engine and fingerprint cache
 * - Ingestion pipeline
 * - Query builder with SQL safety checks
 * - PostgreSQL monitoring database
 * - Logger, errors and environment config
 */

export {
  createLogger,
  createFileDestination,
  fingerprintPrefix,
  REDACTION_PATHS,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  TransportError,
  DatabaseConnectionError,
  ConstraintError,
  MalformedPayloadError,
  CallbackError,
  InvalidConfigurationError,
  UnsafeQueryError,
  InvalidIdentifierError,
  UnknownTemplateError,
  isOperationalError,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

export {
  AgentEnvSchema,
  loadAgentConfig,
  buildPostgresUrl,
  getAgentSettings,
  type AgentEnv,
  type AgentConfig,
  type AgentName,
  type AgentSettingsMap,
  type DedupSettings,
  type PostgresUrlParts,
} from './env.js';

export {
  PostgresMonitoringDatabase,
  mapDatabaseError,
  type ObservationStore,
  type NotificationHandler,
  type NotificationTransport,
  type ListenSubscription,
  type MonitoringDatabase,
  type DatabaseTarget,
  type PostgresMonitoringDatabaseOptions,
} from './database.js';

export {
  QueryBuilder,
  StatementIntentSchema,
  STATEMENT_KINDS,
  ALLOWED_COMMANDS,
  FORBIDDEN_KEYWORDS,
  IDENTIFIER_PATTERN,
  MAX_IDENTIFIER_LENGTH,
  isSafe,
  isValidIdentifier,
  validateIdentifier,
  findSafetyViolation,
  type StatementIntent,
  type StatementKind,
  type RenderedStatement,
  type SelectOptions,
  type QueryBuilderOptions,
} from './query-builder.js';

export {
  DEFAULT_BUCKET_MINUTES,
  parseObservationTime,
  bucketTimestamp,
  formatUtc,
  buildFingerprintKey,
  hashFingerprintKey,
  renderTimePart,
  type TimePartOptions,
} from './fingerprint.js';

export {
  FingerprintCache,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_CACHE_MAX_ENTRIES,
  type FingerprintCacheEntry,
  type FingerprintCacheOptions,
  type FingerprintCacheStats,
} from './fingerprint-cache.js';

export {
  DeduplicationEngine,
  DEFAULT_LOOKBACK_HOURS,
  MIN_BUCKET_MINUTES,
  MAX_BUCKET_MINUTES,
  type DeduplicationEngineOptions,
  type AdmissionDecision,
  type DeduplicationStats,
} from './deduplication.js';

export {
  EventRouter,
  DEFAULT_STOP_GRACE_MS,
  type EventCallback,
  type DispatchReport,
  type DropReason,
  type EventRouterOptions,
  type ListenOptions,
} from './event-router.js';

export {
  IngestionPipeline,
  buildObservationRow,
  resolveHypertableFromEvent,
  type IngestionResult,
  type IngestionStatus,
  type HypertableResolver,
  type IngestionTarget,
  type IngestionPipelineOptions,
} from './ingestion-pipeline.js';

export {
  MonitoringAgent,
  DEFAULT_ROUTES,
  type IngestionRoute,
  type MonitoringAgentDeps,
  type AgentRun,
} from './agent.js';
