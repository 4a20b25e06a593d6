/**
 * dbsentinel Types Package
 *
 * Zod schemas and inferred types shared by the monitoring agents:
 * - Observations and the pub/sub wire envelope
 * - Hypertable names, time columns and insert columns
 * - Channel names
 *
 * @module @dbsentinel/types
 */

export {
  TIMESTAMP_FIELDS,
  DISAMBIGUATOR_FIELDS,
  EventEnvelopeSchema,
  UNKNOWN_EVENT_TYPE,
  getEventType,
  resolveTimestamp,
  type TimestampField,
  type DisambiguatorField,
  type EventEnvelope,
  type Observation,
  type ResolvedTimestamp,
} from './schemas/observation.js';

export {
  HYPERTABLE_SCHEMA,
  HYPERTABLES,
  HypertableSchema,
  DEFAULT_TIME_COLUMN,
  HYPERTABLE_TIME_COLUMNS,
  HYPERTABLE_COLUMNS,
  isHypertable,
  getTimeColumn,
  type Hypertable,
} from './schemas/hypertable.js';

export {
  CHANNELS,
  ChannelNameSchema,
  type ChannelKey,
  type ChannelName,
} from './schemas/channel.js';
