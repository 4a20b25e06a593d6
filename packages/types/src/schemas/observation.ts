import { z } from 'zod';

/**
 * Observation Schemas
 * One monitoring sample produced by a probe, carried on the wire as a JSON object
 */

/** Candidate time fields, in lookup order */
export const TIMESTAMP_FIELDS = ['timestamp', 'executed_at', 'recorded_at', 'measured_at'] as const;

export type TimestampField = (typeof TIMESTAMP_FIELDS)[number];

/** Optional fields that tell otherwise identical observations apart, in fingerprint order */
export const DISAMBIGUATOR_FIELDS = ['query_hash', 'index_name', 'column_name'] as const;

export type DisambiguatorField = (typeof DISAMBIGUATOR_FIELDS)[number];

/**
 * Wire envelope: any JSON object.
 * `event_type` is the only field the router reads, and it may be missing.
 */
export const EventEnvelopeSchema = z.record(z.string(), z.unknown());

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;

/** Observations travel as envelopes; the identifying fields are read loosely */
export type Observation = EventEnvelope;

export const UNKNOWN_EVENT_TYPE = 'unknown';

export function getEventType(event: Readonly<Observation>): string {
  const eventType = event.event_type;
  return typeof eventType === 'string' && eventType.length > 0 ? eventType : UNKNOWN_EVENT_TYPE;
}

export interface ResolvedTimestamp {
  field: TimestampField;
  value: unknown;
}

/**
 * Find the observation's point in time: the first truthy field of
 * `timestamp`, `executed_at`, `recorded_at`, `measured_at`.
 */
export function resolveTimestamp(observation: Readonly<Observation>): ResolvedTimestamp | null {
  for (const field of TIMESTAMP_FIELDS) {
    const value = observation[field];
    if (value !== undefined && value !== null && value !== '' && value !== 0 && value !== false) {
      return { field, value };
    }
  }
  return null;
}
