import { createHash } from 'node:crypto';
import { DISAMBIGUATOR_FIELDS, resolveTimestamp, type Observation } from '@dbsentinel/types';

/**
 * Content fingerprinting
 *
 * Key layout: `db_id:table_name:event_type[:bucket][:query_hash][:index_name][:column_name]`,
 * hashed with SHA-256 and rendered as lowercase hex.
 */

export const DEFAULT_BUCKET_MINUTES = 5;

// ISO-8601 date or date-time; a missing zone designator means UTC
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:\d{2})?)?$/;

/**
 * Rewrite an ISO-8601 string into the form the Date constructor reads without
 * falling back to host-local time; null for anything else
 */
function normalizeIsoString(value: string): string | null {
  const match = ISO_DATE_TIME.exec(value.trim());
  if (!match) return null;

  const [, date, time, zone] = match;
  return time === undefined ? `${date}T00:00:00Z` : `${date}T${time}${zone ?? 'Z'}`;
}

/**
 * Parse an observation's time value.
 * Strings are ISO-8601 (zoneless means UTC), numbers are epoch milliseconds.
 * Returns null when the value cannot be read as a point in time.
 */
export function parseObservationTime(value: unknown): Date | null {
  let parsed: Date;

  if (value instanceof Date) {
    parsed = value;
  } else if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    parsed = new Date(value);
  } else if (typeof value === 'string') {
    const normalized = normalizeIsoString(value);
    if (normalized === null) return null;
    parsed = new Date(normalized);
  } else {
    return null;
  }

  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Floor a time to its bucket: minutes rounded down to a multiple of the bucket
 * width within the hour, seconds and milliseconds zeroed (UTC)
 */
export function bucketTimestamp(time: Date, bucketMinutes: number): Date {
  const minutes = Math.floor(time.getUTCMinutes() / bucketMinutes) * bucketMinutes;
  return new Date(
    Date.UTC(
      time.getUTCFullYear(),
      time.getUTCMonth(),
      time.getUTCDate(),
      time.getUTCHours(),
      minutes,
      0,
      0
    )
  );
}

/** `YYYY-MM-DDTHH:MM:SS` in UTC */
export function formatUtc(time: Date): string {
  return time.toISOString().slice(0, 19);
}

function keyPart(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Build the colon-joined key for an observation.
 * `timePart` is the already-rendered time component, or null to omit it.
 */
export function buildFingerprintKey(observation: Readonly<Observation>, timePart: string | null): string {
  const parts = [
    keyPart(observation.db_id),
    keyPart(observation.table_name),
    keyPart(observation.event_type),
  ];

  if (timePart !== null) {
    parts.push(timePart);
  }

  for (const field of DISAMBIGUATOR_FIELDS) {
    const value = observation[field];
    if (value) {
      parts.push(String(value));
    }
  }

  return parts.join(':');
}

export function hashFingerprintKey(key: string): string {
  return createHash('sha256').update(key, 'utf8').digest('hex');
}

export interface TimePartOptions {
  bucketTime: boolean;
  bucketMinutes: number;
  /** Used when the time value cannot be parsed */
  now: () => Date;
  /** Called when the time value was unparsable and `now` was substituted */
  onUnparsable?: (raw: unknown) => void;
}

/**
 * Render the time component of the key, or null when the observation has no time field
 */
export function renderTimePart(observation: Readonly<Observation>, options: TimePartOptions): string | null {
  const resolved = resolveTimestamp(observation);
  if (!resolved) return null;

  if (!options.bucketTime) {
    return String(resolved.value);
  }

  let time = parseObservationTime(resolved.value);
  if (!time) {
    options.onUnparsable?.(resolved.value);
    time = options.now();
  }

  return formatUtc(bucketTimestamp(time, options.bucketMinutes));
}
