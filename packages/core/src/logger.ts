import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Structured agent logger
 *
 * One named logger per component, created by the composition root and passed
 * in at construction. Credentials never reach the output: connection strings
 * and passwords are censored wherever they appear one level deep.
 */

export const REDACTION_PATHS: string[] = [
  'password',
  'connectionString',
  'databaseUrl',
  'sourceDatabaseUrl',
  'metaDatabaseUrl',
  '*.password',
  '*.connectionString',
  '*.databaseUrl',
  '*.sourceDatabaseUrl',
  '*.metaDatabaseUrl',
];

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  /** Write to this stream instead of stdout */
  destination?: DestinationStream;
}

/**
 * Create a logger instance with credential redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Empty base keeps `name` but drops pid/hostname
    base: {},
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Asynchronous file destination for `LOG_FILE`; parent directories are created
 */
export function createFileDestination(path: string): DestinationStream {
  return pino.destination({ dest: path, mkdir: true, sync: false });
}

/**
 * Fingerprints are logged by prefix only
 */
export function fingerprintPrefix(fingerprint: string): string {
  return fingerprint.slice(0, 16);
}

export type { Logger };
