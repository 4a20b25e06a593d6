/**
 * Error classes for the ingestion core
 *
 * Transient, I/O-adjacent failures are marked retryable; correctness failures
 * (unsafe SQL, bad identifiers, out-of-range configuration) are not.
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  retryable: boolean;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, retryable = false) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.retryable = retryable;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get error details that are safe to log or return (no payload contents)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * Listen/notify failure on the notification transport.
 * Fatal to an event router run; the supervisor restarts the router.
 */
export class TransportError extends AppError {
  public readonly channel: string | undefined;
  public readonly originalError: Error | undefined;

  constructor(message: string, channel?: string, originalError?: Error) {
    super(message, 'TRANSPORT_ERROR', true);
    this.name = 'TransportError';
    this.channel = channel;
    this.originalError = originalError;
  }
}

/**
 * Database connection error (the store could not be reached or the query failed in transit)
 */
export class DatabaseConnectionError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(message = 'Database connection failed', originalError?: Error) {
    super(message, 'DATABASE_CONNECTION_ERROR', true);
    this.name = 'DatabaseConnectionError';
    this.originalError = originalError;
  }
}

/**
 * Constraint violation reported by the store (SQLSTATE class 23)
 */
export class ConstraintError extends AppError {
  public readonly constraint: string | undefined;
  public readonly originalError: Error | undefined;

  constructor(message: string, constraint?: string, originalError?: Error) {
    super(message, 'CONSTRAINT_VIOLATION', false);
    this.name = 'ConstraintError';
    this.constraint = constraint;
    this.originalError = originalError;
  }
}

/**
 * Payload that is not a JSON object, or data that cannot be serialized to one
 */
export class MalformedPayloadError extends AppError {
  public readonly channel: string;

  constructor(channel: string, message: string) {
    super(message, 'MALFORMED_PAYLOAD', false);
    this.name = 'MalformedPayloadError';
    this.channel = channel;
  }
}

/**
 * A subscriber callback failed while handling an event
 */
export class CallbackError extends AppError {
  public readonly channel: string;
  public readonly subscriberIndex: number;
  public readonly originalError: Error;

  constructor(channel: string, subscriberIndex: number, originalError: Error) {
    super(
      `Subscriber ${subscriberIndex} on ${channel} failed: ${originalError.message}`,
      'CALLBACK_ERROR',
      false
    );
    this.name = 'CallbackError';
    this.channel = channel;
    this.subscriberIndex = subscriberIndex;
    this.originalError = originalError;
  }
}

/**
 * Configuration value rejected at the call that tried to apply it
 */
export class InvalidConfigurationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_CONFIGURATION', false);
    this.name = 'InvalidConfigurationError';
    this.details = details;
  }
}

/**
 * Statement refused by the query builder's safety checks
 */
export class UnsafeQueryError extends AppError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Unsafe SQL blocked: ${reason}`, 'UNSAFE_QUERY', false);
    this.name = 'UnsafeQueryError';
    this.reason = reason;
  }
}

export class InvalidIdentifierError extends AppError {
  public readonly field: string;
  public readonly value: string;

  constructor(field: string, value: string) {
    super(`Invalid SQL identifier for ${field}: ${value}`, 'INVALID_IDENTIFIER', false);
    this.name = 'InvalidIdentifierError';
    this.field = field;
    this.value = value;
  }
}

export class UnknownTemplateError extends AppError {
  public readonly templateName: string;

  constructor(templateName: string) {
    super(`Unknown SQL template: ${templateName}`, 'UNKNOWN_TEMPLATE', false);
    this.name = 'UnknownTemplateError';
    this.templateName = templateName;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error details
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    retryable: false,
  };
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
