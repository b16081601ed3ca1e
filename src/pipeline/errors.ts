/**
 * Error classes for the caption pipeline.
 *
 * Only {@link ConfigurationError} aborts a job. Collaborator and parse failures are
 * recovered at their call site and show up as missing data that the gap pass backfills.
 */

export type CaptionErrorCode =
  | 'configuration'
  | 'collaborator_unavailable'
  | 'collaborator_timeout'
  | 'malformed_response'
  | 'timeline_invariant'
  | 'cancelled';

/**
 * Base class for all pipeline errors
 */
export class CaptionError extends Error {
  code: CaptionErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, code: CaptionErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CaptionError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`, `(code: ${this.code})`];
    if (this.details && Object.keys(this.details).length) {
      parts.push(JSON.stringify(this.details));
    }
    return parts.join(' ');
  }
}

/**
 * Invalid chunk size, duration or other job setting
 */
export class ConfigurationError extends CaptionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'configuration', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network, auth or server failure talking to the Audio Understanding Service
 */
export class CollaboratorUnavailableError extends CaptionError {
  retryable: boolean;
  statusCode?: number;

  constructor(
    message: string,
    opts: { retryable?: boolean; statusCode?: number; details?: Record<string, unknown> } = {}
  ) {
    super(message, 'collaborator_unavailable', opts.details);
    this.name = 'CollaboratorUnavailableError';
    this.retryable = opts.retryable ?? true;
    this.statusCode = opts.statusCode;
  }
}

/**
 * A single collaborator call exceeded its watchdog timeout
 */
export class CollaboratorTimeoutError extends CollaboratorUnavailableError {
  timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, { retryable: true, details: { timeoutMs } });
    this.code = 'collaborator_timeout';
    this.name = 'CollaboratorTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Collaborator reply could not be interpreted
 */
export class MalformedResponseError extends CaptionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'malformed_response', details);
    this.name = 'MalformedResponseError';
  }
}

/**
 * A segment sequence broke the sorted / non-overlapping / in-range contract
 */
export class TimelineInvariantError extends CaptionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'timeline_invariant', details);
    this.name = 'TimelineInvariantError';
  }
}

export class JobCancelledError extends CaptionError {
  constructor(message = 'Caption job was cancelled') {
    super(message, 'cancelled');
    this.name = 'JobCancelledError';
  }
}

export function isRetryable(e: unknown): boolean {
  return e instanceof CollaboratorUnavailableError && e.retryable;
}
