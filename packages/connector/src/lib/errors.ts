/**
 * Error taxonomy
 *
 * Service clients translate provider responses into these classes; the
 * orchestrator decides retry, skip or lane failure from the class alone.
 */

export type ServiceName = "fitbit" | "omron" | "garmin";

/**
 * Base class for every error raised by the migration.
 */
export class MigrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Credentials are invalid or expired and cannot be refreshed silently.
 */
export class AuthError extends MigrationError {
  readonly service: ServiceName;

  constructor(service: ServiceName, message: string, options?: { cause?: unknown }) {
    super(`[${service}] ${message}`, options);
    this.service = service;
  }
}

export class TransientFetchError extends MigrationError {}

export class PermanentFetchError extends MigrationError {}

export class TransientUploadError extends MigrationError {}

export class PermanentUploadError extends MigrationError {}

/**
 * The sink already holds this reading. Counts as a successful transfer for
 * watermark purposes.
 */
export class DuplicateRejected extends MigrationError {}

/**
 * A rate limiter is cooling down after a provider-reported limit.
 */
export class RateLimitedError extends MigrationError {
  /** Seconds until the limiter accepts calls again */
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message?: string) {
    super(message ?? `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`);
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class RunAlreadyInProgressError extends MigrationError {
  constructor(message: string = "A migration run is already in progress") {
    super(message);
  }
}

/**
 * The run's signal aborted while a call was waiting or in flight.
 */
export class RunCancelledError extends MigrationError {
  constructor(message: string = "Run cancelled") {
    super(message);
  }
}

/**
 * A measurement value failed normalization or plausibility checks.
 */
export class ValidationError extends MigrationError {}

/**
 * A caller tried to move a watermark backwards.
 */
export class WatermarkRegressionError extends MigrationError {}

export class ConfigurationError extends MigrationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.issues = issues;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

export function isRateLimitedError(error: unknown): error is RateLimitedError {
  return error instanceof RateLimitedError;
}

/**
 * Errors worth another attempt within the same run.
 */
export function isRetryableError(
  error: unknown
): error is TransientFetchError | TransientUploadError | RateLimitedError {
  return (
    error instanceof TransientFetchError ||
    error instanceof TransientUploadError ||
    error instanceof RateLimitedError
  );
}

/**
 * Get retry wait time in seconds, when the error carries one.
 */
export function getRetryAfterSeconds(error: unknown): number | null {
  if (error instanceof RateLimitedError) {
    return error.retryAfterSeconds;
  }
  return null;
}

/**
 * Message suitable for run reports: never a stack trace.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "Error" ? error.message : `${error.name}: ${error.message}`;
  }
  return String(error);
}
