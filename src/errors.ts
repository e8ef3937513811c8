/**
 * Error taxonomy
 *
 * Transient source failures (timeouts, 5xx, rate limiting) are retried inside
 * the fetcher and never leave it. Everything else ends the pass, and the exit
 * code tells the supervisor which kind of failure stopped the process.
 */

// ============================================================================
// Transient source errors
// ============================================================================

export class RequestTimeoutError extends Error {
  code = "REQUEST_TIMEOUT" as const;
  transient = true as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RequestTimeoutError";
  }
}

export class ServerError extends Error {
  code = "SERVER_ERROR" as const;
  transient = true as const;
  status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ServerError";
    this.status = status;
  }
}

export class RateLimitExceededError extends Error {
  code = "RATE_LIMIT_EXCEEDED" as const;
  transient = true as const;
  /** Seconds until reset as reported by the source, when it reports one */
  resetSeconds: number | null;

  constructor(message: string, resetSeconds: number | null = null) {
    super(message);
    this.name = "RateLimitExceededError";
    this.resetSeconds = resetSeconds;
  }
}

export type TransientSourceError =
  | RequestTimeoutError
  | ServerError
  | RateLimitExceededError;

// ============================================================================
// Fatal errors
// ============================================================================

/**
 * Any other non-success answer from the source (4xx, bad refresh token,
 * malformed payload).
 */
export class SourceRequestError extends Error {
  code = "SOURCE_REQUEST_ERROR" as const;
  status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "SourceRequestError";
    this.status = status;
  }
}

export class ConfigurationError extends Error {
  code = "CONFIGURATION_ERROR" as const;
  exitCode = 2;
  problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

export interface WriteFailureContext {
  measurement: string;
  series: string;
  /** Days the points were fetched for, when the caller knows them */
  interval?: { start: string; end: string };
  batchIndex: number;
  batchSize: number;
  totalPoints: number;
}

export class WriteFailureError extends Error {
  code = "WRITE_FAILURE" as const;
  exitCode = 3;
  context: WriteFailureContext;

  constructor(
    message: string,
    context: WriteFailureContext,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "WriteFailureError";
    this.context = context;
  }
}

export interface FetchContext {
  resource: string;
  interval?: { start: string; end: string };
  attempts: number;
}

export class FetchAbortedError extends Error {
  code = "FETCH_ABORTED" as const;
  exitCode = 4;
  context: FetchContext;

  constructor(message: string, context: FetchContext, options?: ErrorOptions) {
    super(message, options);
    this.name = "FetchAbortedError";
    this.context = context;
  }
}

export class UnexpectedError extends Error {
  code = "UNEXPECTED_ERROR" as const;
  exitCode = 1;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UnexpectedError";
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isTransientError(
  error: unknown
): error is TransientSourceError {
  return (
    error instanceof RequestTimeoutError ||
    error instanceof ServerError ||
    error instanceof RateLimitExceededError
  );
}

export type FatalError =
  | ConfigurationError
  | WriteFailureError
  | FetchAbortedError
  | UnexpectedError;

export function isFatalError(error: unknown): error is FatalError {
  return (
    error instanceof ConfigurationError ||
    error instanceof WriteFailureError ||
    error instanceof FetchAbortedError ||
    error instanceof UnexpectedError
  );
}

/**
 * Anything outside the fatal taxonomy becomes an UnexpectedError carrying
 * the original as its cause.
 */
export function toFatalError(error: unknown): FatalError {
  if (isFatalError(error)) {
    return error;
  }
  return new UnexpectedError(errorMessage(error), { cause: error });
}

/**
 * Process exit status for an error that ended the run.
 */
export function toExitCode(error: unknown): number {
  return isFatalError(error) ? error.exitCode : 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
