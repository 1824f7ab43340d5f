/**
 * Error types for the load-testing engine.
 *
 * Per-request failures are never thrown; they are recorded as samples.
 * These classes cover the conditions that do surface to callers:
 * bad configuration, invalid payloads, isolated worker crashes and
 * report generation problems.
 */

/**
 * Base class for every error raised by the engine
 */
export class LoadTestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LoadTestError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Configuration rejected before any virtual user was launched
 */
export class ConfigurationError extends LoadTestError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_CONFIGURATION', cause);
    this.name = 'ConfigurationError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Schema validation failure (config file, result file, CLI input)
 */
export class ValidationError extends LoadTestError {
  constructor(
    message: string,
    public readonly errors: ValidationIssue[],
    cause?: Error
  ) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors };
  }
}

/**
 * Unexpected failure inside one virtual user.
 *
 * Isolated by the orchestrator: logged, never rethrown.
 */
export class WorkerError extends LoadTestError {
  constructor(
    message: string,
    public readonly userIndex: number,
    cause?: Error
  ) {
    super(message, 'WORKER_ERROR', cause);
    this.name = 'WorkerError';
  }
}

/**
 * Report rendering or result loading failure
 */
export class ReportError extends LoadTestError {
  constructor(message: string, cause?: Error) {
    super(message, 'REPORT_ERROR', cause);
    this.name = 'ReportError';
  }
}

export function isLoadTestError(error: unknown): error is LoadTestError {
  return error instanceof LoadTestError;
}

/**
 * Wrap unknown error as LoadTestError
 */
export function wrapError(error: unknown, message?: string): LoadTestError {
  if (isLoadTestError(error)) {
    return error;
  }

  const errorMessage = message || (error instanceof Error ? error.message : String(error));
  const cause = error instanceof Error ? error : undefined;

  return new LoadTestError(errorMessage, 'UNKNOWN_ERROR', cause);
}

/**
 * Normalise a caught value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
