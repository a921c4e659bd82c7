/**
 * Error types for reading log files and configuration.
 *
 * The analyzer itself never throws; these cover the places where input
 * enters the system.
 */

/**
 * Error codes for categorizing failures.
 */
export const ErrorCode = {
  LOGFILE_NOT_FOUND: 'LOGFILE_NOT_FOUND',
  LOGFILE_READ_ERROR: 'LOGFILE_READ_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class with an error code and cause chaining.
 */
export abstract class WeblogError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a formatted string including the cause, for logging.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;
    if (this.cause instanceof Error) {
      result += `\n  Caused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Thrown when the log file does not exist and simulation is not enabled.
 */
export class LogfileNotFoundError extends WeblogError {
  readonly code = ErrorCode.LOGFILE_NOT_FOUND;

  constructor(
    readonly path: string,
    options?: { cause?: Error },
  ) {
    super(`Log file not found: ${path}`, options);
  }
}

/**
 * Thrown when the log file exists but cannot be read.
 */
export class LogfileReadError extends WeblogError {
  readonly code = ErrorCode.LOGFILE_READ_ERROR;

  constructor(
    readonly path: string,
    options?: { cause?: Error },
  ) {
    super(`Failed to read log file: ${path}`, options);
  }
}

/**
 * Thrown when configuration values fail validation.
 */
export class ConfigError extends WeblogError {
  readonly code = ErrorCode.CONFIG_ERROR;

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}

/**
 * Type guard for any error raised by this package.
 */
export function isWeblogError(error: unknown): error is WeblogError {
  return error instanceof WeblogError;
}
