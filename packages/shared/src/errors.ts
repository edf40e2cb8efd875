/**
 * Error codes used throughout codepack.
 * User-correctable errors use exit code 2.
 * Cancellation uses exit code 130, everything else exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'PreconditionError'
  // Recoverable errors, reported and skipped
  | 'FileReadError'
  | 'CollaboratorError'
  // Interrupt (exit code 130)
  | 'CancelledError'
  // Runtime errors (exit code 1)
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all codepack errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('UnknownError', 'Could not write output', {
 *   cause: originalError,
 *   details: { outputPath },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the traversal root is missing, not a directory, or not listable.
 * Raised before any output is produced.
 */
export class PreconditionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PreconditionError', message, options);
  }
}

/**
 * Error describing a single file that could not be read.
 * The packer records it and moves on.
 */
export class FileReadError extends AppError {
  /** Root-relative path of the file */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('FileReadError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when an external collaborator (clipboard, browser, file manager)
 * is unavailable or fails.
 */
export class CollaboratorError extends AppError {
  /** Name of the collaborator, e.g. "clipboard" */
  public readonly collaborator: string;

  constructor(collaborator: string, message: string, options: AppErrorOptions = {}) {
    super('CollaboratorError', message, options);
    this.collaborator = collaborator;
  }
}

/**
 * Error thrown when the user interrupts a run.
 */
export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled.', options: AppErrorOptions = {}) {
    super('CancelledError', message, options);
  }
}

/**
 * Maps an error to the process exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CancelledError) {
    return 130;
  }
  if (
    error instanceof ConfigError ||
    error instanceof UsageError ||
    error instanceof PreconditionError
  ) {
    return 2;
  }
  return 1;
}

/**
 * Extracts a human-readable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
