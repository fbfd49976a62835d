/**
 * Error codes used throughout leakscan.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ScanError'
  | 'ResourceExhaustedError'
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
 * Base error class for all leakscan errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ScanError', 'Could not read directory', {
 *   cause: originalError,
 *   details: { path: 'src/' },
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
 * Error thrown when the scan itself cannot proceed.
 */
export class ScanError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ScanError', message, options);
  }
}

/**
 * Error thrown when the operating system refuses to open or read a file
 * because a handle limit was reached (EMFILE, ENFILE).
 * Transient: the scan coordinator retries it according to its retry policy.
 */
export class ResourceExhaustedError extends AppError {
  /** Root-relative path of the file being scanned */
  public readonly file: string;
  /** The errno code reported by the OS */
  public readonly errno: string;

  constructor(
    file: string,
    errno: string,
    options: AppErrorOptions = {},
  ) {
    super('ResourceExhaustedError', `Resource exhausted while scanning ${file} (${errno})`, {
      ...options,
      details: options.details ?? { file, errno },
    });
    this.file = file;
    this.errno = errno;
  }
}

/**
 * Reads the `code` property Node attaches to system errors.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Exit code the CLI should use for an error.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
