/**
 * Error codes and custom error classes for apiprobe
 */

/**
 * All error codes used by the harness
 */
export type ErrorCode =
  // Configuration errors (abort before any case runs)
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'

  // Transport errors (per case)
  | 'TRANSPORT_ERROR'
  | 'TIMEOUT'
  | 'SESSION_CLOSED'

  // Run-level errors
  | 'TARGET_UNREACHABLE'
  | 'INTERNAL_ERROR';

/**
 * Process exit code for each error code
 */
export const ERROR_EXIT_CODE: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 2,
  CONFIG_PARSE_ERROR: 2,
  CONFIG_INVALID: 2,

  TRANSPORT_ERROR: 1,
  TIMEOUT: 1,
  SESSION_CLOSED: 1,

  TARGET_UNREACHABLE: 3,
  INTERNAL_ERROR: 1,
};

const CONFIG_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  'CONFIG_NOT_FOUND',
  'CONFIG_PARSE_ERROR',
  'CONFIG_INVALID',
]);

const TRANSPORT_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  'TRANSPORT_ERROR',
  'TIMEOUT',
]);

/**
 * Custom error class for harness errors
 */
export class HarnessError extends Error {
  /** Error code */
  readonly code: ErrorCode;

  /** Exit code the CLI uses when this error ends the process */
  readonly exitCode: number;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'HarnessError';
    this.code = code;
    this.exitCode = ERROR_EXIT_CODE[code];
    this.details = options?.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HarnessError);
    }
  }
}

/**
 * Error factory functions for common error types
 */
export const Errors = {
  configNotFound: (path: string) =>
    new HarnessError('CONFIG_NOT_FOUND', `Configuration file not found: ${path}`, {
      details: { path },
    }),

  configParseError: (path: string, message: string, cause?: Error) =>
    new HarnessError('CONFIG_PARSE_ERROR', `Failed to parse configuration ${path}: ${message}`, {
      details: { path },
      cause,
    }),

  configInvalid: (message: string, details?: Record<string, unknown>) =>
    new HarnessError('CONFIG_INVALID', message, { details }),

  transport: (url: string, message: string, cause?: Error) =>
    new HarnessError('TRANSPORT_ERROR', message, {
      details: { url },
      cause,
    }),

  timeout: (url: string, timeoutMs: number, cause?: Error) =>
    new HarnessError('TIMEOUT', `Request timed out after ${timeoutMs}ms`, {
      details: { url, timeoutMs },
      cause,
    }),

  sessionClosed: () =>
    new HarnessError('SESSION_CLOSED', 'HTTP session is closed'),

  targetUnreachable: (url: string, message: string) =>
    new HarnessError('TARGET_UNREACHABLE', `Target unreachable: ${url} (${message})`, {
      details: { url },
    }),

  internalError: (message: string, cause?: Error) =>
    new HarnessError('INTERNAL_ERROR', message, { cause }),
};

/**
 * Type guard to check if an error is a HarnessError
 */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/**
 * Whether an error means the configuration could not be loaded
 */
export function isConfigError(error: unknown): error is HarnessError {
  return isHarnessError(error) && CONFIG_ERROR_CODES.has(error.code);
}

/**
 * Whether an error is a failed network exchange
 */
export function isTransportError(error: unknown): error is HarnessError {
  return isHarnessError(error) && TRANSPORT_ERROR_CODES.has(error.code);
}

/**
 * Convert any error to a HarnessError
 */
export function toHarnessError(error: unknown): HarnessError {
  if (error instanceof HarnessError) {
    return error;
  }

  if (error instanceof Error) {
    return new HarnessError('INTERNAL_ERROR', error.message, {
      cause: error,
    });
  }

  return new HarnessError('INTERNAL_ERROR', String(error));
}
