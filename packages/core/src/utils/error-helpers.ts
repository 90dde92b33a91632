/**
 * Error handling utilities
 */

import { HarnessError } from '../errors.js';

/**
 * Format an error for logging or display
 * @param error - The error to format
 * @returns A formatted error string
 */
export function formatError(error: unknown): string {
  if (error instanceof HarnessError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return String(error);
}

/**
 * Describe why a network exchange failed. Node's fetch reports most
 * failures as `TypeError: fetch failed` with the real reason in `cause`.
 */
export function describeTransportFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }

  return error.message;
}
