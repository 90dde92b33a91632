/**
 * Process exit codes
 */

import { isHarnessError, type RunSummary } from '@apiprobe/core';

export const EXIT_CODES = {
  SUCCESS: 0,
  CASE_FAILURES: 1,
  CONFIG_ERROR: 2,
  TARGET_UNREACHABLE: 3,
  INTERRUPTED: 130,
} as const;

/**
 * Exit code for a finished run
 */
export function exitCodeForSummary(summary: RunSummary): number {
  if (summary.status === 'skipped') {
    return EXIT_CODES.TARGET_UNREACHABLE;
  }
  return summary.failed === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CASE_FAILURES;
}

/**
 * Exit code for an error that ended a command
 */
export function exitCodeForError(error: unknown): number {
  return isHarnessError(error) ? error.exitCode : EXIT_CODES.CASE_FAILURES;
}
