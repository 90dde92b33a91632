/**
 * Validator Types
 *
 * Types for judging request results against expectations.
 */

import type { FailureReason } from '@apiprobe/core';

/**
 * Checks the validator can run
 */
export type CheckName = 'expectation' | 'transport' | 'status' | 'content';

/**
 * Individual validation check result
 */
export interface ValidationCheck {
  /** Check name */
  name: CheckName;
  /** Whether check passed */
  passed: boolean;
  /** Check message */
  message: string;
  /** Additional details */
  details?: Record<string, unknown>;
}

/**
 * Result of validating one request result
 */
export interface ResultValidation {
  /** Whether the case passed */
  passed: boolean;
  /** Checks in the order they ran */
  checks: ValidationCheck[];
  /** Why it failed, if it did */
  reason?: FailureReason;
  /** Message of the failing check */
  message?: string;
}
