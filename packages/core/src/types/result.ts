/**
 * Execution results and run aggregates
 */

import type { Expectation, HttpMethod } from './test-case.js';

/**
 * Body actually put on the wire for a request
 */
export type RequestBody =
  | { kind: 'form'; fields: Readonly<Record<string, string>> }
  | { kind: 'json'; text: string };

/**
 * Outcome of a single HTTP exchange. Status is absent when the
 * exchange never completed.
 */
export interface RequestResult {
  readonly url: string;
  readonly method: HttpMethod;
  readonly sentBody?: RequestBody;
  readonly statusCode?: number;
  /** Wall-clock time from dispatch to fully read body */
  readonly elapsedSeconds?: number;
  readonly responseText?: string;
  /** Parsed JSON body; absent when the body is empty or not JSON */
  readonly responseParsed?: unknown;
  readonly transportError?: string;
}

/**
 * Why a case failed
 */
export type FailureReason = 'transport' | 'status' | 'content' | 'error';

/**
 * A request result judged against its case's expectation
 */
export interface CaseOutcome extends RequestResult {
  readonly caseName: string;
  readonly category: string;
  readonly description?: string;
  readonly expectation?: Readonly<Expectation>;
  readonly passed: boolean;
  readonly failureReason?: FailureReason;
  readonly failureMessage?: string;
}

/**
 * Failed case as listed in the summary
 */
export interface CaseFailure {
  caseName: string;
  category: string;
  description?: string;
  reason: FailureReason;
  message?: string;
  expectedStatus?: number;
  actualStatus?: number;
  transportError?: string;
}

/**
 * Response time statistics, in seconds
 */
export interface TimingStats {
  /** Cases that produced a measured time */
  count: number;
  min: number;
  max: number;
  mean: number;
}

/**
 * Per-category tallies
 */
export interface CategoryTally {
  name: string;
  label?: string;
  total: number;
  passed: number;
}

export type RunStatus = 'completed' | 'skipped';

/**
 * Aggregate of a whole run
 */
export interface RunSummary {
  status: RunStatus;
  /** Set when the run was skipped */
  skipReason?: string;
  total: number;
  passed: number;
  failed: number;
  /** Tallies in category order */
  categories: CategoryTally[];
  /** One outcome per executed case, in execution order */
  outcomes: CaseOutcome[];
  failures: CaseFailure[];
  /** Absent when no case produced a measured time */
  timing?: TimingStats;
  startedAt: Date;
  finishedAt: Date;
}
