/**
 * Runner Types
 *
 * Types for running a configuration and observing the run.
 */

import type { CaseOutcome, HarnessError, RunSummary } from '@apiprobe/core';
import type { FetchLike, HttpSession, HttpSessionConfig } from '@apiprobe/executor';

/**
 * How transport failures are treated
 *
 * - `collect`: recorded on the result and judged like any other failure
 * - `assert`: raised by the session as a hard failure of that case
 */
export type ExecutionMode = 'collect' | 'assert';

/**
 * Run lifecycle
 */
export type RunState = 'loaded' | 'running' | 'reported';

/**
 * Runner configuration
 */
export interface RunnerOptions {
  /** Execution mode (default `collect`) */
  mode?: ExecutionMode;
  /** Probe the base URL before running and skip the run if nothing answers */
  precheck?: boolean;
  /** Timeout of the connectivity probe */
  precheckTimeoutMs?: number;
  /** Fetch implementation handed to the session */
  fetch?: FetchLike;
  /** Monotonic clock in milliseconds, handed to the session */
  now?: () => number;
  /** Builds the session for a run */
  sessionFactory?: (config: HttpSessionConfig) => HttpSession;
}

interface RunnerEventBase {
  /** Event timestamp */
  timestamp: Date;
}

export interface RunStartedEvent extends RunnerEventBase {
  type: 'run_started';
  source: string;
  baseUrl: string;
  mode: ExecutionMode;
  totalCases: number;
}

export interface CategoryStartedEvent extends RunnerEventBase {
  type: 'category_started';
  category: string;
  label?: string;
  caseCount: number;
}

export interface CaseStartedEvent extends RunnerEventBase {
  type: 'case_started';
  caseName: string;
  category: string;
  url: string;
}

export interface CaseCompletedEvent extends RunnerEventBase {
  type: 'case_completed';
  outcome: CaseOutcome;
}

export interface CaseErrorEvent extends RunnerEventBase {
  type: 'case_error';
  caseName: string;
  category: string;
  error: HarnessError;
}

export interface RunCompletedEvent extends RunnerEventBase {
  type: 'run_completed';
  summary: RunSummary;
}

export interface RunSkippedEvent extends RunnerEventBase {
  type: 'run_skipped';
  reason: string;
  summary: RunSummary;
}

/**
 * Runner event
 */
export type RunnerEvent =
  | RunStartedEvent
  | CategoryStartedEvent
  | CaseStartedEvent
  | CaseCompletedEvent
  | CaseErrorEvent
  | RunCompletedEvent
  | RunSkippedEvent;

export type RunnerEventType = RunnerEvent['type'];

/**
 * Runner event handler
 */
export type RunnerEventHandler = (event: RunnerEvent) => void | Promise<void>;

/**
 * Anything a reporter can subscribe to
 */
export interface RunnerEventSource {
  on(handler: RunnerEventHandler): () => void;
}
