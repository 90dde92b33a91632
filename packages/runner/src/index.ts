/**
 * @apiprobe/runner
 *
 * Sequential test execution, aggregation and reporting for apiprobe.
 */

// Types
export type {
  ExecutionMode,
  RunState,
  RunnerOptions,
  RunnerEvent,
  RunnerEventType,
  RunnerEventHandler,
  RunnerEventSource,
  RunStartedEvent,
  CategoryStartedEvent,
  CaseStartedEvent,
  CaseCompletedEvent,
  CaseErrorEvent,
  RunCompletedEvent,
  RunSkippedEvent,
} from './types.js';

// Runner
export { TestRunner, createRunner } from './runner.js';

// Aggregation
export {
  summarizeRun,
  skippedSummary,
  computeTiming,
  toCaseFailure,
  successRate,
} from './summary.js';

// Connectivity
export { probeTarget, checkConnectivity, assertReachable } from './connectivity.js';
export type { ConnectivityOptions } from './connectivity.js';

// Reporters
export {
  ConsoleReporter,
  formatCaseLine,
  formatSummary,
} from './reporters/console-reporter.js';
export type { ConsoleReporterOptions } from './reporters/console-reporter.js';
export {
  ResultLogWriter,
  formatResultBlock,
  formatPayload,
  formatTimestamp,
} from './reporters/result-log.js';
export type { ResultLogOptions } from './reporters/result-log.js';
export { toJsonSummary, writeJsonSummary } from './reporters/json-summary.js';
export type { JsonSummary, JsonCaseEntry } from './reporters/json-summary.js';
