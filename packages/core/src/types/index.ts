/**
 * Type exports for @apiprobe/core
 */

export type {
  HttpMethod,
  BodyEncoding,
  StructuredValue,
  Payload,
  Expectation,
  TestCase,
  Category,
  ConfigShape,
  RunConfig,
} from './test-case.js';

export type {
  RequestBody,
  RequestResult,
  FailureReason,
  CaseOutcome,
  CaseFailure,
  TimingStats,
  CategoryTally,
  RunStatus,
  RunSummary,
} from './result.js';
