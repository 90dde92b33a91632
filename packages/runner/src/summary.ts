/**
 * Run aggregation
 */

import type {
  CaseFailure,
  CaseOutcome,
  Category,
  CategoryTally,
  RunSummary,
  TimingStats,
} from '@apiprobe/core';

/**
 * Percentage of passed cases, 0 for an empty set
 */
export function successRate(passed: number, total: number): number {
  return total > 0 ? (passed / total) * 100 : 0;
}

/**
 * Response time statistics over outcomes with a measured time
 */
export function computeTiming(outcomes: readonly CaseOutcome[]): TimingStats | undefined {
  const times: number[] = [];
  for (const outcome of outcomes) {
    if (outcome.elapsedSeconds !== undefined) {
      times.push(outcome.elapsedSeconds);
    }
  }

  if (times.length === 0) {
    return undefined;
  }

  const total = times.reduce((sum, time) => sum + time, 0);
  return {
    count: times.length,
    min: Math.min(...times),
    max: Math.max(...times),
    mean: total / times.length,
  };
}

/**
 * Failure entry for a failed outcome
 */
export function toCaseFailure(outcome: CaseOutcome): CaseFailure {
  const failure: CaseFailure = {
    caseName: outcome.caseName,
    category: outcome.category,
    reason: outcome.failureReason ?? 'error',
  };

  if (outcome.description !== undefined) failure.description = outcome.description;
  if (outcome.failureMessage !== undefined) failure.message = outcome.failureMessage;
  if (outcome.expectation?.status !== undefined) failure.expectedStatus = outcome.expectation.status;
  if (outcome.statusCode !== undefined) failure.actualStatus = outcome.statusCode;
  if (outcome.transportError !== undefined) failure.transportError = outcome.transportError;

  return failure;
}

function tallyCategories(
  categories: readonly Category[],
  outcomes: readonly CaseOutcome[]
): CategoryTally[] {
  return categories.map((category) => {
    const own = outcomes.filter((outcome) => outcome.category === category.name);
    const tally: CategoryTally = {
      name: category.name,
      total: own.length,
      passed: own.filter((outcome) => outcome.passed).length,
    };
    if (category.label !== undefined) tally.label = category.label;
    return tally;
  });
}

/**
 * Summarize a completed run
 */
export function summarizeRun(
  categories: readonly Category[],
  outcomes: readonly CaseOutcome[],
  startedAt: Date,
  finishedAt: Date
): RunSummary {
  const failures = outcomes.filter((outcome) => !outcome.passed).map(toCaseFailure);
  const passed = outcomes.length - failures.length;

  const summary: RunSummary = {
    status: 'completed',
    total: outcomes.length,
    passed,
    failed: failures.length,
    categories: tallyCategories(categories, outcomes),
    outcomes: [...outcomes],
    failures,
    startedAt,
    finishedAt,
  };

  const timing = computeTiming(outcomes);
  if (timing) summary.timing = timing;

  return summary;
}

/**
 * Summary of a run that never started executing cases
 */
export function skippedSummary(
  categories: readonly Category[],
  reason: string,
  startedAt: Date,
  finishedAt: Date
): RunSummary {
  return {
    ...summarizeRun(categories, [], startedAt, finishedAt),
    status: 'skipped',
    skipReason: reason,
  };
}
