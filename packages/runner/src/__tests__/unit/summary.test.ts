/**
 * Aggregation Unit Tests
 */

import { describe, it, expect } from 'vitest';
import type { CaseOutcome, Category } from '@apiprobe/core';
import {
  computeTiming,
  skippedSummary,
  successRate,
  summarizeRun,
  toCaseFailure,
} from '../../index.js';

function makeOutcome(overrides: Partial<CaseOutcome> = {}): CaseOutcome {
  return {
    url: 'http://localhost:8080/api/Quest/FetchQuestList',
    method: 'POST',
    caseName: 'FetchQuestList',
    category: 'normal',
    statusCode: 200,
    elapsedSeconds: 0.2,
    expectation: { status: 200 },
    passed: true,
    ...overrides,
  };
}

const categories: Category[] = [
  { name: 'normal', label: 'Normal cases', cases: [] },
  { name: 'abnormal', cases: [] },
];

const startedAt = new Date('2025-01-01T00:00:00Z');
const finishedAt = new Date('2025-01-01T00:00:05Z');

describe('successRate', () => {
  it('returns a percentage', () => {
    expect(successRate(3, 4)).toBe(75);
  });

  it('returns 0 for an empty set', () => {
    expect(successRate(0, 0)).toBe(0);
  });
});

describe('computeTiming', () => {
  it('computes min, max and mean over measured outcomes', () => {
    const timing = computeTiming([
      makeOutcome({ elapsedSeconds: 0.5 }),
      makeOutcome({ elapsedSeconds: 0.25 }),
      makeOutcome({ elapsedSeconds: undefined, statusCode: undefined, transportError: 'fetch failed' }),
      makeOutcome({ elapsedSeconds: 0.75 }),
    ]);
    expect(timing).toEqual({ count: 3, min: 0.25, max: 0.75, mean: 0.5 });
  });

  it('returns undefined when nothing was measured', () => {
    expect(computeTiming([])).toBeUndefined();
  });
});

describe('toCaseFailure', () => {
  it('reports expected and actual status', () => {
    const failure = toCaseFailure(
      makeOutcome({
        passed: false,
        statusCode: 500,
        description: 'Fetch the quest list',
        failureReason: 'status',
        failureMessage: 'Expected status 200, got 500',
      })
    );
    expect(failure).toEqual({
      caseName: 'FetchQuestList',
      category: 'normal',
      description: 'Fetch the quest list',
      reason: 'status',
      message: 'Expected status 200, got 500',
      expectedStatus: 200,
      actualStatus: 500,
    });
  });

  it('reports the transport error', () => {
    const failure = toCaseFailure(
      makeOutcome({
        passed: false,
        statusCode: undefined,
        elapsedSeconds: undefined,
        transportError: 'fetch failed',
        failureReason: 'transport',
        failureMessage: 'fetch failed',
      })
    );
    expect(failure).toEqual({
      caseName: 'FetchQuestList',
      category: 'normal',
      reason: 'transport',
      message: 'fetch failed',
      expectedStatus: 200,
      transportError: 'fetch failed',
    });
  });
});

describe('summarizeRun', () => {
  it('tallies totals and categories', () => {
    const summary = summarizeRun(
      categories,
      [
        makeOutcome(),
        makeOutcome({ caseName: 'FetchQuestDetail', passed: false, statusCode: 500, failureReason: 'status' }),
        makeOutcome({ caseName: 'MissingUid', category: 'abnormal', statusCode: 400, expectation: { status: 400 } }),
      ],
      startedAt,
      finishedAt
    );

    expect(summary.status).toBe('completed');
    expect(summary.total).toBe(3);
    expect(summary.passed).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.failures.map((f) => f.caseName)).toEqual(['FetchQuestDetail']);
    expect(summary.categories).toEqual([
      { name: 'normal', label: 'Normal cases', total: 2, passed: 1 },
      { name: 'abnormal', total: 1, passed: 1 },
    ]);
    expect(summary.startedAt).toBe(startedAt);
    expect(summary.finishedAt).toBe(finishedAt);
  });

  it('keeps total equal to passed plus failures', () => {
    const outcomes = [
      makeOutcome({ passed: false, failureReason: 'content' }),
      makeOutcome({ passed: false, failureReason: 'transport' }),
      makeOutcome(),
    ];
    const summary = summarizeRun(categories, outcomes, startedAt, finishedAt);
    expect(summary.total).toBe(summary.passed + summary.failures.length);
  });
});

describe('skippedSummary', () => {
  it('marks the run skipped with zero counts', () => {
    const summary = skippedSummary(categories, 'Target unreachable', startedAt, finishedAt);
    expect(summary).toMatchObject({
      status: 'skipped',
      skipReason: 'Target unreachable',
      total: 0,
      passed: 0,
      failed: 0,
      outcomes: [],
      failures: [],
    });
    expect(summary.timing).toBeUndefined();
  });
});
