/**
 * JSON summary output
 */

import { writeFile } from 'fs/promises';
import type { CaseFailure, CategoryTally, RunSummary, TimingStats } from '@apiprobe/core';

export interface JsonCaseEntry {
  name: string;
  category: string;
  url: string;
  method: string;
  passed: boolean;
  statusCode: number | null;
  elapsedSeconds: number | null;
  failureReason: string | null;
  failureMessage: string | null;
}

export interface JsonSummary {
  status: RunSummary['status'];
  skipReason: string | null;
  startedAt: string;
  finishedAt: string;
  total: number;
  passed: number;
  failed: number;
  categories: CategoryTally[];
  failures: CaseFailure[];
  timing: TimingStats | null;
  cases: JsonCaseEntry[];
}

/**
 * Serializable view of a run summary
 */
export function toJsonSummary(summary: RunSummary): JsonSummary {
  return {
    status: summary.status,
    skipReason: summary.skipReason ?? null,
    startedAt: summary.startedAt.toISOString(),
    finishedAt: summary.finishedAt.toISOString(),
    total: summary.total,
    passed: summary.passed,
    failed: summary.failed,
    categories: summary.categories,
    failures: summary.failures,
    timing: summary.timing ?? null,
    cases: summary.outcomes.map((outcome) => ({
      name: outcome.caseName,
      category: outcome.category,
      url: outcome.url,
      method: outcome.method,
      passed: outcome.passed,
      statusCode: outcome.statusCode ?? null,
      elapsedSeconds: outcome.elapsedSeconds ?? null,
      failureReason: outcome.failureReason ?? null,
      failureMessage: outcome.failureMessage ?? null,
    })),
  };
}

/**
 * Write the summary as indented JSON
 */
export async function writeJsonSummary(filePath: string, summary: RunSummary): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(toJsonSummary(summary), null, 2)}\n`, 'utf-8');
}
