/**
 * Console Reporter
 *
 * Prints per-case progress lines while a run executes and the full report
 * once it completes.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { CaseOutcome, RunSummary } from '@apiprobe/core';
import { successRate } from '../summary.js';
import type { RunnerEvent, RunnerEventSource } from '../types.js';

const RULE_WIDTH = 60;
const RESPONSE_PREVIEW_LENGTH = 200;

export interface ConsoleReporterOptions {
  /** Line sink (default `console.log`) */
  write?: (line: string) => void;
  /** Chalk instance, e.g. `new Chalk({ level: 0 })` for plain text */
  colors?: ChalkInstance;
  /** Print description and a response preview for each case */
  verbose?: boolean;
}

function formatRate(passed: number, total: number): string {
  return `${successRate(passed, total).toFixed(1)}%`;
}

function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}

/**
 * One progress line for a finished case
 */
export function formatCaseLine(outcome: CaseOutcome, colors: ChalkInstance = chalk): string {
  const icon = outcome.passed ? colors.green('✓') : colors.red('✗');
  const name = outcome.passed ? outcome.caseName : colors.red(outcome.caseName);

  if (outcome.statusCode === undefined) {
    return `  ${icon} ${name} ${colors.gray(`(${outcome.transportError ?? outcome.failureMessage ?? 'no response'})`)}`;
  }

  const expected = outcome.expectation?.status;
  const status = expected !== undefined
    ? `expected ${expected}, got ${outcome.statusCode}`
    : `status ${outcome.statusCode}`;
  const time = outcome.elapsedSeconds !== undefined ? `, ${formatSeconds(outcome.elapsedSeconds)}` : '';

  return `  ${icon} ${name} ${colors.gray(`(${status}${time})`)}`;
}

/**
 * Report lines for a finished run
 */
export function formatSummary(summary: RunSummary, colors: ChalkInstance = chalk): string[] {
  const lines: string[] = [];
  const rule = colors.gray('─'.repeat(RULE_WIDTH));

  lines.push('');
  lines.push(colors.bold('Test Report'));
  lines.push(rule);

  if (summary.status === 'skipped') {
    lines.push(colors.yellow(`Run skipped: ${summary.skipReason ?? 'target unreachable'}`));
    lines.push(rule);
    return lines;
  }

  lines.push(`Total:        ${summary.total}`);
  lines.push(`Passed:       ${colors.green(String(summary.passed))}`);
  lines.push(`Failed:       ${summary.failed > 0 ? colors.red(String(summary.failed)) : '0'}`);
  lines.push(`Success rate: ${formatRate(summary.passed, summary.total)}`);

  for (const tally of summary.categories) {
    lines.push('');
    lines.push(colors.bold(tally.label ?? tally.name));
    lines.push(`  Total:        ${tally.total}`);
    lines.push(`  Passed:       ${tally.passed}`);
    lines.push(`  Success rate: ${formatRate(tally.passed, tally.total)}`);
  }

  if (summary.failures.length > 0) {
    lines.push('');
    lines.push(colors.red.bold(`Failed cases (${summary.failures.length}):`));
    for (const failure of summary.failures) {
      lines.push(`  - ${failure.caseName}`);
      if (failure.description) {
        lines.push(`    Description:     ${failure.description}`);
      }
      if (failure.expectedStatus !== undefined) {
        lines.push(`    Expected status: ${failure.expectedStatus}`);
      }
      lines.push(`    Actual status:   ${failure.actualStatus ?? 'N/A'}`);
      if (failure.transportError) {
        lines.push(`    Error:           ${failure.transportError}`);
      } else if (failure.message) {
        lines.push(`    Reason:          ${failure.message}`);
      }
    }
  }

  if (summary.timing) {
    lines.push('');
    lines.push(colors.bold('Response times'));
    lines.push(`  Mean: ${formatSeconds(summary.timing.mean)}`);
    lines.push(`  Min:  ${formatSeconds(summary.timing.min)}`);
    lines.push(`  Max:  ${formatSeconds(summary.timing.max)}`);
  }

  lines.push(rule);
  lines.push(
    summary.failed === 0
      ? colors.green.bold(`All ${summary.total} cases passed`)
      : colors.red.bold(`${summary.failed} of ${summary.total} cases failed`)
  );

  return lines;
}

/**
 * ConsoleReporter class
 */
export class ConsoleReporter {
  private readonly write: (line: string) => void;
  private readonly colors: ChalkInstance;
  private readonly verbose: boolean;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.colors = options.colors ?? chalk;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Subscribe to a runner; returns the unsubscribe function
   */
  attach(source: RunnerEventSource): () => void {
    return source.on((event) => this.handle(event));
  }

  handle(event: RunnerEvent): void {
    switch (event.type) {
      case 'run_started':
        this.write(this.colors.bold(`Running ${event.totalCases} cases against ${event.baseUrl}`));
        this.write(this.colors.gray(`Config: ${event.source}  Mode: ${event.mode}`));
        break;

      case 'category_started':
        this.write('');
        this.write(this.colors.cyan.bold(`${event.label ?? event.category} (${event.caseCount})`));
        this.write(this.colors.gray('─'.repeat(RULE_WIDTH)));
        break;

      case 'case_completed':
        this.write(formatCaseLine(event.outcome, this.colors));
        if (this.verbose) {
          this.writeDetails(event.outcome);
        }
        break;

      case 'case_error':
        this.write(this.colors.red(`    ${event.error.code}: ${event.error.message}`));
        break;

      case 'run_completed':
      case 'run_skipped':
        for (const line of formatSummary(event.summary, this.colors)) {
          this.write(line);
        }
        break;

      case 'case_started':
        break;
    }
  }

  private writeDetails(outcome: CaseOutcome): void {
    if (outcome.description) {
      this.write(this.colors.gray(`    ${outcome.description}`));
    }
    if (!outcome.passed && outcome.responseText) {
      const preview = outcome.responseText.length > RESPONSE_PREVIEW_LENGTH
        ? `${outcome.responseText.slice(0, RESPONSE_PREVIEW_LENGTH)}...`
        : outcome.responseText;
      this.write(this.colors.gray(`    Response: ${preview}`));
    }
  }
}
