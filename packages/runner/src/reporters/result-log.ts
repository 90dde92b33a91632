/**
 * Result Log
 *
 * Append-only text log with one block per case, each closed by a line of
 * dashes.
 */

import { appendFile } from 'fs/promises';
import {
  canonicalJson,
  Errors,
  RESULT_LOG,
  type CaseOutcome,
  type RequestBody,
} from '@apiprobe/core';
import type { RunnerEventSource } from '../types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return [
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`,
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`,
  ].join(' ');
}

/**
 * Payload as logged: form fields as indented JSON, JSON bodies verbatim
 */
export function formatPayload(body?: RequestBody): string {
  if (!body) {
    return 'None';
  }
  if (body.kind === 'json') {
    return body.text;
  }
  return canonicalJson(body.fields, { indent: RESULT_LOG.PAYLOAD_INDENT });
}

/**
 * Render one log block, trailing newline included
 */
export function formatResultBlock(outcome: CaseOutcome, at: Date): string {
  const lines = [
    `Test: ${outcome.caseName}`,
    `Time: ${formatTimestamp(at)}`,
    `URL: ${outcome.url}`,
    `Payload: ${formatPayload(outcome.sentBody)}`,
  ];

  if (outcome.statusCode === undefined) {
    lines.push(`Error: ${outcome.transportError ?? outcome.failureMessage ?? 'no response'}`);
  } else {
    lines.push(`Status Code: ${outcome.statusCode}`);
    lines.push(`Response: ${outcome.responseText ?? ''}`);
    if (outcome.expectation) {
      lines.push(`Expected Status Code: ${outcome.expectation.status ?? 'None'}`);
      lines.push(`Expected Response Contains: ${outcome.expectation.contains ?? 'None'}`);
    }
    lines.push(`Test Result: ${outcome.passed ? 'PASSED' : 'FAILED'}`);
  }

  lines.push(RESULT_LOG.SEPARATOR);
  return `${lines.join('\n')}\n`;
}

export interface ResultLogOptions {
  /** Clock used for block timestamps */
  now?: () => Date;
}

/**
 * ResultLogWriter class
 */
export class ResultLogWriter {
  private readonly filePath: string;
  private readonly now: () => Date;
  private blocksWritten = 0;

  constructor(filePath: string, options: ResultLogOptions = {}) {
    this.filePath = filePath;
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.filePath;
  }

  get count(): number {
    return this.blocksWritten;
  }

  /**
   * Create the file if needed; a path that cannot be written is a
   * configuration error raised before any case runs
   */
  async open(): Promise<void> {
    try {
      await appendFile(this.filePath, '', 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw Errors.configInvalid(`Cannot write result log ${this.filePath}: ${reason}`, {
        path: this.filePath,
      });
    }
  }

  /**
   * Append one block for a finished case
   */
  async append(outcome: CaseOutcome): Promise<void> {
    await appendFile(this.filePath, formatResultBlock(outcome, this.now()), 'utf-8');
    this.blocksWritten++;
  }

  /**
   * Append a block for every case a runner completes
   */
  attach(source: RunnerEventSource): () => void {
    return source.on(async (event) => {
      if (event.type === 'case_completed') {
        await this.append(event.outcome);
      }
    });
  }
}
