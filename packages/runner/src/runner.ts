/**
 * Test Runner
 *
 * Runs every case of a configuration exactly once, category order then
 * declaration order, over a single HTTP session. A failing case never stops
 * the run.
 */

import {
  DEFAULT_TIMEOUTS,
  Errors,
  isTransportError,
  toHarnessError,
  type CaseOutcome,
  type Category,
  type FailureReason,
  type RunConfig,
  type RunSummary,
  type TestCase,
} from '@apiprobe/core';
import {
  buildRequest,
  createHttpSession,
  type HttpSession,
  type HttpSessionConfig,
} from '@apiprobe/executor';
import { validateResult } from '@apiprobe/validator';
import { probeTarget } from './connectivity.js';
import { skippedSummary, summarizeRun } from './summary.js';
import type {
  ExecutionMode,
  RunState,
  RunnerEvent,
  RunnerEventHandler,
  RunnerOptions,
} from './types.js';

/**
 * Distributes `Omit` over each member of the event union
 */
type EventPayload<E> = E extends RunnerEvent ? Omit<E, 'timestamp'> : never;

/**
 * TestRunner class
 */
export class TestRunner {
  private readonly config: RunConfig;
  private readonly mode: ExecutionMode;
  private readonly precheck: boolean;
  private readonly precheckTimeoutMs: number;
  private readonly sessionConfig: HttpSessionConfig;
  private readonly sessionFactory: (config: HttpSessionConfig) => HttpSession;
  private eventHandlers: Set<RunnerEventHandler> = new Set();
  private state: RunState = 'loaded';

  constructor(config: RunConfig, options: RunnerOptions = {}) {
    this.config = config;
    this.mode = options.mode ?? 'collect';
    this.precheck = options.precheck ?? false;
    this.precheckTimeoutMs = options.precheckTimeoutMs ?? DEFAULT_TIMEOUTS.CONNECTIVITY_CHECK;
    this.sessionFactory = options.sessionFactory ?? createHttpSession;
    this.sessionConfig = {
      timeoutMs: config.timeoutMs,
      headers: config.headers,
      transportErrorPolicy: this.mode === 'assert' ? 'throw' : 'record',
      fetch: options.fetch,
      now: options.now,
    };
  }

  /**
   * Current lifecycle state
   */
  get runState(): RunState {
    return this.state;
  }

  /**
   * Subscribe to runner events
   */
  on(handler: RunnerEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  /**
   * Emit an event
   */
  private async emit(event: EventPayload<RunnerEvent>): Promise<void> {
    const stamped: RunnerEvent = { ...event, timestamp: new Date() };
    for (const handler of this.eventHandlers) {
      try {
        await handler(stamped);
      } catch (error) {
        console.error('Event handler error:', error);
      }
    }
  }

  /**
   * Run every case and return the summary. A runner runs once.
   */
  async run(): Promise<RunSummary> {
    if (this.state !== 'loaded') {
      throw Errors.internalError(`Runner cannot start from state '${this.state}'`);
    }
    this.state = 'running';

    const startedAt = new Date();
    const session = this.sessionFactory(this.sessionConfig);

    try {
      await this.emit({
        type: 'run_started',
        source: this.config.source,
        baseUrl: this.config.baseUrl,
        mode: this.mode,
        totalCases: this.countCases(),
      });

      if (this.precheck) {
        const probe = await probeTarget(session, this.config.baseUrl, this.precheckTimeoutMs);
        if (!probe.reachable) {
          const reason = Errors.targetUnreachable(probe.url, probe.error ?? 'no response').message;
          const summary = skippedSummary(this.config.categories, reason, startedAt, new Date());
          await this.emit({ type: 'run_skipped', reason, summary });
          return summary;
        }
      }

      const outcomes: CaseOutcome[] = [];
      for (const category of this.config.categories) {
        await this.emit({
          type: 'category_started',
          category: category.name,
          label: category.label,
          caseCount: category.cases.length,
        });

        for (const testCase of category.cases) {
          outcomes.push(await this.runCase(session, category, testCase));
        }
      }

      const summary = summarizeRun(this.config.categories, outcomes, startedAt, new Date());
      await this.emit({ type: 'run_completed', summary });
      return summary;
    } finally {
      session.close();
      this.state = 'reported';
    }
  }

  /**
   * Build, send and judge one case
   */
  private async runCase(
    session: HttpSession,
    category: Category,
    testCase: TestCase
  ): Promise<CaseOutcome> {
    const request = buildRequest(this.config.baseUrl, testCase);
    const identity = {
      caseName: testCase.name,
      category: category.name,
      ...(testCase.description !== undefined ? { description: testCase.description } : {}),
      ...(testCase.expectation !== undefined ? { expectation: testCase.expectation } : {}),
    };

    await this.emit({
      type: 'case_started',
      caseName: testCase.name,
      category: category.name,
      url: request.url,
    });

    let outcome: CaseOutcome;
    try {
      const result = await session.send(request);
      const validation = validateResult(result, testCase.expectation);
      outcome = Object.freeze({
        ...result,
        ...identity,
        passed: validation.passed,
        ...(validation.reason !== undefined ? { failureReason: validation.reason } : {}),
        ...(validation.message !== undefined ? { failureMessage: validation.message } : {}),
      });
    } catch (error) {
      // Thrown failures (assert mode) end this case only
      const failure = toHarnessError(error);
      const transport = isTransportError(failure);
      const failureReason: FailureReason = transport ? 'transport' : 'error';
      outcome = Object.freeze({
        url: request.url,
        method: request.method,
        ...(request.body !== undefined ? { sentBody: request.body } : {}),
        ...(transport ? { transportError: failure.message } : {}),
        ...identity,
        passed: false,
        failureReason,
        failureMessage: failure.message,
      });

      await this.emit({
        type: 'case_error',
        caseName: testCase.name,
        category: category.name,
        error: failure,
      });
    }

    await this.emit({ type: 'case_completed', outcome });
    return outcome;
  }

  private countCases(): number {
    return this.config.categories.reduce((sum, category) => sum + category.cases.length, 0);
  }
}

/**
 * Create a new runner for a configuration
 */
export function createRunner(config: RunConfig, options?: RunnerOptions): TestRunner {
  return new TestRunner(config, options);
}
