/**
 * Test Runner Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { Category, RunConfig, TestCase } from '@apiprobe/core';
import { HttpSession, type FetchLike, type HttpSessionConfig, type ProbeResult } from '@apiprobe/executor';
import { TestRunner, createRunner, type RunnerEvent } from '../../index.js';

const BASE_URL = 'http://localhost:8080/api/Quest';

function makeCase(name: string, overrides: Partial<TestCase> = {}): TestCase {
  return {
    name,
    endpoint: `/${name}`,
    method: 'POST',
    encoding: 'form',
    identity: '10001',
    payload: { page: 1 },
    expectation: { status: 200 },
    ...overrides,
  };
}

function makeConfig(categories: Category[], overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    source: 'quest.yaml',
    shape: 'quest',
    baseUrl: BASE_URL,
    timeoutMs: 1000,
    headers: {},
    categories,
    ...overrides,
  };
}

const questConfig = makeConfig([
  {
    name: 'normal',
    label: 'Normal cases',
    cases: [makeCase('FetchQuestList'), makeCase('FetchQuestDetail', { expectation: { status: 200, contains: 'quests' } })],
  },
  {
    name: 'abnormal',
    label: 'Abnormal cases',
    cases: [
      makeCase('MissingUid', { identity: undefined, expectation: { status: 400 } }),
      makeCase('InvalidJson', { payload: '{invalid json', expectation: { status: 400 } }),
    ],
  },
]);

function connectionRefused(): Error {
  return new TypeError('fetch failed', {
    cause: new Error('connect ECONNREFUSED 127.0.0.1:8080'),
  });
}

/**
 * Fake service: 400 for requests missing a field, 200 with a quest list otherwise
 */
function questService(): FetchLike {
  return async (_url, init) => {
    const body = new URLSearchParams(typeof init.body === 'string' ? init.body : '');
    if (!body.has('uid') || body.get('data') === '{invalid json') {
      return new Response('Bad Request', { status: 400 });
    }
    return new Response('{"code":0,"quests":[]}', { status: 200 });
  };
}

function tickingClock(): () => number {
  let now = 0;
  return () => (now += 100);
}

describe('TestRunner', () => {
  let fetchMock: Mock<FetchLike>;
  let events: RunnerEvent[];

  beforeEach(() => {
    fetchMock = vi.fn<FetchLike>(questService());
    events = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('run', () => {
    it('runs every case once in category then declaration order', async () => {
      const runner = createRunner(questConfig, { fetch: fetchMock });

      await runner.run();

      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        `${BASE_URL}/FetchQuestList`,
        `${BASE_URL}/FetchQuestDetail`,
        `${BASE_URL}/MissingUid`,
        `${BASE_URL}/InvalidJson`,
      ]);
    });

    it('summarizes passed cases per category', async () => {
      const summary = await createRunner(questConfig, { fetch: fetchMock }).run();

      expect(summary.status).toBe('completed');
      expect(summary.total).toBe(4);
      expect(summary.passed).toBe(4);
      expect(summary.failed).toBe(0);
      expect(summary.failures).toEqual([]);
      expect(summary.categories).toEqual([
        { name: 'normal', label: 'Normal cases', total: 2, passed: 2 },
        { name: 'abnormal', label: 'Abnormal cases', total: 2, passed: 2 },
      ]);
    });

    it('keeps outcomes in execution order', async () => {
      const summary = await createRunner(questConfig, { fetch: fetchMock }).run();

      expect(summary.outcomes.map((o) => [o.caseName, o.category, o.statusCode])).toEqual([
        ['FetchQuestList', 'normal', 200],
        ['FetchQuestDetail', 'normal', 200],
        ['MissingUid', 'abnormal', 400],
        ['InvalidJson', 'abnormal', 400],
      ]);
    });

    it('computes timing over measured cases', async () => {
      const summary = await createRunner(questConfig, { fetch: fetchMock, now: tickingClock() }).run();

      expect(summary.timing?.count).toBe(4);
      expect(summary.timing?.min).toBeCloseTo(0.1);
      expect(summary.timing?.max).toBeCloseTo(0.1);
      expect(summary.timing?.mean).toBeCloseTo(0.1);
    });

    it('continues after failing cases', async () => {
      fetchMock.mockImplementationOnce(async () => new Response('error', { status: 500 }));
      fetchMock.mockImplementationOnce(async () => {
        throw connectionRefused();
      });

      const summary = await createRunner(questConfig, { fetch: fetchMock }).run();

      expect(summary.total).toBe(4);
      expect(summary.passed).toBe(2);
      expect(summary.total).toBe(summary.passed + summary.failures.length);
      expect(summary.failures).toEqual([
        {
          caseName: 'FetchQuestList',
          category: 'normal',
          reason: 'status',
          message: 'Expected status 200, got 500',
          expectedStatus: 200,
          actualStatus: 500,
        },
        {
          caseName: 'FetchQuestDetail',
          category: 'normal',
          reason: 'transport',
          message: 'fetch failed: connect ECONNREFUSED 127.0.0.1:8080',
          expectedStatus: 200,
          transportError: 'fetch failed: connect ECONNREFUSED 127.0.0.1:8080',
        },
      ]);
      expect(summary.categories[0]).toEqual({ name: 'normal', label: 'Normal cases', total: 2, passed: 0 });
    });

    it('leaves timing out when no case was measured', async () => {
      fetchMock.mockRejectedValue(connectionRefused());

      const summary = await createRunner(questConfig, { fetch: fetchMock }).run();

      expect(summary.passed).toBe(0);
      expect(summary.timing).toBeUndefined();
    });

    it('sends configured headers and JSON bodies', async () => {
      const config = makeConfig(
        [
          {
            name: 'endpoints',
            cases: [
              makeCase('users - Test Case 1', {
                endpoint: '/users',
                encoding: 'json',
                identity: undefined,
                payload: { name: 'alice' },
                expectation: { status: 201 },
              }),
            ],
          },
        ],
        { shape: 'endpoints', baseUrl: 'http://localhost:5000', headers: { Authorization: 'Bearer test-token' } }
      );
      fetchMock.mockResolvedValue(new Response('{"id":1}', { status: 201 }));

      const summary = await createRunner(config, { fetch: fetchMock }).run();

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://localhost:5000/users');
      expect(init.body).toBe('{"name": "alice"}');
      expect(init.headers).toEqual({
        Authorization: 'Bearer test-token',
        'Content-Type': 'application/json',
      });
      expect(summary.passed).toBe(1);
    });

    it('passes cases without expectation whatever the status', async () => {
      const config = makeConfig([
        { name: 'explore', cases: [makeCase('Explore', { expectation: undefined })] },
      ]);
      fetchMock.mockResolvedValue(new Response('boom', { status: 500 }));

      const summary = await createRunner(config, { fetch: fetchMock }).run();

      expect(summary.passed).toBe(1);
      expect(summary.outcomes[0].statusCode).toBe(500);
    });

    it('fails cases without expectation when nothing answered', async () => {
      const config = makeConfig([
        { name: 'explore', cases: [makeCase('Explore', { expectation: undefined })] },
      ]);
      fetchMock.mockRejectedValue(connectionRefused());

      const summary = await createRunner(config, { fetch: fetchMock }).run();

      expect(summary.passed).toBe(0);
      expect(summary.failures).toEqual([
        {
          caseName: 'Explore',
          category: 'explore',
          reason: 'transport',
          message: 'fetch failed: connect ECONNREFUSED 127.0.0.1:8080',
          transportError: 'fetch failed: connect ECONNREFUSED 127.0.0.1:8080',
        },
      ]);
    });
  });

  describe('assert mode', () => {
    it('records a thrown transport error as that case failing and continues', async () => {
      fetchMock.mockImplementationOnce(async () => {
        throw connectionRefused();
      });
      const runner = createRunner(questConfig, { fetch: fetchMock, mode: 'assert' });
      runner.on((event) => {
        events.push(event);
      });

      const summary = await runner.run();

      expect(fetchMock).toHaveBeenCalledTimes(4);
      expect(summary.total).toBe(4);
      expect(summary.passed).toBe(3);
      expect(summary.outcomes[0]).toMatchObject({
        caseName: 'FetchQuestList',
        passed: false,
        failureReason: 'transport',
        transportError: 'fetch failed: connect ECONNREFUSED 127.0.0.1:8080',
      });
      expect(summary.outcomes[0].statusCode).toBeUndefined();

      const errors = events.filter((e) => e.type === 'case_error');
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({
        caseName: 'FetchQuestList',
        category: 'normal',
        error: { code: 'TRANSPORT_ERROR' },
      });
    });

    it('reports timeouts as transport failures', async () => {
      fetchMock.mockImplementationOnce(async () => {
        const error = new Error('The operation was aborted due to timeout');
        error.name = 'TimeoutError';
        throw error;
      });

      const summary = await createRunner(questConfig, { fetch: fetchMock, mode: 'assert' }).run();

      expect(summary.failures[0]).toMatchObject({
        caseName: 'FetchQuestList',
        reason: 'transport',
        transportError: 'Request timed out after 1000ms',
      });
    });
  });

  describe('connectivity pre-check', () => {
    it('skips the run when the target is unreachable', async () => {
      fetchMock.mockRejectedValue(connectionRefused());
      const runner = createRunner(questConfig, { fetch: fetchMock, precheck: true });
      runner.on((event) => {
        events.push(event);
      });

      const summary = await runner.run();

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe(BASE_URL);
      expect(summary.status).toBe('skipped');
      expect(summary.skipReason).toBe(
        `Target unreachable: ${BASE_URL} (fetch failed: connect ECONNREFUSED 127.0.0.1:8080)`
      );
      expect(summary.total).toBe(0);
      expect(summary.outcomes).toEqual([]);
      expect(events.map((e) => e.type)).toEqual(['run_started', 'run_skipped']);
    });

    it('runs when the target answers with any status', async () => {
      fetchMock.mockImplementationOnce(async () => new Response('Not Found', { status: 404 }));

      const summary = await createRunner(questConfig, { fetch: fetchMock, precheck: true }).run();

      expect(fetchMock).toHaveBeenCalledTimes(5);
      expect(summary.status).toBe('completed');
      expect(summary.total).toBe(4);
    });
  });

  describe('events', () => {
    it('emits lifecycle events in order', async () => {
      const config = makeConfig([{ name: 'normal', cases: [makeCase('FetchQuestList')] }]);
      const runner = createRunner(config, { fetch: fetchMock });
      runner.on((event) => {
        events.push(event);
      });

      await runner.run();

      expect(events.map((e) => e.type)).toEqual([
        'run_started',
        'category_started',
        'case_started',
        'case_completed',
        'run_completed',
      ]);
      expect(events[0]).toMatchObject({ source: 'quest.yaml', baseUrl: BASE_URL, mode: 'collect', totalCases: 1 });
      expect(events[2]).toMatchObject({ caseName: 'FetchQuestList', url: `${BASE_URL}/FetchQuestList` });
      expect(events.every((e) => e.timestamp instanceof Date)).toBe(true);
    });

    it('keeps running when a handler throws', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const runner = createRunner(questConfig, { fetch: fetchMock });
      runner.on(() => {
        throw new Error('handler failed');
      });

      const summary = await runner.run();

      expect(summary.total).toBe(4);
      expect(consoleError).toHaveBeenCalledWith('Event handler error:', expect.any(Error));
    });

    it('stops delivering after unsubscribe', async () => {
      const runner = createRunner(questConfig, { fetch: fetchMock });
      const unsubscribe = runner.on((event) => {
        events.push(event);
      });
      unsubscribe();

      await runner.run();

      expect(events).toEqual([]);
    });
  });

  describe('session lifecycle', () => {
    function trackingFactory(sessions: HttpSession[], make = (config: HttpSessionConfig) => new HttpSession(config)) {
      return (config: HttpSessionConfig) => {
        const session = make(config);
        sessions.push(session);
        return session;
      };
    }

    it('closes the session after a completed run', async () => {
      const sessions: HttpSession[] = [];
      const runner = new TestRunner(questConfig, { fetch: fetchMock, sessionFactory: trackingFactory(sessions) });

      await runner.run();

      expect(sessions).toHaveLength(1);
      expect(sessions[0].isOpen).toBe(false);
      expect(runner.runState).toBe('reported');
    });

    it('closes the session after a skipped run', async () => {
      fetchMock.mockRejectedValue(connectionRefused());
      const sessions: HttpSession[] = [];
      const runner = new TestRunner(questConfig, {
        fetch: fetchMock,
        precheck: true,
        sessionFactory: trackingFactory(sessions),
      });

      await runner.run();

      expect(sessions[0].isOpen).toBe(false);
    });

    it('closes the session when the run throws', async () => {
      class ExplodingSession extends HttpSession {
        async probe(): Promise<ProbeResult> {
          throw new Error('probe exploded');
        }
      }
      const sessions: HttpSession[] = [];
      const runner = new TestRunner(questConfig, {
        fetch: fetchMock,
        precheck: true,
        sessionFactory: trackingFactory(sessions, (config) => new ExplodingSession(config)),
      });

      await expect(runner.run()).rejects.toThrow('probe exploded');
      expect(sessions[0].isOpen).toBe(false);
    });

    it('configures the session from the run config and mode', async () => {
      const configs: HttpSessionConfig[] = [];
      const runner = new TestRunner(
        makeConfig([], { timeoutMs: 2500, headers: { 'X-Trace': 'test' } }),
        {
          mode: 'assert',
          sessionFactory: (config) => {
            configs.push(config);
            return new HttpSession(config);
          },
        }
      );

      await runner.run();

      expect(configs[0]).toMatchObject({
        timeoutMs: 2500,
        headers: { 'X-Trace': 'test' },
        transportErrorPolicy: 'throw',
      });
    });

    it('runs only once', async () => {
      const runner = createRunner(questConfig, { fetch: fetchMock });
      expect(runner.runState).toBe('loaded');

      await runner.run();

      await expect(runner.run()).rejects.toMatchObject({ code: 'INTERNAL_ERROR' });
    });
  });
});
