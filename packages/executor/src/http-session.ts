/**
 * HTTP Session
 *
 * Sends prepared requests over one keep-alive connection pool for the
 * lifetime of a run. One attempt per request, no retries. What happens on a
 * transport failure is decided by the caller through
 * `transportErrorPolicy`.
 */

import {
  Errors,
  HarnessError,
  describeTransportFailure,
  type RequestResult,
} from '@apiprobe/core';
import { encodeBody } from './request-builder.js';
import type {
  FetchLike,
  HttpSessionConfig,
  PreparedRequest,
  ProbeResult,
  TransportErrorPolicy,
} from './types.js';
import { DEFAULT_SESSION_CONFIG } from './types.js';

type ParsedBody = { ok: true; value: unknown } | { ok: false };

/**
 * Parse a response body as JSON. Empty or non-JSON bodies are not an error:
 * negative-path cases routinely get plain-text error pages back.
 */
export function parseJsonBody(text: string): ParsedBody {
  if (text.trim() === '') {
    return { ok: false };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'TimeoutError'
  );
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

/**
 * HttpSession class
 */
export class HttpSession {
  private readonly timeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly policy: TransportErrorPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private closed = false;

  constructor(config: HttpSessionConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SESSION_CONFIG.timeoutMs;
    this.headers = { ...DEFAULT_SESSION_CONFIG.headers, ...config.headers };
    this.policy = config.transportErrorPolicy ?? DEFAULT_SESSION_CONFIG.transportErrorPolicy;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
    this.now = config.now ?? (() => performance.now());
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  get transportErrorPolicy(): TransportErrorPolicy {
    return this.policy;
  }

  /**
   * Send a request and capture status, timing and body
   */
  async send(request: PreparedRequest): Promise<RequestResult> {
    this.assertOpen();

    const wire = request.body ? encodeBody(request.body) : undefined;
    const headers: Record<string, string> = { ...this.headers };
    if (wire && !hasHeader(headers, 'content-type')) {
      headers['Content-Type'] = wire.contentType;
    }

    const base = {
      url: request.url,
      method: request.method,
      sentBody: request.body,
    };

    const startedAt = this.now();

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers,
        body: wire?.text,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const responseText = await response.text();
      const elapsedSeconds = (this.now() - startedAt) / 1000;

      const parsed = parseJsonBody(responseText);
      return Object.freeze({
        ...base,
        statusCode: response.status,
        elapsedSeconds,
        responseText,
        ...(parsed.ok ? { responseParsed: parsed.value } : {}),
      });
    } catch (error) {
      const failure = this.toTransportError(request.url, error);

      if (this.policy === 'throw') {
        throw failure;
      }

      return Object.freeze({
        ...base,
        transportError: failure.message,
      });
    }
  }

  /**
   * GET a URL and report whether anything answered
   */
  async probe(url: string, timeoutMs: number): Promise<ProbeResult> {
    this.assertOpen();

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { ...this.headers },
        signal: AbortSignal.timeout(timeoutMs),
      });
      await response.text();
      return { url, reachable: true, statusCode: response.status };
    } catch (error) {
      const message = isTimeout(error)
        ? `Request timed out after ${timeoutMs}ms`
        : describeTransportFailure(error);
      return { url, reachable: false, error: message };
    }
  }

  /**
   * Close the session. Further sends are refused.
   */
  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw Errors.sessionClosed();
    }
  }

  private toTransportError(url: string, error: unknown): HarnessError {
    const cause = error instanceof Error ? error : undefined;
    if (isTimeout(error)) {
      return Errors.timeout(url, this.timeoutMs, cause);
    }
    return Errors.transport(url, describeTransportFailure(error), cause);
  }
}

/**
 * Create a new HTTP session
 */
export function createHttpSession(config?: HttpSessionConfig): HttpSession {
  return new HttpSession(config);
}
