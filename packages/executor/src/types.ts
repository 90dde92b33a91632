/**
 * Executor Types
 *
 * Types for request construction and the HTTP session.
 */

import type { HttpMethod, RequestBody } from '@apiprobe/core';
import { DEFAULT_TIMEOUTS } from '@apiprobe/core';

/**
 * What the session does when an exchange fails at the transport level
 *
 * - `record`: return a result carrying `transportError`
 * - `throw`: throw a `HarnessError` (`TRANSPORT_ERROR` or `TIMEOUT`)
 */
export type TransportErrorPolicy = 'record' | 'throw';

/**
 * The subset of `fetch` the session uses
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * A request ready to send
 */
export interface PreparedRequest {
  /** Absolute URL */
  url: string;
  method: HttpMethod;
  /** Absent for requests without a body */
  body?: RequestBody;
}

/**
 * Body encoded for the wire
 */
export interface WireBody {
  contentType: string;
  text: string;
}

/**
 * HTTP session configuration
 */
export interface HttpSessionConfig {
  /** Per-request timeout in ms */
  timeoutMs?: number;
  /** Headers applied to every request */
  headers?: Readonly<Record<string, string>>;
  /** Transport failure handling */
  transportErrorPolicy?: TransportErrorPolicy;
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: FetchLike;
  /** Monotonic clock in ms, used for elapsed time */
  now?: () => number;
}

/**
 * Default session configuration
 */
export const DEFAULT_SESSION_CONFIG: Required<
  Pick<HttpSessionConfig, 'timeoutMs' | 'headers' | 'transportErrorPolicy'>
> = {
  timeoutMs: DEFAULT_TIMEOUTS.HTTP_REQUEST,
  headers: {},
  transportErrorPolicy: 'record',
};

/**
 * Outcome of a reachability probe
 */
export interface ProbeResult {
  url: string;
  /** Any HTTP response counts as reachable */
  reachable: boolean;
  statusCode?: number;
  error?: string;
}
