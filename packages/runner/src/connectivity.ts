/**
 * Connectivity check against the target base URL.
 * Any HTTP response, whatever its status, counts as reachable.
 */

import { DEFAULT_TIMEOUTS, Errors, type RunConfig } from '@apiprobe/core';
import {
  createHttpSession,
  type FetchLike,
  type HttpSession,
  type ProbeResult,
} from '@apiprobe/executor';

export interface ConnectivityOptions {
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Probe a URL over an open session
 */
export async function probeTarget(
  session: HttpSession,
  url: string,
  timeoutMs: number = DEFAULT_TIMEOUTS.CONNECTIVITY_CHECK
): Promise<ProbeResult> {
  return session.probe(url, timeoutMs);
}

/**
 * Probe a configuration's base URL over a short-lived session
 */
export async function checkConnectivity(
  config: RunConfig,
  options: ConnectivityOptions = {}
): Promise<ProbeResult> {
  const session = createHttpSession({
    headers: config.headers,
    fetch: options.fetch,
  });

  try {
    return await probeTarget(session, config.baseUrl, options.timeoutMs);
  } finally {
    session.close();
  }
}

/**
 * Throw TARGET_UNREACHABLE for a failed probe
 */
export function assertReachable(probe: ProbeResult): void {
  if (!probe.reachable) {
    throw Errors.targetUnreachable(probe.url, probe.error ?? 'no response');
  }
}
