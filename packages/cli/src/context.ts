/**
 * Output and transport seams shared by the commands
 */

import chalk, { type ChalkInstance } from 'chalk';
import ora, { type Ora } from 'ora';
import type { FetchLike } from '@apiprobe/executor';

export interface CommandContext {
  /** Standard output line sink */
  write?: (line: string) => void;
  /** Standard error line sink */
  error?: (line: string) => void;
  colors?: ChalkInstance;
  /** Fetch implementation for every request the command sends */
  fetch?: FetchLike;
  /** Environment for `APIPROBE_*` overrides */
  env?: Record<string, string | undefined>;
  /** Suppress spinners */
  quiet?: boolean;
}

export interface ResolvedContext {
  write: (line: string) => void;
  error: (line: string) => void;
  colors: ChalkInstance;
  fetch?: FetchLike;
  env: Record<string, string | undefined>;
  quiet: boolean;
}

export function resolveContext(context: CommandContext = {}): ResolvedContext {
  return {
    write: context.write ?? ((line) => console.log(line)),
    error: context.error ?? ((line) => console.error(line)),
    colors: context.colors ?? chalk,
    fetch: context.fetch,
    env: context.env ?? process.env,
    quiet: context.quiet ?? false,
  };
}

/**
 * Start a spinner, silent when the context is quiet
 */
export function startSpinner(text: string, context: ResolvedContext): Ora {
  return ora({ text, isSilent: context.quiet }).start();
}
