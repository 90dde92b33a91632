/**
 * apiprobe check - Connectivity check against a configuration's base URL
 */

import { Command } from 'commander';
import { DEFAULT_TIMEOUTS, formatError, loadConfig } from '@apiprobe/core';
import { assertReachable, checkConnectivity } from '@apiprobe/runner';
import { resolveContext, startSpinner, type CommandContext } from '../context.js';
import { EXIT_CODES, exitCodeForError } from '../exit-codes.js';
import { toOverrides } from './run.js';

export interface CheckCommandOptions {
  timeout?: string;
  baseUrl?: string;
}

/**
 * Probe the target and return the process exit code
 */
export async function executeCheck(
  configPath: string,
  options: CheckCommandOptions = {},
  context: CommandContext = {}
): Promise<number> {
  const io = resolveContext(context);
  const spinner = startSpinner('Checking connectivity...', io);

  try {
    const overrides = toOverrides(options);
    const config = loadConfig(configPath, { env: io.env, overrides: { baseUrl: overrides.baseUrl } });

    const probe = await checkConnectivity(config, {
      timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUTS.CONNECTIVITY_CHECK,
      fetch: io.fetch,
    });
    assertReachable(probe);

    spinner.succeed(`${probe.url} is reachable`);
    io.write(`Status: ${probe.statusCode ?? 'N/A'}`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    spinner.fail('Connectivity check failed');
    io.error(io.colors.red(formatError(error)));
    return exitCodeForError(error);
  }
}

export const checkCommand = new Command('check')
  .description('Check that the configured base URL answers')
  .argument('<config>', 'Configuration file (YAML)')
  .option('-t, --timeout <ms>', 'Probe timeout in milliseconds')
  .option('-b, --base-url <url>', 'Override the configured base URL')
  .action(async (configPath: string, options: CheckCommandOptions) => {
    process.exit(await executeCheck(configPath, options));
  });
