/**
 * apiprobe run - Execute every case of a configuration
 *
 * Usage:
 *   apiprobe run config.yaml                      # Run, report to the console
 *   apiprobe run config.yaml --mode assert        # Transport failures raise per case
 *   apiprobe run config.yaml --log results.txt    # Append a result log
 *   apiprobe run config.yaml --precheck           # Skip the run if the target is down
 */

import { Command } from 'commander';
import {
  Errors,
  formatError,
  loadConfig,
  type ConfigOverrides,
  type RunConfig,
} from '@apiprobe/core';
import {
  ConsoleReporter,
  ResultLogWriter,
  createRunner,
  writeJsonSummary,
  type ExecutionMode,
} from '@apiprobe/runner';
import { resolveContext, startSpinner, type CommandContext } from '../context.js';
import { exitCodeForError, exitCodeForSummary } from '../exit-codes.js';

export interface RunCommandOptions {
  mode?: string;
  log?: string;
  json?: string;
  precheck?: boolean;
  timeout?: string;
  baseUrl?: string;
  verbose?: boolean;
}

const MODES: readonly ExecutionMode[] = ['collect', 'assert'];

function isExecutionMode(value: string): value is ExecutionMode {
  return MODES.some((mode) => mode === value);
}

/**
 * Validate the `--mode` flag
 */
export function parseMode(value: string | undefined): ExecutionMode {
  if (value === undefined) {
    return 'collect';
  }
  if (!isExecutionMode(value)) {
    throw Errors.configInvalid(`Unknown mode '${value}', expected one of: ${MODES.join(', ')}`);
  }
  return value;
}

/**
 * Overrides taken from command-line flags
 */
export function toOverrides(options: Pick<RunCommandOptions, 'timeout' | 'baseUrl'>): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (options.baseUrl !== undefined) {
    overrides.baseUrl = options.baseUrl;
  }

  if (options.timeout !== undefined) {
    const timeoutMs = Number(options.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw Errors.configInvalid(`--timeout must be a positive integer, got '${options.timeout}'`);
    }
    overrides.timeoutMs = timeoutMs;
  }

  return overrides;
}

function countCases(config: RunConfig): number {
  return config.categories.reduce((sum, category) => sum + category.cases.length, 0);
}

/**
 * Run a configuration and return the process exit code
 */
export async function executeRun(
  configPath: string,
  options: RunCommandOptions = {},
  context: CommandContext = {}
): Promise<number> {
  const io = resolveContext(context);
  const spinner = startSpinner('Loading configuration...', io);

  let config: RunConfig;
  let mode: ExecutionMode;
  let logWriter: ResultLogWriter | undefined;
  try {
    mode = parseMode(options.mode);
    config = loadConfig(configPath, { overrides: toOverrides(options), env: io.env });
    if (options.log) {
      logWriter = new ResultLogWriter(options.log);
      await logWriter.open();
    }
  } catch (error) {
    spinner.fail('Failed to load configuration');
    io.error(io.colors.red(formatError(error)));
    return exitCodeForError(error);
  }
  spinner.succeed(`Loaded ${countCases(config)} cases from ${configPath}`);

  const runner = createRunner(config, {
    mode,
    precheck: options.precheck ?? false,
    fetch: io.fetch,
  });

  new ConsoleReporter({
    write: io.write,
    colors: io.colors,
    verbose: options.verbose ?? false,
  }).attach(runner);

  logWriter?.attach(runner);

  try {
    const summary = await runner.run();

    if (options.json) {
      await writeJsonSummary(options.json, summary);
      io.write(io.colors.gray(`Summary written to ${options.json}`));
    }

    return exitCodeForSummary(summary);
  } catch (error) {
    io.error(io.colors.red(formatError(error)));
    return exitCodeForError(error);
  }
}

export const runCommand = new Command('run')
  .description('Run every case of a configuration file')
  .argument('<config>', 'Configuration file (YAML)')
  .option('-m, --mode <mode>', 'Execution mode: collect or assert', 'collect')
  .option('-l, --log <file>', 'Append a result block per case to this file')
  .option('-j, --json <file>', 'Write a JSON summary to this file')
  .option('--precheck', 'Check the target is reachable before running', false)
  .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds')
  .option('-b, --base-url <url>', 'Override the configured base URL')
  .option('-v, --verbose', 'Print descriptions and response previews', false)
  .action(async (configPath: string, options: RunCommandOptions) => {
    process.exit(await executeRun(configPath, options));
  });
