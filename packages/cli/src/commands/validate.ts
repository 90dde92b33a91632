/**
 * apiprobe validate - Load a configuration and summarize it without sending
 * anything
 */

import { Command } from 'commander';
import { formatError, loadConfig } from '@apiprobe/core';
import { resolveContext, startSpinner, type CommandContext } from '../context.js';
import { EXIT_CODES, exitCodeForError } from '../exit-codes.js';

/**
 * Validate a configuration and return the process exit code
 */
export async function executeValidate(
  configPath: string,
  context: CommandContext = {}
): Promise<number> {
  const io = resolveContext(context);
  const spinner = startSpinner('Validating configuration...', io);

  try {
    const config = loadConfig(configPath, { env: io.env });
    spinner.succeed('Configuration is valid');

    const { colors, write } = io;
    write('');
    write(colors.bold('Configuration'));
    write(colors.gray('─'.repeat(60)));
    write(`Source:   ${colors.cyan(config.source)}`);
    write(`Shape:    ${config.shape}`);
    write(`Base URL: ${config.baseUrl}`);
    write(`Timeout:  ${config.timeoutMs}ms`);

    const headerNames = Object.keys(config.headers);
    if (headerNames.length > 0) {
      write(`Headers:  ${headerNames.join(', ')}`);
    }

    for (const category of config.categories) {
      write('');
      write(colors.bold(`${category.label ?? category.name} (${category.cases.length})`));
      for (const testCase of category.cases) {
        const expected = testCase.expectation?.status;
        const suffix = expected !== undefined ? colors.gray(` -> ${expected}`) : '';
        write(`  ${testCase.method} ${testCase.endpoint}  ${testCase.name}${suffix}`);
      }
    }

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    spinner.fail('Configuration validation failed');
    io.error(io.colors.red(`  ✗ ${formatError(error)}`));
    return exitCodeForError(error);
  }
}

export const validateCommand = new Command('validate')
  .description('Validate a configuration file without running it')
  .argument('<config>', 'Configuration file (YAML)')
  .action(async (configPath: string) => {
    process.exit(await executeValidate(configPath));
  });
