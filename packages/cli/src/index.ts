#!/usr/bin/env node
/**
 * apiprobe CLI
 *
 * Run configuration-driven HTTP API test cases
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { runCommand } from './commands/run.js';
import { validateCommand } from './commands/validate.js';
import { checkCommand } from './commands/check.js';
import { EXIT_CODES } from './exit-codes.js';

// Load environment variables
config();

process.on('SIGINT', () => {
  console.error('\nInterrupted');
  process.exit(EXIT_CODES.INTERRUPTED);
});

const program = new Command();

program
  .name('apiprobe')
  .description('Run configuration-driven HTTP API test cases')
  .version('0.1.0');

// Register commands
program.addCommand(runCommand);
program.addCommand(validateCommand);
program.addCommand(checkCommand);

await program.parseAsync(process.argv);
