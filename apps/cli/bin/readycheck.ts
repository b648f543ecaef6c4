#!/usr/bin/env tsx
/**
 * @readycheck/cli - Entry Point
 */

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { EXIT_CODES, ReadyCheckError, errorMessage } from '@readycheck/shared';
import { createCLI } from '../src/index.js';

const CLEAN_EXITS = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

async function main(): Promise<number> {
  const program = createCLI();

  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return EXIT_CODES.usage;
  }

  await program.parseAsync(process.argv);
  return typeof process.exitCode === 'number' ? process.exitCode : EXIT_CODES.success;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof CommanderError) {
      // commander already printed its message
      process.exit(CLEAN_EXITS.has(err.code) ? EXIT_CODES.success : EXIT_CODES.usage);
    }

    if (err instanceof ReadyCheckError) {
      console.error(chalk.red(`Error: ${err.message}`));
      process.exit(err.exitCode);
    }

    console.error(chalk.red('Fatal:'), errorMessage(err));
    process.exit(EXIT_CODES.failure);
  });
