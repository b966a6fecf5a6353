#!/usr/bin/env node

/**
 * dotsync: keep dot files in sync between your home directory and a git repository.
 *
 * CLI entry point. Uses Commander.js for command parsing and routing.
 *
 * @module dotsync
 */

import { Command } from 'commander';
import { VERSION } from '@dotsync/shared';
import { registerConfigCommand } from './commands/config.js';
import { registerLocalCommand } from './commands/local.js';
import { registerRepoCommand } from './commands/repo.js';

/**
 * Create and configure the root CLI program.
 *
 * @returns The configured Commander program instance.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('dotsync')
    .description('Synchronize dot files between local directories and a git repository')
    .version(VERSION, '-V, --version')
    .option('--verbose', 'show stack traces for errors');

  registerConfigCommand(program);
  registerLocalCommand(program);
  registerRepoCommand(program);

  return program;
}

/**
 * Main entry point. Parses CLI arguments and executes the matched command.
 */
export async function main(argv?: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv ?? process.argv);
}

// Run when executed directly (not imported as a module in tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith('/index.ts') ||
    process.argv[1].endsWith('/index.js') ||
    process.argv[1].endsWith('dotsync'));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
