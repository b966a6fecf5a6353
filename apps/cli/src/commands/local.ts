/**
 * `dotsync local` command.
 *
 * Updates every configured local path from the repository dot-files
 * directory, optionally pulling first. A failed pull stops the run
 * before any local file is written.
 *
 * @module commands/local
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { SyncResult, VersionControl } from '../types/index.js';
import { createGitBridge, isGitRepository } from '../core/git-sync.js';
import {
  assertRepoDir,
  isSuccessfulRun,
  runLocal,
  type LocalRunResult,
} from '../core/sync-orchestrator.js';
import { RepoError, VcsError, withErrorHandler } from '../utils/errors.js';
import { loadConfiguration } from './config.js';

/** Options for the local command */
export interface LocalOptions {
  /** Pull from the remote before copying */
  pull?: boolean;
  /** Only synchronise this tracked file */
  fileName?: string;
}

/** Per-status counts of a SyncResult */
export interface SyncSummary {
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  skipped: number;
}

/**
 * Execute the local command logic.
 *
 * @param options - Command options.
 * @param vcs - Version control used for `--pull` (default: git).
 */
export async function executeLocal(
  options: LocalOptions = {},
  vcs: VersionControl = createGitBridge(),
): Promise<LocalRunResult> {
  const config = loadConfiguration();
  assertRepoDir(config.repoDotFilesDir);

  if (options.pull && !isGitRepository(config.repoDotFilesDir)) {
    throw new RepoError(`Repository location '${config.repoDotFilesDir}' is not a git repository.`);
  }

  return runLocal(config, vcs, { pull: options.pull ?? false, fileName: options.fileName });
}

/**
 * Count the entries of a SyncResult by status.
 */
export function summarizeSync(sync: SyncResult): SyncSummary {
  return {
    created: sync.copied.filter((c) => c.change === 'created').length,
    updated: sync.copied.filter((c) => c.change === 'updated').length,
    unchanged: sync.copied.filter((c) => c.change === 'unchanged').length,
    failed: sync.failed.length,
    skipped: sync.skipped.length,
  };
}

/**
 * Print one line per attempted file and a summary line.
 */
export function printSyncResult(sync: SyncResult): void {
  for (const file of sync.copied) {
    const line = ` - ${file.change.padEnd(9)} ${file.relativePath} → ${file.destination}`;
    console.log(file.change === 'unchanged' ? chalk.dim(line) : line);
  }
  for (const file of sync.skipped) {
    console.log(chalk.dim(` - skipped   ${file.relativePath} (${file.reason})`));
  }
  for (const file of sync.failed) {
    console.log(chalk.red(` - failed    ${file.relativePath} → ${file.destination}: ${file.reason}`));
  }

  const summary = summarizeSync(sync);
  const parts = [
    `${summary.created} created`,
    `${summary.updated} updated`,
    `${summary.unchanged} unchanged`,
  ];
  if (summary.skipped > 0) parts.push(`${summary.skipped} skipped`);
  if (summary.failed > 0) {
    parts.push(`${summary.failed} failed`);
    console.log(chalk.yellow(`⚠ ${parts.join(', ')}`));
  } else {
    console.log(chalk.green(`✅ ${parts.join(', ')}`));
  }
}

/**
 * Register the `local` command on the given Commander program.
 */
export function registerLocalCommand(program: Command): void {
  program
    .command('local')
    .description('Update local dot files to match the files in the repository')
    .option('--pull', 'pull changes from the remote before synchronizing')
    .option('--fileName <name>', 'only synchronize the dot file of the specified name')
    .action(withErrorHandler(async (opts: LocalOptions) => {
      const spinner = ora(opts.pull ? 'Pulling from remote...' : 'Updating local dot files...').start();

      let result: LocalRunResult;
      try {
        result = await executeLocal(opts);
      } finally {
        spinner.stop();
      }

      if (result.pull) {
        if (result.aborted) {
          throw new VcsError(result.pull);
        }
        console.log(chalk.dim(`   ${result.pull.message}`));
      }

      printSyncResult(result.sync);

      if (!isSuccessfulRun(result)) {
        process.exitCode = 1;
      }
    }));
}
