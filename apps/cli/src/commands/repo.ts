/**
 * `dotsync repo` command.
 *
 * Copies the configured local paths into the repository dot-files
 * directory (later paths win), commits the result and, with `--push`,
 * pushes it. `--commitOnly` suppresses the push even when `--push` is
 * given.
 *
 * @module commands/repo
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { VersionControl } from '../types/index.js';
import { createGitBridge, isGitRepository } from '../core/git-sync.js';
import {
  assertRepoDir,
  isSuccessfulRun,
  runRepo,
  type RepoRunResult,
} from '../core/sync-orchestrator.js';
import { RepoError, VcsError, withErrorHandler } from '../utils/errors.js';
import { loadConfiguration } from './config.js';
import { printSyncResult } from './local.js';

/** Options for the repo command */
export interface RepoOptions {
  /** Push after committing */
  push?: boolean;
  /** Commit but never push */
  commitOnly?: boolean;
  /** Only synchronise this tracked file */
  fileName?: string;
}

/**
 * Execute the repo command logic.
 *
 * @param options - Command options.
 * @param vcs - Version control used to commit and push (default: git).
 */
export async function executeRepo(
  options: RepoOptions = {},
  vcs: VersionControl = createGitBridge(),
): Promise<RepoRunResult> {
  const config = loadConfiguration();
  assertRepoDir(config.repoDotFilesDir);

  if (!isGitRepository(config.repoDotFilesDir)) {
    throw new RepoError(`Repository location '${config.repoDotFilesDir}' is not a git repository.`);
  }

  return runRepo(config, vcs, {
    push: options.push ?? false,
    commitOnly: options.commitOnly ?? false,
    fileName: options.fileName,
  });
}

/**
 * Register the `repo` command on the given Commander program.
 */
export function registerRepoCommand(program: Command): void {
  program
    .command('repo')
    .description('Update repository files to match the local dot files, then commit')
    .option('--push', 'push changes to the remote after committing')
    .option('--commitOnly', 'commit without pushing (overrides --push)')
    .option('--fileName <name>', 'only synchronize the dot file of the specified name')
    .action(withErrorHandler(async (opts: RepoOptions) => {
      const spinner = ora('Updating repository...').start();

      let result: RepoRunResult;
      try {
        result = await executeRepo(opts);
      } finally {
        spinner.stop();
      }

      printSyncResult(result.sync);

      switch (result.state) {
        case 'no-op':
          console.log(chalk.dim('   No tracked files were copied, nothing to commit'));
          break;
        case 'files-copied':
          console.log(chalk.dim(`   ${result.commit?.message ?? 'No changes to commit'}`));
          break;
        case 'committed':
          console.log(chalk.green(`✅ Committed: ${result.commit?.message ?? ''}`));
          if (opts.push && opts.commitOnly) {
            console.log(chalk.yellow('⚠ --commitOnly given, push skipped'));
          }
          break;
        case 'pushed':
          console.log(chalk.green(`✅ Committed: ${result.commit?.message ?? ''}`));
          console.log(chalk.green('✅ Pushed to remote'));
          break;
        case 'failed': {
          const failedStep = result.push ?? result.commit;
          if (failedStep) {
            throw new VcsError(failedStep);
          }
          break;
        }
      }

      if (!isSuccessfulRun(result)) {
        process.exitCode = 1;
      }
    }));
}
