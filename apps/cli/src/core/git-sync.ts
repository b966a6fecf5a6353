/**
 * Git bridge module.
 *
 * Runs pull, commit and push against the repository dot-files directory
 * through simple-git. Every operation resolves to a VcsOutcome and never
 * rejects, so the orchestrator decides which failures end a run.
 *
 * @module core/git-sync
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { simpleGit } from 'simple-git';
import type {
  VcsFailureKind,
  VcsOperation,
  VcsOutcome,
  VersionControl,
} from '../types/index.js';

/**
 * The subset of simple-git used by the bridge.
 * A `SimpleGit` instance satisfies it; tests pass an in-memory fake.
 */
export interface GitClient {
  pull(): Promise<{ files: string[] }>;
  push(): Promise<unknown>;
  raw(commands: string[]): Promise<string>;
  status(): Promise<{
    staged: string[];
    created: string[];
    deleted: string[];
    renamed: { to: string }[];
  }>;
  commit(message: string): Promise<{ commit: string }>;
}

/** Builds a GitClient bound to a working directory */
export type GitClientFactory = (dir: string) => GitClient;

/**
 * Create a simple-git client for `dir`.
 *
 * Sets GIT_TERMINAL_PROMPT=0 so a missing credential fails the command
 * instead of waiting on a prompt nobody sees behind the spinner.
 */
export function createGit(dir: string): GitClient {
  return simpleGit(dir).env({ ...process.env, GIT_TERMINAL_PROMPT: '0' });
}

/**
 * Whether `dir` is the root of a git working tree.
 */
export function isGitRepository(dir: string): boolean {
  return fs.existsSync(path.join(dir, '.git'));
}

const UNAVAILABLE_PATTERNS = ['spawn git enoent', 'git: not found', 'command not found', 'is not recognized'];

const CONFLICT_PATTERNS = [
  'conflict',
  'not possible to fast-forward',
  'divergent branches',
  'non-fast-forward',
  'rejected',
  'would be overwritten',
  'unmerged files',
  'fetch first',
];

const NETWORK_PATTERNS = [
  'could not resolve host',
  'could not read from remote repository',
  'unable to access',
  'connection refused',
  'connection timed out',
  'operation timed out',
  'network is unreachable',
  'failed to connect',
];

/**
 * Classify a failed git invocation.
 */
export function classifyGitFailure(err: unknown): VcsFailureKind {
  const message = (err instanceof Error ? err.message : String(err)).toLowerCase();

  if (UNAVAILABLE_PATTERNS.some((p) => message.includes(p))) {
    return 'VCS_UNAVAILABLE';
  }
  if (NETWORK_PATTERNS.some((p) => message.includes(p))) {
    return 'VCS_NETWORK';
  }
  if (CONFLICT_PATTERNS.some((p) => message.includes(p))) {
    return 'VCS_CONFLICT';
  }
  return 'VCS_FAILED';
}

function failed(operation: VcsOperation, err: unknown): VcsOutcome {
  const message = err instanceof Error ? err.message.trim() : String(err);
  return { operation, succeeded: false, message, failure: classifyGitFailure(err) };
}

/**
 * Pull the latest changes into the repository directory.
 */
export async function pullRepo(git: GitClient): Promise<VcsOutcome> {
  try {
    const result = await git.pull();
    const message =
      result.files.length === 0
        ? 'Already up to date.'
        : `Updated ${result.files.length} file(s) from remote.`;
    return { operation: 'pull', succeeded: true, message };
  } catch (err: unknown) {
    return failed('pull', err);
  }
}

/**
 * Stage everything under the repository directory and commit it.
 *
 * If nothing is staged afterwards, no commit is created and the outcome
 * carries VCS_NOTHING_TO_COMMIT.
 */
export async function commitRepo(git: GitClient, message: string): Promise<VcsOutcome> {
  try {
    await git.raw(['add', '--all', '.']);

    const status = await git.status();
    const hasStagedChanges =
      status.staged.length > 0 ||
      status.created.length > 0 ||
      status.deleted.length > 0 ||
      status.renamed.length > 0;

    if (!hasStagedChanges) {
      return {
        operation: 'commit',
        succeeded: false,
        message: 'No changes to commit',
        failure: 'VCS_NOTHING_TO_COMMIT',
      };
    }

    const result = await git.commit(message);
    const hash = result.commit ? ` (${result.commit})` : '';
    return { operation: 'commit', succeeded: true, message: `${message}${hash}` };
  } catch (err: unknown) {
    return failed('commit', err);
  }
}

/**
 * Push the current branch to its upstream.
 */
export async function pushRepo(git: GitClient): Promise<VcsOutcome> {
  try {
    await git.push();
    return { operation: 'push', succeeded: true, message: 'Pushed to remote.' };
  } catch (err: unknown) {
    return failed('push', err);
  }
}

/**
 * Build the git-backed VersionControl capability.
 *
 * @param factory - Creates the client per repository directory (default: simple-git).
 */
export function createGitBridge(factory: GitClientFactory = createGit): VersionControl {
  const withClient = async (
    operation: VcsOperation,
    repoDir: string,
    run: (git: GitClient) => Promise<VcsOutcome>,
  ): Promise<VcsOutcome> => {
    let git: GitClient;
    try {
      git = factory(repoDir);
    } catch (err: unknown) {
      return failed(operation, err);
    }
    return run(git);
  };

  return {
    pull: (repoDir) => withClient('pull', repoDir, pullRepo),
    commit: (repoDir, message) => withClient('commit', repoDir, (git) => commitRepo(git, message)),
    push: (repoDir) => withClient('push', repoDir, pushRepo),
  };
}
