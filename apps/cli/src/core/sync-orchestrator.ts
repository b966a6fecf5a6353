/**
 * Sync orchestrator.
 *
 * Composes the file mirror and the version-control bridge for the two
 * sync directions:
 *
 *   local: [pull] → copy repo dir → every local path
 *   repo:  copy each local path → repo dir → commit → [push]
 *
 * The set of files that take part is always the set tracked in the repo
 * dot-files directory. Both runs take an explicit Configuration and an
 * injected VersionControl; nothing is read from global state.
 *
 * @module core/sync-orchestrator
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { COMMIT_PREFIX } from '@dotsync/shared';
import type {
  Configuration,
  CopiedFile,
  FileEntry,
  RepoRunState,
  SyncResult,
  VcsOutcome,
  VersionControl,
} from '../types/index.js';
import { RepoError, SyncError } from '../utils/errors.js';
import { copyAll, emptyResult, mergeResults, unreadableFailures } from './file-mirror.js';
import { listFiles, type UnreadableDir, type WalkErrorHandler } from './file-walker.js';
import { assertSyncReady } from './settings-store.js';

/** Options for runLocal() */
export interface LocalRunOptions {
  /** Pull the repository before copying */
  pull: boolean;
  /** Only synchronise this tracked file (relative to the repo dir) */
  fileName?: string;
}

/** Result of a `local` run */
export interface LocalRunResult {
  /** Outcome of the pull, or `null` if none was requested */
  pull: VcsOutcome | null;
  sync: SyncResult;
  /** `true` when a failed pull stopped the run before any copy */
  aborted: boolean;
}

/** Options for runRepo() */
export interface RepoRunOptions {
  /** Push after a successful commit */
  push: boolean;
  /** Never push, even with `push` set */
  commitOnly: boolean;
  /** Only synchronise this tracked file (relative to the repo dir) */
  fileName?: string;
}

/** Result of a `repo` run */
export interface RepoRunResult {
  state: RepoRunState;
  sync: SyncResult;
  commit: VcsOutcome | null;
  push: VcsOutcome | null;
}

/**
 * Ensure the repository dot-files directory exists.
 *
 * @throws RepoError if it is missing or not a directory.
 */
export function assertRepoDir(repoDir: string): void {
  if (!fs.existsSync(repoDir)) {
    throw new RepoError(`Repository location '${repoDir}' does not exist.`);
  }
  if (!fs.statSync(repoDir).isDirectory()) {
    throw new RepoError(`Repository location '${repoDir}' is not a directory.`);
  }
}

/**
 * List the tracked files, optionally narrowed to one name.
 *
 * Directories of the repo dir that cannot be listed go to `onError`.
 *
 * @throws SyncError if `fileName` does not name a tracked file.
 */
export function selectEntries(
  repoDir: string,
  fileName?: string,
  onError?: WalkErrorHandler,
): FileEntry[] {
  const tracked = listFiles(repoDir, onError);
  if (fileName === undefined) {
    return tracked;
  }

  const wanted = path.posix.normalize(fileName.replace(/\\/g, '/'));
  const match = tracked.find((entry) => entry.relativePath === wanted);
  if (!match) {
    throw new SyncError(
      `No stored file matches the name '${fileName}'.`,
      'Names are relative to the DotFiles directory, e.g. `.bashrc` or `.config/git/config`.',
    );
  }
  return [match];
}

/**
 * Commit message naming the files whose content changed.
 */
export function buildCommitMessage(copied: readonly CopiedFile[]): string {
  const changed = [
    ...new Set(copied.filter((c) => c.change !== 'unchanged').map((c) => c.relativePath)),
  ].sort();

  if (changed.length === 0) {
    return `${COMMIT_PREFIX} update dot files`;
  }
  return `${COMMIT_PREFIX} update ${changed.map((name) => `'${name}'`).join(', ')}`;
}

/** Tracked entries plus the repo directories that could not be listed */
interface TrackedFiles {
  entries: FileEntry[];
  unreadable: UnreadableDir[];
}

function listTracked(repoDir: string, fileName?: string): TrackedFiles {
  const unreadable: UnreadableDir[] = [];
  const entries = selectEntries(repoDir, fileName, (dir) => unreadable.push(dir));
  return { entries, unreadable };
}

/**
 * Record tracked entries that no local path could supply.
 */
function markMissingEverywhere(
  result: SyncResult,
  entries: readonly FileEntry[],
  config: Configuration,
): SyncResult {
  const supplied = new Set([
    ...result.copied.map((c) => c.relativePath),
    ...result.failed.map((f) => f.relativePath),
  ]);

  const missing = entries
    .filter((entry) => !supplied.has(entry.relativePath))
    .map((entry) => ({
      relativePath: entry.relativePath,
      source: config.localTargetPaths.join(', '),
      destination: config.repoDotFilesDir,
      kind: 'FILE_UNREADABLE' as const,
      reason: 'not found in any local path',
    }));

  return { ...result, failed: [...result.failed, ...missing] };
}

/**
 * Update the local paths from the repository.
 *
 * `fileName` is checked before anything else happens. With `pull`, a
 * failed pull aborts the run before any local file is touched.
 */
export async function runLocal(
  config: Configuration,
  vcs: VersionControl,
  options: LocalRunOptions,
): Promise<LocalRunResult> {
  assertSyncReady(config);
  assertRepoDir(config.repoDotFilesDir);

  let tracked = listTracked(config.repoDotFilesDir, options.fileName);

  let pull: VcsOutcome | null = null;
  if (options.pull) {
    pull = await vcs.pull(config.repoDotFilesDir);
    if (!pull.succeeded) {
      return { pull, sync: emptyResult(), aborted: true };
    }
    // the pull may have changed the tree
    tracked = listTracked(config.repoDotFilesDir, options.fileName);
  }

  const copied = copyAll(config.repoDotFilesDir, config.localTargetPaths, {
    entries: tracked.entries,
  });
  const sync: SyncResult = {
    ...copied,
    failed: [
      ...unreadableFailures(tracked.unreadable, config.repoDotFilesDir, config.localTargetPaths),
      ...copied.failed,
    ],
  };

  return { pull, sync, aborted: false };
}

/**
 * Update the repository from the local paths, then commit and maybe push.
 *
 * Local paths are copied in configured order, so when several hold the
 * same file the last one wins. `commitOnly` takes precedence over `push`.
 */
export async function runRepo(
  config: Configuration,
  vcs: VersionControl,
  options: RepoRunOptions,
): Promise<RepoRunResult> {
  assertSyncReady(config);
  assertRepoDir(config.repoDotFilesDir);

  const { entries, unreadable } = listTracked(config.repoDotFilesDir, options.fileName);
  const repoFailures = unreadableFailures(unreadable, config.repoDotFilesDir, [config.repoDotFilesDir]);
  const copied = mergeResults(
    { ...emptyResult(), failed: repoFailures },
    ...config.localTargetPaths.map((localPath) =>
      copyAll(localPath, [config.repoDotFilesDir], { entries, lineEnding: config.lineEnding }),
    ),
  );
  const sync = markMissingEverywhere(copied, entries, config);

  if (sync.copied.length === 0) {
    return { state: 'no-op', sync, commit: null, push: null };
  }

  const commit = await vcs.commit(config.repoDotFilesDir, buildCommitMessage(sync.copied));
  if (!commit.succeeded) {
    const state = commit.failure === 'VCS_NOTHING_TO_COMMIT' ? 'files-copied' : 'failed';
    return { state, sync, commit, push: null };
  }

  if (!options.push || options.commitOnly) {
    return { state: 'committed', sync, commit, push: null };
  }

  const push = await vcs.push(config.repoDotFilesDir);
  return { state: push.succeeded ? 'pushed' : 'failed', sync, commit, push };
}

/**
 * Whether a run ended without any failure.
 */
export function isSuccessfulRun(result: LocalRunResult | RepoRunResult): boolean {
  if (result.sync.failed.length > 0) {
    return false;
  }
  if ('aborted' in result) {
    return !result.aborted;
  }
  return result.state !== 'failed';
}
