/**
 * Custom error classes for dotsync.
 *
 * Each error class provides:
 * - A user-friendly message with suggested fix.
 * - An error code for programmatic handling.
 * - Stack traces only shown with `--verbose` or `DEBUG=*`.
 *
 * @module utils/errors
 */

import type { VcsFailureKind, VcsOutcome } from '../types/index.js';

/** Base class for all dotsync errors with user-friendly messaging. */
export class DotSyncError extends Error {
  /** Machine-readable error code (e.g. 'CONFIG_MISSING'). */
  readonly code: string;

  /** Suggested fix for the user. */
  readonly suggestion: string;

  constructor(message: string, code: string, suggestion: string) {
    super(message);
    this.name = 'DotSyncError';
    this.code = code;
    this.suggestion = suggestion;
  }

  /** Format a user-friendly error message (no stack trace). */
  toFriendlyString(): string {
    const lines: string[] = [];
    lines.push(`Error: ${this.message}`);
    if (this.suggestion) {
      lines.push('');
      lines.push(`  Suggested fix: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/** No settings file has been written yet. */
export class ConfigMissingError extends DotSyncError {
  constructor(message: string, suggestion?: string) {
    super(
      message,
      'CONFIG_MISSING',
      suggestion ?? 'Run `dotsync config --localPaths <path>` to create the configuration.',
    );
    this.name = 'ConfigMissingError';
  }
}

/** The settings file exists but cannot be parsed into the expected keys. */
export class ConfigCorruptError extends DotSyncError {
  constructor(message: string, suggestion?: string) {
    super(
      message,
      'CONFIG_CORRUPT',
      suggestion ?? 'Fix or delete dotsync.json, then run `dotsync config` again.',
    );
    this.name = 'ConfigCorruptError';
  }
}

/** Configuration values that are present but unusable. */
export class ConfigError extends DotSyncError {
  constructor(message: string, suggestion?: string) {
    super(
      message,
      'CONFIG_INVALID',
      suggestion ?? 'Check the current settings with `dotsync config --list`.',
    );
    this.name = 'ConfigError';
  }
}

/** The repository dot-files directory is missing or not under git. */
export class RepoError extends DotSyncError {
  constructor(message: string, suggestion?: string) {
    super(
      message,
      'REPO_INVALID',
      suggestion ?? 'Clone your dot-files repository into the DotFiles directory.',
    );
    this.name = 'RepoError';
  }
}

/** File synchronisation could not start or complete. */
export class SyncError extends DotSyncError {
  constructor(message: string, suggestion?: string) {
    super(
      message,
      'SYNC_FAILED',
      suggestion ?? 'Run `dotsync config --list` and check that every path exists.',
    );
    this.name = 'SyncError';
  }
}

const VCS_SUGGESTIONS: Record<VcsFailureKind, string> = {
  VCS_UNAVAILABLE: 'Install git and make sure it is on your PATH.',
  VCS_CONFLICT:
    'Resolve the repository state by hand (cd DotFiles && git status), then run the command again.',
  VCS_NETWORK: 'Check your network connection and the remote URL (git remote -v).',
  VCS_NOTHING_TO_COMMIT: 'Nothing to do: the repository already matches your local files.',
  VCS_FAILED: 'Run the git command by hand inside DotFiles to see the full output.',
};

/** A git pull, commit or push that did not succeed. */
export class VcsError extends DotSyncError {
  readonly operation: VcsOutcome['operation'];

  constructor(outcome: VcsOutcome) {
    const kind = outcome.failure ?? 'VCS_FAILED';
    super(`git ${outcome.operation} failed: ${outcome.message}`, kind, VCS_SUGGESTIONS[kind]);
    this.name = 'VcsError';
    this.operation = outcome.operation;
  }
}

/**
 * Determine whether verbose/debug output should be shown.
 *
 * Returns `true` if `--verbose` was passed or `DEBUG` env is set.
 */
export function isVerbose(): boolean {
  return process.argv.includes('--verbose') || !!process.env['DEBUG'];
}

/**
 * Map common raw errors to dotsync error classes.
 *
 * @param err - The raw thrown value.
 * @returns A DotSyncError (or the original if already one).
 */
export function classifyError(err: unknown): DotSyncError {
  if (err instanceof DotSyncError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  const lowerMsg = message.toLowerCase();

  if (lowerMsg.includes('eacces') || lowerMsg.includes('eperm')) {
    return new SyncError(
      'Permission denied.',
      'Check the permissions of the local paths and the DotFiles directory.',
    );
  }

  if (lowerMsg.includes('enospc') || lowerMsg.includes('no space')) {
    return new SyncError('Disk is full, cannot write files.', 'Free up disk space and try again.');
  }

  if (lowerMsg.includes('unexpected token') && lowerMsg.includes('json')) {
    return new ConfigCorruptError(message);
  }

  if (
    lowerMsg.includes('git') ||
    lowerMsg.includes('remote') ||
    lowerMsg.includes('repository')
  ) {
    return new RepoError(
      message,
      'Ensure git is installed and DotFiles is a git repository.\n' +
        '  Try: cd DotFiles && git status',
    );
  }

  return new DotSyncError(
    message,
    'UNKNOWN_ERROR',
    'If this persists, run with --verbose for more details.',
  );
}

/**
 * Format an error for user-facing output.
 *
 * In normal mode: shows only the friendly message + suggestion.
 * In verbose mode: also shows the full stack trace.
 */
export function formatError(err: unknown): string {
  const dotErr = classifyError(err);
  const lines: string[] = [];

  lines.push(dotErr.toFriendlyString());

  const stack = err instanceof Error ? err.stack : dotErr.stack;
  if (isVerbose() && stack) {
    lines.push('');
    lines.push('Stack trace:');
    lines.push(stack);
  }

  return lines.join('\n');
}

/**
 * Wrap a command handler with user-friendly error handling.
 *
 * Catches any thrown error, classifies it, and prints a friendly message.
 * Sets `process.exitCode = 1` on failure.
 *
 * @param fn - The async command handler function.
 * @returns A wrapped function safe for use as a Commander action.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      console.error(formatError(err));
      process.exitCode = 1;
    }
  };
}
