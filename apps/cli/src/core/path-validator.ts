/**
 * Path validation module.
 *
 * Canonicalises user-supplied paths (local target paths, repo dir) and
 * checks that they can serve as a mirror root.
 *
 * @module core/path-validator
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ENV_VARS } from '@dotsync/shared';
import { ConfigError } from '../utils/errors.js';

/**
 * Home directory used for `~` expansion.
 * Uses DOTSYNC_HOME for testing, otherwise the OS home directory.
 */
export function getHomeDir(): string {
  return process.env[ENV_VARS.HOME] ?? os.homedir();
}

/**
 * Canonicalise a path string.
 *
 * Resolves `~` to the home directory, normalises `.` and `..` segments,
 * and returns an absolute path. Does NOT follow symlinks.
 *
 * @param p - The path to canonicalise (may contain `~`).
 * @param base - Directory that relative paths resolve against.
 */
export function canonicalize(p: string, base: string = process.cwd()): string {
  if (!p || p.trim().length === 0) {
    throw new ConfigError('Path cannot be empty.');
  }

  let resolved = p.trim();

  const homeDir = getHomeDir();
  if (resolved === '~') {
    resolved = homeDir;
  } else if (resolved.startsWith('~/')) {
    resolved = path.join(homeDir, resolved.slice(2));
  }

  return path.resolve(base, resolved);
}

/**
 * Validate that a path can be used as a mirror root.
 *
 * The path must either not exist yet (it is created on first copy) or
 * be a directory. Symlinks are followed for this check.
 *
 * @returns The canonicalised absolute path.
 * @throws ConfigError if the path exists and is not a directory.
 */
export function validateTargetPath(p: string, base?: string): string {
  const resolved = canonicalize(p, base);

  if (fs.existsSync(resolved) && !fs.statSync(resolved).isDirectory()) {
    throw new ConfigError(
      `Provided location '${resolved}' is not a directory.`,
      'Point dotsync at the directory that contains your dot files.',
    );
  }

  return resolved;
}

/**
 * Split a comma-separated path list, dropping blanks.
 */
export function splitPathList(list: string): string[] {
  return list
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}
