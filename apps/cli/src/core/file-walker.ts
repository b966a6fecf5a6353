/**
 * Directory walker.
 *
 * Enumerates the regular files under a mirror root as FileEntry values.
 * The returned iterable is lazy and restartable: every iteration walks
 * the tree again, so callers always see the current directory contents.
 *
 * @module core/file-walker
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { IGNORED_ENTRIES } from '@dotsync/shared';
import type { FileEntry } from '../types/index.js';

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/** A directory under a mirror root whose listing could not be read */
export interface UnreadableDir {
  /** `/`-separated path relative to the root, `.` for the root itself */
  relativePath: string;
  error: unknown;
}

export type WalkErrorHandler = (dir: UnreadableDir) => void;

function* walk(
  dir: string,
  prefix: string,
  onError: WalkErrorHandler | undefined,
): Generator<FileEntry> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true }).sort(byName);
  } catch (err: unknown) {
    if (!onError) throw err;
    onError({ relativePath: prefix || '.', error: err });
    return;
  }

  for (const entry of entries) {
    if (prefix === '' && IGNORED_ENTRIES.includes(entry.name)) continue;

    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      yield* walk(path.join(dir, entry.name), relativePath, onError);
    } else if (entry.isFile()) {
      yield { relativePath };
    }
  }
}

/**
 * Walk every regular file under `root`, depth-first in name order.
 *
 * Symlinks and other special entries are not followed or reported.
 * A missing root, or one that is not a directory, yields nothing.
 * A directory that cannot be listed goes to `onError` and the walk
 * continues with its siblings; without a handler the error is thrown.
 */
export function walkFiles(root: string, onError?: WalkErrorHandler): Iterable<FileEntry> {
  return {
    [Symbol.iterator]: (): Iterator<FileEntry> => {
      if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
        return [][Symbol.iterator]();
      }
      return walk(root, '', onError);
    },
  };
}

/**
 * Eagerly collect the files under `root`.
 */
export function listFiles(root: string, onError?: WalkErrorHandler): FileEntry[] {
  return [...walkFiles(root, onError)];
}

/**
 * Resolve a `/`-separated relative path against a root directory.
 */
export function resolveEntry(root: string, entry: FileEntry): string {
  return path.join(root, ...entry.relativePath.split('/'));
}
