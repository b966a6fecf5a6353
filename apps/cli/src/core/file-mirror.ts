/**
 * File mirror module.
 *
 * One-directional, overwrite-based copy of a file set from a source root
 * into one or more destination roots. Every file is attempted; a file
 * that cannot be read or written is recorded in the result and the batch
 * carries on.
 *
 * @module core/file-mirror
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LineEnding } from '@dotsync/shared';
import type {
  FailedFile,
  FileChange,
  FileEntry,
  FileFailureKind,
  SyncResult,
} from '../types/index.js';
import { listFiles, resolveEntry, type UnreadableDir } from './file-walker.js';

/** Options for copyAll() */
export interface CopyOptions {
  /**
   * Copy exactly these entries instead of walking the source. Entries the
   * source does not have are reported in `skipped`.
   */
  entries?: readonly FileEntry[];
  /** Line-ending normalisation applied to the written content */
  lineEnding?: LineEnding;
}

/** A SyncResult with nothing in it. */
export function emptyResult(): SyncResult {
  return { copied: [], failed: [], skipped: [] };
}

/**
 * Concatenate several results, preserving order.
 */
export function mergeResults(...results: SyncResult[]): SyncResult {
  return results.reduce<SyncResult>(
    (acc, r) => ({
      copied: [...acc.copied, ...r.copied],
      failed: [...acc.failed, ...r.failed],
      skipped: [...acc.skipped, ...r.skipped],
    }),
    emptyResult(),
  );
}

/**
 * Normalise line endings byte-for-byte.
 *
 * `lf` turns CRLF into LF; `crlf` turns every bare LF into CRLF.
 */
export function normalizeLineEndings(content: Buffer, lineEnding: LineEnding): Buffer {
  if (lineEnding === 'none') {
    return content;
  }

  // latin1 maps each byte to one code unit, so binary content survives
  const text = content.toString('latin1');
  const normalized =
    lineEnding === 'lf' ? text.replace(/\r\n/g, '\n') : text.replace(/\r?\n/g, '\r\n');
  return Buffer.from(normalized, 'latin1');
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRegularFile(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isFile();
}

/**
 * Failures for source directories that could not be listed, one per
 * destination.
 */
export function unreadableFailures(
  dirs: readonly UnreadableDir[],
  source: string,
  destinations: readonly string[],
): FailedFile[] {
  return destinations.flatMap((destination) =>
    dirs.map((dir) => ({
      relativePath: dir.relativePath,
      source,
      destination,
      kind: 'FILE_UNREADABLE' as const,
      reason: reasonOf(dir.error),
    })),
  );
}

/**
 * Previous content of `destPath`: `null` when there is no regular file,
 * `'unreadable'` when one exists but cannot be read.
 */
function readPrevious(destPath: string): Buffer | null | 'unreadable' {
  if (!isRegularFile(destPath)) return null;
  try {
    return fs.readFileSync(destPath);
  } catch {
    return 'unreadable';
  }
}

/**
 * Write `content` to `destPath`, creating parent directories.
 *
 * @returns How the destination changed.
 */
function writeEntry(destPath: string, content: Buffer): FileChange {
  const previous = readPrevious(destPath);

  fs.mkdirSync(path.dirname(destPath), { recursive: true });
  fs.writeFileSync(destPath, content);

  if (previous === null) return 'created';
  if (previous === 'unreadable') return 'updated';
  return previous.equals(content) ? 'unchanged' : 'updated';
}

/**
 * Copy every file from `source` into each destination.
 *
 * Destinations are processed in order, and destination files are always
 * overwritten. Relative paths are preserved and intermediate directories
 * created as needed.
 *
 * @param source - Root to copy from.
 * @param destinations - Roots to copy into, in order.
 * @param options - Entry restriction and line-ending normalisation.
 * @returns Every attempted file, as copied, failed or skipped.
 */
export function copyAll(
  source: string,
  destinations: readonly string[],
  options: CopyOptions = {},
): SyncResult {
  const result = emptyResult();
  const unreadable: UnreadableDir[] = [];
  const entries = options.entries ?? listFiles(source, (dir) => unreadable.push(dir));
  const lineEnding = options.lineEnding ?? 'none';

  result.failed.push(...unreadableFailures(unreadable, source, destinations));

  for (const destination of destinations) {
    for (const entry of entries) {
      const sourcePath = resolveEntry(source, entry);
      const destPath = resolveEntry(destination, entry);
      const fail = (kind: FileFailureKind, err: unknown): void => {
        result.failed.push({
          relativePath: entry.relativePath,
          source,
          destination,
          kind,
          reason: reasonOf(err),
        });
      };

      if (options.entries && !isRegularFile(sourcePath)) {
        result.skipped.push({
          relativePath: entry.relativePath,
          source,
          reason: `not found in ${source}`,
        });
        continue;
      }

      let content: Buffer;
      try {
        content = normalizeLineEndings(fs.readFileSync(sourcePath), lineEnding);
      } catch (err: unknown) {
        fail('FILE_UNREADABLE', err);
        continue;
      }

      try {
        const change = writeEntry(destPath, content);
        result.copied.push({
          relativePath: entry.relativePath,
          source,
          destination,
          change,
        });
      } catch (err: unknown) {
        fail('FILE_UNWRITABLE', err);
      }
    }
  }

  return result;
}
