/**
 * Shared test fixtures: temp directory trees and an in-memory
 * VersionControl double.
 */

import { jest } from '@jest/globals';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { VersionControl } from '../../src/types/index.js';

declare global {
  var TEST_DIR: string;
}

/** Create (and return) a fresh directory under TEST_DIR. */
export function makeDir(...segments: string[]): string {
  const dir = path.join(globalThis.TEST_DIR, ...segments);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/** Write `files` (relative `/`-separated path → content) under `root`. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, ...relativePath.split('/'));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}

/** Read one file under `root` as UTF-8. */
export function readFile(root: string, relativePath: string): string {
  return fs.readFileSync(path.join(root, ...relativePath.split('/')), 'utf-8');
}

/** A VersionControl whose operations all succeed unless overridden. */
export function createFakeVcs() {
  return {
    pull: jest.fn<VersionControl['pull']>(async () => ({
      operation: 'pull',
      succeeded: true,
      message: 'Already up to date.',
    })),
    commit: jest.fn<VersionControl['commit']>(async (_repoDir, message) => ({
      operation: 'commit',
      succeeded: true,
      message,
    })),
    push: jest.fn<VersionControl['push']>(async () => ({
      operation: 'push',
      succeeded: true,
      message: 'Pushed to remote.',
    })),
  };
}

export type FakeVcs = ReturnType<typeof createFakeVcs>;
