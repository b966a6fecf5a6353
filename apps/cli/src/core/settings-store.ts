/**
 * Settings store.
 *
 * Loads and saves `dotsync.json` in the install root and provides pure
 * mutations over the in-memory Configuration. Only the `config` command
 * writes this file; `local` and `repo` read it once at start-up.
 *
 * @module core/settings-store
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  DEFAULT_REPO_DIR,
  SETTINGS_FILE,
  SETTINGS_VERSION,
  isSettingsFile,
  validateSettingsFile,
} from '@dotsync/shared';
import type { LineEnding, SettingsFile } from '@dotsync/shared';
import type { Configuration } from '../types/index.js';
import { ConfigCorruptError, ConfigError, ConfigMissingError } from '../utils/errors.js';
import { canonicalize } from './path-validator.js';

/**
 * Path of the settings file for an install root.
 */
export function getSettingsPath(installRoot: string): string {
  return path.join(installRoot, SETTINGS_FILE);
}

/**
 * Configuration used when `config` runs for the first time.
 */
export function createDefaultSettings(installRoot: string): Configuration {
  return {
    repoDotFilesDir: path.join(installRoot, DEFAULT_REPO_DIR),
    localTargetPaths: [],
    lineEnding: 'none',
  };
}

/**
 * Convert the on-disk shape into a Configuration.
 * Relative paths (and `~`) in a hand-edited file resolve against the install root.
 */
export function fromSettingsFile(file: SettingsFile, installRoot: string): Configuration {
  return {
    repoDotFilesDir: canonicalize(file.repoDotFilesDir, installRoot),
    localTargetPaths: file.localPaths.map((p) => canonicalize(p, installRoot)),
    lineEnding: file.lineEnding,
  };
}

/**
 * Convert a Configuration into the on-disk shape.
 * The repo dir is stored relative to the install root when it lies beneath it.
 */
export function toSettingsFile(config: Configuration, installRoot: string): SettingsFile {
  const relative = path.relative(installRoot, config.repoDotFilesDir);
  const insideRoot = !relative.startsWith('..') && !path.isAbsolute(relative);

  return {
    version: SETTINGS_VERSION,
    repoDotFilesDir: insideRoot ? relative || '.' : config.repoDotFilesDir,
    localPaths: [...config.localTargetPaths],
    lineEnding: config.lineEnding,
  };
}

/**
 * Load the configuration from disk.
 *
 * @param settingsPath - Path of dotsync.json.
 * @param installRoot - Directory relative repo paths resolve against.
 * @throws ConfigMissingError if the file does not exist.
 * @throws ConfigCorruptError if the file is empty, not JSON, or malformed.
 */
export function loadSettings(settingsPath: string, installRoot: string): Configuration {
  if (!fs.existsSync(settingsPath)) {
    throw new ConfigMissingError(`No configuration found at ${settingsPath}.`);
  }

  const content = fs.readFileSync(settingsPath, 'utf-8');

  if (!content.trim()) {
    throw new ConfigCorruptError(`Configuration file ${settingsPath} is empty.`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigCorruptError(`Configuration file ${settingsPath} is not valid JSON: ${reason}`);
  }

  if (!isSettingsFile(parsed)) {
    const { errors } = validateSettingsFile(parsed);
    throw new ConfigCorruptError(
      `Configuration file ${settingsPath} is malformed:\n  - ${errors.join('\n  - ')}`,
    );
  }

  return fromSettingsFile(parsed, installRoot);
}

/**
 * Save the configuration to disk.
 *
 * Writes a sibling temp file and renames it over the target, so readers
 * only ever see the old or the new file.
 */
export function saveSettings(settingsPath: string, installRoot: string, config: Configuration): void {
  const contents = JSON.stringify(toSettingsFile(config, installRoot), null, 2) + '\n';
  const tmpPath = `${settingsPath}.${process.pid}.tmp`;

  fs.mkdirSync(path.dirname(settingsPath), { recursive: true });

  try {
    const fd = fs.openSync(tmpPath, 'w', 0o644);
    try {
      fs.writeSync(fd, contents);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmpPath, settingsPath);
  } catch (err: unknown) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Append a local target path. A path already configured is left where it is.
 */
export function addLocalPath(config: Configuration, localPath: string): Configuration {
  if (config.localTargetPaths.includes(localPath)) {
    return { ...config, localTargetPaths: [...config.localTargetPaths] };
  }
  return { ...config, localTargetPaths: [...config.localTargetPaths, localPath] };
}

/**
 * Replace the local target paths, keeping the first occurrence of duplicates.
 */
export function setLocalPaths(config: Configuration, localPaths: readonly string[]): Configuration {
  return localPaths.reduce(addLocalPath, { ...config, localTargetPaths: [] });
}

export function setRepoDir(config: Configuration, repoDir: string): Configuration {
  return { ...config, localTargetPaths: [...config.localTargetPaths], repoDotFilesDir: repoDir };
}

export function setLineEnding(config: Configuration, lineEnding: LineEnding): Configuration {
  return { ...config, localTargetPaths: [...config.localTargetPaths], lineEnding };
}

/**
 * Ensure the configuration can drive a `local` or `repo` run.
 *
 * @throws ConfigError if no local target path is configured.
 */
export function assertSyncReady(config: Configuration): void {
  if (config.localTargetPaths.length === 0) {
    throw new ConfigError(
      'The local dot file location must be configured before synchronization.',
      'Run `dotsync config --localPaths <path>[,<path>...]`.',
    );
  }
}
