/**
 * `dotsync config` command.
 *
 * Stores the local target paths, the repository dot-files directory and
 * the line-ending policy in `dotsync.json` (in the install root), or
 * lists the current settings.
 *
 * The install root is `$DOTSYNC_ROOT` when set, otherwise the working
 * directory; the repository directory defaults to `<root>/DotFiles`.
 *
 * @module commands/config
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';
import { ENV_VARS, LINE_ENDINGS, isLineEnding } from '@dotsync/shared';
import type { Configuration } from '../types/index.js';
import {
  addLocalPath,
  createDefaultSettings,
  getSettingsPath,
  loadSettings,
  saveSettings,
  setLineEnding,
  setLocalPaths,
  setRepoDir,
} from '../core/settings-store.js';
import { splitPathList, validateTargetPath } from '../core/path-validator.js';
import { ConfigError, ConfigMissingError, withErrorHandler } from '../utils/errors.js';

/** Options for the config command */
export interface ConfigOptions {
  /** Comma-separated local paths, replacing the configured list */
  localPaths?: string;
  /** One local path appended to the configured list */
  add?: string;
  repoDir?: string;
  lineEnding?: string;
  list?: boolean;
}

/** Result of a config invocation */
export interface ConfigResult {
  /** Current settings, or `null` when listing before the first save */
  config: Configuration | null;
  settingsPath: string;
  /** Whether the settings file was written */
  saved: boolean;
}

/**
 * Get the install root.
 * Uses DOTSYNC_ROOT when set, otherwise the working directory.
 */
export function getInstallRoot(): string {
  return path.resolve(process.env[ENV_VARS.ROOT] ?? process.cwd());
}

/**
 * Load the configuration for a `local` or `repo` run.
 *
 * @throws ConfigMissingError / ConfigCorruptError from the settings store.
 */
export function loadConfiguration(): Configuration {
  const installRoot = getInstallRoot();
  return loadSettings(getSettingsPath(installRoot), installRoot);
}

function loadOrCreate(settingsPath: string, installRoot: string): Configuration {
  try {
    return loadSettings(settingsPath, installRoot);
  } catch (err: unknown) {
    if (err instanceof ConfigMissingError) {
      return createDefaultSettings(installRoot);
    }
    throw err;
  }
}

/**
 * Execute the config command logic.
 *
 * Changes are applied in the order --localPaths, --add, --repoDir,
 * --lineEnding and saved once. With only --list, nothing is written.
 */
export function executeConfig(options: ConfigOptions): ConfigResult {
  const installRoot = getInstallRoot();
  const settingsPath = getSettingsPath(installRoot);

  const wantsChange =
    options.localPaths !== undefined ||
    options.add !== undefined ||
    options.repoDir !== undefined ||
    options.lineEnding !== undefined;

  if (!wantsChange) {
    if (!options.list) {
      throw new ConfigError(
        'No configuration option given.',
        'Pass one of --localPaths, --add, --repoDir, --lineEnding or --list.',
      );
    }
    try {
      return { config: loadSettings(settingsPath, installRoot), settingsPath, saved: false };
    } catch (err: unknown) {
      if (err instanceof ConfigMissingError) {
        return { config: null, settingsPath, saved: false };
      }
      throw err;
    }
  }

  let config = loadOrCreate(settingsPath, installRoot);

  if (options.localPaths !== undefined) {
    const paths = splitPathList(options.localPaths);
    if (paths.length === 0) {
      throw new ConfigError('--localPaths needs at least one path.');
    }
    config = setLocalPaths(config, paths.map((p) => validateTargetPath(p)));
  }

  if (options.add !== undefined) {
    config = addLocalPath(config, validateTargetPath(options.add));
  }

  if (options.repoDir !== undefined) {
    config = setRepoDir(config, validateTargetPath(options.repoDir, installRoot));
  }

  if (options.lineEnding !== undefined) {
    const ending = options.lineEnding.toLowerCase();
    if (!isLineEnding(ending)) {
      throw new ConfigError(
        `Unknown line ending '${options.lineEnding}'.`,
        `Use one of: ${LINE_ENDINGS.join(', ')}.`,
      );
    }
    config = setLineEnding(config, ending);
  }

  saveSettings(settingsPath, installRoot, config);

  return { config, settingsPath, saved: true };
}

/**
 * Render settings as aligned `key = value` lines.
 */
export function formatSettings(config: Configuration | null): string[] {
  if (config === null) {
    return ['<EMPTY CONFIG>'];
  }

  const rows: [string, string][] = [
    ['repoDotFilesDir', config.repoDotFilesDir],
    ['localPaths', config.localTargetPaths.join(', ')],
    ['lineEnding', config.lineEnding],
  ];
  const width = Math.max(...rows.map(([key]) => key.length));
  return rows.map(([key, value]) => `${key.padEnd(width)} = ${value}`);
}

/**
 * Register the `config` command on the given Commander program.
 */
export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Set or display the dotsync configuration')
    .option('--localPaths <paths>', 'comma-separated local dot file directories (replaces the list)')
    .option('--add <path>', 'append a local dot file directory')
    .option('--repoDir <path>', 'repository dot-files directory, relative to the install root')
    .option('--lineEnding <ending>', `line ending to normalise repo files with: ${LINE_ENDINGS.join(', ')}`)
    .option('--list', 'display the current configuration')
    .action(withErrorHandler(async (opts: ConfigOptions) => {
      const result = executeConfig(opts);

      if (result.saved) {
        console.log(chalk.green(`✅ Saved configuration to ${result.settingsPath}`));
      }

      for (const line of formatSettings(result.config)) {
        console.log(result.config ? line : chalk.dim(line));
      }
    }));
}
