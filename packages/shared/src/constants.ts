/**
 * Shared constants for dotsync.
 */

/** Current CLI version */
export const VERSION = '0.4.0';

/** Version of the persisted settings file layout */
export const SETTINGS_VERSION = 1;

/** Settings file name, stored in the install root */
export const SETTINGS_FILE = 'dotsync.json';

/** Repository dot-files directory, relative to the install root */
export const DEFAULT_REPO_DIR = 'DotFiles';

/** Line-ending normalisation applied to files written into the repository */
export const LINE_ENDINGS = ['none', 'lf', 'crlf'] as const;

/** Environment variables read by the CLI */
export const ENV_VARS = {
  /** Overrides the install root (defaults to the working directory) */
  ROOT: 'DOTSYNC_ROOT',
  /** Overrides the home directory used for `~` expansion */
  HOME: 'DOTSYNC_HOME',
} as const;

/** Directory names never treated as dot files */
export const IGNORED_ENTRIES: readonly string[] = ['.git'] as const;

/** Prefix of every commit created by `dotsync repo` */
export const COMMIT_PREFIX = 'dotsync:';
