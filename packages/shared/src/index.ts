/**
 * @dotsync/shared: shared constants, types, and validators.
 *
 * @module @dotsync/shared
 */

export {
  VERSION,
  SETTINGS_VERSION,
  SETTINGS_FILE,
  DEFAULT_REPO_DIR,
  LINE_ENDINGS,
  ENV_VARS,
  IGNORED_ENTRIES,
  COMMIT_PREFIX,
} from './constants.js';
export type { LineEnding, SettingsFile } from './types.js';
export type { ValidationResult } from './schemas.js';
export { validateSettingsFile, isSettingsFile, isLineEnding } from './schemas.js';
