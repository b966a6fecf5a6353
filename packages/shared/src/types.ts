/**
 * Shared TypeScript type definitions for the dotsync settings file.
 */

import type { LINE_ENDINGS } from './constants.js';

/** How line endings are normalised when files are written into the repository */
export type LineEnding = (typeof LINE_ENDINGS)[number];

/** On-disk shape of dotsync.json */
export interface SettingsFile {
  version: number;
  /** Repository dot-files directory; relative paths resolve against the install root */
  repoDotFilesDir: string;
  /** Ordered absolute local target paths */
  localPaths: string[];
  lineEnding: LineEnding;
}
