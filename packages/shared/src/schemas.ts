/**
 * Runtime validation for the persisted settings file.
 *
 * The settings file is hand-editable, so everything read from disk is
 * checked before it is trusted.
 *
 * @module schemas
 */

import { LINE_ENDINGS, SETTINGS_VERSION } from './constants.js';
import type { LineEnding, SettingsFile } from './types.js';

/**
 * Simple schema validation result.
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Validate that a value is a non-empty string.
 */
function isNonEmptyString(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'string' || value.trim().length === 0) {
    errors.push(`${field} must be a non-empty string`);
    return false;
  }
  return true;
}

/**
 * Validate that a value is a plain object.
 */
function isObject(value: unknown, field: string, errors: string[]): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    errors.push(`${field} must be an object`);
    return false;
  }
  return true;
}

/** Type guard for the supported line-ending names. */
export function isLineEnding(value: unknown): value is LineEnding {
  return typeof value === 'string' && (LINE_ENDINGS as readonly string[]).includes(value);
}

/**
 * Validate a SettingsFile structure (parsed dotsync.json).
 */
export function validateSettingsFile(data: unknown): ValidationResult {
  const errors: string[] = [];

  if (!isObject(data, 'SettingsFile', errors)) {
    return { valid: false, errors };
  }

  if (data['version'] !== SETTINGS_VERSION) {
    errors.push(`version must be ${SETTINGS_VERSION}`);
  }

  isNonEmptyString(data['repoDotFilesDir'], 'repoDotFilesDir', errors);

  const localPaths = data['localPaths'];
  if (!Array.isArray(localPaths)) {
    errors.push('localPaths must be an array');
  } else {
    localPaths.forEach((entry: unknown, i) => {
      isNonEmptyString(entry, `localPaths[${i}]`, errors);
    });
  }

  if (!isLineEnding(data['lineEnding'])) {
    errors.push(`lineEnding must be one of: ${LINE_ENDINGS.join(', ')}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Type guard over validateSettingsFile.
 */
export function isSettingsFile(data: unknown): data is SettingsFile {
  return validateSettingsFile(data).valid;
}
