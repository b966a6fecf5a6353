import {
  DEFAULT_REPO_DIR,
  LINE_ENDINGS,
  SETTINGS_FILE,
  VERSION,
  isLineEnding,
  isSettingsFile,
  validateSettingsFile,
} from '../src/index.js';

describe('@dotsync/shared', () => {
  it('should export the file and directory names', () => {
    expect(SETTINGS_FILE).toBe('dotsync.json');
    expect(DEFAULT_REPO_DIR).toBe('DotFiles');
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('should list the supported line endings', () => {
    expect([...LINE_ENDINGS]).toEqual(['none', 'lf', 'crlf']);
  });

  describe('isLineEnding()', () => {
    it('should accept known endings only', () => {
      expect(isLineEnding('crlf')).toBe(true);
      expect(isLineEnding('CRLF')).toBe(false);
      expect(isLineEnding(1)).toBe(false);
    });
  });

  describe('validateSettingsFile()', () => {
    const valid = {
      version: 1,
      repoDotFilesDir: 'DotFiles',
      localPaths: ['/home/test', '/home/test/work'],
      lineEnding: 'lf',
    };

    it('should accept a well-formed settings file', () => {
      expect(validateSettingsFile(valid)).toEqual({ valid: true, errors: [] });
      expect(isSettingsFile(valid)).toBe(true);
    });

    it('should accept an empty localPaths list', () => {
      expect(validateSettingsFile({ ...valid, localPaths: [] }).valid).toBe(true);
    });

    it('should reject non-objects', () => {
      expect(validateSettingsFile(null)).toEqual({
        valid: false,
        errors: ['SettingsFile must be an object'],
      });
      expect(validateSettingsFile(['a']).valid).toBe(false);
    });

    it('should report every bad field', () => {
      const result = validateSettingsFile({
        version: 2,
        repoDotFilesDir: '',
        localPaths: ['/ok', 3],
        lineEnding: 'cr',
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'version must be 1',
        'repoDotFilesDir must be a non-empty string',
        'localPaths[1] must be a non-empty string',
        'lineEnding must be one of: none, lf, crlf',
      ]);
    });

    it('should reject a comma-joined string in place of the localPaths array', () => {
      const result = validateSettingsFile({ ...valid, localPaths: '/a,/b' });
      expect(result.errors).toEqual(['localPaths must be an array']);
      expect(isSettingsFile({ ...valid, localPaths: '/a,/b' })).toBe(false);
    });
  });
});
