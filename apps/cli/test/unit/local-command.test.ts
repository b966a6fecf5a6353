/**
 * Unit tests for the local command module.
 *
 * executeLocal is called with an in-memory VersionControl; settings come
 * from a real dotsync.json under DOTSYNC_ROOT.
 */

import { jest } from '@jest/globals';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { executeConfig } from '../../src/commands/config.js';
import { executeLocal, printSyncResult, summarizeSync } from '../../src/commands/local.js';
import { ConfigMissingError, RepoError } from '../../src/utils/errors.js';
import { createFakeVcs, makeDir, readFile, writeTree, type FakeVcs } from '../helpers/fixtures.js';

declare global {
  var TEST_DIR: string;
}

describe('Local Command', () => {
  let repoDir: string;
  let home: string;
  let vcs: FakeVcs;

  beforeEach(() => {
    repoDir = makeDir('install', 'DotFiles');
    home = makeDir('home');
    vcs = createFakeVcs();
    writeTree(repoDir, { '.bashrc': 'alias ll="ls -l"\n', '.config/git/config': '[core]\n' });
  });

  describe('executeLocal()', () => {
    it('should fail before any config has been saved', async () => {
      await expect(executeLocal({}, vcs)).rejects.toThrow(ConfigMissingError);
    });

    it('should copy the repository into every configured path', async () => {
      const work = makeDir('work');
      executeConfig({ localPaths: `${home},${work}` });

      const result = await executeLocal({}, vcs);

      expect(result.aborted).toBe(false);
      expect(result.sync.copied).toHaveLength(4);
      expect(readFile(work, '.config/git/config')).toBe('[core]\n');
      expect(vcs.pull).not.toHaveBeenCalled();
    });

    it('should refuse --pull when the repo dir is not under git', async () => {
      executeConfig({ localPaths: home });

      await expect(executeLocal({ pull: true }, vcs)).rejects.toThrow(RepoError);
      expect(vcs.pull).not.toHaveBeenCalled();
      expect(fs.readdirSync(home)).toEqual([]);
    });

    it('should pull first when the repo dir is under git', async () => {
      fs.mkdirSync(path.join(repoDir, '.git'));
      executeConfig({ localPaths: home });

      const result = await executeLocal({ pull: true }, vcs);

      expect(vcs.pull).toHaveBeenCalledWith(repoDir);
      expect(result.pull?.succeeded).toBe(true);
      expect(fs.existsSync(path.join(home, '.git'))).toBe(false);
    });

    it('should report a missing repo dir', async () => {
      executeConfig({ localPaths: home, repoDir: 'elsewhere' });
      await expect(executeLocal({}, vcs)).rejects.toThrow(/does not exist/);
    });

    it('should pass --fileName through', async () => {
      executeConfig({ localPaths: home });

      const result = await executeLocal({ fileName: '.bashrc' }, vcs);

      expect(result.sync.copied.map((c) => c.relativePath)).toEqual(['.bashrc']);
    });
  });

  describe('summarizeSync()', () => {
    it('should count entries by status', () => {
      expect(
        summarizeSync({
          copied: [
            { relativePath: 'a', source: '/s', destination: '/d', change: 'created' },
            { relativePath: 'b', source: '/s', destination: '/d', change: 'unchanged' },
            { relativePath: 'c', source: '/s', destination: '/d', change: 'unchanged' },
          ],
          failed: [],
          skipped: [{ relativePath: 'd', source: '/s', reason: 'not found in /s' }],
        }),
      ).toEqual({ created: 1, updated: 0, unchanged: 2, failed: 0, skipped: 1 });
    });
  });

  describe('printSyncResult()', () => {
    let originalLevel: typeof chalk.level;

    beforeEach(() => {
      originalLevel = chalk.level;
      chalk.level = 0;
    });

    afterEach(() => {
      chalk.level = originalLevel;
    });

    it('should print one line per file and a summary', () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      printSyncResult({
        copied: [
          { relativePath: '.bashrc', source: '/repo', destination: '/home', change: 'created' },
          { relativePath: '.vimrc', source: '/repo', destination: '/home', change: 'unchanged' },
        ],
        failed: [
          {
            relativePath: '.inputrc',
            source: '/repo',
            destination: '/home',
            kind: 'FILE_UNWRITABLE',
            reason: 'EACCES',
          },
        ],
        skipped: [],
      });

      expect(logSpy.mock.calls.map(([line]) => line)).toEqual([
        ' - created   .bashrc → /home',
        ' - unchanged .vimrc → /home',
        ' - failed    .inputrc → /home: EACCES',
        '⚠ 1 created, 0 updated, 1 unchanged, 1 failed',
      ]);
      logSpy.mockRestore();
    });
  });
});
