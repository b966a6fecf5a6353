/**
 * Integration tests for the sync workflow.
 *
 * Drives config → repo → local across two local paths on a real
 * filesystem. Version control is an in-memory stand-in; a pull is
 * simulated by writing into the repo dir.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { executeConfig } from '../../src/commands/config.js';
import { executeLocal } from '../../src/commands/local.js';
import { executeRepo } from '../../src/commands/repo.js';
import { isSuccessfulRun } from '../../src/core/sync-orchestrator.js';
import { createFakeVcs, makeDir, readFile, writeTree, type FakeVcs } from '../helpers/fixtures.js';

declare global {
  var TEST_DIR: string;
}

describe('Sync Workflow Integration', () => {
  let repoDir: string;
  let laptop: string;
  let shared: string;
  let vcs: FakeVcs;

  beforeEach(() => {
    repoDir = makeDir('install', 'DotFiles');
    fs.mkdirSync(path.join(repoDir, '.git'));
    laptop = makeDir('laptop');
    shared = makeDir('shared');
    vcs = createFakeVcs();

    writeTree(repoDir, {
      '.bashrc': 'export EDITOR=vi\n',
      '.config/nvim/init.lua': 'vim.o.number = true\n',
    });
    executeConfig({ localPaths: `${laptop},${shared}`, lineEnding: 'lf' });
  });

  it('should seed empty local paths from the repository', async () => {
    const result = await executeLocal({}, vcs);

    expect(isSuccessfulRun(result)).toBe(true);
    for (const dir of [laptop, shared]) {
      expect(readFile(dir, '.bashrc')).toBe('export EDITOR=vi\n');
      expect(readFile(dir, '.config/nvim/init.lua')).toBe('vim.o.number = true\n');
    }
    expect(result.sync.copied.every((c) => c.change === 'created')).toBe(true);
  });

  it('should carry a local edit through the repo and back out to every path', async () => {
    await executeLocal({}, vcs);

    // edited on a machine that writes CRLF
    writeTree(laptop, { '.bashrc': 'export EDITOR=nvim\r\n' });
    fs.rmSync(path.join(shared, '.bashrc'));

    const repoRun = await executeRepo({ push: true }, vcs);

    expect(repoRun.state).toBe('pushed');
    expect(readFile(repoDir, '.bashrc')).toBe('export EDITOR=nvim\n');
    expect(vcs.commit).toHaveBeenCalledWith(repoDir, "dotsync: update '.bashrc'");
    expect(repoRun.sync.skipped.map((s) => [s.relativePath, s.source])).toEqual([['.bashrc', shared]]);

    const localRun = await executeLocal({}, vcs);

    expect(readFile(shared, '.bashrc')).toBe('export EDITOR=nvim\n');
    expect(readFile(laptop, '.bashrc')).toBe('export EDITOR=nvim\n');
    expect(
      localRun.sync.copied.map((c) => [c.destination, c.relativePath, c.change]),
    ).toEqual([
      [laptop, '.bashrc', 'updated'],
      [laptop, '.config/nvim/init.lua', 'unchanged'],
      [shared, '.bashrc', 'created'],
      [shared, '.config/nvim/init.lua', 'unchanged'],
    ]);
  });

  it('should copy pulled changes to every local path', async () => {
    await executeLocal({}, vcs);
    vcs.pull.mockImplementationOnce(async (dir) => {
      writeTree(dir, { '.gitconfig': '[user]\n\tname = Test User\n' });
      return { operation: 'pull', succeeded: true, message: 'Updated 1 file(s) from remote.' };
    });

    const result = await executeLocal({ pull: true }, vcs);

    expect(result.pull?.message).toBe('Updated 1 file(s) from remote.');
    expect(readFile(laptop, '.gitconfig')).toBe('[user]\n\tname = Test User\n');
    expect(readFile(shared, '.gitconfig')).toBe('[user]\n\tname = Test User\n');
  });

  it('should keep local files when the pull hits a conflict', async () => {
    await executeLocal({}, vcs);
    writeTree(laptop, { '.bashrc': 'unsaved local work\n' });
    vcs.pull.mockResolvedValueOnce({
      operation: 'pull',
      succeeded: false,
      message: 'CONFLICT (content): Merge conflict in .bashrc',
      failure: 'VCS_CONFLICT',
    });

    const result = await executeLocal({ pull: true }, vcs);

    expect(result.aborted).toBe(true);
    expect(readFile(laptop, '.bashrc')).toBe('unsaved local work\n');
  });

  it('should report an unchanged tree as nothing to commit', async () => {
    await executeLocal({}, vcs);
    vcs.commit.mockResolvedValueOnce({
      operation: 'commit',
      succeeded: false,
      message: 'No changes to commit',
      failure: 'VCS_NOTHING_TO_COMMIT',
    });

    const result = await executeRepo({ push: true }, vcs);

    expect(result.sync.copied.every((c) => c.change === 'unchanged')).toBe(true);
    expect(result.state).toBe('files-copied');
    expect(vcs.push).not.toHaveBeenCalled();
  });
});
