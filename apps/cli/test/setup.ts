import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

/** Global test directory — unique per worker (pid + timestamp + random) */
const TEST_DIR = path.join(
  os.tmpdir(),
  'dotsync-test',
  `${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
);

declare global {
  var TEST_DIR: string;
}

globalThis.TEST_DIR = TEST_DIR;

beforeAll(() => {
  fs.mkdirSync(TEST_DIR, { recursive: true });
});

beforeEach(() => {
  if (!fs.existsSync(TEST_DIR)) {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  }
  process.env['DOTSYNC_ROOT'] = path.join(TEST_DIR, 'install');
  process.env['DOTSYNC_HOME'] = path.join(TEST_DIR, 'home');
});

// Commands set process.exitCode on failure; never let that leak into Jest's own exit code
afterEach(() => {
  process.exitCode = undefined;
  if (!fs.existsSync(TEST_DIR)) return;
  for (const entry of fs.readdirSync(TEST_DIR)) {
    fs.rmSync(path.join(TEST_DIR, entry), { recursive: true, force: true });
  }
});

afterAll(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
});
