import * as fs from 'node:fs';
import * as path from 'node:path';

const packageDir = path.resolve(__dirname, '..');
const repoRoot = path.resolve(packageDir, '..', '..');

function readJson(...segments: string[]): unknown {
  return JSON.parse(fs.readFileSync(path.join(...segments), 'utf-8'));
}

describe('@dotsync/shared package entry', () => {
  it('should load compiled output at run time and sources for types', () => {
    expect(readJson(packageDir, 'package.json')).toMatchObject({
      main: './dist/index.js',
      types: './src/index.ts',
      exports: { '.': { types: './src/index.ts', default: './dist/index.js' } },
    });
    expect(fs.existsSync(path.join(packageDir, 'src', 'index.ts'))).toBe(true);
  });

  it('should compile src/index.ts to the runtime entry', () => {
    expect(readJson(packageDir, 'tsconfig.json')).toMatchObject({
      compilerOptions: { rootDir: 'src', outDir: 'dist' },
      include: ['src/**/*.ts'],
    });
  });

  it('should be built before the CLI', () => {
    expect(readJson(repoRoot, 'package.json')).toMatchObject({
      scripts: { build: 'tsc -p packages/shared/tsconfig.json && tsc -p tsconfig.json' },
    });
  });
});
