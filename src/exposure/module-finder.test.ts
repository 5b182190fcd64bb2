import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import os from 'os';
import { findModuleFiles } from './module-finder.js';

const options = { extensions: ['.elm'], ignoreDirs: ['elm-stuff'] };

describe('findModuleFiles', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), 'module-finder-test-'));
    mkdirSync(join(tmpDir, 'tests', 'Nested'), { recursive: true });
    mkdirSync(join(tmpDir, 'tests', 'elm-stuff'), { recursive: true });
    writeFileSync(join(tmpDir, 'tests', 'B.elm'), '', 'utf8');
    writeFileSync(join(tmpDir, 'tests', 'A.elm'), '', 'utf8');
    writeFileSync(join(tmpDir, 'tests', 'notes.md'), '', 'utf8');
    writeFileSync(join(tmpDir, 'tests', 'Nested', 'C.elm'), '', 'utf8');
    writeFileSync(join(tmpDir, 'tests', 'elm-stuff', 'Cached.elm'), '', 'utf8');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('walks directories, keeping configured extensions and skipping ignored dirs', async () => {
    const testsDir = join(tmpDir, 'tests');

    const result = await findModuleFiles([testsDir], options);

    expect(result).toEqual({
      files: [
        { path: join(testsDir, 'A.elm'), sourceDir: testsDir },
        { path: join(testsDir, 'B.elm'), sourceDir: testsDir },
        { path: join(testsDir, 'Nested', 'C.elm'), sourceDir: testsDir },
      ],
      missing: [],
    });
  });

  it('keeps a file root with its directory as source dir', async () => {
    const file = join(tmpDir, 'tests', 'notes.md');

    const result = await findModuleFiles([file], options);

    expect(result.files).toEqual([{ path: file, sourceDir: join(tmpDir, 'tests') }]);
  });

  it('reports roots that do not exist', async () => {
    const result = await findModuleFiles([join(tmpDir, 'nope')], options);

    expect(result).toEqual({ files: [], missing: [join(tmpDir, 'nope')] });
  });

  it('deduplicates files reached from overlapping roots', async () => {
    const testsDir = join(tmpDir, 'tests');

    const result = await findModuleFiles([testsDir, join(testsDir, 'A.elm')], options);

    expect(result.files.map((file) => file.path)).toEqual([
      join(testsDir, 'A.elm'),
      join(testsDir, 'B.elm'),
      join(testsDir, 'Nested', 'C.elm'),
    ]);
  });
});
