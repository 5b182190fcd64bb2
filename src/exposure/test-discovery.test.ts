import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import os from 'os';
import { discoverTestNames, findTestNames } from './test-discovery.js';

const SAMPLE_MODULE = [
  'module FooTest exposing (suite)',
  '',
  'import Test exposing (Test, describe)',
  '',
  'suite : Test',
  'suite =',
  '    describe "x" []',
  '',
  'helper : Int -> Int',
  'helper n = n',
  '',
  'wrapped :',
  '    Test',
  'wrapped =',
  '    describe "y" []',
  '',
  '-- commented : Test',
  '{- blockTest : Test -}',
  '  indented : Test',
  'Upper : Test',
];

let tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tempDirs = [];
});

describe('findTestNames', () => {
  it('finds top-level values annotated with the test type', () => {
    expect(findTestNames(SAMPLE_MODULE)).toEqual(new Set(['suite', 'wrapped']));
  });

  it('accepts qualified test types when configured', () => {
    const lines = ['qualified : Test.Test', 'plain : Test'];
    expect(findTestNames(lines, ['Test.Test'])).toEqual(new Set(['qualified']));
  });

  it('drops a wrapped annotation whose type is not indented', () => {
    const lines = ['a :', 'b : Test'];
    expect(findTestNames(lines)).toEqual(new Set(['b']));
  });

  it('ignores annotations inside multi-line block comments', () => {
    const lines = ['{-', 'hidden : Test', '-}', 'shown : Test'];
    expect(findTestNames(lines)).toEqual(new Set(['shown']));
  });
});

describe('discoverTestNames', () => {
  it('reads test names from a file', async () => {
    const dir = mkdtempSync(join(os.tmpdir(), 'test-discovery-test-'));
    tempDirs.push(dir);
    const filePath = join(dir, 'FooTest.elm');
    writeFileSync(filePath, SAMPLE_MODULE.join('\n'), 'utf8');

    const result = await discoverTestNames(filePath);

    expect(result).toEqual({ success: true, names: new Set(['suite', 'wrapped']) });
  });

  it('reports an open failure for a missing file', async () => {
    const dir = mkdtempSync(join(os.tmpdir(), 'test-discovery-test-'));
    tempDirs.push(dir);
    const filePath = join(dir, 'Missing.elm');

    const result = await discoverTestNames(filePath);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.problem.kind).toBe('open-failed');
      expect(result.problem.path).toBe(filePath);
    }
  });
});
