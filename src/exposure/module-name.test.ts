import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { moduleNameFromPath } from './module-name.js';

const root = join('/', 'project', 'tests');

describe('moduleNameFromPath', () => {
  it('joins nested directories with dots', () => {
    expect(moduleNameFromPath(join(root, 'Parser', 'ExprTest.elm'), root)).toBe('Parser.ExprTest');
  });

  it('names a top-level module after its file', () => {
    expect(moduleNameFromPath(join(root, 'Example.elm'), root)).toBe('Example');
  });

  it('returns null outside the source directory', () => {
    expect(moduleNameFromPath(join('/', 'project', 'src', 'Main.elm'), root)).toBeNull();
  });

  it('returns null for a segment that is not a module name', () => {
    expect(moduleNameFromPath(join(root, 'helpers', 'Util.elm'), root)).toBeNull();
  });

  it('returns null for the source directory itself', () => {
    expect(moduleNameFromPath(root, root)).toBeNull();
  });
});
