import { describe, it, expect } from 'vitest';
import {
  advanceHeaderScan,
  finishHeaderScan,
  initialScanState,
  isModuleLine,
  parseExposingClause,
  scanHeader,
} from './header-scanner.js';

function enumerated(...names: string[]) {
  return { kind: 'exposure', exposure: { kind: 'enumerated', names: new Set(names) } };
}

const wildcard = { kind: 'exposure', exposure: { kind: 'wildcard' } };

describe('scanHeader', () => {
  // ==========================================================================
  // Module line variants
  // ==========================================================================

  describe('module declarations', () => {
    it('reads an explicit exposing list', () => {
      expect(scanHeader(['module Foo exposing (testA, testB)'])).toEqual(
        enumerated('testA', 'testB'),
      );
    });

    it('recognizes wildcard exposure', () => {
      expect(scanHeader(['module Foo exposing (..)'])).toEqual(wildcard);
    });

    it('accepts port modules', () => {
      expect(scanHeader(['port module Foo.Bar exposing (send)'])).toEqual(enumerated('send'));
    });

    it('accepts effect modules with a where block', () => {
      expect(
        scanHeader(['effect module Task where { command = MyCmd } exposing (..)']),
      ).toEqual(wildcard);
    });

    it('accepts a module keyword alone on its line', () => {
      expect(scanHeader(['module', 'Foo exposing (..)'])).toEqual(wildcard);
    });
  });

  // ==========================================================================
  // Exposing clause across lines
  // ==========================================================================

  describe('multi-line exposing clauses', () => {
    it('accumulates names and drops type-level exports', () => {
      const lines = [
        'module Foo.Bar',
        '    exposing',
        '    ( suite',
        '    , helper',
        '    , Model',
        '    , Msg(..)',
        '    )',
      ];
      expect(scanHeader(lines)).toEqual(enumerated('suite', 'helper'));
    });

    it('does not close the clause on a nested parenthesis', () => {
      expect(scanHeader(['module Foo exposing (Type(A, B), value)'])).toEqual(
        enumerated('value'),
      );
    });

    it('strips comments inside the clause', () => {
      const lines = [
        'module Foo exposing',
        '  ( a -- first',
        '  , b {- second -}',
        '  )',
      ];
      expect(scanHeader(lines)).toEqual(enumerated('a', 'b'));
    });

    it('ignores whatever follows the closing parenthesis', () => {
      expect(scanHeader(['module Foo exposing (a)', 'x = ('])).toEqual(enumerated('a'));
    });
  });

  // ==========================================================================
  // Comments before the header
  // ==========================================================================

  describe('leading comments', () => {
    it('skips line and block comments before the module line', () => {
      const lines = ['-- header comment', '{- block', 'still -}', '', 'module Foo exposing (a)'];
      expect(scanHeader(lines)).toEqual(enumerated('a'));
    });

    it('does not let a line comment marker cut a block comment short', () => {
      const lines = ['{- comment -- not a line comment -}', 'module Foo exposing (a)'];
      expect(scanHeader(lines)).toEqual(enumerated('a'));
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe('failures', () => {
    it('reports a missing module declaration when other content comes first', () => {
      expect(scanHeader(['', 'x = 1', 'module Foo exposing (..)'])).toEqual({
        kind: 'missing-module-declaration',
      });
    });

    it('matches the module keyword as a whole word', () => {
      expect(scanHeader(['modules = 1'])).toEqual({ kind: 'missing-module-declaration' });
    });

    it('reports a parse error when input ends inside the clause', () => {
      expect(scanHeader(['module Foo exposing (a,'])).toEqual({ kind: 'parse-error' });
    });

    it('reports a parse error for a file with only comments', () => {
      expect(scanHeader(['-- nothing', '{- here -}'])).toEqual({ kind: 'parse-error' });
    });

    it('reports a parse error for empty input', () => {
      expect(scanHeader([])).toEqual({ kind: 'parse-error' });
    });
  });
});

describe('advanceHeaderScan', () => {
  it('moves to reading the module name after the module keyword', () => {
    expect(advanceHeaderScan(initialScanState(), 'module Foo')).toEqual({
      done: false,
      state: { phase: 'reading-module-name' },
    });
  });

  it('leaves the state unchanged on a blank line', () => {
    expect(advanceHeaderScan({ phase: 'awaiting-open-bracket' }, '   ')).toEqual({
      done: false,
      state: { phase: 'awaiting-open-bracket' },
    });
  });

  it('tracks bracket depth while accumulating', () => {
    const step = advanceHeaderScan(
      { phase: 'accumulating-exposed-names', depth: 1, buffer: '' },
      'a, Msg(',
    );
    expect(step).toEqual({
      done: false,
      state: { phase: 'accumulating-exposed-names', depth: 2, buffer: 'a, Msg(\n' },
    });
  });

  it('does not change the state passed in', () => {
    const state = initialScanState();
    advanceHeaderScan(state, 'module Foo exposing (a)');
    expect(state).toEqual({ phase: 'awaiting-module-keyword' });
  });
});

describe('finishHeaderScan', () => {
  it('treats end of input as a parse error', () => {
    expect(finishHeaderScan({ phase: 'reading-module-name' })).toEqual({ kind: 'parse-error' });
  });
});

describe('isModuleLine', () => {
  it.each([
    ['module Foo exposing (..)', true],
    ['port module Foo exposing (..)', true],
    ['effect module Foo where {} exposing (..)', true],
    ['moduleName = 1', false],
    ['import Foo', false],
  ])('%s -> %s', (line, expected) => {
    expect(isModuleLine(line)).toBe(expected);
  });
});

describe('parseExposingClause', () => {
  it('treats a lone .. as a wildcard', () => {
    expect(parseExposingClause(' .. ')).toEqual({ kind: 'wildcard' });
  });

  it('deduplicates names', () => {
    const result = parseExposingClause('a, a, b');
    expect(result).toEqual({ kind: 'enumerated', names: new Set(['a', 'b']) });
  });

  it('drops empty pieces', () => {
    expect(parseExposingClause('a,')).toEqual({ kind: 'enumerated', names: new Set(['a']) });
    expect(parseExposingClause('')).toEqual({ kind: 'enumerated', names: new Set() });
  });

  it('drops constructor wildcard exports', () => {
    expect(parseExposingClause('Msg(..), update')).toEqual({
      kind: 'enumerated',
      names: new Set(['update']),
    });
  });
});
