/**
 * Module header scanner.
 *
 * Reads comment-stripped lines until the `module ... exposing (...)`
 * declaration is complete, then reports the export surface. The scanner
 * is an explicit state machine: `advanceHeaderScan` is a pure transition
 * from one state and one line to the next state or a final outcome.
 *
 * Accepted headers:
 *
 *     module Foo exposing (..)
 *     port module Foo.Bar exposing (a, b)
 *     effect module Task where { command = MyCmd } exposing
 *         ( Task
 *         , succeed
 *         )
 *
 * @module exposure/header-scanner
 */

import { stripCommentLines } from './comment-stripper.js';
import type { ExposureSet } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Scanner state between lines.
 */
export type ScanState =
  | { phase: 'awaiting-module-keyword' }
  | { phase: 'reading-module-name' }
  | { phase: 'awaiting-open-bracket' }
  | { phase: 'accumulating-exposed-names'; depth: number; buffer: string };

/**
 * Final outcome of a header scan.
 */
export type ScanOutcome =
  | { kind: 'exposure'; exposure: ExposureSet }
  | { kind: 'missing-module-declaration' }
  | { kind: 'parse-error' };

/**
 * Result of feeding one line to the scanner.
 */
export type ScanStep =
  | { done: false; state: ScanState }
  | { done: true; outcome: ScanOutcome };

// ============================================================================
// Constants
// ============================================================================

/** Matches `module`, `port module` and `effect module` at line start. */
const MODULE_LINE_RE = /^(?:(?:port|effect)\s+)?module(?![\w'])/;

const EXPOSING_RE = /(?<![\w'.])exposing(?![\w'])/;

/** The exposing clause body meaning "export everything". */
export const WILDCARD_TOKEN = '..';

// ============================================================================
// Transitions
// ============================================================================

/** State before any line has been read. */
export function initialScanState(): ScanState {
  return { phase: 'awaiting-module-keyword' };
}

/**
 * Whether a trimmed line opens a module declaration.
 */
export function isModuleLine(line: string): boolean {
  return MODULE_LINE_RE.test(line);
}

/**
 * Advance the scanner by one comment-stripped line.
 *
 * A single line may move the scanner through several phases; whatever is
 * left of the line after one phase is handed to the next. Blank lines
 * never change the state.
 */
export function advanceHeaderScan(state: ScanState, cleanedLine: string): ScanStep {
  let current = state;
  let text = cleanedLine.trim();

  while (text.length > 0) {
    switch (current.phase) {
      case 'awaiting-module-keyword': {
        const match = MODULE_LINE_RE.exec(text);
        if (!match) {
          return { done: true, outcome: { kind: 'missing-module-declaration' } };
        }
        current = { phase: 'reading-module-name' };
        text = text.slice(match[0].length).trim();
        break;
      }

      case 'reading-module-name': {
        const match = EXPOSING_RE.exec(text);
        if (!match) {
          // Module name (and any effect-module `where` block) continues
          return { done: false, state: current };
        }
        current = { phase: 'awaiting-open-bracket' };
        text = text.slice(match.index + match[0].length).trim();
        break;
      }

      case 'awaiting-open-bracket': {
        const open = text.indexOf('(');
        if (open === -1) {
          return { done: false, state: current };
        }
        current = { phase: 'accumulating-exposed-names', depth: 1, buffer: '' };
        text = text.slice(open + 1);
        break;
      }

      case 'accumulating-exposed-names': {
        let depth = current.depth;
        for (let i = 0; i < text.length; i++) {
          const ch = text[i];
          if (ch === '(') {
            depth++;
          } else if (ch === ')') {
            depth--;
            if (depth === 0) {
              const clause = current.buffer + text.slice(0, i);
              return {
                done: true,
                outcome: { kind: 'exposure', exposure: parseExposingClause(clause) },
              };
            }
          }
        }
        return {
          done: false,
          state: {
            phase: 'accumulating-exposed-names',
            depth,
            buffer: current.buffer + text + '\n',
          },
        };
      }
    }
  }

  return { done: false, state: current };
}

/**
 * Outcome when input ends before the scan completes.
 *
 * Running out of input is always a parse error, including a file that held
 * nothing but blank lines and comments.
 */
export function finishHeaderScan(_state: ScanState): ScanOutcome {
  return { kind: 'parse-error' };
}

// ============================================================================
// Exposing clause
// ============================================================================

/**
 * Parse the text between the exposing clause's outer parentheses.
 *
 * `..` alone is a wildcard. Otherwise the clause is split on commas and
 * only value-level names survive: pieces starting with an uppercase
 * character (types, constructors) and `Type(..)` exports are dropped.
 */
export function parseExposingClause(clause: string): ExposureSet {
  if (clause.trim() === WILDCARD_TOKEN) {
    return { kind: 'wildcard' };
  }

  const names = new Set<string>();
  for (const piece of clause.split(',')) {
    const name = piece.trim();
    if (name === '') continue;
    if (isTypeLevel(name)) continue;
    names.add(name);
  }

  return { kind: 'enumerated', names };
}

function isTypeLevel(name: string): boolean {
  const first = name[0];
  return first !== first.toLowerCase() || name.includes('(..)');
}

// ============================================================================
// Convenience driver
// ============================================================================

/**
 * Scan raw source lines held in memory (comments are stripped here).
 */
export function scanHeader(lines: Iterable<string>): ScanOutcome {
  let state = initialScanState();
  for (const line of stripCommentLines(lines)) {
    const step = advanceHeaderScan(state, line);
    if (step.done) {
      return step.outcome;
    }
    state = step.state;
  }
  return finishHeaderScan(state);
}
