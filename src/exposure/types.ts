/**
 * Type definitions for export-surface checking.
 *
 * An ExposureSet describes what a module's header exports; a Problem is
 * any reason a module's candidate tests could not be accepted as-is.
 * Every failure is a value, never a thrown error, so callers can
 * aggregate results across many modules.
 *
 * @module exposure/types
 */

// ============================================================================
// Exposure
// ============================================================================

/**
 * Export surface parsed from a module header.
 *
 * - `wildcard`: the header reads `exposing (..)`
 * - `enumerated`: the value-level names listed in the exposing clause
 */
export type ExposureSet =
  | { kind: 'wildcard' }
  | { kind: 'enumerated'; names: ReadonlySet<string> };

// ============================================================================
// Problems
// ============================================================================

/** Candidate tests exist in source but the module does not export them. */
export interface UnexposedTestsProblem {
  kind: 'unexposed-tests';
  moduleName: string;
  unexposed: ReadonlySet<string>;
}

/** The first real content of the file is not a module declaration. */
export interface MissingModuleDeclarationProblem {
  kind: 'missing-module-declaration';
  path: string;
}

/** The file could not be opened. */
export interface OpenFailedProblem {
  kind: 'open-failed';
  path: string;
  error: NodeJS.ErrnoException;
}

/** The file was opened but reading it failed part way. */
export interface ReadFailedProblem {
  kind: 'read-failed';
  path: string;
  error: NodeJS.ErrnoException;
}

/** End of input was reached before the exposing clause closed. */
export interface ParseErrorProblem {
  kind: 'parse-error';
  path: string;
}

export type Problem =
  | UnexposedTestsProblem
  | MissingModuleDeclarationProblem
  | OpenFailedProblem
  | ReadFailedProblem
  | ParseErrorProblem;

export type ProblemKind = Problem['kind'];

/** Problems raised by file I/O, shared with test discovery. */
export type SourceProblem = OpenFailedProblem | ReadFailedProblem;

// ============================================================================
// Results
// ============================================================================

/**
 * Result of reconciling a module's candidates against its exports.
 * Discriminated union: check `success` to narrow the type.
 */
export type CheckResult =
  | { success: true; moduleName: string; accepted: ReadonlySet<string> }
  | { success: false; problem: Problem };

/**
 * Result of reading a module header.
 */
export type ReadExposingResult =
  | { success: true; exposure: ExposureSet }
  | {
      success: false;
      problem:
        | MissingModuleDeclarationProblem
        | OpenFailedProblem
        | ReadFailedProblem
        | ParseErrorProblem;
    };

/**
 * Severity assigned to a problem when aggregating a run.
 */
export type ProblemSeverity = 'warning' | 'error';
