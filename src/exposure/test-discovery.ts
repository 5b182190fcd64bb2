/**
 * Candidate test discovery.
 *
 * Finds the top-level values a module annotates with a test type, e.g.
 *
 *     suite : Test
 *     suite =
 *         describe "..." [ ... ]
 *
 *     other :
 *         Test.Test
 *
 * Annotations must start at column 0 and name a value-level identifier.
 * These names are the candidates later checked against the module's
 * exposing clause.
 *
 * @module exposure/test-discovery
 */

import { stripComments } from './comment-stripper.js';
import { readSourceLines, sourceProblemFromError } from './source-reader.js';
import type { SourceProblem } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type DiscoveryResult =
  | { success: true; names: Set<string> }
  | { success: false; problem: SourceProblem };

// ============================================================================
// Constants
// ============================================================================

/** Default type names that mark a value as a test. */
export const DEFAULT_TEST_TYPES: readonly string[] = ['Test'];

/** `name : Type` at column 0; group 2 may be empty when the type wraps. */
const ANNOTATION_RE = /^([a-z][\w']*)\s*:(?!:)\s*(.*)$/;

// ============================================================================
// Discovery
// ============================================================================

/**
 * Incremental matcher over comment-stripped lines.
 */
export class TestAnnotationMatcher {
  private readonly testTypes: ReadonlySet<string>;
  private pendingName: string | null = null;
  readonly names = new Set<string>();

  constructor(testTypes: readonly string[] = DEFAULT_TEST_TYPES) {
    this.testTypes = new Set(testTypes);
  }

  /**
   * Feed one comment-stripped line.
   */
  accept(line: string): void {
    if (line.trim() === '') return;

    if (this.pendingName !== null) {
      const name = this.pendingName;
      this.pendingName = null;
      // Wrapped type must be indented under its annotation
      if (/^\s/.test(line)) {
        if (this.testTypes.has(line.trim())) {
          this.names.add(name);
        }
        return;
      }
    }

    const match = ANNOTATION_RE.exec(line);
    if (!match) return;

    const [, name, type] = match;
    const typeText = type.trim();
    if (typeText === '') {
      this.pendingName = name;
    } else if (this.testTypes.has(typeText)) {
      this.names.add(name);
    }
  }
}

/**
 * Collect test names from in-memory source lines.
 */
export function findTestNames(
  lines: Iterable<string>,
  testTypes: readonly string[] = DEFAULT_TEST_TYPES,
): Set<string> {
  const matcher = new TestAnnotationMatcher(testTypes);
  let inside = false;
  for (const raw of lines) {
    const stripped = stripComments(raw, inside);
    inside = stripped.insideBlockComment;
    matcher.accept(stripped.line);
  }
  return matcher.names;
}

/**
 * Collect test names from a module file.
 */
export async function discoverTestNames(
  filePath: string,
  testTypes: readonly string[] = DEFAULT_TEST_TYPES,
): Promise<DiscoveryResult> {
  const matcher = new TestAnnotationMatcher(testTypes);
  let inside = false;

  try {
    for await (const raw of readSourceLines(filePath)) {
      const stripped = stripComments(raw, inside);
      inside = stripped.insideBlockComment;
      matcher.accept(stripped.line);
    }
  } catch (err) {
    return { success: false, problem: sourceProblemFromError(err) };
  }

  return { success: true, names: matcher.names };
}
