/**
 * Type definitions for the exposed-tests project configuration.
 *
 * Read from `.exposed-tests.json` at the project root. Every field is
 * optional in the file; the schema fills in defaults.
 *
 * @module config/types
 */

/**
 * Fully populated exposed-tests configuration.
 */
export interface ExposedTestsConfig {
  /** Directories searched for test modules when no paths are given. */
  source_dirs: string[];
  /** File extensions treated as module sources. */
  extensions: string[];
  /** Directory names never descended into. */
  ignore_dirs: string[];
  /** Type names whose top-level values count as tests. */
  test_types: string[];
  /** Maximum modules checked concurrently (1-64). */
  concurrency: number;
  /** Severity reported for tests that exist but are not exposed. */
  unexposed_severity: 'warning' | 'error';
}
