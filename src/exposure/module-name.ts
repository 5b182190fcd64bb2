/**
 * Derive dotted module names from file paths.
 *
 * `tests/Parser/ExprTest.elm` under source dir `tests` is `Parser.ExprTest`.
 *
 * @module exposure/module-name
 */

import { extname, isAbsolute, relative, sep } from 'node:path';

const MODULE_SEGMENT_RE = /^[A-Z][A-Za-z0-9_]*$/;

/**
 * Module name for a file relative to its source directory.
 *
 * @returns The dotted name, or null when the file lies outside `sourceDir`
 *          or a path segment is not a valid module name segment
 */
export function moduleNameFromPath(filePath: string, sourceDir: string): string | null {
  const rel = relative(sourceDir, filePath);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }

  const withoutExt = rel.slice(0, rel.length - extname(rel).length);
  const segments = withoutExt.split(sep);
  if (!segments.every((segment) => MODULE_SEGMENT_RE.test(segment))) {
    return null;
  }

  return segments.join('.');
}
