/**
 * Comment stripping for module source lines.
 *
 * Removes line comments (`--`) and block comments (`{-` ... `-}`) from one
 * line at a time, threading an "inside block comment" flag from line to
 * line. Each call builds a new string; the input is never modified.
 *
 * Block comments are not nested: the first `-}` after a `{-` closes the
 * comment no matter how many `{-` came in between.
 *
 * @module exposure/comment-stripper
 */

// ============================================================================
// Constants
// ============================================================================

export const LINE_COMMENT = '--';
export const BLOCK_COMMENT_OPEN = '{-';
export const BLOCK_COMMENT_CLOSE = '-}';

// ============================================================================
// Types
// ============================================================================

/**
 * A line with its comments removed, plus the flag to carry to the next line.
 */
export interface StrippedLine {
  line: string;
  insideBlockComment: boolean;
}

// ============================================================================
// Stripping
// ============================================================================

/**
 * Remove comment text from a single line.
 *
 * Markers are resolved left to right:
 * - Inside a block comment, only `-}` matters. Text up to and including it
 *   is dropped; with no `-}` the rest of the line is comment.
 * - Outside, whichever of `--` or `{-` comes first wins. `--` drops the rest
 *   of the line; `{-` opens a block comment and scanning continues after it.
 * - A stray `-}` outside a block comment is ordinary text.
 * - The search for `-}` starts after the opener, so `{-}` opens a comment
 *   and does not close it.
 *
 * @param line - Raw source line (without its newline)
 * @param insideBlockComment - Whether the previous line ended inside a block comment
 */
export function stripComments(line: string, insideBlockComment: boolean): StrippedLine {
  let kept = '';
  let rest = line;
  let inside = insideBlockComment;

  for (;;) {
    if (inside) {
      const close = rest.indexOf(BLOCK_COMMENT_CLOSE);
      if (close === -1) {
        return { line: kept, insideBlockComment: true };
      }
      rest = rest.slice(close + BLOCK_COMMENT_CLOSE.length);
      inside = false;
      continue;
    }

    const open = rest.indexOf(BLOCK_COMMENT_OPEN);
    const lineComment = rest.indexOf(LINE_COMMENT);

    if (lineComment !== -1 && (open === -1 || lineComment < open)) {
      return { line: kept + rest.slice(0, lineComment), insideBlockComment: false };
    }

    if (open === -1) {
      return { line: kept + rest, insideBlockComment: false };
    }

    kept += rest.slice(0, open);
    rest = rest.slice(open + BLOCK_COMMENT_OPEN.length);
    inside = true;
  }
}

/**
 * Strip comments from a sequence of lines, carrying block-comment state.
 */
export function* stripCommentLines(lines: Iterable<string>): Generator<string> {
  let inside = false;
  for (const raw of lines) {
    const stripped = stripComments(raw, inside);
    inside = stripped.insideBlockComment;
    yield stripped.line;
  }
}
