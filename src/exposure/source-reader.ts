/**
 * Streaming line reader for module sources.
 *
 * Opens the file through a FileHandle so that open failures and
 * mid-stream read failures can be told apart, then yields lines via
 * readline without loading the whole file. Stopping iteration early
 * (e.g. once a header is parsed) closes the stream.
 *
 * @module exposure/source-reader
 */

import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { SourceProblem } from './types.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when a source file cannot be opened.
 */
export class SourceOpenError extends Error {
  override name = 'SourceOpenError' as const;

  constructor(
    public readonly path: string,
    public readonly error: NodeJS.ErrnoException,
  ) {
    super(`Cannot open ${path}: ${error.message}`);
  }
}

/**
 * Thrown when reading an opened source file fails.
 */
export class SourceReadError extends Error {
  override name = 'SourceReadError' as const;

  constructor(
    public readonly path: string,
    public readonly error: NodeJS.ErrnoException,
  ) {
    super(`Cannot read ${path}: ${error.message}`);
  }
}

// ============================================================================
// Reading
// ============================================================================

function toErrnoException(err: unknown): NodeJS.ErrnoException {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Yield the lines of a UTF-8 source file, one at a time.
 *
 * @throws {SourceOpenError} If the file cannot be opened
 * @throws {SourceReadError} If reading fails after the file was opened
 */
export async function* readSourceLines(filePath: string): AsyncGenerator<string> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (err) {
    throw new SourceOpenError(filePath, toErrnoException(err));
  }

  const stream = handle.createReadStream({ encoding: 'utf8' });
  const rl = createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      yield line;
    }
  } catch (err) {
    throw new SourceReadError(filePath, toErrnoException(err));
  } finally {
    rl.close();
    // autoClose releases the handle once the stream is destroyed
    stream.destroy();
  }
}

/**
 * Translate a reader error into a problem value.
 *
 * Errors that did not come from the reader are rethrown.
 */
export function sourceProblemFromError(err: unknown): SourceProblem {
  if (err instanceof SourceOpenError) {
    return { kind: 'open-failed', path: err.path, error: err.error };
  }
  if (err instanceof SourceReadError) {
    return { kind: 'read-failed', path: err.path, error: err.error };
  }
  throw err;
}
