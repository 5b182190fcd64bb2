/**
 * Loads `.exposed-tests.json`. An absent file means defaults; anything the
 * schema rejects surfaces as an `ExposedTestsConfigError`.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { ExposedTestsConfigSchema, DEFAULT_EXPOSED_TESTS_CONFIG } from './schema.js';
import type { ExposedTestsConfig } from './types.js';

export const DEFAULT_CONFIG_PATH = '.exposed-tests.json';

// ============================================================================
// Error type
// ============================================================================

/** `field` is the dotted path of the first rejected key, when there is one. */
export class ExposedTestsConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ExposedTestsConfigError';
  }
}

// ============================================================================
// Public API
// ============================================================================

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * @throws {ExposedTestsConfigError} When the file is not JSON or a field is out of bounds
 */
export async function readExposedTestsConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<ExposedTestsConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_EXPOSED_TESTS_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ExposedTestsConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = ExposedTestsConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new ExposedTestsConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}

/** Same checks as the reader, on an already-parsed value. */
export function validateExposedTestsConfig(
  raw: unknown,
): { valid: true; config: ExposedTestsConfig } | { valid: false; errors: string[] } {
  const result = ExposedTestsConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return { valid: false, errors: formatIssues(result.error.issues) };
}
