/**
 * Zod schema for the exposed-tests configuration.
 *
 * Every field has a `.default()` so that `ExposedTestsConfigSchema.parse({})`
 * returns a complete config, and a partial file only overrides what it names.
 *
 * @module config/schema
 */

import { z } from 'zod';
import type { ExposedTestsConfig } from './types.js';

/**
 * Complete config schema with defaults on every field.
 *
 * Usage:
 * ```typescript
 * const config = ExposedTestsConfigSchema.parse({ source_dirs: ['tests', 'benchmarks'] });
 * ```
 */
export const ExposedTestsConfigSchema = z.object({
  source_dirs: z.array(z.string().min(1)).min(1).default(['tests']),
  extensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".elm"'))
    .min(1)
    .default(['.elm']),
  ignore_dirs: z.array(z.string().min(1)).default(['elm-stuff', 'node_modules']),
  test_types: z.array(z.string().min(1)).min(1).default(['Test']),
  concurrency: z.number().int().min(1).max(64).default(8),
  unexposed_severity: z.enum(['warning', 'error']).default('warning'),
});

/**
 * Inferred TypeScript type from the Zod schema.
 *
 * Structurally identical to `ExposedTestsConfig` in types.ts.
 */
export type InferredExposedTestsConfig = z.infer<typeof ExposedTestsConfigSchema>;

/**
 * Default config produced by parsing an empty object.
 */
export const DEFAULT_EXPOSED_TESTS_CONFIG: ExposedTestsConfig = ExposedTestsConfigSchema.parse({});
