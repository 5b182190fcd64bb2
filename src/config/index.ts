/**
 * Config module — barrel exports.
 *
 * @module config
 */

export type { ExposedTestsConfig } from './types.js';

export {
  ExposedTestsConfigSchema,
  DEFAULT_EXPOSED_TESTS_CONFIG,
} from './schema.js';
export type { InferredExposedTestsConfig } from './schema.js';

export {
  readExposedTestsConfig,
  validateExposedTestsConfig,
  ExposedTestsConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
