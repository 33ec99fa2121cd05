/**
 * Configuration module.
 * Reads the run configuration from environment variables, with an
 * optional YAML/JSON env file underneath. Zod-validated.
 */

export {
  ELEMENT_SIZE,
  DEFAULTS,
  PSEUDO_RANDOM_FILL,
  FLAG_VARIABLES,
  BOUNDED_OPTIONS,
  FILL_PATTERN_VARIABLE,
} from './defaults.js';
export type { FlagField, BoundedField } from './defaults.js';
export * from './errors.js';
export * from './env.js';
export * from './pattern.js';
export { loadConfig, loadEnvFile } from './loader.js';
export type { LoadResult } from './loader.js';
