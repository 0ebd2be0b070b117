/**
 * @ace/core - Core package
 *
 * Re-exports configuration, the error taxonomy, and shared utilities.
 */

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export {
  sleep,
  retry,
  withTimeout,
  truncate,
  estimateTokens,
  slugify,
  parseModelId,
  isPlainObject,
  deepMerge,
  type RetryOptions,
  type ParsedModelId,
} from './utils/index.js';
