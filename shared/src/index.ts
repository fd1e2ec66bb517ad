/**
 * episode-calendar Plugin Utilities
 * Shared utilities for building episode-calendar plugins
 */

export * from './types.js';
export * from './logger.js';
export * from './validation.js';

// Re-export commonly used items at top level
export { createLogger, resolveLogLevel, Logger } from './logger.js';
export {
  validatePort,
  validatePositiveInt,
  validateEnum,
} from './validation.js';
