/**
 * @encode-spec/utils
 * 
 * Shared utilities package containing:
 * - Structured logger
 * - Filesystem access
 * - Path utilities
 * - Type guards
 */

// File operations
export { nodeFileSystem, type FileSystem } from './file.js';

// Path utilities
export {
  getBasename,
  withExtension,
} from './path.js';

// Type guards
export {
  isString,
  isNonEmptyString,
  isDefined,
  isOneOf,
} from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
