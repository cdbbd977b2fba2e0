/**
 * @sftp-writer/utils
 * 
 * Shared utilities package containing:
 * - Retry logic
 * - Structured logging
 * - File, path and time helpers
 * - Type guards
 */

// File operations
export { safeReadFile, getFileSizeBytes, safeFileSizeBytes } from './file.js';

// Retry logic
export { retry, backoffDelay, type RetryOptions } from './retry.js';

// Path utilities
export { ensureTrailingSlash, splitExtension } from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
  isNonEmptyString,
  errorCode,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatTimestamp,
  DEFAULT_TIMESTAMP_FORMAT,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
