/**
 * @equirect/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Time formatting
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export {
  isErrnoException,
  pathExists,
  isFile,
  isDirectory,
  removeIfExists,
  writeFileAtomic,
  isAtomicTempFor,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
} from './path.js';

// Type guards
export {
  isInteger,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  formatFileTimestamp,
  formatClockTime,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
