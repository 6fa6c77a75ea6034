/**
 * @letterbox/utils
 *
 * Shared utilities package containing:
 * - Command execution wrappers
 * - File operations
 * - Time helpers
 * - Logger
 */

// Command execution
export {
  executeCommand,
  streamCommand,
  splitLines,
  type CommandResult,
  type CommandOptions,
  type StreamingCommand,
} from './command.js';

// File operations
export { ensureDir, pathExists, removeFile } from './file.js';

// Time utilities
export { formatDuration, parseTimestamp } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
