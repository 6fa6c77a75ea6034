/**
 * Logger
 *
 * Pino-based structured logger shared by every package.
 * Human-facing CLI output does not go through here; this is the
 * diagnostic channel (commands executed, failures with context).
 */

import { pino } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'warn';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'letterbox',
    env: NODE_ENV,
  },
  // stdout belongs to the CLI's progress output, so pretty logs go to stderr
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
      destination: 2,
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
