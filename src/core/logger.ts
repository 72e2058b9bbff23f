/**
 * Logger Module
 *
 * Configures structured logging using Pino.
 * In development, uses pino-pretty for human-readable colored output.
 * In production, outputs JSON logs for log aggregation systems.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

/**
 * Creates the Pino logger instance
 *
 * - Development: Pretty-printed, colored output for easy reading
 * - Production: JSON output for structured log processing
 * - Log level comes from the LOG_LEVEL setting of the loaded config
 */
export function createLogger(level: string): Logger {
  return pino({
    level,
    transport: process.env.NODE_ENV !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined
  });
}
