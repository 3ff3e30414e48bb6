/**
 * Structured JSON logger for Fathom
 *
 * Provides configurable logging with:
 * - JSON output format (or pino-pretty for humans)
 * - Configurable log levels
 * - Optional file output
 *
 * Loggers are created from configuration and handed to components;
 * there is no process-wide default instance.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';
import type { LoggingConfig } from '../config/schema.js';

/**
 * Context metadata for log entries
 */
export interface LogContext {
  /** Component emitting the entry */
  component?: string;
  /** Project name for scoped operations */
  project?: string;
  /** Operation name */
  operation?: string;
  [key: string]: unknown;
}

export type FathomLogger = Logger;

/**
 * Where log lines go when no file is configured
 */
export type LogStream = 'stdout' | 'stderr';

function createDestination(
  config: LoggingConfig,
  stream: LogStream
): DestinationStream {
  if (config.file !== undefined && config.file !== '') {
    return pino.destination({ dest: config.file, append: true, mkdir: true, sync: false });
  }
  return pino.destination(stream === 'stderr' ? 2 : 1);
}

function createLoggerOptions(config: LoggingConfig, stream: LogStream): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'fathom',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty && (config.file === undefined || config.file === '')) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
        destination: stream === 'stderr' ? 2 : 1,
      },
    };
  }

  return options;
}

/**
 * Create a configured logger instance
 *
 * @param stream - Standard stream used when no log file is configured.
 *   The CLI and the MCP server log to stderr so stdout stays clean.
 */
export function createLogger(
  config: LoggingConfig,
  stream: LogStream = 'stdout'
): FathomLogger {
  const options = createLoggerOptions(config, stream);

  // A transport owns its own destination
  if (options.transport !== undefined) {
    return pino(options);
  }
  return pino(options, createDestination(config, stream));
}

/**
 * A logger that discards everything
 */
export function createSilentLogger(): FathomLogger {
  return pino({ level: 'silent' });
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(logger: FathomLogger, context: LogContext): FathomLogger {
  return logger.child(context);
}
