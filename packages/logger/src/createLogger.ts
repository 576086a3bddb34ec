/**
 * @fileoverview Logger factory for the device-sim scripts
 * Creates configured winston instances with structured logging and secret
 * redaction. The console transport is pinned to stderr.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, LogLevel, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/** Every level goes to stderr; stdout is reserved for device output */
const STDERR_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'warn', json: false });
 * logger.warn('Failed to save output', { device_ip: '10.0.0.1' });
 * ```
 *
 * @example
 * ```typescript
 * // File transport plus a child logger per script
 * const logger = createLogger({
 *   level: 'debug',
 *   filePath: './logs/run-command.log',
 * });
 *
 * const cmdLogger = logger.child({ component: 'run-command' });
 * cmdLogger.debug('Generated output', { command: 'show version', duration_ms: 1 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Order matters: redact first, then standard fields, then output format.
  // Escape codes only when stderr is a terminal.
  const logFormat = format.combine(
    redactPII(),
    standardFields,
    json ? format.json() : prettyPrint(process.stderr.isTTY === true)
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: STDERR_LEVELS,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON so it can be grepped and parsed
        format: format.combine(redactPII(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // attachGlobalHandlers decides when the process exits
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const addLogger = createChildLogger(logger, { component: 'add' });
 * addLogger.info('Sum computed'); // includes component=add
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
