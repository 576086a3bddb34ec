/**
 * @fileoverview Type definitions for the device-sim logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': the run cannot continue
 * - 'warn': something degraded (e.g. a save that failed)
 * - 'info': normal lifecycle events
 * - 'debug': generated field values and timings
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'warn',
 *   json: false,
 *   filePath: './logs/run-command.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport, in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output. Console output always goes to stderr,
   * stdout belongs to the script's own result.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress every transport.
   * @default false
   */
  silent?: boolean;
}

/**
 * Context fields carried by a child logger.
 */
export interface ChildLoggerContext {
  component?: string;
  command?: string;
  device_ip?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
