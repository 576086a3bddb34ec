/**
 * @fileoverview Public API exports for @devsim/logger
 * Structured logging and process-level error handling for the device-sim scripts
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export { startTimer, measureSync } from './perf-timer.js';

export { redactSensitiveFields, isSensitiveKey } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';

export type { PerfTimer } from './perf-timer.js';
