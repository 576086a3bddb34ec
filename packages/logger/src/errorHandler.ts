/**
 * @fileoverview Global handlers for uncaught exceptions and unhandled rejections
 */

import type { Logger } from './types.js';

/**
 * How long to wait for transports to flush before forcing the exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Attaches process-level handlers that log the failure and terminate with
 * exit code 1. Later calls leave the first set in place.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'warn' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.debug('Global error handlers already attached, skipping');
    return;
  }

  const uncaughtExceptionHandler = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    const errorInfo =
      reason instanceof Error
        ? {
            name: reason.name,
            message: reason.message,
            stack: reason.stack,
          }
        : {
            message: String(reason),
          };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);

  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
}

/**
 * Ends the logger and exits once it reports `finish`, or after
 * FLUSH_TIMEOUT_MS, whichever comes first.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
