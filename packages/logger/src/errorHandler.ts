/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections.
 * Errors are logged before the process terminates.
 */

import type { Logger } from './types.js';

/**
 * How long to wait for transports to flush before exiting anyway.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Attaches process-level handlers that log uncaught exceptions and unhandled
 * rejections, then exit with status 1. Process warnings are logged only.
 *
 * Returns a function that removes the handlers again.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const uncaughtExceptionHandler = (error: Error) => {
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

  const unhandledRejectionHandler = (reason: unknown) => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  const warningHandler = (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);

  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    handlersAttached = false;
  };
}

/**
 * Ends the logger, then exits once it has flushed or the timeout expires.
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
