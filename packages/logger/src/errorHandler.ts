/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections.
 * Ensures fatal errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Milliseconds to wait for transports to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let detachActive: (() => void) | null = null;

/**
 * Attaches global error handlers to the Node.js process.
 *
 * Uncaught exceptions and unhandled rejections are logged with their stack
 * and the process exits with code 1 once the logger has flushed. Process
 * warnings are logged without exiting.
 *
 * @returns Function that removes the handlers again
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (detachActive) {
    logger.warn('Global error handlers already attached, skipping');
    return detachActive;
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

  const detach = () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    detachActive = null;
  };
  detachActive = detach;

  logger.info('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return detach;
}

/**
 * Exits after the logger has flushed, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
