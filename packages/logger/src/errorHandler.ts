/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Both are logged, then the process exits once the logger has
 * flushed.
 */

import type { Logger } from './types.js';

/** How long to wait for transports to flush before forcing exit. */
const FLUSH_TIMEOUT_MS = 3000;

let attachedLogger: Logger | null = null;

/**
 * Attaches global error handlers to the Node.js process.
 *
 * Fail-fast: after an uncaught error the buffers and timers of the live
 * service are in an unknown state, so the process logs and exits with code 1
 * instead of continuing.
 *
 * @returns A function that detaches the handlers again
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const detach = attachGlobalHandlers(logger);
 * // ...
 * detach();
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (attachedLogger) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const uncaughtExceptionHandler = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: { name: error.name, message: error.message, stack: error.stack },
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

  // Warnings (deprecations, MaxListenersExceeded) are logged but not fatal.
  const warningHandler = (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);
  attachedLogger = logger;

  logger.info('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    attachedLogger = null;
  };
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
