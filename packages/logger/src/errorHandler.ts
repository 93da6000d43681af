/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Errors are logged, then the process exits with code 1.
 */

import type { Logger } from './types.js';

/**
 * How long to wait for transports to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Attaches global error handlers to the Node.js process.
 *
 * Repeated calls are ignored with a warning.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
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
  });

  process.on('unhandledRejection', (reason: unknown) => {
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
  });

  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
}

/**
 * Ends the logger and exits once it has flushed, or after the timeout.
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
