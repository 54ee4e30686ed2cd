/**
 * @fileoverview Global handlers for uncaught exceptions and unhandled rejections.
 * Errors are logged before the process terminates.
 */

import type { Logger } from './types.js';

/**
 * How long to wait for transports to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let attachedLogger: Logger | null = null;

function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Attaches process-level handlers that log fatal errors and exit with code 1.
 * Warnings are logged and execution continues.
 *
 * Returns a function that removes the handlers again. Attaching twice is a
 * no-op (logged at warn) and the returned function does nothing.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (attachedLogger) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const uncaughtExceptionHandler = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const warningHandler = (warning: Error): void => {
    logger.warn('Process warning emitted', {
      warning: describeError(warning),
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);
  attachedLogger = logger;

  logger.debug('Global error handlers attached', {
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
 * Ends the logger and exits once transports finish, or after the flush
 * timeout, whichever comes first.
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
