/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Errors are logged, then the process exits with code 1.
 */

import type { Logger } from './types.js';

export interface GlobalHandlerOptions {
  /** Time allowed for transports to flush before a forced exit */
  flushTimeoutMs?: number;

  /** Exit hook, replaced in tests */
  exit?: (code: number) => void;
}

const DEFAULT_FLUSH_TIMEOUT_MS = 3000;

let detachCurrent: (() => void) | null = null;

function describeReason(reason: unknown): Record<string, unknown> {
  return reason instanceof Error
    ? { name: reason.name, message: reason.message, stack: reason.stack }
    : { message: String(reason) };
}

/**
 * Attaches uncaughtException / unhandledRejection / warning handlers.
 * Only one set is attached per process; later calls log a warning and
 * return the existing detach function.
 *
 * @returns Function that removes the handlers again
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): () => void {
  if (detachCurrent) {
    logger.warn('Global error handlers already attached, skipping');
    return detachCurrent;
  }

  const flushTimeoutMs = options.flushTimeoutMs ?? DEFAULT_FLUSH_TIMEOUT_MS;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  const fatal = (event: string, reason: unknown) => {
    logger.error(`${event} - process will exit`, { error: describeReason(reason), event, fatal: true });
    flushAndExit(logger, 1, flushTimeoutMs, exit);
  };

  const onUncaughtException = (error: Error) => fatal('uncaughtException', error);
  const onUnhandledRejection = (reason: unknown) => fatal('unhandledRejection', reason);
  const onWarning = (warning: Error) => {
    logger.warn('Process warning emitted', { warning: describeReason(warning), event: 'warning' });
  };

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);
  process.on('warning', onWarning);

  const detach = () => {
    process.off('uncaughtException', onUncaughtException);
    process.off('unhandledRejection', onUnhandledRejection);
    process.off('warning', onWarning);
    detachCurrent = null;
  };
  detachCurrent = detach;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
  return detach;
}

/**
 * Ends the logger and exits once it reports 'finish', or after the timeout.
 */
function flushAndExit(logger: Logger, exitCode: number, timeoutMs: number, exit: (code: number) => void): void {
  const timeoutId = setTimeout(() => exit(exitCode), timeoutMs);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    exit(exitCode);
  });
  logger.end();
}
