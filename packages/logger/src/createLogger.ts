/**
 * @fileoverview Logger factory.
 * Creates configured Winston logger instances with structured logging,
 * sensitive-field redaction, and console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('catalog_opened', { root: './data/catalog' });
 * ```
 *
 * @example
 * ```typescript
 * // Component logger with instrument context
 * const fetchLogger = logger.child({
 *   component: 'fetch-orchestrator',
 *   instrument_id: 'ACME.XNAS',
 *   timeframe_spec: '1-MINUTE-LAST'
 * });
 * fetchLogger.info('fetch_completed', { bars: 390, duration_ms: 120 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Order matters: redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    // Everything goes to stderr so command output on stdout stays clean
    transports.push(
      new winston.transports.Console({
        level,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: json ? undefined : format.uncolorize(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // errorHandler.ts owns process exit
    exitOnError: false,
  });
}

/**
 * A logger that discards every entry. Default for library components
 * constructed without one, and for tests.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    level: 'debug',
    transports: [new winston.transports.Console({ silent: true })],
  });
}

/**
 * Child logger with additional context fields included in every entry.
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}
