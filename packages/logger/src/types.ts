/**
 * @fileoverview Type definitions for the catalog logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that abort an operation
 * - 'warn': Degraded conditions (skipped corrupt files, retries)
 * - 'info': Normal operations (fetches, imports, cache rebuilds)
 * - 'debug': Per-request detail (cache hits, rate limiter waits)
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/catalog.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Child logger context fields.
 *
 * @example
 * ```typescript
 * const storeLogger = logger.child({ component: 'column-store' });
 * storeLogger.info('partition_written'); // includes component=column-store
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'column-store', 'fetch-orchestrator') */
  component?: string;

  /** Instrument context, `SYMBOL.VENUE` */
  instrument_id?: string;

  /** Timeframe spec context, e.g. '1-MINUTE-LAST' */
  timeframe_spec?: string;

  /** Correlation id context */
  correlation_id?: string;

  [key: string]: unknown;
}

/**
 * Winston's logger interface (info(), warn(), error(), debug(), child()).
 */
export type Logger = WinstonLogger;
