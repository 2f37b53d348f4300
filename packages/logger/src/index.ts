/**
 * @fileoverview Public API exports for @barvault/logger
 */

// Core logger creation
export { createLogger, createSilentLogger, createChildLogger } from './createLogger.js';

// Formats
export { redactPII, redactSensitiveFields, isSensitiveFieldName, standardFields, prettyPrint } from './formats.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';

// Correlation context management
export {
  generateCorrelationId,
  getCorrelationContext,
  getCorrelationId,
  withCorrelation,
  withCorrelationSync,
  setCorrelationContext,
} from './correlation-context.js';

// Performance timing utilities
export { startTimer, measureAsync } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { CorrelationContext } from './correlation-context.js';
export type { PerfTimer } from './perf-timer.js';
