/**
 * @fileoverview Custom Winston formats.
 * Sensitive-field redaction, standard fields with correlation id injection,
 * and pretty-print output.
 */

import { format } from 'winston';
import { getCorrelationId } from './correlation-context.js';

/**
 * Field names whose values never reach a log line.
 * Matched case-insensitively against keys at any depth.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /auth/i,
  /private[_-]?key/i,
  /credential/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own fields, never redacted */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced, at any depth.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ provider: 'fixture', apiKey: 'test-secret' });
 * // { provider: 'fixture', apiKey: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Applied first in the chain so nothing downstream sees the raw values.
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks, and correlation_id from the active
 * AsyncLocalStorage context when the entry does not carry one.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const correlationId = getCorrelationId();
    if (correlationId && !info['correlation_id']) {
      info['correlation_id'] = correlationId;
    }
    return info;
  })()
);

/** Fields promoted to the front of a pretty-printed line, in this order */
const PROMOTED_FIELDS = ['component', 'instrument_id', 'timeframe_spec', 'correlation_id'];

/**
 * Human-readable output for development.
 *
 * @example
 * ```
 * [2025-09-29T12:34:56.789+00:00] info: fetch_completed component=fetch-orchestrator instrument_id=ACME.XNAS bars=390
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const context: string[] = [];
    for (const key of PROMOTED_FIELDS) {
      const value = info[key];
      if (value !== undefined && value !== null && value !== '') {
        context.push(`${key}=${String(value)}`);
      }
    }

    for (const [key, value] of Object.entries(info)) {
      if (CORE_FIELDS.has(key) || key === 'splat' || PROMOTED_FIELDS.includes(key)) {
        continue;
      }
      context.push(`${key}=${typeof value === 'bigint' ? value.toString() : JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(info['timestamp'])}] ${info.level}: ${String(info.message)}${contextStr}`;

    const stack = info['stack'];
    return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
  })
);
