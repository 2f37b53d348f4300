/**
 * @fileoverview Correlation context using AsyncLocalStorage.
 * A correlation id ties together every log line and every persisted
 * partition produced by one logical request.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface CorrelationContext {
  /** Unique correlation identifier (UUID v4 unless supplied) */
  correlation_id: string;

  [key: string]: unknown;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * @example
 * ```typescript
 * generateCorrelationId(); // "550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

export function getCorrelationContext(): CorrelationContext | undefined {
  return correlationStorage.getStore();
}

export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore()?.correlation_id;
}

/**
 * Runs `fn` inside a correlation context. The id propagates through every
 * async continuation started from `fn`.
 *
 * @param fn - Function to execute within the context
 * @param correlationId - Id to use; a new one is generated when omitted
 * @param additionalContext - Extra fields stored alongside the id
 *
 * @example
 * ```typescript
 * await withCorrelation(async () => {
 *   await orchestrator.fetchOrLoad('ACME.XNAS', '2024-01-02', '2024-01-05');
 * }, 'cli-fetch-1');
 * ```
 */
export async function withCorrelation<T>(
  fn: () => Promise<T> | T,
  correlationId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: CorrelationContext = {
    ...additionalContext,
    correlation_id: correlationId || generateCorrelationId(),
  };

  return correlationStorage.run(context, fn);
}

/**
 * Synchronous variant of withCorrelation.
 */
export function withCorrelationSync<T>(
  fn: () => T,
  correlationId?: string,
  additionalContext?: Record<string, unknown>
): T {
  const context: CorrelationContext = {
    ...additionalContext,
    correlation_id: correlationId || generateCorrelationId(),
  };

  return correlationStorage.run(context, fn);
}

/**
 * Merges fields into the active context.
 *
 * @returns false when called outside any context
 */
export function setCorrelationContext(fields: Record<string, unknown>): boolean {
  const context = correlationStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
