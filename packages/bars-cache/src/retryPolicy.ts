/**
 * Retry with exponential backoff for remote provider calls.
 *
 * Retryable failures are timeouts, transport errors and rate-limit
 * rejections. Anything else is fatal and propagates on the first attempt.
 */

import {
  BarVaultError,
  isProviderConnectionError,
  isProviderTimeoutError,
  isRateLimitExceededError,
  ProviderTimeoutError,
} from '@barvault/contracts'
import { createSilentLogger } from '@barvault/logger'
import type { Logger } from '@barvault/logger'
import { defaultSleep } from './rateLimiter.js'

export interface RetryPolicyOptions {
  /** Total attempts including the first (default 3) */
  maxAttempts?: number

  /** Delay before the first retry in ms (default 2000) */
  baseDelayMs?: number

  /** Backoff multiplier (default 2) */
  backoffMultiplier?: number

  /** Upper bound on any single delay */
  maxDelayMs?: number

  /** Timeout per attempt in ms (default 120000) */
  attemptTimeoutMs?: number

  /** ± jitter applied to each delay, in percent (default 0) */
  jitterPercent?: number

  sleep?: (ms: number) => Promise<void>

  /** Returns a number in [0, 1) */
  random?: () => number

  logger?: Logger
}

export interface RetryInfo {
  /** Attempt that just failed, 1-based */
  attempt: number
  delayMs: number
  error: unknown
}

export interface RetryHooks {
  onRetry?: (info: RetryInfo) => void

  /** Label used in log lines */
  operationName?: string
}

export type RetryableOperation<T> = (attempt: number, signal: AbortSignal) => Promise<T>

/**
 * Every attempt failed with a retryable error.
 */
export class RetryExhaustedError extends BarVaultError {
  readonly attempts: number
  readonly lastError: unknown

  constructor(attempts: number, lastError: unknown) {
    super('RETRY_EXHAUSTED', `Gave up after ${attempts} attempts: ${describeError(lastError)}`, {
      attempts,
      lastError: describeError(lastError),
    }, { cause: lastError })
    this.attempts = attempts
    this.lastError = lastError
  }
}

export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return error instanceof RetryExhaustedError
}

const RETRYABLE_CODES: ReadonlySet<string> = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN'])

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Classifies a failure as retryable or fatal.
 */
export function isRetryableError(error: unknown): boolean {
  if (isProviderTimeoutError(error) || isProviderConnectionError(error) || isRateLimitExceededError(error)) {
    return true
  }
  if (error instanceof BarVaultError) {
    return false
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return RETRYABLE_CODES.has(error.code)
  }
  return false
}

function applyJitter(delayMs: number, jitterPercent: number, random: () => number): number {
  const jitter = delayMs * (jitterPercent / 100)
  return Math.max(0, delayMs + (random() * 2 - 1) * jitter)
}

/**
 * Example:
 * ```typescript
 * const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 2000 })
 *
 * const result = await policy.execute((attempt, signal) =>
 *   client.fetchBars({ ...request, signal })
 * )
 * ```
 */
export class RetryPolicy {
  readonly maxAttempts: number
  readonly baseDelayMs: number
  readonly backoffMultiplier: number
  readonly maxDelayMs: number
  readonly attemptTimeoutMs: number
  readonly jitterPercent: number

  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number
  private readonly logger: Logger

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3)
    this.baseDelayMs = options.baseDelayMs ?? 2000
    this.backoffMultiplier = options.backoffMultiplier ?? 2
    this.maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 120_000
    this.jitterPercent = options.jitterPercent ?? 0
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'retry-policy' })
  }

  /**
   * Delay before retrying after the given failed attempt (1-based).
   *
   * Example: with the defaults, attempt 1 → 2000ms, attempt 2 → 4000ms
   */
  delayFor(attempt: number, error?: unknown): number {
    const backoff = this.baseDelayMs * Math.pow(this.backoffMultiplier, attempt - 1)
    const floor = isRateLimitExceededError(error) ? error.retryAfterMs : 0
    const delay = Math.min(Math.max(backoff, floor), Math.max(this.maxDelayMs, floor))
    return applyJitter(delay, this.jitterPercent, this.random)
  }

  /**
   * Runs the operation until it succeeds, fails fatally or runs out of attempts.
   *
   * @throws RetryExhaustedError once every attempt failed with a retryable error
   */
  async execute<T>(operation: RetryableOperation<T>, hooks: RetryHooks = {}): Promise<T> {
    const operationName = hooks.operationName ?? 'operation'
    let lastError: unknown

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await this.runAttempt(operation, attempt)
      } catch (error) {
        lastError = error
        if (!isRetryableError(error)) {
          throw error
        }
        if (attempt === this.maxAttempts) {
          break
        }

        const delayMs = this.delayFor(attempt, error)
        this.logger.info(`Retrying ${operationName} after transient error`, {
          attempt,
          maxAttempts: this.maxAttempts,
          delayMs: Math.round(delayMs),
          error: describeError(error),
        })
        hooks.onRetry?.({ attempt, delayMs, error })
        await this.sleep(delayMs)
      }
    }

    throw new RetryExhaustedError(this.maxAttempts, lastError)
  }

  private async runAttempt<T>(operation: RetryableOperation<T>, attempt: number): Promise<T> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(
          new ProviderTimeoutError(`Attempt ${attempt} timed out after ${this.attemptTimeoutMs}ms`, {
            timeoutMs: this.attemptTimeoutMs,
            attempt,
          })
        )
      }, this.attemptTimeoutMs)
    })

    try {
      return await Promise.race([operation(attempt, controller.signal), timeout])
    } finally {
      clearTimeout(timer)
    }
  }
}
