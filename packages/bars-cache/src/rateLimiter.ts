/**
 * Sliding-window rate limiter for outbound provider requests.
 *
 * At most `maxRequests` acquisitions complete within any window of
 * `windowMs`, where maxRequests = floor(limit × safetyFactor) (at least 1).
 * Callers are admitted in the order they called acquire().
 */

import { InvalidRequestError } from '@barvault/contracts'
import { createSilentLogger } from '@barvault/logger'
import type { Logger } from '@barvault/logger'

export interface RateLimiterOptions {
  /** Provider's advertised limit, requests per window */
  limit: number

  /** Fraction of the advertised limit actually used (default 0.9) */
  safetyFactor?: number

  /** Window length in ms (default 1000) */
  windowMs?: number

  /** Monotonic clock in ms */
  clock?: () => number

  /** Sleep implementation, replaced in tests */
  sleep?: (ms: number) => Promise<void>

  logger?: Logger
}

export const DEFAULT_SAFETY_FACTOR = 0.9
export const DEFAULT_WINDOW_MS = 1000

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Effective per-window budget.
 *
 * Example: `effectiveLimit(50, 0.9)` → `45`
 */
export function effectiveLimit(limit: number, safetyFactor: number): number {
  return Math.max(1, Math.floor(limit * safetyFactor + 1e-9))
}

/**
 * Example:
 * ```typescript
 * const limiter = new SlidingWindowRateLimiter({ limit: 50 })
 *
 * await limiter.acquire()
 * const bars = await client.fetchBars(request)
 * ```
 */
export class SlidingWindowRateLimiter {
  readonly maxRequests: number
  readonly windowMs: number

  private readonly timestamps: number[] = []
  private queue: Promise<void> = Promise.resolve()
  private readonly clock: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly logger: Logger

  constructor(options: RateLimiterOptions) {
    const safetyFactor = options.safetyFactor ?? DEFAULT_SAFETY_FACTOR
    if (!Number.isFinite(options.limit) || options.limit <= 0) {
      throw new InvalidRequestError('Rate limit must be a positive number', { limit: options.limit })
    }
    if (!(safetyFactor > 0 && safetyFactor <= 1)) {
      throw new InvalidRequestError('Safety factor must be in (0, 1]', { safetyFactor })
    }

    this.maxRequests = effectiveLimit(options.limit, safetyFactor)
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS
    this.clock = options.clock ?? (() => performance.now())
    this.sleep = options.sleep ?? defaultSleep
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'rate-limiter' })
  }

  /**
   * Resolves once a request slot is free in the current window.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot())
    // Keep the chain alive for later callers even if this turn rejects
    this.queue = turn.catch((error: unknown) => {
      this.logger.error('rate_limiter_wait_failed', { error })
    })
    return turn
  }

  /**
   * Acquisitions recorded in the current window.
   */
  inFlight(): number {
    this.prune(this.clock())
    return this.timestamps.length
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock()
      this.prune(now)
      const oldest = this.timestamps[0]
      if (this.timestamps.length < this.maxRequests || oldest === undefined) {
        this.timestamps.push(now)
        return
      }

      const waitMs = Math.max(0, oldest + this.windowMs - now)
      this.logger.debug('rate_limit_wait', { wait_ms: waitMs, max_requests: this.maxRequests })
      await this.sleep(waitMs)
    }
  }

  private prune(now: number): void {
    while (this.timestamps.length > 0) {
      const oldest = this.timestamps[0]
      if (oldest === undefined || oldest + this.windowMs > now) {
        break
      }
      this.timestamps.shift()
    }
  }
}
