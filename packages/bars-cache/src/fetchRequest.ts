/**
 * Fetch request lifecycle.
 *
 *   PENDING → IN_PROGRESS → COMPLETED
 *                         → FAILED → PENDING (while retryCount < maxRetries)
 *
 * Transitions are pure: each returns a new request and leaves the input
 * untouched. The ledger keeps recent requests and publishes transitions.
 */

import { randomUUID } from 'node:crypto'
import { BarVaultError } from '@barvault/contracts'
import type { FetchRequest, FetchStatus } from '@barvault/contracts'
import { FetchEventBus } from './events.js'

export interface NewFetchRequest {
  instrumentId: string
  timeframeSpec: string
  start: bigint
  end: bigint
  maxRetries: number
  requestId?: string
}

export class InvalidFetchTransitionError extends BarVaultError {
  constructor(request: FetchRequest, to: FetchStatus, reason?: string) {
    super(
      'INVALID_FETCH_TRANSITION',
      `Cannot move fetch ${request.requestId} from ${request.status} to ${to}${reason ? `: ${reason}` : ''}`,
      { requestId: request.requestId, from: request.status, to }
    )
  }
}

export function createFetchRequest(input: NewFetchRequest, now: number = Date.now()): FetchRequest {
  return {
    requestId: input.requestId ?? randomUUID(),
    instrumentId: input.instrumentId,
    timeframeSpec: input.timeframeSpec,
    start: input.start,
    end: input.end,
    status: 'PENDING',
    retryCount: 0,
    maxRetries: input.maxRetries,
    error: null,
    createdAt: now,
    completedAt: null,
  }
}

function expectStatus(request: FetchRequest, expected: FetchStatus, to: FetchStatus): void {
  if (request.status !== expected) {
    throw new InvalidFetchTransitionError(request, to)
  }
}

export function startFetch(request: FetchRequest): FetchRequest {
  expectStatus(request, 'PENDING', 'IN_PROGRESS')
  return { ...request, status: 'IN_PROGRESS' }
}

export function completeFetch(request: FetchRequest, now: number = Date.now()): FetchRequest {
  expectStatus(request, 'IN_PROGRESS', 'COMPLETED')
  return { ...request, status: 'COMPLETED', error: null, completedAt: now }
}

export function failFetch(request: FetchRequest, error: string, now: number = Date.now()): FetchRequest {
  expectStatus(request, 'IN_PROGRESS', 'FAILED')
  return { ...request, status: 'FAILED', error, completedAt: now }
}

/**
 * Re-queues a failed request, consuming one retry.
 */
export function retryFetch(request: FetchRequest): FetchRequest {
  expectStatus(request, 'FAILED', 'PENDING')
  if (request.retryCount >= request.maxRetries) {
    throw new InvalidFetchTransitionError(request, 'PENDING', `retry budget of ${request.maxRetries} is spent`)
  }
  return { ...request, status: 'PENDING', retryCount: request.retryCount + 1, error: null, completedAt: null }
}

export interface FetchRequestLedgerOptions {
  /** Requests kept in history (default 100) */
  historyLimit?: number
  events?: FetchEventBus
  clock?: () => number
}

/**
 * Tracks fetch requests by id and publishes each transition.
 *
 * Example:
 * ```typescript
 * const ledger = new FetchRequestLedger()
 * let request = ledger.open({ instrumentId, timeframeSpec, start, end, maxRetries: 2 })
 * request = ledger.start(request.requestId)
 * request = ledger.complete(request.requestId)
 * ```
 */
export class FetchRequestLedger {
  readonly events: FetchEventBus
  private readonly requests = new Map<string, FetchRequest>()
  private readonly historyLimit: number
  private readonly clock: () => number

  constructor(options: FetchRequestLedgerOptions = {}) {
    this.events = options.events ?? new FetchEventBus()
    this.historyLimit = Math.max(1, options.historyLimit ?? 100)
    this.clock = options.clock ?? Date.now
  }

  open(input: NewFetchRequest): FetchRequest {
    const request = createFetchRequest(input, this.clock())
    this.store(request)
    this.publish(null, request)
    return request
  }

  start(requestId: string): FetchRequest {
    return this.transition(requestId, startFetch)
  }

  complete(requestId: string): FetchRequest {
    return this.transition(requestId, (request) => completeFetch(request, this.clock()))
  }

  fail(requestId: string, error: string): FetchRequest {
    return this.transition(requestId, (request) => failFetch(request, error, this.clock()))
  }

  retry(requestId: string): FetchRequest {
    return this.transition(requestId, retryFetch)
  }

  get(requestId: string): FetchRequest | undefined {
    return this.requests.get(requestId)
  }

  /**
   * Oldest first.
   */
  history(): FetchRequest[] {
    return [...this.requests.values()]
  }

  private transition(requestId: string, apply: (request: FetchRequest) => FetchRequest): FetchRequest {
    const current = this.requests.get(requestId)
    if (!current) {
      throw new BarVaultError('FETCH_REQUEST_NOT_FOUND', `Unknown fetch request ${requestId}`, { requestId })
    }
    const next = apply(current)
    this.store(next)
    this.publish(current.status, next)
    return next
  }

  private store(request: FetchRequest): void {
    // Re-insert so the most recently touched request is last
    this.requests.delete(request.requestId)
    this.requests.set(request.requestId, request)
    while (this.requests.size > this.historyLimit) {
      const oldest = this.requests.keys().next()
      if (oldest.done) {
        break
      }
      this.requests.delete(oldest.value)
    }
  }

  private publish(from: FetchStatus | null, request: FetchRequest): void {
    this.events.emit('transition', { from, to: request.status, request, at: this.clock() })
  }
}
