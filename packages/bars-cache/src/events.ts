/**
 * Event bus for fetch request lifecycle transitions.
 *
 * Emits an event each time a tracked fetch moves between states, so the
 * CLI and tests can observe retries and failures without polling.
 */

import { createSilentLogger } from '@barvault/logger'
import type { Logger } from '@barvault/logger'
import type { FetchRequest, FetchStatus } from '@barvault/contracts'

/**
 * Event emitted on every fetch state change.
 */
export interface FetchTransitionEvent {
  /**
   * Previous status, null when the request was just created.
   */
  from: FetchStatus | null

  to: FetchStatus

  /**
   * Request snapshot after the transition.
   */
  request: FetchRequest

  /**
   * Unix timestamp (ms) of the transition.
   */
  at: number
}

export type FetchEventListener = (event: FetchTransitionEvent) => void

/**
 * Simple pub-sub for fetch transitions. Listeners run synchronously; a
 * listener that throws is logged and the remaining listeners still run.
 *
 * Example:
 * ```typescript
 * const bus = new FetchEventBus()
 *
 * const unsubscribe = bus.on('transition', (event) => {
 *   if (event.to === 'FAILED') {
 *     console.log(`${event.request.instrumentId} failed: ${event.request.error}`)
 *   }
 * })
 * ```
 */
export class FetchEventBus {
  private listeners: FetchEventListener[] = []
  private readonly logger: Logger

  constructor(logger?: Logger) {
    this.logger = (logger ?? createSilentLogger()).child({ component: 'fetch-events' })
  }

  /**
   * @returns Unsubscribe function
   */
  on(eventType: 'transition', listener: FetchEventListener): () => void {
    this.listeners.push(listener)
    return () => {
      this.off(eventType, listener)
    }
  }

  off(_eventType: 'transition', listener: FetchEventListener): void {
    const index = this.listeners.indexOf(listener)
    if (index !== -1) {
      this.listeners.splice(index, 1)
    }
  }

  emit(_eventType: 'transition', event: FetchTransitionEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event)
      } catch (error) {
        this.logger.warn('fetch_event_listener_failed', {
          request_id: event.request.requestId,
          to: event.to,
          error,
        })
      }
    }
  }

  listenerCount(_eventType: 'transition'): number {
    return this.listeners.length
  }

  removeAllListeners(): void {
    this.listeners = []
  }
}
