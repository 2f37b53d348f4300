/**
 * @fileoverview Performance timing utilities.
 * Uses performance.now() for high-resolution durations, rounded to ms.
 */

export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds so far (or final duration once stopped) */
  elapsed(): number;

  /** Stops the timer and returns the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * await store.query('ACME.XNAS', '1-MINUTE-LAST', start, end);
 * logger.debug('query_completed', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measures an async function.
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = await measureAsync(() => index.rebuild(store));
 * logger.info('availability_rebuilt', { keys: result.size, duration_ms });
 * ```
 */
export async function measureAsync<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}
