/**
 * Picks the timeframe for a request that may not name one.
 */

import {
  DEFAULT_DAY_TIMEFRAME,
  DEFAULT_INTRADAY_TIMEFRAME,
  isUtcMidnight,
  normalizeTimeframeSpec,
  toNanos,
} from '@barvault/contracts'
import type { TimeInput } from '@barvault/contracts'

export interface TimeframeDefaults {
  /** Used when the request start is a date or UTC midnight (default 1-DAY-LAST) */
  day?: string

  /** Used when the request start carries a time of day (default 1-MINUTE-LAST) */
  intraday?: string
}

export class TimeframeResolver {
  readonly daySpec: string
  readonly intradaySpec: string

  constructor(defaults: TimeframeDefaults = {}) {
    this.daySpec = normalizeTimeframeSpec(defaults.day ?? DEFAULT_DAY_TIMEFRAME)
    this.intradaySpec = normalizeTimeframeSpec(defaults.intraday ?? DEFAULT_INTRADAY_TIMEFRAME)
  }

  /**
   * An explicit spec (or alias) wins; otherwise the start decides.
   *
   * Example:
   * ```typescript
   * resolver.resolve('2024-01-02')                   // '1-DAY-LAST'
   * resolver.resolve('2024-01-02T14:30:00Z')         // '1-MINUTE-LAST'
   * resolver.resolve('2024-01-02', 'daily')          // '1-DAY-LAST'
   * ```
   */
  resolve(start: TimeInput, explicit?: string): string {
    if (explicit !== undefined && explicit.trim() !== '') {
      return normalizeTimeframeSpec(explicit)
    }
    return isUtcMidnight(toNanos(start)) ? this.daySpec : this.intradaySpec
  }
}
