/**
 * @fileoverview Timeframe specs and utilities.
 *
 * A timeframe spec names bar granularity as `STEP-AGGREGATION-PRICE_TYPE`,
 * e.g. `1-MINUTE-LAST` or `1-DAY-LAST`. Day, week and month aggregations are
 * date-level: their coverage is compared on UTC calendar days.
 *
 * @module @barvault/contracts/timeframes
 */

import { InvalidTimeframeError } from './errors.js';
import {
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
} from './time.js';

/**
 * Supported aggregations, ordered from smallest to largest duration.
 */
export const BAR_AGGREGATIONS = ['SECOND', 'MINUTE', 'HOUR', 'DAY', 'WEEK', 'MONTH'] as const;
export type BarAggregation = (typeof BAR_AGGREGATIONS)[number];

export const PRICE_TYPES = ['BID', 'ASK', 'MID', 'LAST'] as const;
export type PriceType = (typeof PRICE_TYPES)[number];

/**
 * Structured form of a timeframe spec.
 *
 * @invariant step is a positive integer
 */
export interface TimeframeSpec {
  step: number;
  aggregation: BarAggregation;
  priceType: PriceType;
}

/** Default spec for date-only requests */
export const DEFAULT_DAY_TIMEFRAME = '1-DAY-LAST';

/** Default spec for requests with a time-of-day */
export const DEFAULT_INTRADAY_TIMEFRAME = '1-MINUTE-LAST';

/**
 * Shorthand accepted wherever a caller supplies a timeframe.
 */
export const TIMEFRAME_ALIASES: Readonly<Record<string, string>> = {
  '1-MINUTE': '1-MINUTE-LAST',
  '5-MINUTE': '5-MINUTE-LAST',
  '15-MINUTE': '15-MINUTE-LAST',
  '1-HOUR': '1-HOUR-LAST',
  '1-DAY': '1-DAY-LAST',
  DAILY: '1-DAY-LAST',
  '1M': '1-MINUTE-LAST',
  '5M': '5-MINUTE-LAST',
  '15M': '15-MINUTE-LAST',
  '1H': '1-HOUR-LAST',
  '1D': '1-DAY-LAST',
  '1W': '1-WEEK-LAST',
};

const SPEC_PATTERN = /^(\d+)-([A-Z]+)-([A-Z]+)$/;

const DATE_LEVEL_AGGREGATIONS: ReadonlySet<BarAggregation> = new Set<BarAggregation>(['DAY', 'WEEK', 'MONTH']);

const AGGREGATION_NANOS: Record<BarAggregation, bigint> = {
  SECOND: NANOS_PER_SECOND,
  MINUTE: NANOS_PER_MINUTE,
  HOUR: NANOS_PER_HOUR,
  DAY: NANOS_PER_DAY,
  WEEK: 7n * NANOS_PER_DAY,
  MONTH: 30n * NANOS_PER_DAY,
};

function isAggregation(value: string): value is BarAggregation {
  return BAR_AGGREGATIONS.some((aggregation) => aggregation === value);
}

function isPriceType(value: string): value is PriceType {
  return PRICE_TYPES.some((priceType) => priceType === value);
}

/**
 * Parses a canonical spec string.
 *
 * @throws InvalidTimeframeError for anything that is not `STEP-AGGREGATION-PRICE_TYPE`
 *
 * @example
 * ```typescript
 * parseTimeframeSpec('5-MINUTE-LAST')  // { step: 5, aggregation: 'MINUTE', priceType: 'LAST' }
 * parseTimeframeSpec('5m')             // throws
 * ```
 */
export function parseTimeframeSpec(value: string): TimeframeSpec {
  const match = SPEC_PATTERN.exec(value.trim().toUpperCase());
  const step = Number(match?.[1]);
  const aggregation = match?.[2] ?? '';
  const priceType = match?.[3] ?? '';

  if (!match || !Number.isSafeInteger(step) || step < 1) {
    throw new InvalidTimeframeError(`Invalid timeframe spec "${value}"`, { value });
  }
  if (!isAggregation(aggregation)) {
    throw new InvalidTimeframeError(
      `Invalid timeframe aggregation "${aggregation}". Must be one of: ${BAR_AGGREGATIONS.join(', ')}`,
      { value }
    );
  }
  if (!isPriceType(priceType)) {
    throw new InvalidTimeframeError(
      `Invalid timeframe price type "${priceType}". Must be one of: ${PRICE_TYPES.join(', ')}`,
      { value }
    );
  }

  return { step, aggregation, priceType };
}

export function formatTimeframeSpec(spec: TimeframeSpec): string {
  return `${spec.step}-${spec.aggregation}-${spec.priceType}`;
}

export function isValidTimeframeSpec(value: string): boolean {
  return SPEC_PATTERN.test(value) && tryParse(value) !== null;
}

function tryParse(value: string): TimeframeSpec | null {
  try {
    return parseTimeframeSpec(value);
  } catch {
    return null;
  }
}

/**
 * Canonicalizes a caller-supplied spec or alias.
 *
 * @example
 * ```typescript
 * normalizeTimeframeSpec('daily')        // '1-DAY-LAST'
 * normalizeTimeframeSpec('1-hour-last')  // '1-HOUR-LAST'
 * ```
 */
export function normalizeTimeframeSpec(value: string): string {
  const key = value.trim().toUpperCase();
  const alias = TIMEFRAME_ALIASES[key];
  return formatTimeframeSpec(parseTimeframeSpec(alias ?? key));
}

/**
 * True for DAY, WEEK and MONTH aggregations.
 */
export function isDateLevel(spec: string | TimeframeSpec): boolean {
  const parsed = typeof spec === 'string' ? parseTimeframeSpec(spec) : spec;
  return DATE_LEVEL_AGGREGATIONS.has(parsed.aggregation);
}

/**
 * Nominal bar interval in nanoseconds. Months count as 30 days.
 */
export function timeframeIntervalNanos(spec: string | TimeframeSpec): bigint {
  const parsed = typeof spec === 'string' ? parseTimeframeSpec(spec) : spec;
  return BigInt(parsed.step) * AGGREGATION_NANOS[parsed.aggregation];
}
