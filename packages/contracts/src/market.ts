/**
 * @fileoverview Catalog data model.
 *
 * Pure data structures shared by the store, the availability index, the
 * fetch pipeline and the import path. No I/O lives here.
 *
 * @module @barvault/contracts/market
 */

import { InvalidRequestError } from './errors.js';
import { comparePrices, formatPrice } from './price.js';
import type { Price } from './price.js';

/**
 * One OHLCV bar for an instrument at a timeframe.
 *
 * @invariant low <= open <= high and low <= close <= high
 * @invariant low <= high
 * @invariant volume >= 0
 * @invariant within a series, eventTime is strictly increasing
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   instrumentId: 'ACME.XNAS',
 *   timeframeSpec: '1-MINUTE-LAST',
 *   open: parsePrice('100.50'),
 *   high: parsePrice('101.25'),
 *   low: parsePrice('100.00'),
 *   close: parsePrice('101.00'),
 *   volume: 1500n,
 *   eventTime: parseTimestamp('2024-01-02 14:30').nanos,
 *   ingestTime: parseTimestamp('2024-01-02 14:31').nanos,
 * };
 * ```
 */
export interface Bar {
  instrumentId: string;
  timeframeSpec: string;
  open: Price;
  high: Price;
  low: Price;
  close: Price;
  volume: bigint;

  /** Bar timestamp, nanoseconds UTC */
  eventTime: bigint;

  /** When the bar entered the system, nanoseconds UTC */
  ingestTime: bigint;
}

/**
 * Static metadata describing a tradable instrument.
 *
 * @invariant pricePrecision matches the decimal precision of tickSize
 */
export interface InstrumentDescriptor {
  /** `SYMBOL.VENUE` */
  instrumentId: string;
  symbol: string;
  venue: string;
  assetClass: string;
  currency: string;
  pricePrecision: number;

  /** Decimal text, e.g. "0.01" */
  tickSize: string;
  lotSize: number;
}

/**
 * Whether bars came from an outside source (provider, CSV) or were built in-process.
 */
export type AggregationSource = 'EXTERNAL' | 'INTERNAL';

/**
 * One physical partition file as seen by a catalog scan.
 */
export interface PartitionMeta {
  instrumentId: string;
  timeframeSpec: string;
  aggregationSource: AggregationSource;

  /** Embedded range start, nanoseconds UTC */
  start: bigint;

  /** Embedded range end, nanoseconds UTC */
  end: bigint;
  filePath: string;
  rowCount: number;
  sizeBytes: number;
}

/**
 * A partition as returned by a write.
 */
export interface WrittenPartition extends PartitionMeta {
  /** True when the batch was merged into an existing file with the same range */
  mergedWithExisting: boolean;

  /** Rows the file held before the merge; 0 for a new file */
  replacedRowCount: number;
}

/**
 * Summary of what the catalog holds for one (instrument, timeframe) pair.
 *
 * @invariant start <= end
 * @invariant fileCount >= 1
 * @invariant estimatedRowCount >= 0
 */
export interface TimeRangeAvailability {
  instrumentId: string;
  timeframeSpec: string;
  start: bigint;
  end: bigint;
  fileCount: number;
  estimatedRowCount: number;

  /** Wall-clock time of the last refresh, milliseconds since epoch */
  lastUpdated: number;
}

export type FetchStatus = 'PENDING' | 'IN_PROGRESS' | 'COMPLETED' | 'FAILED';

/**
 * A tracked remote fetch.
 *
 * @invariant 0 <= retryCount <= maxRetries
 * @invariant completedAt is set iff status is COMPLETED or FAILED
 */
export interface FetchRequest {
  requestId: string;
  instrumentId: string;
  timeframeSpec: string;
  start: bigint;
  end: bigint;
  status: FetchStatus;
  retryCount: number;
  maxRetries: number;
  error: string | null;
  createdAt: number;
  completedAt: number | null;
}

/**
 * Splits `SYMBOL.VENUE` on the last dot, so symbols may themselves contain dots.
 *
 * @throws InvalidRequestError when either side is empty
 *
 * @example
 * ```typescript
 * parseInstrumentId('BRK.B.XNYS')  // { symbol: 'BRK.B', venue: 'XNYS' }
 * ```
 */
export function parseInstrumentId(instrumentId: string): { symbol: string; venue: string } {
  const index = instrumentId.lastIndexOf('.');
  const symbol = index > 0 ? instrumentId.slice(0, index) : '';
  const venue = index > 0 ? instrumentId.slice(index + 1) : '';
  if (!symbol || !venue || /\s/.test(instrumentId)) {
    throw new InvalidRequestError(`Instrument id "${instrumentId}" must be SYMBOL.VENUE`, { instrumentId });
  }
  return { symbol, venue };
}

export function formatInstrumentId(symbol: string, venue: string): string {
  return `${symbol.trim().toUpperCase()}.${venue.trim().toUpperCase()}`;
}

/**
 * Lists every invariant the bar breaks; empty when the bar is valid.
 */
export function validateBar(bar: Bar): string[] {
  const issues: string[] = [];
  const { open, high, low, close } = bar;

  if (comparePrices(low, high) > 0) {
    issues.push(`low ${formatPrice(low)} is above high ${formatPrice(high)}`);
  }
  for (const [label, price] of [['open', open], ['close', close]] as const) {
    if (comparePrices(price, low) < 0) {
      issues.push(`${label} ${formatPrice(price)} is below low ${formatPrice(low)}`);
    }
    if (comparePrices(price, high) > 0) {
      issues.push(`${label} ${formatPrice(price)} is above high ${formatPrice(high)}`);
    }
  }
  if (bar.volume < 0n) {
    issues.push(`volume ${bar.volume} is negative`);
  }
  return issues;
}

/**
 * Checks series-level invariants: single instrument and timeframe, strictly
 * increasing event times, and every bar valid on its own.
 */
export function validateSeries(bars: readonly Bar[]): string[] {
  const issues: string[] = [];
  const first = bars[0];
  if (!first) {
    return issues;
  }

  let previous: Bar | undefined;
  bars.forEach((bar, index) => {
    if (bar.instrumentId !== first.instrumentId || bar.timeframeSpec !== first.timeframeSpec) {
      issues.push(`bar ${index} belongs to ${bar.instrumentId} ${bar.timeframeSpec}, expected ${first.instrumentId} ${first.timeframeSpec}`);
    }
    if (previous && bar.eventTime <= previous.eventTime) {
      issues.push(`bar ${index} event time ${bar.eventTime} does not follow ${previous.eventTime}`);
    }
    for (const issue of validateBar(bar)) {
      issues.push(`bar ${index}: ${issue}`);
    }
    previous = bar;
  });
  return issues;
}

/**
 * Sort comparator on event time.
 */
export function compareBarsByEventTime(a: Bar, b: Bar): number {
  return a.eventTime < b.eventTime ? -1 : a.eventTime > b.eventTime ? 1 : 0;
}
