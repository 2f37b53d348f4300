/**
 * @fileoverview Nanosecond UTC timestamps.
 *
 * All catalog timestamps are bigint nanoseconds since the Unix epoch (UTC).
 * Naive (zone-less) input is read as UTC.
 *
 * @module @barvault/contracts/time
 */

import { InvalidRequestError } from './errors.js';

export const NANOS_PER_MILLI = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
export const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE;
export const NANOS_PER_DAY = 24n * NANOS_PER_HOUR;

/**
 * Anything a caller may pass as a request bound.
 */
export type TimeInput = string | Date | bigint;

export interface ParsedTimestamp {
  /** Nanoseconds since epoch, UTC */
  nanos: bigint;

  /** True when the input carried no time-of-day component at all */
  dateOnly: boolean;
}

/**
 * `YYYY-MM-DD`, optionally followed by `[T ]HH:mm[:ss[.f{1,9}]]` and a zone
 * (`Z`, `+HH:MM`, `+HHMM`).
 */
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Floor division for bigint (rounds toward negative infinity).
 */
export function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return (a % b !== 0n && (a < 0n) !== (b < 0n)) ? q - 1n : q;
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Parses a textual timestamp into nanoseconds.
 *
 * @throws InvalidRequestError when the text is not a valid calendar timestamp
 *
 * @example
 * ```typescript
 * parseTimestamp('2024-01-02');                        // dateOnly: true
 * parseTimestamp('2024-01-02 14:30:00.000000123');     // naive, read as UTC
 * parseTimestamp('2024-01-02T09:30:00-05:00');
 * ```
 */
export function parseTimestamp(input: string): ParsedTimestamp {
  const match = TIMESTAMP_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidRequestError(`Unparsable timestamp "${input}"`, { value: input });
  }

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const parts = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour ?? 0),
    minute: Number(minute ?? 0),
    second: Number(second ?? 0),
  };

  const wholeMs = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  const check = new Date(wholeMs);
  if (
    Number.isNaN(wholeMs) ||
    check.getUTCFullYear() !== parts.year ||
    check.getUTCMonth() !== parts.month - 1 ||
    check.getUTCDate() !== parts.day ||
    check.getUTCHours() !== parts.hour ||
    check.getUTCMinutes() !== parts.minute ||
    check.getUTCSeconds() !== parts.second
  ) {
    throw new InvalidRequestError(`Timestamp "${input}" is not a valid calendar time`, { value: input });
  }

  const offsetMs = zoneOffsetMinutes(zone) * 60_000;
  const fractionNanos = BigInt((fraction ?? '').padEnd(9, '0'));
  const nanos = BigInt(wholeMs - offsetMs) * NANOS_PER_MILLI + fractionNanos;

  return { nanos, dateOnly: hour === undefined && zone === undefined };
}

/**
 * Converts any accepted time input to nanoseconds.
 */
export function toNanos(input: TimeInput): bigint {
  if (typeof input === 'bigint') {
    return input;
  }
  if (input instanceof Date) {
    const ms = input.getTime();
    if (Number.isNaN(ms)) {
      throw new InvalidRequestError('Invalid Date', { value: String(input) });
    }
    return BigInt(ms) * NANOS_PER_MILLI;
  }
  return parseTimestamp(input).nanos;
}

export function dateToNanos(date: Date): bigint {
  return toNanos(date);
}

/**
 * Millisecond-resolution Date for a nanosecond timestamp (sub-ms digits dropped).
 */
export function nanosToDate(nanos: bigint): Date {
  return new Date(Number(floorDiv(nanos, NANOS_PER_MILLI)));
}

/**
 * ISO 8601 with all nine fractional digits, e.g. `2024-01-02T14:30:00.000000123Z`.
 */
export function nanosToIso(nanos: bigint): string {
  const seconds = floorDiv(nanos, NANOS_PER_SECOND);
  const fraction = nanos - seconds * NANOS_PER_SECOND;
  const whole = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  return `${whole}.${fraction.toString().padStart(9, '0')}Z`;
}

export function floorToUtcDay(nanos: bigint): bigint {
  return floorDiv(nanos, NANOS_PER_DAY) * NANOS_PER_DAY;
}

/**
 * Last nanosecond of the UTC day containing `nanos`.
 */
export function endOfUtcDay(nanos: bigint): bigint {
  return floorToUtcDay(nanos) + NANOS_PER_DAY - 1n;
}

export function isUtcMidnight(nanos: bigint): boolean {
  return nanos === floorToUtcDay(nanos);
}

/**
 * Latest bar open time a request for `[start, end)` can return. Bars are
 * keyed by open time, so the slot opening at `end` belongs to the next
 * range; a point request (`start === end`) returns the bar at `start`.
 */
export function lastOpenTime(start: bigint, end: bigint): bigint {
  return end > start ? end - 1n : end;
}
