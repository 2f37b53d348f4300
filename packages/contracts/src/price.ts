/**
 * @fileoverview Fixed-precision prices.
 *
 * A price is an integer count of `10^-precision` units, so `101.25` at
 * precision 2 is `{ raw: 10125n, precision: 2 }`. Prices never pass through
 * floating point on their way to or from storage.
 *
 * @module @barvault/contracts/price
 */

import { InvalidRequestError } from './errors.js';

export const MAX_PRICE_PRECISION = 9;

export interface Price {
  readonly raw: bigint;
  readonly precision: number;
}

const PRICE_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function assertPrecision(precision: number): void {
  if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRICE_PRECISION) {
    throw new InvalidRequestError(`Price precision must be an integer in [0, ${MAX_PRICE_PRECISION}]`, {
      precision,
    });
  }
}

export function createPrice(raw: bigint, precision: number): Price {
  assertPrecision(precision);
  return { raw, precision };
}

/**
 * Parses decimal text. Precision is the number of fractional digits written.
 *
 * @example
 * ```typescript
 * parsePrice('101.50')  // { raw: 10150n, precision: 2 }
 * parsePrice('7')       // { raw: 7n, precision: 0 }
 * ```
 */
export function parsePrice(text: string): Price {
  const match = PRICE_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidRequestError(`Invalid price "${text}"`, { value: text });
  }
  const [, sign, whole, fraction = ''] = match;
  const precision = fraction.length;
  assertPrecision(precision);

  const magnitude = BigInt(`${whole ?? '0'}${fraction}`);
  return { raw: sign === '-' ? -magnitude : magnitude, precision };
}

export function formatPrice(price: Price): string {
  const negative = price.raw < 0n;
  const digits = (negative ? -price.raw : price.raw).toString().padStart(price.precision + 1, '0');
  const whole = digits.slice(0, digits.length - price.precision);
  const fraction = digits.slice(digits.length - price.precision);
  const body = price.precision > 0 ? `${whole}.${fraction}` : whole;
  return negative ? `-${body}` : body;
}

/**
 * Re-expresses a price at another precision.
 *
 * @throws InvalidRequestError when narrowing would drop non-zero digits
 */
export function rescalePrice(price: Price, precision: number): Price {
  assertPrecision(precision);
  if (precision === price.precision) {
    return price;
  }
  if (precision > price.precision) {
    return { raw: price.raw * pow10(precision - price.precision), precision };
  }
  const divisor = pow10(price.precision - precision);
  if (price.raw % divisor !== 0n) {
    throw new InvalidRequestError(`Cannot narrow ${formatPrice(price)} to precision ${precision} without loss`, {
      value: formatPrice(price),
      precision,
    });
  }
  return { raw: price.raw / divisor, precision };
}

/**
 * Numeric comparison across precisions: negative, zero or positive.
 */
export function comparePrices(a: Price, b: Price): number {
  const precision = Math.max(a.precision, b.precision);
  const left = rescalePrice(a, precision).raw;
  const right = rescalePrice(b, precision).raw;
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Lossy conversion for display and arithmetic that tolerates float error.
 */
export function priceToNumber(price: Price): number {
  return Number(formatPrice(price));
}
