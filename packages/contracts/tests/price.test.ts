/**
 * @fileoverview Tests for fixed-precision prices.
 */

import { describe, it, expect } from 'vitest';
import { parsePrice, formatPrice, rescalePrice, comparePrices, priceToNumber, createPrice } from '../src/price.js';
import { InvalidRequestError } from '../src/errors.js';

describe('parsePrice', () => {
  it('should keep written precision', () => {
    expect(parsePrice('101.50')).toEqual({ raw: 10150n, precision: 2 });
    expect(parsePrice('7')).toEqual({ raw: 7n, precision: 0 });
    expect(parsePrice(' -0.25 ')).toEqual({ raw: -25n, precision: 2 });
  });

  it('should reject non-decimal text and excess precision', () => {
    expect(() => parsePrice('1e5')).toThrow(InvalidRequestError);
    expect(() => parsePrice('abc')).toThrow('Invalid price "abc"');
    expect(() => parsePrice('1.0123456789')).toThrow(InvalidRequestError);
  });
});

describe('formatPrice', () => {
  it('should pad fractional digits', () => {
    expect(formatPrice(createPrice(5n, 2))).toBe('0.05');
    expect(formatPrice(createPrice(-105n, 2))).toBe('-1.05');
    expect(formatPrice(createPrice(42n, 0))).toBe('42');
  });
});

describe('rescalePrice', () => {
  it('should widen without loss', () => {
    expect(rescalePrice(parsePrice('1.5'), 3)).toEqual({ raw: 1500n, precision: 3 });
  });

  it('should narrow only when digits are zero', () => {
    expect(rescalePrice(parsePrice('1.500'), 1)).toEqual({ raw: 15n, precision: 1 });
    expect(() => rescalePrice(parsePrice('1.55'), 1)).toThrow(InvalidRequestError);
  });
});

describe('comparePrices', () => {
  it('should compare across precisions', () => {
    expect(comparePrices(parsePrice('1.5'), parsePrice('1.50'))).toBe(0);
    expect(comparePrices(parsePrice('1.49'), parsePrice('1.5'))).toBe(-1);
    expect(comparePrices(parsePrice('2'), parsePrice('1.999'))).toBe(1);
  });

  it('should convert to number for display', () => {
    expect(priceToNumber(parsePrice('101.25'))).toBe(101.25);
  });
});
