/**
 * @fileoverview Tests for the data model helpers.
 */

import { describe, it, expect } from 'vitest';
import { parseInstrumentId, formatInstrumentId, validateBar, validateSeries } from '../src/market.js';
import type { Bar } from '../src/market.js';
import { parsePrice } from '../src/price.js';
import { InvalidRequestError } from '../src/errors.js';

function bar(overrides: Partial<Bar> = {}): Bar {
  return {
    instrumentId: 'ACME.XNAS',
    timeframeSpec: '1-MINUTE-LAST',
    open: parsePrice('10.00'),
    high: parsePrice('10.50'),
    low: parsePrice('9.75'),
    close: parsePrice('10.25'),
    volume: 100n,
    eventTime: 1_000n,
    ingestTime: 2_000n,
    ...overrides,
  };
}

describe('instrument ids', () => {
  it('should split on the last dot', () => {
    expect(parseInstrumentId('ACME.XNAS')).toEqual({ symbol: 'ACME', venue: 'XNAS' });
    expect(parseInstrumentId('BRK.B.XNYS')).toEqual({ symbol: 'BRK.B', venue: 'XNYS' });
  });

  it('should reject ids without both parts', () => {
    expect(() => parseInstrumentId('ACME')).toThrow(InvalidRequestError);
    expect(() => parseInstrumentId('ACME.')).toThrow(InvalidRequestError);
    expect(() => parseInstrumentId('.XNAS')).toThrow(InvalidRequestError);
  });

  it('should format upper-cased ids', () => {
    expect(formatInstrumentId(' acme ', 'xnas')).toBe('ACME.XNAS');
  });
});

describe('validateBar', () => {
  it('should accept a consistent bar', () => {
    expect(validateBar(bar())).toEqual([]);
  });

  it('should report every broken invariant', () => {
    const issues = validateBar(bar({ open: parsePrice('11'), low: parsePrice('10.6'), volume: -1n }));
    expect(issues).toEqual([
      'low 10.6 is above high 10.50',
      'open 11 is above high 10.50',
      'close 10.25 is below low 10.6',
      'volume -1 is negative',
    ]);
  });
});

describe('validateSeries', () => {
  it('should require strictly increasing event times', () => {
    const issues = validateSeries([bar({ eventTime: 5n }), bar({ eventTime: 5n })]);
    expect(issues).toEqual(['bar 1 event time 5 does not follow 5']);
  });

  it('should require a single instrument and timeframe', () => {
    const issues = validateSeries([bar({ eventTime: 1n }), bar({ eventTime: 2n, instrumentId: 'OTHER.XNAS' })]);
    expect(issues).toEqual(['bar 1 belongs to OTHER.XNAS 1-MINUTE-LAST, expected ACME.XNAS 1-MINUTE-LAST']);
  });
});
