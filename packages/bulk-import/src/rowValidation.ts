/**
 * Raw CSV row → Bar, or a ValidationError naming the row.
 */

import { comparePrices, parsePrice, parseTimestamp, validateBar, ValidationError } from '@barvault/contracts'
import type { Bar, Price } from '@barvault/contracts'
import type { CsvRow } from './csvRows.js'

type PriceField = 'open' | 'high' | 'low' | 'close'

const VOLUME_PATTERN = /^\d+(?:\.0+)?$/
const ZERO: Price = { raw: 0n, precision: 0 }

export interface RowContext {
  instrumentId: string
  timeframeSpec: string

  /** Ingest stamp, nanoseconds UTC */
  ingestTime: bigint
}

function requireValue(row: CsvRow, field: string): string {
  const value = row.values[field]
  if (value === undefined || value === '') {
    throw new ValidationError(row.rowNumber, `Missing ${field}`, { field })
  }
  return value
}

function parseRowPrice(row: CsvRow, field: PriceField): Price {
  const value = requireValue(row, field)
  let price: Price
  try {
    price = parsePrice(value)
  } catch {
    throw new ValidationError(row.rowNumber, `Invalid ${field} "${value}"`, { field, value })
  }
  if (comparePrices(price, ZERO) <= 0) {
    throw new ValidationError(row.rowNumber, `${field} must be > 0, got ${value}`, { field, value })
  }
  return price
}

/**
 * Converts one row. Timestamps without a zone are read as UTC.
 *
 * @throws ValidationError with the row's number
 */
export function rowToBar(row: CsvRow, context: RowContext): Bar {
  const timestamp = requireValue(row, 'timestamp')
  let eventTime: bigint
  try {
    eventTime = parseTimestamp(timestamp).nanos
  } catch {
    throw new ValidationError(row.rowNumber, `Invalid timestamp "${timestamp}"`, { value: timestamp })
  }

  const open = parseRowPrice(row, 'open')
  const high = parseRowPrice(row, 'high')
  const low = parseRowPrice(row, 'low')
  const close = parseRowPrice(row, 'close')

  const volumeText = requireValue(row, 'volume')
  if (!VOLUME_PATTERN.test(volumeText)) {
    throw new ValidationError(row.rowNumber, `volume must be a non-negative integer, got ${volumeText}`, {
      value: volumeText,
    })
  }

  const bar: Bar = {
    instrumentId: context.instrumentId,
    timeframeSpec: context.timeframeSpec,
    open,
    high,
    low,
    close,
    volume: BigInt(volumeText.split('.')[0] ?? '0'),
    eventTime,
    ingestTime: context.ingestTime,
  }

  const issues = validateBar(bar)
  if (issues.length > 0) {
    throw new ValidationError(row.rowNumber, issues.join('; '), { issues })
  }
  return bar
}
