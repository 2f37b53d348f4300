/**
 * Parquet encoding for bar partitions.
 *
 * Columns (one row per bar):
 * - ts_event, ts_init: INT64 nanoseconds UTC
 * - open, high, low, close: INT64 raw fixed-precision units
 * - volume: INT64
 * - price_precision: INT32 decimal places for the four price columns
 *
 * Rows are validated with zod on the way back in; a file whose rows do not
 * match the schema is reported as corrupt. Scans check the footer's column
 * layout instead of decoding pages.
 */

import { asyncBufferFromFile, parquetMetadataAsync, parquetReadObjects } from 'hyparquet'
import { parquetWriteBuffer } from 'hyparquet-writer'
import { z } from 'zod'
import { CatalogCorruptionError, MAX_PRICE_PRECISION, createPrice, rescalePrice } from '@barvault/contracts'
import type { Bar } from '@barvault/contracts'

const BarRowSchema = z.object({
  ts_event: z.bigint(),
  ts_init: z.bigint(),
  open: z.bigint(),
  high: z.bigint(),
  low: z.bigint(),
  close: z.bigint(),
  volume: z.bigint().nonnegative(),
  price_precision: z.number().int().min(0).max(MAX_PRICE_PRECISION),
})

const BarRowsSchema = z.array(BarRowSchema)

/** Physical type of each column, in file order */
const COLUMN_TYPES = {
  ts_event: 'INT64',
  ts_init: 'INT64',
  open: 'INT64',
  high: 'INT64',
  low: 'INT64',
  close: 'INT64',
  volume: 'INT64',
  price_precision: 'INT32',
} as const

interface SchemaColumn {
  name: string
  type?: string
}

/**
 * Compares a footer schema (root element first) with the bar layout.
 *
 * @returns A description of the first mismatch, or null when the layout matches
 */
export function describeSchemaMismatch(schema: readonly SchemaColumn[]): string | null {
  const columns = schema.slice(1)
  const expected = Object.entries(COLUMN_TYPES)
  for (const [name, type] of expected) {
    const column = columns.find((candidate) => candidate.name === name)
    if (!column) {
      return `missing column ${name}`
    }
    if (column.type !== type) {
      return `column ${name} is ${column.type ?? 'a group'}, expected ${type}`
    }
  }
  if (columns.length !== expected.length) {
    return `expected ${expected.length} columns, found ${columns.length}`
  }
  return null
}

export type BarRow = z.infer<typeof BarRowSchema>

/**
 * Converts bars to rows, putting each bar's four prices on one precision.
 */
export function barsToRows(bars: readonly Bar[]): BarRow[] {
  return bars.map((bar) => {
    const precision = Math.max(bar.open.precision, bar.high.precision, bar.low.precision, bar.close.precision)
    return {
      ts_event: bar.eventTime,
      ts_init: bar.ingestTime,
      open: rescalePrice(bar.open, precision).raw,
      high: rescalePrice(bar.high, precision).raw,
      low: rescalePrice(bar.low, precision).raw,
      close: rescalePrice(bar.close, precision).raw,
      volume: bar.volume,
      price_precision: precision,
    }
  })
}

export function rowsToBars(rows: readonly BarRow[], instrumentId: string, timeframeSpec: string): Bar[] {
  return rows.map((row) => ({
    instrumentId,
    timeframeSpec,
    open: createPrice(row.open, row.price_precision),
    high: createPrice(row.high, row.price_precision),
    low: createPrice(row.low, row.price_precision),
    close: createPrice(row.close, row.price_precision),
    volume: row.volume,
    eventTime: row.ts_event,
    ingestTime: row.ts_init,
  }))
}

/**
 * Encodes bars into an in-memory Parquet file.
 */
export function encodeBars(bars: readonly Bar[]): ArrayBuffer {
  const rows = barsToRows(bars)
  return parquetWriteBuffer({
    columnData: [
      { name: 'ts_event', data: rows.map((row) => row.ts_event), type: 'INT64' },
      { name: 'ts_init', data: rows.map((row) => row.ts_init), type: 'INT64' },
      { name: 'open', data: rows.map((row) => row.open), type: 'INT64' },
      { name: 'high', data: rows.map((row) => row.high), type: 'INT64' },
      { name: 'low', data: rows.map((row) => row.low), type: 'INT64' },
      { name: 'close', data: rows.map((row) => row.close), type: 'INT64' },
      { name: 'volume', data: rows.map((row) => row.volume), type: 'INT64' },
      { name: 'price_precision', data: rows.map((row) => row.price_precision), type: 'INT32' },
    ],
  })
}

/**
 * Reads and validates every row of a partition file.
 *
 * @throws CatalogCorruptionError if the file cannot be decoded or a row is malformed
 */
export async function readBarRows(filePath: string): Promise<BarRow[]> {
  let raw: unknown
  try {
    const file = await asyncBufferFromFile(filePath)
    raw = await parquetReadObjects({ file })
  } catch (error) {
    throw new CatalogCorruptionError(
      `Unreadable partition file ${filePath}`,
      { path: filePath, reason: error instanceof Error ? error.message : String(error) },
      { cause: error }
    )
  }

  const parsed = BarRowsSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.errors[0]
    throw new CatalogCorruptionError(`Malformed rows in partition file ${filePath}`, {
      path: filePath,
      reason: issue ? `${issue.path.join('.')}: ${issue.message}` : 'schema mismatch',
    })
  }
  return parsed.data
}

/**
 * Row count from the Parquet footer, without decoding any pages. The
 * footer's columns must match the bar layout.
 *
 * @throws CatalogCorruptionError if the footer is unreadable or lays out other columns
 */
export async function readRowCount(filePath: string): Promise<number> {
  let metadata: Awaited<ReturnType<typeof parquetMetadataAsync>>
  try {
    const file = await asyncBufferFromFile(filePath)
    metadata = await parquetMetadataAsync(file)
  } catch (error) {
    throw new CatalogCorruptionError(
      `Unreadable partition footer ${filePath}`,
      { path: filePath, reason: error instanceof Error ? error.message : String(error) },
      { cause: error }
    )
  }

  const mismatch = describeSchemaMismatch(metadata.schema)
  if (mismatch) {
    throw new CatalogCorruptionError(`Unexpected columns in partition file ${filePath}`, {
      path: filePath,
      reason: mismatch,
    })
  }
  return Number(metadata.num_rows)
}
