/**
 * CSV text → raw rows with their file line numbers.
 */

import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { ValidationError } from '@barvault/contracts'

export const REQUIRED_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const
export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number]

/**
 * One data row keyed by lower-cased header name.
 */
export interface CsvRow {
  /** 1-based line in the source file; the header is row 1 */
  rowNumber: number
  values: Record<string, string>
}

const ParsedRecordsSchema = z.array(
  z.object({
    record: z.record(z.string()),
    info: z.object({ lines: z.number().int() }),
  })
)

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Parses CSV text with a header row.
 *
 * @throws ValidationError (row 0) when the file is unreadable or misses a required column
 *
 * Example:
 * ```typescript
 * parseCsvRows('timestamp,open,high,low,close,volume\n2024-01-02,1,2,0.5,1.5,100\n')
 * // [{ rowNumber: 2, values: { timestamp: '2024-01-02', open: '1', ... } }]
 * ```
 */
export function parseCsvRows(text: string): CsvRow[] {
  const captured: { header: string[] | null } = { header: null }
  let parsed: unknown
  try {
    parsed = parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
      columns: (names: string[]) => {
        const normalized = names.map((name) => name.trim().toLowerCase())
        captured.header = normalized
        return normalized
      },
    })
  } catch (error) {
    throw new ValidationError(0, `Unreadable CSV: ${describeError(error)}`)
  }

  const columns = captured.header ?? []
  if (columns.length === 0) {
    throw new ValidationError(0, 'CSV file has no header row')
  }
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column))
  if (missing.length > 0) {
    throw new ValidationError(0, `Missing required columns: ${missing.join(', ')}`, { missing })
  }

  const records = ParsedRecordsSchema.safeParse(parsed)
  if (!records.success) {
    throw new ValidationError(0, 'Unreadable CSV: unexpected parser output')
  }
  return records.data.map(({ record, info }) => ({ rowNumber: info.lines, values: record }))
}
