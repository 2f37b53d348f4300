/**
 * Bulk import of bars from CSV files into the catalog.
 *
 * Bad rows are collected as ValidationErrors and do not stop the rest of
 * the file. Existing data is handled by the importer's conflict policy.
 */

import { readFile } from 'node:fs/promises'
import type { AvailabilityIndex } from '@barvault/bars-cache'
import {
  formatInstrumentId,
  InvalidRequestError,
  isValidationError,
  nanosToIso,
  NANOS_PER_MILLI,
  normalizeTimeframeSpec,
  rescalePrice,
  ValidationError,
} from '@barvault/contracts'
import type { Bar, PartitionMeta } from '@barvault/contracts'
import { createSilentLogger, getCorrelationId, startTimer } from '@barvault/logger'
import type { Logger } from '@barvault/logger'
import { parseCsvRows } from './csvRows.js'
import type { CsvRow } from './csvRows.js'
import { rowToBar } from './rowValidation.js'

export const CONFLICT_POLICIES = ['skip', 'overwrite', 'merge'] as const

/**
 * - skip: drop rows that fall inside an existing partition
 * - overwrite: delete existing bars over the batch span, then write
 * - merge: write alongside existing data; reads keep the newest ingest
 */
export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number]

/**
 * Storage operations the importer needs; the column store provides them.
 */
export interface ImportStore {
  writeBars(bars: readonly Bar[], options?: { correlationId?: string }): Promise<PartitionMeta | null>
  deleteRange(instrumentId: string, timeframeSpec: string, start: bigint, end: bigint): Promise<number>
  scanPartitions(): Promise<PartitionMeta[]>
}

export interface ImportTarget {
  symbol: string
  venue: string

  /** Canonical spec or alias */
  timeframeSpec: string
}

export interface ImportResult {
  /** Source path, null for in-memory input */
  file: string | null
  instrumentId: string
  timeframeSpec: string
  rowsProcessed: number
  barsWritten: number
  conflictsSkipped: number
  validationErrors: ValidationError[]

  /** Event-time span of the valid rows, null when none were valid */
  dateRange: { start: bigint; end: bigint } | null
}

export interface CsvBarImporterOptions {
  store: ImportStore
  index: AvailabilityIndex
  conflictPolicy?: ConflictPolicy
  logger?: Logger

  /** Ingest clock, nanoseconds UTC */
  clock?: () => bigint
}

export function isConflictPolicy(value: string): value is ConflictPolicy {
  return CONFLICT_POLICIES.some((policy) => policy === value)
}

function insidePartition(eventTime: bigint, partitions: readonly PartitionMeta[]): boolean {
  return partitions.some((partition) => eventTime >= partition.start && eventTime <= partition.end)
}

/**
 * Rescales every price to the widest precision in the batch.
 */
function unifyPrecision(bars: readonly Bar[]): Bar[] {
  const precision = Math.max(
    0,
    ...bars.flatMap((bar) => [bar.open.precision, bar.high.precision, bar.low.precision, bar.close.precision])
  )
  return bars.map((bar) => ({
    ...bar,
    open: rescalePrice(bar.open, precision),
    high: rescalePrice(bar.high, precision),
    low: rescalePrice(bar.low, precision),
    close: rescalePrice(bar.close, precision),
  }))
}

/**
 * Example:
 * ```typescript
 * const importer = new CsvBarImporter({ store, index, conflictPolicy: 'overwrite', logger })
 * const result = await importer.importFile('./acme.csv', {
 *   symbol: 'ACME',
 *   venue: 'XNAS',
 *   timeframeSpec: '1-MINUTE-LAST',
 * })
 *
 * for (const error of result.validationErrors) {
 *   console.log(`row ${error.rowNumber}: ${error.message}`)
 * }
 * ```
 */
export class CsvBarImporter {
  readonly conflictPolicy: ConflictPolicy
  private readonly store: ImportStore
  private readonly index: AvailabilityIndex
  private readonly logger: Logger
  private readonly clock: () => bigint

  constructor(options: CsvBarImporterOptions) {
    this.store = options.store
    this.index = options.index
    this.conflictPolicy = options.conflictPolicy ?? 'skip'
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'bulk-import' })
    this.clock = options.clock ?? (() => BigInt(Date.now()) * NANOS_PER_MILLI)
  }

  /**
   * @throws InvalidRequestError when the file cannot be read
   * @throws ValidationError (row 0) when the header is unusable
   */
  async importFile(filePath: string, target: ImportTarget): Promise<ImportResult> {
    let text: string
    try {
      text = await readFile(filePath, 'utf8')
    } catch (error) {
      throw new InvalidRequestError(`CSV file not found: ${filePath}`, {
        file: filePath,
        reason: error instanceof Error ? error.message : String(error),
      })
    }
    return this.importText(text, target, filePath)
  }

  async importText(text: string, target: ImportTarget, file: string | null = null): Promise<ImportResult> {
    return this.importRows(parseCsvRows(text), target, file)
  }

  /**
   * Validates, resolves conflicts, writes and refreshes the index.
   */
  async importRows(rows: readonly CsvRow[], target: ImportTarget, file: string | null = null): Promise<ImportResult> {
    const timer = startTimer()
    const instrumentId = formatInstrumentId(target.symbol, target.venue)
    const timeframeSpec = normalizeTimeframeSpec(target.timeframeSpec)
    const fields = { instrument_id: instrumentId, timeframe_spec: timeframeSpec, file, policy: this.conflictPolicy }
    this.logger.info('csv_import_started', fields)

    const { bars, validationErrors } = this.convertRows(rows, instrumentId, timeframeSpec)
    const result: ImportResult = {
      file,
      instrumentId,
      timeframeSpec,
      rowsProcessed: rows.length,
      barsWritten: 0,
      conflictsSkipped: 0,
      validationErrors,
      dateRange: null,
    }

    const first = bars[0]
    const last = bars[bars.length - 1]
    if (!first || !last) {
      this.logger.warn('csv_import_no_valid_rows', { ...fields, errors: validationErrors.length })
      return result
    }
    result.dateRange = { start: first.eventTime, end: last.eventTime }

    const { toWrite, skipped } = await this.resolveConflicts(bars, instrumentId, timeframeSpec)
    result.conflictsSkipped = skipped

    if (toWrite.length > 0) {
      await this.store.writeBars(unifyPrecision(toWrite), {
        correlationId: getCorrelationId() ?? `csv-import-${instrumentId}`,
      })
      result.barsWritten = toWrite.length
    }
    if (toWrite.length > 0 || this.conflictPolicy === 'overwrite') {
      this.index.replaceKey(instrumentId, timeframeSpec, await this.store.scanPartitions())
    }

    this.logger.info('csv_import_completed', {
      ...fields,
      bars_written: result.barsWritten,
      conflicts_skipped: result.conflictsSkipped,
      errors: validationErrors.length,
      start: nanosToIso(first.eventTime),
      end: nanosToIso(last.eventTime),
      duration_ms: timer.stop(),
    })
    return result
  }

  private convertRows(
    rows: readonly CsvRow[],
    instrumentId: string,
    timeframeSpec: string
  ): { bars: Bar[]; validationErrors: ValidationError[] } {
    const context = { instrumentId, timeframeSpec, ingestTime: this.clock() }
    const bars: Bar[] = []
    const validationErrors: ValidationError[] = []
    const seen = new Map<bigint, number>()

    for (const row of rows) {
      try {
        const bar = rowToBar(row, context)
        const firstRow = seen.get(bar.eventTime)
        if (firstRow !== undefined) {
          throw new ValidationError(
            row.rowNumber,
            `Duplicate timestamp ${row.values['timestamp'] ?? ''} (first seen on row ${firstRow})`
          )
        }
        seen.set(bar.eventTime, row.rowNumber)
        bars.push(bar)
      } catch (error) {
        if (!isValidationError(error)) {
          throw error
        }
        validationErrors.push(error)
      }
    }

    bars.sort((a, b) => (a.eventTime < b.eventTime ? -1 : a.eventTime > b.eventTime ? 1 : 0))
    return { bars, validationErrors }
  }

  private async resolveConflicts(
    bars: Bar[],
    instrumentId: string,
    timeframeSpec: string
  ): Promise<{ toWrite: Bar[]; skipped: number }> {
    switch (this.conflictPolicy) {
      case 'skip': {
        const existing = (await this.store.scanPartitions()).filter(
          (partition) => partition.instrumentId === instrumentId && partition.timeframeSpec === timeframeSpec
        )
        const toWrite = bars.filter((bar) => !insidePartition(bar.eventTime, existing))
        const skipped = bars.length - toWrite.length
        if (skipped > 0) {
          this.logger.info('csv_import_conflicts_skipped', { instrument_id: instrumentId, skipped })
        }
        return { toWrite, skipped }
      }
      case 'overwrite': {
        const first = bars[0]
        const last = bars[bars.length - 1]
        if (first && last) {
          const removed = await this.store.deleteRange(instrumentId, timeframeSpec, first.eventTime, last.eventTime)
          this.logger.info('csv_import_range_cleared', { instrument_id: instrumentId, bars_removed: removed })
        }
        return { toWrite: bars, skipped: 0 }
      }
      case 'merge':
        return { toWrite: bars, skipped: 0 }
    }
  }
}
