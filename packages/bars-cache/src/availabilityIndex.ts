/**
 * In-memory summary of what the catalog holds, keyed by
 * (instrument, timeframe).
 *
 * Rebuilt once at startup from a partition scan and updated incrementally
 * after each successful write. All mutation is synchronous, so a reader on
 * the event loop never sees a half-applied update.
 */

import { floorToUtcDay, InvalidRequestError, isDateLevel, nanosToIso } from '@barvault/contracts'
import type { CatalogCorruptionError, PartitionMeta, TimeRangeAvailability, WrittenPartition } from '@barvault/contracts'
import { createSilentLogger } from '@barvault/logger'
import type { Logger } from '@barvault/logger'

/**
 * Anything that can list partitions (the column store in production).
 */
export interface PartitionSource {
  scanPartitions(options?: { onCorrupt?: (error: CatalogCorruptionError) => void }): Promise<PartitionMeta[]>
}

export interface AvailabilityIndexOptions {
  logger?: Logger

  /** Wall clock in ms, used for lastUpdated */
  clock?: () => number
}

/**
 * Canonical index key.
 *
 * Example: `availabilityKey('ACME.XNAS', '1-MINUTE-LAST')` → `'ACME.XNAS|1-MINUTE-LAST'`
 */
export function availabilityKey(instrumentId: string, timeframeSpec: string): string {
  return `${instrumentId}|${timeframeSpec}`
}

/**
 * Folds one partition into an existing record. `replacedRowCount` is set
 * when the partition rewrote a file the record already counts; that file's
 * rows are swapped out instead of a new file being added.
 */
export function mergeAvailability(
  existing: TimeRangeAvailability | undefined,
  partition: PartitionMeta,
  now: number,
  replacedRowCount: number | null = null
): TimeRangeAvailability {
  if (!existing) {
    return {
      instrumentId: partition.instrumentId,
      timeframeSpec: partition.timeframeSpec,
      start: partition.start,
      end: partition.end,
      fileCount: 1,
      estimatedRowCount: partition.rowCount,
      lastUpdated: now,
    }
  }
  return {
    ...existing,
    start: partition.start < existing.start ? partition.start : existing.start,
    end: partition.end > existing.end ? partition.end : existing.end,
    fileCount: replacedRowCount === null ? existing.fileCount + 1 : existing.fileCount,
    estimatedRowCount:
      replacedRowCount === null
        ? existing.estimatedRowCount + partition.rowCount
        : Math.max(0, existing.estimatedRowCount - replacedRowCount) + partition.rowCount,
    lastUpdated: now,
  }
}

/**
 * Groups partitions by key: start = min of starts, end = max of ends,
 * fileCount = number of files, estimatedRowCount = sum of row counts.
 */
export function summarizePartitions(
  partitions: readonly PartitionMeta[],
  now: number
): Map<string, TimeRangeAvailability> {
  const summary = new Map<string, TimeRangeAvailability>()
  for (const partition of partitions) {
    const key = availabilityKey(partition.instrumentId, partition.timeframeSpec)
    summary.set(key, mergeAvailability(summary.get(key), partition, now))
  }
  return summary
}

/**
 * Granularity-aware containment. Date-level timeframes compare UTC calendar
 * days, so a date-only request (midnight) is covered by a cached range that
 * ends later the same day; sub-day timeframes compare exact timestamps.
 */
export function availabilityCovers(availability: TimeRangeAvailability, start: bigint, end: bigint): boolean {
  if (isDateLevel(availability.timeframeSpec)) {
    return (
      floorToUtcDay(availability.start) <= floorToUtcDay(start) &&
      floorToUtcDay(availability.end) >= floorToUtcDay(end)
    )
  }
  return availability.start <= start && availability.end >= end
}

/**
 * Granularity-aware intersection.
 */
export function availabilityOverlaps(availability: TimeRangeAvailability, start: bigint, end: bigint): boolean {
  if (isDateLevel(availability.timeframeSpec)) {
    return (
      floorToUtcDay(availability.start) <= floorToUtcDay(end) &&
      floorToUtcDay(availability.end) >= floorToUtcDay(start)
    )
  }
  return availability.start <= end && availability.end >= start
}

function assertAvailability(availability: TimeRangeAvailability): void {
  if (availability.start > availability.end) {
    throw new InvalidRequestError('Availability start is after its end', {
      instrumentId: availability.instrumentId,
      timeframeSpec: availability.timeframeSpec,
    })
  }
  if (!Number.isInteger(availability.fileCount) || availability.fileCount < 1) {
    throw new InvalidRequestError('Availability must count at least one file', {
      instrumentId: availability.instrumentId,
      fileCount: availability.fileCount,
    })
  }
  if (availability.estimatedRowCount < 0) {
    throw new InvalidRequestError('Availability row count cannot be negative', {
      instrumentId: availability.instrumentId,
    })
  }
}

/**
 * Journal of writes that land while a rebuild is scanning, replayed onto
 * the rebuilt map before it is swapped in.
 */
type JournalEntry =
  | { kind: 'partition'; partition: PartitionMeta }
  | { kind: 'put'; availability: TimeRangeAvailability }
  | { kind: 'delete'; key: string }

/**
 * Availability index.
 *
 * Example:
 * ```typescript
 * const index = new AvailabilityIndex({ logger })
 * await index.rebuild(store)
 *
 * if (index.coversRange('ACME.XNAS', '1-DAY-LAST', start, end)) {
 *   // serve from the store
 * }
 * ```
 */
export class AvailabilityIndex {
  private entriesByKey: Map<string, TimeRangeAvailability> = new Map()
  private journal: JournalEntry[] | null = null
  private readonly logger: Logger
  private readonly clock: () => number

  constructor(options: AvailabilityIndexOptions = {}) {
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'availability-index' })
    this.clock = options.clock ?? Date.now
  }

  /**
   * Scans the store and replaces the whole index in one assignment.
   * Corrupt partitions are skipped (their range counts as uncovered).
   *
   * @returns A copy of the new index contents
   */
  async rebuild(source: PartitionSource): Promise<Map<string, TimeRangeAvailability>> {
    this.journal = []
    let skipped = 0
    try {
      const partitions = await source.scanPartitions({ onCorrupt: () => (skipped += 1) })
      const journal = this.journal

      // Scanned files already hold their final rows; a late path written twice counts once
      const scannedPaths = new Set(partitions.map((partition) => partition.filePath))
      const late = new Map<string, PartitionMeta>()
      for (const entry of journal) {
        if (entry.kind === 'partition' && !scannedPaths.has(entry.partition.filePath)) {
          late.set(entry.partition.filePath, entry.partition)
        }
      }
      const next = summarizePartitions([...partitions, ...late.values()], this.clock())
      for (const entry of journal) {
        if (entry.kind === 'put') {
          next.set(availabilityKey(entry.availability.instrumentId, entry.availability.timeframeSpec), entry.availability)
        } else if (entry.kind === 'delete') {
          next.delete(entry.key)
        }
      }

      this.entriesByKey = next
      this.logger.info('availability_rebuilt', {
        keys: next.size,
        partitions: partitions.length,
        skipped_partitions: skipped,
      })
      return new Map(next)
    } finally {
      this.journal = null
    }
  }

  coversRange(instrumentId: string, timeframeSpec: string, start: bigint, end: bigint): boolean {
    const availability = this.get(instrumentId, timeframeSpec)
    return availability !== undefined && availabilityCovers(availability, start, end)
  }

  overlapsRange(instrumentId: string, timeframeSpec: string, start: bigint, end: bigint): boolean {
    const availability = this.get(instrumentId, timeframeSpec)
    return availability !== undefined && availabilityOverlaps(availability, start, end)
  }

  get(instrumentId: string, timeframeSpec: string): TimeRangeAvailability | undefined {
    return this.entriesByKey.get(availabilityKey(instrumentId, timeframeSpec))
  }

  /**
   * Replaces the record for the availability's key wholesale.
   *
   * @throws InvalidRequestError if the record breaks an invariant
   */
  put(availability: TimeRangeAvailability): void {
    assertAvailability(availability)
    this.entriesByKey.set(availabilityKey(availability.instrumentId, availability.timeframeSpec), availability)
    this.journal?.push({ kind: 'put', availability })
    this.logger.debug('availability_updated', {
      instrument_id: availability.instrumentId,
      timeframe_spec: availability.timeframeSpec,
      start: nanosToIso(availability.start),
      end: nanosToIso(availability.end),
      file_count: availability.fileCount,
    })
  }

  /**
   * Merges a freshly written partition into its key's record. A write merged
   * into an existing same-range file replaces that file's counts.
   */
  recordPartition(partition: PartitionMeta | WrittenPartition): TimeRangeAvailability {
    const replacedRowCount =
      'mergedWithExisting' in partition && partition.mergedWithExisting ? partition.replacedRowCount : null
    const merged = mergeAvailability(
      this.get(partition.instrumentId, partition.timeframeSpec),
      partition,
      this.clock(),
      replacedRowCount
    )
    assertAvailability(merged)
    this.entriesByKey.set(availabilityKey(partition.instrumentId, partition.timeframeSpec), merged)
    this.journal?.push({ kind: 'partition', partition })
    return merged
  }

  /**
   * Recomputes one key from its current partitions, or drops it when none remain.
   */
  replaceKey(instrumentId: string, timeframeSpec: string, partitions: readonly PartitionMeta[]): TimeRangeAvailability | undefined {
    const key = availabilityKey(instrumentId, timeframeSpec)
    const relevant = partitions.filter(
      (partition) => partition.instrumentId === instrumentId && partition.timeframeSpec === timeframeSpec
    )
    const summary = summarizePartitions(relevant, this.clock()).get(key)
    if (summary) {
      this.put(summary)
    } else {
      this.entriesByKey.delete(key)
      this.journal?.push({ kind: 'delete', key })
    }
    return summary
  }

  entries(): TimeRangeAvailability[] {
    return [...this.entriesByKey.values()].sort(
      (a, b) => a.instrumentId.localeCompare(b.instrumentId) || a.timeframeSpec.localeCompare(b.timeframeSpec)
    )
  }

  get size(): number {
    return this.entriesByKey.size
  }
}
