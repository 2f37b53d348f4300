/**
 * Columnar on-disk catalog for bars and instrument descriptors.
 *
 * Layout under the catalog root:
 * ```
 * data/bar/{instrumentId}-{timeframeSpec}-{source}/{start}Z_{end}Z.parquet
 * data/instrument/{instrumentId}.json
 * ```
 *
 * Partition files are immutable once written. Overlapping ranges across files
 * are allowed; reads merge every intersecting file, de-duplicate on event
 * time (latest ingest wins) and sort.
 */

import { readdir, readFile, rm, stat } from 'node:fs/promises'
import path from 'node:path'
import {
  CatalogCorruptionError,
  InvalidRequestError,
  compareBarsByEventTime,
  isCatalogCorruptionError,
  nanosToIso,
  parseInstrumentId,
  validateSeries,
} from '@barvault/contracts'
import type { AggregationSource, Bar, InstrumentDescriptor, PartitionMeta, WrittenPartition } from '@barvault/contracts'
import { createSilentLogger } from '@barvault/logger'
import type { Logger } from '@barvault/logger'
import { writeFileAtomic } from './atomicWrite.js'
import { InstrumentDescriptorSchema, formatDescriptorIssues } from './descriptorSchema.js'
import { encodeBars, readBarRows, readRowCount, rowsToBars } from './parquetCodec.js'
import type { BarRow } from './parquetCodec.js'
import {
  PARTITION_EXTENSION,
  formatPartitionDirectory,
  formatPartitionFileName,
  parsePartitionDirectory,
  parsePartitionFileName,
} from './partitionNaming.js'
import type { PartitionKey, PartitionRange } from './partitionNaming.js'

export interface ColumnStoreOptions {
  /** Catalog root directory */
  root: string

  /** Source recorded in directory names for writes that do not say otherwise */
  aggregationSource?: AggregationSource

  logger?: Logger
}

export interface WriteBarsOptions {
  /** Recorded in the write log line */
  correlationId?: string

  /**
   * Range the batch is authoritative for (usually the requested fetch
   * range). Widened to include every bar when narrower.
   */
  coverage?: PartitionRange

  aggregationSource?: AggregationSource
}

export interface ScanOptions {
  /** Called once per skipped file or directory */
  onCorrupt?: (error: CatalogCorruptionError) => void
}

/**
 * A partition file located by name only (no footer read).
 */
interface PartitionFile {
  key: PartitionKey
  range: PartitionRange
  fileName: string
  filePath: string
}

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._^=-]*$/

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function intersects(range: PartitionRange, start: bigint, end: bigint): boolean {
  return range.start <= end && range.end >= start
}

function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b
}

function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b
}

/**
 * Keeps one bar per event time, preferring the later ingest time. On a tie
 * the bar seen last wins.
 */
function mergeBars(batches: readonly (readonly Bar[])[]): Bar[] {
  const byEventTime = new Map<bigint, Bar>()
  for (const batch of batches) {
    for (const bar of batch) {
      const existing = byEventTime.get(bar.eventTime)
      if (!existing || bar.ingestTime >= existing.ingestTime) {
        byEventTime.set(bar.eventTime, bar)
      }
    }
  }
  return [...byEventTime.values()].sort(compareBarsByEventTime)
}

/**
 * Column store over the local filesystem.
 *
 * Example:
 * ```typescript
 * const store = new ColumnStore({ root: './data/catalog', logger })
 *
 * await store.writeDescriptor(descriptor)
 * await store.writeBars(bars, { correlationId: 'fetch-1' })
 *
 * const bars = await store.query('ACME.XNAS', '1-MINUTE-LAST', start, end)
 * const partitions = await store.scanPartitions()
 * ```
 */
export class ColumnStore {
  readonly root: string
  private readonly barRoot: string
  private readonly descriptorRoot: string
  private readonly aggregationSource: AggregationSource
  private readonly logger: Logger

  constructor(options: ColumnStoreOptions) {
    this.root = path.resolve(options.root)
    this.barRoot = path.join(this.root, 'data', 'bar')
    this.descriptorRoot = path.join(this.root, 'data', 'instrument')
    this.aggregationSource = options.aggregationSource ?? 'EXTERNAL'
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'column-store' })
  }

  /**
   * Persists one batch of bars as a single partition file.
   *
   * The batch must hold one instrument and timeframe and satisfy every bar
   * invariant; unsorted input is sorted first. If a file with the same range
   * already exists its rows are merged with the batch (batch wins); an
   * unreadable file at that path is replaced.
   *
   * @returns Metadata of the written partition, or null for an empty batch
   * @throws InvalidRequestError for an invalid batch
   * @throws CatalogWriteError if the file cannot be written
   */
  async writeBars(bars: readonly Bar[], options: WriteBarsOptions = {}): Promise<WrittenPartition | null> {
    const sorted = [...bars].sort(compareBarsByEventTime)
    const first = sorted[0]
    const last = sorted[sorted.length - 1]
    if (!first || !last) {
      return null
    }

    const issues = validateSeries(sorted)
    if (issues.length > 0) {
      throw new InvalidRequestError('Refusing to write an invalid bar batch', {
        instrumentId: first.instrumentId,
        timeframeSpec: first.timeframeSpec,
        issueCount: issues.length,
        issues: issues.slice(0, 5),
      })
    }

    const { coverage } = options
    if (coverage && coverage.start > coverage.end) {
      throw new InvalidRequestError('Coverage start is after its end', {
        start: nanosToIso(coverage.start),
        end: nanosToIso(coverage.end),
      })
    }

    const key: PartitionKey = {
      instrumentId: first.instrumentId,
      timeframeSpec: first.timeframeSpec,
      aggregationSource: options.aggregationSource ?? this.aggregationSource,
    }
    const range: PartitionRange = {
      start: coverage ? minBigInt(coverage.start, first.eventTime) : first.eventTime,
      end: coverage ? maxBigInt(coverage.end, last.eventTime) : last.eventTime,
    }
    const filePath = path.join(this.partitionDirectory(key), formatPartitionFileName(range))

    const existing = await this.readPartitionIfPresent(filePath, key)
    const rows = existing ? mergeExisting(existing, sorted) : sorted

    const buffer = encodeBars(rows)
    await writeFileAtomic(filePath, new Uint8Array(buffer))

    this.logger.info('partition_written', {
      instrument_id: key.instrumentId,
      timeframe_spec: key.timeframeSpec,
      rows: rows.length,
      start: nanosToIso(range.start),
      end: nanosToIso(range.end),
      file: path.relative(this.root, filePath),
      merged_with_existing: existing !== null,
      correlation_id: options.correlationId,
    })

    return {
      ...key,
      start: range.start,
      end: range.end,
      filePath,
      rowCount: rows.length,
      sizeBytes: buffer.byteLength,
      mergedWithExisting: existing !== null,
      replacedRowCount: existing?.length ?? 0,
    }
  }

  /**
   * Persists (or replaces) an instrument descriptor.
   *
   * @throws InvalidRequestError if the descriptor is inconsistent
   */
  async writeDescriptor(descriptor: InstrumentDescriptor): Promise<void> {
    const parsed = InstrumentDescriptorSchema.safeParse(descriptor)
    if (!parsed.success) {
      throw new InvalidRequestError(`Invalid descriptor for ${descriptor.instrumentId}: ${formatDescriptorIssues(parsed.error)}`, {
        instrumentId: descriptor.instrumentId,
      })
    }
    const filePath = this.descriptorPath(descriptor.instrumentId)
    await writeFileAtomic(filePath, `${JSON.stringify(parsed.data, null, 2)}\n`)
    this.logger.info('descriptor_written', { instrument_id: descriptor.instrumentId })
  }

  /**
   * @returns The stored descriptor, or null when none has been written
   * @throws CatalogCorruptionError if the stored file does not parse
   */
  async loadDescriptor(instrumentId: string): Promise<InstrumentDescriptor | null> {
    const filePath = this.descriptorPath(instrumentId)
    let text: string
    try {
      text = await readFile(filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        return null
      }
      throw error
    }
    return parseDescriptorFile(filePath, text)
  }

  /**
   * Every readable descriptor, sorted by instrument id. Corrupt files are
   * logged and skipped.
   */
  async listDescriptors(): Promise<InstrumentDescriptor[]> {
    const names = await readDirectoryNames(this.descriptorRoot)
    const descriptors: InstrumentDescriptor[] = []
    for (const name of names.filter((entry) => entry.endsWith('.json'))) {
      const filePath = path.join(this.descriptorRoot, name)
      try {
        descriptors.push(parseDescriptorFile(filePath, await readFile(filePath, 'utf8')))
      } catch (error) {
        if (!isCatalogCorruptionError(error)) {
          throw error
        }
        this.logCorruption(error)
      }
    }
    return descriptors.sort((a, b) => a.instrumentId.localeCompare(b.instrumentId))
  }

  /**
   * Bars for `[start, end]` (inclusive), merged across every intersecting
   * partition, de-duplicated and sorted by event time. Files that cannot be
   * decoded are logged and skipped, as in `scanPartitions`.
   */
  async query(instrumentId: string, timeframeSpec: string, start: bigint, end: bigint): Promise<Bar[]> {
    if (start > end) {
      throw new InvalidRequestError('Query start is after its end', {
        instrumentId,
        start: nanosToIso(start),
        end: nanosToIso(end),
      })
    }

    const files = (await this.listPartitionFiles())
      .filter((file) => file.key.instrumentId === instrumentId && file.key.timeframeSpec === timeframeSpec)
      .filter((file) => intersects(file.range, start, end))
      .sort((a, b) => a.fileName.localeCompare(b.fileName))

    const batches: Bar[][] = []
    for (const file of files) {
      const rows = await this.readRowsOrSkip(file.filePath)
      if (!rows) {
        continue
      }
      batches.push(
        rowsToBars(rows, instrumentId, timeframeSpec).filter((bar) => bar.eventTime >= start && bar.eventTime <= end)
      )
    }

    const bars = mergeBars(batches)
    this.logger.debug('query_completed', {
      instrument_id: instrumentId,
      timeframe_spec: timeframeSpec,
      files: files.length,
      bars: bars.length,
    })
    return bars
  }

  /**
   * Walks every partition directory and reports each readable file with its
   * footer row count. Unparsable names, unreadable footers and footers with
   * other columns are logged as CatalogCorruptionError and skipped; the scan
   * always completes.
   */
  async scanPartitions(options: ScanOptions = {}): Promise<PartitionMeta[]> {
    const partitions: PartitionMeta[] = []
    for (const file of await this.listPartitionFiles(options.onCorrupt)) {
      try {
        const [rowCount, stats] = await Promise.all([readRowCount(file.filePath), stat(file.filePath)])
        partitions.push({
          ...file.key,
          start: file.range.start,
          end: file.range.end,
          filePath: file.filePath,
          rowCount,
          sizeBytes: stats.size,
        })
      } catch (error) {
        if (!isCatalogCorruptionError(error)) {
          throw error
        }
        this.logCorruption(error)
        options.onCorrupt?.(error)
      }
    }
    return partitions
  }

  /**
   * Removes every bar with `start <= eventTime <= end` for the key by
   * rewriting each overlapping partition without those rows. The replacement
   * files are written before the originals are removed.
   *
   * @returns Number of bars removed
   */
  async deleteRange(instrumentId: string, timeframeSpec: string, start: bigint, end: bigint): Promise<number> {
    if (start > end) {
      throw new InvalidRequestError('Delete start is after its end', { instrumentId })
    }

    const files = (await this.listPartitionFiles()).filter(
      (file) =>
        file.key.instrumentId === instrumentId &&
        file.key.timeframeSpec === timeframeSpec &&
        intersects(file.range, start, end)
    )

    let removed = 0
    for (const file of files) {
      const bars = rowsToBars(await readBarRows(file.filePath), instrumentId, timeframeSpec)
      const before = bars.filter((bar) => bar.eventTime < start)
      const after = bars.filter((bar) => bar.eventTime > end)
      removed += bars.length - before.length - after.length

      const writeOptions = { aggregationSource: file.key.aggregationSource }
      if (before.length > 0) {
        await this.writeBars(before, { ...writeOptions, coverage: { start: file.range.start, end: start - 1n } })
      }
      if (after.length > 0) {
        await this.writeBars(after, { ...writeOptions, coverage: { start: end + 1n, end: file.range.end } })
      }
      await rm(file.filePath, { force: true })
    }

    this.logger.info('range_deleted', {
      instrument_id: instrumentId,
      timeframe_spec: timeframeSpec,
      start: nanosToIso(start),
      end: nanosToIso(end),
      files: files.length,
      removed,
    })
    return removed
  }

  private partitionDirectory(key: PartitionKey): string {
    assertSafeInstrumentId(key.instrumentId)
    return path.join(this.barRoot, formatPartitionDirectory(key))
  }

  private descriptorPath(instrumentId: string): string {
    assertSafeInstrumentId(instrumentId)
    return path.join(this.descriptorRoot, `${instrumentId}.json`)
  }

  /**
   * Rows of the file at `filePath`, or null when there is none to merge with.
   */
  private async readPartitionIfPresent(filePath: string, key: PartitionKey): Promise<Bar[] | null> {
    try {
      await stat(filePath)
    } catch (error) {
      if (isMissingFile(error)) {
        return null
      }
      throw error
    }
    const rows = await this.readRowsOrSkip(filePath)
    return rows ? rowsToBars(rows, key.instrumentId, key.timeframeSpec) : null
  }

  private async readRowsOrSkip(filePath: string): Promise<BarRow[] | null> {
    try {
      return await readBarRows(filePath)
    } catch (error) {
      if (!isCatalogCorruptionError(error)) {
        throw error
      }
      this.logCorruption(error)
      return null
    }
  }

  /**
   * Lists partition files by parsing directory and file names. Temporary
   * and non-partition files are ignored; malformed names are logged.
   */
  private async listPartitionFiles(onCorrupt?: (error: CatalogCorruptionError) => void): Promise<PartitionFile[]> {
    const report = (error: CatalogCorruptionError) => {
      this.logCorruption(error)
      onCorrupt?.(error)
    }

    const files: PartitionFile[] = []
    for (const directory of await readDirectoryNames(this.barRoot, 'directories')) {
      const directoryPath = path.join(this.barRoot, directory)
      const key = parsePartitionDirectory(directory)
      if (!key) {
        report(new CatalogCorruptionError(`Unparsable partition directory ${directory}`, {
          path: directoryPath,
          reason: 'expected {instrumentId}-{timeframeSpec}-{EXTERNAL|INTERNAL}',
        }))
        continue
      }

      for (const fileName of await readDirectoryNames(directoryPath, 'files')) {
        if (!fileName.endsWith(PARTITION_EXTENSION)) {
          continue
        }
        const filePath = path.join(directoryPath, fileName)
        const range = parsePartitionFileName(fileName)
        if (!range) {
          report(new CatalogCorruptionError(`Unparsable partition file name ${fileName}`, {
            path: filePath,
            reason: 'expected {start}Z_{end}Z.parquet',
          }))
          continue
        }
        files.push({ key, range, fileName, filePath })
      }
    }
    return files
  }

  private logCorruption(error: CatalogCorruptionError): void {
    this.logger.warn('catalog_entry_skipped', {
      error_code: error.code,
      reason: error.data?.['reason'],
      path: error.data?.['path'],
      message: error.message,
    })
  }
}

/**
 * Existing rows of a same-range file, overlaid by the incoming batch.
 */
function mergeExisting(existing: readonly Bar[], incoming: readonly Bar[]): Bar[] {
  const byEventTime = new Map<bigint, Bar>()
  for (const bar of existing) {
    byEventTime.set(bar.eventTime, bar)
  }
  for (const bar of incoming) {
    byEventTime.set(bar.eventTime, bar)
  }
  return [...byEventTime.values()].sort(compareBarsByEventTime)
}

function assertSafeInstrumentId(instrumentId: string): void {
  parseInstrumentId(instrumentId)
  if (!SAFE_SEGMENT.test(instrumentId)) {
    throw new InvalidRequestError(`Instrument id "${instrumentId}" contains characters not allowed in catalog paths`, {
      instrumentId,
    })
  }
}

function parseDescriptorFile(filePath: string, text: string): InstrumentDescriptor {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new CatalogCorruptionError(`Descriptor ${filePath} is not valid JSON`, { path: filePath, reason: 'invalid JSON' }, { cause: error })
  }
  const parsed = InstrumentDescriptorSchema.safeParse(raw)
  if (!parsed.success) {
    throw new CatalogCorruptionError(`Descriptor ${filePath} is malformed`, {
      path: filePath,
      reason: formatDescriptorIssues(parsed.error),
    })
  }
  return parsed.data
}

async function readDirectoryNames(directory: string, kind: 'files' | 'directories' | 'all' = 'all'): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true })
    return entries
      .filter((entry) => kind === 'all' || (kind === 'files' ? entry.isFile() : entry.isDirectory()))
      .map((entry) => entry.name)
      .sort()
  } catch (error) {
    if (isMissingFile(error)) {
      return []
    }
    throw error
  }
}
