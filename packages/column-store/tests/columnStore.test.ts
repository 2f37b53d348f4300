/**
 * ColumnStore against a temporary catalog directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, readdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { parquetWriteBuffer } from 'hyparquet-writer'
import { CatalogCorruptionError, InvalidRequestError, parsePrice } from '@barvault/contracts'
import { ColumnStore } from '../src/columnStore.js'
import { describeSchemaMismatch } from '../src/parquetCodec.js'
import { formatPartitionFileName } from '../src/partitionNaming.js'
import { ACME_DESCRIPTOR, MINUTE, T0, createTempDir, makeBar, makeBars } from './fixtures.js'

const SPEC = '1-MINUTE-LAST'
const PARTITION_DIR = ['data', 'bar', 'ACME.XNAS-1-MINUTE-LAST-EXTERNAL']

function foreignParquet(): Uint8Array {
  return new Uint8Array(parquetWriteBuffer({ columnData: [{ name: 'foo', data: [1, 2], type: 'INT32' }] }))
}

describe('ColumnStore', () => {
  let dir: string
  let cleanup: () => Promise<void>
  let store: ColumnStore

  beforeEach(async () => {
    ;({ dir, cleanup } = await createTempDir())
    store = new ColumnStore({ root: dir })
  })

  afterEach(async () => {
    await cleanup()
  })

  describe('writeBars / query', () => {
    it('should round-trip bars exactly', async () => {
      const bars = makeBars([0, 1, 2])
      await store.writeBars(bars)

      expect(await store.query('ACME.XNAS', SPEC, T0, T0 + 10n * MINUTE)).toEqual(bars)
    })

    it('should name the file after the coverage range', async () => {
      const coverage = { start: T0 - 30n * MINUTE, end: T0 + 30n * MINUTE }
      const meta = await store.writeBars(makeBars([0, 1]), { coverage, correlationId: 'test-1' })

      expect(meta).not.toBeNull()
      expect(path.basename(meta?.filePath ?? '')).toBe(formatPartitionFileName(coverage))
      expect(meta?.start).toBe(coverage.start)
      expect(meta?.rowCount).toBe(2)
    })

    it('should widen coverage to include every bar', async () => {
      const meta = await store.writeBars(makeBars([0, 5]), { coverage: { start: T0 + MINUTE, end: T0 + 2n * MINUTE } })

      expect(meta?.start).toBe(T0)
      expect(meta?.end).toBe(T0 + 5n * MINUTE)
    })

    it('should sort unsorted input before writing', async () => {
      await store.writeBars([makeBar(2), makeBar(0), makeBar(1)])

      const bars = await store.query('ACME.XNAS', SPEC, T0, T0 + 2n * MINUTE)
      expect(bars.map((bar) => bar.eventTime)).toEqual([T0, T0 + MINUTE, T0 + 2n * MINUTE])
    })

    it('should return only bars inside the inclusive range', async () => {
      await store.writeBars(makeBars([0, 1, 2, 3]))

      const bars = await store.query('ACME.XNAS', SPEC, T0 + MINUTE, T0 + 2n * MINUTE)
      expect(bars.map((bar) => bar.eventTime)).toEqual([T0 + MINUTE, T0 + 2n * MINUTE])
    })

    it('should merge overlapping files with the latest ingest winning', async () => {
      await store.writeBars(makeBars([0, 1]))
      const revised = makeBar(1, { close: parsePrice('101.00'), ingestTime: T0 + 2000n * MINUTE })
      await store.writeBars([revised, makeBar(2, { ingestTime: T0 + 2000n * MINUTE })])

      const bars = await store.query('ACME.XNAS', SPEC, T0, T0 + 5n * MINUTE)
      expect(bars).toHaveLength(3)
      expect(bars[1]).toEqual(revised)
    })

    it('should merge into an existing file with the same range', async () => {
      const coverage = { start: T0, end: T0 + 10n * MINUTE }
      await store.writeBars(makeBars([0, 1]), { coverage })
      const revised = makeBar(1, { close: parsePrice('101.25') })
      await store.writeBars([revised, makeBar(2)], { coverage })

      const files = await readdir(path.join(dir, ...PARTITION_DIR))
      expect(files).toEqual([formatPartitionFileName(coverage)])
      const bars = await store.query('ACME.XNAS', SPEC, T0, T0 + 10n * MINUTE)
      expect(bars).toEqual([makeBar(0), revised, makeBar(2)])
    })

    it('should report whether a write merged into an existing file', async () => {
      const coverage = { start: T0, end: T0 + 10n * MINUTE }

      const first = await store.writeBars(makeBars([0, 1]), { coverage })
      const second = await store.writeBars(makeBars([1, 2, 3]), { coverage })

      expect(first).toMatchObject({ mergedWithExisting: false, replacedRowCount: 0, rowCount: 2 })
      expect(second).toMatchObject({ mergedWithExisting: true, replacedRowCount: 2, rowCount: 4 })
    })

    it('should replace an unreadable file with the same range', async () => {
      const coverage = { start: T0, end: T0 + 10n * MINUTE }
      const partitionDir = path.join(dir, ...PARTITION_DIR)
      await mkdir(partitionDir, { recursive: true })
      await writeFile(path.join(partitionDir, formatPartitionFileName(coverage)), foreignParquet())

      const meta = await store.writeBars(makeBars([0, 1]), { coverage })

      expect(meta).toMatchObject({ mergedWithExisting: false, replacedRowCount: 0, rowCount: 2 })
      expect(await store.query('ACME.XNAS', SPEC, T0, T0 + 10n * MINUTE)).toEqual(makeBars([0, 1]))
    })

    it('should skip unreadable files when querying', async () => {
      await store.writeBars(makeBars([0, 1]))
      const partitionDir = path.join(dir, ...PARTITION_DIR)
      await writeFile(path.join(partitionDir, formatPartitionFileName({ start: T0, end: T0 + 5n * MINUTE })), foreignParquet())

      expect(await store.query('ACME.XNAS', SPEC, T0, T0 + 5n * MINUTE)).toEqual(makeBars([0, 1]))
    })

    it('should keep mixed precisions per row', async () => {
      const bar = makeBar(0, { open: parsePrice('100.5'), high: parsePrice('101.125') })
      await store.writeBars([bar])

      const [stored] = await store.query('ACME.XNAS', SPEC, T0, T0)
      expect(stored?.open).toEqual({ raw: 100500n, precision: 3 })
      expect(stored?.high).toEqual({ raw: 101125n, precision: 3 })
      expect(stored?.low).toEqual({ raw: 99250n, precision: 3 })
    })

    it('should write nothing for an empty batch', async () => {
      expect(await store.writeBars([])).toBeNull()
      expect(await store.scanPartitions()).toEqual([])
    })

    it('should reject batches that break bar invariants', async () => {
      const broken = makeBar(0, { low: parsePrice('200.00') })
      await expect(store.writeBars([broken])).rejects.toThrow(InvalidRequestError)
      await expect(store.writeBars([makeBar(0), makeBar(0)])).rejects.toThrow('Refusing to write an invalid bar batch')
    })

    it('should reject a query with start after end', async () => {
      await expect(store.query('ACME.XNAS', SPEC, T0 + 1n, T0)).rejects.toThrow(InvalidRequestError)
    })

    it('should return an empty list for an unknown key', async () => {
      expect(await store.query('OTHER.XNAS', SPEC, T0, T0 + MINUTE)).toEqual([])
    })
  })

  describe('scanPartitions', () => {
    it('should report range, row count and size per file', async () => {
      await store.writeBars(makeBars([0, 1, 2]))
      await store.writeBars(makeBars([0], { timeframeSpec: '1-DAY-LAST' }))

      const partitions = await store.scanPartitions()
      expect(partitions).toHaveLength(2)
      const minute = partitions.find((partition) => partition.timeframeSpec === SPEC)
      expect(minute?.instrumentId).toBe('ACME.XNAS')
      expect(minute?.aggregationSource).toBe('EXTERNAL')
      expect(minute?.start).toBe(T0)
      expect(minute?.end).toBe(T0 + 2n * MINUTE)
      expect(minute?.rowCount).toBe(3)
      expect(minute?.sizeBytes).toBeGreaterThan(0)
    })

    it('should skip corrupt names and contents without failing', async () => {
      await store.writeBars(makeBars([0, 1]))
      const partitionDir = path.join(dir, ...PARTITION_DIR)
      await writeFile(path.join(partitionDir, 'garbage.parquet'), 'x')
      await writeFile(path.join(partitionDir, formatPartitionFileName({ start: T0, end: T0 + 99n })), 'not parquet')
      await writeFile(path.join(partitionDir, '.pending.parquet.123.tmp'), 'partial')
      await mkdir(path.join(dir, 'data', 'bar', 'junk'))

      const corrupt: CatalogCorruptionError[] = []
      const partitions = await store.scanPartitions({ onCorrupt: (error) => corrupt.push(error) })

      expect(partitions).toHaveLength(1)
      expect(partitions[0]?.rowCount).toBe(2)
      expect(corrupt).toHaveLength(3)
      expect(corrupt.every((error) => error instanceof CatalogCorruptionError)).toBe(true)
    })

    it('should skip a readable file whose columns are not bar columns', async () => {
      const partitionDir = path.join(dir, ...PARTITION_DIR)
      await mkdir(partitionDir, { recursive: true })
      await writeFile(path.join(partitionDir, formatPartitionFileName({ start: T0, end: T0 + 2n * MINUTE })), foreignParquet())

      const corrupt: CatalogCorruptionError[] = []
      const partitions = await store.scanPartitions({ onCorrupt: (error) => corrupt.push(error) })

      expect(partitions).toEqual([])
      expect(corrupt).toHaveLength(1)
      expect(corrupt[0]?.data).toMatchObject({ reason: 'missing column ts_event' })
    })

    it('should return nothing for an empty catalog', async () => {
      expect(await store.scanPartitions()).toEqual([])
    })
  })

  describe('deleteRange', () => {
    it('should remove only bars inside the range', async () => {
      await store.writeBars(makeBars([0, 1, 2, 3, 4]))

      const removed = await store.deleteRange('ACME.XNAS', SPEC, T0 + MINUTE, T0 + 2n * MINUTE)

      expect(removed).toBe(2)
      const bars = await store.query('ACME.XNAS', SPEC, T0, T0 + 10n * MINUTE)
      expect(bars.map((bar) => bar.eventTime)).toEqual([T0, T0 + 3n * MINUTE, T0 + 4n * MINUTE])
      const partitions = await store.scanPartitions()
      expect(partitions.map((partition) => [partition.start, partition.end])).toEqual([
        [T0, T0 + MINUTE - 1n],
        [T0 + 2n * MINUTE + 1n, T0 + 4n * MINUTE],
      ])
    })

    it('should drop files that become empty', async () => {
      await store.writeBars(makeBars([0, 1]))

      expect(await store.deleteRange('ACME.XNAS', SPEC, T0, T0 + MINUTE)).toBe(2)
      expect(await store.scanPartitions()).toEqual([])
    })
  })

  describe('descriptors', () => {
    it('should round-trip a descriptor', async () => {
      await store.writeDescriptor(ACME_DESCRIPTOR)

      expect(await store.loadDescriptor('ACME.XNAS')).toEqual(ACME_DESCRIPTOR)
      expect(await store.listDescriptors()).toEqual([ACME_DESCRIPTOR])
    })

    it('should return null for a missing descriptor', async () => {
      expect(await store.loadDescriptor('MISSING.XNAS')).toBeNull()
    })

    it('should reject inconsistent descriptors', async () => {
      await expect(store.writeDescriptor({ ...ACME_DESCRIPTOR, pricePrecision: 4 })).rejects.toThrow(
        'pricePrecision: pricePrecision must match the decimal places of tickSize'
      )
      await expect(store.writeDescriptor({ ...ACME_DESCRIPTOR, venue: 'XNYS' })).rejects.toThrow(InvalidRequestError)
    })

    it('should report corrupt descriptor files', async () => {
      await store.writeDescriptor(ACME_DESCRIPTOR)
      await writeFile(path.join(dir, 'data', 'instrument', 'BROKEN.XNAS.json'), '{ nope')

      await expect(store.loadDescriptor('BROKEN.XNAS')).rejects.toThrow(CatalogCorruptionError)
      expect(await store.listDescriptors()).toEqual([ACME_DESCRIPTOR])
    })

    it('should refuse ids that escape the catalog', async () => {
      await expect(store.loadDescriptor('../etc.passwd')).rejects.toThrow(InvalidRequestError)
    })
  })
})

describe('describeSchemaMismatch', () => {
  const root = { name: 'root' }
  const barColumns = [
    { name: 'ts_event', type: 'INT64' },
    { name: 'ts_init', type: 'INT64' },
    { name: 'open', type: 'INT64' },
    { name: 'high', type: 'INT64' },
    { name: 'low', type: 'INT64' },
    { name: 'close', type: 'INT64' },
    { name: 'volume', type: 'INT64' },
    { name: 'price_precision', type: 'INT32' },
  ]

  it('should accept the bar layout', () => {
    expect(describeSchemaMismatch([root, ...barColumns])).toBeNull()
  })

  it('should name a column with the wrong physical type', () => {
    const schema = [root, ...barColumns.map((column) => (column.name === 'volume' ? { ...column, type: 'DOUBLE' } : column))]

    expect(describeSchemaMismatch(schema)).toBe('column volume is DOUBLE, expected INT64')
  })

  it('should reject extra columns', () => {
    expect(describeSchemaMismatch([root, ...barColumns, { name: 'note', type: 'BYTE_ARRAY' }])).toBe(
      'expected 8 columns, found 9'
    )
  })
})
