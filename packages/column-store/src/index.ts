/**
 * @barvault/column-store
 *
 * Partitioned Parquet storage for bars plus JSON instrument descriptors.
 *
 * Example usage:
 * ```typescript
 * import { ColumnStore } from '@barvault/column-store'
 *
 * const store = new ColumnStore({ root: './data/catalog' })
 * await store.writeBars(bars, { correlationId: 'import-1' })
 * const partitions = await store.scanPartitions()
 * ```
 */

export { ColumnStore } from './columnStore.js'
export type { ColumnStoreOptions, WriteBarsOptions, ScanOptions } from './columnStore.js'
export {
  PARTITION_EXTENSION,
  formatPartitionStamp,
  parsePartitionStamp,
  formatPartitionFileName,
  parsePartitionFileName,
  formatPartitionDirectory,
  parsePartitionDirectory,
} from './partitionNaming.js'
export type { PartitionKey, PartitionRange } from './partitionNaming.js'
export { describeSchemaMismatch, encodeBars, readBarRows, readRowCount } from './parquetCodec.js'
export { InstrumentDescriptorSchema } from './descriptorSchema.js'
export { writeFileAtomic } from './atomicWrite.js'
