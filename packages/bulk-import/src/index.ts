/**
 * @barvault/bulk-import
 *
 * CSV → validated bars → column store, with skip / overwrite / merge
 * handling of ranges that already exist.
 */

export { CONFLICT_POLICIES, CsvBarImporter, isConflictPolicy } from './csvBarImporter.js'
export type { ConflictPolicy, CsvBarImporterOptions, ImportResult, ImportStore, ImportTarget } from './csvBarImporter.js'
export { REQUIRED_COLUMNS, parseCsvRows } from './csvRows.js'
export type { CsvRow, RequiredColumn } from './csvRows.js'
export { rowToBar } from './rowValidation.js'
export type { RowContext } from './rowValidation.js'
