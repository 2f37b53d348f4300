/**
 * Partition directory and file naming.
 *
 * Directory: `{instrumentId}-{timeframeSpec}-{EXTERNAL|INTERNAL}`
 * File:      `{start}Z_{end}Z.parquet`, where each timestamp is rendered as
 *            `YYYY-MM-DDTHH-mm-ss-nnnnnnnnn` (UTC, no colons, nine
 *            nanosecond digits).
 *
 * Example:
 * ```
 * ACME.XNAS-1-MINUTE-LAST-EXTERNAL/
 *   2024-01-02T14-30-00-000000000Z_2024-01-02T20-59-00-000000000Z.parquet
 * ```
 */

import {
  NANOS_PER_SECOND,
  floorDiv,
  isValidTimeframeSpec,
  parseInstrumentId,
} from '@barvault/contracts'
import type { AggregationSource } from '@barvault/contracts'

export const PARTITION_EXTENSION = '.parquet'

export interface PartitionKey {
  instrumentId: string
  timeframeSpec: string
  aggregationSource: AggregationSource
}

export interface PartitionRange {
  start: bigint
  end: bigint
}

const STAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})-(\d{9})$/

/**
 * Renders a nanosecond timestamp as a filename-safe stamp (without the `Z`).
 */
export function formatPartitionStamp(nanos: bigint): string {
  const seconds = floorDiv(nanos, NANOS_PER_SECOND)
  const fraction = nanos - seconds * NANOS_PER_SECOND
  const iso = new Date(Number(seconds) * 1000).toISOString()
  const date = iso.slice(0, 10)
  const time = iso.slice(11, 19).replaceAll(':', '-')
  return `${date}T${time}-${fraction.toString().padStart(9, '0')}`
}

/**
 * Inverse of formatPartitionStamp. Returns null for anything malformed.
 */
export function parsePartitionStamp(stamp: string): bigint | null {
  const match = STAMP_PATTERN.exec(stamp)
  if (!match) {
    return null
  }
  const [, date, hours, minutes, seconds, fraction] = match
  const ms = Date.parse(`${date}T${hours}:${minutes}:${seconds}Z`)
  if (Number.isNaN(ms) || new Date(ms).toISOString().slice(0, 19) !== `${date}T${hours}:${minutes}:${seconds}`) {
    return null
  }
  return BigInt(ms / 1000) * NANOS_PER_SECOND + BigInt(fraction ?? '0')
}

export function formatPartitionFileName(range: PartitionRange): string {
  return `${formatPartitionStamp(range.start)}Z_${formatPartitionStamp(range.end)}Z${PARTITION_EXTENSION}`
}

/**
 * Parses `{start}Z_{end}Z.parquet`. Returns null for malformed names or a
 * start after the end.
 */
export function parsePartitionFileName(fileName: string): PartitionRange | null {
  if (!fileName.endsWith(PARTITION_EXTENSION)) {
    return null
  }
  const body = fileName.slice(0, -PARTITION_EXTENSION.length)
  const parts = body.split('_')
  if (parts.length !== 2) {
    return null
  }
  const [startPart = '', endPart = ''] = parts
  if (!startPart.endsWith('Z') || !endPart.endsWith('Z')) {
    return null
  }
  const start = parsePartitionStamp(startPart.slice(0, -1))
  const end = parsePartitionStamp(endPart.slice(0, -1))
  if (start === null || end === null || start > end) {
    return null
  }
  return { start, end }
}

export function formatPartitionDirectory(key: PartitionKey): string {
  return `${key.instrumentId}-${key.timeframeSpec}-${key.aggregationSource}`
}

/**
 * Parses a partition directory name from the right: the last segment is the
 * aggregation source, the three before it the timeframe spec, and whatever
 * remains the instrument id (which may itself contain dashes).
 */
export function parsePartitionDirectory(name: string): PartitionKey | null {
  const segments = name.split('-')
  if (segments.length < 5) {
    return null
  }
  const aggregationSource = segments[segments.length - 1]
  const timeframeSpec = segments.slice(-4, -1).join('-')
  const instrumentId = segments.slice(0, -4).join('-')

  if (aggregationSource !== 'EXTERNAL' && aggregationSource !== 'INTERNAL') {
    return null
  }
  if (!isValidTimeframeSpec(timeframeSpec)) {
    return null
  }
  try {
    parseInstrumentId(instrumentId)
  } catch {
    return null
  }
  return { instrumentId, timeframeSpec, aggregationSource }
}
