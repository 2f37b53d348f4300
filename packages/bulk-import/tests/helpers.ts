import { mkdtemp, rm } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

/** 2024-01-02T14:30:00Z */
export const T0 = 1_704_205_800_000_000_000n
export const MINUTE = 60_000_000_000n

export const HEADER = 'timestamp,open,high,low,close,volume'

export interface LineFields {
  open?: string
  high?: string
  low?: string
  close?: string
  volume?: string
}

/**
 * One CSV line for 2024-01-02 at 14:30 + `minute`.
 */
export function line(minute: number, fields: LineFields = {}): string {
  const timestamp = `2024-01-02T14:${String(30 + minute).padStart(2, '0')}:00Z`
  return [
    timestamp,
    fields.open ?? '100.00',
    fields.high ?? '101.50',
    fields.low ?? '99.25',
    fields.close ?? '100.75',
    fields.volume ?? '1000',
  ].join(',')
}

export function csv(lines: string[]): string {
  return [HEADER, ...lines].join('\n') + '\n'
}

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'barvault-import-'))
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}
