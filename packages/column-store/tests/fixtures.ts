import { mkdtemp, rm } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { parsePrice } from '@barvault/contracts'
import type { Bar, InstrumentDescriptor } from '@barvault/contracts'

/** 2024-01-02T14:30:00Z */
export const T0 = 1_704_205_800_000_000_000n
export const MINUTE = 60_000_000_000n

export function makeBar(index: number, overrides: Partial<Bar> = {}): Bar {
  return {
    instrumentId: 'ACME.XNAS',
    timeframeSpec: '1-MINUTE-LAST',
    open: parsePrice(`${100 + index}.00`),
    high: parsePrice(`${101 + index}.50`),
    low: parsePrice(`${99 + index}.25`),
    close: parsePrice(`${100 + index}.75`),
    volume: BigInt(1000 + index),
    eventTime: T0 + BigInt(index) * MINUTE,
    ingestTime: T0 + 1000n * MINUTE,
    ...overrides,
  }
}

export function makeBars(indexes: number[], overrides: Partial<Bar> = {}): Bar[] {
  return indexes.map((index) => makeBar(index, overrides))
}

export const ACME_DESCRIPTOR: InstrumentDescriptor = {
  instrumentId: 'ACME.XNAS',
  symbol: 'ACME',
  venue: 'XNAS',
  assetClass: 'EQUITY',
  currency: 'USD',
  pricePrecision: 2,
  tickSize: '0.01',
  lotSize: 1,
}

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'barvault-store-'))
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}
