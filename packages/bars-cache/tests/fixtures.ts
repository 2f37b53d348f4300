import { parsePrice } from '@barvault/contracts'
import type {
  Bar,
  InstrumentDescriptor,
  PartitionMeta,
  RemoteBarsRequest,
  RemoteBarsResult,
  RemoteDataClient,
  WrittenPartition,
} from '@barvault/contracts'
import type { BarStore } from '../src/orchestrator.js'

/** 2024-01-02T14:30:00Z */
export const T0 = 1_704_205_800_000_000_000n
export const MINUTE = 60_000_000_000n
export const DAY = 86_400_000_000_000n

/** 2024-01-02T00:00:00Z */
export const DAY0 = 1_704_153_600_000_000_000n

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

export function makePartition(start: bigint, end: bigint, overrides: Partial<PartitionMeta> = {}): PartitionMeta {
  return {
    instrumentId: 'ACME.XNAS',
    timeframeSpec: '1-MINUTE-LAST',
    aggregationSource: 'EXTERNAL',
    start,
    end,
    filePath: `/catalog/${start}-${end}.parquet`,
    rowCount: 10,
    sizeBytes: 2048,
    ...overrides,
  }
}

/**
 * In-memory stand-in for the column store.
 */
export class MemoryBarStore implements BarStore {
  readonly bars: Bar[] = []
  readonly descriptors = new Map<string, InstrumentDescriptor>()
  readonly writes: { bars: number; coverage?: { start: bigint; end: bigint } }[] = []
  readonly operations: string[] = []

  async query(instrumentId: string, timeframeSpec: string, start: bigint, end: bigint): Promise<Bar[]> {
    this.operations.push('query')
    return this.bars.filter(
      (bar) =>
        bar.instrumentId === instrumentId &&
        bar.timeframeSpec === timeframeSpec &&
        bar.eventTime >= start &&
        bar.eventTime <= end
    )
  }

  async writeBars(
    bars: readonly Bar[],
    options: { coverage?: { start: bigint; end: bigint } } = {}
  ): Promise<WrittenPartition | null> {
    this.operations.push('writeBars')
    const first = bars[0]
    const last = bars[bars.length - 1]
    if (!first || !last) {
      return null
    }
    this.bars.push(...bars)
    this.writes.push({ bars: bars.length, coverage: options.coverage })
    const start = options.coverage?.start ?? first.eventTime
    const end = options.coverage?.end ?? last.eventTime
    return {
      ...makePartition(start, end, {
        instrumentId: first.instrumentId,
        timeframeSpec: first.timeframeSpec,
        rowCount: bars.length,
      }),
      mergedWithExisting: false,
      replacedRowCount: 0,
    }
  }

  async loadDescriptor(instrumentId: string): Promise<InstrumentDescriptor | null> {
    return this.descriptors.get(instrumentId) ?? null
  }

  async writeDescriptor(descriptor: InstrumentDescriptor): Promise<void> {
    this.operations.push('writeDescriptor')
    this.descriptors.set(descriptor.instrumentId, descriptor)
  }
}

type BarsHandler = (request: RemoteBarsRequest, call: number) => Promise<RemoteBarsResult>

/**
 * Scriptable provider: each fetchBars call runs the next handler, the last
 * handler repeats.
 */
export class FakeRemoteClient implements RemoteDataClient {
  readonly name = 'fake'
  connected = false
  connectCalls = 0
  connectError: Error | null = null
  readonly barRequests: RemoteBarsRequest[] = []
  readonly descriptorRequests: string[] = []
  descriptor: InstrumentDescriptor = ACME_DESCRIPTOR

  constructor(private readonly handlers: BarsHandler[] = []) {}

  isConnected(): boolean {
    return this.connected
  }

  async connect(_timeoutMs: number): Promise<void> {
    this.connectCalls += 1
    if (this.connectError) {
      throw this.connectError
    }
    this.connected = true
  }

  async fetchBars(request: RemoteBarsRequest): Promise<RemoteBarsResult> {
    this.barRequests.push(request)
    const handler = this.handlers[Math.min(this.barRequests.length, this.handlers.length) - 1]
    if (!handler) {
      return { bars: [], descriptor: this.descriptor }
    }
    return handler(request, this.barRequests.length)
  }

  async fetchDescriptor(instrumentId: string): Promise<InstrumentDescriptor> {
    this.descriptorRequests.push(instrumentId)
    return { ...this.descriptor, instrumentId }
  }
}

export function respondWith(bars: Bar[], descriptor: InstrumentDescriptor = ACME_DESCRIPTOR): BarsHandler {
  return async () => ({ bars, descriptor })
}

export function failWith(error: Error): BarsHandler {
  return async () => {
    throw error
  }
}

export const noSleep = async (_ms: number): Promise<void> => undefined
