/**
 * Fixture-based remote client for deterministic runs and tests.
 *
 * Bars are synthesized from a seeded generator keyed on instrument,
 * timeframe and bar slot, so the same slot always yields the same bar no
 * matter which range asked for it.
 */

import {
  createPrice,
  floorDiv,
  InvalidRequestError,
  lastOpenTime,
  NANOS_PER_MILLI,
  parseInstrumentId,
  ProviderConnectionError,
  SymbolResolutionError,
  timeframeIntervalNanos,
} from '@barvault/contracts';
import type {
  Bar,
  InstrumentDescriptor,
  RemoteBarsRequest,
  RemoteBarsResult,
  RemoteDataClient,
} from '@barvault/contracts';
import { createSilentLogger } from '@barvault/logger';
import type { Logger } from '@barvault/logger';

export interface FixtureRemoteClientConfig {
  logger?: Logger;

  /** Delay added to every call */
  latencyMs?: number;

  /** Instrument ids the fixture pretends not to know */
  unknownInstruments?: string[];

  /** Upper bound on bars per request */
  maxBarsPerRequest?: number;

  /** Ingest clock, nanoseconds UTC */
  clock?: () => bigint;
}

export interface FixtureClientStats {
  connectCalls: number;
  barRequests: number;
  descriptorRequests: number;
  failuresInjected: number;
}

const DEFAULT_MAX_BARS = 50_000;

/**
 * Seeded random number generator for deterministic fixtures
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

/**
 * FNV-1a hash of a string, as an unsigned 32-bit integer
 */
export function hashString(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Remote client that never leaves the process.
 *
 * @example
 * ```typescript
 * const client = new FixtureRemoteClient({ latencyMs: 25 });
 * await client.connect(30_000);
 * const { bars } = await client.fetchBars({ instrumentId: 'ACME.XNAS', timeframeSpec: '1-MINUTE-LAST', start, end });
 * ```
 */
export class FixtureRemoteClient implements RemoteDataClient {
  readonly name = 'fixture';

  private connected = false;
  private readonly logger: Logger;
  private readonly latencyMs: number;
  private readonly unknownInstruments: Set<string>;
  private readonly maxBarsPerRequest: number;
  private readonly clock: () => bigint;
  private readonly pendingFailures: Error[] = [];
  private readonly stats: FixtureClientStats = {
    connectCalls: 0,
    barRequests: 0,
    descriptorRequests: 0,
    failuresInjected: 0,
  };

  constructor(config: FixtureRemoteClientConfig = {}) {
    this.logger = (config.logger ?? createSilentLogger()).child({ component: 'fixture-client' });
    this.latencyMs = config.latencyMs ?? 0;
    this.unknownInstruments = new Set(config.unknownInstruments ?? []);
    this.maxBarsPerRequest = config.maxBarsPerRequest ?? DEFAULT_MAX_BARS;
    this.clock = config.clock ?? (() => BigInt(Date.now()) * NANOS_PER_MILLI);
  }

  isConnected(): boolean {
    return this.connected;
  }

  async connect(_timeoutMs: number): Promise<void> {
    this.stats.connectCalls++;
    await this.simulateDelay();
    this.connected = true;
    this.logger.debug('Fixture client connected');
  }

  /**
   * Makes the next `times` bar requests fail with `error`.
   */
  failNext(error: Error, times = 1): void {
    for (let i = 0; i < times; i++) {
      this.pendingFailures.push(error);
    }
  }

  getStats(): FixtureClientStats {
    return { ...this.stats };
  }

  async fetchBars(request: RemoteBarsRequest): Promise<RemoteBarsResult> {
    this.stats.barRequests++;
    this.assertConnected();
    await this.simulateDelay(request.signal);

    const failure = this.pendingFailures.shift();
    if (failure) {
      this.stats.failuresInjected++;
      throw failure;
    }

    const descriptor = this.describe(request.instrumentId);
    const bars = this.generateBars(request);
    this.logger.debug('Fixture client returning bars', {
      instrument_id: request.instrumentId,
      timeframe_spec: request.timeframeSpec,
      count: bars.length,
    });
    return { bars, descriptor };
  }

  async fetchDescriptor(instrumentId: string, signal?: AbortSignal): Promise<InstrumentDescriptor> {
    this.stats.descriptorRequests++;
    this.assertConnected();
    await this.simulateDelay(signal);
    return this.describe(instrumentId);
  }

  private describe(instrumentId: string): InstrumentDescriptor {
    if (this.unknownInstruments.has(instrumentId)) {
      throw new SymbolResolutionError(`Fixture provider does not list ${instrumentId}`, { instrumentId });
    }
    const { symbol, venue } = parseInstrumentId(instrumentId);
    return {
      instrumentId,
      symbol,
      venue,
      assetClass: 'EQUITY',
      currency: 'USD',
      pricePrecision: 2,
      tickSize: '0.01',
      lotSize: 1,
    };
  }

  private generateBars(request: RemoteBarsRequest): Bar[] {
    const interval = timeframeIntervalNanos(request.timeframeSpec);
    const firstSlot = -floorDiv(-request.start, interval);
    const lastSlot = floorDiv(lastOpenTime(request.start, request.end), interval);
    const count = lastSlot - firstSlot + 1n;
    if (count > BigInt(this.maxBarsPerRequest)) {
      throw new InvalidRequestError(`Range spans ${count} bars, above the ${this.maxBarsPerRequest} bar limit`, {
        instrumentId: request.instrumentId,
        timeframeSpec: request.timeframeSpec,
      });
    }

    const ingestTime = this.clock();
    const bars: Bar[] = [];
    for (let slot = firstSlot; slot <= lastSlot; slot++) {
      bars.push(this.barAt(request.instrumentId, request.timeframeSpec, slot, interval, ingestTime));
    }
    return bars;
  }

  private barAt(instrumentId: string, timeframeSpec: string, slot: bigint, interval: bigint, ingestTime: bigint): Bar {
    const random = seededRandom(hashString(`${instrumentId}|${timeframeSpec}|${slot}`));

    // Base between 50.00 and 500.00, in cents
    const base = 5_000 + (hashString(instrumentId) % 45_000);
    const mid = base + Math.sin(Number(slot % 100_000n) / 25) * base * 0.02;
    const open = Math.round(mid + (random() - 0.5) * base * 0.004);
    const close = Math.round(mid + (random() - 0.5) * base * 0.004);
    const high = Math.max(open, close) + Math.round(random() * base * 0.002);
    const low = Math.min(open, close) - Math.round(random() * base * 0.002);

    return {
      instrumentId,
      timeframeSpec,
      open: createPrice(BigInt(open), 2),
      high: createPrice(BigInt(high), 2),
      low: createPrice(BigInt(low), 2),
      close: createPrice(BigInt(close), 2),
      volume: BigInt(1_000 + Math.floor(random() * 9_000)),
      eventTime: slot * interval,
      ingestTime,
    };
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new ProviderConnectionError('Fixture client is not connected', { provider: this.name });
    }
  }

  private async simulateDelay(signal?: AbortSignal): Promise<void> {
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }
    if (signal?.aborted) {
      throw new ProviderConnectionError('Request aborted', { provider: this.name });
    }
  }
}
