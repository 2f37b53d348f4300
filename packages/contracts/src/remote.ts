/**
 * @fileoverview Contract for remote historical data providers.
 *
 * The catalog talks to a provider only through this interface; the wire
 * protocol behind it is the implementation's concern.
 *
 * @module @barvault/contracts/remote
 */

import type { Bar, InstrumentDescriptor } from './market.js';

export interface RemoteBarsRequest {
  instrumentId: string;
  timeframeSpec: string;

  /** Range start, nanoseconds UTC */
  start: bigint;

  /**
   * Range end, nanoseconds UTC. Bars are selected by open time over
   * `[start, end)`; when `start === end` the bar opening at `start`.
   */
  end: bigint;

  /** Aborted when the attempt times out */
  signal?: AbortSignal;
}

export interface RemoteBarsResult {
  bars: Bar[];
  descriptor: InstrumentDescriptor;
}

/**
 * A remote source of historical bars and instrument descriptors.
 *
 * Implementations throw ProviderConnectionError / ProviderTimeoutError /
 * RateLimitExceededError for transient failures and SymbolResolutionError /
 * InvalidRequestError for requests that can never succeed.
 */
export interface RemoteDataClient {
  /** Provider name used in logs and error payloads */
  readonly name: string;

  isConnected(): boolean;

  /**
   * Opens the connection. Rejects if it is not ready within `timeoutMs`.
   */
  connect(timeoutMs: number): Promise<void>;

  fetchBars(request: RemoteBarsRequest): Promise<RemoteBarsResult>;

  fetchDescriptor(instrumentId: string, signal?: AbortSignal): Promise<InstrumentDescriptor>;
}
