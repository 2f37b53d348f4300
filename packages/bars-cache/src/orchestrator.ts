/**
 * Fetch-or-load: serve a bar range from the local catalog when the
 * availability index says it is covered, otherwise fetch it from the remote
 * provider under rate limiting and retry, persist it, and serve it.
 */

import {
  BarVaultError,
  DataNotFoundError,
  endOfUtcDay,
  floorToUtcDay,
  InvalidRequestError,
  isDateLevel,
  isRateLimitExceededError,
  lastOpenTime,
  nanosToIso,
  parseInstrumentId,
  ProviderUnavailableError,
  RateLimitExceededError,
  toNanos,
  validateSeries,
} from '@barvault/contracts'
import type {
  Bar,
  FetchRequest,
  InstrumentDescriptor,
  RemoteBarsResult,
  RemoteDataClient,
  TimeInput,
  TimeRangeAvailability,
  WrittenPartition,
} from '@barvault/contracts'
import { createSilentLogger, getCorrelationId, startTimer, withCorrelation } from '@barvault/logger'
import type { Logger } from '@barvault/logger'
import type { AvailabilityIndex } from './availabilityIndex.js'
import { FetchRequestLedger } from './fetchRequest.js'
import { KeyedMutex } from './keyedMutex.js'
import type { SlidingWindowRateLimiter } from './rateLimiter.js'
import { describeError, isRetryExhaustedError } from './retryPolicy.js'
import type { RetryPolicy } from './retryPolicy.js'
import { TimeframeResolver } from './timeframeResolver.js'
import { createVenueResolvers, resolveVenue } from './venueResolution.js'
import type { VenueResolverStep, VenueSource } from './venueResolution.js'

/**
 * Storage operations the orchestrator needs; the column store provides them.
 */
export interface BarStore {
  query(instrumentId: string, timeframeSpec: string, start: bigint, end: bigint): Promise<Bar[]>
  writeBars(
    bars: readonly Bar[],
    options?: { correlationId?: string; coverage?: { start: bigint; end: bigint } }
  ): Promise<WrittenPartition | null>
  loadDescriptor(instrumentId: string): Promise<InstrumentDescriptor | null>
  writeDescriptor(descriptor: InstrumentDescriptor): Promise<void>
}

export interface FetchOrchestratorOptions {
  store: BarStore
  index: AvailabilityIndex
  rateLimiter: SlidingWindowRateLimiter
  retryPolicy: RetryPolicy

  /** Remote provider; without one only cached ranges can be served */
  client?: RemoteDataClient | null

  timeframeResolver?: TimeframeResolver
  venueResolvers?: readonly VenueResolverStep[]
  ledger?: FetchRequestLedger

  /** Budget for the lazy first connect (default 30000) */
  connectTimeoutMs?: number

  logger?: Logger
}

export interface FetchOrLoadOptions {
  correlationId?: string
}

/**
 * Bars are served by open time over `[start, end)`; see `lastOpenTime`.
 */
export interface FetchOrLoadResult {
  bars: Bar[]
  descriptor: InstrumentDescriptor
  venue: string
  venueSource: VenueSource
  timeframeSpec: string
  source: 'catalog' | 'remote'

  /** True when a missing descriptor was fetched on a cache hit */
  descriptorBackfilled: boolean

  /** Tracked remote fetch; null when served from the catalog */
  request: FetchRequest | null
}

export type AvailabilityStatus = 'covered' | 'partial' | 'missing'

export interface AvailabilityCheck {
  instrumentId: string
  timeframeSpec: string

  /** Normalized range that was checked */
  start: bigint
  end: bigint
  status: AvailabilityStatus
  availability: TimeRangeAvailability | null
}

interface ResolvedRange {
  timeframeSpec: string
  start: bigint
  end: bigint
}

export interface EnsureDescriptorResult {
  descriptor: InstrumentDescriptor
  backfilled: boolean
}

/**
 * The provider answered, but with data that breaks an invariant. Never retried.
 */
export class InvalidProviderResponseError extends BarVaultError {
  constructor(message: string, data: { instrumentId: string; issues: string[]; [key: string]: unknown }) {
    super('INVALID_PROVIDER_RESPONSE', message, data, {
      resolution: ['Report the malformed response to the provider', 'Import the range from a CSV file instead'],
    })
  }
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000

/**
 * Example:
 * ```typescript
 * const orchestrator = new FetchOrchestrator({ store, index, rateLimiter, retryPolicy, client, logger })
 *
 * const result = await orchestrator.fetchOrLoad('ACME.XNAS', '2024-01-02', '2024-01-05')
 * result.source  // 'catalog' or 'remote'
 * ```
 */
export class FetchOrchestrator {
  readonly ledger: FetchRequestLedger

  private readonly store: BarStore
  private readonly index: AvailabilityIndex
  private readonly rateLimiter: SlidingWindowRateLimiter
  private readonly retryPolicy: RetryPolicy
  private readonly client: RemoteDataClient | null
  private readonly timeframeResolver: TimeframeResolver
  private readonly venueResolvers: readonly VenueResolverStep[]
  private readonly connectTimeoutMs: number
  private readonly guard = new KeyedMutex()
  private readonly logger: Logger
  private connecting: Promise<void> | null = null

  constructor(options: FetchOrchestratorOptions) {
    this.store = options.store
    this.index = options.index
    this.rateLimiter = options.rateLimiter
    this.retryPolicy = options.retryPolicy
    this.client = options.client ?? null
    this.timeframeResolver = options.timeframeResolver ?? new TimeframeResolver()
    this.venueResolvers = options.venueResolvers ?? createVenueResolvers()
    this.ledger = options.ledger ?? new FetchRequestLedger()
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'fetch-orchestrator' })
  }

  /**
   * Returns bars for the range, from the catalog or the remote provider.
   *
   * @throws InvalidRequestError for a malformed id or start after end
   * @throws DataNotFoundError when the range is not cached and no provider is
   *   reachable, or when cached bars have no descriptor and the backfill fails
   * @throws ProviderUnavailableError / RateLimitExceededError once retries run out
   */
  async fetchOrLoad(
    instrumentId: string,
    start: TimeInput,
    end: TimeInput,
    timeframeSpec?: string,
    options: FetchOrLoadOptions = {}
  ): Promise<FetchOrLoadResult> {
    const correlationId = options.correlationId ?? getCorrelationId()
    return withCorrelation(() => this.run(instrumentId, start, end, timeframeSpec), correlationId)
  }

  /**
   * Reports how much of the range the catalog holds without fetching anything.
   * The range is normalized exactly as `fetchOrLoad` would normalize it.
   */
  checkAvailability(instrumentId: string, start: TimeInput, end: TimeInput, timeframeSpec?: string): AvailabilityCheck {
    const range = this.resolveRange(instrumentId, start, end, timeframeSpec)
    const availability = this.index.get(instrumentId, range.timeframeSpec) ?? null
    const status: AvailabilityStatus = this.index.coversRange(instrumentId, range.timeframeSpec, range.start, range.end)
      ? 'covered'
      : this.index.overlapsRange(instrumentId, range.timeframeSpec, range.start, range.end)
        ? 'partial'
        : 'missing'
    return { instrumentId, ...range, status, availability }
  }

  /**
   * Makes sure a descriptor exists locally, fetching only the descriptor
   * when it is missing. Cached bars are never handed out without one.
   *
   * @throws DataNotFoundError when the descriptor is missing and cannot be backfilled
   */
  async ensureDescriptor(instrumentId: string): Promise<EnsureDescriptorResult> {
    const existing = await this.store.loadDescriptor(instrumentId)
    if (existing) {
      return { descriptor: existing, backfilled: false }
    }

    try {
      const client = await this.connectedClient(instrumentId)
      const descriptor = await this.retryPolicy.execute(
        async (_attempt, signal) => {
          await this.rateLimiter.acquire()
          return client.fetchDescriptor(instrumentId, signal)
        },
        { operationName: 'descriptor fetch' }
      )
      if (descriptor.instrumentId !== instrumentId) {
        throw new InvalidProviderResponseError(`Provider returned a descriptor for ${descriptor.instrumentId}`, {
          instrumentId,
          issues: [`descriptor is for ${descriptor.instrumentId}`],
        })
      }
      await this.store.writeDescriptor(descriptor)
      this.logger.info('descriptor_backfilled', { instrument_id: instrumentId })
      return { descriptor, backfilled: true }
    } catch (error) {
      this.logger.warn('descriptor_backfill_failed', { instrument_id: instrumentId, error: describeError(error) })
      throw new DataNotFoundError(
        `Cached bars for ${instrumentId} have no descriptor and the backfill failed`,
        { instrumentId, reason: 'descriptor_backfill_failed', backfillError: describeError(error) },
        {
          cause: error,
          resolution: [
            'Check that the remote provider is configured and reachable',
            `Retry the request once the provider lists ${instrumentId}`,
            'Write the descriptor to data/instrument/ by hand if the provider cannot supply it',
          ],
        }
      )
    }
  }

  private async run(
    instrumentId: string,
    startInput: TimeInput,
    endInput: TimeInput,
    explicitTimeframe: string | undefined
  ): Promise<FetchOrLoadResult> {
    const timer = startTimer()
    const { timeframeSpec, start, end } = this.resolveRange(instrumentId, startInput, endInput, explicitTimeframe)

    const fields = {
      instrument_id: instrumentId,
      timeframe_spec: timeframeSpec,
      start: nanosToIso(start),
      end: nanosToIso(end),
    }
    this.logger.debug('fetch_or_load_started', fields)

    return this.guard.run(`${instrumentId}|${timeframeSpec}`, async () => {
      if (this.index.coversRange(instrumentId, timeframeSpec, start, end)) {
        const bars = await this.store.query(instrumentId, timeframeSpec, start, lastOpenTime(start, end))
        const { descriptor, backfilled } = await this.ensureDescriptor(instrumentId)
        const venue = resolveVenue({ instrumentId, descriptor, bars }, this.venueResolvers)
        this.logger.info('availability_cache_hit', { ...fields, bars: bars.length, duration_ms: timer.stop() })
        return {
          bars,
          descriptor,
          venue: venue.venue,
          venueSource: venue.source,
          timeframeSpec,
          source: 'catalog',
          descriptorBackfilled: backfilled,
          request: null,
        }
      }

      this.logger.info('availability_cache_miss', fields)
      const { result, request } = await this.fetchRemote(instrumentId, timeframeSpec, start, end)
      const bars = await this.persist(result, instrumentId, timeframeSpec, start, end)
      const venue = resolveVenue({ instrumentId, descriptor: result.descriptor, bars }, this.venueResolvers)
      this.logger.info('remote_fetch_completed', {
        ...fields,
        bars: bars.length,
        request_id: request.requestId,
        duration_ms: timer.stop(),
      })
      return {
        bars,
        descriptor: result.descriptor,
        venue: venue.venue,
        venueSource: venue.source,
        timeframeSpec,
        source: 'remote',
        descriptorBackfilled: false,
        request,
      }
    })
  }

  /**
   * Validates the id, picks the timeframe and widens date-level ranges to
   * whole UTC days.
   */
  private resolveRange(
    instrumentId: string,
    startInput: TimeInput,
    endInput: TimeInput,
    explicitTimeframe: string | undefined
  ): ResolvedRange {
    parseInstrumentId(instrumentId)
    const timeframeSpec = this.timeframeResolver.resolve(startInput, explicitTimeframe)
    let start = toNanos(startInput)
    let end = toNanos(endInput)
    if (start > end) {
      throw new InvalidRequestError('Request start is after its end', {
        instrumentId,
        start: nanosToIso(start),
        end: nanosToIso(end),
      })
    }
    if (isDateLevel(timeframeSpec)) {
      start = floorToUtcDay(start)
      end = endOfUtcDay(end)
    }
    return { timeframeSpec, start, end }
  }

  private async fetchRemote(
    instrumentId: string,
    timeframeSpec: string,
    start: bigint,
    end: bigint
  ): Promise<{ result: RemoteBarsResult; request: FetchRequest }> {
    const client = await this.connectedClient(instrumentId, timeframeSpec, start, end)

    const opened = this.ledger.open({
      instrumentId,
      timeframeSpec,
      start,
      end,
      maxRetries: this.retryPolicy.maxAttempts - 1,
    })
    const requestId = opened.requestId
    this.ledger.start(requestId)

    try {
      const result = await this.retryPolicy.execute(
        async (_attempt, signal) => {
          await this.rateLimiter.acquire()
          return client.fetchBars({ instrumentId, timeframeSpec, start, end, signal })
        },
        {
          operationName: 'bar fetch',
          onRetry: ({ error }) => {
            this.ledger.fail(requestId, describeError(error))
            this.ledger.retry(requestId)
            this.ledger.start(requestId)
          },
        }
      )
      return { result, request: this.ledger.complete(requestId) }
    } catch (error) {
      this.ledger.fail(requestId, describeError(error))
      throw this.mapFetchError(error, instrumentId, client.name)
    }
  }

  private mapFetchError(error: unknown, instrumentId: string, provider: string): unknown {
    if (!isRetryExhaustedError(error)) {
      return error
    }
    const lastError = error.lastError
    this.logger.error('remote_fetch_exhausted', {
      instrument_id: instrumentId,
      attempts: error.attempts,
      error: describeError(lastError),
    })
    if (isRateLimitExceededError(lastError)) {
      return new RateLimitExceededError(
        `Provider ${provider} kept rejecting requests for ${instrumentId}`,
        { retryAfterMs: lastError.retryAfterMs, attempts: error.attempts },
        { cause: lastError }
      )
    }
    return new ProviderUnavailableError(
      `Provider ${provider} failed ${error.attempts} times for ${instrumentId}`,
      { attempts: error.attempts, lastError: describeError(lastError), provider },
      { cause: lastError }
    )
  }

  /**
   * Validates the response, then writes descriptor, bars and index in that
   * order. Bars opening outside `[start, end)` are dropped; the partition
   * still covers `[start, end]`.
   */
  private async persist(
    result: RemoteBarsResult,
    instrumentId: string,
    timeframeSpec: string,
    start: bigint,
    end: bigint
  ): Promise<Bar[]> {
    const last = lastOpenTime(start, end)
    const bars = result.bars.filter((bar) => bar.eventTime >= start && bar.eventTime <= last)
    const issues = validateSeries(bars)
    if (result.descriptor.instrumentId !== instrumentId) {
      issues.push(`descriptor is for ${result.descriptor.instrumentId}`)
    }
    const stray = bars.find((bar) => bar.instrumentId !== instrumentId || bar.timeframeSpec !== timeframeSpec)
    if (stray) {
      issues.push(`bars are for ${stray.instrumentId} ${stray.timeframeSpec}`)
    }
    if (issues.length > 0) {
      throw new InvalidProviderResponseError(`Provider returned invalid data for ${instrumentId}`, {
        instrumentId,
        timeframeSpec,
        issues,
      })
    }

    if (bars.length === 0) {
      this.logger.info('remote_fetch_empty', { instrument_id: instrumentId, timeframe_spec: timeframeSpec })
      return bars
    }

    await this.store.writeDescriptor(result.descriptor)
    const partition = await this.store.writeBars(bars, {
      correlationId: getCorrelationId(),
      coverage: { start, end },
    })
    if (partition) {
      this.index.recordPartition(partition)
    }
    return bars
  }

  /**
   * Connects on first use. Concurrent callers share one connect attempt.
   *
   * @throws DataNotFoundError when no provider is configured or it cannot connect
   */
  private async connectedClient(
    instrumentId: string,
    timeframeSpec?: string,
    start?: bigint,
    end?: bigint
  ): Promise<RemoteDataClient> {
    const range = {
      instrumentId,
      timeframeSpec,
      start: start === undefined ? undefined : nanosToIso(start),
      end: end === undefined ? undefined : nanosToIso(end),
    }
    const client = this.client
    if (!client) {
      throw new DataNotFoundError(`No cached data for ${instrumentId} and no remote provider is configured`, {
        ...range,
        reason: 'no_provider',
      })
    }
    if (client.isConnected()) {
      return client
    }

    this.connecting ??= client.connect(this.connectTimeoutMs).finally(() => {
      this.connecting = null
    })
    try {
      await this.connecting
    } catch (error) {
      this.logger.warn('provider_connect_failed', { provider: client.name, error: describeError(error) })
      throw new DataNotFoundError(
        `No cached data for ${instrumentId} and provider ${client.name} is unreachable`,
        { ...range, reason: 'provider_unreachable', provider: client.name },
        { cause: error }
      )
    }
    this.logger.info('provider_connected', { provider: client.name })
    return client
  }
}
