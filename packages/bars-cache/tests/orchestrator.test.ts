import { describe, expect, it } from 'vitest'
import {
  DataNotFoundError,
  InvalidRequestError,
  ProviderConnectionError,
  ProviderUnavailableError,
  RateLimitExceededError,
  SymbolResolutionError,
  parsePrice,
} from '@barvault/contracts'
import { AvailabilityIndex } from '../src/availabilityIndex.js'
import type { FetchTransitionEvent } from '../src/events.js'
import { FetchOrchestrator, InvalidProviderResponseError } from '../src/orchestrator.js'
import { SlidingWindowRateLimiter } from '../src/rateLimiter.js'
import { RetryPolicy } from '../src/retryPolicy.js'
import {
  DAY,
  DAY0,
  FakeRemoteClient,
  MINUTE,
  MemoryBarStore,
  T0,
  failWith,
  makeBar,
  makeBars,
  makePartition,
  noSleep,
  respondWith,
} from './fixtures.js'

const TEN_BARS = makeBars([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])

function setup(client: FakeRemoteClient | null) {
  const store = new MemoryBarStore()
  const index = new AvailabilityIndex()
  const orchestrator = new FetchOrchestrator({
    store,
    index,
    rateLimiter: new SlidingWindowRateLimiter({ limit: 1000 }),
    retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 10, sleep: noSleep }),
    client,
  })
  return { store, index, orchestrator }
}

describe('FetchOrchestrator.fetchOrLoad', () => {
  it('fetches a missing range, persists it, then serves it from the catalog', async () => {
    const client = new FakeRemoteClient([respondWith(TEN_BARS)])
    const { store, index, orchestrator } = setup(client)

    const first = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 10n * MINUTE)

    expect(first).toMatchObject({
      source: 'remote',
      timeframeSpec: '1-MINUTE-LAST',
      venue: 'XNAS',
      venueSource: 'descriptor',
      descriptorBackfilled: false,
    })
    expect(first.bars).toHaveLength(10)
    expect(first.request?.status).toBe('COMPLETED')
    expect(store.operations).toEqual(['writeDescriptor', 'writeBars'])
    expect(store.writes).toEqual([{ bars: 10, coverage: { start: T0, end: T0 + 10n * MINUTE } }])
    expect(index.coversRange('ACME.XNAS', '1-MINUTE-LAST', T0, T0 + 10n * MINUTE)).toBe(true)

    const second = await orchestrator.fetchOrLoad('ACME.XNAS', T0 + 2n * MINUTE, T0 + 5n * MINUTE)

    expect(second.source).toBe('catalog')
    expect(second.request).toBeNull()
    expect(second.bars.map((bar) => bar.eventTime)).toEqual([T0 + 2n * MINUTE, T0 + 3n * MINUTE, T0 + 4n * MINUTE])
    expect(client.barRequests).toHaveLength(1)
    expect(client.connectCalls).toBe(1)
  })

  it('passes the resolved timeframe and range to the provider', async () => {
    const client = new FakeRemoteClient([respondWith(TEN_BARS)])
    const { orchestrator } = setup(client)

    await orchestrator.fetchOrLoad('ACME.XNAS', '2024-01-02 14:30', '2024-01-02 14:39')

    expect(client.barRequests[0]).toMatchObject({
      instrumentId: 'ACME.XNAS',
      timeframeSpec: '1-MINUTE-LAST',
      start: T0,
      end: T0 + 9n * MINUTE,
    })
  })

  it('widens date-level requests to whole UTC days', async () => {
    const daily = [
      makeBar(0, { timeframeSpec: '1-DAY-LAST', eventTime: DAY0 }),
      makeBar(1, { timeframeSpec: '1-DAY-LAST', eventTime: DAY0 + DAY }),
    ]
    const client = new FakeRemoteClient([respondWith(daily)])
    const { orchestrator } = setup(client)

    const fetched = await orchestrator.fetchOrLoad('ACME.XNAS', '2024-01-02', '2024-01-03')
    expect(fetched.timeframeSpec).toBe('1-DAY-LAST')
    expect(client.barRequests[0]).toMatchObject({ start: DAY0, end: DAY0 + 2n * DAY - 1n })

    const cached = await orchestrator.fetchOrLoad('ACME.XNAS', '2024-01-03', '2024-01-03')
    expect(cached.source).toBe('catalog')
    expect(cached.bars.map((bar) => bar.eventTime)).toEqual([DAY0 + DAY])
  })

  it('keeps only bars opening inside [start, end)', async () => {
    const client = new FakeRemoteClient([respondWith(TEN_BARS)])
    const { store, orchestrator } = setup(client)

    const result = await orchestrator.fetchOrLoad('ACME.XNAS', T0 + MINUTE, T0 + 3n * MINUTE)

    expect(result.bars.map((bar) => bar.eventTime)).toEqual([T0 + MINUTE, T0 + 2n * MINUTE])
    expect(store.writes).toEqual([{ bars: 2, coverage: { start: T0 + MINUTE, end: T0 + 3n * MINUTE } }])
  })

  it('serves the single bar at start for a point request', async () => {
    const client = new FakeRemoteClient([respondWith(TEN_BARS)])
    const { orchestrator } = setup(client)

    const fetched = await orchestrator.fetchOrLoad('ACME.XNAS', T0 + 4n * MINUTE, T0 + 4n * MINUTE)
    const cached = await orchestrator.fetchOrLoad('ACME.XNAS', T0 + 4n * MINUTE, T0 + 4n * MINUTE)

    expect(fetched.bars.map((bar) => bar.eventTime)).toEqual([T0 + 4n * MINUTE])
    expect(cached).toMatchObject({ source: 'catalog', bars: [{ eventTime: T0 + 4n * MINUTE }] })
  })

  it('retries transient failures and tracks them on the ledger', async () => {
    const client = new FakeRemoteClient([failWith(new ProviderConnectionError('reset')), respondWith(TEN_BARS)])
    const { orchestrator } = setup(client)
    const events: FetchTransitionEvent[] = []
    orchestrator.ledger.events.on('transition', (event) => events.push(event))

    const result = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE)

    expect(client.barRequests).toHaveLength(2)
    expect(result.request).toMatchObject({ status: 'COMPLETED', retryCount: 1, maxRetries: 2 })
    expect(events.map((event) => `${event.from ?? 'NEW'}>${event.to}`)).toEqual([
      'NEW>PENDING',
      'PENDING>IN_PROGRESS',
      'IN_PROGRESS>FAILED',
      'FAILED>PENDING',
      'PENDING>IN_PROGRESS',
      'IN_PROGRESS>COMPLETED',
    ])
  })

  it('reports an unavailable provider once retries run out and persists nothing', async () => {
    const client = new FakeRemoteClient([failWith(new ProviderConnectionError('reset'))])
    const { store, index, orchestrator } = setup(client)

    const error = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ProviderUnavailableError)
    expect(error).toMatchObject({ attempts: 3, data: { lastError: 'reset', provider: 'fake' } })
    expect(client.barRequests).toHaveLength(3)
    expect(store.operations).toEqual([])
    expect(index.size).toBe(0)
    expect(orchestrator.ledger.history()[0]).toMatchObject({ status: 'FAILED', error: 'Gave up after 3 attempts: reset' })
  })

  it('surfaces a persistent quota rejection as a rate-limit error', async () => {
    const client = new FakeRemoteClient([failWith(new RateLimitExceededError('slow down', { retryAfterMs: 7000 }))])
    const { orchestrator } = setup(client)

    const error = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(RateLimitExceededError)
    expect(error).toMatchObject({ retryAfterMs: 7000, data: { attempts: 3 } })
  })

  it('propagates fatal provider errors after one attempt', async () => {
    const fatal = new SymbolResolutionError('unknown instrument', { instrumentId: 'ACME.XNAS' })
    const client = new FakeRemoteClient([failWith(fatal)])
    const { orchestrator } = setup(client)

    await expect(orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE)).rejects.toBe(fatal)
    expect(client.barRequests).toHaveLength(1)
  })

  it('persists nothing for an empty result', async () => {
    const client = new FakeRemoteClient([respondWith([])])
    const { store, index, orchestrator } = setup(client)

    const result = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE)

    expect(result.source).toBe('remote')
    expect(result.bars).toEqual([])
    expect(store.operations).toEqual([])
    expect(index.size).toBe(0)
  })

  it('rejects a provider response that breaks bar invariants', async () => {
    const broken = makeBar(0, { low: parsePrice('200.00') })
    const client = new FakeRemoteClient([respondWith([broken])])
    const { store, orchestrator } = setup(client)

    await expect(orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE)).rejects.toThrow(
      InvalidProviderResponseError
    )
    expect(store.operations).toEqual([])
  })

  it('rejects bars for another timeframe', async () => {
    const client = new FakeRemoteClient([respondWith(makeBars([0, 1], { timeframeSpec: '1-HOUR-LAST' }))])
    const { store, orchestrator } = setup(client)

    const error = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(InvalidProviderResponseError)
    expect(error).toMatchObject({ data: { issues: ['bars are for ACME.XNAS 1-HOUR-LAST'] } })
    expect(store.operations).toEqual([])
  })

  it('raises DataNotFoundError without a provider', async () => {
    const { orchestrator } = setup(null)

    const error = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(DataNotFoundError)
    expect(error).toMatchObject({ data: { instrumentId: 'ACME.XNAS', reason: 'no_provider' } })
    expect(error instanceof DataNotFoundError && error.resolution).toHaveLength(3)
  })

  it('raises DataNotFoundError when the provider cannot connect', async () => {
    const client = new FakeRemoteClient([respondWith(TEN_BARS)])
    client.connectError = new Error('connection refused')
    const { orchestrator } = setup(client)

    const error = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(DataNotFoundError)
    expect(error).toMatchObject({ data: { reason: 'provider_unreachable', provider: 'fake' } })
    expect(client.barRequests).toHaveLength(0)
  })

  it('fetches one range once when requested concurrently', async () => {
    const client = new FakeRemoteClient([respondWith(TEN_BARS)])
    const { orchestrator } = setup(client)

    const results = await Promise.all([
      orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE),
      orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE),
    ])

    expect(results.map((result) => result.source)).toEqual(['remote', 'catalog'])
    expect(client.barRequests).toHaveLength(1)
  })

  it('rejects malformed requests', async () => {
    const { orchestrator } = setup(null)

    await expect(orchestrator.fetchOrLoad('ACME.XNAS', T0 + MINUTE, T0)).rejects.toThrow(InvalidRequestError)
    await expect(orchestrator.fetchOrLoad('ACME', T0, T0 + MINUTE)).rejects.toThrow(InvalidRequestError)
  })
})

describe('FetchOrchestrator.ensureDescriptor', () => {
  function seedCatalog(store: MemoryBarStore, index: AvailabilityIndex): void {
    store.bars.push(...TEN_BARS)
    index.recordPartition(makePartition(T0, T0 + 9n * MINUTE))
  }

  it('backfills a missing descriptor once on a cache hit', async () => {
    const client = new FakeRemoteClient()
    const { store, index, orchestrator } = setup(client)
    seedCatalog(store, index)

    const first = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE)
    const second = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE)

    expect(first).toMatchObject({ source: 'catalog', descriptorBackfilled: true, venue: 'XNAS' })
    expect(second.descriptorBackfilled).toBe(false)
    expect(client.descriptorRequests).toEqual(['ACME.XNAS'])
    expect(client.barRequests).toEqual([])
  })

  it('refuses to serve cached bars without a descriptor when no provider is configured', async () => {
    const { store, index, orchestrator } = setup(null)
    seedCatalog(store, index)

    const error = await orchestrator.fetchOrLoad('ACME.XNAS', T0, T0 + 9n * MINUTE).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(DataNotFoundError)
    expect(error).toMatchObject({
      data: {
        instrumentId: 'ACME.XNAS',
        reason: 'descriptor_backfill_failed',
        backfillError: 'No cached data for ACME.XNAS and no remote provider is configured',
      },
    })
  })

  it('raises DataNotFoundError with resolution steps when the backfill fails', async () => {
    const client = new FakeRemoteClient()
    client.connectError = new Error('connection refused')
    const { store, index, orchestrator } = setup(client)
    seedCatalog(store, index)

    const error = await orchestrator.ensureDescriptor('ACME.XNAS').catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(DataNotFoundError)
    expect(error instanceof DataNotFoundError && error.resolution[0]).toBe(
      'Check that the remote provider is configured and reachable'
    )
    expect(error instanceof DataNotFoundError && error.cause).toBeInstanceOf(DataNotFoundError)
    expect(store.descriptors.size).toBe(0)
  })
})

describe('FetchOrchestrator.checkAvailability', () => {
  it('classifies ranges against the index without calling the provider', () => {
    const client = new FakeRemoteClient()
    const { index, orchestrator } = setup(client)
    index.recordPartition(makePartition(T0, T0 + 9n * MINUTE))

    expect(orchestrator.checkAvailability('ACME.XNAS', T0 + 2n * MINUTE, T0 + 4n * MINUTE).status).toBe('covered')
    expect(orchestrator.checkAvailability('ACME.XNAS', T0 + 5n * MINUTE, T0 + 20n * MINUTE).status).toBe('partial')

    const missing = orchestrator.checkAvailability('ACME.XNAS', T0 + 20n * MINUTE, T0 + 30n * MINUTE)
    expect(missing.status).toBe('missing')
    expect(missing.availability).toMatchObject({ start: T0, end: T0 + 9n * MINUTE, fileCount: 1 })

    expect(orchestrator.checkAvailability('OTHER.XNAS', T0, T0 + MINUTE).availability).toBeNull()
    expect(client.connectCalls).toBe(0)
  })

  it('normalizes date-level ranges the way fetchOrLoad does', () => {
    const { orchestrator } = setup(null)

    expect(orchestrator.checkAvailability('ACME.XNAS', '2024-01-02', '2024-01-03')).toEqual({
      instrumentId: 'ACME.XNAS',
      timeframeSpec: '1-DAY-LAST',
      start: DAY0,
      end: DAY0 + 2n * DAY - 1n,
      status: 'missing',
      availability: null,
    })
  })
})
