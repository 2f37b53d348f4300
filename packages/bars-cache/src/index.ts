/**
 * @barvault/bars-cache
 *
 * Availability-aware fetch pipeline for historical bars.
 *
 * Key features:
 * - In-memory availability index rebuilt from a catalog scan
 * - Sliding-window rate limiting and exponential-backoff retry
 * - Per-key fetch guard so one range is fetched once
 * - Tracked fetch requests with lifecycle events
 *
 * Example usage:
 * ```typescript
 * import { AvailabilityIndex, FetchOrchestrator, RetryPolicy, SlidingWindowRateLimiter } from '@barvault/bars-cache'
 * import { ColumnStore } from '@barvault/column-store'
 *
 * const store = new ColumnStore({ root: './data/catalog' })
 * const index = new AvailabilityIndex()
 * await index.rebuild(store)
 *
 * const orchestrator = new FetchOrchestrator({
 *   store,
 *   index,
 *   rateLimiter: new SlidingWindowRateLimiter({ limit: 50 }),
 *   retryPolicy: new RetryPolicy(),
 *   client,
 * })
 *
 * const { bars, source } = await orchestrator.fetchOrLoad('ACME.XNAS', '2024-01-02', '2024-01-05')
 * ```
 */

export {
  AvailabilityIndex,
  availabilityKey,
  availabilityCovers,
  availabilityOverlaps,
  mergeAvailability,
  summarizePartitions,
} from './availabilityIndex.js'
export type { AvailabilityIndexOptions, PartitionSource } from './availabilityIndex.js'

export { TimeframeResolver } from './timeframeResolver.js'
export type { TimeframeDefaults } from './timeframeResolver.js'

export {
  DEFAULT_VENUE,
  barsVenueStep,
  createVenueResolvers,
  defaultVenueStep,
  descriptorVenueStep,
  resolveVenue,
} from './venueResolution.js'
export type { ResolvedVenue, VenueContext, VenueResolverStep, VenueSource } from './venueResolution.js'

export {
  DEFAULT_SAFETY_FACTOR,
  DEFAULT_WINDOW_MS,
  SlidingWindowRateLimiter,
  defaultSleep,
  effectiveLimit,
} from './rateLimiter.js'
export type { RateLimiterOptions } from './rateLimiter.js'

export { RetryExhaustedError, RetryPolicy, describeError, isRetryExhaustedError, isRetryableError } from './retryPolicy.js'
export type { RetryHooks, RetryInfo, RetryPolicyOptions, RetryableOperation } from './retryPolicy.js'

export {
  FetchRequestLedger,
  InvalidFetchTransitionError,
  completeFetch,
  createFetchRequest,
  failFetch,
  retryFetch,
  startFetch,
} from './fetchRequest.js'
export type { FetchRequestLedgerOptions, NewFetchRequest } from './fetchRequest.js'

export { FetchEventBus } from './events.js'
export type { FetchEventListener, FetchTransitionEvent } from './events.js'

export { KeyedMutex } from './keyedMutex.js'

export { DEFAULT_CONNECT_TIMEOUT_MS, FetchOrchestrator, InvalidProviderResponseError } from './orchestrator.js'
export type {
  AvailabilityCheck,
  AvailabilityStatus,
  BarStore,
  EnsureDescriptorResult,
  FetchOrLoadOptions,
  FetchOrLoadResult,
  FetchOrchestratorOptions,
} from './orchestrator.js'
