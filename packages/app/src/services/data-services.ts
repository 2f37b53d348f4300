/**
 * Service wiring for the catalog, fetch pipeline and import path.
 *
 * One call builds every collaborator from configuration; nothing here holds
 * state beyond what the services themselves keep.
 */

import {
  AvailabilityIndex,
  FetchEventBus,
  FetchOrchestrator,
  FetchRequestLedger,
  RetryPolicy,
  SlidingWindowRateLimiter,
  TimeframeResolver,
  createVenueResolvers,
} from '@barvault/bars-cache';
import type { VenueResolverStep } from '@barvault/bars-cache';
import { CsvBarImporter } from '@barvault/bulk-import';
import type { ConflictPolicy } from '@barvault/bulk-import';
import { ColumnStore } from '@barvault/column-store';
import type { RemoteDataClient } from '@barvault/contracts';
import { measureAsync } from '@barvault/logger';
import type { Logger } from '@barvault/logger';
import type { Config } from '../config/index.js';
import { FixtureRemoteClient } from './providers/fixture-remote-client.js';

export interface DataServiceDependencies {
  logger: Logger;

  /** Overrides the client chosen by `provider.type` */
  client?: RemoteDataClient | null;

  /** Injected into limiter and retry delays */
  sleep?: (ms: number) => Promise<void>;
}

export interface DataServices {
  config: Config;
  store: ColumnStore;
  index: AvailabilityIndex;
  rateLimiter: SlidingWindowRateLimiter;
  retryPolicy: RetryPolicy;
  timeframeResolver: TimeframeResolver;
  venueResolvers: readonly VenueResolverStep[];
  events: FetchEventBus;
  ledger: FetchRequestLedger;
  client: RemoteDataClient | null;
  orchestrator: FetchOrchestrator;

  /** Builds an importer; the policy defaults to `import.conflictPolicy` */
  createImporter(conflictPolicy?: ConflictPolicy): CsvBarImporter;

  /** Rebuilds the availability index from a catalog scan */
  initialize(): Promise<void>;
}

/**
 * Picks the remote client for `provider.type`.
 */
export function createRemoteClient(config: Config, logger: Logger): RemoteDataClient | null {
  switch (config.provider.type) {
    case 'fixture':
      return new FixtureRemoteClient({ logger });
    case 'none':
      return null;
  }
}

export function createDataServices(config: Config, deps: DataServiceDependencies): DataServices {
  const { logger, sleep } = deps;

  const store = new ColumnStore({
    root: config.catalog.path,
    aggregationSource: config.catalog.aggregationSource,
    logger,
  });
  const index = new AvailabilityIndex({ logger });
  const rateLimiter = new SlidingWindowRateLimiter({
    limit: config.provider.requestsPerSecond,
    safetyFactor: config.provider.safetyFactor,
    sleep,
    logger,
  });
  const retryPolicy = new RetryPolicy({
    maxAttempts: config.provider.maxAttempts,
    baseDelayMs: config.provider.baseDelayMs,
    backoffMultiplier: config.provider.backoffMultiplier,
    attemptTimeoutMs: config.provider.requestTimeoutMs,
    sleep,
    logger,
  });
  const timeframeResolver = new TimeframeResolver({
    day: config.timeframes.day,
    intraday: config.timeframes.intraday,
  });
  const venueResolvers = createVenueResolvers(config.venue.defaultSimulationVenue);
  const events = new FetchEventBus(logger);
  const ledger = new FetchRequestLedger({ events });
  const client = deps.client === undefined ? createRemoteClient(config, logger) : deps.client;

  const orchestrator = new FetchOrchestrator({
    store,
    index,
    rateLimiter,
    retryPolicy,
    client,
    timeframeResolver,
    venueResolvers,
    ledger,
    connectTimeoutMs: config.provider.connectTimeoutMs,
    logger,
  });

  return {
    config,
    store,
    index,
    rateLimiter,
    retryPolicy,
    timeframeResolver,
    venueResolvers,
    events,
    ledger,
    client,
    orchestrator,

    createImporter(conflictPolicy?: ConflictPolicy): CsvBarImporter {
      return new CsvBarImporter({
        store,
        index,
        conflictPolicy: conflictPolicy ?? config.import.conflictPolicy,
        logger,
      });
    },

    async initialize(): Promise<void> {
      const { result, duration_ms } = await measureAsync(() => index.rebuild(store));
      logger.info('Data services initialized', {
        catalog: config.catalog.path,
        provider: client?.name ?? 'none',
        keys: result.size,
        duration_ms,
      });
    },
  };
}
