/**
 * @fileoverview Main entry point for @barvault/contracts.
 *
 * @module @barvault/contracts
 */

// Time
export {
  NANOS_PER_MILLI,
  NANOS_PER_SECOND,
  NANOS_PER_MINUTE,
  NANOS_PER_HOUR,
  NANOS_PER_DAY,
  floorDiv,
  parseTimestamp,
  toNanos,
  dateToNanos,
  nanosToDate,
  nanosToIso,
  floorToUtcDay,
  endOfUtcDay,
  isUtcMidnight,
  lastOpenTime,
} from './time.js';
export type { TimeInput, ParsedTimestamp } from './time.js';

// Timeframes
export {
  BAR_AGGREGATIONS,
  PRICE_TYPES,
  DEFAULT_DAY_TIMEFRAME,
  DEFAULT_INTRADAY_TIMEFRAME,
  TIMEFRAME_ALIASES,
  parseTimeframeSpec,
  formatTimeframeSpec,
  isValidTimeframeSpec,
  normalizeTimeframeSpec,
  isDateLevel,
  timeframeIntervalNanos,
} from './timeframes.js';
export type { BarAggregation, PriceType, TimeframeSpec } from './timeframes.js';

// Prices
export {
  MAX_PRICE_PRECISION,
  createPrice,
  parsePrice,
  formatPrice,
  rescalePrice,
  comparePrices,
  priceToNumber,
} from './price.js';
export type { Price } from './price.js';

// Data model
export {
  parseInstrumentId,
  formatInstrumentId,
  validateBar,
  validateSeries,
  compareBarsByEventTime,
} from './market.js';
export type {
  Bar,
  InstrumentDescriptor,
  AggregationSource,
  PartitionMeta,
  WrittenPartition,
  TimeRangeAvailability,
  FetchStatus,
  FetchRequest,
} from './market.js';

// Remote provider contract
export type { RemoteDataClient, RemoteBarsRequest, RemoteBarsResult } from './remote.js';

// Error classes and guards
export {
  BarVaultError,
  DataNotFoundError,
  ProviderUnavailableError,
  RateLimitExceededError,
  ProviderTimeoutError,
  ProviderConnectionError,
  InvalidRequestError,
  SymbolResolutionError,
  CatalogCorruptionError,
  CatalogWriteError,
  ValidationError,
  InvalidTimeframeError,
  dataNotFoundResolution,
  isBarVaultError,
  isDataNotFoundError,
  isProviderUnavailableError,
  isRateLimitExceededError,
  isProviderTimeoutError,
  isProviderConnectionError,
  isInvalidRequestError,
  isSymbolResolutionError,
  isCatalogCorruptionError,
  isCatalogWriteError,
  isValidationError,
  isInvalidTimeframeError,
} from './errors.js';
export type { BarVaultErrorOptions } from './errors.js';
