/**
 * @fileoverview Error taxonomy for the bar catalog.
 *
 * Every error raised by the catalog, the fetch pipeline or the import path
 * extends BarVaultError and carries:
 * - a machine-readable code
 * - a structured data payload (JSON-safe: timestamps travel as ISO strings)
 * - an ISO timestamp
 * - ordered resolution steps the operator can act on
 *
 * @module @barvault/contracts/errors
 */

/**
 * Options accepted by every error constructor.
 */
export interface BarVaultErrorOptions {
  /** Underlying error that triggered this one */
  cause?: unknown;

  /** Human-readable steps that resolve the failure, in the order to try them */
  resolution?: string[];
}

/**
 * Base error class for all catalog and fetch errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new BarVaultError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class BarVaultError extends Error {
  /** Machine-readable error code (e.g., 'DATA_NOT_FOUND') */
  readonly code: string;

  /** Structured context for debugging and retry logic */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  /** Resolution steps, possibly empty */
  readonly resolution: readonly string[];

  constructor(
    code: string,
    message: string,
    data?: Record<string, unknown>,
    options: BarVaultErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    this.resolution = options.resolution ?? [];
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      resolution: [...this.resolution],
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Default resolution steps for a request the catalog cannot serve.
 */
export function dataNotFoundResolution(instrumentId: string): string[] {
  return [
    'Start or reconnect the remote data provider, then retry the request',
    `Import bars for ${instrumentId} from a CSV file with "data import"`,
    'Run "data list" to see which ranges are already cached',
  ];
}

/**
 * Thrown when the catalog has no coverage for a request and the remote
 * provider is unset or unreachable.
 */
export class DataNotFoundError extends BarVaultError {
  constructor(
    message: string,
    data: {
      instrumentId: string;
      timeframeSpec?: string;
      start?: string;
      end?: string;
      reason?: string;
      [key: string]: unknown;
    },
    options: BarVaultErrorOptions = {}
  ) {
    super('DATA_NOT_FOUND', message, data, {
      ...options,
      resolution: options.resolution ?? dataNotFoundResolution(data.instrumentId),
    });
  }
}

/**
 * Thrown when the remote provider could not be reached or kept failing
 * after every retry.
 */
export class ProviderUnavailableError extends BarVaultError {
  /** Number of attempts made before giving up */
  readonly attempts: number;

  constructor(
    message: string,
    data: { attempts: number; lastError?: string; provider?: string; [key: string]: unknown },
    options: BarVaultErrorOptions = {}
  ) {
    super('PROVIDER_UNAVAILABLE', message, data, {
      ...options,
      resolution: options.resolution ?? [
        'Check that the data provider is running and accepting connections',
        'Retry the request once the provider is reachable',
      ],
    });
    this.attempts = data.attempts;
  }
}

/**
 * Thrown when the provider rejects a request for exceeding its quota.
 * Retried automatically; surfaced once the retry policy gives up.
 */
export class RateLimitExceededError extends BarVaultError {
  /** Suggested wait before the next request, in milliseconds */
  readonly retryAfterMs: number;

  constructor(
    message: string,
    data: { retryAfterMs?: number; requestCount?: number; attempts?: number; [key: string]: unknown } = {},
    options: BarVaultErrorOptions = {}
  ) {
    const retryAfterMs = data.retryAfterMs ?? 2000;
    super('RATE_LIMIT_EXCEEDED', message, { ...data, retryAfterMs }, {
      ...options,
      resolution: options.resolution ?? [
        `Wait ${Math.ceil(retryAfterMs / 1000)}s before retrying`,
        'Lower the configured requests-per-second limit',
      ],
    });
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Thrown when a single provider call exceeds its timeout. Retryable.
 */
export class ProviderTimeoutError extends BarVaultError {
  constructor(message: string, data: { timeoutMs: number; attempt?: number; [key: string]: unknown }) {
    super('PROVIDER_TIMEOUT', message, data);
  }
}

/**
 * Thrown for transient transport failures (dropped connection, refused
 * socket). Retryable.
 */
export class ProviderConnectionError extends BarVaultError {
  constructor(message: string, data?: Record<string, unknown>, options: BarVaultErrorOptions = {}) {
    super('PROVIDER_CONNECTION', message, data, options);
  }
}

/**
 * Thrown for malformed requests. Never retried.
 */
export class InvalidRequestError extends BarVaultError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, data);
  }
}

/**
 * Thrown when the provider does not know the requested instrument.
 */
export class SymbolResolutionError extends BarVaultError {
  constructor(message: string, data: { instrumentId: string; [key: string]: unknown }) {
    super('SYMBOL_RESOLUTION', message, data, {
      resolution: [
        `Check that ${data.instrumentId} uses the SYMBOL.VENUE form`,
        'Confirm the provider lists the instrument',
      ],
    });
  }
}

/**
 * Raised when a partition file name or its content cannot be parsed.
 * The catalog scan logs these and skips the file.
 */
export class CatalogCorruptionError extends BarVaultError {
  constructor(
    message: string,
    data: { path: string; reason?: string; [key: string]: unknown },
    options: BarVaultErrorOptions = {}
  ) {
    super('CATALOG_CORRUPTION', message, data, {
      ...options,
      resolution: options.resolution ?? [
        `Inspect or remove ${data.path}`,
        'Re-fetch or re-import the affected range',
      ],
    });
  }
}

/**
 * Thrown when persisting a partition or descriptor fails.
 */
export class CatalogWriteError extends BarVaultError {
  constructor(message: string, data: { path: string; [key: string]: unknown }, options: BarVaultErrorOptions = {}) {
    super('CATALOG_WRITE', message, data, options);
  }
}

/**
 * A malformed bulk-import row. Collected per row rather than thrown,
 * except when the file itself is unusable (row 0).
 */
export class ValidationError extends BarVaultError {
  /** 1-based row number in the source file (header is row 1); 0 for file-level problems */
  readonly rowNumber: number;

  constructor(rowNumber: number, message: string, data?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, { ...data, rowNumber });
    this.rowNumber = rowNumber;
  }
}

/**
 * Thrown for timeframe specs that do not parse.
 */
export class InvalidTimeframeError extends BarVaultError {
  constructor(message: string, data: { value: string; [key: string]: unknown }) {
    super('INVALID_TIMEFRAME', message, data, {
      resolution: ['Use STEP-AGGREGATION-PRICE_TYPE, for example 1-MINUTE-LAST or 1-DAY-LAST'],
    });
  }
}

export function isBarVaultError(error: unknown): error is BarVaultError {
  return error instanceof BarVaultError;
}

export function isDataNotFoundError(error: unknown): error is DataNotFoundError {
  return error instanceof DataNotFoundError;
}

export function isProviderUnavailableError(error: unknown): error is ProviderUnavailableError {
  return error instanceof ProviderUnavailableError;
}

export function isRateLimitExceededError(error: unknown): error is RateLimitExceededError {
  return error instanceof RateLimitExceededError;
}

export function isProviderTimeoutError(error: unknown): error is ProviderTimeoutError {
  return error instanceof ProviderTimeoutError;
}

export function isProviderConnectionError(error: unknown): error is ProviderConnectionError {
  return error instanceof ProviderConnectionError;
}

export function isInvalidRequestError(error: unknown): error is InvalidRequestError {
  return error instanceof InvalidRequestError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}

export function isCatalogCorruptionError(error: unknown): error is CatalogCorruptionError {
  return error instanceof CatalogCorruptionError;
}

export function isCatalogWriteError(error: unknown): error is CatalogWriteError {
  return error instanceof CatalogWriteError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isInvalidTimeframeError(error: unknown): error is InvalidTimeframeError {
  return error instanceof InvalidTimeframeError;
}
