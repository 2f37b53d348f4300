/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { isValidTimeframeSpec, normalizeTimeframeSpec } from '@barvault/contracts';

const timeframeSpec = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .refine((value) => isValidTimeframeSpec(safeNormalize(value)), {
    message: 'Must be a timeframe spec such as 1-MINUTE-LAST or an alias such as 1D',
  })
  .transform(safeNormalize);

function safeNormalize(value: string): string {
  try {
    return normalizeTimeframeSpec(value);
  } catch {
    return value;
  }
}

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      name: z.string().default('barvault'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  catalog: z
    .object({
      path: z.string().min(1).default('./data/catalog'),
      aggregationSource: z.enum(['EXTERNAL', 'INTERNAL']).default('EXTERNAL'),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(['none', 'fixture']).default('none'),
      connectTimeoutMs: z.number().int().positive().default(30_000),
      requestsPerSecond: z.number().positive().default(50),
      safetyFactor: z.number().gt(0).lte(1).default(0.9),
      requestTimeoutMs: z.number().int().positive().default(120_000),
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().nonnegative().default(2000),
      backoffMultiplier: z.number().min(1).default(2),
    })
    .default({}),

  venue: z
    .object({
      defaultSimulationVenue: z.string().min(1).default('SIM'),
    })
    .default({}),

  timeframes: z
    .object({
      day: timeframeSpec.default('1-DAY-LAST'),
      intraday: timeframeSpec.default('1-MINUTE-LAST'),
    })
    .default({}),

  import: z
    .object({
      conflictPolicy: z.enum(['skip', 'overwrite', 'merge']).default('skip'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  CATALOG_PATH: 'catalog.path',
  PROVIDER_TYPE: 'provider.type',
  PROVIDER_CONNECT_TIMEOUT_MS: 'provider.connectTimeoutMs',
  PROVIDER_REQUESTS_PER_SECOND: 'provider.requestsPerSecond',
  PROVIDER_SAFETY_FACTOR: 'provider.safetyFactor',
  PROVIDER_REQUEST_TIMEOUT_MS: 'provider.requestTimeoutMs',
  PROVIDER_MAX_ATTEMPTS: 'provider.maxAttempts',
  PROVIDER_BASE_DELAY_MS: 'provider.baseDelayMs',
  DEFAULT_VENUE: 'venue.defaultSimulationVenue',
  TIMEFRAME_DAY: 'timeframes.day',
  TIMEFRAME_INTRADAY: 'timeframes.intraday',
  IMPORT_CONFLICT_POLICY: 'import.conflictPolicy',
};
