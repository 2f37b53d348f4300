/**
 * Configuration loading and management
 */

import { InvalidRequestError } from '@barvault/contracts';
import type { Logger } from '@barvault/logger';
import { configSchema, envMapping } from './schema.js';
import type { Config } from './schema.js';

type RawConfig = { [key: string]: RawValue };
type RawValue = string | number | boolean | RawConfig;

/**
 * Load configuration from environment and defaults
 *
 * @throws InvalidRequestError listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new InvalidRequestError(`Configuration validation failed:\n${errors.join('\n')}`, { errors });
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: RawValue): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    return;
  }

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): RawValue {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    catalog: config.catalog.path,
    provider: config.provider.type,
    requestsPerSecond: config.provider.requestsPerSecond,
    maxAttempts: config.provider.maxAttempts,
    defaultVenue: config.venue.defaultSimulationVenue,
    conflictPolicy: config.import.conflictPolicy,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
