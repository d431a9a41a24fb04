/**
 * Configuration loading and management
 */

import { ConfigError } from '@crosslag/contracts';
import type { Logger } from '@crosslag/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = { [key: string]: unknown };

/**
 * Load configuration from environment variables and defaults.
 *
 * @throws ConfigError listing every failing path
 *
 * @example
 * ```typescript
 * const config = loadConfig({ ...process.env, DRY_RUN: 'true' });
 * config.analysis.timeframes; // ['1m', '5m', '15m', '1h']
 * ```
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  logger?: Logger
): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, issues);
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
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
function parseEnvValue(value: string): string | number | boolean {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    dryRun: config.app.dryRun,
    series: {
      a: config.sources.futures.symbol,
      b: config.sources.crypto.label,
    },
    analysis: {
      timeframes: config.analysis.timeframes,
      intervalSeconds: config.analysis.intervalSeconds,
      bufferCapacity: config.analysis.bufferCapacity,
      historyDays: config.analysis.historyDays,
    },
    server: config.server.enabled ? `${config.server.host}:${config.server.port}` : 'disabled',
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

// Re-export types
export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
