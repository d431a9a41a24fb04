/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { DEFAULT_TIMEFRAMES, Timeframe } from '@crosslag/contracts';

/**
 * Accepts either an array or a comma-separated list ("1m,5m,1h").
 */
const timeframeList = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : value,
  z.array(z.nativeEnum(Timeframe)).min(1)
);

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
      dryRun: z.boolean().default(false),
      name: z.string().default('Crosslag'),
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

  server: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(8765),
    })
    .default({}),

  analysis: z
    .object({
      bufferCapacity: z.number().int().positive().default(500),
      intervalSeconds: z.number().positive().default(30),
      timeframes: timeframeList.default([...DEFAULT_TIMEFRAMES]),
      minLagCorrelation: z.number().min(0).max(1).default(0.2),
      minLagImprovement: z.number().min(0).max(1).default(0.05),
      maxLag: z.number().int().positive().optional(),
      historyDays: z.number().int().min(0).max(30).default(7),
    })
    .default({}),

  sources: z
    .object({
      futures: z
        .object({
          symbol: z.string().default('ES'),
          yahooSymbol: z.string().default('ES=F'),
          baseUrl: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
          pollSeconds: z.number().positive().default(15),
          backfillMinutes: z.number().int().min(0).default(1440),
        })
        .default({}),
      crypto: z
        .object({
          symbol: z.string().default('BTCUSDT'),
          label: z.string().default('BTC'),
          backfillMinutes: z.number().int().min(0).default(1440),
          restUrl: z.string().url().default('https://api.binance.com/api/v3/klines'),
          wsUrl: z.string().url().default('wss://stream.binance.com:9443/ws'),
        })
        .default({}),
    })
    .default({}),

  ticks: z
    .object({
      throttleMs: z.number().int().min(0).default(50),
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
export const envMapping: Readonly<Record<string, string>> = {
  NODE_ENV: 'app.env',
  DRY_RUN: 'app.dryRun',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  SERVER_ENABLED: 'server.enabled',
  SERVER_HOST: 'server.host',
  SERVER_PORT: 'server.port',
  BUFFER_CAPACITY: 'analysis.bufferCapacity',
  ANALYSIS_INTERVAL_SECONDS: 'analysis.intervalSeconds',
  ANALYSIS_TIMEFRAMES: 'analysis.timeframes',
  LEAD_LAG_MIN_CORRELATION: 'analysis.minLagCorrelation',
  LEAD_LAG_MIN_IMPROVEMENT: 'analysis.minLagImprovement',
  LEAD_LAG_MAX_LAG: 'analysis.maxLag',
  ANALYSIS_HISTORY_DAYS: 'analysis.historyDays',
  FUTURES_SYMBOL: 'sources.futures.symbol',
  FUTURES_YAHOO_SYMBOL: 'sources.futures.yahooSymbol',
  FUTURES_BASE_URL: 'sources.futures.baseUrl',
  FUTURES_POLL_SECONDS: 'sources.futures.pollSeconds',
  FUTURES_BACKFILL_MINUTES: 'sources.futures.backfillMinutes',
  CRYPTO_SYMBOL: 'sources.crypto.symbol',
  CRYPTO_LABEL: 'sources.crypto.label',
  CRYPTO_BACKFILL_MINUTES: 'sources.crypto.backfillMinutes',
  CRYPTO_REST_URL: 'sources.crypto.restUrl',
  CRYPTO_WS_URL: 'sources.crypto.wsUrl',
  TICK_THROTTLE_MS: 'ticks.throttleMs',
};
