/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '@crosslag/contracts';
import { loadConfig, getConfigSummary } from '../src/config/index.js';

describe('loadConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadConfig({});

    expect(config.app.env).toBe('development');
    expect(config.app.dryRun).toBe(false);
    expect(config.logging.level).toBe('info');
    expect(config.logging.format).toBe('pretty');
    expect(config.server).toEqual({ enabled: true, host: '127.0.0.1', port: 8765 });
    expect(config.analysis.bufferCapacity).toBe(500);
    expect(config.analysis.intervalSeconds).toBe(30);
    expect(config.analysis.timeframes).toEqual(['1m', '5m', '15m', '1h']);
    expect(config.analysis.minLagCorrelation).toBe(0.2);
    expect(config.analysis.minLagImprovement).toBe(0.05);
    expect(config.analysis.maxLag).toBeUndefined();
    expect(config.sources.futures.symbol).toBe('ES');
    expect(config.sources.futures.yahooSymbol).toBe('ES=F');
    expect(config.sources.futures.backfillMinutes).toBe(1440);
    expect(config.sources.crypto.symbol).toBe('BTCUSDT');
    expect(config.sources.crypto.label).toBe('BTC');
    expect(config.ticks.throttleMs).toBe(50);
  });

  it('maps environment variables onto nested fields with their types', () => {
    const config = loadConfig({
      DRY_RUN: 'true',
      LOG_FORMAT: 'json',
      SERVER_PORT: '9000',
      SERVER_HOST: '0.0.0.0',
      ANALYSIS_TIMEFRAMES: '1m, 15m',
      LEAD_LAG_MAX_LAG: '8',
      CRYPTO_LABEL: 'XBT',
    });

    expect(config.app.dryRun).toBe(true);
    expect(config.logging.format).toBe('json');
    expect(config.server.port).toBe(9000);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.analysis.timeframes).toEqual(['1m', '15m']);
    expect(config.analysis.maxLag).toBe(8);
    expect(config.sources.crypto.label).toBe('XBT');
  });

  it('ignores empty variables', () => {
    const config = loadConfig({ LOG_LEVEL: '', SERVER_PORT: '' });

    expect(config.logging.level).toBe('info');
    expect(config.server.port).toBe(8765);
  });

  it('reports every failing path in one ConfigError', () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: 'loud', SERVER_PORT: '70000' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;

    expect(caught.code).toBe('CONFIG_INVALID');
    expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual(['logging.level', 'server.port']);
    expect(caught.message).toContain('Configuration validation failed');
  });

  it('rejects unknown timeframes', () => {
    expect(() => loadConfig({ ANALYSIS_TIMEFRAMES: '1m,2m' })).toThrow(ConfigError);
  });
});

describe('getConfigSummary', () => {
  it('summarizes series, analysis and server settings', () => {
    const summary = getConfigSummary(loadConfig({ DRY_RUN: 'true' }));

    expect(summary['dryRun']).toBe(true);
    expect(summary['series']).toEqual({ a: 'ES', b: 'BTC' });
    expect(summary['server']).toBe('127.0.0.1:8765');
  });

  it('reports a disabled server', () => {
    const summary = getConfigSummary(loadConfig({ SERVER_ENABLED: 'false' }));

    expect(summary['server']).toBe('disabled');
  });
});
