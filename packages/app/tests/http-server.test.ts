import http from 'node:http';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import WebSocket from 'ws';
import { UNDEFINED_CORRELATION, type CorrelationResult, type SeriesId } from '@crosslag/contracts';
import { DualSeriesSynchronizer } from '@crosslag/bar-sync';
import { createSilentLogger } from '@crosslag/logger';
import { HttpServer } from '../src/server/http-server.js';
import { HourlyHistory } from '../src/analysis/hourly-history.js';
import { LatestPriceTracker } from '../src/analysis/latest-price.js';
import { SnapshotStore } from '../src/analysis/snapshot-store.js';
import type { HealthStatus } from '../src/container/types.js';
import { FakeSource, bar } from './helpers.js';

const btcLeads: CorrelationResult = {
  correlation: 0.61234,
  pValue: 0.00001,
  leadLag: -2,
  leadLagCorr: 0.45678,
  strength: 'moderate',
  sampleSize: 19,
};

function nextMessage(socket: WebSocket): Promise<unknown> {
  return new Promise((resolve, reject) => {
    socket.once('message', (data) => resolve(JSON.parse(String(data))));
    socket.once('error', reject);
  });
}

describe('HttpServer', () => {
  const logger = createSilentLogger();
  const labels = { a: 'ES', b: 'BTC' };
  let synchronizer: DualSeriesSynchronizer;
  let store: SnapshotStore;
  let prices: LatestPriceTracker;
  let health: Map<string, HealthStatus>;
  let sources: Record<SeriesId, FakeSource>;
  let history: HourlyHistory;
  let server: HttpServer;
  let baseUrl: string;

  beforeEach(async () => {
    synchronizer = new DualSeriesSynchronizer({ capacity: 500, logger });
    store = new SnapshotStore(labels, logger);
    prices = new LatestPriceTracker({ throttleMs: 0, logger });
    health = new Map([['LiveCorrelationService', { healthy: true }]]);

    const bars = Array.from({ length: 20 }, (_, i) => bar(i, 100 + i));
    synchronizer.backfill('A', bars);
    synchronizer.backfill('B', bars);

    sources = { A: new FakeSource('es'), B: new FakeSource('btcusdt') };
    sources.A.hourly = [bar(0, 5000), bar(60, 5010), bar(120, 5020)];
    history = new HourlyHistory({ sources, days: 7, logger });
    await history.load();

    server = new HttpServer({
      port: 0,
      host: '127.0.0.1',
      logger,
      labels,
      synchronizer,
      store,
      prices,
      sources,
      history,
      health: () => health,
    });
    await server.initialize();
    baseUrl = `127.0.0.1:${server.port() ?? 0}`;
  });

  afterEach(async () => {
    await server.shutdown();
  });

  it('reports service health', async () => {
    const ok = await fetch(`http://${baseUrl}/health`);
    expect(ok.status).toBe(200);
    expect(await ok.json()).toMatchObject({ status: 'ok', services: { LiveCorrelationService: { healthy: true } } });

    health.set('HttpServer', { healthy: false, message: 'HTTP server is stopped' });
    const degraded = await fetch(`http://${baseUrl}/health`);
    expect(await degraded.json()).toMatchObject({ status: 'degraded' });
  });

  it('serves an empty correlation before the first cycle', async () => {
    const response = await fetch(`http://${baseUrl}/api/correlation`);

    expect(await response.json()).toEqual({
      labels,
      cycle: 0,
      timestamp: null,
      snapshot: {},
      lead_lag: {},
    });
  });

  it('serves the latest correlation with lead/lag text', async () => {
    store.publish({ '1m': btcLeads, '5m': UNDEFINED_CORRELATION }, Date.UTC(2025, 0, 15, 12, 0));

    const response = await fetch(`http://${baseUrl}/api/correlation`);

    expect(await response.json()).toEqual({
      labels,
      cycle: 1,
      timestamp: '2025-01-15T12:00:00.000Z',
      snapshot: {
        '1m': {
          correlation: 0.612,
          p_value: 0,
          lead_lag: -2,
          lead_lag_corr: 0.457,
          strength: 'moderate',
          leader: 'BTC',
          color: '#FFD600',
          sample_size: 19,
        },
        '5m': {
          correlation: 0,
          p_value: 1,
          lead_lag: 0,
          lead_lag_corr: 0,
          strength: 'none',
          leader: 'SYNC',
          color: '#FF1744',
          sample_size: 0,
        },
      },
      lead_lag: {
        '1m': 'BTC leads by 2 min (corr: 0.46)',
        '5m': 'Collecting data...',
      },
    });
  });

  it('serves the newest bars of both series', async () => {
    const response = await fetch(`http://${baseUrl}/api/bars?limit=2`);
    const body = await response.json();

    expect(body).toEqual({
      labels,
      a: [bar(18, 118), bar(19, 119)],
      b: [bar(18, 118), bar(19, 119)],
    });
  });

  it('rejects an invalid limit', async () => {
    for (const limit of ['0', '-3', 'abc', '1.5']) {
      const response = await fetch(`http://${baseUrl}/api/bars?limit=${limit}`);
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid limit: must be a positive integer' });
    }
  });

  it('serves the latest prices', async () => {
    prices.update('B', { timestamp: 1_000, price: 97_250.5 });

    const response = await fetch(`http://${baseUrl}/api/prices`);

    expect(await response.json()).toEqual({ a: null, b: { series: 'B', price: 97_250.5, timestamp: 1_000 } });
  });

  it('answers unknown paths with 404', async () => {
    const response = await fetch(`http://${baseUrl}/api/nothing`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('reports itself healthy while listening', () => {
    expect(server.healthCheck()).toMatchObject({ healthy: true, details: { clients: 0 } });
  });

  it('serves the hourly history', async () => {
    const response = await fetch(`http://${baseUrl}/api/history`);

    expect(await response.json()).toEqual({
      labels,
      timeframe: '1h',
      a: [bar(0, 5000), bar(60, 5010), bar(120, 5020)],
      b: [],
    });
  });

  it('rejects initialize when the port is taken', async () => {
    const holder = http.createServer();
    await new Promise<void>((resolve) => holder.listen(0, '127.0.0.1', resolve));
    const address = holder.address();
    const taken = address && typeof address === 'object' ? address.port : 0;

    const second = new HttpServer({
      port: taken,
      host: '127.0.0.1',
      logger,
      labels,
      synchronizer,
      store,
      prices,
      sources,
    });

    try {
      await expect(second.initialize()).rejects.toMatchObject({ code: 'EADDRINUSE' });
      expect(second.healthCheck()).toMatchObject({ healthy: false, details: { clients: 0 } });
      expect(second.port()).toBeUndefined();
      await second.shutdown();
    } finally {
      await new Promise<void>((resolve, reject) => holder.close((error) => (error ? reject(error) : resolve())));
    }
  });

  describe('websocket', () => {
    it('sends the current state on connect, then live updates', async () => {
      prices.update('A', { timestamp: 1_000, price: 5_012.25 });
      const client = new WebSocket(`ws://${baseUrl}/ws`);
      const init = nextMessage(client);

      expect(await init).toMatchObject({
        type: 'init',
        labels,
        contracts: { a: 'ES-1', b: 'BTCUSDT-1' },
        snapshot: {},
        lead_lag: {},
        prices: { a: 5_012.25, b: null },
      });

      const barMessage = nextMessage(client);
      synchronizer.appendBar('B', bar(20, 120));
      expect(await barMessage).toEqual({ type: 'bar', series: 'B', symbol: 'BTC', data: bar(20, 120) });

      const tickMessage = nextMessage(client);
      prices.update('B', { timestamp: 2_000, price: 97_001 });
      expect(await tickMessage).toEqual({
        type: 'tick',
        series: 'B',
        symbol: 'BTC',
        price: 97_001,
        timestamp: 2_000,
      });

      const correlationMessage = nextMessage(client);
      store.publish({ '1m': btcLeads }, 5_000);
      expect(await correlationMessage).toMatchObject({
        type: 'correlation',
        cycle: 1,
        timestamp: 5_000,
        lead_lag: { '1m': 'BTC leads by 2 min (corr: 0.46)' },
      });

      client.close();
    });

    it('includes the buffered bars in the init message', async () => {
      const client = new WebSocket(`ws://${baseUrl}/ws`);

      const init = await nextMessage(client);

      expect(init).toMatchObject({ bars: { a: expect.any(Array), b: expect.any(Array) } });
      expect(init).toHaveProperty(['bars', 'a', 19], bar(19, 119));

      client.close();
    });

    it('includes the hourly history in the init message', async () => {
      const client = new WebSocket(`ws://${baseUrl}/ws`);

      const init = await nextMessage(client);

      expect(init).toMatchObject({
        historical: { a: [bar(0, 5000), bar(60, 5010), bar(120, 5020)], b: [] },
      });

      client.close();
    });
  });
});
