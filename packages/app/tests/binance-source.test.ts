import { describe, it, expect } from 'vitest';
import { MINUTE_MS, SourceError, Timeframe, type Bar, type Tick } from '@crosslag/contracts';
import { BinanceSource } from '../src/sources/binance-source.js';
import { FakeHttp, FakeSocket, T0, type RecordedRequest } from './helpers.js';

const REST_URL = 'https://api.test/api/v3/klines';

/** Serves one row per minute from startTime up to endTime, at most `limit`. */
function klines(lastAvailable = Number.POSITIVE_INFINITY) {
  return ({ params }: RecordedRequest): unknown[] => {
    const startTime = Number(params['startTime']);
    const endTime = Math.min(Number(params['endTime']), lastAvailable);
    const limit = Number(params['limit']);
    const rows: unknown[] = [];
    for (let t = startTime; t <= endTime && rows.length < limit; t += MINUTE_MS) {
      rows.push([t, '100.5', '101', '100', '100.25', '3.5', t + MINUTE_MS - 1, '350.0', 12]);
    }
    return rows;
  };
}

function source(http: FakeHttp, sockets: FakeSocket[] = []) {
  return new BinanceSource({
    symbol: 'BTCUSDT',
    restUrl: REST_URL,
    wsUrl: 'wss://stream.test/ws/',
    httpClient: http,
    now: () => T0 + 3000 * MINUTE_MS + 30_000,
    createSocket: (url) => {
      const socket = new FakeSocket(url);
      sockets.push(socket);
      return socket;
    },
  });
}

describe('BinanceSource', () => {
  describe('fetchHistorical', () => {
    it('pages through klines in chunks of 1000', async () => {
      const http = new FakeHttp(klines());

      const bars = await source(http).fetchHistorical({ minutes: 2500 });

      expect(http.requests.map((r) => r.params['limit'])).toEqual([1000, 1000, 500]);
      expect(http.requests[0]).toEqual({
        url: REST_URL,
        params: {
          symbol: 'BTCUSDT',
          interval: '1m',
          startTime: T0 + 500 * MINUTE_MS,
          endTime: T0 + 3000 * MINUTE_MS - 1,
          limit: 1000,
        },
      });
      expect(http.requests[1]?.params['startTime']).toBe(T0 + 1500 * MINUTE_MS);
      expect(bars).toHaveLength(2500);
      expect(bars[0]?.timestamp).toBe(T0 + 500 * MINUTE_MS);
      expect(bars[2499]?.timestamp).toBe(T0 + 2999 * MINUTE_MS);
    });

    it('requests wider candles when a timeframe is given', async () => {
      const HOUR_MS = 60 * MINUTE_MS;
      const http = new FakeHttp(({ params }) => {
        const rows: unknown[] = [];
        for (let t = Number(params['startTime']); t <= Number(params['endTime']); t += HOUR_MS) {
          rows.push([t, '100', '101', '99', '100.5', '40', t + HOUR_MS - 1]);
        }
        return rows;
      });

      const bars = await source(http).fetchHistorical({ minutes: 7 * 1440, timeframe: Timeframe.H1 });

      expect(http.requests).toEqual([
        {
          url: REST_URL,
          params: {
            symbol: 'BTCUSDT',
            interval: '1h',
            startTime: T0 - 7080 * MINUTE_MS,
            endTime: T0 + 3000 * MINUTE_MS - 1,
            limit: 168,
          },
        },
      ]);
      expect(bars).toHaveLength(168);
      expect(bars[167]?.timestamp).toBe(T0 + 2940 * MINUTE_MS);
    });

    it('reports the exchange symbol as its contract', () => {
      expect(source(new FakeHttp(() => [])).contractSymbol()).toBe('BTCUSDT');
    });

    it('converts string fields to numbers', async () => {
      const http = new FakeHttp(klines());

      const bars = await source(http).fetchHistorical({ minutes: 1 });

      expect(bars).toEqual([
        { timestamp: T0 + 2999 * MINUTE_MS, open: 100.5, high: 101, low: 100, close: 100.25, volume: 3.5 },
      ]);
    });

    it('stops at a short chunk', async () => {
      const http = new FakeHttp(klines(T0 + 1199 * MINUTE_MS));

      const bars = await source(http).fetchHistorical({ minutes: 2500 });

      expect(http.requests).toHaveLength(1);
      expect(bars).toHaveLength(700);
    });

    it('uses endTime when given', async () => {
      const http = new FakeHttp(klines());

      const bars = await source(http).fetchHistorical({ minutes: 10, endTime: T0 + 60 * MINUTE_MS + 5 });

      expect(bars.map((b) => b.timestamp)).toEqual(
        Array.from({ length: 10 }, (_, i) => T0 + (50 + i) * MINUTE_MS)
      );
    });

    it('returns nothing for a non-positive window', async () => {
      const http = new FakeHttp(klines());

      expect(await source(http).fetchHistorical({ minutes: 0 })).toEqual([]);
      expect(http.requests).toHaveLength(0);
    });

    it('reports the HTTP status of a failed request', async () => {
      const http = new FakeHttp(() => {
        throw Object.assign(new Error('Request failed with status code 429'), {
          isAxiosError: true,
          response: { status: 429 },
        });
      });

      const error = await source(http)
        .fetchHistorical({ minutes: 5 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceError);
      expect(error).toMatchObject({ message: 'Klines request failed', source: 'binance', status: 429 });
    });

    it('rejects an unexpected payload', async () => {
      const http = new FakeHttp(() => ({ code: -1121, msg: 'Invalid symbol.' }));

      await expect(source(http).fetchHistorical({ minutes: 5 })).rejects.toThrow('Unexpected klines payload');
    });
  });

  describe('streams', () => {
    it('opens kline and trade streams for the symbol', async () => {
      const sockets: FakeSocket[] = [];
      const binance = source(new FakeHttp(klines()), sockets);

      await binance.start();

      expect(sockets.map((s) => s.url)).toEqual([
        'wss://stream.test/ws/btcusdt@kline_1m',
        'wss://stream.test/ws/btcusdt@trade',
      ]);
      expect(binance.isConnected()).toBe(false);

      sockets[0]?.emit('open');
      sockets[1]?.emit('open');
      expect(binance.isConnected()).toBe(true);

      await binance.stop();
    });

    it('emits a bar only when the candle closes', async () => {
      const sockets: FakeSocket[] = [];
      const binance = source(new FakeHttp(klines()), sockets);
      const bars: Bar[] = [];
      binance.onBar((b) => bars.push(b));
      await binance.start();

      const kline = { t: T0, o: '97000.0', h: '97100.5', l: '96950.0', c: '97050.25', v: '12.5' };
      sockets[0]?.receive({ e: 'kline', k: { ...kline, x: false } });
      expect(bars).toHaveLength(0);

      sockets[0]?.receive({ e: 'kline', k: { ...kline, x: true } });
      expect(bars).toEqual([
        { timestamp: T0, open: 97000, high: 97100.5, low: 96950, close: 97050.25, volume: 12.5 },
      ]);

      await binance.stop();
    });

    it('emits every trade as a tick', async () => {
      const sockets: FakeSocket[] = [];
      const binance = source(new FakeHttp(klines()), sockets);
      const ticks: Tick[] = [];
      binance.onTick((tick) => ticks.push(tick));
      await binance.start();

      sockets[1]?.receive({ e: 'trade', p: '97012.34', q: '0.002', T: T0 + 1234 });
      sockets[1]?.receive({ e: 'trade', p: 'n/a' });

      expect(ticks).toEqual([{ timestamp: T0 + 1234, price: 97012.34, volume: 0.002 }]);

      await binance.stop();
    });

    it('closes both streams on stop', async () => {
      const sockets: FakeSocket[] = [];
      const binance = source(new FakeHttp(klines()), sockets);
      await binance.start();

      await binance.stop();

      expect(sockets.every((s) => s.closed)).toBe(true);
      expect(binance.isConnected()).toBe(false);
    });
  });
});
