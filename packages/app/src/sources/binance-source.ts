/**
 * Binance spot source: REST klines for backfill, websocket streams for live
 * bars and trades.
 */

import axios from 'axios';
import { z } from 'zod';
import {
  MINUTE_MS,
  SourceError,
  Timeframe,
  timeframeToMinutes,
  type Bar,
  type HistoricalRequest,
} from '@crosslag/contracts';
import { createSilentLogger, type Logger } from '@crosslag/logger';
import { alignTimestamp } from '@crosslag/market-data-core';
import { BaseBarSource } from './base-source.js';
import { ReconnectingStream, type SocketFactory } from './reconnecting-stream.js';
import type { HttpClient } from './types.js';

/** Binance caps a klines request at 1000 rows. */
export const KLINE_REQUEST_LIMIT = 1000;

/** [openTime, open, high, low, close, volume, closeTime, ...] */
const klineRowSchema = z.tuple([z.number(), z.string(), z.string(), z.string(), z.string(), z.string()]).rest(z.unknown());
const klineResponseSchema = z.array(klineRowSchema);

const klineEventSchema = z.object({
  k: z.object({
    t: z.number(),
    o: z.string(),
    h: z.string(),
    l: z.string(),
    c: z.string(),
    v: z.string(),
    x: z.boolean(),
  }),
});

const tradeEventSchema = z.object({
  p: z.string(),
  q: z.string(),
  T: z.number(),
});

export interface BinanceSourceOptions {
  /** Exchange symbol, e.g. 'BTCUSDT' */
  symbol: string;
  /** Klines endpoint, e.g. https://api.binance.com/api/v3/klines */
  restUrl: string;
  /** Raw stream base, e.g. wss://stream.binance.com:9443/ws */
  wsUrl: string;
  logger?: Logger;
  httpClient?: HttpClient;
  createSocket?: SocketFactory;
  now?: () => number;
}

/**
 * Crypto series source.
 *
 * The kline stream reports the forming candle several times a second; only
 * the final update of each candle (`k.x === true`) is emitted as a bar.
 */
export class BinanceSource extends BaseBarSource {
  readonly name = 'binance';

  private readonly symbol: string;
  private readonly restUrl: string;
  private readonly wsUrl: string;
  private readonly http: HttpClient;
  private readonly createSocket: SocketFactory | undefined;
  private readonly now: () => number;
  private streams: ReconnectingStream[] = [];

  constructor(options: BinanceSourceOptions) {
    super(options.logger ?? createSilentLogger());
    this.symbol = options.symbol;
    this.restUrl = options.restUrl;
    this.wsUrl = options.wsUrl.replace(/\/+$/, '');
    this.http = options.httpClient ?? axios.create({ timeout: 10_000 });
    this.createSocket = options.createSocket;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fetches the closed candles of the last `minutes` before `endTime`, in
   * chunks of at most 1000.
   */
  async fetchHistorical(request: HistoricalRequest): Promise<Bar[]> {
    const timeframe = request.timeframe ?? Timeframe.M1;
    const width = timeframeToMinutes(timeframe);
    const count = Math.floor(request.minutes / width);
    if (count <= 0) {
      return [];
    }

    const step = width * MINUTE_MS;
    const end = alignTimestamp(request.endTime ?? this.now(), width);
    const bars: Bar[] = [];
    let nextStart = end - count * step;

    // Bounded so a misbehaving endpoint cannot loop forever
    const maxRequests = Math.ceil(count / KLINE_REQUEST_LIMIT) + 5;

    for (let i = 0; i < maxRequests && bars.length < count; i++) {
      const limit = Math.min(KLINE_REQUEST_LIMIT, count - bars.length);
      const chunk = await this.requestKlines({ interval: timeframe, startTime: nextStart, endTime: end - 1, limit });

      const last = chunk[chunk.length - 1];
      if (!last) {
        break;
      }

      bars.push(...chunk);
      nextStart = last.timestamp + step;

      if (chunk.length < limit) {
        break;
      }
    }

    this.logger.debug('Klines fetched', {
      symbol: this.symbol,
      interval: timeframe,
      requested: count,
      received: bars.length,
    });
    return bars.slice(0, count);
  }

  contractSymbol(): string {
    return this.symbol;
  }

  async start(): Promise<void> {
    if (this.streams.length > 0) {
      return;
    }

    const stream = this.symbol.toLowerCase();
    this.streams = [
      new ReconnectingStream({
        url: `${this.wsUrl}/${stream}@kline_1m`,
        logger: this.logger,
        onMessage: (message) => this.handleKline(message),
        ...(this.createSocket ? { createSocket: this.createSocket } : {}),
      }),
      new ReconnectingStream({
        url: `${this.wsUrl}/${stream}@trade`,
        logger: this.logger,
        onMessage: (message) => this.handleTrade(message),
        ...(this.createSocket ? { createSocket: this.createSocket } : {}),
      }),
    ];

    for (const s of this.streams) {
      s.connect();
    }
    this.logger.info('Binance streams started', { symbol: this.symbol });
  }

  async stop(): Promise<void> {
    for (const s of this.streams) {
      s.stop();
    }
    this.streams = [];
  }

  isConnected(): boolean {
    return this.streams.length > 0 && this.streams.every((s) => s.isConnected());
  }

  private async requestKlines(params: {
    interval: Timeframe;
    startTime: number;
    endTime: number;
    limit: number;
  }): Promise<Bar[]> {
    let data: unknown;
    try {
      const response = await this.http.get(this.restUrl, {
        params: { symbol: this.symbol, ...params },
      });
      data = response.data;
    } catch (error) {
      throw new SourceError('Klines request failed', {
        source: this.name,
        symbol: this.symbol,
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
        message: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = klineResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SourceError('Unexpected klines payload', {
        source: this.name,
        symbol: this.symbol,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    return parsed.data.map((row) => ({
      timestamp: row[0],
      open: Number(row[1]),
      high: Number(row[2]),
      low: Number(row[3]),
      close: Number(row[4]),
      volume: Number(row[5]),
    }));
  }

  private handleKline(message: unknown): void {
    const parsed = klineEventSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.debug('Ignoring unexpected kline message');
      return;
    }

    const { k } = parsed.data;
    if (!k.x) {
      return;
    }

    this.events.emit('bar', {
      timestamp: k.t,
      open: Number(k.o),
      high: Number(k.h),
      low: Number(k.l),
      close: Number(k.c),
      volume: Number(k.v),
    });
  }

  private handleTrade(message: unknown): void {
    const parsed = tradeEventSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.debug('Ignoring unexpected trade message');
      return;
    }

    this.events.emit('tick', {
      timestamp: parsed.data.T,
      price: Number(parsed.data.p),
      volume: Number(parsed.data.q),
    });
  }
}
