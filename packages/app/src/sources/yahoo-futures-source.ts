/**
 * Futures source polling the Yahoo Finance chart API for 1-minute bars.
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
import { alignTimestamp, alignToMinute } from '@crosslag/market-data-core';
import { BaseBarSource } from './base-source.js';
import { frontMonthContract } from './futures-contract.js';
import type { HttpClient } from './types.js';

export const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

/** Chart API interval names */
const CHART_INTERVALS: Record<Timeframe, string> = {
  [Timeframe.M1]: '1m',
  [Timeframe.M5]: '5m',
  [Timeframe.M15]: '15m',
  [Timeframe.H1]: '60m',
};

/** How far back a poll looks when it has fallen behind. */
const MAX_POLL_LOOKBACK_MINUTES = 60;

const priceColumn = z.array(z.number().nullable()).optional();

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: priceColumn,
                high: priceColumn,
                low: priceColumn,
                close: priceColumn,
                volume: priceColumn,
              })
            ),
          }),
        })
      )
      .nullable()
      .optional(),
    error: z
      .object({
        code: z.string().optional(),
        description: z.string().optional(),
      })
      .nullable()
      .optional(),
  }),
});

export interface YahooFuturesSourceOptions {
  /** Yahoo symbol of the continuous contract, e.g. 'ES=F' */
  symbol: string;
  /** Contract root for front-month naming (default: symbol without '=F') */
  contractRoot?: string;
  pollSeconds: number;
  baseUrl?: string;
  logger?: Logger;
  httpClient?: HttpClient;
  now?: () => number;
}

/**
 * Equity-index futures series source.
 *
 * Each poll emits every minute that closed since the previous poll, once,
 * and the close of the newest (possibly forming) minute as a tick. The very
 * first poll emits only the most recent closed minute; older history comes
 * from {@link fetchHistorical}.
 */
export class YahooFuturesSource extends BaseBarSource {
  readonly name = 'yahoo';

  private readonly symbol: string;
  private readonly contractRoot: string;
  private readonly pollMs: number;
  private readonly baseUrl: string;
  private readonly http: HttpClient;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private lastEmitted: number | undefined;
  private polling = false;

  constructor(options: YahooFuturesSourceOptions) {
    super(options.logger ?? createSilentLogger());
    this.symbol = options.symbol;
    this.contractRoot = options.contractRoot ?? options.symbol.replace(/=F$/, '');
    this.pollMs = options.pollSeconds * 1000;
    this.baseUrl = (options.baseUrl ?? YAHOO_CHART_URL).replace(/\/+$/, '');
    this.http = options.httpClient ?? axios.create({ timeout: 10_000 });
    this.now = options.now ?? Date.now;
  }

  async fetchHistorical(request: HistoricalRequest): Promise<Bar[]> {
    const timeframe = request.timeframe ?? Timeframe.M1;
    const width = timeframeToMinutes(timeframe);
    const count = Math.floor(request.minutes / width);
    if (count <= 0) {
      return [];
    }

    const end = alignTimestamp(request.endTime ?? this.now(), width);
    const start = end - count * width * MINUTE_MS;
    const bars = await this.fetchSeries(start, end, timeframe);

    return bars.filter((bar) => bar.timestamp >= start && bar.timestamp < end).slice(-count);
  }

  contractSymbol(): string {
    return frontMonthContract(this.contractRoot, this.now());
  }

  async start(): Promise<void> {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.pollSafely();
    }, this.pollMs);
    this.logger.info('Yahoo polling started', { symbol: this.symbol, poll_ms: this.pollMs });

    await this.pollSafely();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One poll: emit newly closed minutes and the latest price.
   *
   * @throws SourceError when the request fails
   */
  async poll(): Promise<void> {
    const now = this.now();
    const currentMinute = alignToMinute(now);
    const earliest = currentMinute - MAX_POLL_LOOKBACK_MINUTES * MINUTE_MS;
    const from = this.lastEmitted === undefined ? earliest : Math.max(this.lastEmitted + MINUTE_MS, earliest);

    const bars = await this.fetchSeries(from, now);
    const closed = bars.filter((bar) => bar.timestamp < currentMinute);
    const lastEmitted = this.lastEmitted;
    const fresh =
      lastEmitted === undefined ? closed.slice(-1) : closed.filter((bar) => bar.timestamp > lastEmitted);

    for (const bar of fresh) {
      this.events.emit('bar', bar);
      this.lastEmitted = bar.timestamp;
    }

    const latest = bars[bars.length - 1];
    if (latest) {
      this.events.emit('tick', { timestamp: now, price: latest.close });
    }
  }

  private async pollSafely(): Promise<void> {
    if (this.polling) {
      return;
    }

    this.polling = true;
    try {
      await this.poll();
    } catch (error) {
      this.logger.warn('Yahoo poll failed', {
        symbol: this.symbol,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.polling = false;
    }
  }

  /**
   * Bars in [startMs, endMs], oldest first, one per bucket. Rows with a
   * missing open, high, low or close are skipped.
   */
  private async fetchSeries(startMs: number, endMs: number, timeframe: Timeframe = Timeframe.M1): Promise<Bar[]> {
    const width = timeframeToMinutes(timeframe);
    let data: unknown;
    try {
      const response = await this.http.get(`${this.baseUrl}/${encodeURIComponent(this.symbol)}`, {
        params: {
          interval: CHART_INTERVALS[timeframe],
          period1: Math.floor(startMs / 1000),
          period2: Math.floor(endMs / 1000),
          includePrePost: true,
        },
      });
      data = response.data;
    } catch (error) {
      throw new SourceError('Chart request failed', {
        source: this.name,
        symbol: this.symbol,
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
        message: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = chartResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SourceError('Unexpected chart payload', {
        source: this.name,
        symbol: this.symbol,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const result = parsed.data.chart.result?.[0];
    if (!result) {
      throw new SourceError(parsed.data.chart.error?.description ?? 'Chart response has no result', {
        source: this.name,
        symbol: this.symbol,
      });
    }

    const timestamps = result.timestamp ?? [];
    const quote = result.indicators.quote[0];
    if (!quote) {
      return [];
    }

    const byBucket = new Map<number, Bar>();
    for (let i = 0; i < timestamps.length; i++) {
      const seconds = timestamps[i];
      const open = quote.open?.[i];
      const high = quote.high?.[i];
      const low = quote.low?.[i];
      const close = quote.close?.[i];

      if (seconds == null || open == null || high == null || low == null || close == null) {
        continue;
      }

      const timestamp = alignTimestamp(seconds * 1000, width);
      byBucket.set(timestamp, {
        timestamp,
        open,
        high,
        low,
        close,
        volume: quote.volume?.[i] ?? 0,
      });
    }

    return [...byBucket.values()].sort((a, b) => a.timestamp - b.timestamp);
  }
}
