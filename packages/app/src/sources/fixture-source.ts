/**
 * Deterministic synthetic source for dry runs and tests
 */

import { MINUTE_MS, Timeframe, timeframeToMinutes, type Bar, type HistoricalRequest } from '@crosslag/contracts';
import { createSilentLogger, type Logger } from '@crosslag/logger';
import { alignTimestamp, alignToMinute, resampleBars } from '@crosslag/market-data-core';
import { BaseBarSource } from './base-source.js';
import type { BarListener } from './types.js';

/** Minutes of history available before the live cursor. */
export const FIXTURE_HISTORY_MINUTES = 1440;

export interface FixtureLeadCoupling {
  /** Source whose returns this one follows */
  source: FixtureSource;
  /** Bars by which `source` leads */
  lagBars: number;
  /** Weight of the leader's return, 0..1 (default: 0.8) */
  weight?: number;
}

export interface FixtureSourceOptions {
  name?: string;
  seed: number;
  startPrice: number;
  /** Scale of the per-bar return (default: 0.001) */
  volatility?: number;
  /** Timestamp of bar index 0 (default: 1440 minutes before now) */
  origin?: number;
  /** Wall-clock time between emitted bars (default: 60000) */
  intervalMs?: number;
  /**
   * Emit each bar as this many sub-minute samples through onPartial
   * instead of as one completed bar (default: 1)
   */
  samplesPerBar?: number;
  follows?: FixtureLeadCoupling;
  logger?: Logger;
}

/**
 * mulberry32
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random-walk bars, identical for identical options.
 *
 * Bar i covers the minute starting at `origin + i * 60000`. History is
 * bars [0, cursor); start() emits bar `cursor` onwards, one per
 * `intervalMs`. With `follows`, the return of bar i mixes the leader's
 * return of bar i - lagBars with this source's own noise.
 *
 * @example
 * ```typescript
 * const futures = new FixtureSource({ name: 'ES', seed: 1, startPrice: 5000 });
 * const crypto = new FixtureSource({
 *   name: 'BTC',
 *   seed: 2,
 *   startPrice: 60000,
 *   follows: { source: futures, lagBars: 2 },
 * });
 * ```
 */
export class FixtureSource extends BaseBarSource {
  readonly name: string;

  private readonly random: () => number;
  private readonly startPrice: number;
  private readonly volatility: number;
  private readonly origin: number;
  private readonly intervalMs: number;
  private readonly samplesPerBar: number;
  private readonly follows: FixtureLeadCoupling | undefined;

  private readonly returns: number[] = [];
  private readonly closes: number[] = [];
  private cursor = FIXTURE_HISTORY_MINUTES;
  private sample = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: FixtureSourceOptions) {
    super(options.logger ?? createSilentLogger());
    this.name = options.name ?? 'fixture';
    this.random = seededRandom(options.seed);
    this.startPrice = options.startPrice;
    this.volatility = options.volatility ?? 0.001;
    this.origin = options.origin ?? alignToMinute(Date.now()) - FIXTURE_HISTORY_MINUTES * MINUTE_MS;
    this.intervalMs = options.intervalMs ?? MINUTE_MS;
    this.samplesPerBar = Math.max(1, Math.floor(options.samplesPerBar ?? 1));
    this.follows = options.follows;
  }

  onPartial(listener: BarListener): () => void {
    return this.events.on('partial', listener);
  }

  /**
   * Return of bar `index` (0 for negative indices).
   */
  returnAt(index: number): number {
    if (index < 0) {
      return 0;
    }

    while (this.returns.length <= index) {
      const i = this.returns.length;
      const own = (this.random() - 0.5) * 2 * this.volatility;

      if (this.follows && i - this.follows.lagBars >= 0) {
        const weight = this.follows.weight ?? 0.8;
        const led = this.follows.source.returnAt(i - this.follows.lagBars);
        this.returns.push(weight * led + (1 - weight) * own);
      } else {
        this.returns.push(own);
      }
    }

    return this.returns[index] ?? 0;
  }

  /**
   * Bar at `index`. Open is the previous close; high and low extend the
   * body by a fraction of the move.
   */
  barAt(index: number): Bar {
    const close = this.closeAt(index);
    const open = index === 0 ? this.startPrice : this.closeAt(index - 1);
    const wick = Math.abs(close - open) * 0.25;

    return {
      timestamp: this.origin + index * MINUTE_MS,
      open,
      high: Math.max(open, close) + wick,
      low: Math.min(open, close) - wick,
      close,
      volume: 100 + Math.round(Math.abs(this.returnAt(index)) * 1e5),
    };
  }

  /**
   * History before the live cursor. Wider timeframes are resampled from the
   * minute bars of whole buckets.
   */
  async fetchHistorical(request: HistoricalRequest): Promise<Bar[]> {
    const width = timeframeToMinutes(request.timeframe ?? Timeframe.M1);
    const count = Math.floor(request.minutes / width);
    if (count <= 0) {
      return [];
    }

    const liveEnd = this.origin + this.cursor * MINUTE_MS;
    const end = alignTimestamp(Math.min(request.endTime ?? liveEnd, liveEnd), width);
    const endIndex = Math.floor((end - this.origin) / MINUTE_MS);
    const startIndex = Math.max(0, Math.ceil((end - count * width * MINUTE_MS - this.origin) / MINUTE_MS));

    const bars: Bar[] = [];
    for (let i = startIndex; i < endIndex; i++) {
      bars.push(this.barAt(i));
    }
    return width === 1 ? bars : [...resampleBars(bars, width)];
  }

  contractSymbol(): string {
    return this.name;
  }

  async start(): Promise<void> {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.step(), this.intervalMs / this.samplesPerBar);
    this.logger.info('Fixture source started', { source: this.name, interval_ms: this.intervalMs });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Advance by one bar, or by one sample when emitting partials.
   */
  step(): void {
    const bar = this.barAt(this.cursor);

    if (this.samplesPerBar === 1) {
      this.cursor++;
      this.events.emit('bar', bar);
      this.events.emit('tick', { timestamp: bar.timestamp + MINUTE_MS - 1, price: bar.close });
      return;
    }

    // Sample k moves the price k+1 steps of the way from open to close
    const fraction = (this.sample + 1) / this.samplesPerBar;
    const price = bar.open + (bar.close - bar.open) * fraction;
    const timestamp = bar.timestamp + Math.floor((this.sample * MINUTE_MS) / this.samplesPerBar);

    this.events.emit('partial', {
      timestamp,
      open: price,
      high: price,
      low: price,
      close: price,
      volume: bar.volume / this.samplesPerBar,
    });
    this.events.emit('tick', { timestamp, price });

    this.sample++;
    if (this.sample === this.samplesPerBar) {
      this.sample = 0;
      this.cursor++;
    }
  }

  private closeAt(index: number): number {
    while (this.closes.length <= index) {
      const i = this.closes.length;
      const previous = i === 0 ? this.startPrice : (this.closes[i - 1] ?? this.startPrice);
      this.closes.push(previous * (1 + this.returnAt(i)));
    }
    return this.closes[index] ?? this.startPrice;
  }
}
