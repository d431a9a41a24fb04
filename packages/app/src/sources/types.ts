/**
 * Market-data source contract
 */

import type { Bar, HistoricalRequest, Tick } from '@crosslag/contracts';

/**
 * The part of an axios instance the REST sources use. An AxiosInstance
 * satisfies it.
 */
export interface HttpClient {
  get(url: string, config?: { params?: Record<string, unknown> }): Promise<{ data: unknown }>;
}

export type BarListener = (bar: Bar) => void;
export type TickListener = (tick: Tick) => void;

/**
 * A live feed of 1-minute bars for one instrument.
 *
 * Sources do not validate values: a bar with NaN or Infinity is delivered
 * as received and rejected by the buffer it is appended to.
 */
export interface BarSource {
  /** Short identifier used in logs and errors ('binance', 'yahoo', 'fixture') */
  readonly name: string;

  /** Instrument actually traded, e.g. the front-month futures contract 'ESH5' */
  contractSymbol(): string;

  /**
   * Completed bars, once per interval.
   *
   * @returns Unsubscribe function
   */
  onBar(listener: BarListener): () => void;

  /** Raw trade or quote prices */
  onTick(listener: TickListener): () => void;

  /**
   * Sub-minute samples of the forming bar, for sources that produce them.
   * Each sample is merged into the pending bar of its minute.
   */
  onPartial?(listener: BarListener): () => void;

  /**
   * Bulk historical bars, oldest first: 1-minute bars unless the request
   * names another timeframe. Only closed bars are returned.
   *
   * @throws SourceError when the request fails
   */
  fetchHistorical(request: HistoricalRequest): Promise<Bar[]>;

  start(): Promise<void>;

  /** Stops all streams and timers. Idempotent. */
  stop(): Promise<void>;
}

/**
 * Events every source publishes.
 */
export interface SourceEventMap {
  bar: Bar;
  tick: Tick;
  partial: Bar;
}
