/**
 * @fileoverview Market data types shared by sources, buffers and analysis.
 *
 * All types are plain data. Timestamps are Unix epoch milliseconds (UTC).
 *
 * @module @crosslag/contracts/market
 */

import type { Timeframe } from './timeframes.js';

/**
 * Identifies one of the two correlated series. `A` is the futures feed,
 * `B` the crypto feed; display labels ("ES", "BTC") are configuration.
 */
export type SeriesId = 'A' | 'B';

/**
 * A single OHLCV bar.
 *
 * @invariant all five numeric fields are finite
 * @invariant timestamp is aligned to the start of a UTC minute once stored
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   timestamp: Date.UTC(2025, 0, 15, 14, 30),
 *   open: 5012.25,
 *   high: 5013.0,
 *   low: 5011.75,
 *   close: 5012.5,
 *   volume: 1840,
 * };
 * ```
 */
export interface Bar {
  /** Bar open time, epoch milliseconds (UTC) */
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * A raw trade or quote price. Ticks drive the latest-price display only and
 * never reach the correlation computation.
 */
export interface Tick {
  /** Event time, epoch milliseconds (UTC) */
  readonly timestamp: number;
  readonly price: number;
  /** Traded quantity, when the source reports one */
  readonly volume?: number;
}

/**
 * Columnar projection of a bar sequence, one array per field, all of equal
 * length and in chronological order.
 */
export interface BarTable {
  readonly timestamp: readonly number[];
  readonly open: readonly number[];
  readonly high: readonly number[];
  readonly low: readonly number[];
  readonly close: readonly number[];
  readonly volume: readonly number[];
}

/**
 * Historical backfill request.
 *
 * @example
 * ```typescript
 * // Last 24 hours of 1-minute bars
 * const request: HistoricalRequest = { minutes: 1440 };
 *
 * // Last 7 days of hourly bars
 * const hourly: HistoricalRequest = { minutes: 7 * 1440, timeframe: Timeframe.H1 };
 * ```
 */
export interface HistoricalRequest {
  /**
   * Length of the window in minutes, counting back from `endTime`. A request
   * returns at most floor(minutes / width) bars.
   */
  minutes: number;

  /** Bar width (default: 1m) */
  timeframe?: Timeframe;

  /** End of the range (exclusive), epoch ms. Defaults to now. */
  endTime?: number;
}

/**
 * Both series' bars, captured at the same moment.
 */
export interface BarPair {
  readonly a: readonly Bar[];
  readonly b: readonly Bar[];
}

/**
 * Display labels of the two series.
 */
export interface SeriesLabels {
  readonly a: string;
  readonly b: string;
}
