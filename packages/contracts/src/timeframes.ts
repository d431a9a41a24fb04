/**
 * @fileoverview Analysis timeframes.
 *
 * Each timeframe is a bucket width in whole minutes over the 1-minute bars
 * both sources produce. Values are the labels used in snapshots and on the
 * wire.
 *
 * @module @crosslag/contracts/timeframes
 */

/**
 * Supported analysis timeframes, ordered from smallest to largest width.
 */
export enum Timeframe {
  /** Raw 1-minute bars, no resampling */
  M1 = '1m',
  /** 5-minute buckets */
  M5 = '5m',
  /** 15-minute buckets */
  M15 = '15m',
  /** 1-hour buckets */
  H1 = '1h',
}

const TIMEFRAME_MINUTES: Record<Timeframe, number> = {
  [Timeframe.M1]: 1,
  [Timeframe.M5]: 5,
  [Timeframe.M15]: 15,
  [Timeframe.H1]: 60,
};

/** One minute in milliseconds; the alignment grid of every bar. */
export const MINUTE_MS = 60_000;

/**
 * Timeframes analyzed when none are configured.
 */
export const DEFAULT_TIMEFRAMES: readonly Timeframe[] = [
  Timeframe.M1,
  Timeframe.M5,
  Timeframe.M15,
  Timeframe.H1,
];

/**
 * @example
 * ```typescript
 * isValidTimeframe('15m') // true
 * isValidTimeframe('15')  // false
 * ```
 */
export function isValidTimeframe(value: string): value is Timeframe {
  return Object.values(Timeframe).some((timeframe) => timeframe === value);
}

/**
 * Bucket width of a timeframe in minutes.
 *
 * @example
 * ```typescript
 * timeframeToMinutes(Timeframe.H1) // 60
 * ```
 */
export function timeframeToMinutes(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe];
}

/**
 * Parses a label into a Timeframe.
 *
 * @throws {Error} If the label is not a supported timeframe
 */
export function parseTimeframe(value: string): Timeframe {
  if (!isValidTimeframe(value)) {
    throw new Error(
      `Invalid timeframe: ${value}. Must be one of: ${Object.values(Timeframe).join(', ')}`
    );
  }
  return value;
}
