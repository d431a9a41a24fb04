/**
 * Finite-value predicates.
 *
 * Every data-entry boundary (buffer append, partial-bar merge, return
 * computation, price normalization) checks values with these instead of
 * ad hoc NaN comparisons.
 */

import type { Bar } from '@crosslag/contracts';

/**
 * True for numbers that are neither NaN nor ±Infinity.
 *
 * @example
 * ```typescript
 * isFiniteNumber(5012.25)  // true
 * isFiniteNumber(NaN)      // false
 * isFiniteNumber('5012')   // false
 * ```
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * True when the timestamp and all five OHLCV fields are finite.
 *
 * Only finiteness is checked: a bar with high < low is unusual but
 * numerically harmless for return-based statistics.
 */
export function isValidBar(bar: Bar): boolean {
  return (
    isFiniteNumber(bar.timestamp) &&
    isFiniteNumber(bar.open) &&
    isFiniteNumber(bar.high) &&
    isFiniteNumber(bar.low) &&
    isFiniteNumber(bar.close) &&
    isFiniteNumber(bar.volume)
  );
}
