/**
 * Return series.
 */

import { isFiniteNumber } from '@crosslag/market-data-core';

/**
 * Added to every denominator so a zero price yields a huge (finite or
 * non-finite) return instead of a division error.
 */
export const RETURN_EPSILON = 1e-10;

/**
 * Simple returns r[i] = (p[i] - p[i-1]) / (p[i-1] + ε).
 *
 * Output has one element fewer than the input and may contain non-finite
 * values where prices were non-finite.
 *
 * @example
 * ```typescript
 * simpleReturns([100, 101, 99.99]); // ≈ [0.01, -0.01]
 * ```
 */
export function simpleReturns(prices: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    const prev = prices[i - 1] ?? NaN;
    const curr = prices[i] ?? NaN;
    returns.push((curr - prev) / (prev + RETURN_EPSILON));
  }
  return returns;
}

/**
 * Return pairs of two aligned price series with every pair containing a
 * non-finite value removed. Both outputs have the same length.
 */
export interface PairedReturns {
  readonly a: readonly number[];
  readonly b: readonly number[];
}

/**
 * Computes returns of both series and drops pairs where either return is
 * non-finite, keeping the remaining pairs aligned.
 */
export function pairedFiniteReturns(
  pricesA: readonly number[],
  pricesB: readonly number[]
): PairedReturns {
  const returnsA = simpleReturns(pricesA);
  const returnsB = simpleReturns(pricesB);
  const n = Math.min(returnsA.length, returnsB.length);

  const a: number[] = [];
  const b: number[] = [];
  for (let i = 0; i < n; i++) {
    const ra = returnsA[i];
    const rb = returnsB[i];
    if (isFiniteNumber(ra) && isFiniteNumber(rb)) {
      a.push(ra);
      b.push(rb);
    }
  }

  return { a, b };
}
