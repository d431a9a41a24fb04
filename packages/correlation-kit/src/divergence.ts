/**
 * Overlay and divergence helpers for charting the two series together.
 */

import { isFiniteNumber } from '@crosslag/market-data-core';
import { simpleReturns } from './returns.js';
import { pearson } from './stats.js';

const RANGE_EPSILON = 1e-10;

export const DEFAULT_DIVERGENCE_WINDOW = 20;

/**
 * Min-max scales prices into [0, 1] so two series of very different price
 * levels can share an axis. Non-finite prices map to NaN and are ignored
 * when finding the range.
 *
 * @example
 * ```typescript
 * normalizePrices([5000, 5010, 5005]); // [0, ≈1, ≈0.5]
 * ```
 */
export function normalizePrices(prices: readonly number[]): number[] {
  let min = Infinity;
  let max = -Infinity;
  for (const price of prices) {
    if (isFiniteNumber(price)) {
      min = Math.min(min, price);
      max = Math.max(max, price);
    }
  }

  const range = max - min + RANGE_EPSILON;
  return prices.map((price) => (isFiniteNumber(price) ? (price - min) / range : NaN));
}

/**
 * Rolling divergence score: for each `window`-long run of returns,
 * max(0, -corr). 0 means the series moved together (or had no correlation),
 * 1 means they moved in exact opposition.
 *
 * @returns One score per window position, oldest first; empty when either
 *   series is shorter than `window`
 */
export function rollingDivergence(
  pricesA: readonly number[],
  pricesB: readonly number[],
  window: number = DEFAULT_DIVERGENCE_WINDOW
): number[] {
  if (pricesA.length < window || pricesB.length < window) {
    return [];
  }

  const length = Math.min(pricesA.length, pricesB.length);
  const returnsA = simpleReturns(pricesA.slice(-length));
  const returnsB = simpleReturns(pricesB.slice(-length));

  const scores: number[] = [];
  for (let start = 0; start + window <= returnsA.length; start++) {
    const corr = pearson(returnsA.slice(start, start + window), returnsB.slice(start, start + window));
    scores.push(isFiniteNumber(corr) ? Math.max(0, -corr) : 0);
  }
  return scores;
}
