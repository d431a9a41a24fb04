/**
 * Lead/lag detection by cross-correlation search.
 */

import type { LeadLagResult } from '@crosslag/contracts';
import { isFiniteNumber } from '@crosslag/market-data-core';
import { mean, pearson, populationStd } from './stats.js';

/** Below this standard deviation a series counts as constant. */
const STD_EPSILON = 1e-10;

export const DEFAULT_MIN_LAG_CORRELATION = 0.2;
export const DEFAULT_MIN_LAG_IMPROVEMENT = 0.05;

export interface LeadLagOptions {
  /**
   * Largest shift searched in each direction. Defaults to
   * clamp(floor(n / 10), 5, 30).
   */
  maxLag?: number;

  /** Smallest |corr| a lagged peak needs to be reported (default: 0.2) */
  minCorrelation?: number;

  /** How much |corr| must beat the synchronous |corr| (default: 0.05) */
  minImprovement?: number;
}

const NO_LEAD: LeadLagResult = Object.freeze({ lag: 0, correlation: 0 });

/**
 * Default search window for `n` return pairs.
 *
 * @example
 * ```typescript
 * defaultMaxLag(29)   // 5
 * defaultMaxLag(120)  // 12
 * defaultMaxLag(499)  // 30
 * ```
 */
export function defaultMaxLag(n: number): number {
  return Math.max(5, Math.min(30, Math.floor(n / 10)));
}

function zNormalize(values: readonly number[], mu: number, sigma: number): number[] {
  return values.map((value) => (value - mu) / sigma);
}

/**
 * Correlation of A and B with B shifted by `lag` bars.
 * lag > 0 pairs A[t] with B[t + lag]; lag < 0 pairs B[t] with A[t - lag].
 */
function laggedCorrelation(a: readonly number[], b: readonly number[], lag: number): number {
  const n = a.length;
  if (lag < 0) {
    return pearson(b.slice(0, n + lag), a.slice(-lag, n));
  }
  if (lag > 0) {
    return pearson(a.slice(0, n - lag), b.slice(lag, n));
  }
  return pearson(a, b);
}

/**
 * Finds the shift at which two return series correlate best.
 *
 * A positive lag means A leads B by that many bars; negative means B leads.
 * The peak is reported only when it clears both the absolute threshold and
 * the improvement over the synchronous correlation; otherwise the result is
 * lag 0 with the synchronous correlation. Among equal peaks the first one
 * found, scanning from -maxLag upwards, wins.
 *
 * @returns `{ lag: 0, correlation: 0 }` when there are fewer than
 *   2·maxLag + 1 pairs or either series is constant
 *
 * @example
 * ```typescript
 * // B repeats A two bars later
 * detectLeadLag(a, b); // { lag: 2, correlation: 0.98 }
 * ```
 */
export function detectLeadLag(
  returnsA: readonly number[],
  returnsB: readonly number[],
  options: LeadLagOptions = {}
): LeadLagResult {
  const n = Math.min(returnsA.length, returnsB.length);
  const a = returnsA.slice(0, n);
  const b = returnsB.slice(0, n);

  const maxLag = options.maxLag ?? defaultMaxLag(n);
  const minCorrelation = options.minCorrelation ?? DEFAULT_MIN_LAG_CORRELATION;
  const minImprovement = options.minImprovement ?? DEFAULT_MIN_LAG_IMPROVEMENT;

  if (n < 2 * maxLag + 1) {
    return NO_LEAD;
  }

  const stdA = populationStd(a);
  const stdB = populationStd(b);
  if (!(stdA >= STD_EPSILON) || !(stdB >= STD_EPSILON)) {
    return NO_LEAD;
  }

  const normA = zNormalize(a, mean(a), stdA);
  const normB = zNormalize(b, mean(b), stdB);

  let bestLag = 0;
  let bestCorr = 0;
  let found = false;
  let syncCorr = 0;

  for (let lag = -maxLag; lag <= maxLag; lag++) {
    const corr = laggedCorrelation(normA, normB, lag);
    if (!isFiniteNumber(corr)) {
      continue;
    }
    if (lag === 0) {
      syncCorr = corr;
    }
    if (!found || Math.abs(corr) > Math.abs(bestCorr)) {
      bestLag = lag;
      bestCorr = corr;
      found = true;
    }
  }

  if (!found) {
    return NO_LEAD;
  }

  const clearsThreshold = Math.abs(bestCorr) >= minCorrelation;
  const beatsSync = Math.abs(bestCorr) - Math.abs(syncCorr) >= minImprovement;

  if (clearsThreshold && beatsSync) {
    return { lag: bestLag, correlation: bestCorr };
  }
  return { lag: 0, correlation: syncCorr };
}
