/**
 * Return correlation between two price series.
 */

import { UNDEFINED_CORRELATION, type CorrelationResult, type Strength } from '@crosslag/contracts';
import { isFiniteNumber } from '@crosslag/market-data-core';
import { pairedFiniteReturns } from './returns.js';
import { pearson, pearsonPValue } from './stats.js';
import { detectLeadLag, type LeadLagOptions } from './lead-lag.js';

/** Fewer prices than this in either series yields the undefined result. */
export const MIN_PRICES = 10;

/** Fewer finite return pairs than this yields the undefined result. */
export const MIN_RETURN_PAIRS = 5;

export interface CorrelationOptions {
  leadLag?: LeadLagOptions;
}

/**
 * Strength bucket of a correlation coefficient.
 *
 * @example
 * ```typescript
 * classifyStrength(-0.75) // 'strong'
 * classifyStrength(0.4)   // 'weak'
 * ```
 */
export function classifyStrength(correlation: number): Strength {
  const magnitude = Math.abs(correlation);
  if (magnitude > 0.7) return 'strong';
  if (magnitude > 0.4) return 'moderate';
  if (magnitude > 0.2) return 'weak';
  return 'none';
}

/**
 * Correlates the simple returns of two price series and runs lead/lag
 * detection on the same returns.
 *
 * Steps:
 * 1. Either series shorter than 10 → undefined result
 * 2. Keep the most recent min(lenA, lenB) prices of each
 * 3. Simple returns, dropping pairs with a non-finite side
 * 4. Fewer than 5 pairs → undefined result
 * 5. Pearson r and two-tailed p-value; a non-finite r reports 0 / 1
 *
 * Pure and deterministic. Never throws for data-quality reasons.
 */
export function calculateCorrelation(
  pricesA: readonly number[],
  pricesB: readonly number[],
  options: CorrelationOptions = {}
): CorrelationResult {
  if (pricesA.length < MIN_PRICES || pricesB.length < MIN_PRICES) {
    return UNDEFINED_CORRELATION;
  }

  const length = Math.min(pricesA.length, pricesB.length);
  const returns = pairedFiniteReturns(pricesA.slice(-length), pricesB.slice(-length));
  const n = returns.a.length;

  if (n < MIN_RETURN_PAIRS) {
    return UNDEFINED_CORRELATION;
  }

  const r = pearson(returns.a, returns.b);
  const correlation = isFiniteNumber(r) ? r : 0;
  const pValue = isFiniteNumber(r) ? pearsonPValue(r, n) : 1;
  const leadLag = detectLeadLag(returns.a, returns.b, options.leadLag);

  return {
    correlation,
    pValue,
    leadLag: leadLag.lag,
    leadLagCorr: leadLag.correlation,
    strength: classifyStrength(correlation),
    sampleSize: n,
  };
}
