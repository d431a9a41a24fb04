/**
 * @crosslag/correlation-kit
 *
 * Pure-function analytics for two correlated price series: return
 * correlation with significance, lead/lag detection, multi-timeframe
 * orchestration, divergence and presentation helpers.
 *
 * No I/O. Same inputs always produce the same outputs, and data-quality
 * problems produce the undefined result instead of exceptions.
 *
 * @packageDocumentation
 */

// Statistics
export {
  mean,
  populationStd,
  pearson,
  pearsonPValue,
  logGamma,
  regularizedIncompleteBeta,
} from './stats.js';

// Returns
export { simpleReturns, pairedFiniteReturns, RETURN_EPSILON } from './returns.js';
export type { PairedReturns } from './returns.js';

// Correlation and lead/lag
export { calculateCorrelation, classifyStrength, MIN_PRICES, MIN_RETURN_PAIRS } from './correlation.js';
export type { CorrelationOptions } from './correlation.js';

export {
  detectLeadLag,
  defaultMaxLag,
  DEFAULT_MIN_LAG_CORRELATION,
  DEFAULT_MIN_LAG_IMPROVEMENT,
} from './lead-lag.js';
export type { LeadLagOptions } from './lead-lag.js';

// Multi-timeframe
export { analyzeTimeframe, analyzeTimeframes } from './multi-timeframe.js';
export type { MultiTimeframeOptions } from './multi-timeframe.js';

// Divergence
export { normalizePrices, rollingDivergence, DEFAULT_DIVERGENCE_WINDOW } from './divergence.js';

// Presentation
export {
  STRENGTH_COLORS,
  MIN_BARS_FOR_DESCRIPTION,
  roundTo,
  leaderOf,
  toSnapshotEntry,
  toSnapshot,
  describeLeadLag,
} from './presentation.js';
export type { DescribeLeadLagOptions } from './presentation.js';
