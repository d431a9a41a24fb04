/**
 * @fileoverview Correlation and lead/lag result types.
 *
 * @module @crosslag/contracts/correlation
 */

/**
 * Strength bucket of |correlation|: > 0.7 strong, > 0.4 moderate,
 * > 0.2 weak, otherwise none.
 */
export type Strength = 'strong' | 'moderate' | 'weak' | 'none';

/**
 * Output of the lead/lag detector.
 *
 * `lag` is in bars of the analyzed timeframe. Positive means series A leads,
 * negative means series B leads, zero means no significant lead.
 */
export interface LeadLagResult {
  readonly lag: number;

  /** Correlation at `lag`; the synchronous correlation when lag is 0 */
  readonly correlation: number;
}

/**
 * Correlation statistics for one timeframe.
 *
 * @invariant -1 <= correlation <= 1
 * @invariant 0 <= pValue <= 1
 */
export interface CorrelationResult {
  /** Pearson correlation of simple returns */
  readonly correlation: number;

  /** Two-tailed p-value of `correlation` */
  readonly pValue: number;

  /** Lead/lag in bars (see {@link LeadLagResult}) */
  readonly leadLag: number;

  /** Correlation at the reported lag */
  readonly leadLagCorr: number;

  readonly strength: Strength;

  /**
   * Number of return pairs the statistics were computed from. Zero marks
   * the "undefined" result, which is otherwise indistinguishable from a
   * computed result with no correlation.
   */
  readonly sampleSize: number;
}

/**
 * The "undefined" result returned for insufficient or degenerate data.
 */
export const UNDEFINED_CORRELATION: CorrelationResult = Object.freeze({
  correlation: 0,
  pValue: 1,
  leadLag: 0,
  leadLagCorr: 0,
  strength: 'none',
  sampleSize: 0,
});

/**
 * One analysis cycle's results, keyed by timeframe label ('1m', '5m', ...).
 */
export type MultiTimeframeResult = Readonly<Record<string, CorrelationResult>>;

/**
 * Wire form of a {@link CorrelationResult}, as published to viewers.
 */
export interface CorrelationSnapshotEntry {
  correlation: number;
  p_value: number;
  lead_lag: number;
  lead_lag_corr: number;
  strength: Strength;
  /** "SYNC", or the display label of the leading series */
  leader: string;
  /** Hex color of the strength bucket */
  color: string;
  sample_size: number;
}

/**
 * Wire form of a {@link MultiTimeframeResult}.
 */
export type CorrelationSnapshot = Record<string, CorrelationSnapshotEntry>;
