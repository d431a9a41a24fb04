/**
 * Wire and display forms of correlation results.
 */

import type {
  CorrelationResult,
  CorrelationSnapshot,
  CorrelationSnapshotEntry,
  MultiTimeframeResult,
  SeriesLabels,
  Strength,
} from '@crosslag/contracts';

export const STRENGTH_COLORS: Readonly<Record<Strength, string>> = {
  strong: '#00C853',
  moderate: '#FFD600',
  weak: '#FF9100',
  none: '#FF1744',
};

/** Fewer bars than this and the lead/lag text reports that data is still arriving. */
export const MIN_BARS_FOR_DESCRIPTION = 15;

/**
 * Rounds half away from zero to `decimals` places. Never returns -0.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * "SYNC" when |leadLag| < 1, otherwise the label of the leading series.
 */
export function leaderOf(leadLag: number, labels: SeriesLabels): string {
  if (Math.abs(leadLag) < 1) {
    return 'SYNC';
  }
  return leadLag > 0 ? labels.a : labels.b;
}

/**
 * Wire form of one result: snake_case keys, correlation and lead/lag
 * correlation rounded to 3 places, p-value to 4.
 */
export function toSnapshotEntry(
  result: CorrelationResult,
  labels: SeriesLabels
): CorrelationSnapshotEntry {
  return {
    correlation: roundTo(result.correlation, 3),
    p_value: roundTo(result.pValue, 4),
    lead_lag: result.leadLag,
    lead_lag_corr: roundTo(result.leadLagCorr, 3),
    strength: result.strength,
    leader: leaderOf(result.leadLag, labels),
    color: STRENGTH_COLORS[result.strength],
    sample_size: result.sampleSize,
  };
}

export function toSnapshot(result: MultiTimeframeResult, labels: SeriesLabels): CorrelationSnapshot {
  const snapshot: CorrelationSnapshot = {};
  for (const [timeframe, entry] of Object.entries(result)) {
    snapshot[timeframe] = toSnapshotEntry(entry, labels);
  }
  return snapshot;
}

export interface DescribeLeadLagOptions {
  /** Bars available in the shorter series; below 15 the text says data is still arriving */
  barCount: number;

  /** Minutes per lag step (default: 1) */
  minutesPerBar?: number;
}

/**
 * One-line description of a lead/lag result.
 *
 * @example
 * ```typescript
 * describeLeadLag(result, { a: 'ES', b: 'BTC' }, { barCount: 240 });
 * // "ES leads by 2 min (corr: 0.43)"
 * ```
 */
export function describeLeadLag(
  result: CorrelationResult,
  labels: SeriesLabels,
  options: DescribeLeadLagOptions
): string {
  if (options.barCount < MIN_BARS_FOR_DESCRIPTION) {
    return 'Collecting data...';
  }
  if (result.leadLag === 0) {
    return 'Assets moving in sync';
  }

  const minutes = Math.abs(result.leadLag) * (options.minutesPerBar ?? 1);
  const leader = result.leadLag > 0 ? labels.a : labels.b;
  return `${leader} leads by ${minutes} min (corr: ${result.leadLagCorr.toFixed(2)})`;
}
