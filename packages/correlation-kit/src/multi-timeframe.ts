/**
 * Multi-timeframe correlation orchestration.
 */

import {
  DEFAULT_TIMEFRAMES,
  UNDEFINED_CORRELATION,
  timeframeToMinutes,
  type Bar,
  type CorrelationResult,
  type MultiTimeframeResult,
  type Timeframe,
} from '@crosslag/contracts';
import { createSilentLogger, type Logger } from '@crosslag/logger';
import { joinOnTimestamp, resampleBars } from '@crosslag/market-data-core';
import { calculateCorrelation, MIN_PRICES, type CorrelationOptions } from './correlation.js';

export interface MultiTimeframeOptions extends CorrelationOptions {
  /** Timeframes to analyze, in output order (default: 1m, 5m, 15m, 1h) */
  timeframes?: readonly Timeframe[];

  /** Receives a warning for every timeframe that failed */
  logger?: Logger;
}

/**
 * Correlation of two bar series at one timeframe: resample both, join on
 * bucket timestamp, correlate the joined closes.
 */
export function analyzeTimeframe(
  barsA: readonly Bar[],
  barsB: readonly Bar[],
  timeframe: Timeframe,
  options: CorrelationOptions = {}
): CorrelationResult {
  const width = timeframeToMinutes(timeframe);
  const pair = joinOnTimestamp(resampleBars(barsA, width), resampleBars(barsB, width));

  if (pair.timestamp.length < MIN_PRICES) {
    return UNDEFINED_CORRELATION;
  }

  return calculateCorrelation(pair.closeA, pair.closeB, options);
}

/**
 * Runs {@link analyzeTimeframe} for every configured timeframe.
 *
 * A timeframe that throws is logged and reported as the undefined result;
 * the other timeframes are unaffected. The returned mapping is frozen and
 * complete: it has an entry for every requested timeframe.
 *
 * @example
 * ```typescript
 * const { a, b } = synchronizer.snapshotPair();
 * const result = analyzeTimeframes(a, b, { logger });
 * result['5m'].correlation;
 * ```
 */
export function analyzeTimeframes(
  barsA: readonly Bar[],
  barsB: readonly Bar[],
  options: MultiTimeframeOptions = {}
): MultiTimeframeResult {
  const { timeframes = DEFAULT_TIMEFRAMES, logger = createSilentLogger(), ...correlation } = options;
  const results: Record<string, CorrelationResult> = {};

  for (const timeframe of timeframes) {
    try {
      results[timeframe] = analyzeTimeframe(barsA, barsB, timeframe, correlation);
    } catch (error) {
      logger.warn('Timeframe analysis failed', {
        timeframe,
        error: error instanceof Error ? error.message : String(error),
      });
      results[timeframe] = UNDEFINED_CORRELATION;
    }
  }

  return Object.freeze(results);
}
