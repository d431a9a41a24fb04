/**
 * Partial-bar aggregation.
 *
 * Sources that deliver sub-minute samples (5-second bars, polled quotes,
 * trades) push them here. Samples in the same UTC minute merge into one
 * pending bar; the first sample of a later minute completes it.
 */

import type { Bar } from '@crosslag/contracts';
import { alignToMinute } from './timeframe.js';
import { isValidBar } from './validation.js';

/**
 * Outcome of {@link MinuteBarAggregator.add}.
 */
export interface AggregateResult {
  /** The bar completed by this sample, if it opened a new minute */
  completed?: Bar;

  /** False when the sample was dropped (non-finite or older than pending) */
  accepted: boolean;
}

/**
 * Merges samples into 1-minute bars.
 *
 * Merge rules within a minute:
 * - open: first sample's open
 * - high/low: running max/min
 * - close: latest sample's close
 * - volume: accumulated
 *
 * Example:
 * ```typescript
 * const agg = new MinuteBarAggregator();
 * agg.add(sampleAt('14:30:05'));  // { accepted: true }
 * agg.add(sampleAt('14:30:10'));  // { accepted: true }
 * agg.add(sampleAt('14:31:00'));  // { accepted: true, completed: bar@14:30 }
 * ```
 */
export class MinuteBarAggregator {
  private current: Bar | null = null;

  add(sample: Bar): AggregateResult {
    if (!isValidBar(sample)) {
      return { accepted: false };
    }

    const minute = alignToMinute(sample.timestamp);
    const pending = this.current;

    if (pending === null) {
      this.current = { ...sample, timestamp: minute };
      return { accepted: true };
    }

    if (minute < pending.timestamp) {
      return { accepted: false };
    }

    if (minute > pending.timestamp) {
      this.current = { ...sample, timestamp: minute };
      return { accepted: true, completed: pending };
    }

    this.current = {
      timestamp: minute,
      open: pending.open,
      high: Math.max(pending.high, sample.high),
      low: Math.min(pending.low, sample.low),
      close: sample.close,
      volume: pending.volume + sample.volume,
    };
    return { accepted: true };
  }

  /**
   * Completes and returns the pending bar, if any.
   */
  flush(): Bar | undefined {
    const pending = this.current;
    this.current = null;
    return pending ?? undefined;
  }

  /**
   * The bar currently being built, without completing it.
   */
  pending(): Bar | undefined {
    return this.current ?? undefined;
  }
}
