/**
 * Bar resampling.
 *
 * Groups 1-minute bars into W-minute buckets with standard OHLCV rules:
 * - Open = first bar's open
 * - High = max of all highs
 * - Low = min of all lows
 * - Close = last bar's close
 * - Volume = sum of all volumes
 *
 * Bucket boundaries are `floor(timestamp / W) * W` in UTC, so 5-minute buckets
 * start at :00, :05, :10 and hourly buckets on the hour.
 */

import type { Bar } from '@crosslag/contracts';
import { alignTimestamp } from './timeframe.js';

/**
 * Merges an ordered, non-empty group of bars into one bar stamped `timestamp`.
 */
export function mergeBars(group: readonly Bar[], timestamp: number): Bar | undefined {
  const first = group[0];
  const last = group[group.length - 1];
  if (!first || !last) {
    return undefined;
  }

  let high = first.high;
  let low = first.low;
  let volume = 0;
  for (const bar of group) {
    high = Math.max(high, bar.high);
    low = Math.min(low, bar.low);
    volume += bar.volume;
  }

  return { timestamp, open: first.open, high, low, close: last.close, volume };
}

/**
 * Resamples bars into `widthMinutes`-minute buckets.
 *
 * @param bars - Bars sorted ascending by timestamp
 * @param widthMinutes - Bucket width; 1 (or less) returns the input unchanged
 * @returns One bar per non-empty bucket, ascending
 *
 * @example
 * ```typescript
 * // 14:00, 14:01, 14:02, 14:03 at width 2
 * resampleBars(bars, 2);
 * // [bar@14:00 (14:00+14:01), bar@14:02 (14:02+14:03)]
 * ```
 *
 * Edge cases:
 * - Empty input: returns empty array
 * - Buckets with no bars are never emitted (no forward fill)
 * - A partially filled bucket is still emitted; the live edge of the series
 *   is usually one
 *
 * Complexity: O(n) for sorted input
 */
export function resampleBars(bars: readonly Bar[], widthMinutes: number): readonly Bar[] {
  if (widthMinutes <= 1 || bars.length === 0) {
    return bars;
  }

  const groups = new Map<number, Bar[]>();
  for (const bar of bars) {
    const boundary = alignTimestamp(bar.timestamp, widthMinutes, 'floor');
    const group = groups.get(boundary);
    if (group) {
      group.push(bar);
    } else {
      groups.set(boundary, [bar]);
    }
  }

  const boundaries = Array.from(groups.keys()).sort((a, b) => a - b);
  const resampled: Bar[] = [];

  for (const boundary of boundaries) {
    const merged = mergeBars(groups.get(boundary) ?? [], boundary);
    if (merged) {
      resampled.push(merged);
    }
  }

  return resampled;
}
