/**
 * Timestamp alignment utilities.
 *
 * Bucket widths are whole minutes. All functions work on Unix epoch
 * milliseconds in UTC; sources convert exchange-local times before calling.
 */

import { MINUTE_MS, timeframeToMinutes, type Timeframe } from '@crosslag/contracts';

/**
 * Converts a bucket width in minutes, or a Timeframe, to milliseconds.
 *
 * @example
 * ```typescript
 * toMillis(5)              // 300000
 * toMillis(Timeframe.H1)   // 3600000
 * ```
 */
export function toMillis(width: number | Timeframe): number {
  const minutes = typeof width === 'number' ? width : timeframeToMinutes(width);
  return minutes * MINUTE_MS;
}

/**
 * Aligns a timestamp to a bucket boundary.
 *
 * @param timestamp - Unix epoch milliseconds (UTC)
 * @param widthMinutes - Bucket width in minutes
 * @param direction - "floor" (round down) or "ceil" (round up)
 *
 * @example
 * ```typescript
 * const ts = Date.UTC(2025, 0, 15, 14, 42, 59);
 * alignTimestamp(ts, 5, 'floor'); // 14:40:00
 * alignTimestamp(ts, 5, 'ceil');  // 14:45:00
 * alignTimestamp(ts, 60, 'floor'); // 14:00:00
 * ```
 *
 * Edge cases:
 * - Already aligned timestamps are returned unchanged in both directions
 * - Timestamps before the epoch floor towards negative infinity
 */
export function alignTimestamp(
  timestamp: number,
  widthMinutes: number,
  direction: 'floor' | 'ceil' = 'floor'
): number {
  const widthMs = toMillis(widthMinutes);
  const floored = Math.floor(timestamp / widthMs) * widthMs;

  if (direction === 'ceil' && floored !== timestamp) {
    return floored + widthMs;
  }
  return floored;
}

/**
 * Truncates a timestamp to the start of its UTC minute.
 *
 * @example
 * ```typescript
 * alignToMinute(Date.UTC(2025, 0, 15, 14, 30, 42, 120)); // 14:30:00.000
 * ```
 */
export function alignToMinute(timestamp: number): number {
  return alignTimestamp(timestamp, 1, 'floor');
}

/**
 * True if the timestamp falls exactly on a bucket boundary.
 */
export function isAligned(timestamp: number, widthMinutes: number): boolean {
  return timestamp % toMillis(widthMinutes) === 0;
}
