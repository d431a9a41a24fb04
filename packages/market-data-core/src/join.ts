/**
 * Timestamp join of two bar series.
 */

import type { Bar } from '@crosslag/contracts';

/**
 * Closing prices of two series on their shared timestamps. Built fresh for
 * every analysis cycle and never mutated.
 */
export interface AlignedPair {
  readonly timestamp: readonly number[];
  readonly closeA: readonly number[];
  readonly closeB: readonly number[];
}

/**
 * Inner-joins two series on exact timestamp equality.
 *
 * Only timestamps present in both series survive, so hours where one market
 * is closed drop out of the pair. Output follows the order of `a`.
 *
 * @example
 * ```typescript
 * // a at 14:00, 14:01, 14:02; b at 14:01, 14:02, 14:03
 * joinOnTimestamp(a, b).timestamp; // [14:01, 14:02]
 * ```
 */
export function joinOnTimestamp(a: readonly Bar[], b: readonly Bar[]): AlignedPair {
  const closesB = new Map<number, number>();
  for (const bar of b) {
    closesB.set(bar.timestamp, bar.close);
  }

  const timestamp: number[] = [];
  const closeA: number[] = [];
  const closeB: number[] = [];

  for (const bar of a) {
    const other = closesB.get(bar.timestamp);
    if (other !== undefined) {
      timestamp.push(bar.timestamp);
      closeA.push(bar.close);
      closeB.push(other);
    }
  }

  return Object.freeze({ timestamp, closeA, closeB });
}
