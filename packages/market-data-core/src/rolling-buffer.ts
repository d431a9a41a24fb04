/**
 * Bounded, chronologically ordered bar window for one series.
 *
 * Holds the most recent `capacity` bars. Appends past capacity evict the
 * oldest bar (FIFO). Bars failing the finite-value check never enter.
 *
 * The window is keyed by minute: an append grows it by one only when the bar
 * is newer than the newest stored bar. A bar for the newest minute replaces
 * that bar (the size is unchanged) and an older bar is dropped.
 */

import type { Bar, BarTable } from '@crosslag/contracts';
import { createSilentLogger, type Logger } from '@crosslag/logger';
import { isValidBar } from './validation.js';

/**
 * Default number of bars kept per series.
 */
export const DEFAULT_BUFFER_CAPACITY = 500;

export interface RollingBufferOptions {
  /** Maximum bars retained (default: 500) */
  capacity?: number;
  /** Receives debug entries for dropped bars */
  logger?: Logger;
}

/**
 * Rolling window of bars.
 *
 * Single writer: one producer appends, any number of readers take snapshots.
 * Stored bars are frozen copies, so a snapshot stays valid however the buffer
 * changes afterwards.
 *
 * Example:
 * ```typescript
 * const buffer = new RollingBuffer({ capacity: 500 });
 * buffer.append(bar);        // true
 * buffer.append(nanBar);     // false, logged at debug
 * const bars = buffer.snapshot();
 * const { close } = buffer.asTable();
 * ```
 */
export class RollingBuffer {
  private bars: Bar[] = [];
  private readonly maxSize: number;
  private readonly logger: Logger;

  constructor(options: RollingBufferOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_BUFFER_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.maxSize = capacity;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Appends a bar, evicting the oldest one past capacity.
   *
   * @returns true if the bar was stored, false if it was dropped
   *
   * Dropped bars:
   * - any non-finite field
   * - timestamp older than the newest stored bar (streams are append-only)
   *
   * A bar with the same timestamp as the newest one replaces it.
   */
  append(bar: Bar): boolean {
    if (!isValidBar(bar)) {
      this.logger.debug('Dropped invalid bar', { bar });
      return false;
    }

    const newest = this.bars[this.bars.length - 1];
    if (newest && bar.timestamp < newest.timestamp) {
      this.logger.debug('Dropped out-of-order bar', {
        timestamp: bar.timestamp,
        newest: newest.timestamp,
      });
      return false;
    }

    const stored = Object.freeze({ ...bar });
    if (newest && bar.timestamp === newest.timestamp) {
      this.bars[this.bars.length - 1] = stored;
      return true;
    }

    this.bars.push(stored);
    if (this.bars.length > this.maxSize) {
      this.bars.splice(0, this.bars.length - this.maxSize);
    }
    return true;
  }

  /**
   * Bulk-loads historical bars.
   *
   * Invalid bars are dropped. Remaining bars are merged with the current
   * contents, sorted by timestamp and de-duplicated (bars already in the
   * buffer win over historical ones), then trimmed to the newest `capacity`.
   *
   * @returns Number of historical bars accepted
   */
  backfill(bars: readonly Bar[]): number {
    const byTimestamp = new Map<number, Bar>();
    let accepted = 0;

    for (const bar of bars) {
      if (!isValidBar(bar)) {
        this.logger.debug('Dropped invalid backfill bar', { bar });
        continue;
      }
      byTimestamp.set(bar.timestamp, Object.freeze({ ...bar }));
      accepted++;
    }

    for (const bar of this.bars) {
      byTimestamp.set(bar.timestamp, bar);
    }

    const merged = Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
    this.bars = merged.slice(-this.maxSize);
    return accepted;
  }

  /**
   * Frozen copy of the current contents, oldest first.
   */
  snapshot(): readonly Bar[] {
    return Object.freeze(this.bars.slice());
  }

  /**
   * Columnar projection of the current contents.
   */
  asTable(): BarTable {
    return {
      timestamp: this.bars.map((bar) => bar.timestamp),
      open: this.bars.map((bar) => bar.open),
      high: this.bars.map((bar) => bar.high),
      low: this.bars.map((bar) => bar.low),
      close: this.bars.map((bar) => bar.close),
      volume: this.bars.map((bar) => bar.volume),
    };
  }

  /**
   * Newest bar, if any.
   */
  last(): Bar | undefined {
    return this.bars[this.bars.length - 1];
  }

  get size(): number {
    return this.bars.length;
  }

  get capacity(): number {
    return this.maxSize;
  }

  clear(): void {
    this.bars = [];
  }
}
