/**
 * Dual-series bar synchronizer.
 *
 * Owns one rolling buffer per series and aligns every incoming bar to the
 * start of its UTC minute, so two independently clocked sources share a
 * common grid. Completed bars arrive three ways:
 * 1. appendBar: a finished bar from a streaming source
 * 2. ingestPartial: sub-minute samples merged until the minute closes
 * 3. backfill: historical bars loaded in bulk, no events
 */

import type { Bar, BarPair, SeriesId } from '@crosslag/contracts'
import { createSilentLogger, type Logger } from '@crosslag/logger'
import {
  RollingBuffer,
  MinuteBarAggregator,
  alignToMinute,
  DEFAULT_BUFFER_CAPACITY,
} from '@crosslag/market-data-core'
import { EventBus, type EventListener, type BarEvent, type SyncEventMap } from './events.js'

export interface DualSeriesSynchronizerOptions {
  /** Bars retained per series (default: 500) */
  capacity?: number
  logger?: Logger
}

/**
 * Synchronizer for series A and B.
 *
 * Each buffer has exactly one writer (its source's callbacks); analysis reads
 * through {@link snapshotPair}, which copies both buffers.
 *
 * Example:
 * ```typescript
 * const sync = new DualSeriesSynchronizer({ capacity: 500, logger })
 *
 * sync.on('bar', ({ series }) => scheduler.trigger(series))
 *
 * futures.onBar((bar) => sync.appendBar('A', bar))
 * crypto.onBar((bar) => sync.appendBar('B', bar))
 *
 * const { a, b } = sync.snapshotPair()
 * ```
 */
export class DualSeriesSynchronizer {
  private readonly buffers: Record<SeriesId, RollingBuffer>
  private readonly aggregators: Record<SeriesId, MinuteBarAggregator>
  private readonly events: EventBus<SyncEventMap>
  private readonly logger: Logger

  constructor(options: DualSeriesSynchronizerOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_BUFFER_CAPACITY
    this.logger = options.logger ?? createSilentLogger()
    this.events = new EventBus<SyncEventMap>(this.logger)

    this.buffers = {
      A: new RollingBuffer({ capacity, logger: this.logger.child({ series: 'A' }) }),
      B: new RollingBuffer({ capacity, logger: this.logger.child({ series: 'B' }) }),
    }
    this.aggregators = {
      A: new MinuteBarAggregator(),
      B: new MinuteBarAggregator(),
    }
  }

  /**
   * Stores a completed bar after truncating its timestamp to the minute.
   *
   * @returns true if stored; emits 'bar' on success and 'dropped' otherwise
   */
  appendBar(series: SeriesId, bar: Bar): boolean {
    return this.store(series, bar, 'stream')
  }

  /**
   * Merges a sub-minute sample into the series' pending bar. A sample from a
   * later minute completes the pending bar and appends it.
   *
   * @returns false if the sample was dropped (non-finite or stale)
   */
  ingestPartial(series: SeriesId, sample: Bar): boolean {
    const result = this.aggregators[series].add(sample)

    if (!result.accepted) {
      this.logger.debug('Dropped partial sample', { series, timestamp: sample.timestamp })
      return false
    }

    if (result.completed) {
      this.store(series, result.completed, 'aggregated')
    }
    return true
  }

  /**
   * Completes the pending partial bar of a series, if there is one.
   *
   * @returns The appended bar, or undefined if nothing was pending or it was dropped
   */
  flushPending(series: SeriesId): Bar | undefined {
    const pending = this.aggregators[series].flush()
    if (!pending || !this.store(series, pending, 'aggregated')) {
      return undefined
    }
    return this.buffers[series].last()
  }

  /**
   * Loads finalized historical bars. Does not emit events.
   *
   * @returns Number of bars accepted
   */
  backfill(series: SeriesId, bars: readonly Bar[]): number {
    const aligned = bars.map((bar) => ({ ...bar, timestamp: alignToMinute(bar.timestamp) }))
    const accepted = this.buffers[series].backfill(aligned)

    this.logger.info('Backfill loaded', {
      series,
      count: accepted,
      dropped: bars.length - accepted,
      size: this.buffers[series].size,
    })
    return accepted
  }

  /**
   * Copies of both buffers taken together.
   */
  snapshotPair(): BarPair {
    return { a: this.buffers.A.snapshot(), b: this.buffers.B.snapshot() }
  }

  /**
   * Read access to one series' buffer.
   */
  buffer(series: SeriesId): RollingBuffer {
    return this.buffers[series]
  }

  on<K extends keyof SyncEventMap>(eventType: K, listener: EventListener<SyncEventMap[K]>): () => void {
    return this.events.on(eventType, listener)
  }

  /**
   * Empties both buffers and discards pending partial bars.
   */
  clear(): void {
    for (const series of ['A', 'B'] as const) {
      this.buffers[series].clear()
      this.aggregators[series].flush()
    }
  }

  private store(series: SeriesId, bar: Bar, origin: BarEvent['origin']): boolean {
    const aligned: Bar = { ...bar, timestamp: alignToMinute(bar.timestamp) }
    const buffer = this.buffers[series]

    if (!buffer.append(aligned)) {
      this.events.emit('dropped', { series, bar: aligned })
      return false
    }

    const stored = buffer.last()
    if (stored) {
      this.events.emit('bar', { series, bar: stored, origin })
    }
    return true
  }
}
