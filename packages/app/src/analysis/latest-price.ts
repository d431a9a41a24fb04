/**
 * Latest traded price per series, for display only. Never feeds analysis.
 */

import type { SeriesId, Tick } from '@crosslag/contracts';
import { EventBus } from '@crosslag/bar-sync';
import type { Logger } from '@crosslag/logger';

export interface PriceUpdate {
  series: SeriesId;
  price: number;
  timestamp: number;
}

interface PriceEventMap {
  price: PriceUpdate;
}

export interface LatestPriceTrackerOptions {
  /** Minimum wall-clock gap between published updates of one series */
  throttleMs: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Throttled latest-price observable.
 *
 * A tick is published when its price is finite, differs from the last
 * published price of its series, and at least `throttleMs` have passed
 * since that series last published. Other ticks are discarded.
 */
export class LatestPriceTracker {
  private readonly latestBySeries = new Map<SeriesId, PriceUpdate>();
  private readonly publishedAt = new Map<SeriesId, number>();
  private readonly events: EventBus<PriceEventMap>;
  private readonly throttleMs: number;
  private readonly now: () => number;

  constructor(options: LatestPriceTrackerOptions) {
    this.throttleMs = options.throttleMs;
    this.now = options.now ?? Date.now;
    this.events = new EventBus<PriceEventMap>(options.logger);
  }

  /**
   * @returns true if the tick was published
   */
  update(series: SeriesId, tick: Tick): boolean {
    if (!Number.isFinite(tick.price)) {
      return false;
    }

    if (this.latestBySeries.get(series)?.price === tick.price) {
      return false;
    }

    const now = this.now();
    const last = this.publishedAt.get(series);
    if (last !== undefined && now - last < this.throttleMs) {
      return false;
    }

    const update: PriceUpdate = { series, price: tick.price, timestamp: tick.timestamp };
    this.latestBySeries.set(series, update);
    this.publishedAt.set(series, now);
    this.events.emit('price', update);
    return true;
  }

  latest(series: SeriesId): PriceUpdate | undefined {
    return this.latestBySeries.get(series);
  }

  subscribe(listener: (update: PriceUpdate) => void): () => void {
    return this.events.on('price', listener);
  }
}
