/**
 * Latest multi-timeframe result and its subscribers
 */

import type { CorrelationSnapshot, MultiTimeframeResult, SeriesLabels } from '@crosslag/contracts';
import { EventBus } from '@crosslag/bar-sync';
import { toSnapshot } from '@crosslag/correlation-kit';
import type { Logger } from '@crosslag/logger';

/**
 * One completed analysis cycle.
 */
export interface SnapshotUpdate {
  /** 1-based cycle counter */
  cycle: number;
  /** Completion time, epoch ms */
  timestamp: number;
  result: MultiTimeframeResult;
  /** Wire form of `result` */
  snapshot: CorrelationSnapshot;
}

interface SnapshotEventMap {
  update: SnapshotUpdate;
}

export class SnapshotStore {
  private current: SnapshotUpdate | undefined;
  private cycles = 0;
  private readonly events: EventBus<SnapshotEventMap>;

  constructor(
    private readonly labels: SeriesLabels,
    logger?: Logger
  ) {
    this.events = new EventBus<SnapshotEventMap>(logger);
  }

  /**
   * Replaces the latest result and notifies subscribers once.
   */
  publish(result: MultiTimeframeResult, timestamp: number = Date.now()): SnapshotUpdate {
    this.cycles++;
    const update: SnapshotUpdate = {
      cycle: this.cycles,
      timestamp,
      result,
      snapshot: toSnapshot(result, this.labels),
    };

    this.current = update;
    this.events.emit('update', update);
    return update;
  }

  /**
   * Plain mapping of timeframe label to wire entry; empty before the first
   * cycle. Each call returns fresh entry objects.
   */
  latest(): CorrelationSnapshot {
    if (!this.current) {
      return {};
    }
    return Object.fromEntries(
      Object.entries(this.current.snapshot).map(([timeframe, entry]) => [timeframe, { ...entry }])
    );
  }

  latestUpdate(): SnapshotUpdate | undefined {
    return this.current;
  }

  subscribe(listener: (update: SnapshotUpdate) => void): () => void {
    return this.events.on('update', listener);
  }
}
