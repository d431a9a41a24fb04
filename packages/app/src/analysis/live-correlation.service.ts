/**
 * Live correlation loop: sources -> synchronizer -> multi-timeframe
 * analysis -> snapshot store.
 */

import { MINUTE_MS, type MultiTimeframeResult, type SeriesId, type SeriesLabels } from '@crosslag/contracts';
import type { DualSeriesSynchronizer } from '@crosslag/bar-sync';
import { analyzeTimeframes, type MultiTimeframeOptions } from '@crosslag/correlation-kit';
import { measureAsync, startTimer, withLogContextSync, type Logger } from '@crosslag/logger';
import type { Service, HealthStatus } from '../container/types.js';
import type { BarSource } from '../sources/types.js';
import type { HourlyHistory } from './hourly-history.js';
import type { LatestPriceTracker } from './latest-price.js';
import type { SnapshotStore } from './snapshot-store.js';

export type CycleTrigger = 'backfill' | 'bar' | 'gap' | 'timer' | 'manual';

export interface LiveCorrelationServiceConfig {
  sources: Readonly<Record<SeriesId, BarSource>>;
  labels: SeriesLabels;
  synchronizer: DualSeriesSynchronizer;
  store: SnapshotStore;
  prices: LatestPriceTracker;
  logger: Logger;
  /** Periodic analysis interval */
  intervalMs: number;
  /** Minutes of history loaded per series at startup; 0 skips backfill */
  backfillMinutes: Readonly<Record<SeriesId, number>>;
  analysis?: Omit<MultiTimeframeOptions, 'logger'>;
  /** Loaded alongside the backfill */
  history?: HourlyHistory;
}

const SERIES: readonly SeriesId[] = ['A', 'B'];

/**
 * Runs an analysis cycle after every completed bar and every `intervalMs`.
 *
 * Backfill failures are logged and the service continues on live data
 * alone. A stored bar more than one minute after its predecessor (a
 * reconnect, a missed poll) triggers a fetch of the missing minutes. Each cycle runs inside its own log context, so every entry it
 * writes carries the same `cycle_id`.
 */
export class LiveCorrelationService implements Service {
  readonly name = 'LiveCorrelationService';
  readonly dependencies: readonly string[] = [];

  private readonly config: LiveCorrelationServiceConfig;
  private readonly logger: Logger;
  private unsubscribers: Array<() => void> = [];
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private cycles = 0;
  private failedCycles = 0;
  private lastCycleAt: number | undefined;
  private backfilled: Record<SeriesId, number> = { A: 0, B: 0 };
  private backfillErrors: Partial<Record<SeriesId, string>> = {};
  private gapFills = 0;
  private gapFillErrors = 0;
  private readonly pendingGapFills = new Set<Promise<void>>();

  constructor(config: LiveCorrelationServiceConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  async initialize(): Promise<void> {
    if (this.running) {
      return;
    }

    const { synchronizer, prices, sources } = this.config;

    for (const series of SERIES) {
      const source = sources[series];
      this.unsubscribers.push(
        source.onBar((bar) => {
          this.watchForGap(series, () => synchronizer.appendBar(series, bar));
        }),
        source.onTick((tick) => {
          prices.update(series, tick);
        })
      );
      if (source.onPartial) {
        this.unsubscribers.push(
          source.onPartial((sample) => {
            this.watchForGap(series, () => synchronizer.ingestPartial(series, sample));
          })
        );
      }
    }

    this.unsubscribers.push(synchronizer.on('bar', () => this.runCycle('bar')));

    await Promise.all([...SERIES.map((series) => this.backfill(series)), this.config.history?.load()]);
    this.runCycle('backfill');

    for (const series of SERIES) {
      await sources[series].start();
    }

    this.timer = setInterval(() => this.runCycle('timer'), this.config.intervalMs);
    this.running = true;

    this.logger.info('Live correlation started', {
      series: this.config.labels,
      interval_ms: this.config.intervalMs,
      backfilled: this.backfilled,
    });
  }

  async shutdown(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    for (const series of SERIES) {
      await this.config.sources[series].stop();
    }

    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    await Promise.all(this.pendingGapFills);
    this.running = false;

    this.logger.info('Live correlation stopped', { cycles: this.cycles });
  }

  healthCheck(): HealthStatus {
    const { synchronizer } = this.config;
    const sizes = {
      A: synchronizer.buffer('A').size,
      B: synchronizer.buffer('B').size,
    };

    return {
      healthy: this.running,
      message: this.running ? 'Live correlation is running' : 'Live correlation is stopped',
      details: {
        cycles: this.cycles,
        failedCycles: this.failedCycles,
        lastCycleAt: this.lastCycleAt === undefined ? null : new Date(this.lastCycleAt).toISOString(),
        bufferSizes: sizes,
        backfilled: this.backfilled,
        backfillErrors: this.backfillErrors,
        gapFills: this.gapFills,
        gapFillErrors: this.gapFillErrors,
        ...(this.config.history
          ? {
              history: {
                A: this.config.history.bars('A').length,
                B: this.config.history.bars('B').length,
              },
              historyErrors: this.config.history.errors(),
            }
          : {}),
      },
    };
  }

  /**
   * Analyze the current buffers and publish the result.
   *
   * @returns The published result, or undefined if the cycle failed
   */
  runCycle(trigger: CycleTrigger): MultiTimeframeResult | undefined {
    return withLogContextSync(
      () => {
        const timer = startTimer();
        try {
          const { a, b } = this.config.synchronizer.snapshotPair();
          const result = analyzeTimeframes(a, b, { ...this.config.analysis, logger: this.logger });
          this.config.store.publish(result);

          this.cycles++;
          this.lastCycleAt = Date.now();
          this.logger.debug('Analysis cycle complete', {
            trigger,
            bars_a: a.length,
            bars_b: b.length,
            duration_ms: timer.stop(),
          });
          return result;
        } catch (error) {
          this.failedCycles++;
          this.logger.error('Analysis cycle failed', {
            trigger,
            error: error instanceof Error ? error.message : String(error),
          });
          return undefined;
        }
      },
      undefined,
      { trigger }
    );
  }

  private async backfill(series: SeriesId): Promise<void> {
    const minutes = this.config.backfillMinutes[series];
    if (minutes <= 0) {
      return;
    }

    const source = this.config.sources[series];
    try {
      const { result: bars, duration_ms } = await measureAsync(() => source.fetchHistorical({ minutes }));
      this.backfilled[series] = this.config.synchronizer.backfill(series, bars);
      this.logger.info('Backfill complete', {
        series,
        source: source.name,
        requested: minutes,
        accepted: this.backfilled[series],
        duration_ms,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.backfillErrors[series] = message;
      this.logger.warn('Backfill failed, continuing with live data', {
        series,
        source: source.name,
        error: message,
      });
    }
  }

  /**
   * Runs `store` and starts a gap fill when the newest bar it stored is more
   * than a minute past the previous newest bar.
   */
  private watchForGap(series: SeriesId, store: () => void): void {
    const buffer = this.config.synchronizer.buffer(series);
    const before = buffer.last();
    store();
    const after = buffer.last();

    if (!before || !after || after.timestamp - before.timestamp <= MINUTE_MS) {
      return;
    }

    const fill = this.fillGap(series, before.timestamp, after.timestamp);
    this.pendingGapFills.add(fill);
    void fill.finally(() => this.pendingGapFills.delete(fill));
  }

  /**
   * Fetches the minutes strictly between `from` and `to` and merges them in.
   * Failures are logged; the gap stays open.
   */
  private async fillGap(series: SeriesId, from: number, to: number): Promise<void> {
    const source = this.config.sources[series];
    const missing = Math.round((to - from) / MINUTE_MS) - 1;
    const minutes = Math.min(missing, this.config.synchronizer.buffer(series).capacity);

    try {
      const bars = await source.fetchHistorical({ minutes, endTime: to });
      const accepted = this.config.synchronizer.backfill(series, bars);
      this.gapFills++;
      this.logger.info('Gap filled', {
        series,
        source: source.name,
        from: new Date(from).toISOString(),
        missing,
        accepted,
      });
      this.runCycle('gap');
    } catch (error) {
      this.gapFillErrors++;
      this.logger.warn('Gap fill failed', {
        series,
        source: source.name,
        missing,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
