/**
 * Hourly price history of both series, loaded once for dashboard clients.
 */

import { Timeframe, type Bar, type SeriesId } from '@crosslag/contracts';
import { measureAsync, type Logger } from '@crosslag/logger';
import type { BarSource } from '../sources/types.js';

const DAY_MINUTES = 1440;

export interface HourlyHistoryOptions {
  sources: Readonly<Record<SeriesId, BarSource>>;
  /** Days of hourly bars to request; 0 disables loading */
  days: number;
  logger: Logger;
}

/**
 * A failed series is logged and left empty; it never fails startup.
 */
export class HourlyHistory {
  private readonly options: HourlyHistoryOptions;
  private series: Record<SeriesId, readonly Bar[]> = { A: [], B: [] };
  private failures: Partial<Record<SeriesId, string>> = {};

  constructor(options: HourlyHistoryOptions) {
    this.options = options;
  }

  async load(): Promise<void> {
    if (this.options.days <= 0) {
      return;
    }

    await Promise.all([this.loadSeries('A'), this.loadSeries('B')]);
  }

  bars(series: SeriesId): readonly Bar[] {
    return this.series[series];
  }

  errors(): Partial<Record<SeriesId, string>> {
    return { ...this.failures };
  }

  private async loadSeries(series: SeriesId): Promise<void> {
    const source = this.options.sources[series];
    const minutes = this.options.days * DAY_MINUTES;

    try {
      const { result, duration_ms } = await measureAsync(() =>
        source.fetchHistorical({ minutes, timeframe: Timeframe.H1 })
      );
      this.series[series] = result;
      delete this.failures[series];
      this.options.logger.info('Hourly history loaded', {
        series,
        source: source.name,
        bars: result.length,
        duration_ms,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.failures[series] = message;
      this.options.logger.warn('Hourly history unavailable', { series, source: source.name, error: message });
    }
  }
}
