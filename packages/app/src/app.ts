/**
 * Application wiring: builds every service from configuration.
 */

import type { SeriesId, SeriesLabels } from '@crosslag/contracts';
import { DualSeriesSynchronizer } from '@crosslag/bar-sync';
import type { Logger } from '@crosslag/logger';
import type { Config } from './config/index.js';
import { ServiceRegistry } from './container/index.js';
import { HourlyHistory } from './analysis/hourly-history.js';
import { LatestPriceTracker } from './analysis/latest-price.js';
import { SnapshotStore } from './analysis/snapshot-store.js';
import { LiveCorrelationService } from './analysis/live-correlation.service.js';
import { HttpServer } from './server/http-server.js';
import { BinanceSource } from './sources/binance-source.js';
import { YahooFuturesSource } from './sources/yahoo-futures-source.js';
import { FixtureSource } from './sources/fixture-source.js';
import type { BarSource } from './sources/types.js';

/** Dry runs replay one synthetic bar per second. */
const DRY_RUN_BAR_INTERVAL_MS = 1000;

export interface Application {
  registry: ServiceRegistry;
  live: LiveCorrelationService;
  server?: HttpServer;
  synchronizer: DualSeriesSynchronizer;
  store: SnapshotStore;
  prices: LatestPriceTracker;
  history: HourlyHistory;
  labels: SeriesLabels;
}

export interface CreateApplicationOptions {
  /** Replaces the configured sources */
  sources?: Readonly<Record<SeriesId, BarSource>>;
}

/**
 * Live sources, or synthetic ones in dry-run mode. The synthetic crypto
 * series follows the futures series by two bars and arrives as sub-minute
 * samples.
 */
export function createSources(config: Config, logger: Logger): Record<SeriesId, BarSource> {
  const { futures, crypto } = config.sources;

  if (config.app.dryRun) {
    const a = new FixtureSource({
      name: futures.symbol,
      seed: 1,
      startPrice: 5000,
      intervalMs: DRY_RUN_BAR_INTERVAL_MS,
      logger: logger.child({ component: 'fixture-source', series: futures.symbol }),
    });
    const b = new FixtureSource({
      name: crypto.label,
      seed: 2,
      startPrice: 60000,
      volatility: 0.002,
      intervalMs: DRY_RUN_BAR_INTERVAL_MS,
      samplesPerBar: 4,
      follows: { source: a, lagBars: 2 },
      logger: logger.child({ component: 'fixture-source', series: crypto.label }),
    });
    return { A: a, B: b };
  }

  return {
    A: new YahooFuturesSource({
      symbol: futures.yahooSymbol,
      contractRoot: futures.symbol,
      pollSeconds: futures.pollSeconds,
      baseUrl: futures.baseUrl,
      logger: logger.child({ component: 'yahoo-source', series: futures.symbol }),
    }),
    B: new BinanceSource({
      symbol: crypto.symbol,
      restUrl: crypto.restUrl,
      wsUrl: crypto.wsUrl,
      logger: logger.child({ component: 'binance-source', series: crypto.label }),
    }),
  };
}

/**
 * Builds and registers all services. Nothing is started until
 * `registry.initializeAll()`.
 */
export function createApplication(
  config: Config,
  logger: Logger,
  options: CreateApplicationOptions = {}
): Application {
  const labels: SeriesLabels = { a: config.sources.futures.symbol, b: config.sources.crypto.label };
  const sources = options.sources ?? createSources(config, logger);

  const synchronizer = new DualSeriesSynchronizer({
    capacity: config.analysis.bufferCapacity,
    logger: logger.child({ component: 'synchronizer' }),
  });
  const store = new SnapshotStore(labels, logger.child({ component: 'snapshot-store' }));
  const prices = new LatestPriceTracker({
    throttleMs: config.ticks.throttleMs,
    logger: logger.child({ component: 'latest-price' }),
  });

  const history = new HourlyHistory({
    sources,
    days: config.analysis.historyDays,
    logger: logger.child({ component: 'hourly-history' }),
  });

  const leadLag = {
    minCorrelation: config.analysis.minLagCorrelation,
    minImprovement: config.analysis.minLagImprovement,
    ...(config.analysis.maxLag === undefined ? {} : { maxLag: config.analysis.maxLag }),
  };

  const live = new LiveCorrelationService({
    sources,
    labels,
    synchronizer,
    store,
    prices,
    logger: logger.child({ component: 'analysis' }),
    intervalMs: config.analysis.intervalSeconds * 1000,
    backfillMinutes: {
      A: config.sources.futures.backfillMinutes,
      B: config.sources.crypto.backfillMinutes,
    },
    analysis: { timeframes: config.analysis.timeframes, leadLag },
    history,
  });

  const registry = new ServiceRegistry(logger.child({ component: 'registry' }));
  registry.register(live);

  let server: HttpServer | undefined;
  if (config.server.enabled) {
    server = new HttpServer({
      port: config.server.port,
      host: config.server.host,
      logger: logger.child({ component: 'http-server' }),
      labels,
      synchronizer,
      store,
      prices,
      sources,
      history,
      health: () => registry.healthCheckAll(),
    });
    registry.register(server);
  }

  return {
    registry,
    live,
    synchronizer,
    store,
    prices,
    history,
    labels,
    ...(server ? { server } : {}),
  };
}
