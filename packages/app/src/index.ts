/**
 * Main exports for @crosslag/app package
 */

// Service lifecycle
export { ServiceRegistry } from './container/index.js';
export type { Service, HealthStatus } from './container/types.js';

// Configuration
export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

// Wiring
export { createApplication, createSources } from './app.js';
export type { Application, CreateApplicationOptions } from './app.js';

// Analysis loop
export { LiveCorrelationService } from './analysis/live-correlation.service.js';
export type { LiveCorrelationServiceConfig, CycleTrigger } from './analysis/live-correlation.service.js';
export { SnapshotStore } from './analysis/snapshot-store.js';
export type { SnapshotUpdate } from './analysis/snapshot-store.js';
export { LatestPriceTracker } from './analysis/latest-price.js';
export { HourlyHistory } from './analysis/hourly-history.js';
export type { HourlyHistoryOptions } from './analysis/hourly-history.js';
export type { PriceUpdate, LatestPriceTrackerOptions } from './analysis/latest-price.js';

// Sources
export { BinanceSource, KLINE_REQUEST_LIMIT } from './sources/binance-source.js';
export type { BinanceSourceOptions } from './sources/binance-source.js';
export { YahooFuturesSource, YAHOO_CHART_URL } from './sources/yahoo-futures-source.js';
export type { YahooFuturesSourceOptions } from './sources/yahoo-futures-source.js';
export { FixtureSource, FIXTURE_HISTORY_MINUTES } from './sources/fixture-source.js';
export type { FixtureSourceOptions, FixtureLeadCoupling } from './sources/fixture-source.js';
export { frontMonthContract, thirdFriday, ROLL_DAYS_BEFORE_EXPIRY } from './sources/futures-contract.js';
export { ReconnectingStream, defaultSocketFactory } from './sources/reconnecting-stream.js';
export type { StreamSocket, SocketFactory, ReconnectingStreamOptions } from './sources/reconnecting-stream.js';
export type { BarSource, BarListener, TickListener, HttpClient, SourceEventMap } from './sources/types.js';

// Server
export { HttpServer } from './server/http-server.js';
export type { HttpServerConfig, BroadcastMessage } from './server/http-server.js';
