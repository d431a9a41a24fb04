/**
 * @fileoverview Main entry point for @crosslag/contracts.
 *
 * Types, constants and error classes shared by every package.
 *
 * @module @crosslag/contracts
 */

// Timeframes
export {
  Timeframe,
  MINUTE_MS,
  DEFAULT_TIMEFRAMES,
  isValidTimeframe,
  timeframeToMinutes,
  parseTimeframe,
} from './timeframes.js';

// Market data types
export type {
  SeriesId,
  Bar,
  Tick,
  BarTable,
  HistoricalRequest,
  BarPair,
  SeriesLabels,
} from './market.js';

// Correlation results
export type {
  Strength,
  LeadLagResult,
  CorrelationResult,
  MultiTimeframeResult,
  CorrelationSnapshotEntry,
  CorrelationSnapshot,
} from './correlation.js';

export { UNDEFINED_CORRELATION } from './correlation.js';

// Error classes and guards
export {
  CrosslagError,
  InvalidBarError,
  SourceError,
  ConfigError,
  isCrosslagError,
  isSourceError,
  isConfigError,
} from './errors.js';
