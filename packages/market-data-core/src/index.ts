/**
 * @crosslag/market-data-core
 *
 * Deterministic, I/O-free utilities for 1-minute OHLCV bars: finite-value
 * validation, minute alignment, rolling windows, partial-bar aggregation,
 * resampling and timestamp joins. All timestamps are UTC epoch milliseconds.
 *
 * @example
 * ```typescript
 * import { RollingBuffer, resampleBars, joinOnTimestamp } from "@crosslag/market-data-core";
 *
 * const bars5m = resampleBars(buffer.snapshot(), 5);
 * const pair = joinOnTimestamp(bars5m, otherBars5m);
 * ```
 *
 * @packageDocumentation
 */

export { isFiniteNumber, isValidBar } from './validation.js';

export { toMillis, alignTimestamp, alignToMinute, isAligned } from './timeframe.js';

export { mergeBars, resampleBars } from './aggregate.js';

export { joinOnTimestamp } from './join.js';
export type { AlignedPair } from './join.js';

export { RollingBuffer, DEFAULT_BUFFER_CAPACITY } from './rolling-buffer.js';
export type { RollingBufferOptions } from './rolling-buffer.js';

export { MinuteBarAggregator } from './bar-aggregator.js';
export type { AggregateResult } from './bar-aggregator.js';
