/**
 * @fileoverview Type definitions for the crosslag logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': failures that abort an operation (a backfill, a server start)
 * - 'warn': recoverable problems (a timeframe that failed, a source reconnect)
 * - 'info': lifecycle events (startup, source connected, shutdown)
 * - 'debug': per-bar and per-cycle detail, including dropped samples
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/crosslag.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /** Minimum log level to output. */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Optional file path; logs are written there in addition to the console. */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Extra winston transports, appended after console and file.
   * Tests use this to capture output in memory.
   */
  transports?: WinstonLogger['transports'];
}

/**
 * Structured log entry with the fields the analysis pipeline emits.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Component name, set by child loggers */
  component?: string;
  /** Series label ('ES', 'BTC', ...) */
  series?: string;
  /** Timeframe label ('1m', '5m', ...) */
  timeframe?: string;
  /** Identifier of the analysis cycle that produced the entry */
  cycle_id?: string;
  /** Operation duration in milliseconds */
  duration_ms?: number;
  /** Number of bars or rows processed */
  count?: number;
  [key: string]: unknown;
}

/**
 * Context fields attached by a child logger.
 *
 * @example
 * ```typescript
 * const bufferLogger = logger.child({ component: 'rolling-buffer', series: 'BTC' });
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  series?: string;
  timeframe?: string;
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so consumers depend on this package only.
 */
export type Logger = WinstonLogger;
