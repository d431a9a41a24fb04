/**
 * @fileoverview Public API exports for @crosslag/logger
 * Structured logging, process error handlers and timers.
 */

export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export {
  generateContextId,
  getLogContext,
  getContextId,
  withLogContext,
  withLogContextSync,
  setLogContext,
} from './log-context.js';

export { startTimer, measureSync, measureAsync } from './perf-timer.js';

export { redactSensitiveFields } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { LogContext } from './log-context.js';
export type { PerfTimer } from './perf-timer.js';
