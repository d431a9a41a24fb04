/**
 * @fileoverview Logger factory.
 *
 * Creates winston loggers with secret redaction, standard fields, and either
 * JSON or pretty-printed output.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Sources connected', { futures: 'ES', crypto: 'BTC' });
 *
 * const analysisLogger = logger.child({ component: 'analysis' });
 * analysisLogger.debug('Cycle complete', { duration_ms: 2 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    transports: extraTransports = [],
  } = config;

  // Order matters: redact first so later formats never see a secret.
  const logFormat = format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ level }));
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  transports.push(...extraTransports);

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Fatal errors are handled in errorHandler.ts.
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const sourceLogger = createChildLogger(logger, { component: 'binance-source', series: 'BTC' });
 * sourceLogger.warn('Stream closed, reconnecting', { attempt: 2 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * A logger with no transports and `silent` set, for components constructed
 * without one.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true, transports: [] });
}
