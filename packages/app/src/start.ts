#!/usr/bin/env node

/**
 * Main application entry point
 * Loads configuration, wires all services together and starts them
 */

// Load environment variables from .env file
import 'dotenv/config';

import {
  createLogger,
  attachGlobalHandlers,
  withLogContext,
  startTimer,
  type Logger,
} from '@crosslag/logger';
import { isConfigError } from '@crosslag/contracts';
import { loadConfig, getConfigSummary } from './config/index.js';
import { createApplication, type Application } from './app.js';

const VERSION = '0.1.0';

/**
 * Main startup function
 */
async function start(): Promise<void> {
  let logger: Logger | undefined;
  let application: Application | undefined;

  try {
    // Parse command line arguments
    const args = process.argv.slice(2);
    const flags = {
      dryRun: args.includes('--dry-run'),
      help: args.includes('--help') || args.includes('-h'),
      version: args.includes('--version'),
    };

    if (flags.help) {
      showHelp();
      return;
    }

    if (flags.version) {
      console.log(`crosslag v${VERSION}`);
      return;
    }

    // Command line flags override the environment
    const config = loadConfig({ ...process.env, ...(flags.dryRun ? { DRY_RUN: 'true' } : {}) });

    logger = createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      ...(config.logging.filePath ? { filePath: config.logging.filePath } : {}),
    });

    attachGlobalHandlers(logger);

    const rootLogger = logger;
    application = await withLogContext(
      async () => {
        const startupTimer = startTimer();

        rootLogger.info('Starting crosslag', getConfigSummary(config));

        const app = createApplication(config, rootLogger);
        await app.registry.initializeAll();

        rootLogger.info('Startup complete', {
          duration_ms: startupTimer.stop(),
          http: app.server ? `http://${config.server.host}:${app.server.port() ?? config.server.port}` : 'disabled',
        });
        return app;
      },
      undefined,
      { operation: 'startup' }
    );

    registerShutdown(application, rootLogger);
  } catch (error) {
    if (logger) {
      logger.error('Application startup failed', { error });
    } else if (isConfigError(error)) {
      console.error(error.message);
    } else {
      console.error('Application startup failed:', error);
    }

    if (application) {
      await application.registry.shutdownAll();
    }

    process.exitCode = 1;
  }
}

/**
 * SIGINT/SIGTERM shut every service down in reverse start order, once.
 */
function registerShutdown(application: Application, logger: Logger): void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('Shutting down', { signal });
    application.registry
      .shutdownAll()
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
crosslag - rolling correlation and lead/lag between a futures feed and a crypto feed

Usage: crosslag [options]

Options:
  --dry-run          Use synthetic sources instead of live feeds
  --help, -h         Show this help message
  --version          Show version information

Environment Variables:
  NODE_ENV                     Environment (development/test/staging/production)
  DRY_RUN                      Use synthetic sources
  LOG_LEVEL                    Logging level (error/warn/info/debug)
  LOG_FORMAT                   Log output format (json/pretty)
  LOG_FILE                     Also write logs to this file
  SERVER_ENABLED               Serve HTTP and websocket (default: true)
  SERVER_HOST                  Bind address (default: 127.0.0.1)
  SERVER_PORT                  Port (default: 8765)
  BUFFER_CAPACITY              Bars kept per series (default: 500)
  ANALYSIS_INTERVAL_SECONDS    Periodic analysis interval (default: 30)
  ANALYSIS_TIMEFRAMES          Comma-separated timeframes (default: 1m,5m,15m,1h)
  LEAD_LAG_MIN_CORRELATION     Lead/lag significance floor (default: 0.2)
  LEAD_LAG_MIN_IMPROVEMENT     Required gain over lag 0 (default: 0.05)
  LEAD_LAG_MAX_LAG             Fixed lag search range (default: derived)
  ANALYSIS_HISTORY_DAYS        Days of hourly history for clients (default: 7)
  FUTURES_SYMBOL               Futures display label (default: ES)
  FUTURES_YAHOO_SYMBOL         Yahoo chart symbol (default: ES=F)
  FUTURES_POLL_SECONDS         Chart poll interval (default: 15)
  CRYPTO_SYMBOL                Binance symbol (default: BTCUSDT)
  CRYPTO_LABEL                 Crypto display label (default: BTC)
  TICK_THROTTLE_MS             Minimum gap between price updates (default: 50)

Examples:
  crosslag                     Stream ES and BTC and serve on 127.0.0.1:8765
  crosslag --dry-run           Run against synthetic data
`);
}

start().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
