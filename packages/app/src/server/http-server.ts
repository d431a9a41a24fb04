/**
 * HTTP API and websocket broadcast server
 * Serves the latest snapshot and both buffers; pushes bars, ticks and
 * correlation updates to websocket clients.
 */

import http from 'node:http';
import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
} from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import {
  isValidTimeframe,
  timeframeToMinutes,
  type SeriesId,
  type SeriesLabels,
} from '@crosslag/contracts';
import type { DualSeriesSynchronizer } from '@crosslag/bar-sync';
import { describeLeadLag } from '@crosslag/correlation-kit';
import type { Logger } from '@crosslag/logger';
import type { Service, HealthStatus } from '../container/types.js';
import type { HourlyHistory } from '../analysis/hourly-history.js';
import type { LatestPriceTracker } from '../analysis/latest-price.js';
import type { BarSource } from '../sources/types.js';
import type { SnapshotStore, SnapshotUpdate } from '../analysis/snapshot-store.js';

export interface HttpServerConfig {
  port: number;
  host: string;
  logger: Logger;
  labels: SeriesLabels;
  synchronizer: DualSeriesSynchronizer;
  store: SnapshotStore;
  prices: LatestPriceTracker;
  /** Sources of both series, asked for their contract symbols */
  sources: Readonly<Record<SeriesId, BarSource>>;
  /** Hourly history sent to new websocket clients and served by GET /api/history */
  history?: HourlyHistory;
  /** Health of the running services, reported by GET /health */
  health?: () => Map<string, HealthStatus>;
}

/**
 * Messages pushed to websocket clients
 */
export type BroadcastMessage =
  | {
      type: 'init';
      labels: SeriesLabels;
      contracts: { a: string; b: string };
      bars: { a: unknown[]; b: unknown[] };
      historical: { a: unknown[]; b: unknown[] };
      snapshot: Record<string, unknown>;
      lead_lag: Record<string, string>;
      prices: { a: number | null; b: number | null };
    }
  | { type: 'bar'; series: SeriesId; symbol: string; data: unknown }
  | { type: 'tick'; series: SeriesId; symbol: string; price: number; timestamp: number }
  | {
      type: 'correlation';
      cycle: number;
      timestamp: number;
      data: Record<string, unknown>;
      lead_lag: Record<string, string>;
    };

const barsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

/**
 * HTTP server for the live correlation service
 */
export class HttpServer implements Service {
  readonly name = 'HttpServer';
  readonly dependencies: readonly string[] = ['LiveCorrelationService'];

  private app: Express;
  private logger: Logger;
  private server?: http.Server;
  private wss?: WebSocketServer;
  private unsubscribers: Array<() => void> = [];

  constructor(private config: HttpServerConfig) {
    this.logger = config.logger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use((req, _res, next) => {
      this.logger.debug('HTTP request', {
        method: req.method,
        path: req.path,
        ip: req.ip,
      });
      next();
    });
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      const services = this.config.health ? Object.fromEntries(this.config.health()) : {};
      const healthy = Object.values(services).every((status) => status.healthy);

      res.json({
        status: healthy ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        services,
      });
    });

    this.app.get('/api/correlation', (_req: Request, res: Response) => {
      const update = this.config.store.latestUpdate();

      res.json({
        labels: this.config.labels,
        cycle: update?.cycle ?? 0,
        timestamp: update ? new Date(update.timestamp).toISOString() : null,
        snapshot: this.config.store.latest(),
        lead_lag: update ? this.describe(update) : {},
      });
    });

    this.app.get('/api/bars', (req: Request, res: Response) => {
      const query = barsQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'Invalid limit: must be a positive integer' });
        return;
      }

      const { a, b } = this.config.synchronizer.snapshotPair();
      const limit = query.data.limit;

      res.json({
        labels: this.config.labels,
        a: limit === undefined ? a : a.slice(-limit),
        b: limit === undefined ? b : b.slice(-limit),
      });
    });

    this.app.get('/api/history', (_req: Request, res: Response) => {
      res.json({
        labels: this.config.labels,
        timeframe: '1h',
        ...this.historical(),
      });
    });

    this.app.get('/api/prices', (_req: Request, res: Response) => {
      res.json({
        a: this.config.prices.latest('A') ?? null,
        b: this.config.prices.latest('B') ?? null,
      });
    });

    // 404 handler
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
      this.logger.error('Unhandled request error', {
        path: req.path,
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ error: 'Internal server error' });
    };
    this.app.use(errorHandler);
  }

  /**
   * Start listening, then attach the websocket server and subscribe the
   * broadcast. A failed listen leaves nothing attached.
   */
  async initialize(): Promise<void> {
    const server = http.createServer(this.app);

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const wss = new WebSocketServer({ server, path: '/ws' });
    wss.on('error', (error) => {
      this.logger.error('HTTP server error', { error: error.message });
    });
    wss.on('connection', (socket) => {
      this.logger.info('Websocket client connected', { clients: wss.clients.size });
      socket.send(JSON.stringify(this.initMessage()));
      socket.on('close', () => {
        this.logger.info('Websocket client disconnected', { clients: wss.clients.size });
      });
    });
    this.server = server;
    this.wss = wss;

    const { synchronizer, prices, store, labels } = this.config;
    this.unsubscribers.push(
      synchronizer.on('bar', ({ series, bar }) => {
        this.broadcast({ type: 'bar', series, symbol: this.labelOf(series), data: bar });
      }),
      prices.subscribe((update) => {
        this.broadcast({
          type: 'tick',
          series: update.series,
          symbol: this.labelOf(update.series),
          price: update.price,
          timestamp: update.timestamp,
        });
      }),
      store.subscribe((update) => {
        this.broadcast({
          type: 'correlation',
          cycle: update.cycle,
          timestamp: update.timestamp,
          data: update.snapshot,
          lead_lag: this.describe(update),
        });
      })
    );

    this.logger.info('HTTP server listening', {
      host: this.config.host,
      port: this.port(),
      series: labels,
    });
  }

  /**
   * Close websocket clients and stop listening
   */
  async shutdown(): Promise<void> {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    const { wss, server } = this;
    this.wss = undefined;
    this.server = undefined;

    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
    }

    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      this.logger.info('HTTP server stopped');
    }
  }

  healthCheck(): HealthStatus {
    return {
      healthy: this.server?.listening ?? false,
      message: this.server?.listening ? 'HTTP server is listening' : 'HTTP server is stopped',
      details: {
        port: this.port(),
        clients: this.wss?.clients.size ?? 0,
      },
    };
  }

  /**
   * Bound port; differs from the configured one when that was 0
   */
  port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  /**
   * Express app, for mounting or request-level tests
   */
  getApp(): Express {
    return this.app;
  }

  private broadcast(message: BroadcastMessage): void {
    if (!this.wss || this.wss.clients.size === 0) {
      return;
    }

    const payload = JSON.stringify(message);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  private initMessage(): BroadcastMessage {
    const { a, b } = this.config.synchronizer.snapshotPair();
    const update = this.config.store.latestUpdate();

    const { sources } = this.config;

    return {
      type: 'init',
      labels: this.config.labels,
      contracts: { a: sources.A.contractSymbol(), b: sources.B.contractSymbol() },
      bars: { a: [...a], b: [...b] },
      historical: this.historical(),
      snapshot: this.config.store.latest(),
      lead_lag: update ? this.describe(update) : {},
      prices: {
        a: this.config.prices.latest('A')?.price ?? null,
        b: this.config.prices.latest('B')?.price ?? null,
      },
    };
  }

  private historical(): { a: unknown[]; b: unknown[] } {
    const { history } = this.config;
    return {
      a: history ? [...history.bars('A')] : [],
      b: history ? [...history.bars('B')] : [],
    };
  }

  /**
   * Lead/lag text per timeframe. Bar counts are in units of the timeframe.
   */
  private describe(update: SnapshotUpdate): Record<string, string> {
    const { synchronizer, labels } = this.config;
    const rawBars = Math.min(synchronizer.buffer('A').size, synchronizer.buffer('B').size);
    const descriptions: Record<string, string> = {};

    for (const [timeframe, result] of Object.entries(update.result)) {
      const minutesPerBar = isValidTimeframe(timeframe) ? timeframeToMinutes(timeframe) : 1;
      descriptions[timeframe] = describeLeadLag(result, labels, {
        barCount: Math.floor(rawBars / minutesPerBar),
        minutesPerBar,
      });
    }

    return descriptions;
  }

  private labelOf(series: SeriesId): string {
    return series === 'A' ? this.config.labels.a : this.config.labels.b;
  }
}
