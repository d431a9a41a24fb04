/**
 * Test doubles for sources, HTTP and websockets
 */

import { EventEmitter } from 'node:events';
import { MINUTE_MS, type Bar, type HistoricalRequest, type Tick } from '@crosslag/contracts';
import type { BarListener, BarSource, HttpClient, TickListener } from '../src/sources/types.js';

/** 2025-01-15 00:00 UTC, aligned to the hour */
export const T0 = Date.UTC(2025, 0, 15, 0, 0);

export function bar(minute: number, close: number, overrides: Partial<Bar> = {}): Bar {
  return {
    timestamp: T0 + minute * MINUTE_MS,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1,
    ...overrides,
  };
}

/**
 * Source driven by the test.
 */
export class FakeSource implements BarSource {
  readonly name: string;
  started = false;
  stopped = false;
  history: Bar[] = [];
  /** Answers requests that name a timeframe */
  hourly: Bar[] = [];
  historyError: Error | undefined;
  readonly requests: HistoricalRequest[] = [];

  private readonly barListeners = new Set<BarListener>();
  private readonly tickListeners = new Set<TickListener>();
  private readonly partialListeners = new Set<BarListener>();

  constructor(name = 'fake') {
    this.name = name;
  }

  contractSymbol(): string {
    return `${this.name.toUpperCase()}-1`;
  }

  onBar(listener: BarListener): () => void {
    this.barListeners.add(listener);
    return () => {
      this.barListeners.delete(listener);
    };
  }

  onTick(listener: TickListener): () => void {
    this.tickListeners.add(listener);
    return () => {
      this.tickListeners.delete(listener);
    };
  }

  onPartial(listener: BarListener): () => void {
    this.partialListeners.add(listener);
    return () => {
      this.partialListeners.delete(listener);
    };
  }

  async fetchHistorical(request: HistoricalRequest): Promise<Bar[]> {
    this.requests.push(request);
    if (this.historyError) {
      throw this.historyError;
    }
    if (request.timeframe) {
      return this.hourly.slice(-Math.floor(request.minutes / 60));
    }
    return this.history.slice(-request.minutes);
  }

  async start(): Promise<void> {
    this.started = true;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  emitBar(value: Bar): void {
    for (const listener of this.barListeners) listener(value);
  }

  emitTick(value: Tick): void {
    for (const listener of this.tickListeners) listener(value);
  }

  emitPartial(value: Bar): void {
    for (const listener of this.partialListeners) listener(value);
  }

  listenerCount(): number {
    return this.barListeners.size + this.tickListeners.size + this.partialListeners.size;
  }
}

export interface RecordedRequest {
  url: string;
  params: Record<string, unknown>;
}

/**
 * HTTP client answering from a handler and recording every request.
 */
export class FakeHttp implements HttpClient {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly handler: (request: RecordedRequest) => unknown) {}

  async get(url: string, config?: { params?: Record<string, unknown> }): Promise<{ data: unknown }> {
    const request = { url, params: config?.params ?? {} };
    this.requests.push(request);
    return { data: this.handler(request) };
  }
}

/**
 * In-process websocket stand-in. close() emits 'close' once.
 */
export class FakeSocket extends EventEmitter {
  closed = false;

  constructor(readonly url: string) {
    super();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close');
  }

  receive(message: unknown): void {
    this.emit('message', Buffer.from(JSON.stringify(message)));
  }
}
