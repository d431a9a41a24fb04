/**
 * JSON websocket stream with automatic reconnect.
 *
 * Reconnects with exponential backoff (1s, 2s, 4s, ... capped) until
 * stop() is called. The retry counter resets on every successful open.
 */

import WebSocket from 'ws';
import type { Logger } from '@crosslag/logger';

/**
 * The part of a websocket the stream uses.
 */
export interface StreamSocket {
  on(event: 'open', listener: () => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  close(): void;
}

export type SocketFactory = (url: string) => StreamSocket;

export const defaultSocketFactory: SocketFactory = (url) => new WebSocket(url);

export interface ReconnectingStreamOptions {
  url: string;
  logger: Logger;
  onMessage: (message: unknown) => void;
  createSocket?: SocketFactory;
  /** First retry delay (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound of the retry delay (default: 30000) */
  maxDelayMs?: number;
}

export class ReconnectingStream {
  private socket: StreamSocket | null = null;
  private connected = false;
  private stopped = true;
  private retryCount = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;

  private readonly url: string;
  private readonly logger: Logger;
  private readonly onMessage: (message: unknown) => void;
  private readonly createSocket: SocketFactory;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  constructor(options: ReconnectingStreamOptions) {
    this.url = options.url;
    this.logger = options.logger;
    this.onMessage = options.onMessage;
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30000;
  }

  connect(): void {
    this.stopped = false;
    this.open();
  }

  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const socket = this.socket;
    this.socket = null;
    this.connected = false;
    socket?.close();
  }

  isConnected(): boolean {
    return this.connected;
  }

  getRetryCount(): number {
    return this.retryCount;
  }

  /**
   * Delay before the next attempt: base * 2^(attempt - 1), exponent capped at 5.
   */
  nextDelay(): number {
    const exponent = Math.min(Math.max(this.retryCount - 1, 0), 5);
    return Math.min(this.baseDelayMs * 2 ** exponent, this.maxDelayMs);
  }

  private open(): void {
    if (this.stopped) return;

    let socket: StreamSocket;
    try {
      socket = this.createSocket(this.url);
    } catch (error) {
      this.logger.warn('Stream connect failed', {
        url: this.url,
        error: error instanceof Error ? error.message : String(error),
      });
      this.scheduleReconnect();
      return;
    }

    this.socket = socket;

    socket.on('open', () => {
      this.connected = true;
      this.retryCount = 0;
      this.logger.info('Stream connected', { url: this.url });
    });

    socket.on('message', (data) => {
      this.handleMessage(data);
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.connected = false;
      if (!this.stopped) {
        this.logger.warn('Stream closed', { url: this.url });
        this.scheduleReconnect();
      }
    });

    socket.on('error', (error) => {
      this.logger.warn('Stream error', { url: this.url, error: error.message });
      // close follows, which schedules the reconnect
      socket.close();
    });
  }

  private handleMessage(data: WebSocket.RawData): void {
    let message: unknown;
    try {
      message = JSON.parse(rawDataToString(data));
    } catch (error) {
      this.logger.debug('Ignoring malformed stream message', {
        url: this.url,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    this.onMessage(message);
  }

  private scheduleReconnect(): void {
    this.retryCount++;
    const delay = this.nextDelay();

    this.logger.info('Reconnecting stream', { url: this.url, attempt: this.retryCount, delay_ms: delay });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open();
    }, delay);
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}
