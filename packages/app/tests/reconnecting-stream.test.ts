import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createSilentLogger } from '@crosslag/logger';
import { ReconnectingStream } from '../src/sources/reconnecting-stream.js';
import { FakeSocket } from './helpers.js';

function setup() {
  const sockets: FakeSocket[] = [];
  const messages: unknown[] = [];
  const stream = new ReconnectingStream({
    url: 'wss://stream.test/ws/btcusdt@trade',
    logger: createSilentLogger(),
    onMessage: (message) => messages.push(message),
    createSocket: (url) => {
      const socket = new FakeSocket(url);
      sockets.push(socket);
      return socket;
    },
  });
  return { stream, sockets, messages };
}

describe('ReconnectingStream', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('delivers parsed JSON messages', () => {
    const { stream, sockets, messages } = setup();
    stream.connect();

    sockets[0]?.emit('open');
    sockets[0]?.receive({ p: '97000.10' });

    expect(stream.isConnected()).toBe(true);
    expect(messages).toEqual([{ p: '97000.10' }]);
  });

  it('drops malformed messages', () => {
    const { stream, sockets, messages } = setup();
    stream.connect();

    sockets[0]?.emit('message', Buffer.from('not json'));

    expect(messages).toEqual([]);
  });

  it('reconnects with exponential backoff', () => {
    const { stream, sockets } = setup();
    stream.connect();

    sockets[0]?.close();
    vi.advanceTimersByTime(999);
    expect(sockets).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(sockets).toHaveLength(2);

    sockets[1]?.close();
    vi.advanceTimersByTime(1999);
    expect(sockets).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(sockets).toHaveLength(3);
    expect(sockets[2]?.url).toBe('wss://stream.test/ws/btcusdt@trade');
  });

  it('resets the backoff after a successful open', () => {
    const { stream, sockets } = setup();
    stream.connect();

    sockets[0]?.close();
    vi.advanceTimersByTime(1000);
    sockets[1]?.emit('open');
    expect(stream.getRetryCount()).toBe(0);

    sockets[1]?.close();
    expect(stream.isConnected()).toBe(false);
    vi.advanceTimersByTime(1000);
    expect(sockets).toHaveLength(3);
  });

  it('caps the delay', () => {
    const sockets: FakeSocket[] = [];
    const stream = new ReconnectingStream({
      url: 'wss://stream.test',
      logger: createSilentLogger(),
      onMessage: () => undefined,
      baseDelayMs: 4000,
      maxDelayMs: 5000,
      createSocket: (url) => {
        const socket = new FakeSocket(url);
        sockets.push(socket);
        return socket;
      },
    });
    stream.connect();

    sockets[0]?.close();
    vi.advanceTimersByTime(4000);
    sockets[1]?.close();

    expect(stream.getRetryCount()).toBe(2);
    expect(stream.nextDelay()).toBe(5000);
    vi.advanceTimersByTime(5000);
    expect(sockets).toHaveLength(3);

    stream.stop();
  });

  it('closes the socket on error and reconnects', () => {
    const { stream, sockets } = setup();
    stream.connect();

    sockets[0]?.emit('error', new Error('ECONNRESET'));
    expect(sockets[0]?.closed).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(sockets).toHaveLength(2);
  });

  it('does not reconnect after stop', () => {
    const { stream, sockets } = setup();
    stream.connect();

    stream.stop();
    vi.advanceTimersByTime(60_000);

    expect(sockets).toHaveLength(1);
    expect(sockets[0]?.closed).toBe(true);
  });

  it('cancels a pending reconnect on stop', () => {
    const { stream, sockets } = setup();
    stream.connect();

    sockets[0]?.close();
    stream.stop();
    vi.advanceTimersByTime(60_000);

    expect(sockets).toHaveLength(1);
  });
});
