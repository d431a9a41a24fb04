import type { Bar } from '@crosslag/contracts';

export const T0 = Date.UTC(2025, 0, 15, 14, 0);

/**
 * Deterministic uniform generator in [-0.5, 0.5) (mulberry32).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296 - 0.5;
  };
}

export function randomReturns(count: number, seed: number, scale = 0.004): number[] {
  const next = seededRandom(seed);
  return Array.from({ length: count }, () => next() * scale);
}

/**
 * Prices starting at `start` whose simple returns are `returns`.
 */
export function pricesFromReturns(start: number, returns: readonly number[]): number[] {
  const prices = [start];
  let price = start;
  for (const r of returns) {
    price *= 1 + r;
    prices.push(price);
  }
  return prices;
}

/**
 * One bar per minute from T0, flat OHLC at each price.
 */
export function barsFromPrices(prices: readonly number[], startMinute = 0): Bar[] {
  return prices.map((close, i) => ({
    timestamp: T0 + (startMinute + i) * 60_000,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1,
  }));
}
