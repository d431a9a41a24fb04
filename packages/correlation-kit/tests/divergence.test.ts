import { describe, it, expect } from 'vitest';
import { normalizePrices, rollingDivergence } from '../src/divergence.js';
import { pricesFromReturns, randomReturns } from './helpers.js';

describe('normalizePrices', () => {
  it('scales into [0, 1]', () => {
    const [low, high, mid] = normalizePrices([5000, 5010, 5005]);

    expect(low).toBe(0);
    expect(high).toBeCloseTo(1, 9);
    expect(mid).toBeCloseTo(0.5, 9);
  });

  it('maps non-finite prices to NaN and ignores them for the range', () => {
    const [first, gap, last] = normalizePrices([1, NaN, 3]);

    expect(first).toBe(0);
    expect(gap).toBeNaN();
    expect(last).toBeCloseTo(1, 9);
  });

  it('maps a constant series to zeros', () => {
    expect(normalizePrices([5, 5, 5])).toEqual([0, 0, 0]);
  });
});

describe('rollingDivergence', () => {
  it('is near 1 for series moving in opposite directions', () => {
    const returns = randomReturns(24, 21);
    const a = pricesFromReturns(100, returns);
    const b = pricesFromReturns(100, returns.map((r) => -r));

    const scores = rollingDivergence(a, b, 20);

    expect(scores).toHaveLength(5);
    for (const score of scores) {
      expect(score).toBeCloseTo(1, 8);
    }
  });

  it('is 0 for series moving together', () => {
    const prices = pricesFromReturns(100, randomReturns(24, 21));

    expect(rollingDivergence(prices, prices, 20)).toEqual([0, 0, 0, 0, 0]);
  });

  it('scores a constant window as 0', () => {
    const flat = Array.from({ length: 25 }, () => 100);
    const moving = pricesFromReturns(100, randomReturns(24, 8));

    expect(rollingDivergence(flat, moving)).toEqual([0, 0, 0, 0, 0]);
  });

  it('is empty when either series is shorter than the window', () => {
    const prices = pricesFromReturns(100, randomReturns(24, 21));

    expect(rollingDivergence(prices.slice(0, 19), prices)).toEqual([]);
    expect(rollingDivergence(prices, prices.slice(0, 19))).toEqual([]);
  });
});
