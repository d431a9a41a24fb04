import { describe, it, expect } from 'vitest';
import { simpleReturns, pairedFiniteReturns } from '../src/returns.js';

describe('simpleReturns', () => {
  it('computes period-over-period change', () => {
    const returns = simpleReturns([100, 110, 99]);

    expect(returns).toHaveLength(2);
    expect(returns[0]).toBeCloseTo(0.1, 12);
    expect(returns[1]).toBeCloseTo(-0.1, 12);
  });

  it('is empty for fewer than two prices', () => {
    expect(simpleReturns([100])).toEqual([]);
  });

  it('stays finite across a zero price', () => {
    const [r] = simpleReturns([0, 1]);

    expect(r).toBeCloseTo(1e10, 0);
  });
});

describe('pairedFiniteReturns', () => {
  it('drops pairs where either side is non-finite', () => {
    const { a, b } = pairedFiniteReturns([1, 2, NaN, 4, 8], [10, 20, 30, 60, 120]);

    expect(a).toHaveLength(2);
    expect(b).toHaveLength(2);
    expect(a[0]).toBeCloseTo(1, 9);
    expect(b[0]).toBeCloseTo(1, 9);
    expect(a[1]).toBeCloseTo(1, 9);
    expect(b[1]).toBeCloseTo(1, 9);
  });
});
