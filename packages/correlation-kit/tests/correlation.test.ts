import { describe, it, expect } from 'vitest';
import { UNDEFINED_CORRELATION } from '@crosslag/contracts';
import { calculateCorrelation, classifyStrength } from '../src/correlation.js';
import { pricesFromReturns, randomReturns } from './helpers.js';

describe('classifyStrength', () => {
  it('buckets |r| with exclusive lower bounds', () => {
    expect(classifyStrength(0.71)).toBe('strong');
    expect(classifyStrength(-0.75)).toBe('strong');
    expect(classifyStrength(0.7)).toBe('moderate');
    expect(classifyStrength(0.41)).toBe('moderate');
    expect(classifyStrength(0.4)).toBe('weak');
    expect(classifyStrength(-0.21)).toBe('weak');
    expect(classifyStrength(0.2)).toBe('none');
    expect(classifyStrength(0)).toBe('none');
  });
});

describe('calculateCorrelation', () => {
  it('returns the undefined result for fewer than 10 prices', () => {
    const prices = pricesFromReturns(100, randomReturns(8, 1));

    expect(calculateCorrelation(prices, pricesFromReturns(100, randomReturns(30, 2)))).toBe(
      UNDEFINED_CORRELATION
    );
    expect(calculateCorrelation([100, 101], [50000, 49000])).toBe(UNDEFINED_CORRELATION);
  });

  it('returns the undefined result with fewer than 5 finite return pairs', () => {
    const gappy = [100, NaN, 101, NaN, 102, NaN, 103, NaN, 104, NaN, 105, NaN];
    const clean = pricesFromReturns(100, randomReturns(11, 3));

    expect(calculateCorrelation(gappy, clean)).toBe(UNDEFINED_CORRELATION);
  });

  it('finds perfect correlation between identical series', () => {
    const prices = pricesFromReturns(5000, randomReturns(49, 7));

    const result = calculateCorrelation(prices, prices);

    expect(result.correlation).toBeCloseTo(1, 10);
    expect(result.pValue).toBeLessThan(1e-10);
    expect(result.strength).toBe('strong');
    expect(result.leadLag).toBe(0);
    expect(result.leadLagCorr).toBeCloseTo(1, 10);
    expect(result.sampleSize).toBe(49);
  });

  it('uses the most recent min(lenA, lenB) prices', () => {
    const recent = pricesFromReturns(200, randomReturns(11, 5));
    const longer = [...pricesFromReturns(100, randomReturns(17, 3)), ...recent];

    const result = calculateCorrelation(longer, recent);

    expect(longer).toHaveLength(30);
    expect(result.sampleSize).toBe(11);
    expect(result.correlation).toBeCloseTo(1, 10);
  });

  it('reports zero correlation for a constant series', () => {
    const flat = Array.from({ length: 20 }, () => 100);
    const moving = pricesFromReturns(100, randomReturns(19, 4));

    expect(calculateCorrelation(flat, moving)).toEqual({
      correlation: 0,
      pValue: 1,
      leadLag: 0,
      leadLagCorr: 0,
      strength: 'none',
      sampleSize: 19,
    });
  });

  it('passes lead/lag options through', () => {
    const x = randomReturns(62, 13);
    const pricesA = pricesFromReturns(5000, x.slice(2, 62));
    const pricesB = pricesFromReturns(95000, x.slice(0, 60));

    expect(calculateCorrelation(pricesA, pricesB).leadLag).toBe(2);
    expect(calculateCorrelation(pricesA, pricesB, { leadLag: { minCorrelation: 2 } }).leadLag).toBe(0);
  });

  it('is symmetric in its inputs apart from the lead/lag sign', () => {
    const x = randomReturns(62, 13);
    const leading = pricesFromReturns(5000, x.slice(2, 62));
    const following = pricesFromReturns(95000, x.slice(0, 60));
    const pairs: Array<[number[], number[]]> = [[leading, following]];
    for (let seed = 30; seed < 36; seed++) {
      pairs.push([
        pricesFromReturns(5000, randomReturns(80, seed)),
        pricesFromReturns(95000, randomReturns(80, seed + 100)),
      ]);
    }

    for (const [a, b] of pairs) {
      const forward = calculateCorrelation(a, b);
      const reversed = calculateCorrelation(b, a);

      expect(reversed.correlation).toBe(forward.correlation);
      expect(reversed.pValue).toBe(forward.pValue);
      expect(reversed.strength).toBe(forward.strength);
      expect(reversed.sampleSize).toBe(forward.sampleSize);
      expect(reversed.leadLagCorr).toBe(forward.leadLagCorr);
      expect(reversed.leadLag + forward.leadLag).toBe(0);
    }

    expect(calculateCorrelation(leading, following).leadLag).toBe(2);
    expect(calculateCorrelation(following, leading).leadLag).toBe(-2);
  });

  it('keeps p-value and correlation within range', () => {
    const result = calculateCorrelation(
      pricesFromReturns(100, randomReturns(99, 21)),
      pricesFromReturns(100, randomReturns(99, 22))
    );

    expect(Math.abs(result.correlation)).toBeLessThanOrEqual(1);
    expect(result.pValue).toBeGreaterThanOrEqual(0);
    expect(result.pValue).toBeLessThanOrEqual(1);
    expect(result.sampleSize).toBe(99);
  });
});
