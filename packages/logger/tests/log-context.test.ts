/**
 * @fileoverview Tests for cycle id propagation
 */

import { describe, it, expect } from 'vitest';
import {
  generateContextId,
  getContextId,
  getLogContext,
  setLogContext,
  withLogContext,
  withLogContextSync,
} from '../src/log-context.js';

describe('log context', () => {
  it('has no context outside of a run', () => {
    expect(getLogContext()).toBeUndefined();
    expect(getContextId()).toBeUndefined();
    expect(setLogContext({ timeframe: '1m' })).toBe(false);
  });

  it('generates distinct UUIDs', () => {
    const first = generateContextId();
    const second = generateContextId();

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first).not.toBe(second);
  });

  it('propagates the id across awaits', async () => {
    const seen = await withLogContext(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return getContextId();
    }, 'cycle-7');

    expect(seen).toBe('cycle-7');
    expect(getContextId()).toBeUndefined();
  });

  it('stores additional fields and accepts later ones', () => {
    const context = withLogContextSync(
      () => {
        expect(setLogContext({ timeframe: '15m' })).toBe(true);
        return getLogContext();
      },
      'cycle-8',
      { operation: 'analysis' }
    );

    expect(context).toEqual({ cycle_id: 'cycle-8', operation: 'analysis', timeframe: '15m' });
  });

  it('keeps nested contexts apart', () => {
    const ids = withLogContextSync(() => {
      const inner = withLogContextSync(() => getContextId(), 'inner');
      return [getContextId(), inner];
    }, 'outer');

    expect(ids).toEqual(['outer', 'inner']);
  });
});
