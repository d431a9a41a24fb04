/**
 * @fileoverview Timing helpers for analysis cycles and backfills.
 * Uses performance.now() for sub-millisecond resolution.
 */

/**
 * Running or stopped duration measurement.
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution clock) */
  readonly startTime: number;

  /** Milliseconds since start, or the final duration once stopped */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Durations are reported with microsecond precision. Analysis cycles on a few
 * hundred bars finish in well under a millisecond, so whole-millisecond
 * rounding would report zero.
 */
function roundDuration(ms: number): number {
  return Math.round(ms * 1000) / 1000;
}

/**
 * Start a new timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const result = analyzeTimeframes(a, b);
 * logger.debug('cycle complete', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return roundDuration((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return roundDuration(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Measure a synchronous function.
 */
export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  return { result, duration_ms: timer.stop() };
}

/**
 * Measure an async function. Rejections propagate unchanged.
 *
 * @example
 * ```typescript
 * const { result: bars, duration_ms } = await measureAsync(() => source.fetchHistorical(request));
 * ```
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
