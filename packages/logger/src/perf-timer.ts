/**
 * @fileoverview Performance timing utilities for measuring operation durations.
 * Uses performance.now() for high-resolution measurements.
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since start (or until stop, once stopped) */
  elapsed(): number;

  /** Stop the timer and return the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Create and start a new performance timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await provider.getDailyBars({ ticker: 'MSFT', lookbackDays: 500 });
 * logger.info('Bars fetched', { duration_ms: timer.stop(), count: bars.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    get startTime() {
      return startTime;
    },

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Measure the duration of a synchronous function.
 *
 * @example
 * ```typescript
 * const { result: snapshot, duration_ms } = measureSync(() => analyzeTechnicals('MSFT', bars));
 * ```
 */
export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  return { result, duration_ms: timer.stop() };
}

/**
 * Measure the duration of an async function.
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
