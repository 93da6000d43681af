/**
 * @fileoverview Performance timing utilities for measuring operation durations
 * Uses high-resolution timers (performance.now()) for accurate measurements
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /**
   * Elapsed time since the timer started, in whole milliseconds
   */
  elapsed(): number;

  /**
   * Stop the timer and return the final duration; later calls return the same value
   */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Create a new performance timer
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const body = await fetcher(url);
 * logger.debug('Response received', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measure the duration of an async function
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = await measureAsync(() => fetcher(url));
 * ```
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}
