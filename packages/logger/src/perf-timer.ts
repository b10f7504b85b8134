/**
 * @fileoverview High-resolution timers for measuring operation durations.
 */

export interface PerfTimer {
  /** Start time in milliseconds (performance.now() clock) */
  readonly startTime: number;

  /** Elapsed milliseconds, rounded */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const records = await source.fetchSchedule(range);
 * logger.info('Schedule fetched', { duration_ms: timer.stop(), count: records.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: { startTime: number; endTime: number | null } = {
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
 * Awaits `fn` and reports how long it took.
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
