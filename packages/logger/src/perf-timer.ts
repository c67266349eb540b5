/**
 * @fileoverview Performance timing utilities for measuring cycle and phase durations.
 * Uses high-resolution timers (performance.now()).
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since start (or until stop) */
  elapsed(): number;

  /** Stop the timer and return final duration in milliseconds */
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
 * await cycle.run();
 * logger.info('Cycle complete', { duration_ms: timer.stop() });
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
 * const { result, duration_ms } = await measureAsync(() => engine.checkRiskLimits());
 * logger.info('Risk check complete', { duration_ms, actions: result.length });
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
