/**
 * Cycle scheduler
 *
 * Runs a task at once and then again `intervalMs` after each run finishes.
 * Runs never overlap. Aborting the signal cancels the wait between runs;
 * a run in progress always completes.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '@tradeloop/logger';

export interface SchedulerOptions {
  intervalMs: number;
  logger: Logger;
}

export class CycleScheduler {
  private readonly intervalMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly task: () => Promise<unknown>,
    options: SchedulerOptions
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`intervalMs must be positive, got ${options.intervalMs}`);
    }
    this.intervalMs = options.intervalMs;
    this.logger = options.logger.child({ component: 'scheduler' });
  }

  /**
   * Run until `signal` aborts.
   *
   * @returns Number of completed runs
   */
  async start(signal: AbortSignal): Promise<number> {
    let runs = 0;
    this.logger.info('Scheduler started', { interval_ms: this.intervalMs });

    while (!signal.aborted) {
      await this.task();
      runs++;

      if (signal.aborted) break;
      try {
        await delay(this.intervalMs, undefined, { signal });
      } catch (err) {
        if (isAbortError(err)) break;
        throw err;
      }
    }

    this.logger.info('Scheduler stopped', { runs });
    return runs;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
