/**
 * @fileoverview Cycle context management using AsyncLocalStorage.
 * Every log line written while a cycle runs carries that cycle's ID.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Cycle context structure
 */
export interface CycleContext {
  /** Unique cycle identifier (UUID v4) */
  cycle_id: string;

  /** Optional additional context fields */
  [key: string]: unknown;
}

const cycleContextStorage = new AsyncLocalStorage<CycleContext>();

/**
 * Generate a new unique cycle ID (UUID v4 format)
 */
export function generateCycleId(): string {
  return randomUUID();
}

/**
 * Get the current cycle context, or undefined outside a cycle
 */
export function getCycleContext(): CycleContext | undefined {
  return cycleContextStorage.getStore();
}

/**
 * Get the current cycle ID, or undefined outside a cycle
 */
export function getCycleId(): string | undefined {
  return cycleContextStorage.getStore()?.cycle_id;
}

/**
 * Execute a function within a new cycle context.
 * The cycle ID propagates through all async operations started by `fn`.
 *
 * @param fn - Function to execute within the cycle context
 * @param cycleId - Optional cycle ID to use (generates new one if not provided)
 * @param additionalContext - Optional additional context fields
 *
 * @example
 * ```typescript
 * await withCycleContext(async () => {
 *   logger.info('Cycle started'); // includes cycle_id
 *   await controller.runCycle();
 * });
 * ```
 */
export async function withCycleContext<T>(
  fn: () => Promise<T> | T,
  cycleId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: CycleContext = {
    ...additionalContext,
    cycle_id: cycleId || generateCycleId(),
  };

  return cycleContextStorage.run(context, fn);
}

/**
 * Merge fields into the current cycle context.
 *
 * @returns true if context was updated, false if not in a cycle context
 */
export function setCycleContext(fields: Record<string, unknown>): boolean {
  const context = cycleContextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
