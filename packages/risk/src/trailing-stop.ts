/**
 * @fileoverview Trailing stop arithmetic.
 * @module @tradeloop/risk/trailing-stop
 */

/**
 * Stop price `pct` below `price`.
 */
export function trailingStopFor(price: number, pct: number): number {
  return price * (1 - pct);
}

/**
 * Raise the stop to follow `price`; never lower it.
 *
 * @example
 * ```typescript
 * ratchetTrailingStop(undefined, 100, 0.02); // 98
 * ratchetTrailingStop(98, 110, 0.02);        // 107.8
 * ratchetTrailingStop(107.8, 105, 0.02);     // 107.8
 * ```
 */
export function ratchetTrailingStop(
  current: number | undefined,
  price: number,
  pct: number
): number {
  const candidate = trailingStopFor(price, pct);
  if (current === undefined) return candidate;
  return Math.max(current, candidate);
}
