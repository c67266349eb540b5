/**
 * @fileoverview Signal types shared by the indicator engine and the fuser.
 *
 * @module @tradeloop/contracts/signals
 */

/**
 * Discrete directional signal: -1 sell, 0 flat, +1 buy.
 */
export type Signal = -1 | 0 | 1;

/**
 * Names of the indicators that emit a per-bar signal.
 */
export type IndicatorName = 'ma' | 'rsi' | 'divergence' | 'bollinger' | 'volume';

/**
 * All indicator names, in fusion order.
 */
export const INDICATOR_NAMES: readonly IndicatorName[] = [
  'ma',
  'rsi',
  'divergence',
  'bollinger',
  'volume',
];

/**
 * Fused decision for one bar.
 *
 * @invariant confidence is within [0, 1]
 * @invariant signal !== 0 implies |weightedSum| > 0.3
 */
export interface FusedSignal {
  signal: Signal;
  confidence: number;
  /** Normalized weighted sum the signal was discretized from */
  weightedSum: number;
}

/**
 * Narrows a number to a Signal.
 */
export function isSignal(value: number): value is Signal {
  return value === -1 || value === 0 || value === 1;
}

/**
 * Human-readable direction for logs and notifications.
 */
export function signalLabel(signal: Signal): 'SELL' | 'FLAT' | 'BUY' {
  if (signal > 0) return 'BUY';
  if (signal < 0) return 'SELL';
  return 'FLAT';
}
