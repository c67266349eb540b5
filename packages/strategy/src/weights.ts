/**
 * Signal fusion weights and decision threshold.
 *
 * @module @tradeloop/strategy/weights
 */

import { INDICATOR_NAMES, type IndicatorName } from '@tradeloop/contracts';

/**
 * Weight per indicator. Only the indicators present on a row take part
 * in its weighted sum.
 */
export type SignalWeights = Record<IndicatorName, number>;

/**
 * Default weights; they sum to 1.
 */
export const DEFAULT_SIGNAL_WEIGHTS: Readonly<SignalWeights> = {
  ma: 0.3,
  rsi: 0.2,
  divergence: 0.15,
  bollinger: 0.2,
  volume: 0.15,
};

/**
 * |weighted sum| must exceed this for a directional signal.
 */
export const SIGNAL_THRESHOLD = 0.3;

/**
 * Fill missing weights from the defaults and validate the result.
 *
 * @throws Error if a weight is negative or not finite
 */
export function resolveWeights(overrides: Partial<SignalWeights> = {}): SignalWeights {
  const weights: SignalWeights = { ...DEFAULT_SIGNAL_WEIGHTS, ...overrides };

  for (const name of INDICATOR_NAMES) {
    const weight = weights[name];
    if (!Number.isFinite(weight) || weight < 0) {
      throw new Error(`Weight for ${name} must be a non-negative number, got ${weight}`);
    }
  }

  return weights;
}
