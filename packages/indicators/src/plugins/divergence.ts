/**
 * @fileoverview RSI divergence indicator.
 *
 * Compares each bar with the bar `window` positions earlier:
 * - Bullish (+1): lower close but higher RSI
 * - Bearish (-1): higher close but lower RSI
 *
 * Evaluated at every bar, not only the latest.
 *
 * @module @tradeloop/indicators/plugins/divergence
 */

import type { PriceBar, Signal } from '@tradeloop/contracts';
import { ComputationError } from '@tradeloop/contracts';
import type { IndicatorOutput, IndicatorPlugin, Series } from '../types.js';
import { assertPeriod } from '../math.js';

export function computeDivergence(
  bars: readonly PriceBar[],
  rsi: Series,
  window: number
): IndicatorOutput {
  assertPeriod('divergence', window);

  const signals = bars.map((bar, i): Signal | undefined => {
    if (i < window) return undefined;
    const past = bars[i - window];
    const rsiNow = rsi[i];
    const rsiPast = rsi[i - window];
    if (!past || rsiNow === undefined || rsiPast === undefined) return undefined;

    if (bar.close < past.close && rsiNow > rsiPast) return 1;
    if (bar.close > past.close && rsiNow < rsiPast) return -1;
    return 0;
  });

  return { columns: {}, signals };
}

export const divergencePlugin: IndicatorPlugin = {
  name: 'divergence',
  requires: ['rsi'],
  isEnabled: (config) => config.rsi.enabled && config.rsi.useDivergence,
  compute: (bars, config, computed) => {
    const rsi = computed.rsi;
    if (!rsi) {
      throw new ComputationError('divergence: RSI column has not been computed', {
        stage: 'divergence',
      });
    }
    return computeDivergence(bars, rsi, config.rsi.divergenceWindow);
  },
};
