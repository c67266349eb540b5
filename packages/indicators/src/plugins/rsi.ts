/**
 * @fileoverview RSI indicator.
 *
 * +1 when RSI recovers from oversold (prev < 30, current >= 30),
 * -1 when it falls back from overbought (prev > 70, current <= 70).
 *
 * @module @tradeloop/indicators/plugins/rsi
 */

import type { PriceBar, Signal } from '@tradeloop/contracts';
import type { IndicatorOutput, IndicatorPlugin } from '../types.js';
import { wilderRsi } from '../math.js';

export const RSI_OVERSOLD = 30;
export const RSI_OVERBOUGHT = 70;

export function computeRsi(bars: readonly PriceBar[], period: number): IndicatorOutput {
  const rsi = wilderRsi(
    bars.map((bar) => bar.close),
    period
  );

  const signals = rsi.map((current, i): Signal | undefined => {
    const prev = i > 0 ? rsi[i - 1] : undefined;
    if (current === undefined || prev === undefined) return undefined;
    if (prev < RSI_OVERSOLD && current >= RSI_OVERSOLD) return 1;
    if (prev > RSI_OVERBOUGHT && current <= RSI_OVERBOUGHT) return -1;
    return 0;
  });

  return { columns: { rsi }, signals };
}

export const rsiPlugin: IndicatorPlugin = {
  name: 'rsi',
  isEnabled: (config) => config.rsi.enabled,
  compute: (bars, config) => computeRsi(bars, config.rsi.period),
};
