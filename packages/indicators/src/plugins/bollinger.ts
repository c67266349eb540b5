/**
 * @fileoverview Bollinger band indicator.
 *
 * Touch-and-bounce signals:
 * - +1: previous close at or below the previous lower band, current close
 *   back above the lower band and above the previous close
 * - -1: the mirror case on the upper band
 *
 * @module @tradeloop/indicators/plugins/bollinger
 */

import type { PriceBar, Signal } from '@tradeloop/contracts';
import type { IndicatorConfig, IndicatorOutput, IndicatorPlugin } from '../types.js';
import { divideSeries, rollingStd, sma } from '../math.js';

export function computeBollinger(
  bars: readonly PriceBar[],
  options: Pick<IndicatorConfig['bollinger'], 'period' | 'stdDev'>
): IndicatorOutput {
  const closes = bars.map((bar) => bar.close);
  const bbMiddle = sma(closes, options.period);
  const std = rollingStd(closes, options.period);

  const bbUpper = bbMiddle.map((mid, i) => {
    const s = std[i];
    return mid === undefined || s === undefined ? undefined : mid + s * options.stdDev;
  });
  const bbLower = bbMiddle.map((mid, i) => {
    const s = std[i];
    return mid === undefined || s === undefined ? undefined : mid - s * options.stdDev;
  });
  const width = bbUpper.map((upper, i) => {
    const lower = bbLower[i];
    return upper === undefined || lower === undefined ? undefined : upper - lower;
  });
  const bbBandwidth = divideSeries(width, bbMiddle);

  const signals = bars.map((bar, i): Signal | undefined => {
    if (i === 0) return undefined;
    const prevClose = closes[i - 1];
    const prevLower = bbLower[i - 1];
    const prevUpper = bbUpper[i - 1];
    const lower = bbLower[i];
    const upper = bbUpper[i];
    if (
      prevClose === undefined ||
      prevLower === undefined ||
      prevUpper === undefined ||
      lower === undefined ||
      upper === undefined
    ) {
      return undefined;
    }

    if (prevClose <= prevLower && bar.close > lower && bar.close > prevClose) return 1;
    if (prevClose >= prevUpper && bar.close < upper && bar.close < prevClose) return -1;
    return 0;
  });

  return {
    columns: { bbMiddle, bbUpper, bbLower, bbBandwidth },
    signals,
  };
}

export const bollingerPlugin: IndicatorPlugin = {
  name: 'bollinger',
  isEnabled: (config) => config.bollinger.enabled,
  compute: (bars, config) => computeBollinger(bars, config.bollinger),
};
