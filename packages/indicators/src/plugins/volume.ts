/**
 * @fileoverview Volume surge indicator.
 *
 * A surge is a volume ratio (volume / volume SMA) above the threshold.
 * Surge with a higher close is +1, surge with a lower close is -1.
 *
 * @module @tradeloop/indicators/plugins/volume
 */

import type { PriceBar, Signal } from '@tradeloop/contracts';
import type { IndicatorConfig, IndicatorOutput, IndicatorPlugin } from '../types.js';
import { sma } from '../math.js';

export function computeVolume(
  bars: readonly PriceBar[],
  options: Pick<IndicatorConfig['volume'], 'period' | 'surgeThreshold'>
): IndicatorOutput {
  const volumeMa = sma(
    bars.map((bar) => bar.volume),
    options.period
  );

  // An all-zero window has no surge
  const volumeRatio = volumeMa.map((avg, i) => {
    if (avg === undefined) return undefined;
    return avg === 0 ? 0 : (bars[i]?.volume ?? 0) / avg;
  });

  const volumeSurge = volumeRatio.map((ratio) => {
    if (ratio === undefined) return undefined;
    return ratio > options.surgeThreshold ? 1 : 0;
  });

  const signals = bars.map((bar, i): Signal | undefined => {
    const surge = volumeSurge[i];
    const prev = bars[i - 1];
    if (surge === undefined || !prev) return undefined;
    if (surge === 0) return 0;
    if (bar.close > prev.close) return 1;
    if (bar.close < prev.close) return -1;
    return 0;
  });

  return {
    columns: { volumeMa, volumeRatio, volumeSurge },
    signals,
  };
}

export const volumePlugin: IndicatorPlugin = {
  name: 'volume',
  isEnabled: (config) => config.volume.enabled,
  compute: (bars, config) => computeVolume(bars, config.volume),
};
