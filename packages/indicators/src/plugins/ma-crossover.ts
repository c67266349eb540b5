/**
 * @fileoverview Moving-average crossover indicator.
 *
 * Short and long SMAs produce a golden-cross (+1) / dead-cross (-1) signal.
 * A third, slower SMA gives the trend direction: +1 when close is above it.
 *
 * @module @tradeloop/indicators/plugins/ma-crossover
 */

import type { PriceBar } from '@tradeloop/contracts';
import { ComputationError } from '@tradeloop/contracts';
import type { IndicatorConfig, IndicatorOutput, IndicatorPlugin } from '../types.js';
import { crossSignal, sma } from '../math.js';

export function computeMaCrossover(
  bars: readonly PriceBar[],
  options: IndicatorConfig['maCrossover']
): IndicatorOutput {
  const { shortPeriod, longPeriod, trendPeriod } = options;
  if (shortPeriod >= longPeriod) {
    throw new ComputationError(
      `ma: short period (${shortPeriod}) must be below long period (${longPeriod})`,
      { stage: 'ma', shortPeriod, longPeriod }
    );
  }

  const closes = bars.map((bar) => bar.close);
  const maShort = sma(closes, shortPeriod);
  const maLong = sma(closes, longPeriod);
  const maTrend = sma(closes, trendPeriod);

  const trendDirection = maTrend.map((trend, i) => {
    if (trend === undefined) return undefined;
    return (closes[i] ?? 0) > trend ? 1 : -1;
  });

  const signals = bars.map((_, i) =>
    i === 0 ? undefined : crossSignal(maShort[i - 1], maLong[i - 1], maShort[i], maLong[i])
  );

  return {
    columns: { maShort, maLong, maTrend, trendDirection },
    signals,
  };
}

export const maCrossoverPlugin: IndicatorPlugin = {
  name: 'ma',
  isEnabled: (config) => config.maCrossover.enabled,
  compute: (bars, config) => computeMaCrossover(bars, config.maCrossover),
};
