/**
 * @fileoverview Main entry point for @tradeloop/indicators package.
 *
 * Pure technical indicators over OHLCV bars and the frame builder that
 * aligns their columns and signals per bar.
 *
 * @module @tradeloop/indicators
 */

export { buildFrame, DEFAULT_INDICATOR_CONFIG } from './frame.js';
export { IndicatorRegistry, createDefaultRegistry } from './registry.js';

export {
  sma,
  rollingStd,
  wilderRsi,
  normalize,
  crossSignal,
  divideSeries,
  emptySeries,
  assertPeriod,
} from './math.js';

export { maCrossoverPlugin, computeMaCrossover } from './plugins/ma-crossover.js';
export { rsiPlugin, computeRsi, RSI_OVERSOLD, RSI_OVERBOUGHT } from './plugins/rsi.js';
export { divergencePlugin, computeDivergence } from './plugins/divergence.js';
export { bollingerPlugin, computeBollinger } from './plugins/bollinger.js';
export { volumePlugin, computeVolume } from './plugins/volume.js';

export type {
  Series,
  SignalSeries,
  ColumnName,
  ColumnSet,
  IndicatorOutput,
  IndicatorConfig,
  IndicatorPlugin,
  FrameRow,
  IndicatorFailure,
  IndicatorFrame,
} from './types.js';
