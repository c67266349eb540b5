/**
 * @fileoverview Indicator engine types.
 * @module @tradeloop/indicators/types
 */

import type { IndicatorName, PriceBar, Signal } from '@tradeloop/contracts';

/**
 * Per-bar numeric series aligned with the input bars.
 * `undefined` marks bars inside the warm-up window.
 */
export type Series = ReadonlyArray<number | undefined>;

/**
 * Per-bar indicator signal aligned with the input bars.
 */
export type SignalSeries = ReadonlyArray<Signal | undefined>;

/**
 * Feature columns an indicator may produce.
 */
export type ColumnName =
  | 'maShort'
  | 'maLong'
  | 'maTrend'
  | 'trendDirection'
  | 'rsi'
  | 'bbMiddle'
  | 'bbUpper'
  | 'bbLower'
  | 'bbBandwidth'
  | 'volumeMa'
  | 'volumeRatio'
  | 'volumeSurge';

export type ColumnSet = Partial<Record<ColumnName, Series>>;

/**
 * Output of one indicator over a bar sequence.
 */
export interface IndicatorOutput {
  columns: ColumnSet;
  signals: SignalSeries;
}

/**
 * Indicator parameters. Each block is enabled independently.
 */
export interface IndicatorConfig {
  maCrossover: {
    enabled: boolean;
    shortPeriod: number;
    longPeriod: number;
    trendPeriod: number;
  };
  rsi: {
    enabled: boolean;
    period: number;
    useDivergence: boolean;
    divergenceWindow: number;
  };
  bollinger: {
    enabled: boolean;
    period: number;
    stdDev: number;
  };
  volume: {
    enabled: boolean;
    period: number;
    surgeThreshold: number;
  };
}

/**
 * A pure indicator registered with the engine.
 *
 * `compute` receives the columns of every indicator that ran before it, so a
 * plugin listed in `requires` can read its dependency's output.
 */
export interface IndicatorPlugin {
  readonly name: IndicatorName;
  readonly requires?: readonly IndicatorName[];
  isEnabled(config: IndicatorConfig): boolean;
  compute(bars: readonly PriceBar[], config: IndicatorConfig, computed: ColumnSet): IndicatorOutput;
}

/**
 * One surviving row of the indicator frame.
 */
export interface FrameRow {
  bar: PriceBar;
  /** Index of the bar in the input sequence */
  index: number;
  maShort?: number;
  maLong?: number;
  maTrend?: number;
  trendDirection?: 1 | -1;
  rsi?: number;
  bbMiddle?: number;
  bbUpper?: number;
  bbLower?: number;
  bbBandwidth?: number;
  volumeMa?: number;
  volumeRatio?: number;
  volumeSurge?: boolean;
  signals: Partial<Record<IndicatorName, Signal>>;
}

/**
 * Indicator failure captured while building a frame.
 */
export interface IndicatorFailure {
  indicator: IndicatorName;
  reason: string;
}

/**
 * Result of running every enabled indicator over a bar sequence.
 *
 * `rows` holds only bars where every computed column and signal is defined.
 */
export interface IndicatorFrame {
  rows: FrameRow[];
  /** Indicators that ran successfully, in fusion order */
  indicators: IndicatorName[];
  failures: IndicatorFailure[];
}
