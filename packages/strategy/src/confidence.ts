/**
 * Confidence scoring for the latest fused signal.
 *
 * Confidence is the mean of the available factors, each in [0, 1]. A
 * factor is available when its indicator ran for this frame.
 *
 * @module @tradeloop/strategy/confidence
 */

import type { IndicatorName, Signal } from '@tradeloop/contracts';
import { normalize, type FrameRow } from '@tradeloop/indicators';

/** Rows before the latest compared for persistence */
export const PERSISTENCE_LOOKBACK = 4;

/** Confidence when no factor is available */
export const DEFAULT_CONFIDENCE = 0.5;

export interface ConfidenceFactors {
  /** Share of the previous rows whose fused signal matches the latest */
  persistence: number;
  /** MA spread relative to price; only on a fresh crossover */
  maStrength?: number;
  /** Narrow bands score high */
  bandwidth?: number;
  /** Room left for the move before RSI reaches neutral */
  rsiDistance?: number;
  /** Volume ratio above average */
  volume?: number;
}

/**
 * Score the last row of a frame.
 *
 * @param latest - Last frame row
 * @param signals - Fused signal of every frame row, oldest first; the last entry belongs to `latest`
 * @param indicators - Indicators that ran for the frame
 */
export function computeConfidence(
  latest: FrameRow,
  signals: readonly Signal[],
  indicators: readonly IndicatorName[]
): { confidence: number; factors: ConfidenceFactors } {
  const current = signals.at(-1) ?? 0;
  const ran = new Set(indicators);

  const factors: ConfidenceFactors = {
    persistence: persistence(signals, current),
  };

  if (ran.has('ma') && latest.signals.ma !== undefined && latest.signals.ma !== 0) {
    if (latest.maShort !== undefined && latest.maLong !== undefined && latest.bar.close !== 0) {
      const spread = Math.abs(latest.maShort - latest.maLong) / latest.bar.close;
      factors.maStrength = normalize(spread, 0.001, 0.05);
    }
  }

  if (ran.has('bollinger') && latest.bbBandwidth !== undefined) {
    factors.bandwidth = 1 - normalize(latest.bbBandwidth, 0.03, 0.15);
  }

  if (ran.has('rsi') && latest.rsi !== undefined) {
    factors.rsiDistance = rsiDistance(latest.rsi, current);
  }

  if (ran.has('volume') && latest.volumeRatio !== undefined) {
    factors.volume = normalize(latest.volumeRatio, 1.0, 3.0);
  }

  const values = Object.values(factors).filter((value): value is number => value !== undefined);
  const confidence =
    values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : DEFAULT_CONFIDENCE;

  return { confidence, factors };
}

/**
 * Matching signals among the rows before the latest, over a fixed
 * denominator; rows missing at the start of the frame count as mismatches.
 */
function persistence(signals: readonly Signal[], current: Signal): number {
  let matches = 0;
  for (let back = 1; back <= PERSISTENCE_LOOKBACK; back++) {
    const index = signals.length - 1 - back;
    if (index < 0) break;
    if (signals[index] === current) matches++;
  }
  return matches / PERSISTENCE_LOOKBACK;
}

/**
 * Buys score high near oversold, sells near overbought, flat is neutral.
 */
function rsiDistance(rsi: number, signal: Signal): number {
  if (signal > 0) return 1 - normalize(rsi, 30, 50);
  if (signal < 0) return normalize(rsi, 50, 70);
  return 0.5;
}
