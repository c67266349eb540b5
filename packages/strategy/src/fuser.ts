/**
 * Signal Fuser
 *
 * Combines the per-indicator signals of each frame row into one weighted
 * sum, discretizes it against a threshold and scores the latest row's
 * confidence.
 *
 * @module @tradeloop/strategy/fuser
 */

import type { FusedSignal, Signal } from '@tradeloop/contracts';
import type { FrameRow, IndicatorFrame } from '@tradeloop/indicators';
import { computeConfidence, type ConfidenceFactors } from './confidence.js';
import { DEFAULT_SIGNAL_WEIGHTS, SIGNAL_THRESHOLD, type SignalWeights } from './weights.js';

/**
 * Fused signal for one frame row.
 */
export interface FusedRow {
  /** Bar index in the input series */
  index: number;
  timestamp: string;
  signal: Signal;
  weightedSum: number;
}

export interface FusionResult {
  rows: FusedRow[];
  /** Decision for the last row; undefined when the frame has no rows */
  latest?: FusedSignal & { factors: ConfidenceFactors; timestamp: string };
}

export interface FuseOptions {
  weights?: SignalWeights;
  threshold?: number;
}

/**
 * Weighted sum of the signals present on `row`, divided by the total
 * weight of those signals. Zero when none are present.
 */
export function weightedSum(row: FrameRow, weights: SignalWeights): number {
  let sum = 0;
  let totalWeight = 0;

  for (const [name, signal] of Object.entries(row.signals)) {
    if (signal === undefined || !isWeighted(name, weights)) continue;
    sum += signal * weights[name];
    totalWeight += weights[name];
  }

  return totalWeight > 0 ? sum / totalWeight : 0;
}

/**
 * +1 above `threshold`, -1 below `-threshold`, otherwise 0.
 */
export function discretize(sum: number, threshold: number = SIGNAL_THRESHOLD): Signal {
  if (sum > threshold) return 1;
  if (sum < -threshold) return -1;
  return 0;
}

/**
 * Fuse every row of `frame`.
 *
 * @example
 * ```typescript
 * const frame = buildFrame(bars, DEFAULT_INDICATOR_CONFIG);
 * const { latest } = fuse(frame);
 * if (latest && latest.signal !== 0 && latest.confidence >= 0.6) {
 *   // act on latest.signal
 * }
 * ```
 */
export function fuse(frame: IndicatorFrame, options: FuseOptions = {}): FusionResult {
  const weights = options.weights ?? DEFAULT_SIGNAL_WEIGHTS;
  const threshold = options.threshold ?? SIGNAL_THRESHOLD;

  const rows: FusedRow[] = frame.rows.map((row) => {
    const sum = weightedSum(row, weights);
    return {
      index: row.index,
      timestamp: row.bar.timestamp,
      signal: discretize(sum, threshold),
      weightedSum: sum,
    };
  });

  const last = rows.at(-1);
  const lastRow = frame.rows.at(-1);
  if (!last || !lastRow) return { rows };

  const { confidence, factors } = computeConfidence(
    lastRow,
    rows.map((row) => row.signal),
    frame.indicators
  );

  return {
    rows,
    latest: {
      signal: last.signal,
      confidence,
      weightedSum: last.weightedSum,
      factors,
      timestamp: last.timestamp,
    },
  };
}

function isWeighted(name: string, weights: SignalWeights): name is keyof SignalWeights {
  return Object.prototype.hasOwnProperty.call(weights, name);
}
