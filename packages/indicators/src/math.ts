/**
 * @fileoverview Rolling-window numeric helpers.
 * @module @tradeloop/indicators/math
 */

import { ComputationError, type Signal } from '@tradeloop/contracts';
import type { Series } from './types.js';

/**
 * Throws a ComputationError unless `period` is an integer >= `min`.
 */
export function assertPeriod(stage: string, period: number, min: number = 1): void {
  if (!Number.isInteger(period) || period < min) {
    throw new ComputationError(`${stage}: period must be an integer >= ${min}, got ${period}`, {
      stage,
      period,
    });
  }
}

/**
 * A series of `length` undefined entries.
 */
export function emptySeries(length: number): Array<number | undefined> {
  return Array.from({ length }, (): number | undefined => undefined);
}

/**
 * Simple moving average. The first `period - 1` entries are undefined.
 *
 * @example
 * ```typescript
 * sma([1, 2, 3, 4], 2) // [undefined, 1.5, 2.5, 3.5]
 * ```
 */
export function sma(values: readonly number[], period: number): Series {
  assertPeriod('sma', period);
  const out = emptySeries(values.length);

  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i] ?? 0;
    if (i >= period) {
      sum -= values[i - period] ?? 0;
    }
    if (i >= period - 1) {
      out[i] = sum / period;
    }
  }

  return out;
}

/**
 * Rolling sample standard deviation (n - 1 denominator).
 */
export function rollingStd(values: readonly number[], period: number): Series {
  assertPeriod('rollingStd', period, 2);
  const out = emptySeries(values.length);

  for (let i = period - 1; i < values.length; i++) {
    const window = values.slice(i - period + 1, i + 1);
    const mean = window.reduce((acc, v) => acc + v, 0) / period;
    const squares = window.reduce((acc, v) => acc + (v - mean) ** 2, 0);
    out[i] = Math.sqrt(squares / (period - 1));
  }

  return out;
}

/**
 * Wilder RSI.
 *
 * Seeds the average gain and loss with the simple mean of the first `period`
 * changes, then applies Wilder smoothing. The first defined value is at
 * index `period`. RSI is 100 whenever the average loss is 0.
 */
export function wilderRsi(closes: readonly number[], period: number): Series {
  assertPeriod('rsi', period);
  const out = emptySeries(closes.length);
  if (closes.length <= period) return out;

  let avgGain = 0;
  let avgLoss = 0;

  for (let i = 1; i < closes.length; i++) {
    const change = (closes[i] ?? 0) - (closes[i - 1] ?? 0);
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;

    if (i <= period) {
      avgGain += gain / period;
      avgLoss += loss / period;
      if (i < period) continue;
    } else {
      avgGain = (avgGain * (period - 1) + gain) / period;
      avgLoss = (avgLoss * (period - 1) + loss) / period;
    }

    out[i] = avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss);
  }

  return out;
}

/**
 * Normalize a value to 0-1 range.
 */
export function normalize(value: number, min: number, max: number): number {
  if (max === min) return 0;
  return Math.max(0, Math.min(1, (value - min) / (max - min)));
}

/**
 * Crossover of series `a` over series `b` between two bars.
 *
 * +1 when a crosses above b, -1 when it crosses below, 0 otherwise.
 * Undefined if any of the four inputs is undefined.
 */
export function crossSignal(
  prevA: number | undefined,
  prevB: number | undefined,
  a: number | undefined,
  b: number | undefined
): Signal | undefined {
  if (prevA === undefined || prevB === undefined || a === undefined || b === undefined) {
    return undefined;
  }
  if (prevA <= prevB && a > b) return 1;
  if (prevA >= prevB && a < b) return -1;
  return 0;
}

/**
 * Element-wise division; undefined where either side is undefined or the
 * divisor is zero.
 */
export function divideSeries(numerator: Series, denominator: Series): Series {
  return numerator.map((n, i) => {
    const d = denominator[i];
    if (n === undefined || d === undefined || d === 0) return undefined;
    return n / d;
  });
}
