/**
 * @fileoverview Tests for rolling-window numeric helpers.
 */

import { describe, it, expect } from 'vitest';
import { isComputationError } from '@tradeloop/contracts';
import {
  sma,
  rollingStd,
  wilderRsi,
  normalize,
  crossSignal,
  divideSeries,
} from '../src/math.js';

describe('sma', () => {
  it('should leave the warm-up window undefined', () => {
    expect(sma([1, 2, 3, 4], 2)).toEqual([undefined, 1.5, 2.5, 3.5]);
  });

  it('should return all undefined for a series shorter than the period', () => {
    expect(sma([1, 2], 3)).toEqual([undefined, undefined]);
  });

  it('should reject non-positive periods with a ComputationError', () => {
    let caught: unknown;
    try {
      sma([1, 2, 3], 0);
    } catch (error) {
      caught = error;
    }
    expect(isComputationError(caught)).toBe(true);
  });
});

describe('rollingStd', () => {
  it('should use the sample (n - 1) standard deviation', () => {
    const result = rollingStd([2, 4, 4, 4, 5, 5, 7, 9], 8);

    expect(result.slice(0, 7).every((v) => v === undefined)).toBe(true);
    expect(result[7]).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it('should require at least two values per window', () => {
    expect(() => rollingStd([1, 2, 3], 1)).toThrow('rollingStd: period must be an integer >= 2');
  });
});

describe('wilderRsi', () => {
  it('should seed with the mean change then smooth', () => {
    const result = wilderRsi([10, 11, 10, 11], 2);

    expect(result[0]).toBeUndefined();
    expect(result[1]).toBeUndefined();
    expect(result[2]).toBeCloseTo(50, 10);
    expect(result[3]).toBeCloseTo(75, 10);
  });

  it('should be 100 when there are no losses', () => {
    const closes = Array.from({ length: 20 }, (_, i) => i + 1);
    const result = wilderRsi(closes, 14);

    expect(result[13]).toBeUndefined();
    expect(result.slice(14)).toEqual([100, 100, 100, 100, 100, 100]);
  });

  it('should be all undefined when the series is not longer than the period', () => {
    expect(wilderRsi([1, 2, 3], 3)).toEqual([undefined, undefined, undefined]);
  });
});

describe('normalize', () => {
  it('should map linearly and clamp to [0, 1]', () => {
    expect(normalize(5, 0, 10)).toBe(0.5);
    expect(normalize(-1, 0, 10)).toBe(0);
    expect(normalize(20, 0, 10)).toBe(1);
  });

  it('should return 0 for an empty range', () => {
    expect(normalize(3, 2, 2)).toBe(0);
  });
});

describe('crossSignal', () => {
  it('should detect crosses in both directions', () => {
    expect(crossSignal(1, 2, 3, 2)).toBe(1);
    expect(crossSignal(2, 1, 1, 2)).toBe(-1);
  });

  it('should be 0 when the lines only touch', () => {
    expect(crossSignal(1, 1, 2, 2)).toBe(0);
  });

  it('should be undefined when any input is missing', () => {
    expect(crossSignal(undefined, 2, 3, 2)).toBeUndefined();
    expect(crossSignal(1, 2, 3, undefined)).toBeUndefined();
  });
});

describe('divideSeries', () => {
  it('should skip undefined entries and zero divisors', () => {
    expect(divideSeries([4, undefined, 6, 1], [2, 2, 0, 4])).toEqual([2, undefined, undefined, 0.25]);
  });
});
