/**
 * @fileoverview Candle interval enumeration and utilities.
 *
 * Defines the candle intervals the exchange can serve. Values are the
 * interval identifiers used in configuration and provider calls
 * (`minute<N>` for intraday, `day` for daily).
 *
 * @module @tradeloop/contracts/intervals
 */

/**
 * Supported candle intervals.
 *
 * @invariant Members are ordered from smallest to largest duration
 */
export enum CandleInterval {
  M1 = 'minute1',
  M3 = 'minute3',
  M5 = 'minute5',
  M10 = 'minute10',
  M15 = 'minute15',
  M30 = 'minute30',
  H1 = 'minute60',
  H4 = 'minute240',
  D1 = 'day',
}

const INTERVAL_MINUTES: Record<CandleInterval, number> = {
  [CandleInterval.M1]: 1,
  [CandleInterval.M3]: 3,
  [CandleInterval.M5]: 5,
  [CandleInterval.M10]: 10,
  [CandleInterval.M15]: 15,
  [CandleInterval.M30]: 30,
  [CandleInterval.H1]: 60,
  [CandleInterval.H4]: 240,
  [CandleInterval.D1]: 1440,
};

const INTERVAL_LABELS: Record<CandleInterval, string> = {
  [CandleInterval.M1]: '1 Minute',
  [CandleInterval.M3]: '3 Minutes',
  [CandleInterval.M5]: '5 Minutes',
  [CandleInterval.M10]: '10 Minutes',
  [CandleInterval.M15]: '15 Minutes',
  [CandleInterval.M30]: '30 Minutes',
  [CandleInterval.H1]: '1 Hour',
  [CandleInterval.H4]: '4 Hours',
  [CandleInterval.D1]: 'Daily',
};

/**
 * Validates whether a string is a valid CandleInterval value.
 *
 * @example
 * ```typescript
 * isValidInterval('minute5')  // true
 * isValidInterval('minute7')  // false
 * ```
 */
export function isValidInterval(value: string): value is CandleInterval {
  return Object.values(CandleInterval).some((interval) => interval === value);
}

/**
 * Converts a CandleInterval to its duration in minutes.
 *
 * @example
 * ```typescript
 * intervalToMinutes(CandleInterval.H1)  // 60
 * intervalToMinutes(CandleInterval.D1)  // 1440
 * ```
 */
export function intervalToMinutes(interval: CandleInterval): number {
  return INTERVAL_MINUTES[interval];
}

/**
 * Gets a human-readable label for an interval.
 */
export function getIntervalLabel(interval: CandleInterval): string {
  return INTERVAL_LABELS[interval];
}

/**
 * Maps a cycle period in minutes to the candle interval of the same length.
 *
 * The bot analyses candles whose width equals its cycle period, so a
 * 5-minute cycle reads `minute5` candles.
 *
 * @throws {Error} If no candle interval has that width
 *
 * @example
 * ```typescript
 * intervalFromMinutes(15)  // CandleInterval.M15
 * intervalFromMinutes(7)   // throws Error
 * ```
 */
export function intervalFromMinutes(minutes: number): CandleInterval {
  const match = getAllIntervals().find((interval) => INTERVAL_MINUTES[interval] === minutes);
  if (!match) {
    const supported = getAllIntervals().map((interval) => INTERVAL_MINUTES[interval]);
    throw new Error(`No candle interval of ${minutes} minutes. Supported: ${supported.join(', ')}`);
  }
  return match;
}

/**
 * Parses a string into a CandleInterval, throwing if invalid.
 *
 * @throws {Error} If value is not a valid interval
 */
export function parseInterval(value: string): CandleInterval {
  if (!isValidInterval(value)) {
    throw new Error(
      `Invalid interval: ${value}. Must be one of: ${Object.values(CandleInterval).join(', ')}`
    );
  }
  return value;
}

/**
 * Returns all supported intervals in ascending order.
 */
export function getAllIntervals(): CandleInterval[] {
  return [
    CandleInterval.M1,
    CandleInterval.M3,
    CandleInterval.M5,
    CandleInterval.M10,
    CandleInterval.M15,
    CandleInterval.M30,
    CandleInterval.H1,
    CandleInterval.H4,
    CandleInterval.D1,
  ];
}
