/**
 * @fileoverview Market and account data types.
 *
 * Provider-agnostic shapes for OHLCV bars, account balances and market
 * orders. All types are pure data structures with no I/O or business logic.
 *
 * @module @tradeloop/contracts/market
 */

/**
 * A single OHLCV (Open, High, Low, Close, Volume) bar with timestamp.
 *
 * Immutable once fetched. Sequences of bars are always ordered oldest first.
 *
 * @invariant high >= low
 * @invariant volume >= 0
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   timestamp: '2025-01-15T14:30:00.000Z',
 *   open: 100.5,
 *   high: 101.25,
 *   low: 100.0,
 *   close: 101.0,
 *   volume: 15.2
 * };
 * ```
 */
export interface PriceBar {
  /** ISO 8601 timestamp of bar open (UTC) */
  readonly timestamp: string;

  /** Opening price for the period */
  readonly open: number;

  /** Highest price during the period */
  readonly high: number;

  /** Lowest price during the period */
  readonly low: number;

  /** Closing price for the period */
  readonly close: number;

  /** Traded volume during the period (base units) */
  readonly volume: number;
}

/**
 * One row of the exchange account listing.
 */
export interface Balance {
  /** Currency code, e.g. 'BTC' or 'KRW' */
  currency: string;

  /** Freely available amount */
  balance: number;

  /** Amount locked in open orders */
  locked: number;

  /** Average purchase price reported by the exchange (0 when unknown) */
  avgBuyPrice: number;
}

export type OrderSide = 'buy' | 'sell';

/**
 * Acknowledgement of a submitted market order.
 *
 * Buy orders are sized by notional (quote currency); sell orders by quantity.
 */
export interface Order {
  /** Exchange-assigned order identifier */
  id: string;

  /** Instrument identifier, e.g. 'KRW-BTC' */
  instrument: string;

  side: OrderSide;

  /** Quote-currency amount spent (market buys) */
  notional?: number;

  /** Base-currency quantity sold (market sells) */
  quantity?: number;

  /** ISO 8601 creation time */
  createdAt: string;
}

/**
 * Splits an instrument identifier into quote and base currency.
 *
 * Instruments follow the `QUOTE-BASE` convention ('KRW-BTC' trades BTC
 * against KRW).
 *
 * @throws {Error} If the identifier is not in `QUOTE-BASE` form
 *
 * @example
 * ```typescript
 * parseInstrument('KRW-BTC') // { quote: 'KRW', base: 'BTC' }
 * ```
 */
export function parseInstrument(instrument: string): { quote: string; base: string } {
  const [quote, base, ...rest] = instrument.split('-');
  if (!quote || !base || rest.length > 0) {
    throw new Error(`Invalid instrument: ${instrument}. Expected QUOTE-BASE, e.g. KRW-BTC`);
  }
  return { quote, base };
}

/**
 * Builds the instrument identifier for a held currency.
 */
export function toInstrument(quote: string, base: string): string {
  return `${quote}-${base}`;
}
