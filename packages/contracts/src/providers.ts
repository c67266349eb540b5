/**
 * @fileoverview Collaborator contracts consumed by the trading core.
 *
 * Every query may resolve to `null` on failure. A `null` is a soft failure
 * (DataUnavailable / OrderRejected); implementations must not let exceptions
 * escape into the core.
 *
 * @module @tradeloop/contracts/providers
 */

import type { CandleInterval } from './intervals.js';
import type { Balance, Order, PriceBar } from './market.js';

/**
 * Price and candle queries.
 */
export interface MarketDataProvider {
  /** Last traded price, or null when unavailable */
  getCurrentPrice(instrument: string): Promise<number | null>;

  /** Up to `count` bars ordered oldest first, or null when unavailable */
  getBars(instrument: string, interval: CandleInterval, count: number): Promise<PriceBar[] | null>;
}

/**
 * Account balance queries.
 */
export interface AccountProvider {
  /** Available balance of one currency (0 when not held), or null on failure */
  getBalance(currency: string): Promise<number | null>;

  /** Every account row, or null on failure */
  getBalances(): Promise<Balance[] | null>;
}

/**
 * Market order submission.
 */
export interface OrderProvider {
  /** Market buy spending `notional` quote currency; null means rejected */
  buyMarket(instrument: string, notional: number): Promise<Order | null>;

  /** Market sell of `quantity` base currency; null means rejected */
  sellMarket(instrument: string, quantity: number): Promise<Order | null>;
}

/**
 * A venue that serves all three contracts.
 */
export interface Exchange extends MarketDataProvider, AccountProvider, OrderProvider {
  readonly id: string;
}
