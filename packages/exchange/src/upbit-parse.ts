/**
 * Conversion of Upbit responses into contract types.
 */

import type { Balance, Order, PriceBar } from '@tradeloop/contracts';
import type { UpbitAccount, UpbitCandle, UpbitOrder } from './upbit-types.js';

/**
 * Upbit returns candles newest first with UTC times lacking a zone suffix.
 * Output is oldest first with ISO 8601 timestamps.
 */
export function parseCandles(candles: readonly UpbitCandle[]): PriceBar[] {
  return candles
    .map((candle) => ({
      timestamp: new Date(`${candle.candle_date_time_utc}Z`).toISOString(),
      open: candle.opening_price,
      high: candle.high_price,
      low: candle.low_price,
      close: candle.trade_price,
      volume: candle.candle_acc_trade_volume,
    }))
    .reverse();
}

export function parseAccount(account: UpbitAccount): Balance {
  return {
    currency: account.currency,
    balance: Number(account.balance),
    locked: Number(account.locked),
    avgBuyPrice: Number(account.avg_buy_price),
  };
}

export function parseOrder(order: UpbitOrder): Order {
  const parsed: Order = {
    id: order.uuid,
    instrument: order.market,
    side: order.side === 'bid' ? 'buy' : 'sell',
    createdAt: new Date(order.created_at).toISOString(),
  };
  if (order.ord_type === 'price' && order.price) parsed.notional = Number(order.price);
  if (order.volume) parsed.quantity = Number(order.volume);
  return parsed;
}

/**
 * Decimal string for an order volume: at most 8 places, no exponent.
 *
 * @example
 * ```typescript
 * formatVolume(0.5);      // '0.5'
 * formatVolume(1e-7);     // '0.0000001'
 * formatVolume(3);        // '3'
 * ```
 */
export function formatVolume(quantity: number): string {
  return quantity.toFixed(8).replace(/\.?0+$/, '');
}
