/**
 * @fileoverview Main entry point for @tradeloop/exchange package.
 *
 * Exchange adapters implementing the market data, account and order
 * contracts: the Upbit REST client and an in-memory paper exchange.
 *
 * @module @tradeloop/exchange
 */

export { UpbitExchange, UPBIT_BASE_URL, UPBIT_MAX_CANDLES } from './upbit-client.js';
export { createAuthorization, buildTokenPayload, buildQueryString, hashQuery } from './upbit-auth.js';
export { parseCandles, parseAccount, parseOrder, formatVolume } from './upbit-parse.js';
export { PaperExchange, DEFAULT_PAPER_HISTORY_LIMIT } from './paper-exchange.js';

export type { UpbitTokenPayload } from './upbit-auth.js';
export type {
  UpbitExchangeConfig,
  UpbitTicker,
  UpbitCandle,
  UpbitAccount,
  UpbitOrder,
  UpbitMarket,
  UpbitParams,
} from './upbit-types.js';
export type { PaperExchangeConfig, PaperCall, PaperCallEntry } from './paper-exchange.js';
