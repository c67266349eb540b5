/**
 * Type definitions for the Upbit REST adapter.
 *
 * Raw response shapes follow the Upbit Open API v1. Numeric account and
 * order fields arrive as decimal strings.
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from '@tradeloop/logger';

/**
 * Configuration for creating an Upbit exchange instance.
 *
 * @example
 * ```typescript
 * const config: UpbitExchangeConfig = {
 *   accessKey: process.env.UPBIT_ACCESS_KEY,
 *   secretKey: process.env.UPBIT_SECRET_KEY,
 *   timeoutMs: 10000,
 *   logger: createLogger({ level: 'info' })
 * };
 * ```
 */
export interface UpbitExchangeConfig {
  /**
   * API access key. Account and order calls return null without it.
   */
  accessKey?: string;

  /**
   * API secret key used to sign request tokens.
   */
  secretKey?: string;

  /**
   * Defaults to https://api.upbit.com/v1
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * Defaults to 10000.
   */
  timeoutMs?: number;

  /**
   * Preconfigured HTTP client; replaces baseUrl and timeoutMs.
   */
  httpClient?: AxiosInstance;

  /**
   * If not provided, logging is disabled.
   */
  logger?: Logger;
}

export interface UpbitTicker {
  market: string;
  trade_price: number;
  timestamp: number;
}

export interface UpbitCandle {
  market: string;
  candle_date_time_utc: string;
  opening_price: number;
  high_price: number;
  low_price: number;
  trade_price: number;
  candle_acc_trade_volume: number;
  timestamp: number;
}

export interface UpbitAccount {
  currency: string;
  balance: string;
  locked: string;
  avg_buy_price: string;
  unit_currency: string;
}

export interface UpbitOrder {
  uuid: string;
  side: 'bid' | 'ask';
  ord_type: 'limit' | 'price' | 'market';
  market: string;
  state: string;
  created_at: string;
  price?: string | null;
  volume?: string | null;
  executed_volume?: string;
}

export interface UpbitMarket {
  market: string;
  korean_name: string;
  english_name: string;
}

/**
 * Request parameters, sent as the query string (GET/DELETE) or JSON body (POST).
 */
export type UpbitParams = Record<string, string | number>;
