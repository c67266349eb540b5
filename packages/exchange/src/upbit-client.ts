/**
 * Upbit REST exchange adapter.
 *
 * Implements the market data, account and order contracts against the
 * Upbit Open API. Every failure is logged and surfaces as `null`; nothing
 * thrown here reaches the trading core.
 */

import axios, { type AxiosInstance, type Method } from 'axios';
import {
  ExchangeApiError,
  errorFields,
  errorMessage,
  intervalToMinutes,
  CandleInterval,
  type Balance,
  type Exchange,
  type Order,
  type PriceBar,
} from '@tradeloop/contracts';
import { createLogger, type Logger } from '@tradeloop/logger';
import { createAuthorization } from './upbit-auth.js';
import { formatVolume, parseAccount, parseCandles, parseOrder } from './upbit-parse.js';
import type {
  UpbitAccount,
  UpbitCandle,
  UpbitExchangeConfig,
  UpbitMarket,
  UpbitOrder,
  UpbitParams,
  UpbitTicker,
} from './upbit-types.js';

export const UPBIT_BASE_URL = 'https://api.upbit.com/v1';

/** Largest candle page the API serves */
export const UPBIT_MAX_CANDLES = 200;

interface RequestOptions {
  params?: UpbitParams;
  auth?: boolean;
}

/**
 * @example
 * ```typescript
 * const upbit = new UpbitExchange({ accessKey, secretKey, logger });
 * const price = await upbit.getCurrentPrice('KRW-BTC');
 * const bars = await upbit.getBars('KRW-BTC', CandleInterval.M5, 200);
 * ```
 */
export class UpbitExchange implements Exchange {
  readonly id = 'upbit';

  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly accessKey?: string;
  private readonly secretKey?: string;

  constructor(config: UpbitExchangeConfig = {}) {
    this.http =
      config.httpClient ??
      axios.create({
        baseURL: config.baseUrl ?? UPBIT_BASE_URL,
        timeout: config.timeoutMs ?? 10_000,
        headers: { Accept: 'application/json' },
      });
    this.logger = (config.logger ?? createLogger({ level: 'error', silent: true })).child({
      component: 'upbit',
    });
    this.accessKey = config.accessKey;
    this.secretKey = config.secretKey;

    if (!this.isAuthenticated()) {
      this.logger.warn('Upbit keys not provided, account and order calls are disabled');
    }
  }

  isAuthenticated(): boolean {
    return Boolean(this.accessKey && this.secretKey);
  }

  async getCurrentPrice(instrument: string): Promise<number | null> {
    const tickers = await this.call<UpbitTicker[]>('GET', '/ticker', { params: { markets: instrument } });
    const ticker = tickers?.find((t) => t.market === instrument);
    if (!ticker) {
      if (tickers) this.logger.warn('Ticker missing from response', { instrument });
      return null;
    }
    return ticker.trade_price;
  }

  async getBars(instrument: string, interval: CandleInterval, count: number): Promise<PriceBar[] | null> {
    const endpoint =
      interval === CandleInterval.D1 ? '/candles/days' : `/candles/minutes/${intervalToMinutes(interval)}`;
    const candles = await this.call<UpbitCandle[]>('GET', endpoint, {
      params: { market: instrument, count: Math.min(count, UPBIT_MAX_CANDLES) },
    });
    if (!candles) return null;
    return parseCandles(candles);
  }

  async getBalance(currency: string): Promise<number | null> {
    const balances = await this.getBalances();
    if (!balances) return null;
    return balances.find((b) => b.currency === currency)?.balance ?? 0;
  }

  async getBalances(): Promise<Balance[] | null> {
    const accounts = await this.call<UpbitAccount[]>('GET', '/accounts', { auth: true });
    return accounts ? accounts.map(parseAccount) : null;
  }

  async buyMarket(instrument: string, notional: number): Promise<Order | null> {
    const order = await this.call<UpbitOrder>('POST', '/orders', {
      auth: true,
      params: { market: instrument, side: 'bid', ord_type: 'price', price: String(notional) },
    });
    if (!order) return null;
    this.logger.info('Market buy submitted', { instrument, notional, order_id: order.uuid });
    return parseOrder(order);
  }

  async sellMarket(instrument: string, quantity: number): Promise<Order | null> {
    const order = await this.call<UpbitOrder>('POST', '/orders', {
      auth: true,
      params: { market: instrument, side: 'ask', ord_type: 'market', volume: formatVolume(quantity) },
    });
    if (!order) return null;
    this.logger.info('Market sell submitted', { instrument, quantity, order_id: order.uuid });
    return parseOrder(order);
  }

  async getOrder(id: string): Promise<Order | null> {
    const order = await this.call<UpbitOrder>('GET', '/order', { auth: true, params: { uuid: id } });
    return order ? parseOrder(order) : null;
  }

  async cancelOrder(id: string): Promise<Order | null> {
    const order = await this.call<UpbitOrder>('DELETE', '/order', { auth: true, params: { uuid: id } });
    return order ? parseOrder(order) : null;
  }

  /**
   * Instruments quoted in `quote`, e.g. every 'KRW-*' market.
   */
  async listInstruments(quote = 'KRW'): Promise<string[] | null> {
    const markets = await this.call<UpbitMarket[]>('GET', '/market/all');
    if (!markets) return null;
    return markets.map((m) => m.market).filter((market) => market.startsWith(`${quote}-`));
  }

  /**
   * Run a request, logging and swallowing into null any failure.
   */
  private async call<T>(method: Method, endpoint: string, options: RequestOptions = {}): Promise<T | null> {
    try {
      return await this.request<T>(method, endpoint, options);
    } catch (err) {
      const error =
        err instanceof ExchangeApiError
          ? err
          : new ExchangeApiError(errorMessage(err), { exchange: this.id, endpoint });
      this.logger.error(`Upbit request failed: ${error.message}`, { ...errorFields(error), method });
      return null;
    }
  }

  /**
   * @throws {ExchangeApiError} On missing credentials, HTTP errors or network failures
   */
  private async request<T>(method: Method, endpoint: string, options: RequestOptions): Promise<T> {
    const { params, auth = false } = options;
    const headers: Record<string, string> = {};

    if (auth) {
      if (!this.accessKey || !this.secretKey) {
        throw new ExchangeApiError('API keys are required for this endpoint', {
          exchange: this.id,
          endpoint,
        });
      }
      headers['Authorization'] = createAuthorization(this.accessKey, this.secretKey, params);
    }

    const isBodyRequest = method === 'POST' || method === 'post';

    try {
      const response = await this.http.request<T>({
        method,
        url: endpoint,
        headers,
        params: isBodyRequest ? undefined : params,
        data: isBodyRequest ? params : undefined,
      });
      return response.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        throw new ExchangeApiError(describeAxiosError(err.message, err.response?.data), {
          exchange: this.id,
          endpoint,
          status: err.response?.status,
        });
      }
      throw err;
    }
  }
}

/**
 * Prefer the API's own error message (`{ error: { name, message } }`).
 */
function describeAxiosError(fallback: string, body: unknown): string {
  if (typeof body === 'object' && body !== null && 'error' in body) {
    const { error } = body;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  return fallback;
}
