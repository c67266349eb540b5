/**
 * @fileoverview Tests for the Upbit REST adapter against a stubbed HTTP layer.
 */

import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import jwt from 'jsonwebtoken';
import { CandleInterval } from '@tradeloop/contracts';
import { UpbitExchange } from '../src/upbit-client.js';
import { buildQueryString, hashQuery } from '../src/upbit-auth.js';
import type { UpbitCandle } from '../src/upbit-types.js';

interface StubResponse {
  status: number;
  data: unknown;
}

/**
 * axios instance whose adapter answers from `route` and records every request.
 */
function stubHttp(route: (config: InternalAxiosRequestConfig) => StubResponse) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: 'https://upbit.test/v1',
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = route(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, response);
      }
      return response;
    },
  });
  return { http, requests };
}

function candle(time: string, close: number): UpbitCandle {
  return {
    market: 'KRW-BTC',
    candle_date_time_utc: time,
    opening_price: close - 1,
    high_price: close + 2,
    low_price: close - 2,
    trade_price: close,
    candle_acc_trade_volume: 1.5,
    timestamp: Date.parse(`${time}Z`),
  };
}

function authorization(config: InternalAxiosRequestConfig | undefined): string {
  return String(config?.headers['Authorization']);
}

describe('UpbitExchange market data', () => {
  it('should read the trade price from /ticker', async () => {
    const { http, requests } = stubHttp(() => ({
      status: 200,
      data: [{ market: 'KRW-BTC', trade_price: 51_000_000, timestamp: 0 }],
    }));
    const upbit = new UpbitExchange({ httpClient: http });

    await expect(upbit.getCurrentPrice('KRW-BTC')).resolves.toBe(51_000_000);
    expect(requests[0]?.url).toBe('/ticker');
    expect(requests[0]?.params).toEqual({ markets: 'KRW-BTC' });
    expect(requests[0]?.headers['Authorization']).toBeUndefined();
  });

  it('should return null when the ticker request fails', async () => {
    const { http } = stubHttp(() => ({ status: 500, data: { error: { message: 'server error' } } }));
    const upbit = new UpbitExchange({ httpClient: http });

    await expect(upbit.getCurrentPrice('KRW-BTC')).resolves.toBeNull();
  });

  it('should fetch minute candles and order them oldest first', async () => {
    const { http, requests } = stubHttp(() => ({
      status: 200,
      data: [candle('2025-01-15T00:10:00', 102), candle('2025-01-15T00:05:00', 101), candle('2025-01-15T00:00:00', 100)],
    }));
    const upbit = new UpbitExchange({ httpClient: http });

    const bars = await upbit.getBars('KRW-BTC', CandleInterval.M5, 3);

    expect(requests[0]?.url).toBe('/candles/minutes/5');
    expect(requests[0]?.params).toEqual({ market: 'KRW-BTC', count: 3 });
    expect(bars?.map((bar) => bar.close)).toEqual([100, 101, 102]);
    expect(bars?.[0]).toEqual({
      timestamp: '2025-01-15T00:00:00.000Z',
      open: 99,
      high: 102,
      low: 98,
      close: 100,
      volume: 1.5,
    });
  });

  it('should use the daily endpoint and cap the page size', async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: [] }));
    const upbit = new UpbitExchange({ httpClient: http });

    await expect(upbit.getBars('KRW-ETH', CandleInterval.D1, 500)).resolves.toEqual([]);
    expect(requests[0]?.url).toBe('/candles/days');
    expect(requests[0]?.params).toEqual({ market: 'KRW-ETH', count: 200 });
  });

  it('should list instruments for one quote currency', async () => {
    const { http } = stubHttp(() => ({
      status: 200,
      data: [
        { market: 'KRW-BTC', korean_name: 'b', english_name: 'Bitcoin' },
        { market: 'BTC-ETH', korean_name: 'e', english_name: 'Ethereum' },
        { market: 'KRW-ETH', korean_name: 'e', english_name: 'Ethereum' },
      ],
    }));
    const upbit = new UpbitExchange({ httpClient: http });

    await expect(upbit.listInstruments()).resolves.toEqual(['KRW-BTC', 'KRW-ETH']);
  });
});

describe('UpbitExchange private endpoints', () => {
  const keys = { accessKey: 'test-access', secretKey: 'test-secret' };

  it('should refuse account calls without keys', async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: [] }));
    const upbit = new UpbitExchange({ httpClient: http });

    expect(upbit.isAuthenticated()).toBe(false);
    await expect(upbit.getBalances()).resolves.toBeNull();
    expect(requests).toHaveLength(0);
  });

  it('should parse account rows and sign the request', async () => {
    const { http, requests } = stubHttp(() => ({
      status: 200,
      data: [
        { currency: 'KRW', balance: '1000000.0', locked: '0.0', avg_buy_price: '0', unit_currency: 'KRW' },
        { currency: 'BTC', balance: '0.25', locked: '0.01', avg_buy_price: '48000000', unit_currency: 'KRW' },
      ],
    }));
    const upbit = new UpbitExchange({ ...keys, httpClient: http });

    const balances = await upbit.getBalances();

    expect(balances).toEqual([
      { currency: 'KRW', balance: 1_000_000, locked: 0, avgBuyPrice: 0 },
      { currency: 'BTC', balance: 0.25, locked: 0.01, avgBuyPrice: 48_000_000 },
    ]);

    const token = authorization(requests[0]).replace('Bearer ', '');
    const payload = jwt.verify(token, 'test-secret');
    expect(payload).toMatchObject({ access_key: 'test-access' });
    expect(payload).not.toHaveProperty('query_hash');
  });

  it('should read one currency and default to zero when not held', async () => {
    const { http } = stubHttp(() => ({
      status: 200,
      data: [{ currency: 'KRW', balance: '5000', locked: '0', avg_buy_price: '0', unit_currency: 'KRW' }],
    }));
    const upbit = new UpbitExchange({ ...keys, httpClient: http });

    await expect(upbit.getBalance('KRW')).resolves.toBe(5000);
    await expect(upbit.getBalance('BTC')).resolves.toBe(0);
  });

  it('should submit a market buy by notional with a query hash', async () => {
    const { http, requests } = stubHttp(() => ({
      status: 201,
      data: {
        uuid: 'order-1',
        side: 'bid',
        ord_type: 'price',
        market: 'KRW-BTC',
        state: 'wait',
        created_at: '2025-01-15T09:00:00+09:00',
        price: '10000',
        volume: null,
      },
    }));
    const upbit = new UpbitExchange({ ...keys, httpClient: http });

    const order = await upbit.buyMarket('KRW-BTC', 10_000);

    expect(order).toEqual({
      id: 'order-1',
      instrument: 'KRW-BTC',
      side: 'buy',
      notional: 10_000,
      createdAt: '2025-01-15T00:00:00.000Z',
    });

    const request = requests[0];
    expect(request?.method).toBe('post');
    expect(request?.url).toBe('/orders');
    expect(JSON.parse(String(request?.data))).toEqual({
      market: 'KRW-BTC',
      side: 'bid',
      ord_type: 'price',
      price: '10000',
    });

    const payload = jwt.verify(authorization(request).replace('Bearer ', ''), 'test-secret');
    expect(payload).toMatchObject({
      access_key: 'test-access',
      query_hash: hashQuery('market=KRW-BTC&side=bid&ord_type=price&price=10000'),
      query_hash_alg: 'SHA512',
    });
  });

  it('should submit a market sell by volume', async () => {
    const { http, requests } = stubHttp(() => ({
      status: 201,
      data: {
        uuid: 'order-2',
        side: 'ask',
        ord_type: 'market',
        market: 'KRW-BTC',
        state: 'wait',
        created_at: '2025-01-15T00:00:00Z',
        price: null,
        volume: '0.125',
      },
    }));
    const upbit = new UpbitExchange({ ...keys, httpClient: http });

    const order = await upbit.sellMarket('KRW-BTC', 0.125);

    expect(order?.side).toBe('sell');
    expect(order?.quantity).toBe(0.125);
    expect(order?.notional).toBeUndefined();
    expect(JSON.parse(String(requests[0]?.data))).toEqual({
      market: 'KRW-BTC',
      side: 'ask',
      ord_type: 'market',
      volume: '0.125',
    });
  });

  it('should return null when an order is rejected', async () => {
    const { http } = stubHttp(() => ({
      status: 400,
      data: { error: { name: 'insufficient_funds_bid', message: 'insufficient funds' } },
    }));
    const upbit = new UpbitExchange({ ...keys, httpClient: http });

    await expect(upbit.buyMarket('KRW-BTC', 10_000)).resolves.toBeNull();
  });

  it('should look up and cancel orders by id', async () => {
    const order = {
      uuid: 'order-3',
      side: 'bid',
      ord_type: 'price',
      market: 'KRW-ETH',
      state: 'cancel',
      created_at: '2025-01-15T00:00:00Z',
      price: '20000',
    };
    const { http, requests } = stubHttp(() => ({ status: 200, data: order }));
    const upbit = new UpbitExchange({ ...keys, httpClient: http });

    await expect(upbit.getOrder('order-3')).resolves.toMatchObject({ id: 'order-3', notional: 20_000 });
    await expect(upbit.cancelOrder('order-3')).resolves.toMatchObject({ id: 'order-3' });

    expect(requests.map((r) => [r.method, r.url, r.params])).toEqual([
      ['get', '/order', { uuid: 'order-3' }],
      ['delete', '/order', { uuid: 'order-3' }],
    ]);
    expect(buildQueryString({ uuid: 'order-3' })).toBe('uuid=order-3');
  });
});
