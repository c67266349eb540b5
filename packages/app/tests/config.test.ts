/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { CandleInterval, isConfigurationError } from '@tradeloop/contracts';
import { DEFAULT_INDICATOR_CONFIG } from '@tradeloop/indicators';
import {
  candleIntervalOf,
  indicatorConfigOf,
  loadConfig,
  parseConfig,
  riskConfigOf,
  tradingLimitsOf,
} from '../src/config/index.js';

const CONFIG_PATH = fileURLToPath(new URL('../../../config/config.json', import.meta.url));

const minimal = { trading: { markets: ['KRW-BTC'] } };

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

function issuesOf(fn: () => unknown): unknown {
  const err = captureError(fn);
  if (!isConfigurationError(err)) throw err;
  return err.data?.['issues'];
}

describe('loadConfig', () => {
  it('should load the bundled configuration file', () => {
    const config = loadConfig(CONFIG_PATH, {});

    expect(config.trading.markets).toEqual(['KRW-BTC', 'KRW-ETH', 'KRW-XRP']);
    expect(config.trading.interval).toBe(5);
    expect(config.risk_management.stop_loss).toBe(0.03);
    expect(config.notification.discord.enabled).toBe(false);
  });

  it('should report an unreadable file as a configuration error', () => {
    const err = captureError(() => loadConfig('/nonexistent/config.json', {}));

    expect(isConfigurationError(err)).toBe(true);
    expect(err).toMatchObject({ code: 'CONFIGURATION_ERROR', data: { path: '/nonexistent/config.json' } });
  });
});

describe('parseConfig', () => {
  it('should fill in defaults around the markets list', () => {
    const config = parseConfig(minimal);

    expect(config.trading).toEqual({
      markets: ['KRW-BTC'],
      interval: 5,
      trade_amount: 10000,
      max_invest_ratio: 0.2,
      quote_currency: 'KRW',
      min_order_notional: 5000,
      candle_count: 100,
      throttle_ms: 500,
      portfolio_report_minutes: 15,
    });
    expect(config.risk_management).toEqual({
      stop_loss: 0.03,
      take_profit: 0.05,
      trailing_stop: 0.02,
      use_trailing_stop: true,
      take_profit_sell_ratio: 0.5,
      rebalance_settle_ms: 1000,
    });
    expect(config.exchange.type).toBe('upbit');
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
  });

  it('should reject a missing markets list', () => {
    expect(issuesOf(() => parseConfig({ trading: {} }))).toEqual(['trading.markets: Required']);
  });

  it('should reject an empty markets list', () => {
    expect(issuesOf(() => parseConfig({ trading: { markets: [] } }))).toEqual([
      'trading.markets: at least one market is required',
    ]);
  });

  it('should reject a malformed market code', () => {
    expect(issuesOf(() => parseConfig({ trading: { markets: ['btc'] } }))).toEqual([
      'trading.markets.0: market must look like KRW-BTC',
    ]);
  });

  it('should reject a cycle interval with no matching candle width', () => {
    expect(issuesOf(() => parseConfig({ trading: { markets: ['KRW-BTC'], interval: 7 } }))).toEqual([
      'trading.interval: interval must be one of 1, 3, 5, 10, 15, 30, 60, 240 minutes',
    ]);
  });

  it('should reject a short moving average that is not shorter than the long one', () => {
    const raw = { ...minimal, strategy: { ma_crossover: { short_period: 30 } } };

    expect(issuesOf(() => parseConfig(raw))).toEqual([
      'strategy.ma_crossover: short_period must be below long_period',
    ]);
  });

  it('should require a webhook URL when Discord is enabled', () => {
    const raw = { ...minimal, notification: { discord: { enabled: true } } };

    expect(issuesOf(() => parseConfig(raw))).toEqual([
      'notification.discord.webhook_url: webhook_url is required when discord notifications are enabled',
    ]);
  });

  it('should collect every invalid key', () => {
    const raw = { trading: { markets: ['KRW-BTC'], trade_amount: -1 }, risk_management: { stop_loss: 2 } };

    expect(issuesOf(() => parseConfig(raw))).toHaveLength(2);
  });

  it('should reject a document that is not an object', () => {
    const err = captureError(() => parseConfig(['KRW-BTC']));

    expect(err).toMatchObject({ code: 'CONFIGURATION_ERROR', message: 'Configuration must be a JSON object' });
  });
});

describe('environment overrides', () => {
  it('should apply recognised variables over the file', () => {
    const config = parseConfig(minimal, {
      LOG_LEVEL: 'DEBUG',
      LOG_FORMAT: 'json',
      DRY_RUN: 'true',
      UPBIT_ACCESS_KEY: 'test-access',
      UPBIT_SECRET_KEY: 'test-secret',
      TRADING_INTERVAL: '15',
    });

    expect(config.logging.level).toBe('debug');
    expect(config.logging.format).toBe('json');
    expect(config.exchange).toMatchObject({ type: 'paper', access_key: 'test-access', secret_key: 'test-secret' });
    expect(config.trading.interval).toBe(15);
  });

  it('should leave the exchange type alone when DRY_RUN is false', () => {
    const config = parseConfig({ ...minimal, exchange: { type: 'paper' } }, { DRY_RUN: 'false' });

    expect(config.exchange.type).toBe('paper');
  });

  it('should ignore empty variables', () => {
    const config = parseConfig(minimal, { UPBIT_ACCESS_KEY: '', TRADING_INTERVAL: '' });

    expect(config.exchange.access_key).toBeUndefined();
    expect(config.trading.interval).toBe(5);
  });

  it('should satisfy the webhook requirement from the environment', () => {
    const raw = { ...minimal, notification: { discord: { enabled: true } } };

    const config = parseConfig(raw, { DISCORD_WEBHOOK_URL: 'https://discord.com/api/webhooks/1/test-token' });

    expect(config.notification.discord.webhook_url).toBe('https://discord.com/api/webhooks/1/test-token');
  });

  it('should not modify the raw document', () => {
    const raw = { trading: { markets: ['KRW-BTC'] } };

    parseConfig(raw, { TRADING_INTERVAL: '15' });

    expect(raw).toEqual({ trading: { markets: ['KRW-BTC'] } });
  });
});

describe('settings mapping', () => {
  const config = parseConfig(minimal);

  it('should map indicator settings', () => {
    expect(indicatorConfigOf(config)).toEqual(DEFAULT_INDICATOR_CONFIG);
  });

  it('should map trading limits', () => {
    expect(tradingLimitsOf(config)).toEqual({
      tradeAmount: 10000,
      maxInvestRatio: 0.2,
      minConfidence: 0.6,
      minOrderNotional: 5000,
      throttleMs: 500,
      quoteCurrency: 'KRW',
    });
  });

  it('should map risk settings', () => {
    expect(riskConfigOf(config)).toEqual({
      stopLoss: 0.03,
      takeProfit: 0.05,
      trailingStop: 0.02,
      useTrailingStop: true,
      takeProfitSellRatio: 0.5,
      rebalanceSettleMs: 1000,
      quoteCurrency: 'KRW',
      minOrderNotional: 5000,
    });
  });

  it('should read candles as wide as the cycle interval', () => {
    expect(candleIntervalOf(config)).toBe(CandleInterval.M5);
  });
});
