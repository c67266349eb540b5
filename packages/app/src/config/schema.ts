/**
 * Configuration schema using Zod
 *
 * Mirrors the keys of config/config.json. Every section except
 * `trading.markets` has defaults.
 */

import { z } from 'zod';
import { getAllIntervals, intervalToMinutes, CandleInterval } from '@tradeloop/contracts';

const CANDLE_MINUTES = getAllIntervals()
  .filter((interval) => interval !== CandleInterval.D1)
  .map(intervalToMinutes);

const ratio = z.number().gt(0).lt(1);

const weightsSchema = z
  .object({
    ma: z.number().nonnegative(),
    rsi: z.number().nonnegative(),
    divergence: z.number().nonnegative(),
    bollinger: z.number().nonnegative(),
    volume: z.number().nonnegative(),
  })
  .partial();

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  trading: z.object({
    markets: z
      .array(z.string().regex(/^[A-Z0-9]+-[A-Z0-9]+$/, 'market must look like KRW-BTC'))
      .min(1, 'at least one market is required'),
    interval: z
      .number()
      .int()
      .refine((minutes) => CANDLE_MINUTES.includes(minutes), {
        message: `interval must be one of ${CANDLE_MINUTES.join(', ')} minutes`,
      })
      .default(5),
    trade_amount: z.number().positive().default(10000),
    max_invest_ratio: z.number().gt(0).lte(1).default(0.2),
    quote_currency: z.string().min(1).default('KRW'),
    min_order_notional: z.number().positive().default(5000),
    candle_count: z.number().int().min(1).max(200).default(100),
    throttle_ms: z.number().int().nonnegative().default(500),
    portfolio_report_minutes: z.number().int().positive().default(15),
  }),

  strategy: z
    .object({
      ma_crossover: z
        .object({
          enabled: z.boolean().default(true),
          short_period: z.number().int().positive().default(9),
          long_period: z.number().int().positive().default(21),
          trend_period: z.number().int().positive().default(50),
        })
        .refine((ma) => ma.short_period < ma.long_period, {
          message: 'short_period must be below long_period',
        })
        .default({}),
      rsi: z
        .object({
          enabled: z.boolean().default(true),
          period: z.number().int().positive().default(14),
          use_divergence: z.boolean().default(true),
          divergence_window: z.number().int().min(2).default(10),
        })
        .default({}),
      bollinger: z
        .object({
          enabled: z.boolean().default(true),
          period: z.number().int().min(2).default(20),
          std_dev: z.number().positive().default(2),
        })
        .default({}),
      volume: z
        .object({
          enabled: z.boolean().default(true),
          period: z.number().int().positive().default(20),
          surge_threshold: z.number().positive().default(2),
        })
        .default({}),
      weights: weightsSchema.default({}),
      min_confidence: z.number().min(0).max(1).default(0.6),
    })
    .default({}),

  risk_management: z
    .object({
      stop_loss: ratio.default(0.03),
      take_profit: z.number().positive().default(0.05),
      trailing_stop: ratio.default(0.02),
      use_trailing_stop: z.boolean().default(true),
      take_profit_sell_ratio: z.number().gt(0).lte(1).default(0.5),
      rebalance_settle_ms: z.number().int().nonnegative().default(1000),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      dir: z.string().optional(),
    })
    .default({}),

  notification: z
    .object({
      discord: z
        .object({
          enabled: z.boolean().default(false),
          webhook_url: z.string().url().optional(),
        })
        .refine((discord) => !discord.enabled || discord.webhook_url !== undefined, {
          message: 'webhook_url is required when discord notifications are enabled',
          path: ['webhook_url'],
        })
        .default({}),
    })
    .default({}),

  exchange: z
    .object({
      type: z.enum(['upbit', 'paper']).default('upbit'),
      access_key: z.string().min(1).optional(),
      secret_key: z.string().min(1).optional(),
      base_url: z.string().url().optional(),
      timeout_ms: z.number().int().positive().default(10000),
      /** Starting cash of the paper exchange */
      paper_cash: z.number().nonnegative().default(1000000),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping: variable name to config path and parser
 */
export const envMapping: Record<string, { path: readonly string[]; parse: (value: string) => unknown }> = {
  LOG_LEVEL: { path: ['logging', 'level'], parse: (value) => value.toLowerCase() },
  LOG_FORMAT: { path: ['logging', 'format'], parse: (value) => value.toLowerCase() },
  DRY_RUN: { path: ['exchange', 'type'], parse: (value) => (parseBoolean(value) ? 'paper' : undefined) },
  UPBIT_ACCESS_KEY: { path: ['exchange', 'access_key'], parse: (value) => value },
  UPBIT_SECRET_KEY: { path: ['exchange', 'secret_key'], parse: (value) => value },
  DISCORD_WEBHOOK_URL: { path: ['notification', 'discord', 'webhook_url'], parse: (value) => value },
  TRADING_INTERVAL: { path: ['trading', 'interval'], parse: (value) => Number(value) },
};

function parseBoolean(value: string): boolean {
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}
