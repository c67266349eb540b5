/**
 * Configuration loading and management
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError, errorMessage, intervalFromMinutes, type CandleInterval } from '@tradeloop/contracts';
import type { IndicatorConfig } from '@tradeloop/indicators';
import type { RiskConfigOverrides } from '@tradeloop/risk';
import type { SignalWeights, TradingLimits } from '@tradeloop/strategy';
import type { Logger } from '@tradeloop/logger';
import { configSchema, envMapping, type Config } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'config/config.json';

/**
 * Validate raw configuration after applying environment overrides.
 *
 * @throws {ConfigurationError} With one issue per invalid key
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): Config {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration must be a JSON object');
  }

  const merged = structuredClone(raw);
  for (const [envKey, { path, parse }] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value === undefined || value === '') continue;
    const parsed = parse(value);
    if (parsed !== undefined) setNestedProperty(merged, path, parsed);
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }
  return result.data;
}

/**
 * Load configuration from a JSON file and the environment
 *
 * @throws {ConfigurationError} If the file is missing, unreadable or invalid
 */
export function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): Config {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration file ${path}: ${errorMessage(err)}`, { path });
  }

  const config = parseConfig(raw, env);

  if (logger) {
    logger.info('Configuration loaded', { path, ...getConfigSummary(config) });
  }

  return config;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    markets: config.trading.markets,
    interval_minutes: config.trading.interval,
    exchange: config.exchange.type,
    discord: config.notification.discord.enabled ? 'enabled' : 'disabled',
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      dir: config.logging.dir,
    },
  };
}

export function candleIntervalOf(config: Config): CandleInterval {
  return intervalFromMinutes(config.trading.interval);
}

export function indicatorConfigOf(config: Config): IndicatorConfig {
  const { ma_crossover: ma, rsi, bollinger, volume } = config.strategy;
  return {
    maCrossover: {
      enabled: ma.enabled,
      shortPeriod: ma.short_period,
      longPeriod: ma.long_period,
      trendPeriod: ma.trend_period,
    },
    rsi: {
      enabled: rsi.enabled,
      period: rsi.period,
      useDivergence: rsi.use_divergence,
      divergenceWindow: rsi.divergence_window,
    },
    bollinger: { enabled: bollinger.enabled, period: bollinger.period, stdDev: bollinger.std_dev },
    volume: { enabled: volume.enabled, period: volume.period, surgeThreshold: volume.surge_threshold },
  };
}

export function signalWeightsOf(config: Config): Partial<SignalWeights> {
  return config.strategy.weights;
}

export function tradingLimitsOf(config: Config): TradingLimits {
  const { trading } = config;
  return {
    tradeAmount: trading.trade_amount,
    maxInvestRatio: trading.max_invest_ratio,
    minConfidence: config.strategy.min_confidence,
    minOrderNotional: trading.min_order_notional,
    throttleMs: trading.throttle_ms,
    quoteCurrency: trading.quote_currency,
  };
}

export function riskConfigOf(config: Config): RiskConfigOverrides {
  const risk = config.risk_management;
  return {
    stopLoss: risk.stop_loss,
    takeProfit: risk.take_profit,
    trailingStop: risk.trailing_stop,
    useTrailingStop: risk.use_trailing_stop,
    takeProfitSellRatio: risk.take_profit_sell_ratio,
    rebalanceSettleMs: risk.rebalance_settle_ms,
    quoteCurrency: config.trading.quote_currency,
    minOrderNotional: config.trading.min_order_notional,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object, creating intermediate objects
 */
function setNestedProperty(obj: Record<string, unknown>, path: readonly string[], value: unknown): void {
  const [key, ...rest] = path;
  if (key === undefined) return;
  if (rest.length === 0) {
    obj[key] = value;
    return;
  }
  const child = obj[key];
  const next: Record<string, unknown> = isRecord(child) ? child : {};
  obj[key] = next;
  setNestedProperty(next, rest, value);
}

// Re-export types
export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
