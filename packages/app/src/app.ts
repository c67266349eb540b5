/**
 * Application wiring
 *
 * Builds the exchange, notifier, strategy controller, risk engine, trading
 * cycle and scheduler from a validated configuration.
 */

import { ConfigurationError, type Exchange } from '@tradeloop/contracts';
import { PaperExchange, UpbitExchange } from '@tradeloop/exchange';
import type { Logger } from '@tradeloop/logger';
import { PositionLedger, RiskEngine } from '@tradeloop/risk';
import { SignalEvaluator, StrategyController } from '@tradeloop/strategy';
import {
  candleIntervalOf,
  indicatorConfigOf,
  riskConfigOf,
  signalWeightsOf,
  tradingLimitsOf,
  type Config,
} from './config/index.js';
import { DiscordNotifier } from './notifiers/discord-notifier.js';
import { LogNotifier } from './notifiers/log-notifier.js';
import type { Notifier } from './notifiers/types.js';
import { TradingCycle } from './cycle.js';
import { CycleScheduler } from './scheduler.js';

export interface AppOptions {
  config: Config;
  logger: Logger;
  /** Replaces the exchange built from `config.exchange` */
  exchange?: Exchange;
  /** Replaces the notifier built from `config.notification` */
  notifier?: Notifier;
  clock?: () => Date;
}

export interface App {
  config: Config;
  mode: 'live' | 'paper';
  exchange: Exchange;
  notifier: Notifier;
  ledger: PositionLedger;
  evaluator: SignalEvaluator;
  controller: StrategyController;
  risk: RiskEngine;
  cycle: TradingCycle;
  scheduler: CycleScheduler;
}

/**
 * Live Upbit client, or a paper exchange fed by Upbit's public market data.
 *
 * @throws {ConfigurationError} For live trading without API keys
 */
export function createExchange(config: Config, logger: Logger): Exchange {
  const { exchange } = config;
  const upbitLogger = logger.child({ component: 'upbit' });

  if (exchange.type === 'paper') {
    return new PaperExchange({
      quoteCurrency: config.trading.quote_currency,
      cash: exchange.paper_cash,
      marketData: new UpbitExchange({
        baseUrl: exchange.base_url,
        timeoutMs: exchange.timeout_ms,
        logger: upbitLogger,
      }),
      logger,
    });
  }

  if (!exchange.access_key || !exchange.secret_key) {
    throw new ConfigurationError('Live trading needs exchange.access_key and exchange.secret_key', {
      path: 'exchange',
    });
  }
  return new UpbitExchange({
    accessKey: exchange.access_key,
    secretKey: exchange.secret_key,
    baseUrl: exchange.base_url,
    timeoutMs: exchange.timeout_ms,
    logger: upbitLogger,
  });
}

export function createNotifier(config: Config, logger: Logger, clock?: () => Date): Notifier {
  const { discord } = config.notification;
  const quoteCurrency = config.trading.quote_currency;

  if (discord.enabled && discord.webhook_url) {
    return new DiscordNotifier({ webhookUrl: discord.webhook_url, logger, quoteCurrency, clock });
  }
  return new LogNotifier({ logger, quoteCurrency, clock });
}

export function createApp(options: AppOptions): App {
  const { config, logger, clock } = options;
  const exchange = options.exchange ?? createExchange(config, logger);
  const notifier = options.notifier ?? createNotifier(config, logger, clock);
  const ledger = new PositionLedger();

  const evaluator = new SignalEvaluator({
    market: exchange,
    logger,
    indicators: indicatorConfigOf(config),
    weights: signalWeightsOf(config),
    interval: candleIntervalOf(config),
    candleCount: config.trading.candle_count,
  });

  const controller = new StrategyController({
    evaluator,
    market: exchange,
    account: exchange,
    orders: exchange,
    ledger,
    logger,
    limits: tradingLimitsOf(config),
    clock,
  });

  const risk = new RiskEngine({
    market: exchange,
    account: exchange,
    orders: exchange,
    ledger,
    logger,
    config: riskConfigOf(config),
    clock,
  });

  const cycle = new TradingCycle({
    controller,
    risk,
    notifier,
    logger,
    markets: config.trading.markets,
    portfolioReportMinutes: config.trading.portfolio_report_minutes,
    clock,
  });

  const scheduler = new CycleScheduler(() => cycle.run(), {
    intervalMs: config.trading.interval * 60_000,
    logger,
  });

  return {
    config,
    mode: config.exchange.type === 'paper' ? 'paper' : 'live',
    exchange,
    notifier,
    ledger,
    evaluator,
    controller,
    risk,
    cycle,
    scheduler,
  };
}
