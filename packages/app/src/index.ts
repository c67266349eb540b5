/**
 * @fileoverview Main entry point for @tradeloop/app package.
 *
 * Configuration, notifiers, the trading cycle and its scheduler, and the
 * wiring that assembles them into a running bot.
 *
 * @module @tradeloop/app
 */

export {
  loadConfig,
  parseConfig,
  getConfigSummary,
  candleIntervalOf,
  indicatorConfigOf,
  signalWeightsOf,
  tradingLimitsOf,
  riskConfigOf,
  configSchema,
  envMapping,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';
export type { Config } from './config/index.js';

export { DiscordNotifier, toEmbed } from './notifiers/discord-notifier.js';
export type { DiscordNotifierConfig, WebhookSender } from './notifiers/discord-notifier.js';
export { LogNotifier } from './notifiers/log-notifier.js';
export type { LogNotifierConfig } from './notifiers/log-notifier.js';
export {
  formatTrade,
  formatRiskAction,
  formatPortfolio,
  formatError,
  formatStartup,
  formatAmount,
  formatQuantity,
  formatPercent,
  COLORS,
} from './notifiers/format.js';
export type { FormatOptions } from './notifiers/format.js';
export type {
  Notifier,
  Notification,
  NotificationField,
  NotificationKind,
  StartupInfo,
} from './notifiers/types.js';

export { TradingCycle } from './cycle.js';
export type { TradingCycleOptions, CycleSummary } from './cycle.js';
export { CycleScheduler } from './scheduler.js';
export type { SchedulerOptions } from './scheduler.js';
export { createApp, createExchange, createNotifier } from './app.js';
export type { App, AppOptions } from './app.js';
