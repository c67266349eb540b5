/**
 * Notifier that only writes to the log. Used when no webhook is configured.
 */

import type { Portfolio } from '@tradeloop/contracts';
import type { Logger } from '@tradeloop/logger';
import type { RiskActionResult } from '@tradeloop/risk';
import type { TradeResult } from '@tradeloop/strategy';
import {
  formatError,
  formatPortfolio,
  formatRiskAction,
  formatStartup,
  formatTrade,
  type FormatOptions,
} from './format.js';
import type { Notification, Notifier, StartupInfo } from './types.js';

export interface LogNotifierConfig {
  logger: Logger;
  quoteCurrency?: string;
  clock?: () => Date;
}

export class LogNotifier implements Notifier {
  private readonly logger: Logger;
  private readonly quoteCurrency: string;
  private readonly clock: () => Date;

  constructor(config: LogNotifierConfig) {
    this.logger = config.logger.child({ component: 'notifier' });
    this.quoteCurrency = config.quoteCurrency ?? 'KRW';
    this.clock = config.clock ?? (() => new Date());
  }

  async notifyTrade(instrument: string, trade: TradeResult): Promise<void> {
    this.write(formatTrade(instrument, trade, this.formatOptions()));
  }

  async notifyRiskAction(action: RiskActionResult): Promise<void> {
    this.write(formatRiskAction(action, this.formatOptions()));
  }

  async notifyPortfolio(portfolio: Portfolio): Promise<void> {
    this.write(formatPortfolio(portfolio, this.formatOptions()));
  }

  async notifyError(source: string, message: string): Promise<void> {
    this.write(formatError(source, message, this.clock()));
  }

  async notifyStartup(info: StartupInfo): Promise<void> {
    this.write(formatStartup(info, this.clock()));
  }

  private formatOptions(): FormatOptions {
    return { quoteCurrency: this.quoteCurrency, now: this.clock() };
  }

  private write(notification: Notification): void {
    const fields = Object.fromEntries(notification.fields.map((f) => [f.name, f.value]));
    const level = notification.kind === 'error' ? 'warn' : 'info';
    this.logger.log(level, notification.title, {
      notification: notification.kind,
      ...(notification.description ? { description: notification.description } : {}),
      fields,
    });
  }
}
