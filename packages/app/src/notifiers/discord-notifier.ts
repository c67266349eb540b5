/**
 * Discord webhook notifier using discord.js
 */

import { EmbedBuilder, WebhookClient, type WebhookMessageCreateOptions } from 'discord.js';
import { ConfigurationError, errorMessage, type Portfolio } from '@tradeloop/contracts';
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

/**
 * The part of WebhookClient the notifier uses.
 */
export interface WebhookSender {
  send(options: WebhookMessageCreateOptions): Promise<unknown>;
}

export interface DiscordNotifierConfig {
  logger: Logger;
  /** Webhook URL; required unless `client` is given */
  webhookUrl?: string;
  client?: WebhookSender;
  /** Name shown as the message author */
  username?: string;
  quoteCurrency?: string;
  clock?: () => Date;
}

/**
 * Converts a notification into a Discord embed
 */
export function toEmbed(notification: Notification): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(notification.title)
    .setColor(notification.color)
    .setTimestamp(new Date(notification.timestamp));

  if (notification.description) {
    embed.setDescription(notification.description);
  }
  if (notification.fields.length > 0) {
    embed.addFields(notification.fields);
  }
  return embed;
}

export class DiscordNotifier implements Notifier {
  private readonly client: WebhookSender;
  private readonly logger: Logger;
  private readonly username?: string;
  private readonly quoteCurrency: string;
  private readonly clock: () => Date;

  constructor(config: DiscordNotifierConfig) {
    this.logger = config.logger.child({ component: 'discord-notifier' });
    this.username = config.username;
    this.quoteCurrency = config.quoteCurrency ?? 'KRW';
    this.clock = config.clock ?? (() => new Date());

    if (config.client) {
      this.client = config.client;
    } else if (config.webhookUrl) {
      try {
        this.client = new WebhookClient({ url: config.webhookUrl });
      } catch (err) {
        throw new ConfigurationError(`Invalid Discord webhook URL: ${errorMessage(err)}`, {
          path: 'notification.discord.webhook_url',
        });
      }
    } else {
      throw new ConfigurationError('Discord notifier needs a webhook URL', {
        path: 'notification.discord.webhook_url',
      });
    }
  }

  async notifyTrade(instrument: string, trade: TradeResult): Promise<void> {
    await this.send(formatTrade(instrument, trade, this.formatOptions()));
  }

  async notifyRiskAction(action: RiskActionResult): Promise<void> {
    await this.send(formatRiskAction(action, this.formatOptions()));
  }

  async notifyPortfolio(portfolio: Portfolio): Promise<void> {
    await this.send(formatPortfolio(portfolio, this.formatOptions()));
  }

  async notifyError(source: string, message: string): Promise<void> {
    await this.send(formatError(source, message, this.clock()));
  }

  async notifyStartup(info: StartupInfo): Promise<void> {
    await this.send(formatStartup(info, this.clock()));
  }

  private formatOptions(): FormatOptions {
    return { quoteCurrency: this.quoteCurrency, now: this.clock() };
  }

  private async send(notification: Notification): Promise<void> {
    try {
      await this.client.send({
        ...(this.username ? { username: this.username } : {}),
        embeds: [toEmbed(notification)],
      });
      this.logger.debug('Discord notification sent', { notification: notification.kind });
    } catch (err) {
      this.logger.warn('Discord notification failed', {
        notification: notification.kind,
        error: errorMessage(err),
      });
    }
  }
}
