/**
 * Notifier contracts.
 */

import type { Portfolio } from '@tradeloop/contracts';
import type { RiskActionResult } from '@tradeloop/risk';
import type { TradeResult } from '@tradeloop/strategy';

export type NotificationKind = 'trade' | 'risk' | 'portfolio' | 'error' | 'startup';

export interface NotificationField {
  name: string;
  value: string;
  inline?: boolean;
}

/**
 * Transport-neutral message built by the formatters.
 */
export interface Notification {
  kind: NotificationKind;
  title: string;
  color: number;
  description?: string;
  fields: NotificationField[];
  timestamp: string;
}

export interface StartupInfo {
  version: string;
  markets: readonly string[];
  mode: 'live' | 'paper';
}

/**
 * Outbound operator notifications.
 *
 * Implementations never reject: delivery failures are logged and dropped
 * so that a notification outage cannot stop a trading cycle.
 */
export interface Notifier {
  notifyTrade(instrument: string, trade: TradeResult): Promise<void>;
  notifyRiskAction(action: RiskActionResult): Promise<void>;
  notifyPortfolio(portfolio: Portfolio): Promise<void>;
  notifyError(source: string, message: string): Promise<void>;
  notifyStartup(info: StartupInfo): Promise<void>;
}
