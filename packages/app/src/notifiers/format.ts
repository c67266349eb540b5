/**
 * Notification formatters.
 *
 * Pure builders shared by every notifier; amounts are rounded to whole
 * quote-currency units, quantities keep 8 decimals.
 */

import type { Portfolio } from '@tradeloop/contracts';
import type { ExitReason, RiskAction, RiskActionResult } from '@tradeloop/risk';
import type { TradeResult } from '@tradeloop/strategy';
import type { Notification, NotificationField, StartupInfo } from './types.js';

export const COLORS = {
  buy: 0x22c55e,
  sell: 0xef4444,
  partial: 0xf59e0b,
  info: 0x3b82f6,
  error: 0xdc2626,
} as const;

/** Discord's limit on an embed field value */
const MAX_FIELD_LENGTH = 1024;

const RISK_ACTION_LABELS: Record<RiskAction, string> = {
  sell: 'Sell',
  partial_sell: 'Partial sell',
  hold: 'Hold',
};

const EXIT_REASON_LABELS: Record<ExitReason, string> = {
  stop_loss: 'Stop loss',
  trailing_stop: 'Trailing stop',
  take_profit: 'Take profit',
  within_limits: 'Within limits',
  price_unavailable: 'Price unavailable',
};

export interface FormatOptions {
  quoteCurrency: string;
  now: Date;
}

export function formatAmount(value: number, quoteCurrency: string): string {
  return `${Math.round(value).toLocaleString('en-US')} ${quoteCurrency}`;
}

export function formatQuantity(quantity: number): string {
  return quantity.toFixed(8);
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

function field(name: string, value: string, inline = true): NotificationField {
  const clipped = value.length > MAX_FIELD_LENGTH ? `${value.slice(0, MAX_FIELD_LENGTH - 3)}...` : value;
  return { name, value: clipped, inline };
}

export function formatTrade(instrument: string, trade: TradeResult, options: FormatOptions): Notification {
  const { quoteCurrency, now } = options;
  const fields: NotificationField[] = [];

  if (trade.price !== undefined) fields.push(field('Price', formatAmount(trade.price, quoteCurrency)));
  if (trade.notional !== undefined) fields.push(field('Amount', formatAmount(trade.notional, quoteCurrency)));
  if (trade.quantity !== undefined) fields.push(field('Quantity', formatQuantity(trade.quantity)));
  if (trade.orderId) fields.push(field('Order ID', trade.orderId, false));

  return {
    kind: 'trade',
    title: `[${trade.action.toUpperCase()}] ${instrument}`,
    color: trade.action === 'buy' ? COLORS.buy : trade.action === 'sell' ? COLORS.sell : COLORS.info,
    description: trade.detail,
    fields,
    timestamp: now.toISOString(),
  };
}

export function formatRiskAction(action: RiskActionResult, options: FormatOptions): Notification {
  const { quoteCurrency, now } = options;
  const fields: NotificationField[] = [
    field('Reason', EXIT_REASON_LABELS[action.reason]),
    field('Profit', formatPercent(action.profitPct)),
  ];

  if (action.price !== undefined) fields.push(field('Price', formatAmount(action.price, quoteCurrency)));
  if (action.quantity !== undefined) fields.push(field('Sold', formatQuantity(action.quantity)));
  if (action.remainingQuantity !== undefined) {
    fields.push(field('Remaining', formatQuantity(action.remainingQuantity)));
  }
  if (action.orderId) fields.push(field('Order ID', action.orderId, false));

  return {
    kind: 'risk',
    title: `[RISK] ${RISK_ACTION_LABELS[action.action]} - ${action.instrument}`,
    color: action.action === 'partial_sell' ? COLORS.partial : COLORS.sell,
    fields,
    timestamp: now.toISOString(),
  };
}

export function formatPortfolio(portfolio: Portfolio, options: FormatOptions): Notification {
  const { quoteCurrency, now } = options;
  const holdings = Object.entries(portfolio.exposure).map(
    ([instrument, exposure]) =>
      `- ${instrument}: ${formatQuantity(exposure.quantity)} ` +
      `(${formatAmount(exposure.value, quoteCurrency)}, ${formatPercent(exposure.ratio)})`
  );

  return {
    kind: 'portfolio',
    title: 'Portfolio status',
    color: portfolio.riskLevel === 'high' ? COLORS.sell : portfolio.riskLevel === 'medium' ? COLORS.partial : COLORS.info,
    fields: [
      field('Total balance', formatAmount(portfolio.totalBalance, quoteCurrency)),
      field(`${quoteCurrency} balance`, formatAmount(portfolio.cashBalance, quoteCurrency)),
      field('Risk level', portfolio.riskLevel),
      field('Holdings', holdings.length > 0 ? holdings.join('\n') : 'None', false),
    ],
    timestamp: now.toISOString(),
  };
}

export function formatError(source: string, message: string, now: Date): Notification {
  return {
    kind: 'error',
    title: 'Error',
    color: COLORS.error,
    fields: [field('Source', source), field('Message', message, false)],
    timestamp: now.toISOString(),
  };
}

export function formatStartup(info: StartupInfo, now: Date): Notification {
  return {
    kind: 'startup',
    title: 'Trading bot started',
    color: COLORS.info,
    fields: [
      field('Version', info.version),
      field('Mode', info.mode),
      field('Markets', info.markets.join(', '), false),
    ],
    timestamp: now.toISOString(),
  };
}
