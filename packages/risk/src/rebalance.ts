/**
 * @fileoverview Rebalance planning.
 *
 * Sells bring over-weight holdings down to target; buys bring
 * under-weight targets up, funded by the cash left after the sells.
 * Both plans are sized from the same pre-rebalance portfolio snapshot.
 *
 * @module @tradeloop/risk/rebalance
 */

import type { OrderSide, Portfolio } from '@tradeloop/contracts';

/**
 * Target weight per instrument, as a fraction of the total balance.
 * Instruments held but absent here have a target of 0.
 */
export type TargetAllocation = Record<string, number>;

export interface PlannedSell {
  instrument: string;
  quantity: number;
  /** Quote-currency value at the snapshot price */
  value: number;
}

export interface PlannedBuy {
  instrument: string;
  notional: number;
}

/**
 * A rebalance order that was filled.
 */
export interface RebalanceTrade {
  side: OrderSide;
  instrument: string;
  orderId: string;
  /** Quantity sold (sells) */
  quantity?: number;
  /** Quote-currency amount: value sold or notional spent */
  amount: number;
}

export interface RebalanceResult {
  success: boolean;
  trades: RebalanceTrade[];
  reason: string;
}

/**
 * Sells needed to bring each held instrument down to its target.
 */
export function planRebalanceSells(portfolio: Portfolio, targets: TargetAllocation): PlannedSell[] {
  const sells: PlannedSell[] = [];

  for (const [instrument, exposure] of Object.entries(portfolio.exposure)) {
    const target = targets[instrument] ?? 0;
    if (exposure.ratio <= target || exposure.price <= 0) continue;

    const excessValue = (exposure.ratio - target) * portfolio.totalBalance;
    const quantity = Math.min(excessValue / exposure.price, exposure.quantity);
    if (quantity <= 0) continue;

    sells.push({ instrument, quantity, value: quantity * exposure.price });
  }

  return sells;
}

/**
 * Buys needed to bring each target up, spending at most `cash` in total.
 *
 * Buys below `minNotional` are skipped. Keys naming the quote currency
 * itself are cash targets and never bought.
 */
export function planRebalanceBuys(
  portfolio: Portfolio,
  targets: TargetAllocation,
  cash: number,
  options: { quoteCurrency: string; minNotional: number }
): PlannedBuy[] {
  const buys: PlannedBuy[] = [];
  let available = cash;

  for (const [instrument, target] of Object.entries(targets)) {
    if (instrument === options.quoteCurrency) continue;

    const current = portfolio.exposure[instrument]?.ratio ?? 0;
    if (current >= target) continue;

    const notional = Math.min((target - current) * portfolio.totalBalance, available);
    if (notional < options.minNotional) continue;

    buys.push({ instrument, notional });
    available -= notional;
  }

  return buys;
}
