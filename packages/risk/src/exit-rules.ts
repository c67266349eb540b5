/**
 * @fileoverview Exit rule evaluation for a single position.
 *
 * Rules are checked in fixed priority and the first match wins:
 * stop-loss, trailing stop, take-profit, then hold.
 *
 * @module @tradeloop/risk/exit-rules
 */

import type { Position } from '@tradeloop/contracts';
import type { RiskConfig } from './risk-config.js';

export type RiskAction = 'sell' | 'partial_sell' | 'hold';

export type ExitReason =
  | 'stop_loss'
  | 'trailing_stop'
  | 'take_profit'
  | 'within_limits'
  /** Held without evaluation: no fresh price this cycle */
  | 'price_unavailable';

/**
 * Outcome of evaluating one position against the exit rules.
 */
export interface RiskDecision {
  action: RiskAction;
  reason: ExitReason;
  /** (currentPrice - entryPrice) / entryPrice */
  profitPct: number;
  /** Share of the quantity to sell; set for partial_sell only */
  sellRatio?: number;
}

/**
 * Fractional gain of a position since entry.
 */
export function profitPct(position: Pick<Position, 'entryPrice' | 'currentPrice'>): number {
  if (position.entryPrice <= 0) return 0;
  return (position.currentPrice - position.entryPrice) / position.entryPrice;
}

/**
 * Decide what to do with `position` at its current price.
 *
 * @example
 * ```typescript
 * const decision = evaluateExit(position, DEFAULT_RISK_CONFIG);
 * if (decision.action !== 'hold') await engine.executeAction(position, decision);
 * ```
 */
export function evaluateExit(
  position: Position,
  config: Pick<RiskConfig, 'stopLoss' | 'takeProfit' | 'useTrailingStop' | 'takeProfitSellRatio'>
): RiskDecision {
  const profit = profitPct(position);

  if (profit <= -config.stopLoss) {
    return { action: 'sell', reason: 'stop_loss', profitPct: profit };
  }

  if (
    config.useTrailingStop &&
    position.trailingStopPrice !== undefined &&
    position.currentPrice <= position.trailingStopPrice
  ) {
    return { action: 'sell', reason: 'trailing_stop', profitPct: profit };
  }

  if (profit >= config.takeProfit) {
    return {
      action: 'partial_sell',
      reason: 'take_profit',
      profitPct: profit,
      sellRatio: config.takeProfitSellRatio,
    };
  }

  return { action: 'hold', reason: 'within_limits', profitPct: profit };
}
