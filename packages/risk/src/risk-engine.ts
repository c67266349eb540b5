/**
 * @fileoverview Risk engine.
 *
 * Refreshes the position ledger from account balances each cycle, applies
 * the exit rules to every open position, reports portfolio concentration
 * and rebalances toward target weights on request.
 *
 * Collaborators answer `null` on failure. A `null` is logged as a soft
 * failure and the affected position or step is skipped; nothing is retried.
 *
 * @module @tradeloop/risk/risk-engine
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  CycleError,
  DataUnavailableError,
  OrderRejectedError,
  errorFields,
  errorMessage,
  toInstrument,
  type AccountProvider,
  type MarketDataProvider,
  type OrderProvider,
  type Portfolio,
  type Position,
} from '@tradeloop/contracts';
import type { Logger } from '@tradeloop/logger';
import { PositionLedger } from './ledger.js';
import { evaluateExit, profitPct, type ExitReason, type RiskAction, type RiskDecision } from './exit-rules.js';
import { resolveRiskConfig, type RiskConfig, type RiskConfigOverrides } from './risk-config.js';
import { unknownPortfolio, valuePortfolio, type Holding } from './portfolio.js';
import {
  planRebalanceBuys,
  planRebalanceSells,
  type RebalanceResult,
  type RebalanceTrade,
  type TargetAllocation,
} from './rebalance.js';

/**
 * Outcome of applying a risk decision to one position.
 *
 * A failed order is reported as `{ success: false, action: 'hold' }`.
 */
export interface RiskActionResult {
  instrument: string;
  success: boolean;
  action: RiskAction;
  reason: ExitReason;
  profitPct: number;
  orderId?: string;
  /** Quantity sold */
  quantity?: number;
  /** Price the decision was made at */
  price?: number;
  /** Quantity left after a partial exit */
  remainingQuantity?: number;
  error?: string;
}

interface PositionRefresh {
  positions: Position[];
  /** Instruments observed at a fresh price in this pass */
  refreshed: Set<string>;
}

export interface RiskEngineOptions {
  market: MarketDataProvider;
  account: AccountProvider;
  orders: OrderProvider;
  logger: Logger;
  /** Shared with the strategy controller; a fresh ledger when omitted */
  ledger?: PositionLedger;
  config?: RiskConfigOverrides;
  clock?: () => Date;
}

/**
 * @example
 * ```typescript
 * const engine = new RiskEngine({ market: exchange, account: exchange, orders: exchange, logger });
 * const results = await engine.checkRiskLimits();
 * const exits = results.filter((r) => r.action !== 'hold');
 * ```
 */
export class RiskEngine {
  readonly ledger: PositionLedger;
  readonly config: RiskConfig;

  private readonly market: MarketDataProvider;
  private readonly account: AccountProvider;
  private readonly orders: OrderProvider;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: RiskEngineOptions) {
    this.market = options.market;
    this.account = options.account;
    this.orders = options.orders;
    this.ledger = options.ledger ?? new PositionLedger();
    this.config = resolveRiskConfig(options.config);
    this.logger = options.logger.child({ component: 'risk-engine' });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Sync the ledger with the account.
   *
   * Holdings that are no longer in the balance list are dropped. A holding
   * whose price is unavailable keeps its previous entry unchanged. When the
   * balance list itself is unavailable the ledger is left as it was.
   */
  async refreshPositions(): Promise<Position[]> {
    const { positions } = await this.syncPositions();
    return positions;
  }

  /**
   * Same as {@link refreshPositions}, also naming the instruments priced in
   * this pass. Only those may be evaluated against the exit rules.
   */
  private async syncPositions(): Promise<PositionRefresh> {
    const refreshed = new Set<string>();
    const balances = await this.account.getBalances();
    if (!balances) {
      const error = new DataUnavailableError('Balances unavailable, positions not refreshed', {
        resource: 'balances',
      });
      this.logger.warn(error.message, errorFields(error));
      return { positions: this.ledger.list(), refreshed };
    }

    const held = new Set<string>();
    const now = this.clock();
    const trailingPct = this.config.useTrailingStop ? this.config.trailingStop : undefined;

    for (const balance of balances) {
      if (balance.currency === this.config.quoteCurrency) continue;
      if (balance.balance <= 0) continue;

      const instrument = toInstrument(this.config.quoteCurrency, balance.currency);
      held.add(instrument);

      const price = await this.market.getCurrentPrice(instrument);
      if (price === null || price <= 0) {
        const error = new DataUnavailableError(`Price unavailable for ${instrument}`, {
          resource: 'price',
          instrument,
        });
        this.logger.warn(error.message, errorFields(error));
        continue;
      }

      const isNew = !this.ledger.has(instrument);
      const position = this.ledger.observe({
        instrument,
        currency: balance.currency,
        quantity: balance.balance,
        price,
        now,
        trailingPct,
      });
      refreshed.add(instrument);

      if (isNew) {
        this.logger.info('Position opened', {
          instrument,
          quantity: position.quantity,
          entry_price: position.entryPrice,
          trailing_stop: position.trailingStopPrice,
        });
      }
    }

    for (const instrument of this.ledger.retain(held)) {
      this.logger.info('Position no longer held, removed from ledger', { instrument });
    }

    return { positions: this.ledger.list(), refreshed };
  }

  evaluatePosition(position: Position): RiskDecision {
    return evaluateExit(position, this.config);
  }

  /**
   * Submit the sell a decision calls for and update the ledger on success.
   */
  async executeAction(position: Position, decision: RiskDecision): Promise<RiskActionResult> {
    const base = {
      instrument: position.instrument,
      reason: decision.reason,
      profitPct: decision.profitPct,
      price: position.currentPrice,
    };

    if (decision.action === 'hold') {
      return { ...base, success: true, action: 'hold' };
    }

    const quantity =
      decision.action === 'partial_sell'
        ? position.quantity * (decision.sellRatio ?? this.config.takeProfitSellRatio)
        : position.quantity;

    try {
      const order = await this.orders.sellMarket(position.instrument, quantity);
      if (!order) {
        const error = new OrderRejectedError(`Risk exit rejected for ${position.instrument}`, {
          instrument: position.instrument,
          side: 'sell',
          amount: quantity,
          reason: decision.reason,
        });
        this.logger.warn(error.message, errorFields(error));
        return { ...base, success: false, action: 'hold', error: error.message };
      }

      if (decision.action === 'sell') {
        this.ledger.close(position.instrument);
        this.logger.info('Position closed', {
          instrument: position.instrument,
          reason: decision.reason,
          quantity,
          profit_pct: decision.profitPct,
          order_id: order.id,
        });
        return { ...base, success: true, action: 'sell', orderId: order.id, quantity };
      }

      const remaining = this.ledger.reduce(position.instrument, quantity);
      const remainingQuantity = remaining?.quantity ?? 0;
      this.logger.info('Position reduced', {
        instrument: position.instrument,
        reason: decision.reason,
        quantity,
        remaining: remainingQuantity,
        profit_pct: decision.profitPct,
        order_id: order.id,
      });
      return {
        ...base,
        success: true,
        action: 'partial_sell',
        orderId: order.id,
        quantity,
        remainingQuantity,
      };
    } catch (err) {
      const error = new CycleError(`Risk action failed for ${position.instrument}: ${errorMessage(err)}`, {
        phase: 'risk-action',
        instrument: position.instrument,
      });
      this.logger.error(error.message, errorFields(error));
      return { ...base, success: false, action: 'hold', error: error.message };
    }
  }

  /**
   * Refresh positions, then evaluate and act on each one.
   *
   * A position that could not be priced this cycle is held without
   * evaluation; its last price is stale.
   *
   * @returns One result per open position, holds included
   */
  async checkRiskLimits(): Promise<RiskActionResult[]> {
    const { positions, refreshed } = await this.syncPositions();
    const results: RiskActionResult[] = [];

    for (const position of positions) {
      if (!refreshed.has(position.instrument)) {
        results.push({
          instrument: position.instrument,
          success: true,
          action: 'hold',
          reason: 'price_unavailable',
          profitPct: profitPct(position),
          price: position.currentPrice,
        });
        continue;
      }

      const decision = this.evaluatePosition(position);
      if (decision.action !== 'hold') {
        this.logger.info('Exit rule triggered', {
          instrument: position.instrument,
          reason: decision.reason,
          profit_pct: decision.profitPct,
          price: position.currentPrice,
          trailing_stop: position.trailingStopPrice,
        });
      }
      results.push(await this.executeAction(position, decision));
    }

    return results;
  }

  /**
   * Value the account and classify its concentration.
   *
   * Holdings without a price are left out of the totals. When cash or the
   * balance list cannot be read the snapshot is `'unknown'` with zero
   * balances.
   */
  async checkPortfolioRisk(): Promise<Portfolio> {
    const now = this.clock();

    try {
      const cash = await this.account.getBalance(this.config.quoteCurrency);
      const balances = cash === null ? null : await this.account.getBalances();
      if (cash === null || balances === null) {
        const error = new DataUnavailableError('Portfolio balances unavailable', {
          resource: cash === null ? 'balance' : 'balances',
          currency: this.config.quoteCurrency,
        });
        this.logger.warn(error.message, errorFields(error));
        return unknownPortfolio(now);
      }

      const holdings: Holding[] = [];
      for (const balance of balances) {
        if (balance.currency === this.config.quoteCurrency) continue;
        if (balance.balance <= 0) continue;

        const instrument = toInstrument(this.config.quoteCurrency, balance.currency);
        const price = await this.market.getCurrentPrice(instrument);
        if (price === null) {
          this.logger.warn('Price unavailable, holding left out of portfolio', { instrument });
          continue;
        }
        holdings.push({ instrument, quantity: balance.balance, price });
      }

      const portfolio = valuePortfolio(cash, holdings, this.config.exposure, now);
      if (portfolio.riskLevel === 'high') {
        this.logger.warn('Portfolio concentration high', {
          total_balance: portfolio.totalBalance,
          instruments: Object.keys(portfolio.exposure),
        });
      }
      return portfolio;
    } catch (err) {
      const error = new CycleError(`Portfolio risk check failed: ${errorMessage(err)}`, {
        phase: 'portfolio-risk',
      });
      this.logger.error(error.message, errorFields(error));
      return unknownPortfolio(now);
    }
  }

  /**
   * Move the portfolio toward `targets`.
   *
   * Sells run first; any rejected order stops the rebalance and the trades
   * already filled are returned. After a settle delay cash is re-read and
   * the buys run the same way.
   */
  async rebalancePortfolio(targets: TargetAllocation): Promise<RebalanceResult> {
    const trades: RebalanceTrade[] = [];

    try {
      const portfolio = await this.checkPortfolioRisk();
      if (portfolio.totalBalance <= 0) {
        return { success: false, trades, reason: 'portfolio unavailable' };
      }

      for (const sell of planRebalanceSells(portfolio, targets)) {
        const order = await this.orders.sellMarket(sell.instrument, sell.quantity);
        if (!order) {
          return this.abortRebalance(trades, 'sell', sell.instrument, sell.quantity);
        }
        this.ledger.reduce(sell.instrument, sell.quantity);
        trades.push({
          side: 'sell',
          instrument: sell.instrument,
          orderId: order.id,
          quantity: sell.quantity,
          amount: sell.value,
        });
      }

      if (this.config.rebalanceSettleMs > 0) {
        await delay(this.config.rebalanceSettleMs);
      }

      const cash = (await this.account.getBalance(this.config.quoteCurrency)) ?? 0;
      const buys = planRebalanceBuys(portfolio, targets, cash, {
        quoteCurrency: this.config.quoteCurrency,
        minNotional: this.config.minOrderNotional,
      });

      for (const buy of buys) {
        const order = await this.orders.buyMarket(buy.instrument, buy.notional);
        if (!order) {
          return this.abortRebalance(trades, 'buy', buy.instrument, buy.notional);
        }
        trades.push({
          side: 'buy',
          instrument: buy.instrument,
          orderId: order.id,
          amount: buy.notional,
        });
      }

      this.logger.info('Portfolio rebalanced', { trades: trades.length });
      return { success: true, trades, reason: 'rebalanced' };
    } catch (err) {
      const error = new CycleError(`Rebalance failed: ${errorMessage(err)}`, { phase: 'rebalance' });
      this.logger.error(error.message, errorFields(error));
      return { success: false, trades, reason: error.message };
    }
  }

  private abortRebalance(
    trades: RebalanceTrade[],
    side: 'buy' | 'sell',
    instrument: string,
    amount: number
  ): RebalanceResult {
    const error = new OrderRejectedError(`Rebalance ${side} rejected for ${instrument}`, {
      instrument,
      side,
      amount,
      filled: trades.length,
    });
    this.logger.warn(error.message, errorFields(error));
    return { success: false, trades, reason: error.message };
  }
}
