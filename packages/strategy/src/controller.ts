/**
 * Strategy Controller
 *
 * Turns fused signals into bounded market orders. A signal is acted on
 * only when it is directional and confident enough; buys are capped by the
 * configured trade size, free cash and the per-instrument exposure limit,
 * sells close the whole holding.
 *
 * @module @tradeloop/strategy/controller
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  CycleError,
  DataUnavailableError,
  OrderRejectedError,
  errorFields,
  errorMessage,
  parseInstrument,
  type AccountProvider,
  type FusedSignal,
  type MarketDataProvider,
  type OrderProvider,
  type Signal,
} from '@tradeloop/contracts';
import type { Logger } from '@tradeloop/logger';
import type { PositionLedger } from '@tradeloop/risk';
import type { SignalEvaluation, SignalEvaluator } from './evaluator.js';

export type TradeAction = 'buy' | 'sell' | 'hold';

export type TradeReason =
  | 'entry'
  | 'exit'
  | 'no_signal'
  | 'low_confidence'
  | 'max_exposure'
  | 'below_min_notional'
  | 'no_holding'
  | 'price_unavailable'
  | 'balance_unavailable'
  | 'order_rejected'
  | 'error';

/**
 * Outcome of acting on one signal.
 *
 * `success: false` always comes with `action: 'hold'`.
 */
export interface TradeResult {
  success: boolean;
  action: TradeAction;
  reason: TradeReason;
  detail: string;
  orderId?: string;
  /** Quote currency spent (buys) */
  notional?: number;
  /** Base currency sold (sells) */
  quantity?: number;
  price?: number;
  /** TradeLoopError code for failed holds */
  errorCode?: string;
}

export interface InstrumentCycleResult {
  instrument: string;
  signal: Signal;
  confidence: number;
  trade: TradeResult;
}

export interface StrategyCycleReport {
  results: InstrumentCycleResult[];
  timestamp: string;
}

export interface LastSignal {
  signal: Signal;
  confidence: number;
  timestamp: string;
}

export interface TradingLimits {
  /** Largest single buy, in quote currency */
  tradeAmount: number;
  /** Largest share of total assets one instrument may take (0-1) */
  maxInvestRatio: number;
  /** Smallest confidence acted on (default: 0.6) */
  minConfidence?: number;
  /** Smallest order the exchange accepts (default: 5000) */
  minOrderNotional?: number;
  /** Share of free cash a buy may use (default: 0.9) */
  cashUsageRatio?: number;
  /** Pause between instruments in a cycle (default: 500ms) */
  throttleMs?: number;
  /** Cash currency (default: 'KRW') */
  quoteCurrency?: string;
}

export interface StrategyControllerOptions {
  evaluator: SignalEvaluator;
  market: MarketDataProvider;
  account: AccountProvider;
  orders: OrderProvider;
  ledger: PositionLedger;
  logger: Logger;
  limits: TradingLimits;
  clock?: () => Date;
}

const DEFAULT_LIMITS: Required<Omit<TradingLimits, 'tradeAmount' | 'maxInvestRatio'>> = {
  minConfidence: 0.6,
  minOrderNotional: 5000,
  cashUsageRatio: 0.9,
  throttleMs: 500,
  quoteCurrency: 'KRW',
};

/**
 * @example
 * ```typescript
 * const controller = new StrategyController({ evaluator, market: exchange, account: exchange,
 *   orders: exchange, ledger, logger, limits: { tradeAmount: 10_000, maxInvestRatio: 0.2 } });
 * const report = await controller.runCycle(['KRW-BTC', 'KRW-ETH']);
 * ```
 */
export class StrategyController {
  private readonly evaluator: SignalEvaluator;
  private readonly market: MarketDataProvider;
  private readonly account: AccountProvider;
  private readonly orders: OrderProvider;
  private readonly ledger: PositionLedger;
  private readonly logger: Logger;
  private readonly limits: Required<TradingLimits>;
  private readonly clock: () => Date;
  private readonly lastSignals = new Map<string, LastSignal>();

  constructor(options: StrategyControllerOptions) {
    this.evaluator = options.evaluator;
    this.market = options.market;
    this.account = options.account;
    this.orders = options.orders;
    this.ledger = options.ledger;
    this.logger = options.logger.child({ component: 'strategy' });
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.clock = options.clock ?? (() => new Date());

    if (this.limits.maxInvestRatio <= 0 || this.limits.maxInvestRatio > 1) {
      throw new Error('maxInvestRatio must be in (0, 1]');
    }
    if (this.limits.tradeAmount <= 0) {
      throw new Error('tradeAmount must be positive');
    }
  }

  /**
   * Evaluate `instrument` and remember the result.
   */
  async getSignal(instrument: string): Promise<SignalEvaluation> {
    const evaluation = await this.evaluator.evaluate(instrument);
    this.lastSignals.set(instrument, {
      signal: evaluation.signal,
      confidence: evaluation.confidence,
      timestamp: this.clock().toISOString(),
    });
    return evaluation;
  }

  getLastSignal(instrument: string): LastSignal | undefined {
    return this.lastSignals.get(instrument);
  }

  /**
   * Act on a fused signal for one instrument.
   */
  async executeTrade(instrument: string, fused: Pick<FusedSignal, 'signal' | 'confidence'>): Promise<TradeResult> {
    const { signal, confidence } = fused;

    if (signal === 0) {
      return hold('no_signal', 'Flat signal');
    }
    if (confidence < this.limits.minConfidence) {
      return hold('low_confidence', `Confidence ${confidence.toFixed(2)} below ${this.limits.minConfidence}`);
    }

    try {
      const price = await this.market.getCurrentPrice(instrument);
      if (price === null) {
        return this.dataFailure(
          'price_unavailable',
          new DataUnavailableError(`Price unavailable for ${instrument}`, { resource: 'price', instrument })
        );
      }

      const { base } = parseInstrument(instrument);
      const cash = await this.account.getBalance(this.limits.quoteCurrency);
      const held = await this.account.getBalance(base);
      if (cash === null || held === null) {
        return this.dataFailure(
          'balance_unavailable',
          new DataUnavailableError(`Balance unavailable for ${instrument}`, {
            resource: 'balance',
            instrument,
            currency: cash === null ? this.limits.quoteCurrency : base,
          })
        );
      }

      return signal > 0
        ? await this.enter(instrument, price, cash, held)
        : await this.exit(instrument, price, held);
    } catch (err) {
      const error = new CycleError(`Trade failed for ${instrument}: ${errorMessage(err)}`, {
        phase: 'trade',
        instrument,
      });
      this.logger.error(error.message, errorFields(error));
      return { ...hold('error', error.message), success: false, errorCode: error.code };
    }
  }

  /**
   * Evaluate and trade every instrument in turn, pausing between them.
   * A failure on one instrument is reported in its result and the cycle
   * moves on.
   */
  async runCycle(instruments: readonly string[]): Promise<StrategyCycleReport> {
    const results: InstrumentCycleResult[] = [];

    for (const [position, instrument] of instruments.entries()) {
      try {
        const evaluation = await this.getSignal(instrument);
        const trade = await this.executeTrade(instrument, evaluation);
        results.push({ instrument, signal: evaluation.signal, confidence: evaluation.confidence, trade });
      } catch (err) {
        const error = new CycleError(`Strategy cycle failed for ${instrument}: ${errorMessage(err)}`, {
          phase: 'strategy',
          instrument,
        });
        this.logger.error(error.message, errorFields(error));
        results.push({
          instrument,
          signal: 0,
          confidence: 0,
          trade: { ...hold('error', error.message), success: false, errorCode: error.code },
        });
      }

      if (this.limits.throttleMs > 0 && position < instruments.length - 1) {
        await delay(this.limits.throttleMs);
      }
    }

    return { results, timestamp: this.clock().toISOString() };
  }

  private async enter(instrument: string, price: number, cash: number, held: number): Promise<TradeResult> {
    const coinValue = held * price;
    const totalAssets = cash + coinValue;
    const ratio = totalAssets > 0 ? coinValue / totalAssets : 0;

    if (ratio >= this.limits.maxInvestRatio) {
      return hold('max_exposure', `Already ${(ratio * 100).toFixed(2)}% of assets in ${instrument}`);
    }

    const notional = Math.min(
      this.limits.tradeAmount,
      cash * this.limits.cashUsageRatio,
      (this.limits.maxInvestRatio - ratio) * totalAssets
    );

    if (notional < this.limits.minOrderNotional) {
      return hold(
        'below_min_notional',
        `Order size ${Math.round(notional)} below minimum ${this.limits.minOrderNotional}`
      );
    }

    const order = await this.orders.buyMarket(instrument, notional);
    if (!order) {
      return this.orderFailure(
        new OrderRejectedError(`Buy rejected for ${instrument}`, { instrument, side: 'buy', amount: notional })
      );
    }

    this.logger.info('Entry order filled', { instrument, notional, price, order_id: order.id });
    return {
      success: true,
      action: 'buy',
      reason: 'entry',
      detail: `Bought ${notional} of ${instrument} at ${price}`,
      orderId: order.id,
      notional,
      price,
    };
  }

  private async exit(instrument: string, price: number, held: number): Promise<TradeResult> {
    if (held <= 0) {
      return hold('no_holding', `No ${instrument} held`);
    }

    const order = await this.orders.sellMarket(instrument, held);
    if (!order) {
      return this.orderFailure(
        new OrderRejectedError(`Sell rejected for ${instrument}`, { instrument, side: 'sell', amount: held })
      );
    }

    this.ledger.close(instrument);
    this.logger.info('Exit order filled', { instrument, quantity: held, price, order_id: order.id });
    return {
      success: true,
      action: 'sell',
      reason: 'exit',
      detail: `Sold ${held} of ${instrument} at ${price}`,
      orderId: order.id,
      quantity: held,
      price,
    };
  }

  private dataFailure(reason: TradeReason, error: DataUnavailableError): TradeResult {
    this.logger.warn(error.message, errorFields(error));
    return { ...hold(reason, error.message), success: false, errorCode: error.code };
  }

  private orderFailure(error: OrderRejectedError): TradeResult {
    this.logger.warn(error.message, errorFields(error));
    return { ...hold('order_rejected', error.message), success: false, errorCode: error.code };
  }
}

function hold(reason: TradeReason, detail: string): TradeResult {
  return { success: true, action: 'hold', reason, detail };
}
