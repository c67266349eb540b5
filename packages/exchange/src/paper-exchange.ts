/**
 * In-memory paper exchange.
 *
 * Holds cash and coin balances in memory and fills market orders at once
 * at the current price. Prices and bars come either from seeded data or
 * from an upstream market data provider (live prices, simulated fills).
 *
 * Scripted failures make the next N calls of a kind answer `null`, the
 * same soft failure a live exchange produces.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  parseInstrument,
  toInstrument,
  type Balance,
  type CandleInterval,
  type Exchange,
  type MarketDataProvider,
  type Order,
  type PriceBar,
} from '@tradeloop/contracts';
import { createLogger, type Logger } from '@tradeloop/logger';

export type PaperCall = 'price' | 'bars' | 'balance' | 'balances' | 'buy' | 'sell';

export interface PaperCallEntry {
  call: PaperCall;
  instrument?: string;
  amount?: number;
}

/** Entries kept in the call log and the fill history by default */
export const DEFAULT_PAPER_HISTORY_LIMIT = 500;

export interface PaperExchangeConfig {
  /** Cash currency (default: 'KRW') */
  quoteCurrency?: string;
  /** Starting cash */
  cash?: number;
  /** Starting coin balances by currency, e.g. { BTC: 0.1 } */
  holdings?: Record<string, number>;
  /** Seeded prices by instrument */
  prices?: Record<string, number>;
  /** Seeded bars by instrument, oldest first */
  bars?: Record<string, PriceBar[]>;
  /** Fee charged on each fill, as a fraction of its value (default: 0) */
  feeRate?: number;
  /** Live prices and bars; seeded data is used when omitted */
  marketData?: MarketDataProvider;
  /** Most recent calls and fills kept for inspection (default: 500) */
  historyLimit?: number;
  /** If not provided, logging is disabled */
  logger?: Logger;
  clock?: () => Date;
}

interface Holding {
  quantity: number;
  avgBuyPrice: number;
}

/**
 * @example
 * ```typescript
 * const paper = new PaperExchange({ cash: 1_000_000, prices: { 'KRW-BTC': 50_000_000 } });
 * await paper.buyMarket('KRW-BTC', 100_000);
 * await paper.getBalance('BTC'); // 0.002
 * ```
 */
export class PaperExchange implements Exchange {
  readonly id = 'paper';

  private readonly quoteCurrency: string;
  private readonly feeRate: number;
  private readonly marketData?: MarketDataProvider;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly historyLimit: number;

  private cash: number;
  private readonly holdings = new Map<string, Holding>();
  private readonly prices = new Map<string, number>();
  private readonly bars = new Map<string, PriceBar[]>();
  private readonly failures = new Map<PaperCall, number>();
  private readonly filled: Order[] = [];
  private readonly calls: PaperCallEntry[] = [];

  constructor(config: PaperExchangeConfig = {}) {
    this.quoteCurrency = config.quoteCurrency ?? 'KRW';
    this.feeRate = config.feeRate ?? 0;
    this.marketData = config.marketData;
    this.logger = (config.logger ?? createLogger({ level: 'error', silent: true })).child({
      component: 'paper-exchange',
    });
    this.clock = config.clock ?? (() => new Date());
    this.cash = config.cash ?? 0;
    this.historyLimit = config.historyLimit ?? DEFAULT_PAPER_HISTORY_LIMIT;
    if (!Number.isInteger(this.historyLimit) || this.historyLimit < 1) {
      throw new Error(`historyLimit must be a positive integer, got ${this.historyLimit}`);
    }

    for (const [currency, quantity] of Object.entries(config.holdings ?? {})) {
      this.setHolding(currency, quantity);
    }
    for (const [instrument, price] of Object.entries(config.prices ?? {})) {
      this.setPrice(instrument, price);
    }
    for (const [instrument, bars] of Object.entries(config.bars ?? {})) {
      this.setBars(instrument, bars);
    }
  }

  setPrice(instrument: string, price: number): void {
    this.prices.set(instrument, price);
  }

  /**
   * Seed bars; the last close becomes the current price unless one is set.
   */
  setBars(instrument: string, bars: PriceBar[]): void {
    this.bars.set(instrument, [...bars]);
    const last = bars.at(-1);
    if (last && !this.prices.has(instrument)) this.prices.set(instrument, last.close);
  }

  setCash(amount: number): void {
    this.cash = amount;
  }

  setHolding(currency: string, quantity: number, avgBuyPrice = 0): void {
    if (quantity <= 0) {
      this.holdings.delete(currency);
      return;
    }
    this.holdings.set(currency, { quantity, avgBuyPrice });
  }

  /**
   * Make the next `times` calls of `call` answer null.
   */
  failNext(call: PaperCall, times = 1): void {
    this.failures.set(call, (this.failures.get(call) ?? 0) + times);
  }

  /** Most recent filled orders, oldest first */
  get orders(): readonly Order[] {
    return this.filled;
  }

  /** Most recent calls received, in order, including those that failed */
  get callLog(): readonly PaperCallEntry[] {
    return this.calls;
  }

  async getCurrentPrice(instrument: string): Promise<number | null> {
    this.remember(this.calls, { call: 'price', instrument });
    if (this.consumeFailure('price')) return null;

    if (this.marketData) {
      const live = await this.marketData.getCurrentPrice(instrument);
      if (live !== null) this.prices.set(instrument, live);
      return live;
    }
    return this.prices.get(instrument) ?? null;
  }

  async getBars(instrument: string, interval: CandleInterval, count: number): Promise<PriceBar[] | null> {
    this.remember(this.calls, { call: 'bars', instrument, amount: count });
    if (this.consumeFailure('bars')) return null;

    if (this.marketData) {
      return this.marketData.getBars(instrument, interval, count);
    }
    const bars = this.bars.get(instrument);
    if (!bars || bars.length === 0) return null;
    return bars.slice(-count);
  }

  async getBalance(currency: string): Promise<number | null> {
    this.remember(this.calls, { call: 'balance' });
    if (this.consumeFailure('balance')) return null;

    if (currency === this.quoteCurrency) return this.cash;
    return this.holdings.get(currency)?.quantity ?? 0;
  }

  async getBalances(): Promise<Balance[] | null> {
    this.remember(this.calls, { call: 'balances' });
    if (this.consumeFailure('balances')) return null;

    const rows: Balance[] = [
      { currency: this.quoteCurrency, balance: this.cash, locked: 0, avgBuyPrice: 0 },
    ];
    for (const [currency, holding] of this.holdings) {
      rows.push({ currency, balance: holding.quantity, locked: 0, avgBuyPrice: holding.avgBuyPrice });
    }
    return rows;
  }

  async buyMarket(instrument: string, notional: number): Promise<Order | null> {
    this.remember(this.calls, { call: 'buy', instrument, amount: notional });
    if (this.consumeFailure('buy')) return null;

    const price = this.prices.get(instrument);
    if (price === undefined || price <= 0) {
      this.logger.warn('Paper buy rejected: no price', { instrument });
      return null;
    }
    if (notional <= 0 || notional > this.cash) {
      this.logger.warn('Paper buy rejected: insufficient cash', { instrument, notional, cash: this.cash });
      return null;
    }

    const { base } = parseInstrument(instrument);
    const quantity = (notional * (1 - this.feeRate)) / price;
    const current = this.holdings.get(base);
    const heldQuantity = current?.quantity ?? 0;
    const avgBuyPrice = current
      ? (current.quantity * current.avgBuyPrice + quantity * price) / (heldQuantity + quantity)
      : price;

    this.cash -= notional;
    this.holdings.set(base, { quantity: heldQuantity + quantity, avgBuyPrice });

    return this.recordFill({ instrument, side: 'buy', notional, quantity, price });
  }

  async sellMarket(instrument: string, quantity: number): Promise<Order | null> {
    this.remember(this.calls, { call: 'sell', instrument, amount: quantity });
    if (this.consumeFailure('sell')) return null;

    const price = this.prices.get(instrument);
    if (price === undefined || price <= 0) {
      this.logger.warn('Paper sell rejected: no price', { instrument });
      return null;
    }

    const { base } = parseInstrument(instrument);
    const current = this.holdings.get(base);
    if (!current || quantity <= 0 || quantity > current.quantity) {
      this.logger.warn('Paper sell rejected: insufficient balance', {
        instrument,
        quantity,
        held: current?.quantity ?? 0,
      });
      return null;
    }

    const proceeds = quantity * price * (1 - this.feeRate);
    this.cash += proceeds;
    this.setHolding(base, current.quantity - quantity, current.avgBuyPrice);

    return this.recordFill({ instrument, side: 'sell', notional: proceeds, quantity, price });
  }

  /**
   * Quote-currency value of cash plus holdings at the last known prices.
   */
  totalValue(): number {
    let total = this.cash;
    for (const [currency, holding] of this.holdings) {
      const price = this.prices.get(toInstrument(this.quoteCurrency, currency)) ?? 0;
      total += holding.quantity * price;
    }
    return total;
  }

  private consumeFailure(call: PaperCall): boolean {
    const remaining = this.failures.get(call) ?? 0;
    if (remaining <= 0) return false;
    this.failures.set(call, remaining - 1);
    return true;
  }

  private recordFill(fill: {
    instrument: string;
    side: 'buy' | 'sell';
    notional: number;
    quantity: number;
    price: number;
  }): Order {
    const order: Order = {
      id: uuidv4(),
      instrument: fill.instrument,
      side: fill.side,
      notional: fill.notional,
      quantity: fill.quantity,
      createdAt: this.clock().toISOString(),
    };
    this.remember(this.filled, order);
    this.logger.info(`Paper ${fill.side} filled`, {
      instrument: fill.instrument,
      quantity: fill.quantity,
      price: fill.price,
      notional: fill.notional,
      order_id: order.id,
    });
    return order;
  }

  private remember<T>(history: T[], entry: T): void {
    history.push(entry);
    if (history.length > this.historyLimit) {
      history.splice(0, history.length - this.historyLimit);
    }
  }
}
