/**
 * Strategy Controller Tests
 *
 * Covers the confidence gate, buy sizing limits, full exits, soft
 * failures and the per-instrument cycle.
 */

import { describe, it, expect } from 'vitest';
import { PaperExchange, type PaperExchangeConfig } from '@tradeloop/exchange';
import { createLogger } from '@tradeloop/logger';
import { PositionLedger } from '@tradeloop/risk';
import { StrategyController, type TradingLimits } from '../src/controller.js';
import { FixedEvaluator, type FixedSignals } from './helpers/fixed-evaluator.js';

const logger = createLogger({ level: 'error', silent: true });

function setup(
  exchange: PaperExchangeConfig,
  limits: Partial<TradingLimits> = {},
  fixed: FixedSignals = {}
) {
  const paper = new PaperExchange({ ...exchange, logger });
  const ledger = new PositionLedger();
  const controller = new StrategyController({
    evaluator: new FixedEvaluator(paper, fixed),
    market: paper,
    account: paper,
    orders: paper,
    ledger,
    logger,
    limits: { tradeAmount: 10_000, maxInvestRatio: 0.5, throttleMs: 0, ...limits },
    clock: () => new Date('2025-01-15T00:00:00Z'),
  });
  return { paper, ledger, controller };
}

describe('StrategyController.executeTrade gate', () => {
  it('should hold on a flat signal', async () => {
    const { controller, paper } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } });

    await expect(controller.executeTrade('KRW-BTC', { signal: 0, confidence: 0.9 })).resolves.toEqual({
      success: true,
      action: 'hold',
      reason: 'no_signal',
      detail: 'Flat signal',
    });
    expect(paper.callLog).toEqual([]);
  });

  it('should hold below the confidence threshold', async () => {
    const { controller } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } });

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.59 });

    expect(result).toMatchObject({ success: true, action: 'hold', reason: 'low_confidence' });
  });

  it('should act at exactly the threshold', async () => {
    const { controller } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } });

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.6 });

    expect(result.action).toBe('buy');
  });
});

describe('StrategyController entries', () => {
  it('should buy the configured trade amount when cash and exposure allow', async () => {
    const { controller, paper } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } });

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 });

    expect(result).toMatchObject({
      success: true,
      action: 'buy',
      reason: 'entry',
      notional: 10_000,
      price: 1_000,
    });
    expect(result.orderId).toBe(paper.orders[0]?.id);
    await expect(paper.getBalance('BTC')).resolves.toBe(10);
  });

  it('should cap the buy at 90% of free cash', async () => {
    const { controller } = setup({ cash: 8_000, prices: { 'KRW-BTC': 1_000 } }, { maxInvestRatio: 1 });

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 });

    expect(result.notional).toBe(7_200);
  });

  it('should cap the buy at the remaining exposure headroom', async () => {
    // 40% already in BTC: headroom (0.5 - 0.4) * 100000
    const { controller } = setup(
      { cash: 60_000, holdings: { BTC: 40 }, prices: { 'KRW-BTC': 1_000 } },
      { tradeAmount: 50_000 }
    );

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 });

    expect(result.notional).toBeCloseTo(10_000, 6);
  });

  it('should hold once the exposure limit is reached', async () => {
    const { controller, paper } = setup({
      cash: 50_000,
      holdings: { BTC: 50 },
      prices: { 'KRW-BTC': 1_000 },
    });

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 });

    expect(result).toMatchObject({ success: true, action: 'hold', reason: 'max_exposure' });
    expect(paper.orders).toHaveLength(0);
  });

  it('should hold without ordering when the size falls below the exchange minimum', async () => {
    const { controller, paper } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } }, { tradeAmount: 4_999 });

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 });

    expect(result).toEqual({
      success: true,
      action: 'hold',
      reason: 'below_min_notional',
      detail: 'Order size 4999 below minimum 5000',
    });
    expect(paper.callLog.some((entry) => entry.call === 'buy')).toBe(false);
  });

  it('should report a rejected buy as a failed hold', async () => {
    const { controller, paper } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } });
    paper.failNext('buy');

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 });

    expect(result).toEqual({
      success: false,
      action: 'hold',
      reason: 'order_rejected',
      detail: 'Buy rejected for KRW-BTC',
      errorCode: 'ORDER_REJECTED',
    });
    expect(paper.callLog.filter((entry) => entry.call === 'buy')).toHaveLength(1);
  });
});

describe('StrategyController exits', () => {
  it('should sell the whole holding and close the ledger entry', async () => {
    const { controller, paper, ledger } = setup({ holdings: { ETH: 3 }, prices: { 'KRW-ETH': 2_000 } });
    ledger.observe({ instrument: 'KRW-ETH', currency: 'ETH', quantity: 3, price: 1_900, now: new Date() });

    const result = await controller.executeTrade('KRW-ETH', { signal: -1, confidence: 0.7 });

    expect(result).toMatchObject({ success: true, action: 'sell', reason: 'exit', quantity: 3, price: 2_000 });
    expect(ledger.has('KRW-ETH')).toBe(false);
    await expect(paper.getBalance('KRW')).resolves.toBe(6_000);
  });

  it('should hold when nothing is held', async () => {
    const { controller } = setup({ cash: 10_000, prices: { 'KRW-ETH': 2_000 } });

    const result = await controller.executeTrade('KRW-ETH', { signal: -1, confidence: 0.7 });

    expect(result).toMatchObject({ success: true, action: 'hold', reason: 'no_holding' });
  });

  it('should keep the ledger entry when the sell is rejected', async () => {
    const { controller, paper, ledger } = setup({ holdings: { ETH: 3 }, prices: { 'KRW-ETH': 2_000 } });
    ledger.observe({ instrument: 'KRW-ETH', currency: 'ETH', quantity: 3, price: 1_900, now: new Date() });
    paper.failNext('sell');

    const result = await controller.executeTrade('KRW-ETH', { signal: -1, confidence: 0.7 });

    expect(result).toMatchObject({ success: false, action: 'hold', reason: 'order_rejected' });
    expect(ledger.has('KRW-ETH')).toBe(true);
  });
});

describe('StrategyController soft failures', () => {
  it('should fail the hold when the price is unavailable', async () => {
    const { controller, paper } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } });
    paper.failNext('price');

    await expect(controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 })).resolves.toEqual({
      success: false,
      action: 'hold',
      reason: 'price_unavailable',
      detail: 'Price unavailable for KRW-BTC',
      errorCode: 'DATA_UNAVAILABLE',
    });
  });

  it('should fail the hold when a balance is unavailable', async () => {
    const { controller, paper } = setup({ cash: 100_000, prices: { 'KRW-BTC': 1_000 } });
    paper.failNext('balance');

    const result = await controller.executeTrade('KRW-BTC', { signal: 1, confidence: 0.8 });

    expect(result).toMatchObject({ success: false, action: 'hold', reason: 'balance_unavailable' });
    expect(paper.orders).toHaveLength(0);
  });
});

describe('StrategyController.runCycle', () => {
  it('should visit every instrument and record its last signal', async () => {
    const { controller } = setup(
      { cash: 100_000, prices: { 'KRW-BTC': 1_000, 'KRW-ETH': 500 } },
      {},
      { 'KRW-BTC': { signal: 1, confidence: 0.9 }, 'KRW-ETH': { signal: 0, confidence: 0.4 } }
    );

    const report = await controller.runCycle(['KRW-BTC', 'KRW-ETH']);

    expect(report.timestamp).toBe('2025-01-15T00:00:00.000Z');
    expect(report.results.map((r) => [r.instrument, r.trade.action])).toEqual([
      ['KRW-BTC', 'buy'],
      ['KRW-ETH', 'hold'],
    ]);
    expect(controller.getLastSignal('KRW-ETH')).toEqual({
      signal: 0,
      confidence: 0.4,
      timestamp: '2025-01-15T00:00:00.000Z',
    });
  });

  it('should report a failing instrument and carry on with the next', async () => {
    const { controller } = setup(
      { cash: 100_000, prices: { 'KRW-ETH': 500 } },
      {},
      { 'KRW-BTC': new Error('boom'), 'KRW-ETH': { signal: 1, confidence: 0.9 } }
    );

    const report = await controller.runCycle(['KRW-BTC', 'KRW-ETH']);

    expect(report.results[0]).toEqual({
      instrument: 'KRW-BTC',
      signal: 0,
      confidence: 0,
      trade: {
        success: false,
        action: 'hold',
        reason: 'error',
        detail: 'Strategy cycle failed for KRW-BTC: boom',
        errorCode: 'CYCLE_ERROR',
      },
    });
    expect(report.results[1]?.trade.action).toBe('buy');
    expect(controller.getLastSignal('KRW-BTC')).toBeUndefined();
  });

  it('should pause between instruments', async () => {
    const { controller } = setup({ cash: 100_000 }, { throttleMs: 30 });

    const started = Date.now();
    await controller.runCycle(['KRW-BTC', 'KRW-ETH', 'KRW-XRP']);

    expect(Date.now() - started).toBeGreaterThanOrEqual(55);
  });
});
