/**
 * @fileoverview Tests for the position ledger and trailing stop arithmetic.
 */

import { describe, it, expect } from 'vitest';
import { PositionLedger, type Observation } from '../src/ledger.js';
import { ratchetTrailingStop } from '../src/trailing-stop.js';

const NOW = new Date('2025-01-15T00:00:00Z');

function observe(ledger: PositionLedger, price: number, overrides: Partial<Observation> = {}) {
  return ledger.observe({
    instrument: 'KRW-BTC',
    currency: 'BTC',
    quantity: 1,
    price,
    now: NOW,
    trailingPct: 0.02,
    ...overrides,
  });
}

describe('ratchetTrailingStop', () => {
  it('should initialize below the first price and only move up', () => {
    const first = ratchetTrailingStop(undefined, 100, 0.02);
    const raised = ratchetTrailingStop(first, 110, 0.02);
    const held = ratchetTrailingStop(raised, 105, 0.02);

    expect(first).toBeCloseTo(98, 10);
    expect(raised).toBeCloseTo(107.8, 10);
    expect(held).toBe(raised);
  });
});

describe('PositionLedger', () => {
  it('should open a position at the first observed price', () => {
    const ledger = new PositionLedger();

    const position = observe(ledger, 100);

    expect(position).toEqual({
      instrument: 'KRW-BTC',
      currency: 'BTC',
      quantity: 1,
      entryPrice: 100,
      entryTime: '2025-01-15T00:00:00.000Z',
      currentPrice: 100,
      highestPrice: 100,
      lowestPrice: 100,
      trailingStopPrice: 98,
    });
    expect(ledger.state('KRW-BTC')).toBe('OPEN');
  });

  it('should track extrema and raise the trailing stop (100 -> 110 -> 105)', () => {
    const ledger = new PositionLedger();
    observe(ledger, 100);
    observe(ledger, 110);
    const position = observe(ledger, 105);

    expect(position.entryPrice).toBe(100);
    expect(position.currentPrice).toBe(105);
    expect(position.highestPrice).toBe(110);
    expect(position.lowestPrice).toBe(100);
    expect(position.trailingStopPrice).toBeCloseTo(107.8, 10);
  });

  it('should never lower the trailing stop on a dip', () => {
    const ledger = new PositionLedger();
    const prices = [100, 120, 90, 130, 80, 125, 131];
    let previous = -Infinity;

    for (const price of prices) {
      const stop = observe(ledger, price).trailingStopPrice ?? -Infinity;
      expect(stop).toBeGreaterThanOrEqual(previous);
      previous = stop;
    }

    expect(previous).toBeCloseTo(131 * 0.98, 10);
    expect(ledger.get('KRW-BTC')?.lowestPrice).toBe(80);
  });

  it('should leave the trailing stop unset when not managed', () => {
    const ledger = new PositionLedger();

    const position = observe(ledger, 100, { trailingPct: undefined });

    expect(position.trailingStopPrice).toBeUndefined();
  });

  it('should move to PARTIAL on reduce and close when nothing is left', () => {
    const ledger = new PositionLedger();
    observe(ledger, 100, { quantity: 2 });

    expect(ledger.reduce('KRW-BTC', 1)?.quantity).toBe(1);
    expect(ledger.state('KRW-BTC')).toBe('PARTIAL');

    expect(ledger.reduce('KRW-BTC', 1)).toBeUndefined();
    expect(ledger.state('KRW-BTC')).toBe('NONE');
    expect(ledger.reduce('KRW-BTC', 1)).toBeUndefined();
  });

  it('should start fresh after a full exit', () => {
    const ledger = new PositionLedger();
    observe(ledger, 100);
    observe(ledger, 150);

    expect(ledger.close('KRW-BTC')).toBe(true);
    expect(ledger.has('KRW-BTC')).toBe(false);

    const reentry = observe(ledger, 120);
    expect(reentry.entryPrice).toBe(120);
    expect(reentry.highestPrice).toBe(120);
    expect(reentry.trailingStopPrice).toBeCloseTo(117.6, 10);
  });

  it('should drop instruments that are no longer held', () => {
    const ledger = new PositionLedger();
    observe(ledger, 100);
    observe(ledger, 10, { instrument: 'KRW-ETH', currency: 'ETH' });

    expect(ledger.retain(new Set(['KRW-ETH']))).toEqual(['KRW-BTC']);
    expect(ledger.list().map((p) => p.instrument)).toEqual(['KRW-ETH']);
    expect(ledger.size).toBe(1);

    ledger.clear();
    expect(ledger.size).toBe(0);
  });

  it('should hand out copies', () => {
    const ledger = new PositionLedger();
    observe(ledger, 100);

    const copy = ledger.get('KRW-BTC');
    if (copy) copy.quantity = 99;

    expect(ledger.get('KRW-BTC')?.quantity).toBe(1);
  });
});
