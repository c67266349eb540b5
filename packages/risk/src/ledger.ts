/**
 * @fileoverview Position ledger.
 *
 * Sole owner of per-instrument position state. Entries are created the
 * first time a nonzero balance is observed and deleted on full exit, so a
 * later re-entry starts with fresh entry price and extrema.
 *
 * @module @tradeloop/risk/ledger
 */

import type { Position, PositionState } from '@tradeloop/contracts';
import { ratchetTrailingStop } from './trailing-stop.js';

interface LedgerEntry {
  position: Position;
  state: Exclude<PositionState, 'NONE'>;
}

/**
 * A single price observation for a held instrument.
 */
export interface Observation {
  instrument: string;
  currency: string;
  quantity: number;
  price: number;
  now: Date;
  /** Trailing distance; omit to leave the trailing stop unmanaged */
  trailingPct?: number;
}

/**
 * In-memory store of open positions keyed by instrument.
 *
 * Reads hand out copies; callers change state only through the methods
 * below.
 *
 * @example
 * ```typescript
 * const ledger = new PositionLedger();
 * ledger.observe({ instrument: 'KRW-BTC', currency: 'BTC', quantity: 0.1, price: 100, now: new Date() });
 * ledger.state('KRW-BTC'); // 'OPEN'
 * ```
 */
export class PositionLedger {
  private readonly entries = new Map<string, LedgerEntry>();

  get(instrument: string): Position | undefined {
    const entry = this.entries.get(instrument);
    return entry ? { ...entry.position } : undefined;
  }

  has(instrument: string): boolean {
    return this.entries.has(instrument);
  }

  list(): Position[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry.position }));
  }

  state(instrument: string): PositionState {
    return this.entries.get(instrument)?.state ?? 'NONE';
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Create or refresh the entry for an observed holding.
   *
   * A new entry takes the observed price as its entry price. An existing
   * entry keeps its entry price and extends its extrema.
   */
  observe(observation: Observation): Position {
    const { instrument, currency, quantity, price, now, trailingPct } = observation;
    const existing = this.entries.get(instrument);

    if (!existing) {
      const position: Position = {
        instrument,
        currency,
        quantity,
        entryPrice: price,
        entryTime: now.toISOString(),
        currentPrice: price,
        highestPrice: price,
        lowestPrice: price,
      };
      if (trailingPct !== undefined) {
        position.trailingStopPrice = ratchetTrailingStop(undefined, price, trailingPct);
      }
      this.entries.set(instrument, { position, state: 'OPEN' });
      return { ...position };
    }

    const position = existing.position;
    position.quantity = quantity;
    position.currentPrice = price;
    position.highestPrice = Math.max(position.highestPrice, price);
    position.lowestPrice = Math.min(position.lowestPrice, price);
    if (trailingPct !== undefined) {
      position.trailingStopPrice = ratchetTrailingStop(position.trailingStopPrice, price, trailingPct);
    }
    return { ...position };
  }

  /**
   * Record a partial exit. Removes the entry if nothing is left.
   *
   * @returns The remaining position, or undefined if it was closed or unknown
   */
  reduce(instrument: string, soldQuantity: number): Position | undefined {
    const entry = this.entries.get(instrument);
    if (!entry) return undefined;

    const remaining = entry.position.quantity - soldQuantity;
    if (remaining <= 0) {
      this.entries.delete(instrument);
      return undefined;
    }

    entry.position.quantity = remaining;
    entry.state = 'PARTIAL';
    return { ...entry.position };
  }

  /**
   * Record a full exit.
   *
   * @returns Whether an entry existed
   */
  close(instrument: string): boolean {
    return this.entries.delete(instrument);
  }

  /**
   * Drop every entry whose instrument is not in `instruments`.
   *
   * @returns Instruments that were dropped
   */
  retain(instruments: ReadonlySet<string>): string[] {
    const dropped: string[] = [];
    for (const instrument of this.entries.keys()) {
      if (instruments.has(instrument)) continue;
      this.entries.delete(instrument);
      dropped.push(instrument);
    }
    return dropped;
  }

  clear(): void {
    this.entries.clear();
  }
}
