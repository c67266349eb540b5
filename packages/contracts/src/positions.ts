/**
 * @fileoverview Position and portfolio types.
 *
 * @module @tradeloop/contracts/positions
 */

/**
 * One held instrument tracked by the position ledger.
 *
 * @invariant quantity >= 0
 * @invariant highestPrice is the running maximum of observed prices since entry
 * @invariant lowestPrice is the running minimum of observed prices since entry
 * @invariant trailingStopPrice, once set, never decreases
 */
export interface Position {
  /** Instrument identifier, e.g. 'KRW-BTC' */
  instrument: string;

  /** Base currency of the instrument, e.g. 'BTC' */
  currency: string;

  quantity: number;

  /** First observed price; the true fill price is not tracked */
  entryPrice: number;

  /** ISO 8601 time the position was first observed */
  entryTime: string;

  currentPrice: number;
  highestPrice: number;
  lowestPrice: number;
  trailingStopPrice?: number;
}

/**
 * Lifecycle state of an instrument in the ledger.
 *
 * NONE -> OPEN -> (PARTIAL) -> NONE
 */
export type PositionState = 'NONE' | 'OPEN' | 'PARTIAL';

export type RiskLevel = 'low' | 'medium' | 'high';

/**
 * Exposure of the portfolio to one instrument.
 */
export interface Exposure {
  /** Quote-currency value of the holding */
  value: number;
  quantity: number;
  price: number;
  /** value / total portfolio balance */
  ratio: number;
}

/**
 * Portfolio snapshot.
 *
 * `riskLevel` is 'unknown' only when the snapshot could not be read.
 */
export interface Portfolio {
  cashBalance: number;
  /** cash + sum of quantity * price over all holdings */
  totalBalance: number;
  exposure: Record<string, Exposure>;
  riskLevel: RiskLevel | 'unknown';
  timestamp: string;
}
