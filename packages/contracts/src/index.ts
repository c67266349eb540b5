/**
 * @fileoverview Main entry point for @tradeloop/contracts package.
 *
 * Exports the shared types, collaborator interfaces and error classes of
 * the trading loop.
 *
 * @module @tradeloop/contracts
 */

// Candle intervals
export {
  CandleInterval,
  isValidInterval,
  intervalToMinutes,
  intervalFromMinutes,
  getIntervalLabel,
  parseInterval,
  getAllIntervals,
} from './intervals.js';

// Market data types
export type { PriceBar, Balance, Order, OrderSide } from './market.js';
export { parseInstrument, toInstrument } from './market.js';

// Signals
export type { Signal, IndicatorName, FusedSignal } from './signals.js';
export { INDICATOR_NAMES, isSignal, signalLabel } from './signals.js';

// Positions and portfolio
export type { Position, PositionState, RiskLevel, Exposure, Portfolio } from './positions.js';

// Collaborator contracts
export type {
  MarketDataProvider,
  AccountProvider,
  OrderProvider,
  Exchange,
} from './providers.js';

// Error classes and guards
export {
  TradeLoopError,
  DataUnavailableError,
  OrderRejectedError,
  ComputationError,
  CycleError,
  ConfigurationError,
  ExchangeApiError,
  isTradeLoopError,
  isDataUnavailableError,
  isOrderRejectedError,
  isComputationError,
  isCycleError,
  isConfigurationError,
  isExchangeApiError,
  errorMessage,
  errorFields,
} from './errors.js';
