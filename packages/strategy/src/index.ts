/**
 * @fileoverview Main entry point for @tradeloop/strategy package.
 *
 * Signal fusion, confidence scoring and the strategy controller that
 * turns fused signals into market orders.
 *
 * @module @tradeloop/strategy
 */

export { DEFAULT_SIGNAL_WEIGHTS, SIGNAL_THRESHOLD, resolveWeights } from './weights.js';
export type { SignalWeights } from './weights.js';

export { fuse, weightedSum, discretize } from './fuser.js';
export type { FusedRow, FusionResult, FuseOptions } from './fuser.js';

export { computeConfidence, PERSISTENCE_LOOKBACK, DEFAULT_CONFIDENCE } from './confidence.js';
export type { ConfidenceFactors } from './confidence.js';

export { SignalEvaluator } from './evaluator.js';
export type { SignalEvaluation, SignalEvaluatorOptions } from './evaluator.js';

export { StrategyController } from './controller.js';
export type {
  TradeAction,
  TradeReason,
  TradeResult,
  InstrumentCycleResult,
  StrategyCycleReport,
  LastSignal,
  TradingLimits,
  StrategyControllerOptions,
} from './controller.js';
