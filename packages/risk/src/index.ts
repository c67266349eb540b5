/**
 * @fileoverview Main entry point for @tradeloop/risk package.
 *
 * Position ledger, exit rules, portfolio concentration and rebalancing.
 *
 * @module @tradeloop/risk
 */

export { PositionLedger } from './ledger.js';
export type { Observation } from './ledger.js';

export { RiskEngine } from './risk-engine.js';
export type { RiskActionResult, RiskEngineOptions } from './risk-engine.js';

export { evaluateExit, profitPct } from './exit-rules.js';
export type { RiskAction, ExitReason, RiskDecision } from './exit-rules.js';

export { DEFAULT_RISK_CONFIG, resolveRiskConfig, validateRiskConfig } from './risk-config.js';
export type { RiskConfig, RiskConfigOverrides } from './risk-config.js';

export { trailingStopFor, ratchetTrailingStop } from './trailing-stop.js';

export { classifyRiskLevel, valuePortfolio, unknownPortfolio } from './portfolio.js';
export type { Holding } from './portfolio.js';

export { planRebalanceSells, planRebalanceBuys } from './rebalance.js';
export type {
  TargetAllocation,
  PlannedSell,
  PlannedBuy,
  RebalanceTrade,
  RebalanceResult,
} from './rebalance.js';
