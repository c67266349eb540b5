/**
 * @fileoverview Portfolio valuation and concentration levels.
 * @module @tradeloop/risk/portfolio
 */

import type { Exposure, Portfolio, RiskLevel } from '@tradeloop/contracts';
import type { RiskConfig } from './risk-config.js';

/**
 * A priced holding, before ratios are known.
 */
export interface Holding {
  instrument: string;
  quantity: number;
  price: number;
}

/**
 * Concentration level from the largest single exposure ratio.
 *
 * @example
 * ```typescript
 * classifyRiskLevel(0.55, { high: 0.5, medium: 0.3 }); // 'high'
 * classifyRiskLevel(0.3, { high: 0.5, medium: 0.3 });  // 'low'
 * ```
 */
export function classifyRiskLevel(maxRatio: number, thresholds: RiskConfig['exposure']): RiskLevel {
  if (maxRatio > thresholds.high) return 'high';
  if (maxRatio > thresholds.medium) return 'medium';
  return 'low';
}

/**
 * Value `holdings` against `cash` and classify the result.
 */
export function valuePortfolio(
  cash: number,
  holdings: readonly Holding[],
  thresholds: RiskConfig['exposure'],
  now: Date
): Portfolio {
  const totalBalance = holdings.reduce((sum, h) => sum + h.quantity * h.price, cash);

  const exposure: Record<string, Exposure> = {};
  let maxRatio = 0;

  for (const holding of holdings) {
    const value = holding.quantity * holding.price;
    const ratio = totalBalance > 0 ? value / totalBalance : 0;
    exposure[holding.instrument] = {
      value,
      quantity: holding.quantity,
      price: holding.price,
      ratio,
    };
    maxRatio = Math.max(maxRatio, ratio);
  }

  return {
    cashBalance: cash,
    totalBalance,
    exposure,
    riskLevel: classifyRiskLevel(maxRatio, thresholds),
    timestamp: now.toISOString(),
  };
}

/**
 * Snapshot returned when balances could not be read.
 */
export function unknownPortfolio(now: Date): Portfolio {
  return {
    cashBalance: 0,
    totalBalance: 0,
    exposure: {},
    riskLevel: 'unknown',
    timestamp: now.toISOString(),
  };
}
