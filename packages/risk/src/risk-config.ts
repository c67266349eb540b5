/**
 * @fileoverview Risk management configuration types and defaults.
 * @module @tradeloop/risk/risk-config
 */

/**
 * Risk management configuration.
 *
 * Ratios are fractions (0.03 = 3%), amounts are in the quote currency.
 */
export interface RiskConfig {
  /** Loss from entry that forces a full exit (default: 0.03) */
  stopLoss: number;

  /** Gain from entry that triggers a partial exit (default: 0.05) */
  takeProfit: number;

  /** Distance of the trailing stop below the observed price (default: 0.02) */
  trailingStop: number;

  /** Maintain and enforce trailing stops (default: true) */
  useTrailingStop: boolean;

  /** Share of the position sold on take-profit (default: 0.5) */
  takeProfitSellRatio: number;

  /** Currency held as cash, e.g. 'KRW' */
  quoteCurrency: string;

  /** Smallest order the exchange accepts, in quote currency (default: 5000) */
  minOrderNotional: number;

  /** Pause between rebalance sells and buys so fills settle (default: 1000ms) */
  rebalanceSettleMs: number;

  /** Exposure thresholds for the portfolio risk level */
  exposure: {
    /** Any single ratio above this is 'high' (default: 0.5) */
    high: number;
    /** Any single ratio above this is 'medium' (default: 0.3) */
    medium: number;
  };
}

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  stopLoss: 0.03,
  takeProfit: 0.05,
  trailingStop: 0.02,
  useTrailingStop: true,
  takeProfitSellRatio: 0.5,
  quoteCurrency: 'KRW',
  minOrderNotional: 5000,
  rebalanceSettleMs: 1000,
  exposure: {
    high: 0.5,
    medium: 0.3,
  },
};

export type RiskConfigOverrides = Partial<Omit<RiskConfig, 'exposure'>> & {
  exposure?: Partial<RiskConfig['exposure']>;
};

/**
 * Merge partial overrides onto the defaults.
 *
 * @throws Error if the merged configuration is invalid
 */
export function resolveRiskConfig(overrides: RiskConfigOverrides = {}): RiskConfig {
  const config: RiskConfig = {
    ...DEFAULT_RISK_CONFIG,
    ...overrides,
    exposure: { ...DEFAULT_RISK_CONFIG.exposure, ...overrides.exposure },
  };
  validateRiskConfig(config);
  return config;
}

/**
 * Validate risk configuration.
 *
 * @throws Error if a ratio is out of range or a threshold pair is inverted
 */
export function validateRiskConfig(config: RiskConfig): void {
  if (config.stopLoss <= 0 || config.stopLoss >= 1) {
    throw new Error('stopLoss must be between 0 and 1');
  }

  if (config.takeProfit <= 0) {
    throw new Error('takeProfit must be positive');
  }

  if (config.trailingStop <= 0 || config.trailingStop >= 1) {
    throw new Error('trailingStop must be between 0 and 1');
  }

  if (config.takeProfitSellRatio <= 0 || config.takeProfitSellRatio > 1) {
    throw new Error('takeProfitSellRatio must be in (0, 1]');
  }

  if (!config.quoteCurrency) {
    throw new Error('quoteCurrency is required');
  }

  if (config.minOrderNotional < 0) {
    throw new Error('minOrderNotional cannot be negative');
  }

  if (config.rebalanceSettleMs < 0) {
    throw new Error('rebalanceSettleMs cannot be negative');
  }

  if (config.exposure.medium >= config.exposure.high) {
    throw new Error('exposure.medium must be below exposure.high');
  }
}
