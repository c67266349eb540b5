/**
 * Trading cycle
 *
 * One pass of the bot: strategy over every market, then the risk check over
 * every held position, then a portfolio report on the reporting minute.
 * Trades and risk actions other than holds are sent to the notifier.
 */

import { CycleError, errorFields, errorMessage, type Portfolio } from '@tradeloop/contracts';
import { generateCycleId, startTimer, withCycleContext, type Logger } from '@tradeloop/logger';
import type { RiskEngine } from '@tradeloop/risk';
import type { StrategyController } from '@tradeloop/strategy';
import type { Notifier } from './notifiers/types.js';

export interface TradingCycleOptions {
  controller: StrategyController;
  risk: RiskEngine;
  notifier: Notifier;
  logger: Logger;
  markets: readonly string[];
  /** Report the portfolio when the wall-clock minute is a multiple of this (default: 15) */
  portfolioReportMinutes?: number;
  clock?: () => Date;
}

export interface CycleSummary {
  cycleId: string;
  /** Non-hold trades */
  trades: number;
  /** Non-hold risk actions */
  riskActions: number;
  portfolio?: Portfolio;
  durationMs: number;
  error?: string;
}

export class TradingCycle {
  private readonly controller: StrategyController;
  private readonly risk: RiskEngine;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly markets: readonly string[];
  private readonly portfolioReportMinutes: number;
  private readonly clock: () => Date;

  constructor(options: TradingCycleOptions) {
    this.controller = options.controller;
    this.risk = options.risk;
    this.notifier = options.notifier;
    this.logger = options.logger.child({ component: 'cycle' });
    this.markets = options.markets;
    this.portfolioReportMinutes = options.portfolioReportMinutes ?? 15;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Run one cycle. Never rejects; an escaping failure is logged, reported
   * through `notifyError` and returned in the summary.
   */
  async run(): Promise<CycleSummary> {
    const cycleId = generateCycleId();

    return withCycleContext(async () => {
      const timer = startTimer();
      const summary: CycleSummary = { cycleId, trades: 0, riskActions: 0, durationMs: 0 };
      this.logger.info('Trading cycle started', { markets: this.markets.length });

      try {
        const report = await this.controller.runCycle(this.markets);
        for (const { instrument, trade } of report.results) {
          if (trade.action === 'hold') continue;
          summary.trades++;
          this.logger.info(`${instrument} ${trade.action}: ${trade.detail}`, { instrument, order_id: trade.orderId });
          await this.notifier.notifyTrade(instrument, trade);
        }

        const riskResults = await this.risk.checkRiskLimits();
        for (const action of riskResults) {
          if (action.action === 'hold') continue;
          summary.riskActions++;
          this.logger.info(`Risk action ${action.action} on ${action.instrument}: ${action.reason}`, {
            instrument: action.instrument,
            profit_pct: action.profitPct,
          });
          await this.notifier.notifyRiskAction(action);
        }

        if (this.clock().getMinutes() % this.portfolioReportMinutes === 0) {
          const portfolio = await this.risk.checkPortfolioRisk();
          summary.portfolio = portfolio;
          this.logger.info('Portfolio status', {
            total_balance: portfolio.totalBalance,
            cash_balance: portfolio.cashBalance,
            risk_level: portfolio.riskLevel,
          });
          await this.notifier.notifyPortfolio(portfolio);
        }
      } catch (err) {
        const error = new CycleError(`Trading cycle failed: ${errorMessage(err)}`, { phase: 'cycle', cycleId });
        this.logger.error(error.message, errorFields(error));
        summary.error = error.message;
        await this.notifier.notifyError('trading cycle', error.message);
      }

      summary.durationMs = timer.stop();
      this.logger.info('Trading cycle finished', {
        duration_ms: summary.durationMs,
        trades: summary.trades,
        risk_actions: summary.riskActions,
      });
      return summary;
    }, cycleId);
  }
}
