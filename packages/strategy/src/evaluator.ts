/**
 * Signal evaluation for one instrument: fetch bars, build the indicator
 * frame, fuse. Missing data or a failed computation yields a flat signal
 * with zero confidence.
 *
 * @module @tradeloop/strategy/evaluator
 */

import {
  CandleInterval,
  ComputationError,
  DataUnavailableError,
  errorFields,
  errorMessage,
  type FusedSignal,
  type MarketDataProvider,
} from '@tradeloop/contracts';
import {
  buildFrame,
  DEFAULT_INDICATOR_CONFIG,
  type IndicatorConfig,
  type IndicatorRegistry,
} from '@tradeloop/indicators';
import type { Logger } from '@tradeloop/logger';
import { fuse } from './fuser.js';
import type { ConfidenceFactors } from './confidence.js';
import { SIGNAL_THRESHOLD, resolveWeights, type SignalWeights } from './weights.js';

export interface SignalEvaluation extends FusedSignal {
  instrument: string;
  /** Timestamp of the bar the signal belongs to */
  barTime?: string;
  factors?: ConfidenceFactors;
}

export interface SignalEvaluatorOptions {
  market: MarketDataProvider;
  logger: Logger;
  indicators?: IndicatorConfig;
  weights?: Partial<SignalWeights>;
  threshold?: number;
  interval?: CandleInterval;
  /** Bars requested per evaluation (default: 100) */
  candleCount?: number;
  registry?: IndicatorRegistry;
}

export class SignalEvaluator {
  private readonly market: MarketDataProvider;
  private readonly logger: Logger;
  private readonly indicators: IndicatorConfig;
  private readonly weights: SignalWeights;
  private readonly threshold: number;
  private readonly interval: CandleInterval;
  private readonly candleCount: number;
  private readonly registry?: IndicatorRegistry;

  constructor(options: SignalEvaluatorOptions) {
    this.market = options.market;
    this.logger = options.logger.child({ component: 'signal-evaluator' });
    this.indicators = options.indicators ?? DEFAULT_INDICATOR_CONFIG;
    this.weights = resolveWeights(options.weights);
    this.threshold = options.threshold ?? SIGNAL_THRESHOLD;
    this.interval = options.interval ?? CandleInterval.M5;
    this.candleCount = options.candleCount ?? 100;
    this.registry = options.registry;
  }

  async evaluate(instrument: string): Promise<SignalEvaluation> {
    const flat: SignalEvaluation = { instrument, signal: 0, confidence: 0, weightedSum: 0 };

    const bars = await this.market.getBars(instrument, this.interval, this.candleCount);
    if (!bars || bars.length === 0) {
      const error = new DataUnavailableError(`No bars for ${instrument}`, {
        resource: 'bars',
        instrument,
      });
      this.logger.warn(error.message, errorFields(error));
      return flat;
    }

    try {
      const frame = buildFrame(bars, this.indicators, this.registry);

      for (const failure of frame.failures) {
        const error = new ComputationError(`Indicator ${failure.indicator} skipped: ${failure.reason}`, {
          instrument,
          stage: failure.indicator,
        });
        this.logger.warn(error.message, errorFields(error));
      }

      const { latest } = fuse(frame, { weights: this.weights, threshold: this.threshold });
      if (!latest) {
        this.logger.warn('No complete indicator rows, not enough history', {
          instrument,
          bars: bars.length,
        });
        return flat;
      }

      this.logger.debug('Signal evaluated', {
        instrument,
        signal: latest.signal,
        confidence: latest.confidence,
        weighted_sum: latest.weightedSum,
        factors: latest.factors,
      });

      return {
        instrument,
        signal: latest.signal,
        confidence: latest.confidence,
        weightedSum: latest.weightedSum,
        barTime: latest.timestamp,
        factors: latest.factors,
      };
    } catch (err) {
      const error = new ComputationError(`Signal evaluation failed: ${errorMessage(err)}`, {
        instrument,
        stage: 'fusion',
      });
      this.logger.error(error.message, errorFields(error));
      return flat;
    }
  }
}
