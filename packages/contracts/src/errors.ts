/**
 * @fileoverview Error taxonomy for the trading loop.
 *
 * Structured error classes with machine-readable codes and contextual data
 * for logging, notification and retry decisions.
 *
 * All errors extend TradeLoopError and carry:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @tradeloop/contracts/errors
 */

/**
 * Base error class for all trading loop errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new TradeLoopError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class TradeLoopError extends Error {
  /**
   * Machine-readable error code (e.g., 'DATA_UNAVAILABLE').
   */
  readonly code: string;

  /**
   * Structured error data. Format varies by error type.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * A price, candle series or balance could not be obtained.
 *
 * Soft failure: the affected instrument or step is skipped for the cycle.
 *
 * @example
 * ```typescript
 * throw new DataUnavailableError('No candles for KRW-BTC', {
 *   instrument: 'KRW-BTC',
 *   resource: 'bars'
 * });
 * ```
 */
export class DataUnavailableError extends TradeLoopError {
  constructor(
    message: string,
    data: {
      resource: 'price' | 'bars' | 'balance' | 'balances';
      instrument?: string;
      currency?: string;
      [key: string]: unknown;
    }
  ) {
    super('DATA_UNAVAILABLE', message, data);
  }
}

/**
 * The exchange refused or failed to acknowledge an order.
 */
export class OrderRejectedError extends TradeLoopError {
  constructor(
    message: string,
    data: {
      instrument: string;
      side: 'buy' | 'sell';
      amount: number;
      [key: string]: unknown;
    }
  ) {
    super('ORDER_REJECTED', message, data);
  }
}

/**
 * Indicator or fusion failed for one instrument's input.
 */
export class ComputationError extends TradeLoopError {
  constructor(message: string, data: { instrument?: string; stage: string; [key: string]: unknown }) {
    super('COMPUTATION_ERROR', message, data);
  }
}

/**
 * Unhandled failure inside a cycle phase. Logged; the next cycle proceeds.
 */
export class CycleError extends TradeLoopError {
  constructor(message: string, data: { phase: string; cycleId?: string; [key: string]: unknown }) {
    super('CYCLE_ERROR', message, data);
  }
}

/**
 * Configuration file or environment is invalid. Fatal at startup.
 */
export class ConfigurationError extends TradeLoopError {
  constructor(message: string, data?: { issues?: string[]; path?: string; [key: string]: unknown }) {
    super('CONFIGURATION_ERROR', message, data);
  }
}

/**
 * Exchange HTTP API answered with an error or could not be reached.
 *
 * Raised inside exchange adapters and converted to a `null` result before
 * it reaches the trading core.
 */
export class ExchangeApiError extends TradeLoopError {
  constructor(
    message: string,
    data: { exchange: string; endpoint: string; status?: number; [key: string]: unknown }
  ) {
    super('EXCHANGE_API_ERROR', message, data);
  }
}

/**
 * Type guard to check if an error is a TradeLoopError.
 *
 * @example
 * ```typescript
 * try {
 *   // ... code
 * } catch (err) {
 *   if (isTradeLoopError(err)) {
 *     logger.error('Trading error', { code: err.code });
 *   }
 * }
 * ```
 */
export function isTradeLoopError(error: unknown): error is TradeLoopError {
  return error instanceof TradeLoopError;
}

export function isDataUnavailableError(error: unknown): error is DataUnavailableError {
  return error instanceof DataUnavailableError;
}

export function isOrderRejectedError(error: unknown): error is OrderRejectedError {
  return error instanceof OrderRejectedError;
}

export function isComputationError(error: unknown): error is ComputationError {
  return error instanceof ComputationError;
}

export function isCycleError(error: unknown): error is CycleError {
  return error instanceof CycleError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isExchangeApiError(error: unknown): error is ExchangeApiError {
  return error instanceof ExchangeApiError;
}

/**
 * Extracts a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Flat log fields for a TradeLoopError: its code plus its data payload.
 *
 * @example
 * ```typescript
 * logger.warn(error.message, errorFields(error));
 * ```
 */
export function errorFields(error: TradeLoopError): Record<string, unknown> {
  return { code: error.code, ...error.data };
}
