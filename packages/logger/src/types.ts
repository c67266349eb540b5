/**
 * @fileoverview Type definitions for the trading loop logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Critical errors that require immediate attention
 * - 'warn': Soft failures (missing data, rejected orders)
 * - 'info': Cycle progress, trades and risk actions
 * - 'debug': Per-instrument indicator detail
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   logDir: './logs'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable pretty-print
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Directory for daily-rotated log files. No file output when omitted.
   * @example './logs'
   */
  logDir?: string;

  /**
   * Rotated file name prefix.
   * @default 'tradeloop'
   */
  filePrefix?: string;

  /**
   * Days of rotated files to keep.
   * @default 14
   */
  maxFiles?: number;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress every transport (tests).
   * @default false
   */
  silent?: boolean;
}

/**
 * Child logger context fields.
 * These fields will be automatically included in all logs from the child logger.
 *
 * @example
 * ```typescript
 * const riskLogger = logger.child({ component: 'risk-engine' });
 * riskLogger.info('Stop loss triggered', { instrument: 'KRW-BTC' });
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'strategy', 'risk-engine', 'upbit') */
  component?: string;

  /** Instrument context */
  instrument?: string;

  /** Cycle ID context */
  cycle_id?: string;

  /** Allow any additional context fields */
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
