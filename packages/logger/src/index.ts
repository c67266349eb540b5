/**
 * @fileoverview Public API exports for @tradeloop/logger
 * Structured logging and error handling for the trading loop
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';

// Cycle context management
export {
  generateCycleId,
  getCycleContext,
  getCycleId,
  withCycleContext,
  setCycleContext,
} from './cycle-context.js';

// Performance timing utilities
export { startTimer, measureAsync } from './perf-timer.js';

// Formats
export {
  redactPII,
  redactSensitiveFields,
  isSensitiveField,
  standardFields,
  prettyPrint,
} from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { CycleContext } from './cycle-context.js';
export type { PerfTimer } from './perf-timer.js';
