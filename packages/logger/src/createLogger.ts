/**
 * @fileoverview Main logger factory.
 * Creates configured Winston logger instances with structured logging,
 * secret redaction and console / daily-rotated file transports.
 */

import path from 'node:path';
import winston, { format } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Features:
 * - Structured logging with standard fields (timestamp, level, message, cycle_id)
 * - Redaction of credential fields (secret keys, tokens, webhook URLs)
 * - Console transport and optional daily-rotated files (all levels, errors only)
 * - JSON or pretty-print console output
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false, logDir: './logs' });
 * logger.info('Trading loop started', { markets: ['KRW-BTC'], interval_minutes: 5 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    logDir,
    filePrefix = 'tradeloop',
    maxFiles = 14,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Order is important: redact first, then standard fields, then output format
  const baseFormat = format.combine(redactPII(), standardFields);
  const fileFormat = format.combine(baseFormat, format.json());
  const consoleFormat = format.combine(baseFormat, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: consoleFormat,
      })
    );
  }

  if (logDir) {
    const dirname = path.resolve(logDir);
    transports.push(
      new DailyRotateFile({
        dirname,
        filename: `${filePrefix}-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxFiles: `${maxFiles}d`,
        level,
        format: fileFormat,
      }),
      new DailyRotateFile({
        dirname,
        filename: `${filePrefix}-error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxFiles: `${maxFiles}d`,
        level: 'error',
        format: fileFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    silent,
    // Fatal errors are handled in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries always include `context`.
 *
 * @example
 * ```typescript
 * const riskLogger = createChildLogger(logger, { component: 'risk-engine' });
 * riskLogger.warn('Stop loss triggered', { instrument: 'KRW-BTC' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
