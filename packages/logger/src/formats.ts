/**
 * @fileoverview Custom Winston formats.
 * Includes secret redaction, standard fields, cycle ID injection and
 * pretty-print output.
 */

import { format } from 'winston';
import { getCycleContext } from './cycle-context.js';

/**
 * Field name patterns whose values are never logged.
 * Matches are case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /access[_-]?key/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /webhook/i,
  /jwt/i,
];

const REDACTED = '[REDACTED]';

/**
 * Fields Winston owns; never redacted.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

/**
 * Whether a field name matches a sensitive pattern.
 *
 * @example
 * ```typescript
 * isSensitiveField('UPBIT_SECRET_KEY') // true
 * isSensitiveField('instrument')       // false
 * ```
 */
export function isSensitiveField(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive fields replaced, at any depth.
 * Error instances are passed through for `format.errors`.
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveField(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Applied first in the chain so credentials never reach a transport.
 *
 * @example
 * ```typescript
 * logger.info('Exchange configured', { access_key: 'test-access', exchange: 'upbit' });
 * // {"level":"info","message":"Exchange configured","access_key":"[REDACTED]","exchange":"upbit"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) continue;
    redacted[key] = isSensitiveField(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Injects `cycle_id` (and other cycle context fields) from AsyncLocalStorage.
 * Explicit fields on the log call win.
 */
export const cycleFields = format((info) => {
  const context = getCycleContext();
  if (!context) return info;

  for (const [key, value] of Object.entries(context)) {
    if (info[key] === undefined) {
      info[key] = value;
    }
  }
  return info;
});

/**
 * Standard fields: ISO timestamp, error stacks and cycle context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  cycleFields()
);

/**
 * Renders one human-readable line.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Order placed component=strategy instrument=KRW-BTC cycle_id=4f1c... notional=10000
 * ```
 */
export const prettyLine = format.printf((info) => {
  const { timestamp, level, message, component, instrument, cycle_id, stack, ...rest } = info;

  const context: string[] = [];
  if (component) context.push(`component=${component}`);
  if (instrument) context.push(`instrument=${instrument}`);
  if (cycle_id) context.push(`cycle_id=${cycle_id}`);

  for (const [key, value] of Object.entries(rest)) {
    if (key === 'splat') continue;
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${timestamp}] ${level}: ${message}${contextStr}`;

  return stack ? `${baseMsg}\n${stack}` : baseMsg;
});

/**
 * Colorized pretty-print output for development consoles.
 */
export const prettyPrint = format.combine(format.colorize(), prettyLine);
