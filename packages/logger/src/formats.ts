/**
 * @fileoverview Custom winston formats: secret redaction, standard fields and
 * pretty-print output.
 */

import { format } from 'winston';

/**
 * Field names whose values never reach a transport. Case-insensitive.
 *
 * Covers API keys in their query-string spelling (`apikey`) as well as
 * `api_key`, `apiKey`, tokens, secrets, passwords and authorization headers.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Winston's own fields, never redacted.
 */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label', 'stack'];

/**
 * Returns true when a field name looks like it holds a secret.
 */
export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with sensitive fields replaced at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ symbol: 'SPY', apikey: 'test-secret' });
 * // { symbol: 'SPY', apikey: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value instanceof Error || value instanceof Date) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Redacts sensitive metadata. Applied first in the format chain so that no
 * later format or transport sees a secret.
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO 8601 timestamp and error stacks.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Human-readable output for development.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789+00:00] info: Time series fetched component=provider symbol=SPY interval=5min count=3
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, interval, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (interval) context.push(`interval=${String(interval)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof info['stack'] === 'string') {
      return `${baseMsg}\n${info['stack']}`;
    }

    return baseMsg;
  })
);
