/**
 * @fileoverview Custom Winston formats for the research logger.
 * Includes secret redaction, standard fields, request ID injection and
 * pretty-print output.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field name patterns whose values must never reach a log sink.
 * Provider credentials (API keys, Yahoo crumbs and cookies) are the usual
 * offenders in this codebase.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /crumb/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Winston's own fields; never redacted or rewritten.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of value with every sensitive key (at any depth) replaced
 * by the redaction marker. Error instances pass through untouched so that
 * format.errors() can still extract their stack.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ ticker: 'MSFT', auth: { apiKey: 'test-secret' } });
 * // => { ticker: 'MSFT', auth: { apiKey: '[REDACTED]' } }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitiveFields(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return result;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run first in the chain so secrets never reach later formats.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { provider: 'yahoo', apiKey: 'test-secret' });
 * // {"level":"info","message":"Provider configured","provider":"yahoo","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Timestamp, error stack extraction, and request_id from the active
 * request context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Human-readable output for development.
 *
 * @example
 * ```
 * [2025-01-15T12:34:56.789+00:00] info: Technical analysis complete component=technical ticker=MSFT duration_ms=12
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, ticker, provider, request_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${component}`);
    if (ticker) context.push(`ticker=${ticker}`);
    if (provider) context.push(`provider=${provider}`);
    if (request_id) context.push(`request_id=${request_id}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'stack' || key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${timestamp}] ${level}: ${message}${contextStr}`;

    if (info['stack']) {
      return `${baseMsg}\n${info['stack']}`;
    }

    return baseMsg;
  })
);
