/**
 * @fileoverview Custom winston formats: secret redaction, standard fields,
 * pretty printing and request id injection.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a log line. Matched case-insensitively;
 * upstream URLs and config dumps may carry keys or tokens.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive fields replaced, recursing into
 * arrays and plain objects. Errors and dates are passed through.
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (value instanceof Error || value instanceof Date) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    result[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(field);
  }
  return result;
}

/**
 * Winston format that redacts sensitive metadata. Must run first in the chain.
 *
 * @example
 * ```typescript
 * logger.info('Fetching schedule', { url, apiKey: 'test-key' });
 * // {"level":"info","message":"Fetching schedule","url":"...","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Adds an ISO timestamp, expands errors with their stack and injects the
 * request_id of the surrounding AsyncLocalStorage context.
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
 * ```
 * [2025-01-02T06:00:00.012Z] info: Refresh cycle completed component=refresh request_id=... count=10
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, request_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (request_id) context.push(`request_id=${String(request_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return stack ? `${baseMsg}\n${String(stack)}` : baseMsg;
  })
);
