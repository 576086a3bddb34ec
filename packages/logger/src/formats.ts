/**
 * @fileoverview Custom winston formats: secret redaction, standard fields and
 * the pretty console line.
 */

import { format } from 'winston';

type Format = ReturnType<typeof format.combine>;

/**
 * Field names whose values never reach a transport.
 * Matching is case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /enable[_-]?secret/i,
  /community/i,
];

const REDACTED = '[REDACTED]';

/** Core winston fields that are never inspected for redaction */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a copy of `value` with every sensitive key replaced by `[REDACTED]`,
 * descending into nested objects and arrays.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ username: 'admin', password: 'test-secret' });
 * // { username: 'admin', password: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (!isPlainRecord(value)) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Redacts sensitive metadata. Must run first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Device login', { username: 'admin', password: 'test-secret' });
 * // {"level":"info","message":"Device login","username":"admin","password":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }

    info[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(info[key]);
  }

  return info;
});

/**
 * Adds an ISO 8601 timestamp and expands Error objects into message + stack.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Human-readable single line per entry. Level names are colored only when
 * `colors` is set.
 *
 * @example
 * ```typescript
 * // [2026-10-19T12:34:56.789+00:00] warn: Failed to save output component=run-command device_ip="10.0.0.1"
 * ```
 */
export function prettyPrint(colors: boolean): Format {
  const line = format.printf((info) => {
    const { timestamp, level, message, component, ...rest } = info;

    const context: string[] = [];
    if (typeof component === 'string') context.push(`component=${component}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    const stack = info['stack'];
    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  });

  return colors ? format.combine(format.colorize(), line) : line;
}
