/**
 * @fileoverview Custom winston formats: secret redaction, standard fields,
 * pretty-print output and cycle id injection.
 */

import { format } from 'winston';
import { getContextId } from './log-context.js';

/**
 * Field names whose values never reach a transport. Exchange and data-vendor
 * credentials end up in request configs that get logged on failure, so the
 * list covers the names those clients use.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /signature/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** Fields winston owns; they are never redacted. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns a copy of `value` with sensitive keys replaced at any depth.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ params: { symbol: 'BTCUSDT', apiKey: 'test-key' } });
 * // { params: { symbol: 'BTCUSDT', apiKey: '[REDACTED]' } }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (value instanceof Error || !isPlainRecord(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return result;
}

/**
 * Winston format that redacts sensitive fields from log metadata. Applied
 * first in the chain so no later format sees a secret.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Adds the ISO timestamp, expands Error stacks, and injects `cycle_id` from
 * the active log context when the entry does not carry one already.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const contextId = getContextId();
    if (contextId && !info['cycle_id']) {
      info['cycle_id'] = contextId;
    }
    return info;
  })()
);

/**
 * Human-readable output for development.
 *
 * @example
 * ```
 * [2025-01-15T14:30:00.000Z] info: analysis cycle complete component=analysis cycle_id=... duration_ms=3
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, series, timeframe, cycle_id, stack, ...rest } =
      info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (series) context.push(`series=${String(series)}`);
    if (timeframe) context.push(`timeframe=${String(timeframe)}`);
    if (cycle_id) context.push(`cycle_id=${String(cycle_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') continue;
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
  })
);
