/**
 * @fileoverview Custom winston formats for the bizcal logger.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Fields printed up front in pretty output, in this order.
 */
const CONTEXT_FIELDS = ['component', 'kind', 'code', 'calendar', 'cache'] as const;

/**
 * Keys winston manages itself; never echoed as extra fields.
 */
const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Timestamp and error-stack handling shared by every output.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders one entry as a single human-readable line.
 *
 * @example
 * ```typescript
 * // [2026-01-19T09:00:00.000+00:00] debug: Calendar constructed component=hub kind=exchange code=XPAR cache=miss
 * ```
 */
export function renderPrettyLine(info: winston.Logform.TransformableInfo): string {
  const context: string[] = [];
  for (const field of CONTEXT_FIELDS) {
    const value = info[field];
    if (value !== undefined) {
      context.push(`${field}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.has(key) || CONTEXT_FIELDS.some((field) => field === key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const timestamp = typeof info['timestamp'] === 'string' ? info['timestamp'] : '';
  const baseMsg = `[${timestamp}] ${info.level}: ${String(info.message)}${contextStr}`;

  const stack = info['stack'];
  return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
}

/**
 * Human-readable output for terminals.
 */
export const prettyPrint = format.combine(format.colorize(), format.printf(renderPrettyLine));
