/** Utility functions for putting results on the wire */

import type { GatewayFailure, QueryOutcome } from './types.js';

/**
 * Makes a value JSON-safe: blobs become base64 strings, bigints become
 * numbers (or decimal strings once they pass 2^53).
 */
export function toWire(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (Array.isArray(value)) return value.map(toWire);
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      out[key] = toWire(val);
    }
    return out;
  }
  return value;
}

export function toJsonText(value: unknown): string {
  return JSON.stringify(toWire(value), null, 2);
}

/** Payload shape shared by the query-running tools. */
export function outcomePayload(outcome: QueryOutcome): Record<string, unknown> {
  if (outcome.ok) {
    return { success: true, data: outcome.rows, row_count: outcome.rows.length };
  }
  return failurePayload(outcome.failure);
}

export function failurePayload(failure: GatewayFailure): Record<string, unknown> {
  return {
    error: failure.message,
    kind: failure.kind,
    ...(failure.query !== undefined ? { query: failure.query } : {}),
  };
}
