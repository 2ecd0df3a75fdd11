/**
 * Read-only gate for caller-supplied SQL.
 *
 * A textual check on the leading token, not a parser: comments placed before
 * the keyword are denied, and a statement that starts with SELECT but calls a
 * side-effecting function is allowed. The read-only connection opened by the
 * gateway is the second line; the verb list below only shapes the denial
 * message.
 */

import type { PolicyDecision } from './types.js';

export interface PolicyOptions {
  /** Also allow statements starting with WITH (common table expressions). */
  allowCte?: boolean;
}

const DENIED_MESSAGE = 'Only SELECT queries are allowed for safety';

const DESTRUCTIVE_VERBS = new Set([
  'drop',
  'delete',
  'truncate',
  'alter',
  'create',
  'pragma',
  'insert',
  'update',
  'replace',
  'attach',
  'detach',
  'vacuum',
  'reindex',
]);

const LEADING_TOKEN = /^[a-z0-9_$]+/;

export function leadingToken(text: string): string {
  const match = LEADING_TOKEN.exec(text.trim().toLowerCase());
  return match ? match[0] : '';
}

export function checkQuery(text: string, options: PolicyOptions = {}): PolicyDecision {
  const token = leadingToken(text);

  if (token === 'select') return { allowed: true };
  if (token === 'with' && options.allowCte) return { allowed: true };

  if (DESTRUCTIVE_VERBS.has(token)) {
    return {
      allowed: false,
      reason: `${token.toUpperCase()} statements are not permitted; only SELECT queries are allowed for safety`,
    };
  }
  return { allowed: false, reason: DENIED_MESSAGE };
}
