/**
 * Safe session defaults for query execution.
 */

import type { ExecuteResult, RawQueryResult } from './types.js';

export const SAFE_DEFAULTS = {
  /** Hard cap on accepted rows regardless of what the database returns */
  maxRows: 1000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 30_000,
} as const;

/** A requested row limit, never above the hard cap. */
export function effectiveMaxRows(maxRows: number = SAFE_DEFAULTS.maxRows): number {
  return Math.min(maxRows, SAFE_DEFAULTS.maxRows);
}

/**
 * Apply the row cap to an adapter result. Rows past the cap are dropped and
 * `truncated` is set. A `maxRows` above the hard cap is lowered to it.
 */
export function capRows(raw: RawQueryResult, execMs: number, maxRows: number = SAFE_DEFAULTS.maxRows): ExecuteResult {
  const cap = effectiveMaxRows(maxRows);
  const truncated = raw.rows.length > cap;
  const rows = truncated ? raw.rows.slice(0, cap) : raw.rows;
  return {
    columns: raw.columns,
    rows,
    rowCount: rows.length,
    truncated,
    execMs,
  };
}
