/**
 * Minimal ASCII table formatter.
 * Prints column headers, a separator and one line per row.
 */

import type { Row } from '../db/types.js';

/** Widest a column may grow before values are cut */
export const MAX_COLUMN_WIDTH = 60;

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}

export function formatTable(columns: string[], rows: Row[], maxWidth: number = MAX_COLUMN_WIDTH): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, maxWidth));
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatValue(row[columns[i]]);
      widths[i] = Math.min(Math.max(widths[i], val.length), maxWidth);
    }
  }

  const cell = (val: string, width: number): string =>
    val.length > width ? val.slice(0, width - 1) + '…' : val.padEnd(width);

  const lines: string[] = [];
  lines.push(columns.map((col, i) => cell(col, widths[i])).join(' | ').trimEnd());
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of rows) {
    lines.push(columns.map((col, i) => cell(formatValue(row[col]), widths[i])).join(' | ').trimEnd());
  }

  return lines.join('\n');
}
