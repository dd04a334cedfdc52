/**
 * Conversational text for a finished turn.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import { classifyColumn, numericValues, summarizeNumbers, uniqueCount } from '../db/stats.js';
import type { ExecuteResult, Row } from '../db/types.js';
import { formatTable } from './table.js';

/** Results up to this size are shown in full */
export const FULL_TABLE_MAX_ROWS = 20;
/** Rows shown for larger results */
export const SAMPLE_ROWS = 10;

const MAX_NUMERIC_STATS = 3;
const MAX_CATEGORICAL_STATS = 2;

export const EMPTY_RESULT_MESSAGE = 'Query executed successfully, but no results were found.';

/**
 * avg/min/max for the first three numeric columns, then unique counts for
 * the first two text-like columns.
 */
export function formatStatistics(columns: string[], rows: Row[]): string[] {
  if (rows.length === 0) return [];

  const numeric: string[] = [];
  const categorical: string[] = [];
  for (const column of columns) {
    const kind = classifyColumn(rows, column);
    if (kind === 'numeric') numeric.push(column);
    else if (kind === 'categorical') categorical.push(column);
  }

  const lines: string[] = [];
  for (const column of numeric.slice(0, MAX_NUMERIC_STATS)) {
    const summary = summarizeNumbers(numericValues(rows, column));
    if (!summary) continue;
    lines.push(
      `${column}: avg=${summary.mean.toFixed(2)}, min=${summary.min.toFixed(2)}, max=${summary.max.toFixed(2)}`,
    );
  }
  for (const column of categorical.slice(0, MAX_CATEGORICAL_STATS)) {
    lines.push(`${column}: ${uniqueCount(rows, column)} unique values`);
  }
  return lines;
}

export function formatExecution(result: ExecuteResult, maxRows: number = SAFE_DEFAULTS.maxRows): string {
  if (result.rows.length === 0) {
    return EMPTY_RESULT_MESSAGE;
  }

  const lines: string[] = ['Query Results:', '', `Summary: ${result.rowCount} row(s) returned`];
  if (result.truncated) {
    lines.push(`Note: Results truncated to first ${maxRows} rows`);
  }
  lines.push('');

  if (result.rows.length <= FULL_TABLE_MAX_ROWS) {
    lines.push('Data:', formatTable(result.columns, result.rows));
  } else {
    lines.push(
      `Sample Data (first ${SAMPLE_ROWS} rows):`,
      formatTable(result.columns, result.rows.slice(0, SAMPLE_ROWS)),
      `... and ${result.rows.length - SAMPLE_ROWS} more rows`,
    );
  }

  const stats = formatStatistics(result.columns, result.rows);
  if (stats.length > 0) {
    lines.push('', 'Statistics:', ...stats.map((line) => `  - ${line}`));
  }

  return lines.join('\n');
}

export function formatFailure(message: string): string {
  return `Query Failed:\n\n${message}`;
}
