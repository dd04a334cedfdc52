/**
 * Column classification and summary statistics over an execution result.
 */

import type { ExecuteResult, Row } from './types.js';

export type ColumnKind = 'numeric' | 'boolean' | 'categorical';

export interface NumericSummary {
  min: number;
  max: number;
  mean: number;
  /** Non-null values */
  count: number;
}

export interface QueryStatistics {
  totalRows: number;
  totalColumns: number;
  columnNames: string[];
  truncated: boolean;
  /** Only present when there is at least one row */
  numericSummary?: Record<string, NumericSummary>;
}

function present(rows: Row[], column: string): unknown[] {
  return rows.map((row) => row[column]).filter((value) => value !== null && value !== undefined);
}

/**
 * A column is numeric when every non-null value is a finite number, boolean
 * likewise, and categorical otherwise (an all-null column included).
 */
export function classifyColumn(rows: Row[], column: string): ColumnKind {
  const values = present(rows, column);
  if (values.length > 0 && values.every((v) => typeof v === 'number' && Number.isFinite(v))) {
    return 'numeric';
  }
  if (values.length > 0 && values.every((v) => typeof v === 'boolean')) {
    return 'boolean';
  }
  return 'categorical';
}

export function numericValues(rows: Row[], column: string): number[] {
  return present(rows, column).filter((v): v is number => typeof v === 'number');
}

export function summarizeNumbers(values: number[]): NumericSummary | undefined {
  if (values.length === 0) return undefined;
  let min = values[0];
  let max = values[0];
  let sum = 0;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
  }
  return { min, max, mean: sum / values.length, count: values.length };
}

function valueKey(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
}

/** Distinct non-null values in a column. */
export function uniqueCount(rows: Row[], column: string): number {
  return new Set(present(rows, column).map(valueKey)).size;
}

export function queryStatistics(result: ExecuteResult): QueryStatistics {
  const stats: QueryStatistics = {
    totalRows: result.rows.length,
    totalColumns: result.columns.length,
    columnNames: [...result.columns],
    truncated: result.truncated,
  };

  if (result.rows.length > 0) {
    const numericSummary: Record<string, NumericSummary> = {};
    for (const column of result.columns) {
      if (classifyColumn(result.rows, column) !== 'numeric') continue;
      const summary = summarizeNumbers(numericValues(result.rows, column));
      if (summary) numericSummary[column] = summary;
    }
    stats.numericSummary = numericSummary;
  }

  return stats;
}
