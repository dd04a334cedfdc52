/**
 * Database abstraction types.
 * Adapters for SQLite and Postgres implement QueryExecutor.
 */

import type { SqlDialect } from '../policy/types.js';

export type Row = Record<string, unknown>;

/** What an adapter hands back before the core applies its row cap. */
export interface RawQueryResult {
  columns: string[];
  rows: Row[];
}

export interface ExecuteResult {
  columns: string[];
  rows: Row[];
  /** Rows accepted after the cap, i.e. `rows.length` */
  rowCount: number;
  truncated: boolean;
  execMs: number;
}

export interface RunOptions {
  /** Adapters may stop fetching once they have more than this many rows */
  maxRows: number;
  signal?: AbortSignal;
}

export interface QueryExecutor {
  readonly dialect: SqlDialect;
  /** Human-readable target, for logs and `doctor` */
  readonly target: string;

  run(sql: string, options: RunOptions): Promise<RawQueryResult>;
  introspect(): Promise<SchemaSnapshot>;
  close(): Promise<void>;
}

export interface SchemaSnapshot {
  tables: TableInfo[];
  capturedAt: Date;
}

export interface TableInfo {
  name: string;
  columns: ColumnInfo[];
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
  isUnique?: boolean;
  /** "table.column" for foreign keys */
  references?: string;
}

export interface SchemaProvider {
  tableNames(): string[];
  /** Text handed verbatim to the generation service */
  describe(): string;
}
