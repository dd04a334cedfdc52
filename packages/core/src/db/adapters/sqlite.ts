/**
 * SQLite adapter.
 * Uses better-sqlite3 with a read-only handle on an existing file.
 */

import Database from 'better-sqlite3';
import type { ColumnInfo, QueryExecutor, RawQueryResult, Row, RunOptions, SchemaSnapshot, TableInfo } from '../types.js';

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

function text(row: Row, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : String(value ?? '');
}

function flag(row: Row, key: string): boolean {
  return Number(row[key]) !== 0;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function openDatabase(path: string, readonly = true): Database.Database {
  if (!path.trim()) {
    throw new Error('SQLite database path is required.');
  }
  return new Database(path, { readonly, fileMustExist: readonly });
}

function allRows(db: Database.Database, sql: string): Row[] {
  return db.prepare(sql).all().filter(isRow);
}

/**
 * Snapshot tables and columns in creation order, with primary keys, single
 * column unique constraints and foreign keys.
 */
export function introspectDatabase(db: Database.Database): SchemaSnapshot {
  const tableRows = allRows(
    db,
    `SELECT name FROM sqlite_master
     WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
     ORDER BY rowid`,
  );

  const tables: TableInfo[] = tableRows.map((tableRow) => {
    const tableName = text(tableRow, 'name');
    const quoted = quoteIdent(tableName);

    const foreignKeys = new Map<string, string>();
    for (const fk of allRows(db, `PRAGMA foreign_key_list(${quoted})`)) {
      foreignKeys.set(text(fk, 'from'), `${text(fk, 'table')}.${text(fk, 'to')}`);
    }

    const uniqueColumns = new Set<string>();
    for (const index of allRows(db, `PRAGMA index_list(${quoted})`)) {
      if (!flag(index, 'unique') || text(index, 'origin') === 'pk') continue;
      const indexColumns = allRows(db, `PRAGMA index_info(${quoteIdent(text(index, 'name'))})`);
      if (indexColumns.length === 1) {
        uniqueColumns.add(text(indexColumns[0], 'name'));
      }
    }

    const columns: ColumnInfo[] = allRows(db, `PRAGMA table_info(${quoted})`).map((column) => {
      const name = text(column, 'name');
      return {
        name,
        dataType: text(column, 'type') || 'TEXT',
        nullable: !flag(column, 'notnull'),
        isPrimaryKey: flag(column, 'pk'),
        isUnique: uniqueColumns.has(name),
        references: foreignKeys.get(name),
      };
    });

    return { name: tableName, columns };
  });

  return { tables, capturedAt: new Date() };
}

export class SqliteExecutor implements QueryExecutor {
  readonly dialect = 'sqlite' as const;
  readonly target: string;
  private db: Database.Database | undefined;
  private readonly path: string | undefined;

  /** Either a file path (opened read-only on first use) or an open handle. */
  constructor(source: string | Database.Database) {
    if (typeof source === 'string') {
      this.path = source;
      this.target = `sqlite:${source}`;
    } else {
      this.db = source;
      this.target = `sqlite:${source.name}`;
    }
  }

  private handle(): Database.Database {
    if (!this.db) {
      this.db = openDatabase(this.path ?? '', true);
    }
    return this.db;
  }

  /**
   * better-sqlite3 is synchronous: the signal is only checked before the
   * statement starts, so a timeout cannot stop a statement already running.
   */
  async run(sql: string, options: RunOptions): Promise<RawQueryResult> {
    options.signal?.throwIfAborted();
    const stmt = this.handle().prepare(sql);
    if (!stmt.reader) {
      throw new Error('Statement does not return rows.');
    }

    const rows: Row[] = [];
    for (const row of stmt.iterate()) {
      if (isRow(row)) rows.push(row);
      // one past the cap is enough to know the result was truncated
      if (rows.length > options.maxRows) break;
    }

    return {
      columns: stmt.columns().map((column) => column.name),
      rows,
    };
  }

  async introspect(): Promise<SchemaSnapshot> {
    return introspectDatabase(this.handle());
  }

  async close(): Promise<void> {
    if (this.db?.open) {
      this.db.close();
    }
    this.db = undefined;
  }
}
