/**
 * Retail schema: bundled DDL, schema description for the prompt, and the
 * schema provider the pipeline reads table names from.
 */

import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';
import { introspectDatabase } from './adapters/sqlite.js';
import type { Logger } from '../log/logger.js';
import { silentLogger } from '../log/logger.js';
import type { ColumnInfo, QueryExecutor, SchemaProvider, SchemaSnapshot } from './types.js';

export const RETAIL_TABLES = ['stores', 'customers', 'products', 'orders', 'order_items'] as const;

export function loadRetailSchemaSql(): string {
  return readFileSync(new URL('./schema.sql', import.meta.url), 'utf8');
}

/** Snapshot of the bundled DDL, built in an in-memory database. */
export function retailSchemaSnapshot(): SchemaSnapshot {
  const db = new Database(':memory:');
  try {
    db.exec(loadRetailSchemaSql());
    return introspectDatabase(db);
  } finally {
    db.close();
  }
}

function describeColumn(column: ColumnInfo): string {
  const notes = [column.dataType];
  if (column.isPrimaryKey) notes.push('PRIMARY KEY');
  if (column.isUnique) notes.push('UNIQUE');
  if (column.references) notes.push(`FOREIGN KEY to ${column.references}`);
  return `   - ${column.name} (${notes.join(', ')})`;
}

/**
 * Numbered, one-column-per-line description:
 *
 *   1. stores table:
 *      - id (INTEGER, PRIMARY KEY)
 */
export function describeSchema(snapshot: SchemaSnapshot): string {
  return snapshot.tables
    .map((table, i) => [`${i + 1}. ${table.name} table:`, ...table.columns.map(describeColumn)].join('\n'))
    .join('\n\n');
}

export class SnapshotSchemaProvider implements SchemaProvider {
  private readonly description: string;

  constructor(private readonly snapshot: SchemaSnapshot) {
    this.description = describeSchema(snapshot);
  }

  tableNames(): string[] {
    return this.snapshot.tables.map((table) => table.name);
  }

  describe(): string {
    return this.description;
  }
}

/**
 * Introspect the connected database. An empty database falls back to the
 * bundled retail schema so generation still has something to work from.
 */
export async function loadSchemaProvider(executor: QueryExecutor, logger: Logger = silentLogger): Promise<SchemaProvider> {
  const snapshot = await executor.introspect();
  if (snapshot.tables.length > 0) {
    logger.debug('Schema introspected', { target: executor.target, tables: snapshot.tables.length });
    return new SnapshotSchemaProvider(snapshot);
  }
  logger.warn('Database has no tables; using the bundled retail schema', { target: executor.target });
  return new SnapshotSchemaProvider(retailSchemaSnapshot());
}
