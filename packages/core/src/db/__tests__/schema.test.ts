import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import {
  RETAIL_TABLES,
  SnapshotSchemaProvider,
  describeSchema,
  loadSchemaProvider,
  retailSchemaSnapshot,
} from '../schema.js';
import { SqliteExecutor } from '../adapters/sqlite.js';
import { seedDatabase } from '../seed.js';
import { createConsoleLogger } from '../../log/logger.js';

describe('describeSchema', () => {
  const description = describeSchema(retailSchemaSnapshot());

  it('numbers tables and lists one column per line', () => {
    assert.ok(
      description.startsWith(
        '1. stores table:\n' +
          '   - id (INTEGER, PRIMARY KEY)\n' +
          '   - name (VARCHAR(100))\n' +
          '   - location (VARCHAR(200))\n',
      ),
    );
  });

  it('notes unique columns and foreign keys', () => {
    const lines = description.split('\n');
    assert.ok(lines.includes('   - email (VARCHAR(100), UNIQUE)'));
    assert.ok(lines.includes('   - customer_id (INTEGER, FOREIGN KEY to customers.id)'));
    assert.ok(lines.includes('   - product_id (INTEGER, FOREIGN KEY to products.id)'));
  });

  it('separates tables with a blank line', () => {
    assert.ok(description.includes('\n\n2. customers table:\n'));
    assert.ok(description.includes('\n\n5. order_items table:\n'));
  });
});

describe('SnapshotSchemaProvider', () => {
  it('exposes the retail table names', () => {
    const provider = new SnapshotSchemaProvider(retailSchemaSnapshot());
    assert.deepEqual(provider.tableNames(), [...RETAIL_TABLES]);
  });
});

describe('loadSchemaProvider', () => {
  it('introspects a populated database', async () => {
    const db = new Database(':memory:');
    seedDatabase(db, { now: new Date('2024-06-01T12:00:00Z') });
    const executor = new SqliteExecutor(db);

    const provider = await loadSchemaProvider(executor);
    assert.deepEqual(provider.tableNames(), [...RETAIL_TABLES]);
    await executor.close();
  });

  it('falls back to the bundled schema for an empty database and warns', async () => {
    const lines: string[] = [];
    const logger = createConsoleLogger('warn', 'Schema', (line) => lines.push(line));
    const executor = new SqliteExecutor(new Database(':memory:'));

    const provider = await loadSchemaProvider(executor, logger);
    assert.deepEqual(provider.tableNames(), [...RETAIL_TABLES]);
    assert.deepEqual(lines, [
      '[WARN] [Schema] Database has no tables; using the bundled retail schema {"target":"sqlite::memory:"}',
    ]);
    await executor.close();
  });
});
