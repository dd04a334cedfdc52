import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import { createRng, loadSeedFixtures, parseSeedFixtures, seedDatabase, sqliteTimestamp } from '../seed.js';

const NOW = new Date('2024-06-01T12:00:00Z');

function count(db: Database.Database, table: string): unknown {
  return db.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get();
}

describe('seedDatabase', () => {
  it('inserts the fixture rows and fifty orders', () => {
    const db = new Database(':memory:');
    const summary = seedDatabase(db, { now: NOW });

    assert.equal(summary.stores, 4);
    assert.equal(summary.customers, 8);
    assert.equal(summary.products, 10);
    assert.equal(summary.orders, 50);
    assert.ok(summary.orderItems >= 50 && summary.orderItems <= 250);

    assert.deepEqual(count(db, 'stores'), { n: 4 });
    assert.deepEqual(count(db, 'orders'), { n: 50 });
    assert.deepEqual(count(db, 'order_items'), { n: summary.orderItems });
    db.close();
  });

  it('produces the same data for the same seed and date', () => {
    const a = new Database(':memory:');
    const b = new Database(':memory:');
    seedDatabase(a, { now: NOW, seed: 7 });
    seedDatabase(b, { now: NOW, seed: 7 });

    for (const table of ['orders', 'order_items']) {
      const sql = `SELECT * FROM ${table} ORDER BY id`;
      assert.deepEqual(a.prepare(sql).all(), b.prepare(sql).all());
    }
    a.close();
    b.close();
  });

  it('replaces earlier data when run again', () => {
    const db = new Database(':memory:');
    seedDatabase(db, { now: NOW, orders: 5 });
    seedDatabase(db, { now: NOW, orders: 3 });
    assert.deepEqual(count(db, 'stores'), { n: 4 });
    assert.deepEqual(count(db, 'orders'), { n: 3 });
    db.close();
  });

  it('keeps order totals equal to the sum of their items', () => {
    const db = new Database(':memory:');
    seedDatabase(db, { now: NOW });
    const mismatched = db
      .prepare(
        `SELECT COUNT(*) AS n FROM orders o
         WHERE ABS(o.total_amount - (SELECT SUM(quantity * unit_price) FROM order_items WHERE order_id = o.id)) > 0.01`,
      )
      .get();
    assert.deepEqual(mismatched, { n: 0 });
    db.close();
  });

  it('dates orders between one day and a year before the reference date', () => {
    const db = new Database(':memory:');
    seedDatabase(db, { now: NOW });
    const range = db.prepare('SELECT MIN(order_date) AS first, MAX(order_date) AS last FROM orders').get();
    assert.ok(typeof range === 'object' && range !== null);
    if ('first' in range && 'last' in range) {
      assert.ok(String(range.first) >= '2023-06-02 12:00:00');
      assert.ok(String(range.last) <= '2024-05-31 12:00:00');
    }
    db.close();
  });
});

describe('seed fixtures', () => {
  it('loads the bundled fixtures', () => {
    const fixtures = loadSeedFixtures();
    assert.equal(fixtures.stores[0].name, 'Downtown Store');
    assert.deepEqual(fixtures.orderStatuses, ['pending', 'processing', 'shipped', 'delivered', 'cancelled']);
  });

  it('rejects fixtures of the wrong shape', () => {
    assert.throws(
      () => parseSeedFixtures({ stores: [], customers: [], products: [], orderStatuses: [] }),
      /Invalid seed fixtures/,
    );
    assert.throws(() => parseSeedFixtures({ stores: 'none' }), /Invalid seed fixtures/);
  });
});

describe('createRng', () => {
  it('repeats for the same seed and stays in [0, 1)', () => {
    const a = createRng(123);
    const b = createRng(123);
    for (let i = 0; i < 100; i++) {
      const value = a();
      assert.equal(value, b());
      assert.ok(value >= 0 && value < 1);
    }
  });
});

describe('sqliteTimestamp', () => {
  it('formats UTC without the T and milliseconds', () => {
    assert.equal(sqliteTimestamp(new Date('2024-06-01T12:34:56.789Z')), '2024-06-01 12:34:56');
  });
});
