/**
 * Deterministic retail sample data.
 *
 * Stores, customers and products come from fixtures/retail-seed.json; orders
 * and their line items are drawn from a seeded generator so that the same
 * seed and reference date always produce the same database.
 */

import { readFileSync } from 'node:fs';
import type Database from 'better-sqlite3';
import type { JSONSchemaType } from 'ajv';
import { createAjv, formatAjvErrors } from '../util/ajv.js';
import { loadRetailSchemaSql } from './schema.js';

export interface StoreSeed {
  name: string;
  location: string;
  manager: string;
  phone: string;
  email: string;
}

export interface CustomerSeed {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  address: string;
}

export interface ProductSeed {
  name: string;
  category: string;
  price: number;
  description: string;
  inStock: boolean;
}

export interface SeedFixtures {
  stores: StoreSeed[];
  customers: CustomerSeed[];
  products: ProductSeed[];
  orderStatuses: string[];
}

export interface SeedOptions {
  /** Number of orders to generate (default 50) */
  orders?: number;
  /** PRNG seed (default 42) */
  seed?: number;
  /** Reference date order dates count back from */
  now?: Date;
  fixtures?: SeedFixtures;
}

export interface SeedSummary {
  stores: number;
  customers: number;
  products: number;
  orders: number;
  orderItems: number;
}

const DAY_MS = 86_400_000;

const fixturesSchema: JSONSchemaType<SeedFixtures> = {
  type: 'object',
  properties: {
    stores: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          location: { type: 'string' },
          manager: { type: 'string' },
          phone: { type: 'string' },
          email: { type: 'string' },
        },
        required: ['name', 'location', 'manager', 'phone', 'email'],
        additionalProperties: false,
      },
    },
    customers: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          firstName: { type: 'string' },
          lastName: { type: 'string' },
          email: { type: 'string' },
          phone: { type: 'string' },
          address: { type: 'string' },
        },
        required: ['firstName', 'lastName', 'email', 'phone', 'address'],
        additionalProperties: false,
      },
    },
    products: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          category: { type: 'string' },
          price: { type: 'number', minimum: 0 },
          description: { type: 'string' },
          inStock: { type: 'boolean' },
        },
        required: ['name', 'category', 'price', 'description', 'inStock'],
        additionalProperties: false,
      },
    },
    orderStatuses: { type: 'array', minItems: 1, items: { type: 'string' } },
  },
  required: ['stores', 'customers', 'products', 'orderStatuses'],
  additionalProperties: false,
};

const validateFixtures = createAjv().compile(fixturesSchema);

export function parseSeedFixtures(data: unknown): SeedFixtures {
  if (!validateFixtures(data)) {
    throw new Error(`Invalid seed fixtures: ${formatAjvErrors(validateFixtures.errors)}`);
  }
  return data;
}

export function loadSeedFixtures(path: string | URL = new URL('./fixtures/retail-seed.json', import.meta.url)): SeedFixtures {
  const data: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseSeedFixtures(data);
}

/** mulberry32: small, fast, good enough for sample data */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

function pick<T>(rng: () => number, items: readonly T[]): T {
  return items[Math.floor(rng() * items.length)];
}

/** SQLite-friendly "YYYY-MM-DD HH:MM:SS" in UTC */
export function sqliteTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Create the retail tables if missing, wipe them, and insert sample data in
 * one transaction.
 */
export function seedDatabase(db: Database.Database, options: SeedOptions = {}): SeedSummary {
  const fixtures = options.fixtures ?? loadSeedFixtures();
  const orderCount = options.orders ?? 50;
  const now = options.now ?? new Date();
  const createdAt = sqliteTimestamp(now);
  const rng = createRng(options.seed ?? 42);

  db.exec(loadRetailSchemaSql());

  const insertStore = db.prepare(
    `INSERT INTO stores (name, location, manager, phone, email, created_at)
     VALUES (@name, @location, @manager, @phone, @email, @createdAt)`,
  );
  const insertCustomer = db.prepare(
    `INSERT INTO customers (first_name, last_name, email, phone, address, created_at)
     VALUES (@firstName, @lastName, @email, @phone, @address, @createdAt)`,
  );
  const insertProduct = db.prepare(
    `INSERT INTO products (name, category, price, description, in_stock, created_at)
     VALUES (@name, @category, @price, @description, @inStock, @createdAt)`,
  );
  const insertOrder = db.prepare(
    `INSERT INTO orders (customer_id, store_id, order_date, total_amount, status)
     VALUES (@customerId, @storeId, @orderDate, 0, @status)`,
  );
  const insertItem = db.prepare(
    `INSERT INTO order_items (order_id, product_id, quantity, unit_price)
     VALUES (@orderId, @productId, @quantity, @unitPrice)`,
  );
  const updateTotal = db.prepare('UPDATE orders SET total_amount = @total WHERE id = @id');

  const seed = db.transaction((): SeedSummary => {
    for (const table of ['order_items', 'orders', 'products', 'customers', 'stores']) {
      db.exec(`DELETE FROM ${table}`);
    }

    const storeIds = fixtures.stores.map((store) =>
      Number(insertStore.run({ ...store, createdAt }).lastInsertRowid),
    );
    const customerIds = fixtures.customers.map((customer) =>
      Number(insertCustomer.run({ ...customer, createdAt }).lastInsertRowid),
    );
    const products = fixtures.products.map((product) => ({
      id: Number(
        insertProduct.run({ ...product, inStock: product.inStock ? 1 : 0, createdAt }).lastInsertRowid,
      ),
      price: product.price,
    }));

    let orderItems = 0;
    for (let i = 0; i < orderCount; i++) {
      const orderDate = new Date(now.getTime() - randInt(rng, 1, 365) * DAY_MS);
      const orderId = Number(
        insertOrder.run({
          customerId: pick(rng, customerIds),
          storeId: pick(rng, storeIds),
          orderDate: sqliteTimestamp(orderDate),
          status: pick(rng, fixtures.orderStatuses),
        }).lastInsertRowid,
      );

      let total = 0;
      const itemCount = randInt(rng, 1, 5);
      for (let j = 0; j < itemCount; j++) {
        const product = pick(rng, products);
        const quantity = randInt(rng, 1, 3);
        insertItem.run({ orderId, productId: product.id, quantity, unitPrice: product.price });
        total += product.price * quantity;
      }
      orderItems += itemCount;
      updateTotal.run({ id: orderId, total: Math.round(total * 100) / 100 });
    }

    return {
      stores: storeIds.length,
      customers: customerIds.length,
      products: products.length,
      orders: orderCount,
      orderItems,
    };
  });

  return seed();
}
