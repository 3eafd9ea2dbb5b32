import type Database from 'better-sqlite3';
import {
  DEMO_CUSTOMERS,
  DEMO_PRODUCTS,
  DEMO_SALES,
  DEMO_SALE_ITEMS,
} from '../fixtures/demo-store.js';
import type { DemoTable } from './schema.js';

/** Rows inserted per demo table. */
export type SeedCounts = Record<DemoTable, number>;

/**
 * Insert the demo store rows, but only when `customers` is empty.
 * Returns the number of rows inserted per table, or null when the
 * database was already seeded.
 */
export function seedDatabase(db: Database.Database): SeedCounts | null {
  const { count } = db.prepare('SELECT COUNT(*) AS count FROM customers').get() as { count: number };
  if (count > 0) return null;

  const insertCustomer = db.prepare(
    'INSERT INTO customers (name, email, phone, address) VALUES (?, ?, ?, ?)',
  );
  const insertProduct = db.prepare(
    'INSERT INTO products (name, description, price, stock_quantity) VALUES (?, ?, ?, ?)',
  );
  const insertSale = db.prepare(
    'INSERT INTO sales (customer_id, sale_date, total_amount) VALUES (?, ?, ?)',
  );
  const insertSaleItem = db.prepare(
    'INSERT INTO sale_items (sale_id, product_id, quantity, price) VALUES (?, ?, ?, ?)',
  );

  const seed = db.transaction((): SeedCounts => {
    for (const row of DEMO_CUSTOMERS) insertCustomer.run(...row);
    for (const row of DEMO_PRODUCTS) insertProduct.run(...row);
    for (const row of DEMO_SALES) insertSale.run(...row);
    for (const row of DEMO_SALE_ITEMS) insertSaleItem.run(...row);
    return {
      customers: DEMO_CUSTOMERS.length,
      products: DEMO_PRODUCTS.length,
      sales: DEMO_SALES.length,
      sale_items: DEMO_SALE_ITEMS.length,
    };
  });

  return seed();
}
