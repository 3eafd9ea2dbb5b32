import type Database from 'better-sqlite3';

const CREATE_CUSTOMERS = `
CREATE TABLE IF NOT EXISTS customers (
  customer_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  email TEXT UNIQUE,
  phone TEXT,
  address TEXT
)`;

const CREATE_PRODUCTS = `
CREATE TABLE IF NOT EXISTS products (
  product_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT,
  price REAL NOT NULL,
  stock_quantity INTEGER DEFAULT 0
)`;

const CREATE_SALES = `
CREATE TABLE IF NOT EXISTS sales (
  sale_id INTEGER PRIMARY KEY,
  customer_id INTEGER,
  sale_date TEXT NOT NULL,
  total_amount REAL NOT NULL,
  FOREIGN KEY (customer_id) REFERENCES customers (customer_id)
)`;

const CREATE_SALE_ITEMS = `
CREATE TABLE IF NOT EXISTS sale_items (
  item_id INTEGER PRIMARY KEY,
  sale_id INTEGER,
  product_id INTEGER,
  quantity INTEGER NOT NULL,
  price REAL NOT NULL,
  FOREIGN KEY (sale_id) REFERENCES sales (sale_id),
  FOREIGN KEY (product_id) REFERENCES products (product_id)
)`;

/** Tables in dependency order (referenced tables first). */
export const DEMO_TABLES = ['customers', 'products', 'sales', 'sale_items'] as const;

export type DemoTable = (typeof DEMO_TABLES)[number];

export function createTables(db: Database.Database): void {
  db.exec(CREATE_CUSTOMERS);
  db.exec(CREATE_PRODUCTS);
  db.exec(CREATE_SALES);
  db.exec(CREATE_SALE_ITEMS);
}
