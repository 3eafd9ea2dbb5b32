import { existsSync } from 'node:fs';
import { withDb } from './db.js';
import { createTables } from './schema.js';
import { seedDatabase, type SeedCounts } from './seed.js';
import { failure, success, type OperationResult } from '../query/result.js';

export const INIT_MESSAGE = 'Database initialized with sample data.';

export interface InitSummary {
  dbPath: string;
  /** The file did not exist before this call. */
  created: boolean;
  /** Seed rows were inserted by this call. */
  seeded: boolean;
  rowsInserted: SeedCounts | null;
}

/**
 * Create the demo tables if missing and seed them on first run.
 * Safe to call repeatedly: the seed step is skipped once `customers` has rows.
 */
export function initDatabase(dbPath: string): OperationResult<InitSummary> {
  const created = !existsSync(dbPath);
  try {
    const rowsInserted = withDb(dbPath, (db) => {
      createTables(db);
      return seedDatabase(db);
    });
    return success({ dbPath, created, seeded: rowsInserted !== null, rowsInserted });
  } catch (err) {
    return failure(err);
  }
}
