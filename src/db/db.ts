import Database from 'better-sqlite3';

/**
 * Open (or create) the SQLite database file.
 * Uses WAL mode for better concurrency.
 */
export function openDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

/**
 * Run `fn` against a fresh connection that is closed before returning.
 * Every operation gets its own connection; nothing is pooled.
 */
export function withDb<T>(dbPath: string, fn: (db: Database.Database) => T): T {
  const db = openDb(dbPath);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
