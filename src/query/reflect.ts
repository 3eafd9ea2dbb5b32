import { quoteIdentifier, withDb } from '../db/db.js';
import { failure, success, type OperationResult } from './result.js';
import type { DatabaseSchema } from './types.js';

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

/**
 * Describe every user table in creation order: columns in definition order
 * with their declared type, NOT NULL flag and primary-key flag. Recomputed on
 * every call.
 */
export function getTableSchema(dbPath: string): OperationResult<DatabaseSchema> {
  try {
    const schema = withDb(dbPath, (db) => {
      const tables = db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'")
        .all() as { name: string }[];

      const result: DatabaseSchema = {};
      for (const { name } of tables) {
        const columns = db.pragma(`table_info(${quoteIdentifier(name)})`) as TableInfoRow[];
        result[name] = columns.map((col) => ({
          name: col.name,
          type: col.type,
          notnull: col.notnull !== 0,
          pk: col.pk !== 0,
        }));
      }
      return result;
    });
    return success(schema);
  } catch (err) {
    return failure(err);
  }
}
