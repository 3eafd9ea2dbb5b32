import { withDb } from '../db/db.js';
import { failure, success, type OperationResult } from './result.js';
import type { QueryOutcome, Row, SqlValue } from './types.js';

/**
 * Execute one raw SQL statement and normalize its result.
 *
 * The text is passed to SQLite verbatim: no parameterization, no statement
 * filtering. Only expose this to callers that are allowed to run any SQL
 * against the database.
 */
export function executeSql(dbPath: string, sql: string): OperationResult<QueryOutcome> {
  try {
    const outcome = withDb(dbPath, (db): QueryOutcome => {
      const stmt = db.prepare(sql);

      if (isSelect(sql)) {
        return { kind: 'rows', rows: stmt.safeIntegers(true).all().map(toRow) };
      }

      // PRAGMA, WITH and RETURNING statements return data without being a SELECT
      if (stmt.reader) {
        stmt.all();
        return { kind: 'write', affectedRows: -1 };
      }

      const { changes } = stmt.run();
      // DDL and other non-DML statements have no row count
      return { kind: 'write', affectedRows: isDml(sql) ? changes : -1 };
    });
    return success(outcome);
  } catch (err) {
    return failure(err);
  }
}

export function isSelect(sql: string): boolean {
  return sql.trim().toUpperCase().startsWith('SELECT');
}

export function isDml(sql: string): boolean {
  return /^\s*(INSERT|UPDATE|DELETE|REPLACE)\b/i.test(sql);
}

function toRow(raw: unknown): Row {
  const row: Row = {};
  if (typeof raw !== 'object' || raw === null) return row;
  for (const [column, value] of Object.entries(raw)) {
    row[column] = toSqlValue(value);
  }
  return row;
}

/**
 * Integers are read as bigint so none are rounded. Those that fit a double
 * become numbers; larger ones become decimal strings, which JSON can carry.
 */
function toSqlValue(value: unknown): SqlValue {
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (typeof value === 'string' || typeof value === 'number' || value === null || Buffer.isBuffer(value)) {
    return value;
  }
  return String(value);
}
