import { existsSync } from 'node:fs';
import { initDatabase, type InitSummary } from '../db/init.js';
import { quoteIdentifier } from '../db/db.js';
import { executeSql } from '../query/executor.js';
import { getTableSchema } from '../query/reflect.js';
import { failure, success, type OperationResult } from '../query/result.js';
import type { DatabaseSchema, Row } from '../query/types.js';
import { consoleLogger, type Logger } from '../logger.js';
import type { SqlDeskConfigParsed } from '../config/schema.js';

export type QueryResultEntry = Row | { affected_rows: number } | { error: string };

export interface ExecuteQueryResponse {
  query: string;
  results: QueryResultEntry[];
}

export interface DatabaseInfo {
  schema: DatabaseSchema;
  sample_data: Record<string, Row[]>;
}

export type DatabaseInfoResponse = DatabaseInfo | { error: string };

/** A query response plus whether the statement itself failed. */
export interface QueryRun {
  failed: boolean;
  response: ExecuteQueryResponse;
}

export interface SqlToolsOptions {
  dbPath: string;
  /** Rows fetched per table by getDatabaseInfo. */
  sampleRows?: number;
  logger?: Logger;
}

/**
 * The two agent-facing operations: run a raw SQL statement, and describe the
 * database. Both make sure the database file exists (initializing and seeding
 * it if not) before touching it.
 */
export class SqlTools {
  readonly dbPath: string;
  private sampleRows: number;
  private logger: Logger;

  constructor(options: SqlToolsOptions) {
    this.dbPath = options.dbPath;
    this.sampleRows = options.sampleRows ?? 3;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Initialize the database if its file is missing. Servers call this once at
   * startup; the query methods repeat the existence check on every call.
   */
  ensureDatabase(): OperationResult<InitSummary | null> {
    if (existsSync(this.dbPath)) return success(null);

    const result = initDatabase(this.dbPath);
    if (result.ok) {
      this.logger.info(`Initialized database at ${this.dbPath}`);
    } else {
      this.logger.error(`Failed to initialize database at ${this.dbPath}: ${result.error}`);
    }
    return result;
  }

  executeQuery(sql: string): ExecuteQueryResponse {
    return this.runQuery(sql).response;
  }

  /**
   * Like executeQuery, but also reports failure. A read whose only column is
   * named `error` is not a failure.
   */
  runQuery(sql: string): QueryRun {
    const ready = this.ensureDatabase();
    if (!ready.ok) {
      return { failed: true, response: { query: sql, results: [{ error: ready.error }] } };
    }

    const result = executeSql(this.dbPath, sql);
    if (!result.ok) {
      return { failed: true, response: { query: sql, results: [{ error: result.error }] } };
    }

    const outcome = result.value;
    return {
      failed: false,
      response: {
        query: sql,
        results: outcome.kind === 'rows' ? outcome.rows : [{ affected_rows: outcome.affectedRows }],
      },
    };
  }

  getDatabaseInfo(): DatabaseInfoResponse {
    const result = this.describe();
    return result.ok ? result.value : { error: result.error };
  }

  private describe(): OperationResult<DatabaseInfo> {
    const ready = this.ensureDatabase();
    if (!ready.ok) return failure(ready.error);

    const schema = getTableSchema(this.dbPath);
    if (!schema.ok) return failure(schema.error);

    const sampleData: Record<string, Row[]> = {};
    for (const table of Object.keys(schema.value)) {
      const sample = executeSql(
        this.dbPath,
        `SELECT * FROM ${quoteIdentifier(table)} LIMIT ${this.sampleRows}`,
      );
      if (sample.ok && sample.value.kind === 'rows') {
        sampleData[table] = sample.value.rows;
      } else if (!sample.ok) {
        this.logger.warn(`Skipping sample rows for ${table}: ${sample.error}`);
      }
    }

    return success({ schema: schema.value, sample_data: sampleData });
  }
}

export function createSqlTools(config: SqlDeskConfigParsed, logger?: Logger): SqlTools {
  return new SqlTools({
    dbPath: config.database.path,
    sampleRows: config.database.sample_rows,
    logger,
  });
}
