/**
 * A result scalar. Integers outside the safe double range arrive as decimal
 * strings.
 */
export type SqlValue = string | number | Buffer | null;

/** One result row: column name to value, in the query's column order. */
export type Row = Record<string, SqlValue>;

export type QueryOutcome =
  | { kind: 'rows'; rows: Row[] }
  | { kind: 'write'; affectedRows: number };

export interface ColumnDescriptor {
  name: string;
  type: string;
  notnull: boolean;
  pk: boolean;
}

export type DatabaseSchema = Record<string, ColumnDescriptor[]>;
