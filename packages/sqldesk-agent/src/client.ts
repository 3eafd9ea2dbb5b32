/**
 * Thin HTTP client wrapping the sqldesk API endpoints.
 * Query failures (bad SQL, unknown tables) come back as `{ error }` records
 * inside a 200 response; only transport and auth problems throw.
 */

export type SqlScalar = string | number | boolean | null;

export type QueryResultEntry = Record<string, SqlScalar>;

export interface QueryResult {
  query: string;
  results: QueryResultEntry[];
}

export interface ColumnInfo {
  name: string;
  type: string;
  notnull: boolean;
  pk: boolean;
}

export type DatabaseInfoResult =
  | { schema: Record<string, ColumnInfo[]>; sample_data: Record<string, QueryResultEntry[]> }
  | { error: string };

export interface HealthResult {
  ok: boolean;
  version: string;
}

export interface SqlDeskClientConfig {
  hubUrl: string;
  apiKey?: string;
}

export class SqlDeskClient {
  private hubUrl: string;
  private apiKey?: string;

  constructor(config: SqlDeskClientConfig) {
    this.hubUrl = config.hubUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  /** Run one SQL statement against the hub's database. */
  async query(sql: string): Promise<QueryResult> {
    const res = await fetch(`${this.hubUrl}/api/v1/query`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ sql }),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new SqlDeskApiError('query', res.status, text);
    }

    return res.json() as Promise<QueryResult>;
  }

  /** Fetch the schema and sample rows. */
  async databaseInfo(): Promise<DatabaseInfoResult> {
    const res = await fetch(`${this.hubUrl}/api/v1/info`, {
      method: 'GET',
      headers: this.headers(),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new SqlDeskApiError('info', res.status, text);
    }

    return res.json() as Promise<DatabaseInfoResult>;
  }

  async health(): Promise<HealthResult> {
    const res = await fetch(`${this.hubUrl}/health`, { signal: AbortSignal.timeout(2000) });
    if (!res.ok) {
      throw new SqlDeskApiError('health', res.status, await res.text());
    }
    return res.json() as Promise<HealthResult>;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

export class SqlDeskApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly statusCode: number,
    public readonly body: string,
  ) {
    super(`sqldesk API error on ${endpoint}: ${statusCode} - ${body}`);
    this.name = 'SqlDeskApiError';
  }
}
