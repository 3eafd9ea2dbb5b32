import { describe, it, expect, vi, afterEach } from 'vitest';
import { SqlDeskClient, SqlDeskApiError } from './client.js';
import { createQueryTool, createDatabaseInfoTool } from './tools.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('SqlDeskClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts SQL with the bearer key and strips trailing slashes', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ query: 'SELECT 1 AS one', results: [{ one: 1 }] }));
    vi.stubGlobal('fetch', fetchMock);

    const client = new SqlDeskClient({ hubUrl: 'http://127.0.0.1:3000//', apiKey: 'test-secret' });
    const result = await client.query('SELECT 1 AS one');

    expect(result).toEqual({ query: 'SELECT 1 AS one', results: [{ one: 1 }] });
    expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:3000/api/v1/query', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      body: JSON.stringify({ sql: 'SELECT 1 AS one' }),
    });
  });

  it('omits Authorization when no key is configured', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ schema: {}, sample_data: {} }));
    vi.stubGlobal('fetch', fetchMock);

    const client = new SqlDeskClient({ hubUrl: 'http://127.0.0.1:3000' });
    await client.databaseInfo();

    expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:3000/api/v1/info', {
      method: 'GET',
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('throws SqlDeskApiError on non-2xx responses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 401 })));

    const client = new SqlDeskClient({ hubUrl: 'http://127.0.0.1:3000', apiKey: 'wrong' });
    const err = await client.query('SELECT 1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SqlDeskApiError);
    expect(err).toMatchObject({ endpoint: 'query', statusCode: 401, body: 'nope' });
    expect((err as Error).message).toBe('sqldesk API error on query: 401 - nope');
  });

  it('reads the health endpoint', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ ok: true, version: '0.1.0' })));

    const client = new SqlDeskClient({ hubUrl: 'http://127.0.0.1:3000' });
    expect(await client.health()).toEqual({ ok: true, version: '0.1.0' });
  });
});

describe('Agent tools', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sql_query returns the query result as text', async () => {
    const payload = { query: 'SELECT 1 AS one', results: [{ one: 1 }] };
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(payload)));

    const tool = createQueryTool(new SqlDeskClient({ hubUrl: 'http://127.0.0.1:3000' }));
    const result = await tool.execute('call_1', { sql: 'SELECT 1 AS one' });

    expect(result.content).toEqual([{ type: 'text', text: JSON.stringify(payload, null, 2) }]);
  });

  it('sql_query requires sql in its parameter schema', () => {
    const tool = createQueryTool(new SqlDeskClient({ hubUrl: 'http://127.0.0.1:3000' }));
    expect(tool.parameters.required).toEqual(['sql']);
  });

  it('sql_database_info returns the info payload as text', async () => {
    const payload = { error: 'database is locked' };
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(payload)));

    const tool = createDatabaseInfoTool(new SqlDeskClient({ hubUrl: 'http://127.0.0.1:3000' }));
    const result = await tool.execute('call_2', {});

    expect(JSON.parse(result.content[0].text)).toEqual(payload);
  });
});
