import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { rmSync } from 'node:fs';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';
import { createMcpServer, DATABASE_INFO_TOOL, EXECUTE_QUERY_TOOL } from './server.js';
import { SqlTools } from '../tools/sql-tools.js';
import { makeTmpDir, makeTestLogger } from '../test-utils.js';

const textResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
});

function firstText(result: unknown): string {
  return textResultSchema.parse(result).content[0].text;
}

describe('MCP server', () => {
  let tmpDir: string;
  let client: Client;

  beforeEach(async () => {
    tmpDir = makeTmpDir();
    const tools = new SqlTools({ dbPath: join(tmpDir, 'mcp.db'), logger: makeTestLogger() });
    const server = createMcpServer(tools);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('lists both tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([EXECUTE_QUERY_TOOL, DATABASE_INFO_TOOL].sort());
  });

  it('execute_query returns the facade record as JSON', async () => {
    const sql = 'SELECT COUNT(*) AS c FROM sales';
    const result = await client.callTool({ name: EXECUTE_QUERY_TOOL, arguments: { sql } });

    expect(result.isError).toBe(false);
    expect(JSON.parse(firstText(result))).toEqual({ query: sql, results: [{ c: 7 }] });
  });

  it('execute_query flags failed statements', async () => {
    const sql = 'DROP TABLE nothing_here';
    const result = await client.callTool({ name: EXECUTE_QUERY_TOOL, arguments: { sql } });

    expect(result.isError).toBe(true);
    expect(JSON.parse(firstText(result))).toEqual({
      query: sql,
      results: [{ error: 'no such table: nothing_here' }],
    });
  });

  it('execute_query does not flag a read whose only column is named error', async () => {
    const sql = "SELECT 'disk full' AS error";
    const result = await client.callTool({ name: EXECUTE_QUERY_TOOL, arguments: { sql } });

    expect(result.isError).toBe(false);
    expect(JSON.parse(firstText(result))).toEqual({ query: sql, results: [{ error: 'disk full' }] });
  });

  it('get_database_info returns schema and samples', async () => {
    const result = await client.callTool({ name: DATABASE_INFO_TOOL, arguments: {} });

    expect(result.isError).toBe(false);
    const info = JSON.parse(firstText(result)) as { schema: Record<string, unknown>; sample_data: Record<string, unknown[]> };
    expect(Object.keys(info.schema)).toEqual(['customers', 'products', 'sales', 'sale_items']);
    expect(info.sample_data.products).toHaveLength(3);
  });
});
