import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import type { SqlTools } from '../tools/sql-tools.js';
import { VERSION } from '../server/server.js';

export const EXECUTE_QUERY_TOOL = 'execute_query';
export const DATABASE_INFO_TOOL = 'get_database_info';

/**
 * Build an MCP server exposing the raw-query and database-info tools.
 * Not connected to any transport yet.
 */
export function createMcpServer(tools: SqlTools): McpServer {
  const server = new McpServer({
    name: 'sqldesk',
    version: VERSION,
  });

  server.registerTool(
    EXECUTE_QUERY_TOOL,
    {
      description:
        'Execute a single SQL statement against the SQLite database. SELECT statements return rows as objects keyed by column name; other statements return [{ "affected_rows": n }]. Failures return [{ "error": message }]. The statement is run verbatim, so call get_database_info first to learn the table and column names.',
      inputSchema: {
        sql: z.string().describe('One SQLite statement, e.g. "SELECT name, price FROM products LIMIT 5"'),
      },
    },
    ({ sql }) => {
      const { failed, response } = tools.runQuery(sql);
      return {
        content: [{ type: 'text', text: JSON.stringify(response) }],
        isError: failed,
      };
    },
  );

  server.registerTool(
    DATABASE_INFO_TOOL,
    {
      description:
        'Describe the database: every table with its columns (name, declared type, not-null and primary-key flags) plus a few sample rows per table.',
    },
    () => {
      const info = tools.getDatabaseInfo();
      return {
        content: [{ type: 'text', text: JSON.stringify(info) }],
        isError: 'error' in info,
      };
    },
  );

  return server;
}

/**
 * Start the MCP server on stdio. The database is initialized up front so the
 * first tool call does not pay for seeding.
 */
export async function startMcpServer(tools: SqlTools): Promise<void> {
  const ready = tools.ensureDatabase();
  if (!ready.ok) {
    throw new Error(`Database initialization failed: ${ready.error}`);
  }

  const server = createMcpServer(tools);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
