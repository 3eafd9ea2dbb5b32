import type { SqlDeskClient } from './client.js';

export interface ToolResult {
  content: Array<{ type: 'text'; text: string }>;
}

export interface AgentTool<P> {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  execute: (toolCallId: string, params: P) => Promise<ToolResult>;
}

function textResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function createQueryTool(client: SqlDeskClient): AgentTool<{ sql: string }> {
  return {
    name: 'sql_query',
    description:
      'Run one SQLite statement against the store database. SELECT returns rows keyed by column name; other statements return the affected row count.',
    parameters: {
      type: 'object',
      additionalProperties: false,
      properties: {
        sql: { type: 'string', description: 'A single SQLite statement' },
      },
      required: ['sql'],
    },
    async execute(_toolCallId, params) {
      return textResult(await client.query(params.sql));
    },
  };
}

export function createDatabaseInfoTool(client: SqlDeskClient): AgentTool<Record<string, never>> {
  return {
    name: 'sql_database_info',
    description: 'List every table with its columns (type, not-null, primary key) and a few sample rows.',
    parameters: {
      type: 'object',
      additionalProperties: false,
      properties: {},
    },
    async execute() {
      return textResult(await client.databaseInfo());
    },
  };
}
