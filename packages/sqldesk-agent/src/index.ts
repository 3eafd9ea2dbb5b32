/**
 * sqldesk-agent: agent extension for querying a sqldesk hub.
 *
 * Registers a raw SQL tool and a schema/sample-rows tool, and appends a
 * short system prompt telling the agent how to use them.
 */

import { SqlDeskClient } from './client.js';
import { createQueryTool, createDatabaseInfoTool } from './tools.js';
import { SQL_TOOLS_SYSTEM_PROMPT } from './prompts.js';

export interface SqlDeskPluginConfig {
  hubUrl: string;
  apiKey?: string;
}

interface PluginApi {
  pluginConfig?: Record<string, unknown>;
  logger: { info: (msg: string) => void; warn: (msg: string) => void; error: (msg: string) => void };
  registerTool: (tool: unknown) => void;
  on: (hook: string, handler: (event: unknown) => Promise<unknown>) => void;
}

type ConfigParseResult =
  | { success: true; data: SqlDeskPluginConfig }
  | { success: false; error: { issues: Array<{ path: string[]; message: string }> } };

function invalid(path: string[], message: string): ConfigParseResult {
  return { success: false, error: { issues: [{ path, message }] } };
}

function parseConfig(value: unknown): ConfigParseResult {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return invalid([], 'expected config object');
  }
  const hubUrl: unknown = 'hubUrl' in value ? value.hubUrl : undefined;
  const apiKey: unknown = 'apiKey' in value ? value.apiKey : undefined;
  if (!hubUrl || typeof hubUrl !== 'string') {
    return invalid(['hubUrl'], 'hubUrl is required and must be a string');
  }
  if (apiKey !== undefined && typeof apiKey !== 'string') {
    return invalid(['apiKey'], 'apiKey must be a string');
  }
  return { success: true, data: { hubUrl, apiKey } };
}

export default {
  id: 'sqldesk',
  name: 'sqldesk',
  description: 'Answer questions about a SQLite store database through a sqldesk hub',

  configSchema: {
    safeParse: parseConfig,
    jsonSchema: {
      type: 'object',
      additionalProperties: false,
      properties: {
        hubUrl: { type: 'string' },
        apiKey: { type: 'string' },
      },
      required: ['hubUrl'],
    },
  },

  register(api: PluginApi): void {
    const parsed = parseConfig(api.pluginConfig);
    let config = parsed.success ? parsed.data : undefined;

    if (!config) {
      const envHubUrl = process.env.SQLDESK_URL;
      if (envHubUrl) {
        config = { hubUrl: envHubUrl, apiKey: process.env.SQLDESK_API_KEY };
        api.logger.info(`sqldesk: Configured from environment variables (hub: ${envHubUrl})`);
      }
    }

    if (!config) {
      api.logger.warn(
        'sqldesk: Missing hubUrl. Start a hub and configure the extension:\n' +
        '  1. Run: npx sqldesk init\n' +
        '  2. Start the server: npx sqldesk serve\n' +
        '  3. Configure: { "hubUrl": "http://127.0.0.1:3000", "apiKey": "sk_..." }\n' +
        '  Or set SQLDESK_URL and SQLDESK_API_KEY.',
      );
      return;
    }

    const client = new SqlDeskClient(config);

    api.logger.info(`sqldesk: Registering tools (hub: ${config.hubUrl})`);

    api.registerTool(createDatabaseInfoTool(client));
    api.registerTool(createQueryTool(client));

    // Inject system prompt before agent starts
    api.on('before_agent_start', async (_event: unknown) => {
      return { systemPromptAppend: SQL_TOOLS_SYSTEM_PROMPT };
    });
  },
};

// Re-export for direct usage
export { SqlDeskClient, SqlDeskApiError } from './client.js';
export type {
  SqlDeskClientConfig,
  QueryResult,
  QueryResultEntry,
  DatabaseInfoResult,
  ColumnInfo,
  HealthResult,
} from './client.js';
export { createQueryTool, createDatabaseInfoTool } from './tools.js';
export type { AgentTool, ToolResult } from './tools.js';
export { SQL_TOOLS_SYSTEM_PROMPT } from './prompts.js';
