import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { SqlTools } from '../tools/sql-tools.js';
import type { SqlDeskConfigParsed } from '../config/schema.js';
import { consoleLogger, type Logger } from '../logger.js';
import { createAppApi } from './app-api.js';

export const VERSION = '0.1.0';

interface ServerDeps {
  tools: SqlTools;
  config: SqlDeskConfigParsed;
  logger?: Logger;
}

export function createServer(deps: ServerDeps): Hono {
  const app = new Hono();

  // Health check
  app.get('/health', (c) => c.json({ ok: true, version: VERSION }));

  // Mount App API
  const appApi = createAppApi({ tools: deps.tools, apiKeyHash: deps.config.server.api_key_hash });
  app.route('/api/v1', appApi);

  return app;
}

export function startServer(deps: ServerDeps): void {
  const logger = deps.logger ?? consoleLogger;
  const app = createServer(deps);
  const { host, port } = deps.config.server;

  serve({
    fetch: app.fetch,
    hostname: host,
    port,
  });

  logger.info(`sqldesk listening on http://${host}:${port}`);
}
