import { join } from 'node:path';
import { rmSync } from 'node:fs';
import { hashSync } from 'bcryptjs';
import { vi } from 'vitest';
import type { Hono } from 'hono';
import { createServer } from '../../src/server/server.js';
import { SqlTools } from '../../src/tools/sql-tools.js';
import type { SqlDeskConfigParsed } from '../../src/config/schema.js';
import { makeTmpDir, makeTestLogger } from '../../src/test-utils.js';

export const E2E_HUB_URL = 'http://hub.test';
export const E2E_API_KEY = 'e2e-test-secret';

export interface E2eHub {
  app: Hono;
  tools: SqlTools;
  tmpDir: string;
  dbPath: string;
}

/**
 * Build an in-process hub and route global fetch to it, so the agent
 * package talks to the real HTTP API without opening a socket.
 */
export function setupE2eHub(): E2eHub {
  const tmpDir = makeTmpDir();
  const dbPath = join(tmpDir, 'e2e.db');
  const config: SqlDeskConfigParsed = {
    database: { path: dbPath, sample_rows: 3 },
    server: { host: '127.0.0.1', port: 3000, api_key_hash: hashSync(E2E_API_KEY, 4) },
  };

  const tools = new SqlTools({ dbPath, sampleRows: config.database.sample_rows, logger: makeTestLogger() });
  tools.ensureDatabase();
  const app = createServer({ tools, config });

  vi.stubGlobal('fetch', (input: string | URL | Request, init?: RequestInit) => app.request(input, init));

  return { app, tools, tmpDir, dbPath };
}

export function cleanup(hub: E2eHub): void {
  vi.unstubAllGlobals();
  rmSync(hub.tmpDir, { recursive: true, force: true });
}

export function makePluginApi(pluginConfig?: Record<string, unknown>) {
  return {
    pluginConfig,
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    registerTool: vi.fn(),
    on: vi.fn(),
  };
}
