#!/usr/bin/env node
/**
 * sqldesk CLI: set up the demo database and query it from a shell.
 *
 * Usage:
 *   npx sqldesk init [dir]      Write sqldesk.yaml, create and seed the database
 *   npx sqldesk query "<sql>"   Run one SQL statement and print the result
 *   npx sqldesk info            Print the schema and sample rows
 *   npx sqldesk serve           Start the HTTP API
 *   npx sqldesk mcp             Start a stdio MCP server for agent access
 *   npx sqldesk reset [dir]     Remove generated files and start fresh
 */

import { randomBytes } from 'node:crypto';
import { existsSync, writeFileSync, unlinkSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { hashSync } from 'bcryptjs';
import { initDatabase, INIT_MESSAGE } from './db/init.js';
import { loadConfig } from './config/loader.js';
import { sqlDeskConfigSchema, type SqlDeskConfigParsed } from './config/schema.js';
import { createSqlTools } from './tools/sql-tools.js';
import { stderrLogger } from './logger.js';
import { errorMessage } from './query/result.js';

export const CONFIG_FILE = 'sqldesk.yaml';
export const DB_FILE = 'sqldesk.db';

// --- Config ---

/**
 * Load the config from $SQLDESK_CONFIG or ./sqldesk.yaml.
 * Falls back to defaults (database in the working directory) when no file exists.
 */
export function readCliConfig(configPath?: string): SqlDeskConfigParsed {
  const path = configPath ?? process.env.SQLDESK_CONFIG ?? resolve(CONFIG_FILE);
  if (existsSync(path)) return loadConfig(path);

  const defaults = sqlDeskConfigSchema.parse({});
  return { ...defaults, database: { ...defaults.database, path: resolve(defaults.database.path) } };
}

// --- Init ---

export interface InitResult {
  apiKey: string;
  configPath: string;
  dbPath: string;
  seeded: boolean;
}

export interface InitOptions {
  port?: number;
}

/**
 * Bootstrap a new installation.
 *
 * Generates an API key, writes sqldesk.yaml holding its bcrypt hash,
 * then creates and seeds the database.
 */
export function init(targetDir?: string, options?: InitOptions): InitResult {
  const dir = targetDir ?? process.cwd();
  const configPath = resolve(dir, CONFIG_FILE);
  const dbPath = resolve(dir, DB_FILE);

  // Guard against re-initialization
  if (existsSync(configPath)) {
    throw new Error(`${CONFIG_FILE} already exists at ${configPath}. Delete it first to re-initialize.`);
  }

  const apiKey = `sk_${randomBytes(16).toString('hex')}`;
  const port = options?.port ?? 3000;

  const configContent = [
    '# sqldesk configuration',
    '',
    'database:',
    `  path: "${DB_FILE}"`,
    '  sample_rows: 3',
    '',
    'server:',
    '  host: "127.0.0.1"',
    `  port: ${port}`,
    `  api_key_hash: "${hashSync(apiKey, 10)}"`,
    '',
  ].join('\n');

  writeFileSync(configPath, configContent, 'utf-8');

  const result = initDatabase(dbPath);
  if (!result.ok) {
    throw new Error(`Database initialization failed: ${result.error}`);
  }

  return { apiKey, configPath, dbPath, seeded: result.value.seeded };
}

// --- Reset ---

/**
 * Remove the config file and the database (with its WAL/SHM companions)
 * so `init` can run again cleanly. Returns the files actually deleted.
 */
export function reset(targetDir?: string): string[] {
  const dir = targetDir ?? process.cwd();
  const configPath = resolve(dir, CONFIG_FILE);
  const dbPath = existsSync(configPath) ? loadConfig(configPath).database.path : resolve(dir, DB_FILE);

  const removed: string[] = [];
  for (const p of [configPath, dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    if (existsSync(p)) {
      unlinkSync(p);
      removed.push(p);
    }
  }
  return removed;
}

// --- CLI runner (only executes when this file is the entry point) ---
// Resolve symlinks so this works with npx (which symlinks node_modules/.bin/sqldesk → dist/src/cli.js)
const isDirectRun = (() => {
  try {
    const self = fileURLToPath(import.meta.url);
    const invoked = realpathSync(process.argv[1]);
    return invoked === self;
  } catch {
    return false;
  }
})();

if (isDirectRun) {
  const command = process.argv[2];

  if (command === 'init') {
    try {
      const result = init(process.argv[3]);
      console.log(INIT_MESSAGE);
      console.log(`\n  sqldesk.yaml created   ${result.configPath}`);
      console.log(`  Database created       ${result.dbPath}`);
      console.log(`\n  API key: ${result.apiKey}`);
      console.log('  (Save this. Agents send it as "Authorization: Bearer <key>")\n');
      console.log('  Next steps:');
      console.log('    Start the server:  npx sqldesk serve');
      console.log('    Or expose tools:   npx sqldesk mcp\n');
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else if (command === 'query') {
    const sql = process.argv[3];
    if (!sql) {
      console.error('Usage: npx sqldesk query "<sql>"');
      process.exit(1);
    }
    const { failed, response } = createSqlTools(readCliConfig(), stderrLogger).runQuery(sql);
    console.log(JSON.stringify(response, null, 2));
    if (failed) process.exit(1);
  } else if (command === 'info') {
    const info = createSqlTools(readCliConfig(), stderrLogger).getDatabaseInfo();
    console.log(JSON.stringify(info, null, 2));
    if ('error' in info) process.exit(1);
  } else if (command === 'serve') {
    try {
      const config = readCliConfig();
      const tools = createSqlTools(config);
      const ready = tools.ensureDatabase();
      if (!ready.ok) throw new Error(`Database initialization failed: ${ready.error}`);
      const { startServer } = await import('./server/server.js');
      startServer({ tools, config });
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else if (command === 'mcp') {
    try {
      const { startMcpServer } = await import('./mcp/server.js');
      await startMcpServer(createSqlTools(readCliConfig(), stderrLogger));
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else if (command === 'reset') {
    try {
      const removed = reset(process.argv[3]);
      if (removed.length === 0) {
        console.log('\n  Nothing to remove, already clean.\n');
      } else {
        console.log('\n  sqldesk reset complete. Removed:\n');
        for (const f of removed) {
          console.log(`    ${f}`);
        }
        console.log('\n  Run `npx sqldesk init` to start fresh.\n');
      }
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else {
    console.log('sqldesk CLI v0.1.0');
    console.log('\nUsage:');
    console.log('  npx sqldesk init [dir]      Write sqldesk.yaml, create and seed the database');
    console.log('  npx sqldesk query "<sql>"   Run one SQL statement and print the result');
    console.log('  npx sqldesk info            Print the schema and sample rows');
    console.log('  npx sqldesk serve           Start the HTTP API');
    console.log('  npx sqldesk mcp             Start a stdio MCP server for agent access');
    console.log('  npx sqldesk reset [dir]     Remove generated files and start fresh');
  }
}
