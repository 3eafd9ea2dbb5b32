import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadConfig } from './config/loader.js';
import { startServer } from './server/server.js';
import { createSqlTools } from './tools/sql-tools.js';

const configPath = process.argv[2] ?? process.env.SQLDESK_CONFIG ?? resolve('sqldesk.yaml');

if (!existsSync(configPath)) {
  console.log('sqldesk v0.1.0');
  console.log(`\nNo config file found at: ${configPath}`);
  console.log("Run 'npx sqldesk init' to get started.");
  process.exit(1);
}

const config = loadConfig(configPath);
const tools = createSqlTools(config);

// Initialize once up front; the tools still re-check the file on every call
const ready = tools.ensureDatabase();
if (!ready.ok) {
  console.error(`Database initialization failed: ${ready.error}`);
  process.exit(1);
}

startServer({ tools, config });
